import 'dotenv/config';
import { loadConfig } from './config/service.js';
import { buildDemoTree } from './demoTree.js';
import { startOscQueryService } from './server.js';
import type { RunningService } from './server.js';
import { logger } from './utils/logger.js';

async function main() {
  const config = loadConfig();
  const tree = buildDemoTree(config.hostInfo);
  const service = await startOscQueryService(tree, {
    ...config.http,
    cors: config.cors,
    rateLimit: config.rateLimit,
  });

  process.on('SIGTERM', () => void shutdown(service));
  process.on('SIGINT', () => void shutdown(service));
}

// Graceful shutdown handler
async function shutdown(service: RunningService) {
  logger.info('Shutting down OSCQuery server...');

  // Force close after timeout
  const force = setTimeout(() => {
    logger.warn('Forcing server shutdown');
    process.exit(1);
  }, 5000);
  force.unref();

  try {
    await service.close();
    logger.info('HTTP server closed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start OSCQuery server:', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
