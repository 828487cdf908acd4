import express from 'express';
import type { ErrorRequestHandler, Express, Request, Response } from 'express';
import cors from 'cors';
import { createServer } from 'http';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { isOscQueryError } from './core/errors.js';
import type { AddressTree } from './models/addressTree.js';
import { queryRateLimit } from './middleware/rateLimit.js';
import type { QueryRateLimitOptions } from './middleware/rateLimit.js';
import { requestLogger } from './middleware/requestLogger.js';
import { oscQueryRouter } from './routes/oscquery.js';
import { logger } from './utils/logger.js';

export type AppOptions = {
  cors?: { origin: string | string[] };
  rateLimit?: QueryRateLimitOptions;
};

export type ServiceOptions = AppOptions & {
  host: string;
  port: number;
};

export type RunningService = {
  server: Server;
  address: AddressInfo;
  close: () => Promise<void>;
};

// Express app answering OSCQuery requests for a published tree.
export function createApp(tree: AddressTree, options: AppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger);
  app.use(cors({
    origin: options.cors?.origin ?? '*',
    methods: ['GET', 'HEAD', 'OPTIONS'],
  }));
  if (options.rateLimit) app.use(queryRateLimit(options.rateLimit));

  app.use(oscQueryRouter(tree));

  // Error handling middleware
  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (isOscQueryError(err) && err.status < 500) {
      logger.warn('Rejected OSCQuery request', { code: err.code, error: err.message });
      res.status(err.status).json({ error: err.code, message: err.message });
      return;
    }
    logger.error('Unhandled error:', { error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: 'Internal Server Error' });
  };
  app.use(onError);

  // Non-GET methods fall through to here
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found' });
  });

  return app;
}

export function startOscQueryService(tree: AddressTree, options: ServiceOptions): Promise<RunningService> {
  const server = createServer(createApp(tree, options));

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('OSCQuery server is not bound to a TCP port'));
        return;
      }

      logger.info(`OSCQuery listening on ${address.address}:${address.port}`);
      resolve({
        server,
        address,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
