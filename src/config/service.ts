import { z } from 'zod';
import { EXTENSION_NAMES, isExtensionName } from '../models/hostInfo.js';
import type { ExtensionName } from '../models/hostInfo.js';

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

// Environment variables understood by the OSCQuery service.
const EnvSchema = z.object({
  OSCQUERY_HTTP_HOST: z.string().min(1).default('0.0.0.0'),
  OSCQUERY_HTTP_PORT: port(8080),
  OSCQUERY_NAME: z.string().min(1).default('OSCQuery Server'),
  OSC_IP: z.string().min(1).default('127.0.0.1'),
  OSC_PORT: port(9000),
  OSC_TRANSPORT: z.enum(['UDP', 'TCP']).default('UDP'),
  OSCQUERY_EXTENSIONS: commaList('ACCESS,VALUE,RANGE,DESCRIPTION,UNIT').refine(
    (names) => names.every(isExtensionName),
    { message: `extensions must be among ${EXTENSION_NAMES.join(', ')}` }
  ),
  ALLOWED_ORIGINS: commaList('*'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(0).default(0), // 0 disables the limiter
});

export type ServiceConfig = {
  http: { host: string; port: number };
  hostInfo: {
    name: string;
    oscIp: string;
    oscPort: number;
    oscTransport: 'UDP' | 'TCP';
    extensions: ExtensionName[];
  };
  cors: { origin: string | string[] };
  rateLimit: { windowMs: number; max: number };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.parse(env);
  const origins = parsed.ALLOWED_ORIGINS;
  return {
    http: { host: parsed.OSCQUERY_HTTP_HOST, port: parsed.OSCQUERY_HTTP_PORT },
    hostInfo: {
      name: parsed.OSCQUERY_NAME,
      oscIp: parsed.OSC_IP,
      oscPort: parsed.OSC_PORT,
      oscTransport: parsed.OSC_TRANSPORT,
      extensions: parsed.OSCQUERY_EXTENSIONS.filter(isExtensionName),
    },
    cors: { origin: origins.length === 0 || origins.includes('*') ? '*' : origins },
    rateLimit: { windowMs: parsed.RATE_LIMIT_WINDOW_MS, max: parsed.RATE_LIMIT_MAX },
  };
}
