export * from './core/errors.js';
export * from './models/addressTree.js';
export * from './models/hostInfo.js';
export * from './models/oscValue.js';
export * from './models/units.js';
export * from './services/serializer.js';
export * from './services/resolver.js';
export { WireFloat, WireLong, formatFloat, stringifyWire, wireObject } from './utils/wireJson.js';
export type { WireObject, WireValue } from './utils/wireJson.js';
export { createApp, startOscQueryService } from './server.js';
export type { AppOptions, RunningService, ServiceOptions } from './server.js';
export { oscQueryRouter } from './routes/oscquery.js';
export { loadConfig } from './config/service.js';
export type { ServiceConfig } from './config/service.js';
