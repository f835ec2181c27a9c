export { init } from './init';
export { EXIT_CODES, exitCodeFor } from './exitCodes';
export type { Gateway } from './init';
export { loadConfig, parseConfig, nodeFileSystem } from './config';
export { startServer, createGatewayServer } from './server';
export { BootstrapService, buildRoutingIndex, describeUpstreams } from './services/BootstrapService';
export { ChainIdentityResolver, decodeChainId } from './services/ChainIdentityResolver';
export { UpstreamRegistry } from './services/UpstreamRegistry';
export { UpstreamService } from './services/UpstreamService';
export { createUpstreamBehaviors } from './services/UpstreamKinds';
export { Logger } from './services/Logger';
export { DefaultRoutingStrategy, normalizeResponse } from './strategy/RoutingStrategy';
export * from './errors';
export type * from './types';
