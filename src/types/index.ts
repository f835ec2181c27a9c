import type { ChainResolutionError, RoutingError } from '../errors';
import type { UpstreamRegistry } from '../services/UpstreamRegistry';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'disabled';

export type UpstreamKind = 'evm';

export interface UpstreamMetadata {
  evmChainId?: number;
  [key: string]: unknown;
}

export interface UpstreamConfig {
  id: string;
  type: UpstreamKind;
  endpoint: string;
  metadata: UpstreamMetadata;
}

export interface ServerConfig {
  httpHost: string;
  httpPort: number;
  shutdownGraceMs: number;
}

export interface TimeoutConfig {
  defaultResponseTimeoutMs: number;
  chainIdProbeTimeoutMs: number;
}

export interface BootstrapConfig {
  probeRetries: number;
}

export interface ProjectConfig {
  id: string;
  description?: string;
  responseTimeoutMs?: number;
  upstreams: UpstreamConfig[];
}

export interface AppConfig {
  logLevel: LogLevel;
  server: ServerConfig;
  timeouts: TimeoutConfig;
  bootstrap: BootstrapConfig;
  projects: ProjectConfig[];
}

/**
 * Minimal file access used to read the configuration. Node's `fs` module
 * satisfies it; tests pass an in-memory implementation.
 */
export interface FileSystem {
  existsSync(path: string): boolean;
  readFileSync(path: string, encoding: 'utf8'): string;
}

/**
 * One configured backend node. `position` is the upstream's index within its
 * project and fixes its place in every routing bucket.
 */
export interface UpstreamDescriptor {
  readonly projectId: string;
  readonly id: string;
  readonly type: UpstreamKind;
  readonly endpoint: string;
  readonly metadata: Readonly<UpstreamMetadata>;
  readonly position: number;
}

export interface ResolvedUpstream extends UpstreamDescriptor {
  readonly resolvedChainId: number;
}

/** projectId -> chainId -> upstreams in configuration order. */
export type RoutingIndex = ReadonlyMap<string, ReadonlyMap<number, readonly ResolvedUpstream[]>>;

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
  id?: JsonRpcId;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc?: string;
  id?: JsonRpcId;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

export interface RequestContext {
  projectId: string;
  chainId: number;
  rpcMethod: string;
  rpcParams?: unknown;
  rpcId: JsonRpcId;
}

export type RequestStage =
  | 'Received'
  | 'ProjectResolved'
  | 'UpstreamSelected'
  | 'Forwarded'
  | 'ResponseNormalized'
  | 'Completed';

export interface RoutingContext {
  request: RequestContext;
  registry: UpstreamRegistry;
  availableUpstreams: readonly ResolvedUpstream[];
  selectedUpstream?: ResolvedUpstream;
}

export interface RoutingResult {
  filteredUpstreams: readonly ResolvedUpstream[];
  selectedUpstream?: ResolvedUpstream;
  reason: string;
  shouldContinue: boolean;
  error?: RoutingError;
}

export interface RoutingOperation {
  name: string;
  execute(context: RoutingContext): Promise<RoutingResult>;
}

export type RouteOutcome =
  | { success: true; result: unknown; upstreamId: string; stage: 'Completed' }
  | { success: false; error: RoutingError; upstreamId?: string; stage: RequestStage };

export interface ForwardOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ProbeOptions {
  timeoutMs: number;
}

export type ResolutionOutcome =
  | { success: true; chainId: number; probed: boolean }
  | { success: false; error: ChainResolutionError };
