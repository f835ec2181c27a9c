import type { JsonRpcErrorObject } from './types';

export type GatewayErrorKind =
  | 'ConfigError'
  | 'ChainResolutionError'
  | 'BootstrapError'
  | 'HttpServerError'
  | 'UnknownProject'
  | 'UnsupportedChain'
  | 'UpstreamRpcError'
  | 'UpstreamUnreachable';

/**
 * Base class for all gateway errors
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
  abstract readonly code: number;
  abstract readonly statusCode: number;
  readonly data?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; data?: Record<string, unknown> }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.data = options?.data;
  }

  toJsonRpcError(): JsonRpcErrorObject {
    return {
      code: this.code,
      message: this.message,
      data: { kind: this.kind, ...this.data },
    };
  }
}

export function errorMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * Configuration missing, unreadable or failing validation
 */
export class ConfigError extends GatewayError {
  readonly kind = 'ConfigError';
  readonly code = -32603;
  readonly statusCode = 500;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export type ChainResolutionReason = UnreachableReason | 'rpc-error' | 'invalid-result' | 'exception';

/**
 * One upstream's chain id could not be determined. `reason` tells transport
 * failures apart from an answer that could not be used; `cause` holds the
 * underlying transport failure, upstream error object or thrown value.
 */
export class ChainResolutionError extends GatewayError {
  readonly kind = 'ChainResolutionError';
  readonly code = -32603;
  readonly statusCode = 500;
  readonly endpoint: string;
  readonly method: string;
  readonly reason: ChainResolutionReason;

  constructor(endpoint: string, method: string, reason: ChainResolutionReason, detail: string, cause?: unknown) {
    super(`${method} probe against ${endpoint} failed: ${detail}`, {
      cause,
      data: { endpoint, method, reason },
    });
    this.name = 'ChainResolutionError';
    this.endpoint = endpoint;
    this.method = method;
    this.reason = reason;
  }
}

export interface UpstreamFailure {
  projectId: string;
  upstreamId: string;
  error: ChainResolutionError;
}

/**
 * At least one upstream failed resolution; nothing was published
 */
export class BootstrapError extends GatewayError {
  readonly kind = 'BootstrapError';
  readonly code = -32603;
  readonly statusCode = 500;
  readonly projectId: string;
  readonly upstreamId: string;
  readonly failures: readonly UpstreamFailure[];

  constructor(failures: readonly [UpstreamFailure, ...UpstreamFailure[]]) {
    const [first] = failures;
    const others = failures.length > 1 ? ` (and ${failures.length - 1} more upstream failure(s))` : '';
    super(
      `cannot bootstrap project "${first.projectId}": upstream "${first.upstreamId}" failed chain id resolution: ${first.error.message}${others}`,
      { cause: first.error, data: { projectId: first.projectId, upstreamId: first.upstreamId } }
    );
    this.name = 'BootstrapError';
    this.projectId = first.projectId;
    this.upstreamId = first.upstreamId;
    this.failures = failures;
  }
}

/**
 * The HTTP listener could not be bound
 */
export class HttpServerError extends GatewayError {
  readonly kind = 'HttpServerError';
  readonly code = -32603;
  readonly statusCode = 500;

  constructor(host: string, port: number, cause: unknown) {
    super(`failed to start http server on ${host}:${port}: ${errorMessage(cause)}`, {
      cause,
      data: { host, port },
    });
    this.name = 'HttpServerError';
  }
}

export class UnknownProjectError extends GatewayError {
  readonly kind = 'UnknownProject';
  readonly code = -32001;
  readonly statusCode = 404;

  constructor(projectId: string) {
    super(`Unknown project: ${projectId}`, { data: { projectId } });
    this.name = 'UnknownProjectError';
  }
}

export class UnsupportedChainError extends GatewayError {
  readonly kind = 'UnsupportedChain';
  readonly code = -32002;
  readonly statusCode = 400;

  constructor(projectId: string, chainId: number) {
    super(`Project ${projectId} has no upstream for chain ${chainId}`, { data: { projectId, chainId } });
    this.name = 'UnsupportedChainError';
  }
}

/**
 * The upstream answered with a JSON-RPC error; its code, message and data are
 * passed through to the client untouched.
 */
export class UpstreamRpcError extends GatewayError {
  readonly kind = 'UpstreamRpcError';
  readonly code: number;
  readonly statusCode = 502;
  readonly upstreamError: JsonRpcErrorObject;

  constructor(upstreamId: string, upstreamError: JsonRpcErrorObject) {
    super(upstreamError.message, { data: { upstreamId } });
    this.name = 'UpstreamRpcError';
    this.code = upstreamError.code;
    this.upstreamError = upstreamError;
  }

  toJsonRpcError(): JsonRpcErrorObject {
    return {
      code: this.upstreamError.code,
      message: this.upstreamError.message,
      data: {
        kind: this.kind,
        ...this.data,
        ...(this.upstreamError.data !== undefined ? { upstreamData: this.upstreamError.data } : {}),
      },
    };
  }
}

export type UnreachableReason = 'timeout' | 'aborted' | 'network' | 'http-status' | 'invalid-json' | 'invalid-envelope';

export class UpstreamUnreachableError extends GatewayError {
  readonly kind = 'UpstreamUnreachable';
  readonly code = -32003;
  readonly statusCode: number;
  readonly reason: UnreachableReason;

  constructor(upstreamId: string, reason: UnreachableReason, detail: string) {
    super(`Upstream ${upstreamId} unreachable: ${detail}`, { data: { upstreamId, reason } });
    this.name = 'UpstreamUnreachableError';
    this.reason = reason;
    this.statusCode = reason === 'timeout' ? 504 : 502;
  }
}

export type RoutingError =
  | UnknownProjectError
  | UnsupportedChainError
  | UpstreamRpcError
  | UpstreamUnreachableError;

export type FatalError = ConfigError | BootstrapError | HttpServerError;
