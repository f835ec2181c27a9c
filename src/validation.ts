import { z } from 'zod';
import type { JsonRpcErrorObject, JsonRpcId } from './types';

const jsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

// JSON-RPC 2.0 specification schemas
export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1, 'Method is required'),
  params: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
  id: jsonRpcIdSchema.optional()
});

export const jsonRpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional()
});

const partialErrorObjectSchema = jsonRpcErrorObjectSchema.partial();

export const UPSTREAM_ERROR_DEFAULTS = {
  code: -32603,
  message: 'Upstream returned an error'
} as const;

/**
 * Any non-null `error` member is an upstream error. Objects missing `code` or
 * `message` get defaults; anything else (a bare string, a malformed object)
 * becomes the message where possible and is kept verbatim as `data`.
 */
export function toUpstreamErrorObject(raw: unknown): JsonRpcErrorObject | undefined {
  if (raw === undefined || raw === null) return undefined;

  const strict = jsonRpcErrorObjectSchema.safeParse(raw);
  if (strict.success) return strict.data;

  const partial = partialErrorObjectSchema.safeParse(raw);
  if (partial.success) {
    return {
      code: partial.data.code ?? UPSTREAM_ERROR_DEFAULTS.code,
      message: partial.data.message ?? UPSTREAM_ERROR_DEFAULTS.message,
      data: partial.data.data ?? raw
    };
  }

  return {
    code: UPSTREAM_ERROR_DEFAULTS.code,
    message: typeof raw === 'string' && raw.length > 0 ? raw : UPSTREAM_ERROR_DEFAULTS.message,
    data: raw
  };
}

// Upstreams are not held to the full envelope; some omit jsonrpc and id
export const jsonRpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: jsonRpcIdSchema.optional(),
  result: z.unknown().optional(),
  error: z.unknown().transform(toUpstreamErrorObject)
});

export const routeParamsSchema = z.object({
  projectId: z.string().min(1),
  chainId: z.string().regex(/^[0-9]+$/, 'Chain id must be a decimal integer').transform(Number).pipe(z.number().int().positive().safe())
});

export const hexQuantitySchema = z.string().regex(/^0x[0-9a-fA-F]+$/, 'Expected a hex-encoded quantity');

export type JsonRpcErrorBody = {
  jsonrpc: '2.0';
  error: {
    code: number;
    message: string;
    data?: unknown;
  };
  id: JsonRpcId;
};

export type ValidationResult<T> = {
  success: true;
  data: T;
} | {
  success: false;
  error: JsonRpcErrorBody;
};

function idOf(data: unknown): JsonRpcId {
  if (typeof data !== 'object' || data === null || !('id' in data)) return null;
  const parsed = jsonRpcIdSchema.safeParse(data.id);
  return parsed.success ? parsed.data : null;
}

export function validateJsonRpcRequest(data: unknown): ValidationResult<z.infer<typeof jsonRpcRequestSchema>> {
  if (Array.isArray(data)) {
    return {
      success: false,
      error: createJsonRpcError(JSON_RPC_ERRORS.INVALID_REQUEST, 'Batch requests are not supported', null)
    };
  }

  const result = jsonRpcRequestSchema.safeParse(data);

  if (result.success) {
    return {
      success: true,
      data: result.data
    };
  }

  return {
    success: false,
    error: createJsonRpcError(JSON_RPC_ERRORS.INVALID_REQUEST, 'Invalid Request', idOf(data), result.error.issues)
  };
}

export function validateRouteParams(params: unknown, body: unknown): ValidationResult<z.infer<typeof routeParamsSchema>> {
  const result = routeParamsSchema.safeParse(params);

  if (result.success) {
    return {
      success: true,
      data: result.data
    };
  }

  return {
    success: false,
    error: createJsonRpcError(JSON_RPC_ERRORS.INVALID_REQUEST, 'Invalid route', idOf(body), result.error.issues)
  };
}

// Helper function to create JSON-RPC error responses
export function createJsonRpcError(
  code: number,
  message: string,
  id: JsonRpcId = null,
  data?: unknown
): JsonRpcErrorBody {
  return {
    jsonrpc: '2.0',
    error: {
      code,
      message,
      ...(data !== undefined ? { data } : {})
    },
    id
  };
}

// Common JSON-RPC error codes
export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603
} as const;
