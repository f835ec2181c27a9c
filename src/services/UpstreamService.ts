import fetch from 'node-fetch';

import { UnreachableReason, errorMessage } from '../errors';
import { JsonRpcResponse } from '../types';
import { jsonRpcResponseSchema } from '../validation';
import { Logger } from './Logger';

export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportFailure {
  reason: UnreachableReason;
  message: string;
  status?: number;
}

export type CallResult =
  | { success: true; status: number; envelope: JsonRpcResponse; responseTime: number }
  | { success: false; failure: TransportFailure; responseTime: number };

/**
 * JSON-RPC over HTTP transport shared by chain id probes and request
 * forwarding. Every call is bounded by `timeoutMs` and can be cancelled
 * through `signal`.
 */
export class UpstreamService {
  private requestId = 0;

  constructor(private logger: Logger) {}

  async call(endpoint: string, method: string, params: unknown, options: CallOptions): Promise<CallResult> {
    const startTime = Date.now();
    const body = {
      jsonrpc: '2.0',
      id: ++this.requestId,
      method,
      ...(params !== undefined ? { params } : {})
    };

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onCallerAbort = () => controller.abort();

    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const fail = (reason: UnreachableReason, message: string, status?: number): CallResult => {
      this.logger.debug(`Call ${method} to ${endpoint} failed (${reason}): ${message}`);
      return { success: false, failure: { reason, message, status }, responseTime: Date.now() - startTime };
    };

    try {
      let text: string;
      let status: number;
      let ok: boolean;
      try {
        const response = await fetch(endpoint, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(body),
          signal: controller.signal
        });
        status = response.status;
        ok = response.ok;
        text = await response.text();
      } catch (error) {
        if (timedOut) {
          return fail('timeout', `timed out after ${options.timeoutMs}ms`);
        }
        if (controller.signal.aborted) {
          return fail('aborted', 'request cancelled by caller');
        }
        return fail('network', errorMessage(error));
      }

      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        return ok
          ? fail('invalid-json', 'response body is not valid JSON', status)
          : fail('http-status', `HTTP ${status}`, status);
      }

      const parsed = jsonRpcResponseSchema.safeParse(json);
      if (!parsed.success) {
        return ok
          ? fail('invalid-envelope', 'response is not a JSON-RPC envelope', status)
          : fail('http-status', `HTTP ${status}`, status);
      }

      // Error envelopes are passed through whatever the status; anything else needs a 2xx
      if (!ok && !parsed.data.error) {
        return fail('http-status', `HTTP ${status}`, status);
      }

      return { success: true, status, envelope: parsed.data, responseTime: Date.now() - startTime };
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
