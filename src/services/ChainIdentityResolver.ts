import { ChainResolutionError, ChainResolutionReason } from '../errors';
import { ProbeOptions, ResolutionOutcome, UpstreamDescriptor } from '../types';
import { hexQuantitySchema } from '../validation';
import { UpstreamService } from './UpstreamService';

export const CHAIN_ID_METHOD = 'eth_chainId';

export function decodeChainId(value: unknown): number | null {
  const parsed = hexQuantitySchema.safeParse(value);
  if (!parsed.success) return null;

  const chainId = parseInt(parsed.data, 16);
  return Number.isSafeInteger(chainId) && chainId > 0 ? chainId : null;
}

/**
 * Determines which chain an EVM upstream serves. A declared
 * `metadata.evmChainId` is trusted as-is; otherwise the endpoint is asked once
 * with `eth_chainId`. Retrying is left to the caller.
 */
export class ChainIdentityResolver {
  constructor(private upstreamService: UpstreamService) {}

  async resolve(upstream: UpstreamDescriptor, options: ProbeOptions): Promise<ResolutionOutcome> {
    const declared = upstream.metadata.evmChainId;
    if (declared !== undefined) {
      return { success: true, chainId: declared, probed: false };
    }

    return this.probe(upstream.endpoint, options);
  }

  async probe(endpoint: string, options: ProbeOptions): Promise<ResolutionOutcome> {
    const failed = (reason: ChainResolutionReason, detail: string, cause?: unknown): ResolutionOutcome => ({
      success: false,
      error: new ChainResolutionError(endpoint, CHAIN_ID_METHOD, reason, detail, cause)
    });

    const response = await this.upstreamService.call(endpoint, CHAIN_ID_METHOD, [], { timeoutMs: options.timeoutMs });
    if (!response.success) {
      return failed(response.failure.reason, response.failure.message, response.failure);
    }

    // Non-2xx replies only arrive here carrying an error envelope
    const { error, result } = response.envelope;
    if (error) {
      return failed('rpc-error', `upstream returned error ${error.code}: ${error.message}`, error);
    }

    const chainId = decodeChainId(result);
    if (chainId === null) {
      return failed(
        'invalid-result',
        result === undefined ? 'response has no result' : `unexpected result ${JSON.stringify(result)}`,
        result
      );
    }

    return { success: true, chainId, probed: true };
  }
}
