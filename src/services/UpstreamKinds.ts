import { ForwardOptions, ProbeOptions, ResolutionOutcome, UpstreamDescriptor, UpstreamKind } from '../types';
import { ChainIdentityResolver } from './ChainIdentityResolver';
import { CallResult, UpstreamService } from './UpstreamService';

/**
 * What the gateway needs from an upstream family: how to learn its chain
 * identity at bootstrap and how to forward a call to it.
 */
export interface UpstreamBehavior {
  resolveIdentity(upstream: UpstreamDescriptor, options: ProbeOptions): Promise<ResolutionOutcome>;
  forward(upstream: UpstreamDescriptor, method: string, params: unknown, options: ForwardOptions): Promise<CallResult>;
}

export type UpstreamBehaviors = Record<UpstreamKind, UpstreamBehavior>;

export function createEvmBehavior(upstreamService: UpstreamService): UpstreamBehavior {
  const resolver = new ChainIdentityResolver(upstreamService);
  return {
    resolveIdentity: (upstream, options) => resolver.resolve(upstream, options),
    forward: (upstream, method, params, options) => upstreamService.call(upstream.endpoint, method, params, options)
  };
}

export function createUpstreamBehaviors(upstreamService: UpstreamService): UpstreamBehaviors {
  return {
    evm: createEvmBehavior(upstreamService)
  };
}
