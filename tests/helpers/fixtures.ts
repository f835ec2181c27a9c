import { ResolvedUpstream } from '../../src/types';
import { Logger } from '../../src/services/Logger';
import { UpstreamService } from '../../src/services/UpstreamService';
import { createUpstreamBehaviors, UpstreamBehaviors } from '../../src/services/UpstreamKinds';

export function resolvedUpstream(
  projectId: string,
  id: string,
  endpoint: string,
  chainId: number,
  position: number
): ResolvedUpstream {
  return { projectId, id, type: 'evm', endpoint, metadata: {}, position, resolvedChainId: chainId };
}

export function silentBehaviors(): UpstreamBehaviors {
  return createUpstreamBehaviors(new UpstreamService(Logger.silent()));
}
