import { UnsupportedChainError } from '../errors';
import { RoutingOperation, RoutingContext, RoutingResult } from '../types';

export class ChainLookupOps implements RoutingOperation {
  name = 'ChainLookup';

  async execute(context: RoutingContext): Promise<RoutingResult> {
    const { request, registry } = context;
    const filteredUpstreams = registry.lookup(request.projectId, request.chainId);

    if (filteredUpstreams.length === 0) {
      return {
        filteredUpstreams,
        reason: `No upstream of ${request.projectId} serves chain ${request.chainId}`,
        shouldContinue: false,
        error: new UnsupportedChainError(request.projectId, request.chainId)
      };
    }

    return {
      filteredUpstreams,
      reason: `Found ${filteredUpstreams.length} upstreams for chain ${request.chainId}`,
      shouldContinue: true
    };
  }
}
