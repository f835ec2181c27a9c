import { RoutingOperation, RoutingContext, RoutingResult } from '../types';

/**
 * Picks the upstream that was listed first in the project's configuration.
 * Buckets are built in configuration order, so that is the head of the
 * candidate list. Leaves the selection empty when nothing is left to pick;
 * the router reports that as an unsupported chain.
 */
export class FinalSelectorOps implements RoutingOperation {
  name = 'FinalSelector';

  async execute(context: RoutingContext): Promise<RoutingResult> {
    const candidates = context.availableUpstreams;

    if (candidates.length === 0) {
      return {
        filteredUpstreams: candidates,
        reason: 'nothing left to select',
        shouldContinue: false
      };
    }

    const [head] = candidates;
    return {
      filteredUpstreams: candidates,
      selectedUpstream: head,
      reason: `selected ${head.id} (configuration position ${head.position}) of ${candidates.length}`,
      shouldContinue: true
    };
  }
}
