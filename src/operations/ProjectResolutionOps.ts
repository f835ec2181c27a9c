import { UnknownProjectError } from '../errors';
import { RoutingOperation, RoutingContext, RoutingResult } from '../types';

export class ProjectResolutionOps implements RoutingOperation {
  name = 'ProjectResolution';

  async execute(context: RoutingContext): Promise<RoutingResult> {
    const { request, registry, availableUpstreams } = context;

    if (!registry.exists(request.projectId)) {
      return {
        filteredUpstreams: [],
        reason: `Project ${request.projectId} is not configured`,
        shouldContinue: false,
        error: new UnknownProjectError(request.projectId)
      };
    }

    return {
      filteredUpstreams: availableUpstreams,
      reason: `Project ${request.projectId} resolved`,
      shouldContinue: true
    };
  }
}
