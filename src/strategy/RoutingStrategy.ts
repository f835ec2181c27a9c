import { RoutingError, UnsupportedChainError, UpstreamRpcError, UpstreamUnreachableError } from '../errors';
import {
  RequestContext,
  RequestStage,
  ResolvedUpstream,
  RouteOutcome,
  RoutingContext,
  RoutingOperation
} from '../types';
import { Logger } from '../services/Logger';
import { UpstreamBehaviors } from '../services/UpstreamKinds';
import { UpstreamRegistry } from '../services/UpstreamRegistry';
import { CallResult } from '../services/UpstreamService';
import { ProjectResolutionOps } from '../operations/ProjectResolutionOps';
import { ChainLookupOps } from '../operations/ChainLookupOps';
import { FinalSelectorOps } from '../operations/FinalSelectorOps';

export interface RouterOptions {
  defaultResponseTimeoutMs: number;
  projectResponseTimeouts?: ReadonlyMap<string, number>;
}

export interface RouteOptions {
  signal?: AbortSignal;
}

export type NormalizedResponse =
  | { success: true; result: unknown }
  | { success: false; error: UpstreamRpcError | UpstreamUnreachableError };

/**
 * Reduces an upstream reply to what the client receives: the bare `result`
 * value, or the matching routing error.
 */
export function normalizeResponse(upstreamId: string, response: CallResult): NormalizedResponse {
  if (!response.success) {
    return {
      success: false,
      error: new UpstreamUnreachableError(upstreamId, response.failure.reason, response.failure.message)
    };
  }

  const { error, result } = response.envelope;
  if (error) {
    return { success: false, error: new UpstreamRpcError(upstreamId, error) };
  }

  if (result === undefined) {
    return {
      success: false,
      error: new UpstreamUnreachableError(upstreamId, 'invalid-envelope', 'response has neither result nor error')
    };
  }

  return { success: true, result };
}

export function createDefaultOperations(): RoutingOperation[] {
  return [
    new ProjectResolutionOps(), // 1. Unknown project -> UnknownProject
    new ChainLookupOps(), // 2. (project, chain) bucket -> UnsupportedChain when absent
    new FinalSelectorOps() // 3. First upstream in configuration order
  ];
}

export class DefaultRoutingStrategy {
  private operations: RoutingOperation[] = createDefaultOperations();

  constructor(
    private registry: UpstreamRegistry,
    private behaviors: UpstreamBehaviors,
    private logger: Logger,
    private options: RouterOptions
  ) {}

  registerPipe(operations: RoutingOperation[]): void {
    this.operations = operations;
  }

  getRegistry(): UpstreamRegistry {
    return this.registry;
  }

  async route(request: RequestContext, routeOptions: RouteOptions = {}): Promise<RouteOutcome> {
    const selection = await this.select(request);
    if (!selection.success) {
      return selection;
    }

    const upstream = selection.upstream;
    const timeoutMs = this.options.projectResponseTimeouts?.get(request.projectId) ?? this.options.defaultResponseTimeoutMs;
    const response = await this.behaviors[upstream.type].forward(upstream, request.rpcMethod, request.rpcParams, {
      timeoutMs,
      signal: routeOptions.signal
    });

    const normalized = normalizeResponse(upstream.id, response);
    if (!normalized.success) {
      this.logger.logRequestFailure(upstream.id, normalized.error.message);
      const stage: RequestStage = response.success ? 'Forwarded' : 'UpstreamSelected';
      return { success: false, error: normalized.error, upstreamId: upstream.id, stage };
    }

    this.logger.debug(`${request.projectId}/${request.chainId} ${request.rpcMethod} served by ${upstream.id} in ${response.responseTime}ms`);
    return { success: true, result: normalized.result, upstreamId: upstream.id, stage: 'Completed' };
  }

  private async select(
    request: RequestContext
  ): Promise<{ success: true; upstream: ResolvedUpstream } | { success: false; error: RoutingError; stage: RequestStage }> {
    const context: RoutingContext = {
      request,
      registry: this.registry,
      availableUpstreams: []
    };
    let stage: RequestStage = 'Received';

    // Execute operations in pipeline as filters
    for (const operation of this.operations) {
      const result = await operation.execute(context);

      if (result.error) {
        this.logger.logRoutingStop(operation.name, result.reason);
        return { success: false, error: result.error, stage };
      }
      this.logger.logRoutingDecision(operation.name, result.reason);

      if (stage === 'Received') {
        stage = 'ProjectResolved';
      }
      context.availableUpstreams = result.filteredUpstreams;

      if (result.selectedUpstream) {
        context.selectedUpstream = result.selectedUpstream;
        break;
      }

      if (!result.shouldContinue) {
        break;
      }
    }

    if (!context.selectedUpstream) {
      // Only reachable with a custom pipeline that filters everything out
      return { success: false, error: new UnsupportedChainError(request.projectId, request.chainId), stage };
    }

    return { success: true, upstream: context.selectedUpstream };
  }
}
