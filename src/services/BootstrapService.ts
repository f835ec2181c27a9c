import { BootstrapError, ChainResolutionError, UpstreamFailure, errorMessage } from '../errors';
import {
  ProjectConfig,
  ResolutionOutcome,
  ResolvedUpstream,
  RoutingIndex,
  UpstreamDescriptor
} from '../types';
import { Logger } from './Logger';
import { UpstreamBehaviors } from './UpstreamKinds';
import { UpstreamRegistry } from './UpstreamRegistry';

export interface BootstrapOptions {
  probeTimeoutMs: number;
  probeRetries: number;
}

export type BootstrapResult =
  | { success: true; index: RoutingIndex; registry: UpstreamRegistry }
  | { success: false; error: BootstrapError };

type Slot =
  | { descriptor: UpstreamDescriptor; outcome: ResolutionOutcome }
  | undefined;

export function describeUpstreams(projects: readonly ProjectConfig[]): UpstreamDescriptor[] {
  return projects.flatMap(project =>
    project.upstreams.map((upstream, position) => ({
      projectId: project.id,
      id: upstream.id,
      type: upstream.type,
      endpoint: upstream.endpoint,
      metadata: Object.freeze({ ...upstream.metadata }),
      position
    }))
  );
}

/**
 * Groups resolved upstreams into (project, chain) buckets. Input order is
 * preserved inside every bucket, so callers pass upstreams in configuration
 * order.
 */
export function buildRoutingIndex(upstreams: readonly ResolvedUpstream[]): RoutingIndex {
  const index = new Map<string, Map<number, ResolvedUpstream[]>>();

  for (const upstream of upstreams) {
    let chains = index.get(upstream.projectId);
    if (!chains) {
      chains = new Map();
      index.set(upstream.projectId, chains);
    }
    const bucket = chains.get(upstream.resolvedChainId);
    if (bucket) {
      bucket.push(upstream);
    } else {
      chains.set(upstream.resolvedChainId, [upstream]);
    }
  }

  for (const chains of index.values()) {
    for (const bucket of chains.values()) {
      Object.freeze(bucket);
    }
  }

  return index;
}

/**
 * One-shot startup phase: resolves the chain identity of every configured
 * upstream concurrently and publishes a complete registry, or fails as a
 * whole if any single upstream cannot be resolved.
 */
export class BootstrapService {
  constructor(
    private behaviors: UpstreamBehaviors,
    private logger: Logger,
    private options: BootstrapOptions
  ) {}

  async bootstrap(projects: readonly ProjectConfig[]): Promise<BootstrapResult> {
    const descriptors = describeUpstreams(projects);
    this.logger.logBootstrapStart(projects.length, descriptors.length);

    // Results land in the slot of the upstream's configuration position, not in completion order
    const slots: Slot[] = new Array<Slot>(descriptors.length);
    await Promise.all(
      descriptors.map(async (descriptor, slot) => {
        slots[slot] = { descriptor, outcome: await this.resolveWithRetries(descriptor) };
      })
    );

    const resolved: ResolvedUpstream[] = [];
    const failures: UpstreamFailure[] = [];

    for (const entry of slots) {
      if (!entry) continue;
      const { descriptor, outcome } = entry;
      if (outcome.success) {
        this.logger.logChainResolved(descriptor.projectId, descriptor.id, outcome.chainId, outcome.probed);
        resolved.push(Object.freeze({ ...descriptor, resolvedChainId: outcome.chainId }));
      } else {
        this.logger.logChainResolutionFailure(descriptor.projectId, descriptor.id, outcome.error);
        failures.push({ projectId: descriptor.projectId, upstreamId: descriptor.id, error: outcome.error });
      }
    }

    const [firstFailure, ...otherFailures] = failures;
    if (firstFailure) {
      return { success: false, error: new BootstrapError([firstFailure, ...otherFailures]) };
    }

    const index = buildRoutingIndex(resolved);
    const registry = new UpstreamRegistry(index, projects.map(project => project.id));
    this.logger.info(`✅ Bootstrap complete: ${resolved.length} upstreams across ${projects.length} projects`);
    return { success: true, index, registry };
  }

  private async resolveWithRetries(descriptor: UpstreamDescriptor): Promise<ResolutionOutcome> {
    let outcome = await this.resolveOnce(descriptor);
    for (let attempt = 1; !outcome.success && attempt <= this.options.probeRetries; attempt++) {
      this.logger.warn(`Retrying chain id resolution for ${descriptor.projectId}/${descriptor.id} (attempt ${attempt + 1})`);
      outcome = await this.resolveOnce(descriptor);
    }
    return outcome;
  }

  private async resolveOnce(descriptor: UpstreamDescriptor): Promise<ResolutionOutcome> {
    const behavior = this.behaviors[descriptor.type];
    try {
      return await behavior.resolveIdentity(descriptor, { timeoutMs: this.options.probeTimeoutMs });
    } catch (error) {
      return { success: false, error: new ChainResolutionError(descriptor.endpoint, 'resolveIdentity', 'exception', errorMessage(error), error) };
    }
  }
}
