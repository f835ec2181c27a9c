import { ResolvedUpstream, RoutingIndex } from '../types';

export interface ProjectHealth {
  project: string;
  chains: Record<string, string[]>;
}

/**
 * Read-only view over a published RoutingIndex. Instances are never mutated;
 * a rebuild produces a new registry.
 */
export class UpstreamRegistry {
  private readonly projectIds: ReadonlySet<string>;

  constructor(private readonly index: RoutingIndex, projectIds: Iterable<string>) {
    this.projectIds = new Set(projectIds);
  }

  exists(projectId: string): boolean {
    return this.projectIds.has(projectId);
  }

  lookup(projectId: string, chainId: number): readonly ResolvedUpstream[] {
    return this.index.get(projectId)?.get(chainId) ?? [];
  }

  chainIds(projectId: string): number[] {
    const chains = this.index.get(projectId);
    return chains ? Array.from(chains.keys()).sort((a, b) => a - b) : [];
  }

  projects(): string[] {
    return Array.from(this.projectIds);
  }

  getHealthStatus(): ProjectHealth[] {
    return this.projects().map(project => {
      const chains: Record<string, string[]> = {};
      for (const chainId of this.chainIds(project)) {
        chains[String(chainId)] = this.lookup(project, chainId).map(upstream => upstream.id);
      }
      return { project, chains };
    });
  }
}
