/**
 * Cluster registry port and its in-process stand-in.
 *
 * The registry is the source of truth for which clusters exist and who
 * can see them. Receivers only ask one question of it: does this cluster
 * exist for this requester?
 */

import type { ClusterRef, RequesterIdentity } from "@clusterhook/types";
import { isOperator } from "@clusterhook/types";

export interface ClusterRegistry {
  /**
   * @returns the cluster if it exists and is visible to `requester`
   */
  find(clusterId: string, requester: RequesterIdentity): Promise<ClusterRef | undefined>;
}

/**
 * Clusters are visible to their own project, and to operators.
 */
export class InMemoryClusterRegistry implements ClusterRegistry {
  private readonly _clusters = new Map<string, ClusterRef>();

  constructor(clusters: readonly ClusterRef[] = []) {
    for (const cluster of clusters) {
      this._clusters.set(cluster.id, cluster);
    }
  }

  async find(
    clusterId: string,
    requester: RequesterIdentity,
  ): Promise<ClusterRef | undefined> {
    const cluster = this._clusters.get(clusterId);
    if (cluster === undefined) {
      return undefined;
    }
    if (cluster.project !== requester.project && !isOperator(requester)) {
      return undefined;
    }
    return cluster;
  }

  add(cluster: ClusterRef): void {
    this._clusters.set(cluster.id, cluster);
  }

  remove(clusterId: string): boolean {
    return this._clusters.delete(clusterId);
  }

  has(clusterId: string): boolean {
    return this._clusters.has(clusterId);
  }
}
