/**
 * Cluster reference as reported by the cluster registry.
 */
export interface ClusterRef {
  readonly id: string;
  readonly name: string;
  readonly project: string;
  readonly status: string;
}
