export const SERVICE_CRITICALITIES = ["low", "medium", "high", "critical"] as const;
export type ServiceCriticality = (typeof SERVICE_CRITICALITIES)[number];

export interface ServiceNode {
  readonly name: string;
  readonly criticality: ServiceCriticality;
  /** Names of services this one calls. Edges are references, never embedded nodes. */
  readonly dependencies: ReadonlySet<string>;
  readonly externalDependencies: ReadonlySet<string>;
  readonly owner?: string;
  readonly slaTarget?: string;
}

export interface TopologyServiceEntry {
  name: string;
  criticality: ServiceCriticality;
  dependencies: string[];
  externalDependencies?: string[];
  owner?: string;
  slaTarget?: string;
}

export interface TopologyDocument {
  services: TopologyServiceEntry[];
}

export interface TopologyView {
  version: number;
  loadedAt: number;
  services: TopologyServiceEntry[];
}

export interface NeighborsResponse {
  service: string;
  hops: number;
  version: number;
  neighbors: string[];
}
