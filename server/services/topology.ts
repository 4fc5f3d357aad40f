import { promises as fs } from "fs";
import type {
  ServiceCriticality,
  ServiceNode,
  TopologyDocument,
  TopologyServiceEntry,
  TopologyView,
} from "@shared/topology";
import { TopologyValidationError, UnknownServiceError } from "./errors";
import { formatIssues, TopologyDocumentSchema } from "./schemas";

export interface TopologyReader {
  snapshot(): TopologySnapshot;
}

function freezeNode(entry: TopologyServiceEntry): ServiceNode {
  return Object.freeze({
    name: entry.name,
    criticality: entry.criticality,
    dependencies: new Set(entry.dependencies.filter((name) => name !== entry.name)),
    externalDependencies: new Set(entry.externalDependencies || []),
    owner: entry.owner,
    slaTarget: entry.slaTarget,
  });
}

/**
 * Immutable, versioned view of the service graph. Nodes hold dependency names only; the
 * reverse (dependent) index is derived once here.
 */
export class TopologySnapshot {
  readonly version: number;
  readonly loadedAt: number;
  private readonly nodes: ReadonlyMap<string, ServiceNode>;
  private readonly dependents: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(version: number, loadedAt: number, entries: readonly TopologyServiceEntry[]) {
    this.version = version;
    this.loadedAt = loadedAt;

    const nodes = new Map<string, ServiceNode>();
    for (const entry of entries) {
      nodes.set(entry.name, freezeNode(entry));
    }

    const dependents = new Map<string, Set<string>>();
    for (const node of nodes.values()) {
      for (const dependency of node.dependencies) {
        const callers = dependents.get(dependency) || new Set<string>();
        callers.add(node.name);
        dependents.set(dependency, callers);
      }
    }

    this.nodes = nodes;
    this.dependents = dependents;
  }

  static empty(): TopologySnapshot {
    return new TopologySnapshot(0, 0, []);
  }

  has(service: string): boolean {
    return this.nodes.has(service);
  }

  node(service: string): ServiceNode | undefined {
    return this.nodes.get(service);
  }

  services(): string[] {
    return Array.from(this.nodes.keys()).sort();
  }

  criticality(service: string): ServiceCriticality {
    const node = this.nodes.get(service);
    if (!node) throw new UnknownServiceError(service);
    return node.criticality;
  }

  private traverse(
    origin: string,
    hops: number,
    next: (service: string) => Iterable<string>,
  ): Set<string> {
    const visited = new Set<string>([origin]);
    let frontier = [origin];

    for (let depth = 0; depth < hops && frontier.length > 0; depth += 1) {
      const upcoming: string[] = [];
      for (const service of frontier) {
        for (const neighbor of next(service)) {
          if (visited.has(neighbor)) continue;
          visited.add(neighbor);
          upcoming.push(neighbor);
        }
      }
      frontier = upcoming;
    }

    visited.delete(origin);
    return visited;
  }

  /** Services within `hops` edges of `service`, following edges in both directions. */
  neighbors(service: string, hops: number): Set<string> {
    if (!this.nodes.has(service) && !this.dependents.has(service)) return new Set();

    return this.traverse(service, hops, (current) => [
      ...(this.nodes.get(current)?.dependencies || []),
      ...(this.dependents.get(current) || []),
    ]);
  }

  /** Downstream services only: what `service` calls, directly or transitively. */
  dependenciesOf(service: string, hops: number): Set<string> {
    return this.traverse(service, hops, (current) => this.nodes.get(current)?.dependencies || []);
  }

  toView(): TopologyView {
    return {
      version: this.version,
      loadedAt: this.loadedAt,
      services: Array.from(this.nodes.values())
        .map((node) => ({
          name: node.name,
          criticality: node.criticality,
          dependencies: Array.from(node.dependencies).sort(),
          externalDependencies: Array.from(node.externalDependencies).sort(),
          owner: node.owner,
          slaTarget: node.slaTarget,
        }))
        .sort((a, b) => a.name.localeCompare(b.name)),
    };
  }
}

export function parseTopologyDocument(input: unknown): TopologyDocument {
  const parsed = TopologyDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new TopologyValidationError(`Invalid topology document: ${issues.join("; ")}`, issues);
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const entry of parsed.data.services) {
    if (seen.has(entry.name)) duplicates.push(entry.name);
    seen.add(entry.name);
  }
  if (duplicates.length > 0) {
    throw new TopologyValidationError(
      `Duplicate service names in topology: ${duplicates.join(", ")}`,
      duplicates.map((name) => `services: duplicate ${name}`),
    );
  }

  return parsed.data;
}

interface TopologyModelOptions {
  now?: () => number;
}

/**
 * Process-wide topology holder. Readers take `snapshot()` once and keep it; `reload`
 * replaces the reference in a single assignment.
 */
export class TopologyModel implements TopologyReader {
  private current: TopologySnapshot = TopologySnapshot.empty();
  private readonly now: () => number;

  constructor(options: TopologyModelOptions = {}) {
    this.now = options.now || (() => Date.now());
  }

  snapshot(): TopologySnapshot {
    return this.current;
  }

  neighbors(service: string, hops: number): Set<string> {
    return this.current.neighbors(service, hops);
  }

  criticality(service: string): ServiceCriticality {
    return this.current.criticality(service);
  }

  reload(document: unknown): TopologySnapshot {
    const parsed = parseTopologyDocument(document);
    const next = new TopologySnapshot(this.current.version + 1, this.now(), parsed.services);
    this.current = next;
    console.log(
      `[topology] Loaded topology v${next.version} with ${parsed.services.length} service(s)`,
    );
    return next;
  }

  async loadFile(filePath: string): Promise<TopologySnapshot> {
    const raw = await fs.readFile(filePath, "utf8");
    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new TopologyValidationError(
        `Topology file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return this.reload(document);
  }
}
