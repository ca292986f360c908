import type { DependencyRecord, PackageName } from '../../types/index.js';
import { sortNames } from '../../utils/package-name.js';

/**
 * Mutable mapping from package name to its live dependency set.
 *
 * Each detection pass owns one graph: the virtual resolver adds edges, the
 * reducer removes edges and nodes, the enumerator only reads.
 */
export class DependencyGraph {
  private readonly edges = new Map<PackageName, Set<PackageName>>();

  constructor(entries: Iterable<readonly [PackageName, Iterable<PackageName>]> = []) {
    for (const [name, deps] of entries) {
      this.edges.set(name, new Set(deps));
    }
  }

  static fromRecords(records: Iterable<DependencyRecord>): DependencyGraph {
    const graph = new DependencyGraph();
    for (const record of records) {
      graph.edges.set(record.name, new Set(record.dependencies));
    }
    return graph;
  }

  get size(): number {
    return this.edges.size;
  }

  has(name: PackageName): boolean {
    return this.edges.has(name);
  }

  dependenciesOf(name: PackageName): ReadonlySet<PackageName> | undefined {
    return this.edges.get(name);
  }

  /**
   * Add an edge from an existing node. Returns false when the edge was
   * already present or `from` is not a node.
   */
  addDependency(from: PackageName, to: PackageName): boolean {
    const deps = this.edges.get(from);
    if (!deps || deps.has(to)) {
      return false;
    }
    deps.add(to);
    return true;
  }

  removeDependency(from: PackageName, to: PackageName): boolean {
    return this.edges.get(from)?.delete(to) ?? false;
  }

  removeNode(name: PackageName): boolean {
    return this.edges.delete(name);
  }

  /** Node names in sorted order */
  nodes(): PackageName[] {
    return sortNames(this.edges.keys());
  }

  /** Sorted plain-object view, for assertions and JSON output */
  toObject(): Record<PackageName, PackageName[]> {
    const result: Record<PackageName, PackageName[]> = {};
    for (const name of this.nodes()) {
      result[name] = sortNames(this.edges.get(name) ?? []);
    }
    return result;
  }
}
