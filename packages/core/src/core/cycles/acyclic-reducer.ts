import type { PackageName, ReductionResult } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { DependencyGraph } from './dependency-graph.js';

/**
 * Drop every edge whose target is no longer a node.
 * Targets are either virtual names or nodes removed by an earlier pass.
 */
function pruneDanglingEdges(graph: DependencyGraph): void {
  for (const name of graph.nodes()) {
    const deps = graph.dependenciesOf(name);
    if (!deps) continue;
    for (const target of [...deps]) {
      if (!graph.has(target)) {
        graph.removeDependency(name, target);
      }
    }
  }
}

/**
 * Strip the graph down to the nodes that lie on, or lead into, a cycle.
 *
 * Each pass prunes dangling edges, then removes every node left without
 * dependencies. Passes repeat until one removes nothing; the node count only
 * shrinks, so there are at most N + 1 passes. The graph is mutated in place.
 *
 * On return every remaining node has a non-empty dependency set whose
 * targets are all remaining nodes.
 */
export function reduceAcyclic(graph: DependencyGraph): ReductionResult {
  const passes: PackageName[][] = [];

  for (;;) {
    pruneDanglingEdges(graph);

    const emptied = graph.nodes().filter((name) => graph.dependenciesOf(name)?.size === 0);
    if (emptied.length === 0) {
      break;
    }

    for (const name of emptied) {
      graph.removeNode(name);
    }
    passes.push(emptied);
    logger.debug(`Reduction pass ${passes.length} removed ${emptied.length} package(s)`, { removed: emptied });
  }

  return {
    acyclic: passes.flat(),
    passes
  };
}
