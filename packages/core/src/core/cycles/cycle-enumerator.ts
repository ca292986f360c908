import { DISPLAY } from '../../constants/index.js';
import type { CycleGroup, PackageName } from '../../types/index.js';
import { compareNames, sortNames } from '../../utils/package-name.js';
import type { DependencyGraph } from './dependency-graph.js';

export function formatCycleLabel(members: readonly PackageName[]): string {
  return members.join(DISPLAY.GROUP_SEPARATOR);
}

/**
 * Collect every node reachable from `start` that no earlier group claimed.
 * Iterative depth-first walk; `visited` is shared across groups.
 */
function collectReachable(
  graph: DependencyGraph,
  start: PackageName,
  visited: Set<PackageName>
): PackageName[] {
  const members: PackageName[] = [];
  const stack: PackageName[] = [start];
  visited.add(start);

  let current: PackageName | undefined;
  while ((current = stack.pop()) !== undefined) {
    members.push(current);

    // Reverse so the smallest name is popped first
    const targets = sortNames(graph.dependenciesOf(current) ?? []).reverse();
    for (const target of targets) {
      if (graph.has(target) && !visited.has(target)) {
        visited.add(target);
        stack.push(target);
      }
    }
  }

  return members;
}

/**
 * Partition the residual graph into groups of nodes reachable from one
 * another. Start nodes are taken in sorted order and every node is claimed
 * by the first traversal that reaches it, so two cycles joined through a
 * shared node come out as a single group.
 *
 * Groups are sorted by their label.
 */
export function enumerateCycles(graph: DependencyGraph): CycleGroup[] {
  const visited = new Set<PackageName>();
  const groups: CycleGroup[] = [];

  for (const start of graph.nodes()) {
    if (visited.has(start)) continue;

    const members = sortNames(collectReachable(graph, start, visited));
    groups.push({ members, label: formatCycleLabel(members) });
  }

  return groups.sort((a, b) => compareNames(a.label, b.label));
}
