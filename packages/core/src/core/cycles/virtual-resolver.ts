import type { DependencyRecord } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { DependencyGraph } from './dependency-graph.js';

/**
 * Point dependencies on virtual names at the concrete packages providing them.
 *
 * For every node P and every provider Q of a name v that P depends on, the
 * edge P → Q is added. The edge P → v stays; the reducer prunes it once it
 * finds that v is not a node. Membership is checked against each dependency
 * set as it was before this call, since provides are not chained.
 *
 * @returns number of edges added
 */
export function resolveVirtualPackages(
  graph: DependencyGraph,
  records: Iterable<DependencyRecord>
): number {
  const providers = [...records].filter((record) => record.providedNames.length > 0);
  if (providers.length === 0) {
    return 0;
  }

  let added = 0;
  for (const name of graph.nodes()) {
    const original = new Set(graph.dependenciesOf(name));

    for (const provider of providers) {
      const satisfies = provider.providedNames.some((virtualName) => original.has(virtualName));
      if (satisfies && graph.addDependency(name, provider.name)) {
        added++;
      }
    }
  }

  logger.debug(`Resolved virtual packages: ${added} provider edge(s) added`);
  return added;
}
