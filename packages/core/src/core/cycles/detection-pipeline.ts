/**
 * Detection Pipeline
 *
 * RecordParser → VirtualResolver → AcyclicReducer → CycleEnumerator.
 * Synchronous and side-effect free apart from debug logging.
 */

import type {
  DependencyRecord,
  DetectionResult,
  RecordParserOptions
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { sortNames } from '../../utils/package-name.js';
import { reduceAcyclic } from './acyclic-reducer.js';
import { enumerateCycles } from './cycle-enumerator.js';
import { DependencyGraph } from './dependency-graph.js';
import { parsePackageRecords } from './record-parser.js';
import { resolveVirtualPackages } from './virtual-resolver.js';

export type DetectionOptions = RecordParserOptions;

/**
 * Run virtual resolution, reduction and enumeration on an existing graph.
 * The graph is left holding only the residual (cyclic) nodes.
 */
export function analyzeDependencyGraph(
  graph: DependencyGraph,
  records: Iterable<DependencyRecord> = []
): DetectionResult {
  const recordList = [...records];
  const virtualEdges = resolveVirtualPackages(graph, recordList);
  const { acyclic, passes } = reduceAcyclic(graph);
  const residual = graph.nodes();
  const cycles = enumerateCycles(graph);

  logger.debug('Cycle detection finished', {
    records: recordList.length,
    virtualEdges,
    passes: passes.length,
    acyclic: acyclic.length,
    residual: residual.length,
    cycles: cycles.length
  });

  return {
    recordCount: recordList.length,
    virtualEdges,
    passes,
    acyclic: sortNames(acyclic),
    residual,
    cycles,
    nodes: sortNames([...acyclic, ...residual])
  };
}

/**
 * Detect circular dependencies among the packages described by `text`.
 */
export function detectCircularDependencies(text: string, options?: DetectionOptions): DetectionResult {
  const records = parsePackageRecords(text, options);
  const graph = DependencyGraph.fromRecords(records.values());
  return analyzeDependencyGraph(graph, records.values());
}
