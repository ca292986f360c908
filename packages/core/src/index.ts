/**
 * @automark/core - circular-dependency detection for automatic/manual marks
 *
 * Turns package metadata text into a dependency graph, strips every package
 * whose dependency chain ends without a cycle, and groups what remains.
 * This package has ZERO terminal/UI dependencies; all user-facing output
 * goes through the OutputPort interface.
 */

// ============================================================================
// Port Interfaces
// ============================================================================

export type { OutputPort } from './core/ports/output.js';
export { consoleOutput } from './core/ports/console-output.js';

// ============================================================================
// Detection Engine
// ============================================================================

export { RecordParser, parsePackageRecords, parseFieldValue } from './core/cycles/record-parser.js';
export { DependencyGraph } from './core/cycles/dependency-graph.js';
export { resolveVirtualPackages } from './core/cycles/virtual-resolver.js';
export { reduceAcyclic } from './core/cycles/acyclic-reducer.js';
export { enumerateCycles, formatCycleLabel } from './core/cycles/cycle-enumerator.js';
export {
  detectCircularDependencies,
  analyzeDependencyGraph,
  type DetectionOptions,
} from './core/cycles/detection-pipeline.js';
export {
  verifyCycleConsistency,
  findInconsistentNodes,
  parsePackageList,
} from './core/cycles/consistency-check.js';

// ============================================================================
// Reporting
// ============================================================================

export {
  renderDetectionReport,
  toDetectionJson,
  formatAcyclicNames,
  buildStatusEntries,
  type ReportOptions,
  type DetectionJson,
} from './core/report/result-reporter.js';
export { formatColumns, formatStatusTable } from './utils/formatters.js';

// ============================================================================
// Configuration, Errors, Logging
// ============================================================================

export { loadAutomarkConfig, getDefaultConfig, findConfigFile, type LoadConfigOptions } from './core/config.js';
export {
  FileSystemError,
  ValidationError,
  ConfigError,
  CycleInconsistencyError,
  handleError,
} from './utils/errors.js';
export { ConsoleLogger, logger, parseLogLevel, resolveLogLevel } from './utils/logger.js';
export { exists, readTextFile, readStreamText } from './utils/fs.js';
export { compareNames, sortNames } from './utils/package-name.js';

export * from './types/index.js';
export * from './constants/index.js';
