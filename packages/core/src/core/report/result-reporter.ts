/**
 * Result Reporter
 *
 * Formatting boundary between the detection result and whatever renders it.
 * Computes nothing beyond layout.
 */

import { DISPLAY } from '../../constants/index.js';
import type { CycleGroup, DetectionResult, PackageName, PackageStatusEntry } from '../../types/index.js';
import { formatColumns, formatStatusTable, pluralize } from '../../utils/formatters.js';
import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';

export interface ReportOptions {
  /** Terminal width used for column layout */
  width?: number;
  /** Append the per-package status table */
  showStatus?: boolean;
}

export interface DetectionJson {
  acyclic: PackageName[];
  cycles: string[];
  cycleGroups: CycleGroup[];
  residual: PackageName[];
  nodes: PackageStatusEntry[];
  passes: PackageName[][];
  stats: {
    records: number;
    virtualEdges: number;
  };
}

export function buildStatusEntries(result: DetectionResult): PackageStatusEntry[] {
  const residual = new Set(result.residual);
  return result.nodes.map((name): PackageStatusEntry => ({
    name,
    status: residual.has(name) ? 'cyclic' : 'acyclic'
  }));
}

/** One acyclic name per line, for an external `mark auto` step */
export function formatAcyclicNames(result: DetectionResult): string {
  return result.acyclic.join('\n');
}

export function toDetectionJson(result: DetectionResult): DetectionJson {
  return {
    acyclic: [...result.acyclic],
    cycles: result.cycles.map((group) => group.label),
    cycleGroups: result.cycles.map((group) => ({ members: [...group.members], label: group.label })),
    residual: [...result.residual],
    nodes: buildStatusEntries(result),
    passes: result.passes.map((pass) => [...pass]),
    stats: {
      records: result.recordCount,
      virtualEdges: result.virtualEdges
    }
  };
}

export function renderDetectionReport(
  result: DetectionResult,
  output: OutputPort = consoleOutput,
  options: ReportOptions = {}
): void {
  const width = options.width ?? DISPLAY.DEFAULT_COLUMNS;

  if (result.acyclic.length > 0) {
    output.step(`${pluralize(result.acyclic.length, 'package')} can be marked as automatically installed:`);
    output.message(formatColumns(result.acyclic, width).join('\n'));
  }

  if (result.cycles.length > 0) {
    output.warn(
      `${pluralize(result.cycles.length, 'circular dependency group')} keep ${pluralize(result.residual.length, 'package')} installed:`
    );
    output.message(result.cycles.map((group) => DISPLAY.INDENT + group.label).join('\n'));
  } else {
    output.success('No circular dependencies found.');
  }

  if (options.showStatus && result.nodes.length > 0) {
    output.note(formatStatusTable(buildStatusEntries(result)).join('\n'), 'Package status');
  }
}
