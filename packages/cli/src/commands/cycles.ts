/**
 * Cycles Command (CLI layer)
 *
 * Thin shell over the core detection pipeline.
 * Reads metadata text from a file or stdin, optionally cross-checks the
 * cyclic packages against a pending-removal list, and renders the result.
 */

import { resolve } from 'path';
import type { Command } from 'commander';

import {
  DISPLAY,
  FIELD_LABELS,
  OUTPUT_FORMATS,
  ValidationError,
  detectCircularDependencies,
  formatAcyclicNames,
  loadAutomarkConfig,
  parsePackageList,
  readStreamText,
  readTextFile,
  renderDetectionReport,
  toDetectionJson,
  verifyCycleConsistency,
  type AutomarkConfig,
  type CommandResult,
  type DetectionResult,
  type OutputFormat,
  type OutputPort,
} from '@automark/core';
import { createCliOutput, detectTerminalColumns, resolveOutputMode } from '../cli/context.js';

export interface CyclesOptions {
  format?: string;
  pending?: string;
  status?: boolean;
  /** False when --no-recommends is given */
  recommends?: boolean;
  width?: string;
  config?: string;
}

type GlobalOptions = {
  cwd?: string;
};

export interface CyclesRunInput {
  text: string;
  /** Contents of the --pending file, when given */
  pendingText?: string;
  config: AutomarkConfig;
  format: OutputFormat;
  includeRecommends: boolean;
  showStatus: boolean;
  width: number;
}

const STDIN_MARKER = '-';
export const EMPTY_INPUT_NOTICE = 'No package records with dependencies found in input.';

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

export function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined) {
    return 'text';
  }
  const match = OUTPUT_FORMATS.find((format) => format === value);
  if (!match) {
    throw new ValidationError(`Unknown format '${value}'. Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return match;
}

export function parseWidth(value: string): number {
  const width = Number(value);
  if (!Number.isInteger(width) || width <= 0) {
    throw new ValidationError(`--width must be a positive integer, got '${value}'`);
  }
  return width;
}

export function selectDependencyFields(config: AutomarkConfig, includeRecommends: boolean): string[] {
  return includeRecommends
    ? [...config.dependencyFields]
    : config.dependencyFields.filter((field) => field !== FIELD_LABELS.RECOMMENDS);
}

// ---------------------------------------------------------------------------
// Command body
// ---------------------------------------------------------------------------

/**
 * Detect, verify and render. Throws CycleInconsistencyError before printing
 * anything when the pending list disagrees with the detected cycles.
 */
export function runCyclesCommand(input: CyclesRunInput, output: OutputPort): CommandResult<DetectionResult> {
  const result = detectCircularDependencies(input.text, {
    dependencyFields: selectDependencyFields(input.config, input.includeRecommends),
    providesField: input.config.providesField,
  });

  if (input.pendingText !== undefined) {
    verifyCycleConsistency(result.residual, parsePackageList(input.pendingText));
  }

  switch (input.format) {
    case 'json':
      output.message(JSON.stringify(toDetectionJson(result), null, 2));
      break;

    case 'names':
      if (result.acyclic.length > 0) {
        output.message(formatAcyclicNames(result));
      }
      break;

    case 'text':
      if (result.recordCount === 0 && input.text.trim() !== '') {
        output.info(EMPTY_INPUT_NOTICE);
      }
      renderDetectionReport(result, output, { width: input.width, showStatus: input.showStatus });
      break;
  }

  return { success: true, data: result };
}

async function readInput(input: string | undefined, cwd: string): Promise<string> {
  if (input === undefined || input === STDIN_MARKER) {
    return readStreamText(process.stdin);
  }
  return readTextFile(resolve(cwd, input));
}

async function cyclesCommand(
  input: string | undefined,
  options: CyclesOptions,
  command: Command
): Promise<CommandResult<DetectionResult>> {
  const programOpts: GlobalOptions = command.parent?.opts<GlobalOptions>() ?? {};
  const cwd = resolve(programOpts.cwd ?? process.cwd());

  const format = parseOutputFormat(options.format);
  const explicitWidth = options.width !== undefined ? parseWidth(options.width) : undefined;

  const config = await loadAutomarkConfig({ cwd, configPath: options.config });
  const text = await readInput(input, cwd);
  const pendingText = options.pending !== undefined
    ? await readTextFile(resolve(cwd, options.pending))
    : undefined;

  const output = createCliOutput(resolveOutputMode(format));
  return runCyclesCommand(
    {
      text,
      pendingText,
      config,
      format,
      includeRecommends: options.recommends !== false,
      showStatus: options.status === true,
      width: explicitWidth ?? config.columns ?? detectTerminalColumns() ?? DISPLAY.DEFAULT_COLUMNS,
    },
    output
  );
}

export async function setupCyclesCommand(
  input: string | undefined,
  options: CyclesOptions,
  command: Command
): Promise<void> {
  const result = await cyclesCommand(input, options, command);
  if (!result.success) {
    throw new Error(result.error ?? 'Cycle detection failed');
  }
}
