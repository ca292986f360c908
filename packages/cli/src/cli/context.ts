/**
 * CLI Output Factory
 *
 * Picks the OutputPort for a command run. Rich (Clack) output is only used
 * for text reports in an interactive terminal; machine-readable formats and
 * CI always get plain console output so stdout stays parseable.
 */

import { consoleOutput, type OutputFormat, type OutputPort } from '@automark/core';
import { createClackOutput } from './clack-output-adapter.js';

export type OutputMode = 'rich' | 'plain';

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(): boolean {
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

export function resolveOutputMode(format: OutputFormat, interactive: boolean = detectInteractive()): OutputMode {
  return format === 'text' && interactive ? 'rich' : 'plain';
}

export function createCliOutput(mode: OutputMode): OutputPort {
  if (mode === 'rich') {
    return cachedClackOutput ??= createClackOutput();
  }
  return consoleOutput;
}

/** Terminal width when stdout is a TTY */
export function detectTerminalColumns(): number | undefined {
  const columns = process.stdout.columns;
  return typeof columns === 'number' && columns > 0 ? columns : undefined;
}
