import { DISPLAY } from '../constants/index.js';
import type { PackageStatusEntry } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Lay names out row-major in equal-width columns, the way apt lists
 * packages.
 *
 * Column width is the longest name plus a two-space gap; as many columns as
 * fit in `width` after the indent, never fewer than one. The last name on a
 * line is not padded.
 *
 * @example
 * formatColumns(['a', 'bb', 'ccc'], 12) // => ['  a    bb', '  ccc']
 */
export function formatColumns(names: readonly string[], width: number = DISPLAY.DEFAULT_COLUMNS): string[] {
  if (names.length === 0) {
    return [];
  }

  const longest = Math.max(...names.map((name) => name.length));
  const columnWidth = longest + DISPLAY.COLUMN_GAP;
  const perLine = Math.max(1, Math.floor((width - DISPLAY.INDENT.length) / columnWidth));

  const lines: string[] = [];
  for (let i = 0; i < names.length; i += perLine) {
    const row = names.slice(i, i + perLine);
    const cells = row.map((name, index) => (index < row.length - 1 ? name.padEnd(columnWidth) : name));
    lines.push(DISPLAY.INDENT + cells.join(''));
  }
  return lines;
}

/**
 * One line per package: the name padded to the longest name plus the column
 * gap, followed by its status.
 */
export function formatStatusTable(entries: readonly PackageStatusEntry[]): string[] {
  if (entries.length === 0) {
    return [];
  }

  const nameWidth = Math.max(...entries.map((entry) => entry.name.length)) + DISPLAY.COLUMN_GAP;
  return entries.map((entry) => entry.name.padEnd(nameWidth) + entry.status);
}

export function pluralize(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
