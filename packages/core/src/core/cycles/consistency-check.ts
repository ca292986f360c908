import type { PackageName } from '../../types/index.js';
import { CycleInconsistencyError } from '../../utils/errors.js';
import { sortNames } from '../../utils/package-name.js';

/**
 * Residual packages that an independent re-check does not list as pending
 * removal. Every cyclic package should still be pending; anything returned
 * here means detection and the package database disagree.
 */
export function findInconsistentNodes(
  residual: Iterable<PackageName>,
  pendingRemovals: Iterable<PackageName>
): PackageName[] {
  const pending = new Set(pendingRemovals);
  return sortNames([...new Set(residual)].filter((name) => !pending.has(name)));
}

/**
 * @throws CycleInconsistencyError listing every residual package that is not pending removal
 */
export function verifyCycleConsistency(
  residual: Iterable<PackageName>,
  pendingRemovals: Iterable<PackageName>
): void {
  const inconsistent = findInconsistentNodes(residual, pendingRemovals);
  if (inconsistent.length > 0) {
    throw new CycleInconsistencyError(inconsistent);
  }
}

/**
 * Parse a whitespace-separated package list. `#` starts a comment that runs
 * to the end of the line.
 */
export function parsePackageList(text: string): PackageName[] {
  const names: PackageName[] = [];
  for (const line of text.split(/\r?\n/)) {
    const content = line.replace(/#.*$/, '');
    for (const token of content.split(/\s+/)) {
      if (token.length > 0) {
        names.push(token);
      }
    }
  }
  return names;
}
