import type { PackageName } from '../types/index.js';

/**
 * Code-unit lexicographic comparison. Locale-independent so output order is
 * the same on every machine.
 */
export function compareNames(a: PackageName, b: PackageName): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortNames(names: Iterable<PackageName>): PackageName[] {
  return [...names].sort(compareNames);
}
