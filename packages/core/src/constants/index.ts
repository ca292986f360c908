/**
 * Shared constants for automark
 * Single source of truth for field labels, file names and display defaults.
 */

export const FIELD_LABELS = {
  PACKAGE: 'Package',
  PRE_DEPENDS: 'PreDepends',
  PRE_DEPENDS_HYPHENATED: 'Pre-Depends',
  DEPENDS: 'Depends',
  RECOMMENDS: 'Recommends',
  PROVIDES: 'Provides'
} as const;

/**
 * Dependency-kind fields whose targets are unioned into one dependency set.
 * `Pre-Depends` is the spelling dpkg itself emits.
 */
export const DEFAULT_DEPENDENCY_FIELDS: readonly string[] = [
  FIELD_LABELS.PRE_DEPENDS,
  FIELD_LABELS.PRE_DEPENDS_HYPHENATED,
  FIELD_LABELS.DEPENDS,
  FIELD_LABELS.RECOMMENDS
];

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'automark.jsonc',
  CONFIG_JSON: 'automark.json'
} as const;

export const CONFIG_FILE_NAMES: readonly string[] = [
  FILE_PATTERNS.CONFIG_JSONC,
  FILE_PATTERNS.CONFIG_JSON
];

export const DISPLAY = {
  DEFAULT_COLUMNS: 80,
  INDENT: '  ',
  COLUMN_GAP: 2,
  GROUP_SEPARATOR: ', '
} as const;

export const OUTPUT_FORMATS = ['text', 'json', 'names'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];
