/**
 * Record Parser
 *
 * Turns `apt-cache show`-style metadata blocks into dependency records.
 *
 *   Package: foo
 *   Depends: libc6 (>= 2.36), bar | baz,
 *    qux
 *   Provides: foo-virtual
 *
 * Blocks are separated by blank lines. Continuation lines (leading
 * whitespace) extend the field they follow, joined with a comma. Unknown
 * labels and malformed lines are skipped without error.
 */

import { DEFAULT_DEPENDENCY_FIELDS, FIELD_LABELS } from '../../constants/index.js';
import type {
  DependencyRecord,
  PackageName,
  PackageRecords,
  RecordParserOptions
} from '../../types/index.js';

type ParserState = 'between-blocks' | 'in-block' | 'reading-field';

type FieldKind = 'dependency' | 'provides';

interface BlockDraft {
  name: PackageName;
  dependencyValues: string[];
  providesValues: string[];
}

const FIELD_LINE = /^([A-Za-z][A-Za-z0-9-]*):(.*)$/;
const CONTINUATION_LINE = /^\s+\S/;
const VERSION_CONSTRAINT = /\([^)]*\)/g;
const WHITESPACE = /\s+/g;
const TOKEN_SEPARATOR = /[,|]/;

/**
 * Split one logical field value into package names.
 * Parenthesized version constraints and all whitespace are removed; `,` and
 * `|` both separate independent names.
 */
export function parseFieldValue(value: string): PackageName[] {
  const cleaned = value.replace(VERSION_CONSTRAINT, '').replace(WHITESPACE, '');
  const seen = new Set<PackageName>();
  for (const token of cleaned.split(TOKEN_SEPARATOR)) {
    if (token.length > 0) {
      seen.add(token);
    }
  }
  return [...seen];
}

export class RecordParser {
  private readonly dependencyFields: ReadonlySet<string>;
  private readonly providesField: string;

  private state: ParserState = 'between-blocks';
  private block: BlockDraft | null = null;
  private currentField: FieldKind | null = null;
  private records: PackageRecords = new Map();

  constructor(options: RecordParserOptions = {}) {
    this.dependencyFields = new Set(options.dependencyFields ?? DEFAULT_DEPENDENCY_FIELDS);
    this.providesField = options.providesField ?? FIELD_LABELS.PROVIDES;
  }

  parse(text: string): PackageRecords {
    this.reset();

    for (const line of text.split(/\r?\n/)) {
      this.consumeLine(line);
    }
    this.flushBlock();

    const records = this.records;
    this.reset();
    return records;
  }

  private reset(): void {
    this.state = 'between-blocks';
    this.block = null;
    this.currentField = null;
    this.records = new Map();
  }

  private consumeLine(line: string): void {
    if (line.trim().length === 0) {
      this.flushBlock();
      return;
    }

    if (CONTINUATION_LINE.test(line)) {
      this.appendContinuation(line.trim());
      return;
    }

    const match = FIELD_LINE.exec(line);
    if (!match) {
      // Malformed line: ends whatever field was being read
      if (this.state === 'reading-field') {
        this.enterBlockState();
      }
      return;
    }

    const [, label, rawValue] = match;
    const value = rawValue.trim();

    if (label === FIELD_LABELS.PACKAGE) {
      this.startBlock(value);
      return;
    }

    if (this.state === 'between-blocks' || !this.block) {
      return;
    }

    const kind = this.classifyLabel(label);
    if (!kind) {
      this.enterBlockState();
      return;
    }

    this.currentField = kind;
    this.state = 'reading-field';
    this.fieldValues(this.block, kind).push(value);
  }

  private startBlock(name: string): void {
    this.flushBlock();
    this.block = { name, dependencyValues: [], providesValues: [] };
    this.enterBlockState();
  }

  private enterBlockState(): void {
    this.state = 'in-block';
    this.currentField = null;
  }

  private appendContinuation(content: string): void {
    if (this.state !== 'reading-field' || !this.block || !this.currentField) {
      return;
    }
    const values = this.fieldValues(this.block, this.currentField);
    values.push(content);
  }

  private classifyLabel(label: string): FieldKind | null {
    if (this.dependencyFields.has(label)) return 'dependency';
    if (label === this.providesField) return 'provides';
    return null;
  }

  private fieldValues(block: BlockDraft, kind: FieldKind): string[] {
    return kind === 'dependency' ? block.dependencyValues : block.providesValues;
  }

  private flushBlock(): void {
    const block = this.block;
    this.block = null;
    this.state = 'between-blocks';
    this.currentField = null;

    if (!block || block.name.length === 0) {
      return;
    }

    const dependencies = parseFieldValue(block.dependencyValues.join(','));
    const providedNames = parseFieldValue(block.providesValues.join(','));
    if (dependencies.length === 0 && providedNames.length === 0) {
      return;
    }

    const existing = this.records.get(block.name);
    if (existing) {
      for (const dep of dependencies) existing.dependencies.add(dep);
      for (const provided of providedNames) {
        if (!existing.providedNames.includes(provided)) {
          existing.providedNames.push(provided);
        }
      }
      return;
    }

    const record: DependencyRecord = {
      name: block.name,
      dependencies: new Set(dependencies),
      providedNames
    };
    this.records.set(block.name, record);
  }
}

/**
 * Parse metadata text into records keyed by package name, in order of first
 * appearance. Empty input yields an empty map.
 */
export function parsePackageRecords(text: string, options?: RecordParserOptions): PackageRecords {
  return new RecordParser(options).parse(text);
}
