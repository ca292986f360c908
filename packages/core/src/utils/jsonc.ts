/**
 * JSONC (JSON with Comments) file utilities
 * Handles reading and parsing JSONC files with comment support
 */

import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { readTextFile } from './fs.js';
import { logger } from './logger.js';

export interface JsoncParseResult {
  value: unknown;
  errors: string[];
}

/**
 * Parse JSONC content, collecting parse errors as readable strings
 * instead of letting jsonc-parser recover silently.
 */
export function parseJsonc(content: string): JsoncParseResult {
  const parseErrors: ParseError[] = [];
  const value: unknown = parse(content, parseErrors, { allowTrailingComma: true });
  const errors = parseErrors.map(
    (err) => `${printParseErrorCode(err.error)} at offset ${err.offset}`
  );
  return { value, errors };
}

/**
 * Read and parse a JSONC or JSON file from an absolute path.
 * Returns the parsed value together with any parse errors.
 * @param fullPath - Absolute path to the file
 */
export async function readJsoncFile(fullPath: string): Promise<JsoncParseResult> {
  const content = await readTextFile(fullPath);
  const result = parseJsonc(content);

  if (result.errors.length > 0) {
    logger.warn(`Failed to parse JSONC/JSON file ${fullPath}`, { errors: result.errors });
  }

  return result;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
