import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { logger } from '@automark/core';

const CLI_PACKAGE_NAME = '@automark/cli';

/**
 * Version of the CLI package, found by walking up from this file to the
 * package.json that names the CLI. Works from src/ and from dist/.
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));

  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      try {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (
          typeof parsed === 'object' && parsed !== null &&
          'name' in parsed && parsed.name === CLI_PACKAGE_NAME &&
          'version' in parsed && typeof parsed.version === 'string'
        ) {
          return parsed.version;
        }
      } catch (error) {
        logger.debug(`Failed to read ${candidate}`, { error });
      }
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return '0.0.0';
}
