/**
 * Tests for the process-level error wrapper around command actions.
 * process.exit and console.error are replaced for the duration of each test.
 */

import { afterEach, beforeEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { withErrorHandling } from '../../packages/cli/src/utils/error-handling.js';
import { CycleInconsistencyError, ValidationError } from '../../packages/core/src/utils/errors.js';
import { logger } from '../../packages/core/src/utils/logger.js';
import { LogLevel } from '../../packages/core/src/types/index.js';

class ExitCalled extends Error {
  public readonly code: string | number | null | undefined;

  constructor(code: string | number | null | undefined) {
    super(`exit ${String(code)}`);
    this.code = code;
  }
}

function exitedWith(code: number) {
  return (error: unknown): boolean => error instanceof ExitCalled && error.code === code;
}

describe('withErrorHandling', () => {
  let stderr: string[];
  let previousLevel: LogLevel;

  beforeEach(() => {
    stderr = [];
    previousLevel = logger.getLevel();
    logger.setLevel(LogLevel.ERROR);
    mock.method(console, 'error', (...data: unknown[]): void => {
      stderr.push(data.map(String).join(' '));
    });
    mock.method(process, 'exit', (code?: string | number | null): never => {
      throw new ExitCalled(code);
    });
  });

  afterEach(() => {
    mock.restoreAll();
    logger.setLevel(previousLevel);
  });

  it('passes through when the action succeeds', async () => {
    let ran = false;
    const action = withErrorHandling(async (name: string) => {
      ran = name === 'cycles';
    });

    await action('cycles');

    assert.equal(ran, true);
    assert.deepEqual(stderr, []);
  });

  it('exits with status 1 on a cycle inconsistency', async () => {
    const action = withErrorHandling(async () => {
      throw new CycleInconsistencyError(['a', 'c']);
    });

    await assert.rejects(action(), exitedWith(1));

    assert.equal(stderr.length, 2);
    assert.match(stderr[0] ?? '', /\[ERROR\] Fatal inconsistency in cycle detection/);
    assert.equal(stderr[1], 'Inconsistent cycle detection: a, c reported as cyclic but not pending removal');
  });

  it('prints the message of other errors and exits with status 1', async () => {
    const action = withErrorHandling(async () => {
      throw new ValidationError('bad width');
    });

    await assert.rejects(action(), exitedWith(1));

    assert.deepEqual(stderr, ['Validation error: bad width']);
  });

  it('prints a generic message for non-Error values', async () => {
    const action = withErrorHandling(async () => {
      throw 'not an error';
    });

    await assert.rejects(action(), exitedWith(1));

    assert.deepEqual(stderr, ['An unknown error occurred']);
  });
});
