import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ConfigError,
  CycleInconsistencyError,
  FileSystemError,
  handleError
} from '../../packages/core/src/utils/errors.js';
import { AutomarkError, ErrorCodes } from '../../packages/core/src/types/index.js';

describe('handleError', () => {
  it('maps an automark error to its message', () => {
    const error = new FileSystemError('cannot read metadata.txt', { path: 'metadata.txt' });

    assert.deepEqual(handleError(error), {
      success: false,
      error: 'File system error: cannot read metadata.txt'
    });
  });

  it('maps a plain Error to its message', () => {
    assert.deepEqual(handleError(new Error('boom')), { success: false, error: 'boom' });
  });

  it('maps anything else to a generic message', () => {
    assert.deepEqual(handleError({ reason: 'unknown' }), {
      success: false,
      error: 'An unknown error occurred'
    });
    assert.deepEqual(handleError(undefined), {
      success: false,
      error: 'An unknown error occurred'
    });
  });
});

describe('error classes', () => {
  it('carries the cyclic packages on an inconsistency', () => {
    const error = new CycleInconsistencyError(['libfoo', 'libbar']);

    assert.ok(error instanceof AutomarkError);
    assert.equal(error.code, ErrorCodes.CYCLE_INCONSISTENCY);
    assert.equal(error.name, 'CycleInconsistencyError');
    assert.deepEqual(error.packages, ['libfoo', 'libbar']);
    assert.deepEqual(error.details, { packages: ['libfoo', 'libbar'] });
  });

  it('keeps config messages unprefixed', () => {
    const error = new ConfigError('automark.jsonc: unknown key "colour"');

    assert.equal(error.message, 'automark.jsonc: unknown key "colour"');
    assert.equal(error.code, ErrorCodes.CONFIG_ERROR);
  });
});
