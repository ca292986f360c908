import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  findInconsistentNodes,
  parsePackageList,
  verifyCycleConsistency
} from '../../../packages/core/src/core/cycles/consistency-check.js';
import { CycleInconsistencyError } from '../../../packages/core/src/utils/errors.js';
import { ErrorCodes } from '../../../packages/core/src/types/index.js';

describe('verifyCycleConsistency', () => {
  it('accepts residual packages that are all pending removal', () => {
    assert.doesNotThrow(() => verifyCycleConsistency(['a', 'b'], ['b', 'a', 'unrelated']));
  });

  it('accepts an empty residual set', () => {
    assert.doesNotThrow(() => verifyCycleConsistency([], []));
  });

  it('fails with every residual package that is not pending', () => {
    assert.throws(
      () => verifyCycleConsistency(['c', 'b', 'a'], ['b']),
      (error: unknown) => {
        assert.ok(error instanceof CycleInconsistencyError);
        assert.deepEqual(error.packages, ['a', 'c']);
        assert.equal(error.code, ErrorCodes.CYCLE_INCONSISTENCY);
        assert.equal(
          error.message,
          'Inconsistent cycle detection: a, c reported as cyclic but not pending removal'
        );
        return true;
      }
    );
  });
});

describe('findInconsistentNodes', () => {
  it('reports each offending package once, sorted', () => {
    assert.deepEqual(findInconsistentNodes(['z', 'y', 'z'], ['x']), ['y', 'z']);
  });
});

describe('parsePackageList', () => {
  it('splits on whitespace and skips comments', () => {
    const text = 'a b\n# header comment\nc # trailing\n\n  d\t e\r\n';
    assert.deepEqual(parsePackageList(text), ['a', 'b', 'c', 'd', 'e']);
  });

  it('returns nothing for an empty list', () => {
    assert.deepEqual(parsePackageList(''), []);
  });
});
