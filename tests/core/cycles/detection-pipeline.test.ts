import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  analyzeDependencyGraph,
  detectCircularDependencies
} from '../../../packages/core/src/core/cycles/detection-pipeline.js';
import { MIXED_METADATA, graphFrom } from '../../test-helpers.js';

describe('detectCircularDependencies', () => {
  it('separates acyclic packages from cycle groups', () => {
    const result = detectCircularDependencies(MIXED_METADATA);

    assert.deepEqual(result, {
      recordCount: 4,
      virtualEdges: 1,
      passes: [['D'], ['C']],
      acyclic: ['C', 'D'],
      residual: ['A', 'B'],
      cycles: [{ members: ['A', 'B'], label: 'A, B' }],
      nodes: ['A', 'B', 'C', 'D']
    });
  });

  it('returns empty results for empty input', () => {
    const result = detectCircularDependencies('');

    assert.deepEqual(result, {
      recordCount: 0,
      virtualEdges: 0,
      passes: [],
      acyclic: [],
      residual: [],
      cycles: [],
      nodes: []
    });
  });

  it('ignores a block without dependency or provides fields', () => {
    const result = detectCircularDependencies([
      'Package: E',
      'Description: metapackage leftovers',
      'Version: 1.0',
      '',
      'Package: a',
      'Depends: b',
      '',
      'Package: b',
      'Depends: a'
    ].join('\n'));

    assert.equal(result.recordCount, 2);
    assert.deepEqual(result.nodes, ['a', 'b']);
  });

  it('treats alternatives as independent edges', () => {
    const result = detectCircularDependencies([
      'Package: a',
      'Depends: b | c',
      '',
      'Package: b',
      'Depends: a',
      '',
      'Package: c',
      'Depends: a'
    ].join('\n'));

    assert.deepEqual(result.cycles.map((group) => group.label), ['a, b, c']);
  });

  it('drops alternatives that are not candidates', () => {
    const result = detectCircularDependencies([
      'Package: a',
      'Depends: b | ghost',
      '',
      'Package: b',
      'Depends: a'
    ].join('\n'));

    assert.deepEqual(result.residual, ['a', 'b']);
    assert.deepEqual(result.acyclic, []);
  });

  it('only counts the configured dependency fields', () => {
    const text = [
      'Package: a',
      'Recommends: b',
      '',
      'Package: b',
      'Depends: a'
    ].join('\n');

    assert.deepEqual(detectCircularDependencies(text).residual, ['a', 'b']);

    const withoutRecommends = detectCircularDependencies(text, { dependencyFields: ['Depends'] });
    assert.deepEqual(withoutRecommends.residual, []);
    assert.deepEqual(withoutRecommends.acyclic, ['b']);
  });
});

describe('analyzeDependencyGraph', () => {
  it('works on a graph built without records', () => {
    const graph = graphFrom({ A: ['B'], B: ['A'], C: ['D'], D: [] });
    const result = analyzeDependencyGraph(graph);

    assert.deepEqual(result.passes, [['D'], ['C']]);
    assert.deepEqual(result.acyclic, ['C', 'D']);
    assert.deepEqual(result.cycles.map((group) => group.label), ['A, B']);
    assert.equal(result.recordCount, 0);
    assert.deepEqual(graph.nodes(), ['A', 'B']);
  });
});
