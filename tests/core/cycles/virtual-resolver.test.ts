import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DependencyGraph } from '../../../packages/core/src/core/cycles/dependency-graph.js';
import { resolveVirtualPackages } from '../../../packages/core/src/core/cycles/virtual-resolver.js';
import { reduceAcyclic } from '../../../packages/core/src/core/cycles/acyclic-reducer.js';
import type { DependencyRecord } from '../../../packages/core/src/types/index.js';

function record(name: string, dependencies: string[], providedNames: string[] = []): DependencyRecord {
  return { name, dependencies: new Set(dependencies), providedNames };
}

function resolve(records: DependencyRecord[]): { graph: DependencyGraph; added: number } {
  const graph = DependencyGraph.fromRecords(records);
  const added = resolveVirtualPackages(graph, records);
  return { graph, added };
}

describe('resolveVirtualPackages', () => {
  it('adds an edge to the provider and keeps the virtual edge', () => {
    const { graph, added } = resolve([record('x', ['virt']), record('y', [], ['virt'])]);

    assert.equal(added, 1);
    assert.deepEqual(graph.toObject(), { x: ['virt', 'y'], y: [] });
  });

  it('lets the reducer remove the provider first, then the dependent', () => {
    const { graph } = resolve([record('x', ['virt']), record('y', [], ['virt'])]);
    const result = reduceAcyclic(graph);

    assert.deepEqual(result.passes, [['y'], ['x']]);
    assert.equal(graph.size, 0);
  });

  it('adds every provider of a virtual name', () => {
    const { graph, added } = resolve([
      record('p', ['mta']),
      record('q1', ['libc'], ['mta']),
      record('q2', ['libc'], ['mta', 'smtp']),
      record('q3', ['libc'], ['other'])
    ]);

    assert.equal(added, 2);
    assert.deepEqual(graph.toObject().p, ['mta', 'q1', 'q2']);
  });

  it('does not chain through provider names added in the same pass', () => {
    const { graph, added } = resolve([
      record('a', ['v']),
      record('b', [], ['v']),
      record('c', [], ['b'])
    ]);

    assert.equal(added, 1);
    assert.deepEqual(graph.toObject().a, ['b', 'v']);
  });

  it('turns a package that provides its own dependency into a self-cycle', () => {
    const { graph, added } = resolve([record('a', ['v'], ['v'])]);

    assert.equal(added, 1);
    reduceAcyclic(graph);
    assert.deepEqual(graph.toObject(), { a: ['a'] });
  });

  it('leaves the graph untouched when nothing provides anything', () => {
    const { graph, added } = resolve([record('a', ['b']), record('b', ['a'])]);

    assert.equal(added, 0);
    assert.deepEqual(graph.toObject(), { a: ['b'], b: ['a'] });
  });
});
