import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { computeLoadOrder, formatLoadOrder } from '../../../src/core/dependency-graph/load-order.js';
import { GraphStore } from '../../../src/core/dependency-graph/graph-store.js';
import { graphFrom } from '../../test-helpers.js';

describe('computeLoadOrder', () => {
  it('orders a diamond dependencies first', () => {
    const result = computeLoadOrder(graphFrom('A: B C', 'B: D', 'C: D'), 'A');

    assert.deepEqual(result.order, ['D', 'B', 'C', 'A']);
    assert.equal(result.cycles.size, 0);
  });

  it('breaks ties by ascending name', () => {
    const result = computeLoadOrder(graphFrom('R: z y x'), 'R');

    assert.deepEqual(result.order, ['x', 'y', 'z', 'R']);
  });

  it('records the node where a cycle is detected', () => {
    const result = computeLoadOrder(graphFrom('A: B', 'B: A'), 'A');

    assert.deepEqual(result.order, ['B', 'A']);
    assert.deepEqual(Array.from(result.cycles), ['A']);
  });

  it('records only the detection point of a longer cycle', () => {
    const result = computeLoadOrder(graphFrom('A: B', 'B: C', 'C: A D'), 'A');

    assert.deepEqual(result.order, ['D', 'C', 'B', 'A']);
    assert.deepEqual(Array.from(result.cycles), ['A']);
  });

  it('handles a self-dependency', () => {
    const result = computeLoadOrder(graphFrom('A: A'), 'A');

    assert.deepEqual(result.order, ['A']);
    assert.deepEqual(Array.from(result.cycles), ['A']);
  });

  it('treats edges into filtered nodes as absent', () => {
    const result = computeLoadOrder(graphFrom('A: testutils core', 'testutils: mocklib'), 'A', 'test');

    assert.deepEqual(result.order, ['core', 'A']);
    assert.equal(result.cycles.size, 0);
  });

  it('returns nothing when the start itself is filtered', () => {
    const result = computeLoadOrder(graphFrom('testA: b'), 'testA', 'test');

    assert.deepEqual(result.order, []);
    assert.equal(result.cycles.size, 0);
  });

  it('places every dependency before its dependents in a DAG', () => {
    const graph = graphFrom(
      'app: web db log',
      'web: http log',
      'http: net',
      'db: net pool',
      'pool: log',
      'net: log'
    );
    const { order } = computeLoadOrder(graph, 'app');

    assert.equal(order.length, graph.size);
    for (const name of graph.nodes()) {
      for (const dep of graph.dependenciesOf(name)) {
        assert.ok(order.indexOf(dep) < order.indexOf(name), `${dep} should precede ${name}`);
      }
    }
  });

  it('only includes nodes reachable from the start', () => {
    const result = computeLoadOrder(graphFrom('A: B', 'X: Y'), 'A');

    assert.deepEqual(result.order, ['B', 'A']);
  });

  it('walks very long chains without exhausting the call stack', () => {
    const graph = new GraphStore();
    const length = 20000;
    for (let i = 0; i < length - 1; i++) {
      graph.addEdge(`n${i}`, `n${i + 1}`);
    }

    const { order } = computeLoadOrder(graph, 'n0');

    assert.equal(order.length, length);
    assert.equal(order[0], `n${length - 1}`);
    assert.equal(order[length - 1], 'n0');
  });

  it('is deterministic', () => {
    const graph = graphFrom('A: C B', 'B: A D', 'C: D');

    const first = computeLoadOrder(graph, 'A');
    const second = computeLoadOrder(graph, 'A');

    assert.deepEqual(second.order, first.order);
    assert.deepEqual(Array.from(second.cycles), Array.from(first.cycles));
  });
});

describe('formatLoadOrder', () => {
  it('joins the order with the separator', () => {
    const result = computeLoadOrder(graphFrom('A: B C', 'B: D', 'C: D'), 'A');

    assert.deepEqual(formatLoadOrder(result), ['D-> B-> C-> A']);
  });

  it('adds a sorted cycle note', () => {
    const result = computeLoadOrder(graphFrom('A: B X', 'B: A', 'X: Y', 'Y: X'), 'A');

    assert.deepEqual(result.order, ['B', 'Y', 'X', 'A']);
    assert.deepEqual(formatLoadOrder(result), [
      'B-> Y-> X-> A',
      'Cycles detected at: A, X'
    ]);
  });

  it('leaves out cycle points that are not in the order', () => {
    assert.deepEqual(formatLoadOrder({ order: ['x'], cycles: new Set(['y']) }), ['x']);
  });

  it('produces no lines for an empty order', () => {
    assert.deepEqual(formatLoadOrder({ order: [], cycles: new Set() }), []);
  });
});
