import test from 'node:test';
import assert from 'node:assert/strict';
import { CROSS_SOURCE_BONUS, assertValidWeights, fuseResults } from '../src/core/retrieval/fuser';
import { InvalidWeightsError } from '../src/core/errors';
import { hit } from './helpers';

const HYBRID = { vectorWeight: 0.7, graphWeight: 0.3 };

test('an item from both sources combines weighted scores plus the bonus', () => {
  const fused = fuseResults([hit('p1', 0.8, 'Maple listing')], [hit('p1', 0.6, 'Maple listing', 'graph')], HYBRID);
  assert.equal(fused.length, 1);
  const [only] = fused;
  assert.ok(only);
  assert.ok(Math.abs(only.combinedScore - 0.79) < 1e-9);
  assert.equal(only.source, 'vector');
  assert.deepEqual(only.sources, ['vector', 'graph']);
  assert.equal(only.vectorScore, 0.8);
  assert.equal(only.graphScore, 0.6);
  assert.equal(only.rank, 0);
});

test('the combined score is capped at one', () => {
  const [only] = fuseResults([hit('p1', 1)], [hit('p1', 1, 'content of p1', 'graph')], HYBRID);
  assert.equal(only?.combinedScore, 1);
});

test('items match across sources by normalized content when ids differ', () => {
  const fused = fuseResults(
    [hit('chunk-9', 0.5, 'Median price  in Dallas is $350,000')],
    [hit('market-3', 0.9, 'median price in dallas is $350,000', 'graph')],
    HYBRID
  );
  assert.equal(fused.length, 1);
  assert.equal(fused[0]?.source, 'graph');
  assert.equal(fused[0]?.id, 'market-3');
  assert.ok(Math.abs((fused[0]?.combinedScore ?? 0) - (0.35 + 0.27 + CROSS_SOURCE_BONUS)) < 1e-9);
});

test('equal combined scores rank the graph-primary result first', () => {
  const fused = fuseResults([hit('v1', 0.5)], [hit('g1', 0.5, 'graph fact', 'graph')], { vectorWeight: 0.5, graphWeight: 0.5 });
  assert.deepEqual(
    fused.map((r) => [r.id, r.rank]),
    [
      ['g1', 0],
      ['v1', 1],
    ]
  );
});

test('within a source the higher score wins and duplicates collapse', () => {
  const fused = fuseResults([hit('a', 0.4), hit('b', 0.9), hit('a', 0.7)], [], { vectorWeight: 1, graphWeight: 0 });
  assert.deepEqual(
    fused.map((r) => [r.id, r.combinedScore]),
    [
      ['b', 0.9],
      ['a', 0.7],
    ]
  );
});

test('scores outside [0,1] are clamped before weighting', () => {
  const [only] = fuseResults([hit('x', 3)], [], { vectorWeight: 1, graphWeight: 0 });
  assert.equal(only?.score, 1);
  assert.equal(only?.combinedScore, 1);
});

test('limit truncates after ranking', () => {
  const fused = fuseResults([hit('a', 0.9), hit('b', 0.8), hit('c', 0.7)], [], { vectorWeight: 1, graphWeight: 0 }, 2);
  assert.deepEqual(fused.map((r) => r.id), ['a', 'b']);
});

test('no results from either source fuse to an empty list', () => {
  assert.deepEqual(fuseResults([], [], HYBRID), []);
});

test('fusion is deterministic for the same input', () => {
  const v = [hit('a', 0.6), hit('b', 0.6)];
  const g = [hit('c', 0.6, 'c', 'graph')];
  assert.deepEqual(fuseResults(v, g, HYBRID), fuseResults(v, g, HYBRID));
});

test('weights that do not sum to one are rejected', () => {
  assert.throws(() => assertValidWeights({ vectorWeight: 0.7, graphWeight: 0.7 }), InvalidWeightsError);
  assert.throws(() => fuseResults([], [], { vectorWeight: -1, graphWeight: 2 }), InvalidWeightsError);
  assert.doesNotThrow(() => assertValidWeights({ vectorWeight: 0.25, graphWeight: 0.75 }));
});
