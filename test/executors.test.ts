import test from 'node:test';
import assert from 'node:assert/strict';
import { GraphSearchExecutor, VectorSearchExecutor, graphRankScore } from '../src/core/retrieval/executors';
import { delay, retryOnce, runGuarded, withTimeout } from '../src/core/retrieval/resilience';
import { RequestCancelledError, StoreUnavailableError } from '../src/core/errors';
import { EMPTY_ENTITY_SET } from '../src/core/retrieval/types';
import { FakeGraphStore, FakeVectorStore, FixedEmbedder, hit, never, recordingLogger } from './helpers';

const FAST = { timeoutMs: 200, retryBackoffMs: 1 };

const request = {
  query: 'tell me about quiet neighborhoods',
  intent: 'semantic_analysis' as const,
  entities: EMPTY_ENTITY_SET,
  limit: 10,
};

test('vector executor drops hits below the role threshold and sorts by score', async () => {
  const store = FakeVectorStore.returning([hit('a', 0.9), hit('b', 0.5), hit('c', 0.7)]);
  const embedder = new FixedEmbedder();
  const executor = new VectorSearchExecutor({ store, embedder });
  const results = await executor.execute({ ...request, role: 'general' });
  assert.deepEqual(results.map((r) => [r.id, r.score]), [
    ['a', 0.9],
    ['c', 0.7],
  ]);
  assert.equal(store.calls[0]?.threshold, 0.65);
  assert.deepEqual(embedder.calls, [request.query]);
});

test('a configured similarity threshold overrides the role', async () => {
  const store = FakeVectorStore.returning([hit('a', 0.9), hit('b', 0.5)]);
  const executor = new VectorSearchExecutor({ store, embedder: new FixedEmbedder(), similarityThreshold: 0.4 });
  assert.equal(executor.thresholdFor('buyer'), 0.4);
  assert.equal((await executor.execute(request)).length, 2);
});

test('vector executor refuses an already cancelled request', async () => {
  const controller = new AbortController();
  controller.abort();
  const executor = new VectorSearchExecutor({ store: FakeVectorStore.returning([]), embedder: new FixedEmbedder() });
  await assert.rejects(executor.execute({ ...request, signal: controller.signal }), RequestCancelledError);
});

test('graph executor rescales rows by rank and tags the template', async () => {
  const store = FakeGraphStore.returning({
    property_agent: [hit('agent-1', 1, 'Dana Reyes lists 123 Maple St', 'graph'), hit('agent-2', 1, 'Sam Ortiz co-lists it', 'graph')],
  });
  const executor = new GraphSearchExecutor({ store });
  const results = await executor.execute({
    ...request,
    intent: 'relationship_query',
    entities: { ...EMPTY_ENTITY_SET, propertyId: ['123 Maple St'] },
  });
  assert.deepEqual(store.calls, [{ key: 'property_agent', params: { propertyId: '123 Maple St', limit: 10 } }]);
  assert.equal(results[0]?.score, 1);
  assert.ok(Math.abs((results[1]?.score ?? 0) - 1 / 1.1) < 1e-12);
  assert.deepEqual(results[0]?.metadata, { template: 'property_agent', nativeScore: 1 });
  assert.equal(results[1]?.source, 'graph');
});

test('graph executor keeps the best score when templates return the same row', async () => {
  const store = FakeGraphStore.returning({
    market_metrics_by_location: [hit('md-1', 1, 'Austin metrics', 'graph')],
    properties_by_location: [hit('md-1', 0.8, 'Austin metrics', 'graph'), hit('p-9', 0.8, '12 Oak Ave', 'graph')],
  });
  const results = await new GraphSearchExecutor({ store }).execute({
    ...request,
    intent: 'investment_analysis',
    entities: { ...EMPTY_ENTITY_SET, location: ['Austin, TX'] },
  });
  assert.deepEqual(results.map((r) => [r.id, r.score]), [
    ['md-1', 0.95],
    ['p-9', graphRankScore(0.8, 1)],
  ]);
});

test('graph executor returns nothing when there is nothing to plan', async () => {
  const store = FakeGraphStore.returning({});
  const results = await new GraphSearchExecutor({ store }).execute({ ...request, query: 'ok?' });
  assert.deepEqual(results, []);
  assert.equal(store.calls.length, 0);
});

test('runGuarded reports ok and empty without retrying', async () => {
  const log = recordingLogger();
  const ok = await runGuarded('vector', async () => [hit('a', 0.9)], FAST, log);
  assert.equal(ok.outcome.status, 'ok');
  assert.equal(ok.outcome.attempts, 1);

  let calls = 0;
  const empty = await runGuarded('vector', async () => { calls += 1; return []; }, FAST, log);
  assert.equal(empty.outcome.status, 'empty');
  assert.equal(calls, 1);
});

test('an unavailable store is retried once', async () => {
  const log = recordingLogger();
  let calls = 0;
  const res = await runGuarded(
    'graph',
    async () => {
      calls += 1;
      if (calls === 1) throw new StoreUnavailableError('graph', 'connection refused');
      return [hit('g', 0.5, 'g', 'graph')];
    },
    FAST,
    log
  );
  assert.equal(res.outcome.status, 'ok');
  assert.equal(res.outcome.attempts, 2);
  assert.equal(log.entries.filter((e) => e.msg === 'store unavailable, retrying').length, 1);
});

test('a store that stays unavailable degrades to empty after two attempts', async () => {
  const res = await runGuarded(
    'graph',
    async () => {
      throw new StoreUnavailableError('graph', 'connection refused');
    },
    FAST,
    recordingLogger()
  );
  assert.deepEqual(res.results, []);
  assert.equal(res.outcome.status, 'unavailable');
  assert.equal(res.outcome.attempts, 2);
  assert.equal(res.outcome.error, 'connection refused');
});

test('other errors degrade to failed without a retry', async () => {
  const res = await runGuarded(
    'vector',
    async () => {
      throw new Error('bad vector dimension');
    },
    FAST,
    recordingLogger()
  );
  assert.equal(res.outcome.status, 'failed');
  assert.equal(res.outcome.attempts, 1);
});

test('a store that never answers times out to empty', async () => {
  const res = await runGuarded('vector', () => never(), { timeoutMs: 20, retryBackoffMs: 1 }, recordingLogger());
  assert.equal(res.outcome.status, 'timeout');
  assert.deepEqual(res.results, []);
});

test('caller cancellation escapes runGuarded', async () => {
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 10);
  await assert.rejects(
    runGuarded('graph', () => never(), { timeoutMs: 1000, retryBackoffMs: 1 }, recordingLogger(), controller.signal),
    RequestCancelledError
  );
});

test('withTimeout hands the operation a signal that aborts on the deadline', async () => {
  let seen: AbortSignal | undefined;
  await assert.rejects(
    withTimeout(
      'vector',
      (signal) => {
        seen = signal;
        return never();
      },
      10
    ),
    (e: unknown) => e instanceof StoreUnavailableError && e.reason === 'timeout'
  );
  assert.equal(seen?.aborted, true);
});

test('retryOnce does not retry ordinary errors', async () => {
  let calls = 0;
  await assert.rejects(
    retryOnce(async () => {
      calls += 1;
      throw new Error('boom');
    }, 1),
    /boom/
  );
  assert.equal(calls, 1);
});

test('delay rejects when its signal aborts', async () => {
  const controller = new AbortController();
  const pending = delay(1000, controller.signal);
  controller.abort();
  await assert.rejects(pending, RequestCancelledError);
});
