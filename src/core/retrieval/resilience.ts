import type { RetrievalSource, SearchResult, SourceOutcome, SourceStatus } from './types';
import { RequestCancelledError, RouterError, StoreUnavailableError, isStoreUnavailable } from '../errors';
import { serializeError, type Logger } from '../log';

export interface ExecutionPolicy {
  /** Budget for one executor call, retry and backoff included. */
  timeoutMs: number;
  retryBackoffMs: number;
}

export const DEFAULT_EXECUTION_POLICY: Readonly<ExecutionPolicy> = { timeoutMs: 3000, retryBackoffMs: 200 };

function abortReason(signal: AbortSignal | undefined, stage: string): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof RouterError ? reason : new RequestCancelledError(stage);
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal, 'retry'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal, 'retry'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation` with a signal that aborts on whichever comes first: the
 * deadline or the parent signal. The deadline rejects with a timeout
 * `StoreUnavailableError`; a parent abort rejects with `RequestCancelledError`.
 * The returned promise settles even if the operation ignores its signal.
 */
export function withTimeout<T>(
  source: RetrievalSource,
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) return Promise.reject(new RequestCancelledError(`${source} search`));
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const finish = () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };
    const onParentAbort = () => {
      finish();
      const err = new RequestCancelledError(`${source} search completed`);
      controller.abort(err);
      reject(err);
    };
    const timer = setTimeout(() => {
      finish();
      const err = new StoreUnavailableError(source, `${source} search timed out after ${timeoutMs}ms`, { reason: 'timeout' });
      controller.abort(err);
      reject(err);
    }, timeoutMs);
    parent?.addEventListener('abort', onParentAbort, { once: true });

    operation(controller.signal).then(
      (value) => {
        finish();
        resolve(value);
      },
      (e: unknown) => {
        finish();
        reject(e);
      }
    );
  });
}

/**
 * Calls `operation` once more after `backoffMs` when it fails with
 * `StoreUnavailableError`. Anything else, including an empty result, is
 * returned or thrown as is.
 */
export async function retryOnce<T>(
  operation: (attempt: number) => Promise<T>,
  backoffMs: number,
  signal?: AbortSignal,
  onRetry?: (err: StoreUnavailableError) => void
): Promise<T> {
  try {
    return await operation(1);
  } catch (e) {
    if (!isStoreUnavailable(e) || signal?.aborted) throw e;
    onRetry?.(e);
    await delay(backoffMs, signal);
    return operation(2);
  }
}

export interface GuardedResult {
  results: SearchResult[];
  outcome: SourceOutcome;
}

function statusFor(e: unknown): SourceStatus {
  if (e instanceof StoreUnavailableError) return e.reason === 'timeout' ? 'timeout' : 'unavailable';
  return 'failed';
}

/**
 * Runs one executor under the execution policy and folds every store
 * failure into a degraded, empty outcome. Only caller cancellation escapes.
 */
export async function runGuarded(
  source: RetrievalSource,
  execute: (signal: AbortSignal) => Promise<SearchResult[]>,
  policy: ExecutionPolicy,
  logger: Logger,
  signal?: AbortSignal
): Promise<GuardedResult> {
  const startedAt = Date.now();
  let attempts = 0;
  try {
    const results = await withTimeout(
      source,
      (inner) =>
        retryOnce(
          () => {
            attempts += 1;
            return execute(inner);
          },
          policy.retryBackoffMs,
          inner,
          (err) => logger.warn('store unavailable, retrying', { source, err: serializeError(err) })
        ),
      policy.timeoutMs,
      signal
    );
    return {
      results,
      outcome: { status: results.length > 0 ? 'ok' : 'empty', resultCount: results.length, attempts, durationMs: Date.now() - startedAt },
    };
  } catch (e) {
    if (e instanceof RequestCancelledError || signal?.aborted) throw e instanceof RequestCancelledError ? e : new RequestCancelledError('fusion');
    const status = statusFor(e);
    logger.warn('source degraded to empty', { source, status, attempts, err: serializeError(e) });
    return {
      results: [],
      outcome: {
        status,
        resultCount: 0,
        attempts,
        durationMs: Date.now() - startedAt,
        error: e instanceof Error ? e.message : String(e),
      },
    };
  }
}
