import { analyzeQuery } from '../../core/pipeline';
import { loadRouterConfig } from '../../core/config';
import { openRuntime, type Runtime } from '../../core/runtime';
import { StoreUnavailableError } from '../../core/errors';
import type { SearchFilters } from '../../core/retrieval/types';
import { createLogger } from '../../core/log';
import type { CLIResult, CLIError } from '../types';
import { success, error, ErrorReasons, ErrorHints } from '../types';
import type { AnalyzeInput, SearchInput } from '../schemas/querySchemas';

function toFilters(input: Pick<SearchInput, 'propertyType' | 'minPrice' | 'maxPrice'>): SearchFilters | undefined {
  const filters: SearchFilters = {
    ...(input.propertyType !== undefined ? { propertyType: input.propertyType } : {}),
    ...(input.minPrice !== undefined ? { minPrice: input.minPrice } : {}),
    ...(input.maxPrice !== undefined ? { maxPrice: input.maxPrice } : {}),
  };
  return Object.keys(filters).length > 0 ? filters : undefined;
}

export async function handleAnalyze(input: AnalyzeInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'analyze' });
  const startedAt = Date.now();
  const analysis = await analyzeQuery(input.text, { filters: toFilters(input) }, log);
  log.info('analyze', {
    ok: true,
    intent: analysis.intent,
    strategy: analysis.strategy,
    rule: analysis.strategyRule,
    duration_ms: Date.now() - startedAt,
  });
  return success({ ...analysis });
}

export async function handleSearch(input: SearchInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'search' });
  const config = loadRouterConfig(
    process.env,
    input.timeoutMs !== undefined ? { retrieval: { executorTimeoutMs: input.timeoutMs } } : undefined
  );

  let runtime: Runtime;
  try {
    runtime = await openRuntime(config, log);
  } catch (e) {
    if (e instanceof StoreUnavailableError) {
      return error(ErrorReasons.STORE_UNAVAILABLE, {
        source: e.source,
        message: e.message,
        hint: ErrorHints.STORE_UNAVAILABLE,
      });
    }
    throw e;
  }

  const opened = runtime;
  try {
    const results = await log.span('search', { role: input.role, topk: input.topk }, () =>
      opened.pipeline.routeAndSearch(input.text, {
        role: input.role,
        filters: toFilters(input),
        limit: input.topk,
      })
    );
    return success({ ...results });
  } finally {
    await opened.close();
  }
}
