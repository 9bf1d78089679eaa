import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import type { Strategy } from './retrieval/types';
import { serializeError, type Logger } from './log';

export const AnalyticsRecordSchema = z.object({
  ts: z.string(),
  query: z.string(),
  strategy: z.enum(['vector_only', 'graph_only', 'hybrid']),
  latencyMs: z.number().nonnegative(),
  resultCount: z.number().int().nonnegative(),
  hadError: z.boolean(),
});

export type AnalyticsRecord = z.infer<typeof AnalyticsRecordSchema>;

/** Write-only view the pipeline sees. */
export interface AnalyticsSink {
  record(query: string, strategy: Strategy, latencyMs: number, resultCount: number, hadError: boolean): void;
}

/** Append-only storage behind the recorder. */
export interface AnalyticsLog {
  append(record: AnalyticsRecord): Promise<void>;
  readAll(): Promise<AnalyticsRecord[]>;
}

export class InMemoryAnalyticsLog implements AnalyticsLog {
  private readonly records: AnalyticsRecord[] = [];

  async append(record: AnalyticsRecord): Promise<void> {
    this.records.push(record);
  }

  async readAll(): Promise<AnalyticsRecord[]> {
    return [...this.records];
  }
}

/** One JSON object per line. Lines that fail to parse are skipped on read. */
export class JsonlAnalyticsLog implements AnalyticsLog {
  constructor(
    readonly filePath: string,
    private readonly logger?: Logger
  ) {}

  async append(record: AnalyticsRecord): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
  }

  async readAll(): Promise<AnalyticsRecord[]> {
    if (!await fs.pathExists(this.filePath)) return [];
    const raw = await fs.readFile(this.filePath, 'utf-8');
    const out: AnalyticsRecord[] = [];
    raw.split('\n').forEach((line, idx) => {
      if (!line.trim()) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (e) {
        this.logger?.warn('analytics line is not json', { file: this.filePath, line: idx + 1, err: serializeError(e) });
        return;
      }
      const result = AnalyticsRecordSchema.safeParse(parsed);
      if (result.success) out.push(result.data);
      else this.logger?.warn('analytics line has unexpected shape', { file: this.filePath, line: idx + 1 });
    });
    return out;
  }
}

/**
 * Single-writer recorder. `record` enqueues and returns immediately; one
 * drain task appends queued records to the log in arrival order. Append
 * failures are logged and the record is dropped.
 */
export class AnalyticsRecorder implements AnalyticsSink {
  private readonly queue: AnalyticsRecord[] = [];
  private draining: Promise<void> | null = null;

  constructor(
    private readonly log: AnalyticsLog,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  get pending(): number {
    return this.queue.length;
  }

  record(query: string, strategy: Strategy, latencyMs: number, resultCount: number, hadError: boolean): void {
    this.queue.push({
      ts: this.now().toISOString(),
      query,
      strategy,
      latencyMs: Math.max(0, latencyMs),
      resultCount: Math.max(0, Math.floor(resultCount)),
      hadError,
    });
    if (!this.draining) this.draining = this.drain();
  }

  /** Resolves once every record enqueued so far has been appended or dropped. */
  async flush(): Promise<void> {
    while (this.draining) await this.draining;
  }

  private async drain(): Promise<void> {
    for (;;) {
      const next = this.queue.shift();
      if (!next) break;
      try {
        await this.log.append(next);
      } catch (e) {
        this.logger.error('analytics append failed', { strategy: next.strategy, err: serializeError(e) });
      }
    }
    this.draining = null;
  }
}

export interface StrategyPerformance {
  count: number;
  avgLatencyMs: number;
  errorRate: number;
  emptyRate: number;
}

export interface PerformanceReport {
  totalQueries: number;
  strategyPerformance: Partial<Record<Strategy, StrategyPerformance>>;
  recentQueries: string[];
  failures: { failedCount: number; failedQueries: string[] };
  recommendation: string;
}

const RECENT_WINDOW = 5;

function isFailed(r: AnalyticsRecord): boolean {
  return r.hadError || r.resultCount === 0;
}

export function buildPerformanceReport(records: readonly AnalyticsRecord[]): PerformanceReport {
  const buckets = new Map<Strategy, AnalyticsRecord[]>();
  for (const r of records) {
    const bucket = buckets.get(r.strategy);
    if (bucket) bucket.push(r);
    else buckets.set(r.strategy, [r]);
  }

  const strategyPerformance: Partial<Record<Strategy, StrategyPerformance>> = {};
  for (const [strategy, rows] of buckets) {
    const count = rows.length;
    strategyPerformance[strategy] = {
      count,
      avgLatencyMs: rows.reduce((sum, r) => sum + r.latencyMs, 0) / count,
      errorRate: rows.filter((r) => r.hadError).length / count,
      emptyRate: rows.filter((r) => r.resultCount === 0).length / count,
    };
  }

  const failed = records.filter(isFailed);
  return {
    totalQueries: records.length,
    strategyPerformance,
    recentQueries: records.slice(-RECENT_WINDOW).map((r) => r.query),
    failures: { failedCount: failed.length, failedQueries: failed.slice(-RECENT_WINDOW).map((r) => r.query) },
    recommendation:
      failed.length > 0
        ? 'Review failed queries for data gaps and tune similarity thresholds.'
        : 'No failed searches recorded.',
  };
}
