/**
 * Generic dispatch over static, ordered pattern tables.
 *
 * Extraction and classification are both expressed as rows of
 * `(key, pattern)`; this module evaluates a table against text so that the
 * order of rows is the only thing that decides precedence.
 */

export interface PatternRow<K extends string> {
  readonly key: K;
  readonly pattern: RegExp;
}

export interface ExtractionRow<K extends string> extends PatternRow<K> {
  /** Maps a match to a canonical value; `null` discards the match. */
  readonly normalize: (match: RegExpExecArray) => string | null;
}

export interface PatternMatch<K extends string> {
  readonly key: K;
  readonly value: string;
  readonly index: number;
  readonly length: number;
}

function globalCopy(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return new RegExp(pattern.source, flags);
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function normalizeKey(value: string): string {
  return collapseWhitespace(value).toLowerCase();
}

/**
 * Runs every row and returns all normalized matches ordered by position in
 * the text; matches at the same position keep table order.
 */
export function matchTable<K extends string>(table: readonly ExtractionRow<K>[], text: string): PatternMatch<K>[] {
  const out: PatternMatch<K>[] = [];
  if (!text) return out;
  for (const row of table) {
    const re = globalCopy(row.pattern);
    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
      if (m[0].length === 0) {
        re.lastIndex += 1;
        continue;
      }
      const value = row.normalize(m);
      if (value) out.push({ key: row.key, value, index: m.index, length: m[0].length });
    }
  }
  return out.sort((a, b) => a.index - b.index);
}

/** Counts, per key, how many of its rows match at least once. Keys with no match are absent. */
export function scoreTable<K extends string>(table: readonly PatternRow<K>[], text: string): Map<K, number> {
  const scores = new Map<K, number>();
  if (!text) return scores;
  for (const row of table) {
    const re = new RegExp(row.pattern.source, row.pattern.flags.replace('g', ''));
    if (re.test(text)) scores.set(row.key, (scores.get(row.key) ?? 0) + 1);
  }
  return scores;
}

/** Keeps the first occurrence of each value by case-folded, whitespace-collapsed key. */
export function dedupePreservingOrder(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const v of values) {
    const key = normalizeKey(v);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push(v);
  }
  return out;
}
