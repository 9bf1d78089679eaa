import type { IssueSeverity } from '../retrieval/types';
import { matchTable, normalizeKey, type ExtractionRow } from '../retrieval/matcher';
import { STREET_ADDRESS } from '../retrieval/entities';

export type ClaimKind = 'currency' | 'percent' | 'sqft' | 'bedBath' | 'date' | 'address';

export interface Claim {
  readonly kind: ClaimKind;
  readonly span: string;
  readonly index: number;
}

export const CLAIM_SEVERITY: Readonly<Record<ClaimKind, IssueSeverity>> = {
  currency: 'high',
  percent: 'high',
  address: 'high',
  sqft: 'medium',
  bedBath: 'medium',
  date: 'low',
};

const MONTH =
  'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const NUMBER = String.raw`(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?`;

const span = (m: RegExpExecArray) => m[0].trim();
const row = (key: ClaimKind, pattern: RegExp): ExtractionRow<ClaimKind> => ({ key, pattern, normalize: span });

const CLAIM_TABLE: readonly ExtractionRow<ClaimKind>[] = [
  row('currency', new RegExp(String.raw`\$\s?${NUMBER}(?:\s?(?:million|billion|thousand|[KkMmBb])\b)?`)),
  row('percent', /\b\d+(?:\.\d+)?\s?(?:%|percent\b)/i),
  row('sqft', new RegExp(String.raw`\b${NUMBER}\s?(?:sq\.?\s?ft|square\s+f(?:ee|oo)t|sqft)\b`, 'i')),
  row('bedBath', /\b\d+(?:\.\d+)?\s?-?\s?(?:bed(?:room)?s?|bath(?:room)?s?|br|ba)\b/i),
  row('date', new RegExp(String.raw`\b(?:${MONTH})\.?\s+(?:\d{1,2}(?:st|nd|rd|th)?,?\s+)?\d{4}\b`)),
  row('date', /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/),
  row('date', /\b\d{4}-\d{2}-\d{2}\b/),
  row('date', /\bQ[1-4]\s+\d{4}\b/),
  row('address', STREET_ADDRESS),
];

/**
 * Factual-looking spans in reading order. Where spans overlap, the one that
 * starts first wins, and the longer one wins at the same start.
 */
export function extractClaims(text: string): Claim[] {
  const matches = matchTable(CLAIM_TABLE, text)
    .map((m, order) => ({ m, order }))
    .sort((a, b) => a.m.index - b.m.index || b.m.length - a.m.length || a.order - b.order);

  const out: Claim[] = [];
  let end = -1;
  for (const { m } of matches) {
    if (m.index < end) continue;
    out.push({ kind: m.key, span: m.value, index: m.index });
    end = m.index + m.length;
  }
  return out;
}

const MULTIPLIERS: Readonly<Record<string, number>> = {
  k: 1e3,
  thousand: 1e3,
  m: 1e6,
  million: 1e6,
  b: 1e9,
  billion: 1e9,
};

function canonicalNumber(raw: string): string | null {
  const n = Number(raw.replace(/,/g, ''));
  return Number.isFinite(n) ? String(n) : null;
}

/** "1.2" + "M" becomes "1200000"; without a known suffix the number is kept as written. */
function scaledNumber(core: string, suffix: string | undefined): string | null {
  const factor = suffix ? MULTIPLIERS[suffix.toLowerCase()] : undefined;
  if (factor === undefined) return canonicalNumber(core);
  const expanded = Number(core.replace(/,/g, '')) * factor;
  return Number.isFinite(expanded) ? String(Math.round(expanded)) : null;
}

/**
 * The value a numeric claim must find among evidence numbers of its own kind.
 * Scaled amounts ("$1.2M") only match their expanded value.
 */
export function numericForms(claim: Claim): string[] {
  const m = new RegExp(String.raw`(${NUMBER})\s?(million|billion|thousand|[KkMmBb])?\b`).exec(claim.span);
  const core = m?.[1];
  if (!m || !core) return [];
  const value = claim.kind === 'currency' ? scaledNumber(core, m[2]) : canonicalNumber(core);
  return value ? [value] : [];
}

/** "3-bedroom", "3 beds" and "3 br" all become "3 bed". */
export function bedBathKey(spanText: string): string | null {
  const m = /(\d+(?:\.\d+)?)\s?-?\s?(bed|bath|br|ba)/i.exec(spanText);
  const count = m?.[1];
  const unit = m?.[2]?.toLowerCase();
  if (!count || !unit) return null;
  return `${Number(count)} ${unit === 'br' || unit === 'bed' ? 'bed' : 'bath'}`;
}

export function containmentKey(value: string): string {
  return normalizeKey(value.replace(/-/g, ' '));
}

type NumericKind = 'currency' | 'percent' | 'sqft';

const EVIDENCE_NUMBERS: readonly { kind: NumericKind; pattern: RegExp; scaled: boolean }[] = [
  {
    kind: 'currency',
    pattern: new RegExp(String.raw`\$\s?(${NUMBER})(?:\s?(million|billion|thousand|[KkMmBb])\b)?`, 'g'),
    scaled: true,
  },
  { kind: 'percent', pattern: new RegExp(String.raw`(${NUMBER})\s?(?:%|percent\b)`, 'gi'), scaled: false },
  {
    kind: 'sqft',
    pattern: new RegExp(String.raw`(${NUMBER})\s?(?:sq\.?\s?ft|square\s+f(?:ee|oo)t|sqft)\b`, 'gi'),
    scaled: false,
  },
];

/** Metadata keys whose numeric values count as figures of a kind. First match wins. */
const METADATA_KINDS: readonly [RegExp, NumericKind][] = [
  [/pct|percent|_rate$|^rate$|yield|change|growth|appreciation/i, 'percent'],
  [/sqft|square_?f|living_area|lot_size/i, 'sqft'],
  [/price|value|rent|cost|amount|income|tax/i, 'currency'],
];

function metadataKind(key: string): NumericKind | undefined {
  return METADATA_KINDS.find(([pattern]) => pattern.test(key))?.[1];
}

export interface EvidenceSource {
  readonly content: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/** Pre-digested evidence that claims are checked against. */
export class EvidenceIndex {
  readonly text: string;
  private readonly numbers: Record<NumericKind, Set<string>> = {
    currency: new Set<string>(),
    percent: new Set<string>(),
    sqft: new Set<string>(),
  };
  private readonly bedBath = new Set<string>();

  constructor(sources: readonly EvidenceSource[]) {
    const parts: string[] = [];
    for (const source of sources) {
      parts.push(source.content);
      for (const [key, value] of Object.entries(source.metadata ?? {})) {
        if (typeof value === 'string') parts.push(value);
        if (typeof value !== 'number') continue;
        parts.push(String(value));
        const kind = metadataKind(key);
        const n = kind ? canonicalNumber(String(value)) : null;
        if (kind && n) this.numbers[kind].add(n);
      }
    }
    const joined = parts.join('\n');
    this.text = containmentKey(joined);

    for (const { kind, pattern, scaled } of EVIDENCE_NUMBERS) {
      for (const m of joined.matchAll(pattern)) {
        const core = m[1];
        const n = core ? (scaled ? scaledNumber(core, m[2]) : canonicalNumber(core)) : null;
        if (n) this.numbers[kind].add(n);
      }
    }
    for (const claim of extractClaims(joined)) {
      if (claim.kind !== 'bedBath') continue;
      const key = bedBathKey(claim.span);
      if (key) this.bedBath.add(key);
    }
  }

  contains(value: string): boolean {
    const key = containmentKey(value);
    return key.length > 0 && this.text.includes(key);
  }

  /**
   * Numeric claims need a same-kind figure with the same value; bare digits
   * elsewhere in the evidence (dates, ids, other units) do not count.
   */
  supports(claim: Claim): boolean {
    switch (claim.kind) {
      case 'currency':
      case 'percent':
      case 'sqft': {
        const known = this.numbers[claim.kind];
        return numericForms(claim).some((n) => known.has(n));
      }
      case 'bedBath': {
        const key = bedBathKey(claim.span);
        return key !== null && this.bedBath.has(key);
      }
      case 'date':
      case 'address':
        return this.contains(claim.span);
    }
  }
}
