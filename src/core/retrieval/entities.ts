import type { EntityCategory, EntitySet } from './types';
import { collapseWhitespace, dedupePreservingOrder, matchTable, type ExtractionRow } from './matcher';
import usStates from './usStates.json';

const STATE_CODES: ReadonlySet<string> = new Set(usStates.codes);

// Capitalized words that open a question or command and get swept into a
// "City" capture ("Compare Austin, TX").
const LEADING_NOISE = new Set([
  'a', 'about', 'an', 'and', 'are', 'around', 'average', 'between', 'can', 'compare', 'condos', 'could',
  'describe', 'did', 'do', 'does', 'explain', 'find', 'for', 'from', 'give', 'homes', 'houses', 'how', 'i',
  'in', 'is', 'list', 'me', 'median', 'my', 'near', 'of', 'or', 'price', 'prices', 'properties', 'property',
  'roi', 'should', 'show', 'tell', 'the', 'to', 'versus', 'vs', 'was', 'what', 'whats', 'when', 'where',
  'which', 'who', 'why', 'will', 'with', 'would',
]);

const CITY = String.raw`[A-Z][a-zA-Z.'-]*(?:[ \t]+[A-Z][a-zA-Z.'-]*){0,3}`;
const NAME = String.raw`[A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+){0,2}`;
const STREET_SUFFIX =
  'Street|St|Avenue|Ave|Road|Rd|Way|Drive|Dr|Lane|Ln|Boulevard|Blvd|Court|Ct|Place|Pl|Circle|Cir|Parkway|Pkwy|Terrace|Ter|Trail|Trl|Highway|Hwy';

/** `<number> <Capitalized words> <suffix>`, e.g. "123 Maple St" or "4500 N Lamar Blvd". */
export const STREET_ADDRESS = new RegExp(
  String.raw`\b\d{1,6}[ \t]+(?:[NSEW]\.?[ \t]+)?(?:[A-Z0-9][a-zA-Z0-9'-]*[ \t]+){1,3}(?:${STREET_SUFFIX})\b`,
  'g'
);

export function isStateCode(value: string): boolean {
  return STATE_CODES.has(value.toUpperCase());
}

function stripLeadingNoise(words: string[]): string[] {
  let i = 0;
  while (i < words.length && LEADING_NOISE.has((words[i] ?? '').toLowerCase().replace(/[^a-z]/g, ''))) i++;
  return words.slice(i);
}

/**
 * Canonical location form: `City, ST` when a state code is known, otherwise
 * `City`. "Austin, TX", "Austin TX" and "austin ,  tx" all become
 * "Austin, TX" (the city keeps its written casing; the state is uppercased).
 */
export function canonicalLocation(city: string, state?: string | null): string | null {
  let words = stripLeadingNoise(collapseWhitespace(city).split(' ').filter(Boolean));
  let st = state ? state.trim().toUpperCase() : '';
  if (!st && words.length > 1) {
    const last = words[words.length - 1] ?? '';
    if (/^[A-Z]{2}$/.test(last) && isStateCode(last)) {
      st = last;
      words = words.slice(0, -1);
    }
  }
  if (words.length === 0) return null;
  if (st && !isStateCode(st)) return null;
  const name = words.join(' ');
  return st ? `${name}, ${st}` : name;
}

/** Splits a canonical location into graph query parameters. */
export function splitLocation(location: string): { city: string; state: string | null } {
  const idx = location.lastIndexOf(',');
  if (idx < 0) return { city: collapseWhitespace(location), state: null };
  const state = location.slice(idx + 1).trim().toUpperCase();
  return { city: collapseWhitespace(location.slice(0, idx)), state: state || null };
}

function cleanName(raw: string, allowNoisePrefix: boolean): string | null {
  const words = collapseWhitespace(raw).split(' ').filter(Boolean);
  const kept = stripLeadingNoise(words);
  if (!allowNoisePrefix && kept.length !== words.length) return null;
  return kept.length > 0 ? kept.join(' ') : null;
}

const metric = (pattern: RegExp, canonical: string): ExtractionRow<EntityCategory> => ({
  key: 'metric',
  pattern,
  normalize: () => canonical,
});

/** Codes that are also ordinary words in capitals; these need the comma form ("Portland, OR"). */
const WORDLIKE_STATE_CODES = new Set(['OK', 'IN', 'ME', 'OR', 'HI', 'OH']);

const ENTITY_TABLE: readonly ExtractionRow<EntityCategory>[] = [
  {
    key: 'location',
    pattern: new RegExp(String.raw`\b(${CITY}),[ \t]*([A-Z]{2})\b`, 'g'),
    normalize: (m) => canonicalLocation(m[1] ?? '', m[2]),
  },
  {
    key: 'location',
    pattern: new RegExp(String.raw`\b(${CITY})[ \t]+([A-Z]{2})\b`, 'g'),
    normalize: (m) => {
      const code = m[2] ?? '';
      return isStateCode(code) && !WORDLIKE_STATE_CODES.has(code) ? canonicalLocation(m[1] ?? '', code) : null;
    },
  },
  {
    key: 'location',
    pattern: new RegExp(String.raw`\b(${CITY})[ \t]+(?:metro|area|county|market|Metro|Area|County|Market)\b`, 'g'),
    normalize: (m) => canonicalLocation(m[1] ?? ''),
  },
  {
    key: 'propertyId',
    pattern: STREET_ADDRESS,
    normalize: (m) => collapseWhitespace(m[0]),
  },
  {
    key: 'propertyId',
    pattern: /\b(?:property|listing)[ \t]+(?:id|#)[ \t]*[:#]?[ \t]*([A-Za-z0-9][A-Za-z0-9_-]*)/gi,
    normalize: (m) => m[1] ?? null,
  },
  {
    key: 'propertyId',
    pattern: /\bMLS[ \t]*(?:#|no\.?|number)?[ \t]*:?[ \t]*([A-Z0-9-]*\d[A-Z0-9-]*)\b/gi,
    normalize: (m) => m[1] ?? null,
  },
  metric(/\bmedian[ \t]+(?:sales?[ \t]+|home[ \t]+|listing[ \t]+)?price\b/gi, 'median_price'),
  metric(/\baverage[ \t]+(?:sales?[ \t]+|home[ \t]+|listing[ \t]+)?price\b/gi, 'average_price'),
  metric(/\bprice[ \t]+per[ \t]+(?:sqft|sq(?:uare)?\.?[ \t]*f(?:oo|ee)?t\.?)/gi, 'price_per_sqft'),
  metric(/\binventory(?:[ \t]+count)?\b/gi, 'inventory_count'),
  metric(/\bdays[ \t]+on[ \t]+(?:the[ \t]+)?market\b/gi, 'days_on_market'),
  metric(/\bmonths?[ \t]+(?:of[ \t]+)?supply\b/gi, 'months_supply'),
  metric(/\bsales?[ \t]+volume\b/gi, 'sales_volume'),
  metric(/\bnew[ \t]+listings\b/gi, 'new_listings'),
  metric(/\b(?:roi|return[ \t]+on[ \t]+investment)\b/gi, 'roi'),
  metric(/\bcash[ \t]+flow\b/gi, 'cash_flow'),
  metric(/\bcap(?:italization)?[ \t]+rate\b/gi, 'cap_rate'),
  metric(/\bappreciation\b/gi, 'appreciation'),
  metric(/\brent(?:al)?[ \t]+yield\b/gi, 'rental_yield'),
  metric(/\bvacancy[ \t]+rate\b/gi, 'vacancy_rate'),
  metric(/\bprice[ \t]+(?:change|growth|trend)s?\b/gi, 'price_change'),
  {
    key: 'agent',
    pattern: new RegExp(String.raw`\b(?:[Aa]gent|[Rr]ealtor|[Bb]roker)s?[ \t]+(?:(?:named|called)[ \t]+)?(${NAME})`, 'g'),
    normalize: (m) => cleanName(m[1] ?? '', false),
  },
  {
    key: 'agent',
    pattern: new RegExp(
      String.raw`\b([A-Z][a-z]+(?:[ \t]+[A-Z][a-z]+){1,3}),?[ \t]+(?:the[ \t]+|a[ \t]+|our[ \t]+)?(?:listing[ \t]+|buyer'?s?[ \t]+)?(?:agent|realtor|broker)\b`,
      'g'
    ),
    normalize: (m) => cleanName(m[1] ?? '', true),
  },
];

export function extractEntities(text: string): EntitySet {
  const buckets: Record<EntityCategory, string[]> = { location: [], propertyId: [], metric: [], agent: [] };
  for (const match of matchTable(ENTITY_TABLE, String(text ?? ''))) {
    buckets[match.key].push(match.value);
  }
  return Object.freeze({
    location: Object.freeze(dedupePreservingOrder(buckets.location)),
    propertyId: Object.freeze(dedupePreservingOrder(buckets.propertyId)),
    metric: Object.freeze(dedupePreservingOrder(buckets.metric)),
    agent: Object.freeze(dedupePreservingOrder(buckets.agent)),
  });
}

export function hasAnyEntity(entities: EntitySet): boolean {
  return entities.location.length > 0 || entities.propertyId.length > 0 || entities.metric.length > 0 || entities.agent.length > 0;
}
