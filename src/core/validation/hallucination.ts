import type {
  IssueKind,
  IssueSeverity,
  RankedResults,
  SearchResult,
  ValidationIssue,
  ValidationOutcome,
  ValidationScores,
} from '../retrieval/types';
import { extractEntities, splitLocation } from '../retrieval/entities';
import { CLAIM_SEVERITY, EvidenceIndex, extractClaims } from './claims';

export interface ValidatorOptions {
  /** Minimum confidence for an answer to pass. */
  threshold: number;
  /** Unsupported claims at or above this severity fail the answer outright. */
  severityCutoff: IssueSeverity;
  /** Fewer evidence results than this counts as thin evidence. */
  thinEvidenceCount: number;
  /** Unsupported locations and property types tolerated before drift is flagged. */
  maxUnsupportedEntities: number;
}

export const DEFAULT_VALIDATOR_OPTIONS: Readonly<ValidatorOptions> = {
  threshold: 0.7,
  severityCutoff: 'medium',
  thinEvidenceCount: 3,
  maxUnsupportedEntities: 1,
};

export type EvidenceItem = Pick<SearchResult, 'content'> & Partial<Pick<SearchResult, 'metadata'>>;
export type Evidence = readonly EvidenceItem[] | Pick<RankedResults, 'results'>;

const SEVERITY_RANK: Readonly<Record<IssueSeverity, number>> = { low: 0, medium: 1, high: 2 };
const KIND_ORDER: Readonly<Record<IssueKind, number>> = { unsupported_claim: 0, entity_drift: 1, ungrounded_language: 2 };

const GROUNDING_PHRASES =
  /\b(?:based\s+on|according\s+to|the\s+(?:data|records?|listing|evidence)\s+(?:shows?|indicates?|lists?)|as\s+of|per\s+the|sources?\s+(?:show|indicate))\b/gi;
const VAGUE_QUANTIFIERS = /\b(?:typically|usually|generally|most|many|often|probably|likely|approximately|roughly)\b/gi;

const GROUNDING_BASE = 0.6;
const GROUNDING_STEP = 0.2;
const GROUNDING_MAX_BONUS = 0.4;
const VAGUE_STEP = 0.1;
const VAGUE_MAX_PENALTY = 0.4;
const DRIFT_STEP = 0.25;

// Matched against case-folded text.
const PROPERTY_TYPES: readonly RegExp[] = [
  /\bsingle[\s-]famil(?:y|ies)\b/,
  /\bmulti[\s-]famil(?:y|ies)\b/,
  /\bcondo(?:minium)?s?\b/,
  /\btown\s?(?:house|home)s?\b/,
  /\bduplex(?:es)?\b/,
  /\bapartments?\b/,
  /\bmobile\s+homes?\b/,
  /\bvacant\s+(?:land|lots?)\b/,
  /\bcommercial\b/,
];

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

function isEvidenceList(evidence: Evidence): evidence is readonly EvidenceItem[] {
  return Array.isArray(evidence);
}

function evidenceItems(evidence: Evidence): readonly EvidenceItem[] {
  return isEvidenceList(evidence) ? evidence : evidence.results;
}

function scoreGrounding(text: string, thinEvidence: boolean, issues: ValidationIssue[]): number {
  const groundingHits = [...text.matchAll(GROUNDING_PHRASES)].length;
  let score = GROUNDING_BASE + Math.min(GROUNDING_MAX_BONUS, GROUNDING_STEP * groundingHits);
  if (thinEvidence) {
    const vague = [...text.matchAll(VAGUE_QUANTIFIERS)];
    for (const m of vague) {
      issues.push({ kind: 'ungrounded_language', span: m[0], severity: 'low', index: m.index ?? 0 });
    }
    score -= Math.min(VAGUE_MAX_PENALTY, VAGUE_STEP * vague.length);
  }
  return clamp01(score);
}

function scoreEntityConsistency(
  text: string,
  index: EvidenceIndex,
  allowance: number,
  issues: ValidationIssue[]
): number {
  const lowered = text.toLowerCase();
  const unsupported: { span: string; index: number }[] = [];

  for (const location of extractEntities(text).location) {
    const { city } = splitLocation(location);
    if (!index.contains(city)) unsupported.push({ span: location, index: Math.max(0, lowered.indexOf(city.toLowerCase())) });
  }
  for (const pattern of PROPERTY_TYPES) {
    const m = pattern.exec(lowered);
    if (m && !index.contains(m[0])) unsupported.push({ span: text.slice(m.index, m.index + m[0].length), index: m.index });
  }

  if (unsupported.length <= allowance) return 1;
  for (const u of unsupported) issues.push({ kind: 'entity_drift', span: u.span, severity: 'medium', index: u.index });
  return clamp01(1 - DRIFT_STEP * (unsupported.length - allowance));
}

/**
 * Checks a generated answer against the evidence it was generated from.
 *
 * Three sub-scores are averaged into `confidence`: the share of factual
 * claims found in the evidence, the use of grounding language (vague
 * quantifiers are penalized only when evidence is thin) and entity
 * consistency. Pure and synchronous.
 */
export function validateResponse(
  generatedText: string,
  evidence: Evidence,
  options: Partial<ValidatorOptions> = {}
): ValidationOutcome {
  const opts: ValidatorOptions = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
  const text = String(generatedText ?? '');
  const items = evidenceItems(evidence);
  const index = new EvidenceIndex(items);
  const issues: ValidationIssue[] = [];

  const claims = extractClaims(text);
  let supported = 0;
  for (const claim of claims) {
    if (index.supports(claim)) {
      supported += 1;
      continue;
    }
    issues.push({ kind: 'unsupported_claim', span: claim.span, severity: CLAIM_SEVERITY[claim.kind], index: claim.index });
  }

  const scores: ValidationScores = {
    factualAccuracy: claims.length === 0 ? 1 : supported / claims.length,
    grounding: scoreGrounding(text, items.length < opts.thinEvidenceCount, issues),
    entityConsistency: scoreEntityConsistency(text, index, opts.maxUnsupportedEntities, issues),
  };
  const confidence = clamp01((scores.factualAccuracy + scores.grounding + scores.entityConsistency) / 3);

  const cutoff = SEVERITY_RANK[opts.severityCutoff];
  const blocking = issues.some((i) => i.kind === 'unsupported_claim' && SEVERITY_RANK[i.severity] >= cutoff);

  issues.sort((a, b) => a.index - b.index || KIND_ORDER[a.kind] - KIND_ORDER[b.kind]);
  return { passed: confidence >= opts.threshold && !blocking, confidence, issues, scores };
}
