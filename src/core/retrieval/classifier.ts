import type { IntentLabel } from './types';
import { scoreTable, type PatternRow } from './matcher';

/**
 * Tie-break precedence, highest first. A label earlier in this list wins any
 * tie with a label later in it; `general` is only returned when nothing
 * scores.
 */
export const INTENT_PRECEDENCE: readonly IntentLabel[] = [
  'relationship_query',
  'factual_lookup',
  'investment_analysis',
  'comparative_analysis',
  'semantic_analysis',
  'general',
];

const row = (key: IntentLabel, pattern: RegExp): PatternRow<IntentLabel> => ({ key, pattern });

// Evaluated against case-folded text; each row counts once per query.
const INTENT_TABLE: readonly PatternRow<IntentLabel>[] = [
  row('relationship_query', /\bwho\s+(?:is|are|was)\s+(?:the\s+)?(?:listing\s+|buyer'?s?\s+)?(?:agent|broker|realtor)s?\b/),
  row('relationship_query', /\bwhich\s+(?:agent|office|company|brokerage|broker)s?\b/),
  row('relationship_query', /\b(?:agent|broker|realtor)s?\s+(?:for|of|on)\b/),
  row('relationship_query', /\b(?:listing|listed)\s+(?:by|with)\b/),
  row('relationship_query', /\b(?:contact|phone|email)\s+(?:info(?:rmation)?\s+)?(?:for|of)\b/),
  row('relationship_query', /\b(?:represents?|represented|affiliated\s+with)\b/),

  row('factual_lookup', /\bwhat\s+(?:is|are|was|were)\s+(?:the\s+)?(?:median|average|mean|current|latest|typical)\b/),
  row('factual_lookup', /\bhow\s+(?:much|many)\b/),
  row('factual_lookup', /\b(?:price|cost|value)\s+(?:of|for|in)\b/),
  row('factual_lookup', /\b(?:current|latest)\s+(?:price|inventory|count|listings?)\b/),
  row('factual_lookup', /\btell\s+me\s+(?:the\s+)?(?:median|average|current)\b/),
  row('factual_lookup', /\b(?:median|average)\s+(?:sales?\s+|home\s+|listing\s+)?(?:price|rent|days)\b/),

  row('investment_analysis', /\bshould\s+i\s+(?:buy|invest|purchase)\b/),
  row('investment_analysis', /\b(?:roi|return\s+on\s+investment|cash\s+flow|cap\s+rate|investment\s+potential)\b/),
  row('investment_analysis', /\b(?:profitable|worth\s+it|good\s+(?:deal|investment))\b/),
  row('investment_analysis', /\b(?:rental|investment)\s+propert(?:y|ies)\b/),
  row('investment_analysis', /\binvest(?:ing)?\s+in\b/),

  row('comparative_analysis', /\bcompar(?:e|ing|ison)\b/),
  row('comparative_analysis', /\b(?:vs\.?|versus)\s/),
  row('comparative_analysis', /\bdifferences?\s+between\b/),
  row('comparative_analysis', /\b(?:better|best)\s+(?:investment|buy|choice|option|place|market)\b/),
  row('comparative_analysis', /\bpros\s+and\s+cons\b/),
  row('comparative_analysis', /\bwhich\s+(?:is\s+)?(?:better|best|cheaper|preferred)\b/),

  row('semantic_analysis', /\b(?:tell\s+me\s+about|describe|explain)\b/),
  row('semantic_analysis', /\b(?:overview|summary|analysis)\s+(?:of|for)\b/),
  row('semantic_analysis', /\b(?:trends?|conditions|outlook|forecast)\b/),
  row('semantic_analysis', /\b(?:insights?|recommendations?|advice)\b/),
  row('semantic_analysis', /\b(?:what\s+do\s+you\s+think|opinion)\b/),
  row('semantic_analysis', /\b(?:neighbou?rhood|community)\s+(?:feel|vibe|character)\b/),
];

export interface IntentAnalysis {
  intent: IntentLabel;
  scores: Record<IntentLabel, number>;
  /** Labels that shared the top score before the tie-break; empty when the win was clear. */
  tied: IntentLabel[];
}

export function analyzeIntent(text: string): IntentAnalysis {
  const q = String(text ?? '').toLowerCase().replace(/\s+/g, ' ').trim();
  const counts = scoreTable(INTENT_TABLE, q);
  const scores: Record<IntentLabel, number> = {
    relationship_query: counts.get('relationship_query') ?? 0,
    factual_lookup: counts.get('factual_lookup') ?? 0,
    investment_analysis: counts.get('investment_analysis') ?? 0,
    comparative_analysis: counts.get('comparative_analysis') ?? 0,
    semantic_analysis: counts.get('semantic_analysis') ?? 0,
    general: 0,
  };

  const top = Math.max(...INTENT_PRECEDENCE.map((label) => scores[label]));
  if (top <= 0) return { intent: 'general', scores, tied: [] };

  const leaders = INTENT_PRECEDENCE.filter((label) => scores[label] === top);
  const intent = leaders[0] ?? 'general';
  return { intent, scores, tied: leaders.length > 1 ? leaders : [] };
}

export function classifyIntent(text: string): IntentLabel {
  return analyzeIntent(text).intent;
}
