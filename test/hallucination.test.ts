import test from 'node:test';
import assert from 'node:assert/strict';
import { validateResponse } from '../src/core/validation/hallucination';
import { EvidenceIndex, extractClaims, numericForms } from '../src/core/validation/claims';
import { fuseResults } from '../src/core/retrieval/fuser';

const MAPLE = [{ content: '123 Maple St: 3 bedroom, 2 bath single-family home, 1850 sqft, list price $425,000.' }];

test('an invented price fails validation with one high-severity issue', () => {
  const outcome = validateResponse('The home sold for $999,999,999.', [{ content: 'Median price in Dallas, TX was $350,000 in 2024.' }]);
  assert.equal(outcome.passed, false);
  assert.deepEqual(outcome.issues, [{ kind: 'unsupported_claim', span: '$999,999,999', severity: 'high', index: 18 }]);
  assert.equal(outcome.scores.factualAccuracy, 0);
  assert.ok(Math.abs(outcome.confidence - 1.6 / 3) < 1e-9);
});

test('claims restated in other units and spellings are supported', () => {
  const outcome = validateResponse('Based on the listing, 123 Maple St has 3 beds and 1,850 sq ft, listed at $425,000.', MAPLE);
  assert.deepEqual(outcome.issues, []);
  assert.equal(outcome.passed, true);
  assert.equal(outcome.scores.factualAccuracy, 1);
  assert.ok(Math.abs(outcome.scores.grounding - 0.8) < 1e-9);
  assert.equal(outcome.scores.entityConsistency, 1);
});

test('abbreviated amounts match their expanded value', () => {
  const outcome = validateResponse('It is listed at $1.2M.', [{ content: 'List price: $1,200,000' }]);
  assert.equal(outcome.scores.factualAccuracy, 1);
});

test('vague quantifiers are flagged only when evidence is thin', () => {
  const thin = validateResponse('Homes typically sell fast.', []);
  assert.deepEqual(thin.issues, [{ kind: 'ungrounded_language', span: 'typically', severity: 'low', index: 6 }]);
  assert.ok(Math.abs(thin.scores.grounding - 0.5) < 1e-9);
  assert.equal(thin.passed, true);

  const ample = validateResponse('Homes typically sell fast.', [{ content: 'a' }, { content: 'b' }, { content: 'c' }]);
  assert.deepEqual(ample.issues, []);
  assert.equal(ample.scores.grounding, 0.6);
});

test('locations and property types missing from the evidence count as drift', () => {
  const outcome = validateResponse('Condos in Miami, FL and townhouses in Tampa, FL are popular.', [{ content: 'Dallas market report' }]);
  assert.deepEqual(
    outcome.issues.map((i) => [i.kind, i.span]),
    [
      ['entity_drift', 'Condos'],
      ['entity_drift', 'Miami, FL'],
      ['entity_drift', 'townhouses'],
      ['entity_drift', 'Tampa, FL'],
    ]
  );
  assert.equal(outcome.scores.entityConsistency, 0.25);
  assert.equal(outcome.passed, false);
});

test('low-severity unsupported claims only block at a low cutoff', () => {
  const evidence = [{ content: 'Listing record A' }, { content: 'Listing record B' }, { content: 'Listing record C' }];
  const text = 'Listed on March 3, 2024.';
  const lenient = validateResponse(text, evidence, { threshold: 0.5 });
  assert.deepEqual(lenient.issues, [{ kind: 'unsupported_claim', span: 'March 3, 2024', severity: 'low', index: 10 }]);
  assert.equal(lenient.passed, true);
  assert.equal(validateResponse(text, evidence, { threshold: 0.5, severityCutoff: 'low' }).passed, false);
});

test('ranked results and their metadata serve as evidence', () => {
  const results = fuseResults(
    [{ id: 'md-1', source: 'vector', content: 'Dallas market', score: 0.9, metadata: { median_price: 350000 } }],
    [],
    { vectorWeight: 1, graphWeight: 0 }
  );
  const outcome = validateResponse('The median price is $350,000.', { results });
  assert.equal(outcome.passed, true);
  assert.equal(outcome.scores.factualAccuracy, 1);
});

test('validation is pure', () => {
  const text = 'Based on the listing, 123 Maple St has 3 beds.';
  assert.deepEqual(validateResponse(text, MAPLE), validateResponse(text, MAPLE));
});

test('claim extraction prefers the earliest, longest span', () => {
  assert.deepEqual(
    extractClaims('A 2,100 sq ft home at 8 Elm Ct sold for $510,000, up 4.5%.').map((c) => [c.kind, c.span]),
    [
      ['sqft', '2,100 sq ft'],
      ['address', '8 Elm Ct'],
      ['currency', '$510,000'],
      ['percent', '4.5%'],
    ]
  );
});

test('numeric forms and evidence lookups', () => {
  assert.deepEqual(numericForms({ kind: 'currency', span: '$350K', index: 0 }), ['350000']);
  assert.deepEqual(numericForms({ kind: 'percent', span: '4.5%', index: 0 }), ['4.5']);
  const index = new EvidenceIndex([{ content: 'Two-bedroom condo with 2 baths' }]);
  assert.equal(index.contains('two bedroom'), true);
  assert.equal(index.supports({ kind: 'bedBath', span: '2 bathrooms', index: 0 }), true);
  assert.equal(index.supports({ kind: 'address', span: '9 Pine Rd', index: 0 }), false);
});

test('numbers only support claims of the same kind', () => {
  const outcome = validateResponse('Prices rose 7% this year and the home is worth $450 million.', [
    { content: '123 Maple St: 3 bedroom home, 450 sqft garage, listed 2024-07-15.' },
  ]);
  assert.equal(outcome.passed, false);
  assert.deepEqual(
    outcome.issues.map((i) => [i.kind, i.span, i.severity]),
    [
      ['unsupported_claim', '7%', 'high'],
      ['unsupported_claim', '$450 million', 'high'],
    ]
  );
  assert.equal(outcome.scores.factualAccuracy, 0);
});

test('a scaled amount does not match its bare digits', () => {
  const outcome = validateResponse('The median is $3.5B.', [{ content: 'Months of supply: 3.5' }]);
  assert.equal(outcome.passed, false);
  assert.deepEqual(outcome.issues, [{ kind: 'unsupported_claim', span: '$3.5B', severity: 'high', index: 14 }]);
});

test('square footage needs a square-footage figure in the evidence', () => {
  const index = new EvidenceIndex([{ content: 'Listed 2024-07-15 at $1,850 with 1,200 sqft.' }]);
  assert.equal(index.supports({ kind: 'sqft', span: '1,200 sq ft', index: 0 }), true);
  assert.equal(index.supports({ kind: 'sqft', span: '1,850 sq ft', index: 0 }), false);
  assert.equal(index.supports({ kind: 'percent', span: '15%', index: 0 }), false);
  assert.equal(index.supports({ kind: 'currency', span: '$1,850', index: 0 }), true);
});

test('typed metadata fields count as figures of their kind', () => {
  const index = new EvidenceIndex([
    { content: 'Austin market', metadata: { median_price: 410000, price_change_pct: 3.2, inventory_count: 7 } },
  ]);
  assert.equal(index.supports({ kind: 'currency', span: '$410,000', index: 0 }), true);
  assert.equal(index.supports({ kind: 'percent', span: '3.2%', index: 0 }), true);
  assert.equal(index.supports({ kind: 'percent', span: '7%', index: 0 }), false);
});
