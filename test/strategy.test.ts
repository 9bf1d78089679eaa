import test from 'node:test';
import assert from 'node:assert/strict';
import { explainStrategy, hasStructuredFilters, selectStrategy, STRATEGY_RULES } from '../src/core/retrieval/strategy';
import { EMPTY_ENTITY_SET, type EntitySet } from '../src/core/retrieval/types';

const located: EntitySet = { ...EMPTY_ENTITY_SET, location: ['Dallas, TX'] };

test('relationship queries go to the graph only', () => {
  assert.equal(selectStrategy('relationship_query', EMPTY_ENTITY_SET, false), 'graph_only');
});

test('factual lookups with a location go to the graph only', () => {
  const rule = explainStrategy('factual_lookup', located, false);
  assert.equal(rule.name, 'located_fact');
  assert.equal(rule.strategy, 'graph_only');
});

test('factual lookups without a location fall back to hybrid', () => {
  const rule = explainStrategy('factual_lookup', EMPTY_ENTITY_SET, false);
  assert.equal(rule.name, 'fallback');
  assert.equal(rule.strategy, 'hybrid');
});

test('comparative and investment analysis are hybrid, semantic is vector only', () => {
  assert.equal(selectStrategy('comparative_analysis', located, false), 'hybrid');
  assert.equal(selectStrategy('investment_analysis', EMPTY_ENTITY_SET, false), 'hybrid');
  assert.equal(selectStrategy('semantic_analysis', located, false), 'vector_only');
  assert.equal(selectStrategy('general', EMPTY_ENTITY_SET, false), 'hybrid');
});

test('structured filters do not change the chosen strategy', () => {
  assert.equal(selectStrategy('semantic_analysis', EMPTY_ENTITY_SET, true), 'vector_only');
  assert.equal(selectStrategy('relationship_query', EMPTY_ENTITY_SET, true), 'graph_only');
});

test('the rule table ends in an unconditional fallback', () => {
  const last = STRATEGY_RULES[STRATEGY_RULES.length - 1];
  assert.equal(last?.name, 'fallback');
});

test('hasStructuredFilters looks at type and price bounds only', () => {
  assert.equal(hasStructuredFilters(undefined), false);
  assert.equal(hasStructuredFilters({}), false);
  assert.equal(hasStructuredFilters({ propertyType: '' }), false);
  assert.equal(hasStructuredFilters({ propertyType: 'condo' }), true);
  assert.equal(hasStructuredFilters({ minPrice: 0 }), true);
  assert.equal(hasStructuredFilters({ maxPrice: 500000 }), true);
});
