import test from 'node:test';
import assert from 'node:assert/strict';
import { analyzeIntent, classifyIntent, INTENT_PRECEDENCE } from '../src/core/retrieval/classifier';

test('relationship question about a listing agent', () => {
  const res = analyzeIntent('Who is the listing agent for 123 Maple St?');
  assert.equal(res.intent, 'relationship_query');
  assert.equal(res.scores.relationship_query, 2);
  assert.deepEqual(res.tied, []);
});

test('median price question is a factual lookup', () => {
  const res = analyzeIntent('What is the median price in Dallas, TX?');
  assert.equal(res.intent, 'factual_lookup');
  assert.equal(res.scores.factual_lookup, 3);
});

test('should-I-invest question is investment analysis', () => {
  assert.equal(classifyIntent('Should I invest in Austin real estate?'), 'investment_analysis');
});

test('descriptive question is semantic analysis', () => {
  assert.equal(classifyIntent('Tell me about market trends in Denver'), 'semantic_analysis');
});

test('comparison question is comparative analysis', () => {
  assert.equal(classifyIntent('Compare Austin, TX versus Dallas, TX'), 'comparative_analysis');
});

test('ties resolve by fixed precedence and are reported', () => {
  const res = analyzeIntent('compare roi');
  assert.equal(res.scores.investment_analysis, 1);
  assert.equal(res.scores.comparative_analysis, 1);
  assert.equal(res.intent, 'investment_analysis');
  assert.deepEqual(res.tied, ['investment_analysis', 'comparative_analysis']);
});

test('nothing matching falls back to general', () => {
  const res = analyzeIntent('hello there');
  assert.equal(res.intent, 'general');
  assert.deepEqual(res.tied, []);
  assert.equal(classifyIntent(''), 'general');
});

test('precedence lists general last', () => {
  assert.equal(INTENT_PRECEDENCE[INTENT_PRECEDENCE.length - 1], 'general');
});

test('classification is case and whitespace insensitive', () => {
  assert.equal(classifyIntent('WHO   IS THE AGENT for this house'), classifyIntent('who is the agent for this house'));
});
