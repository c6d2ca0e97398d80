import { test } from 'node:test';
import assert from 'node:assert';
import { computeScore, roundToTenth, summarize } from '../core/score.js';
import { runRules } from '../core/engine.js';
import { defaultCatalogue } from '../core/registry.js';
import { parseDocument } from '../src/dom/document.js';
import { SAMPLE_PAGE } from './fixtures.js';

test('no checks scores 100', () => {
  assert.strictEqual(computeScore(0, 0, 0), 100);
  assert.deepStrictEqual(summarize([]), {
    score: 100,
    totalChecks: 0,
    passedChecks: 0,
    warnings: 0,
    failures: 0,
    perceivableIssues: 0,
    operableIssues: 0,
    understandableIssues: 0,
    robustIssues: 0,
  });
});

test('warnings earn half credit', () => {
  assert.strictEqual(computeScore(5, 2, 10), 60);
  assert.strictEqual(computeScore(2, 1, 3), 83.3);
  assert.strictEqual(computeScore(0, 0, 4), 0);
  assert.strictEqual(computeScore(4, 0, 4), 100);
});

test('exact ties round to even', () => {
  assert.strictEqual(roundToTenth(62.25), 62.2);
  assert.strictEqual(roundToTenth(62.75), 62.8);
  assert.strictEqual(computeScore(1, 1, 8), 18.8);
});

test('summary of the sample page', () => {
  const summary = summarize(runRules(defaultCatalogue(), parseDocument(SAMPLE_PAGE)));
  assert.deepStrictEqual(summary, {
    score: 70,
    totalChecks: 10,
    passedChecks: 6,
    warnings: 2,
    failures: 2,
    perceivableIssues: 1,
    operableIssues: 1,
    understandableIssues: 1,
    robustIssues: 1,
  });
  assert.strictEqual(summary.passedChecks + summary.warnings + summary.failures, summary.totalChecks);
});
