import { test } from 'node:test';
import assert from 'node:assert';
import mod, { outline, outlineIssues } from '../modules/headings-outline/index.js';
import { parseDocument } from '../src/dom/document.js';

const run = (html: string) => mod.evaluate(parseDocument(html));

test('h1 then h3 warns about the skipped level', () => {
  const findings = run('<h1>Shop</h1><h3>Details</h3>');
  assert.strictEqual(findings.length, 1);
  const [f] = findings;
  assert.strictEqual(f.severity, 'warning');
  assert.strictEqual(f.count, 1);
  assert.strictEqual(f.message, "Heading hierarchy has 1 issue: Skipped from h1 to h3 at heading: 'Details'");
  assert.strictEqual(f.element, '<h3>Details</h3>');
});

test('h1, h2, h3 passes', () => {
  const findings = run('<h1>a</h1><h2>b</h2><h3>c</h3>');
  assert.strictEqual(findings.length, 1);
  assert.strictEqual(findings[0].severity, 'pass');
  assert.strictEqual(findings[0].message, 'Heading hierarchy is correct (3 headings)');
});

test('climbing back up is fine', () => {
  const [f] = run('<h1>a</h1><h2>b</h2><h3>c</h3><h2>d</h2><h3>e</h3>');
  assert.strictEqual(f.severity, 'pass');
});

test('outline must open with h1', () => {
  const nodes = outline(parseDocument('<h2>Intro</h2><h4>Deep</h4>').headings);
  assert.deepStrictEqual(
    outlineIssues(nodes).map((i) => i.description),
    ['First heading is h2, should start with h1', "Skipped from h2 to h4 at heading: 'Deep'"],
  );
  const [f] = run('<h2>Intro</h2><h4>Deep</h4>');
  assert.strictEqual(f.count, 2);
});

test('no headings passes', () => {
  const [f] = run('<p>flat</p>');
  assert.strictEqual(f.severity, 'pass');
  assert.strictEqual(f.message, 'No heading elements found on page');
});
