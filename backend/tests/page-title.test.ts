import { test } from 'node:test';
import assert from 'node:assert';
import mod from '../modules/page-title/index.js';
import { parseDocument } from '../src/dom/document.js';

function one(html: string) {
  const findings = mod.evaluate(parseDocument(html));
  assert.strictEqual(findings.length, 1);
  return findings[0];
}

test('missing title', () => {
  const f = one('<html><body></body></html>');
  assert.strictEqual(f.severity, 'fail');
  assert.strictEqual(f.message, 'Page has no <title> element');
});

test('whitespace-only title counts as empty', () => {
  const f = one('<title>   </title>');
  assert.strictEqual(f.severity, 'fail');
  assert.strictEqual(f.message, 'Page title is empty');
});

test('very short title warns', () => {
  const f = one('<title>Hi</title>');
  assert.strictEqual(f.severity, 'warning');
  assert.strictEqual(f.message, "Page title is very short: 'Hi'");
  assert.strictEqual(f.element, '<title>Hi</title>');
});

test('descriptive title passes', () => {
  const f = one('<title> Welcome home </title>');
  assert.strictEqual(f.severity, 'pass');
  assert.strictEqual(f.message, "Page has title: 'Welcome home'");
});

test('title length counts characters, not code units', () => {
  const f = one('<title>😀😀</title>');
  assert.strictEqual(f.severity, 'warning');
  assert.strictEqual(f.message, "Page title is very short: '😀😀'");
  assert.strictEqual(one('<title>😀😀😀</title>').severity, 'pass');
});
