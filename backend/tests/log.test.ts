import { test } from 'node:test';
import assert from 'node:assert';
import { createLogger, isLogLevel } from '../core/log.js';

test('writes JSON lines at or above the level', (t) => {
  const out = t.mock.method(console, 'log', () => {});
  const err = t.mock.method(console, 'error', () => {});
  const log = createLogger('info');
  log({ level: 'debug', msg: 'hidden' });
  log({ level: 'info', module: 'fetcher', url: 'https://example.test/', msg: 'fetch-start' });
  log({ level: 'error', msg: 'scan-failed', error: 'boom' });

  assert.strictEqual(out.mock.callCount(), 1);
  assert.strictEqual(err.mock.callCount(), 1);
  const line = JSON.parse(String(out.mock.calls[0].arguments[0]));
  assert.strictEqual(line.msg, 'fetch-start');
  assert.strictEqual(line.module, 'fetcher');
  assert.strictEqual(typeof line.time, 'string');
  assert.strictEqual(JSON.parse(String(err.mock.calls[0].arguments[0])).error, 'boom');
});

test('isLogLevel', () => {
  assert.ok(isLogLevel('warn'));
  assert.ok(!isLogLevel('trace'));
});
