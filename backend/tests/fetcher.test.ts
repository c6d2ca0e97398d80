import { after, before, test } from 'node:test';
import assert from 'node:assert';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { Fetcher, decodeBody, parseContentType } from '../core/fetcher.js';
import { FetchError } from '../core/errors.js';
import type { FetchErrorKind } from '../core/errors.js';

let server: Server;
let base = '';

function serve(): Promise<Server> {
  const srv = createServer((req, res) => {
    const hop = /^\/hop\/(\d+)$/.exec(req.url ?? '');
    if (hop) {
      const left = Number(hop[1]);
      if (left > 0) {
        res.writeHead(302, { Location: `/hop/${left - 1}` });
        res.end();
      } else {
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end('<p>arrived</p>');
      }
      return;
    }
    switch (req.url) {
      case '/ok':
        res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
        res.end('<html lang="en"><title>Grüße</title></html>');
        return;
      case '/latin1':
        res.writeHead(200, { 'Content-Type': 'text/html; charset=iso-8859-1' });
        res.end(Buffer.from([0x3c, 0x70, 0x3e, 0xe9, 0x3c, 0x2f, 0x70, 0x3e]));
        return;
      case '/moved':
        res.writeHead(301, { Location: '/ok' });
        res.end();
        return;
      case '/loop':
        res.writeHead(302, { Location: '/loop' });
        res.end();
        return;
      case '/json':
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end('{}');
        return;
      case '/big':
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end(`<p>${'x'.repeat(2000)}</p>`);
        return;
      case '/chunked':
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.write(`<p>${'x'.repeat(1000)}`);
        res.end(`${'y'.repeat(1000)}</p>`);
        return;
      case '/slow': {
        const timer = setTimeout(() => {
          res.writeHead(200, { 'Content-Type': 'text/html' });
          res.end('<p>late</p>');
        }, 500);
        res.on('close', () => clearTimeout(timer));
        return;
      }
      default:
        res.writeHead(404, { 'Content-Type': 'text/html' });
        res.end('<p>not found</p>');
    }
  });
  return new Promise((resolve) => srv.listen(0, '127.0.0.1', () => resolve(srv)));
}

before(async () => {
  server = await serve();
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server has no port');
  base = `http://127.0.0.1:${addr.port}`;
});

after(() => {
  server.closeAllConnections();
  server.close();
});

function kind(expected: FetchErrorKind) {
  return (e: unknown) => e instanceof FetchError && e.kind === expected;
}

test('fetches and decodes html', async () => {
  const doc = await new Fetcher().fetch(`${base}/ok`);
  assert.strictEqual(doc.status, 200);
  assert.strictEqual(doc.text, '<html lang="en"><title>Grüße</title></html>');
  assert.strictEqual(doc.contentType, 'text/html; charset=utf-8');
  assert.strictEqual(doc.bytes, Buffer.byteLength(doc.text));
});

test('honours the declared charset', async () => {
  const doc = await new Fetcher().fetch(`${base}/latin1`);
  assert.strictEqual(doc.text, '<p>é</p>');
});

test('follows redirects within the bound', async () => {
  const doc = await new Fetcher().fetch(`${base}/moved`);
  assert.strictEqual(doc.url, `${base}/moved`);
  assert.strictEqual(doc.finalUrl, `${base}/ok`);
});

test('redirect loop stops at maxRedirects', async () => {
  await assert.rejects(new Fetcher({ maxRedirects: 2 }).fetch(`${base}/loop`), kind('TooManyRedirects'));
});

test('default redirect bound allows five hops, not six', async () => {
  const fetcher = new Fetcher();
  assert.strictEqual(fetcher.config.maxRedirects, 5);
  const doc = await fetcher.fetch(`${base}/hop/5`);
  assert.strictEqual(doc.finalUrl, `${base}/hop/0`);
  assert.strictEqual(doc.text, '<p>arrived</p>');
  await assert.rejects(fetcher.fetch(`${base}/hop/6`), kind('TooManyRedirects'));
});

test('non-2xx is an HTTP status error', async () => {
  await assert.rejects(
    new Fetcher().fetch(`${base}/missing`),
    (e: unknown) => e instanceof FetchError && e.kind === 'HTTPStatusError' && e.status === 404 && e.message === 'HTTP 404: Not Found',
  );
});

test('non-html content type is rejected', async () => {
  await assert.rejects(new Fetcher().fetch(`${base}/json`), {
    message: 'Invalid content type: application/json. Expected text/html',
  });
});

test('body over maxBytes is too large', async () => {
  await assert.rejects(new Fetcher({ maxBytes: 1000 }).fetch(`${base}/big`), {
    message: 'Content too large: more than 1000 bytes',
  });
  await assert.rejects(new Fetcher({ maxBytes: 1000 }).fetch(`${base}/chunked`), kind('ContentTooLarge'));
});

test('slow server times out', async () => {
  await assert.rejects(new Fetcher({ timeoutMs: 50 }).fetch(`${base}/slow`), {
    message: 'Request timeout after 0.05 seconds',
  });
});

test('caller abort is a network error', async () => {
  const ctl = new AbortController();
  ctl.abort();
  await assert.rejects(new Fetcher().fetch(`${base}/ok`, { signal: ctl.signal }), {
    message: 'Request aborted',
  });
});

test('unsupported scheme and bad URL', async () => {
  await assert.rejects(new Fetcher().fetch('ftp://example.test/'), {
    message: 'Unsupported URL scheme: ftp:',
  });
  await assert.rejects(new Fetcher().fetch('not a url'), kind('NetworkError'));
});

test('content-type parsing', () => {
  assert.deepStrictEqual(parseContentType('Text/HTML; Charset="UTF-8"'), { mediaType: 'text/html', charset: 'utf-8' });
  assert.deepStrictEqual(parseContentType('application/xhtml+xml'), { mediaType: 'application/xhtml+xml' });
});

test('unknown charset falls back to utf-8', () => {
  assert.strictEqual(decodeBody(new TextEncoder().encode('ok'), 'x-no-such-charset'), 'ok');
});
