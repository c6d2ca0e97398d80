import fetch, { AbortError, FetchError as HttpFetchError } from 'node-fetch';
import { FetchError, errorMessage } from './errors.js';
import { silentLogger } from './log.js';
import type { FetchConfig, LogFn } from './types.js';

export const DEFAULT_FETCH_CONFIG: FetchConfig = {
  timeoutMs: 10_000,
  maxRedirects: 5,
  maxBytes: 5 * 1024 * 1024,
  userAgent: 'a11y-scan/1.0 (WCAG Accessibility Checker)',
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  acceptLanguage: 'en-US,en;q=0.9,de;q=0.8',
};

const HTML_MEDIA_TYPES = new Set(['text/html', 'application/xhtml+xml']);

export interface FetchedDocument {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  bytes: number;
  text: string;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

export function parseContentType(header: string): { mediaType: string; charset?: string } {
  const [type, ...params] = header.split(';');
  const mediaType = type.trim().toLowerCase();
  for (const p of params) {
    const m = p.trim().match(/^charset\s*=\s*"?([^";]+)"?$/i);
    if (m) return { mediaType, charset: m[1].trim().toLowerCase() };
  }
  return { mediaType };
}

export function decodeBody(buf: Uint8Array, charset?: string): string {
  if (charset) {
    try {
      return new TextDecoder(charset).decode(buf);
    } catch (e) {
      if (!(e instanceof RangeError)) throw e;
    }
  }
  return new TextDecoder('utf-8').decode(buf);
}

function tooLarge(url: string, maxBytes: number, cause?: unknown): FetchError {
  return new FetchError('ContentTooLarge', url, `Content too large: more than ${maxBytes} bytes`, { cause });
}

/**
 * Single-shot HTML fetcher. Every limit is taken from the config value it
 * was built with; nothing is shared between calls.
 */
export class Fetcher {
  readonly config: FetchConfig;

  constructor(
    config: Partial<FetchConfig> = {},
    private readonly log: LogFn = silentLogger,
  ) {
    this.config = { ...DEFAULT_FETCH_CONFIG, ...config };
  }

  async fetch(url: string, opts: FetchOptions = {}): Promise<FetchedDocument> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    const started = Date.now();
    this.log({ level: 'info', module: 'fetcher', url, msg: 'fetch-start' });
    try {
      const doc = await this.exchange(url, controller.signal);
      this.log({
        level: 'info',
        module: 'fetcher',
        url,
        msg: 'fetch-finished',
        elapsed: Date.now() - started,
        status: doc.status,
        bytes: doc.bytes,
      });
      return doc;
    } catch (e) {
      const err = this.classify(e, url, timedOut);
      this.log({ level: 'error', module: 'fetcher', url, msg: 'fetch-failed', elapsed: Date.now() - started, kind: err.kind, error: err.message });
      throw err;
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onAbort);
      // releases the socket when the body was never read
      controller.abort();
    }
  }

  private async exchange(url: string, signal: AbortSignal): Promise<FetchedDocument> {
    const { maxBytes, maxRedirects } = this.config;
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (e) {
      throw new FetchError('NetworkError', url, `Invalid URL: ${url}`, { cause: e });
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new FetchError('NetworkError', url, `Unsupported URL scheme: ${parsed.protocol}`);
    }

    const res = await fetch(parsed.href, {
      method: 'GET',
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: this.config.accept,
        'Accept-Language': this.config.acceptLanguage,
      },
      redirect: 'follow',
      follow: maxRedirects,
      size: maxBytes,
      signal,
    });

    if (!res.ok) {
      throw new FetchError('HTTPStatusError', url, `HTTP ${res.status}: ${res.statusText}`, { status: res.status });
    }

    const contentType = res.headers.get('content-type') ?? '';
    const { mediaType, charset } = parseContentType(contentType);
    if (!HTML_MEDIA_TYPES.has(mediaType)) {
      throw new FetchError('UnsupportedContentType', url, `Invalid content type: ${contentType || '(none)'}. Expected text/html`);
    }

    const declared = Number(res.headers.get('content-length') ?? '');
    if (Number.isFinite(declared) && declared > maxBytes) throw tooLarge(url, maxBytes);

    const buf = new Uint8Array(await res.arrayBuffer());
    if (buf.byteLength > maxBytes) throw tooLarge(url, maxBytes);

    return {
      url,
      finalUrl: res.url || parsed.href,
      status: res.status,
      contentType,
      bytes: buf.byteLength,
      text: decodeBody(buf, charset),
    };
  }

  private classify(e: unknown, url: string, timedOut: boolean): FetchError {
    if (e instanceof FetchError) return e;
    if (timedOut) {
      return new FetchError('Timeout', url, `Request timeout after ${this.config.timeoutMs / 1000} seconds`, { cause: e });
    }
    if (e instanceof AbortError) return new FetchError('NetworkError', url, 'Request aborted', { cause: e });
    if (e instanceof HttpFetchError) {
      if (e.type === 'max-redirect') {
        return new FetchError('TooManyRedirects', url, `Too many redirects (max: ${this.config.maxRedirects})`, { cause: e });
      }
      if (e.type === 'max-size') return tooLarge(url, this.config.maxBytes, e);
    }
    return new FetchError('NetworkError', url, `Failed to fetch URL: ${errorMessage(e)}`, { cause: e });
  }
}
