export type FetchErrorKind =
  | 'Timeout'
  | 'TooManyRedirects'
  | 'HTTPStatusError'
  | 'UnsupportedContentType'
  | 'ContentTooLarge'
  | 'NetworkError';

export type ScanErrorCode = FetchErrorKind | 'DocumentParseError' | 'RuleEvaluationFault' | 'CatalogueError' | 'ConfigError';

/** Base class for every fault the scan pipeline raises on purpose. */
export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchError extends ScanError {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(kind: FetchErrorKind, url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(kind, message, { cause: options.cause });
    this.kind = kind;
    this.url = url;
    if (options.status !== undefined) this.status = options.status;
  }
}

export class DocumentParseError extends ScanError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DocumentParseError', message, options);
  }
}

export class RuleEvaluationFault extends ScanError {
  readonly ruleCode: string;

  constructor(ruleCode: string, message: string, options?: { cause?: unknown }) {
    super('RuleEvaluationFault', `Rule ${ruleCode} failed: ${message}`, options);
    this.ruleCode = ruleCode;
  }
}

export class CatalogueError extends ScanError {
  constructor(message: string) {
    super('CatalogueError', message);
  }
}

export class ConfigError extends ScanError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('ConfigError', details.length ? `${message}: ${details.join('; ')}` : message);
    this.details = details;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
