import { randomUUID } from 'node:crypto';
import { runRules } from './engine.js';
import { errorMessage } from './errors.js';
import { silentLogger } from './log.js';
import { emptyPrincipleCounts, summarize } from './score.js';
import type { Catalogue } from './registry.js';
import type { FetchOptions, FetchedDocument } from './fetcher.js';
import type { Finding, LogFn, ScanRecord } from './types.js';
import { DEFAULT_SNIPPET_LENGTH, parseDocument } from '../src/dom/document.js';

export interface DocumentSource {
  fetch(url: string, opts?: FetchOptions): Promise<FetchedDocument>;
}

export interface OrchestratorOptions {
  fetcher: DocumentSource;
  catalogue: Catalogue;
  log?: LogFn;
  /** Receives every published snapshot: pending, scanning and the terminal one. */
  onRecord?: (record: ScanRecord) => void;
  now?: () => Date;
  newId?: () => string;
  snippetLength?: number;
}

function freeze(record: ScanRecord): ScanRecord {
  Object.freeze(record.findings);
  return Object.freeze(record);
}

/**
 * Runs one scan end to end: fetch, parse, evaluate, score. Always resolves
 * with a terminal record; faults end up in `errorMessage`.
 */
export class ScanOrchestrator {
  private readonly log: LogFn;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly started = new Set<string>();

  constructor(private readonly opts: OrchestratorOptions) {
    this.log = opts.log ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
  }

  /** Pending snapshot for a scan that has not started fetching yet. */
  createRecord(url: string): ScanRecord {
    return freeze({
      scanId: this.newId(),
      url,
      status: 'pending',
      score: null,
      findings: [],
      totalChecks: 0,
      passedChecks: 0,
      warnings: 0,
      failures: 0,
      ...emptyPrincipleCounts(),
      createdAt: this.now(),
      completedAt: null,
      durationMs: null,
      errorMessage: null,
    });
  }

  async scan(url: string, fetchOpts: FetchOptions = {}): Promise<ScanRecord> {
    const pending = this.createRecord(url);
    this.publish(pending);
    return this.run(pending, fetchOpts);
  }

  async run(pending: ScanRecord, fetchOpts: FetchOptions = {}): Promise<ScanRecord> {
    if (pending.status !== 'pending') {
      throw new Error(`Scan ${pending.scanId} already ${pending.status}`);
    }
    // a pending snapshot stays pending; the id is what marks it as used
    if (this.started.has(pending.scanId)) {
      throw new Error(`Scan ${pending.scanId} already started`);
    }
    this.started.add(pending.scanId);
    const { url, scanId } = pending;
    const scanning = freeze({ ...pending, status: 'scanning' });
    this.publish(scanning);
    this.log({ level: 'info', module: 'orchestrator', url, msg: 'scan-start', scanId });

    let findings: Finding[];
    try {
      const fetched = await this.opts.fetcher.fetch(url, fetchOpts);
      const doc = parseDocument(fetched.text, {
        snippetLength: this.opts.snippetLength ?? DEFAULT_SNIPPET_LENGTH,
        log: this.log,
      });
      findings = runRules(this.opts.catalogue, doc, { log: this.log, url });
    } catch (e) {
      return this.fail(scanning, e);
    }
    return this.complete(scanning, findings);
  }

  private complete(scanning: ScanRecord, findings: Finding[]): ScanRecord {
    const completedAt = this.now();
    const summary = summarize(findings);
    const record = freeze({
      ...scanning,
      ...summary,
      status: 'complete',
      findings,
      completedAt,
      durationMs: completedAt.getTime() - scanning.createdAt.getTime(),
    });
    this.log({
      level: 'info',
      module: 'orchestrator',
      url: record.url,
      msg: 'scan-finished',
      scanId: record.scanId,
      elapsed: record.durationMs ?? undefined,
      score: record.score,
    });
    this.publish(record);
    return record;
  }

  private fail(scanning: ScanRecord, e: unknown): ScanRecord {
    const completedAt = this.now();
    const record = freeze({
      ...scanning,
      status: 'failed',
      completedAt,
      durationMs: completedAt.getTime() - scanning.createdAt.getTime(),
      errorMessage: errorMessage(e),
    });
    this.log({ level: 'error', module: 'orchestrator', url: record.url, msg: 'scan-failed', scanId: record.scanId, error: record.errorMessage });
    this.publish(record);
    return record;
  }

  private publish(record: ScanRecord): void {
    if (!this.opts.onRecord) return;
    try {
      this.opts.onRecord(record);
    } catch (e) {
      this.log({ level: 'warn', module: 'orchestrator', url: record.url, msg: 'record-listener-failed', error: errorMessage(e) });
    }
  }
}
