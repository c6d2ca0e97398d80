import type { Finding, ScanRecord, ScanStatus } from './types.js';

export interface SerializedRecord {
  scanId: string;
  url: string;
  status: ScanStatus;
  score: number | null;
  totalChecks: number;
  passedChecks: number;
  warnings: number;
  failures: number;
  perceivableIssues: number;
  operableIssues: number;
  understandableIssues: number;
  robustIssues: number;
  createdAt: string;
  completedAt: string | null;
  durationMs: number | null;
  errorMessage: string | null;
  findings: Finding[];
}

/** JSON-ready copy of a record; dates become ISO-8601 strings. */
export function serializeRecord(record: ScanRecord): SerializedRecord {
  return {
    scanId: record.scanId,
    url: record.url,
    status: record.status,
    score: record.score,
    totalChecks: record.totalChecks,
    passedChecks: record.passedChecks,
    warnings: record.warnings,
    failures: record.failures,
    perceivableIssues: record.perceivableIssues,
    operableIssues: record.operableIssues,
    understandableIssues: record.understandableIssues,
    robustIssues: record.robustIssues,
    createdAt: record.createdAt.toISOString(),
    completedAt: record.completedAt ? record.completedAt.toISOString() : null,
    durationMs: record.durationMs,
    errorMessage: record.errorMessage,
    findings: record.findings.map((f) => ({ ...f })),
  };
}
