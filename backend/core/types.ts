import type { HtmlDocument } from '../src/dom/document.js';

export type Severity = 'pass' | 'warning' | 'fail';

export type WcagLevel = 'A' | 'AA' | 'AAA';

export const PRINCIPLES = ['Perceivable', 'Operable', 'Understandable', 'Robust'] as const;
export type Principle = (typeof PRINCIPLES)[number];

export interface RuleMeta {
  ruleCode: string;
  wcagReference: string;
  wcagLevel: WcagLevel;
  principle: Principle;
}

export interface Finding extends RuleMeta {
  severity: Severity;
  message: string;
  remediation: string;
  element?: string;
  count: number;
}

export interface FindingInput {
  severity: Severity;
  message: string;
  remediation: string;
  element?: string;
  count?: number;
}

export interface Rule {
  readonly slug: string;
  readonly meta: RuleMeta;
  evaluate(doc: HtmlDocument): Finding[];
}

export type ScanStatus = 'pending' | 'scanning' | 'complete' | 'failed';

export interface PrincipleCounts {
  perceivableIssues: number;
  operableIssues: number;
  understandableIssues: number;
  robustIssues: number;
}

export interface ScanSummary extends PrincipleCounts {
  score: number;
  totalChecks: number;
  passedChecks: number;
  warnings: number;
  failures: number;
}

export interface ScanRecord extends PrincipleCounts {
  scanId: string;
  url: string;
  status: ScanStatus;
  score: number | null;
  findings: readonly Finding[];
  totalChecks: number;
  passedChecks: number;
  warnings: number;
  failures: number;
  createdAt: Date;
  completedAt: Date | null;
  durationMs: number | null;
  errorMessage: string | null;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEvent {
  level: LogLevel;
  module?: string;
  url?: string;
  msg: string;
  elapsed?: number;
  [key: string]: unknown;
}

export type LogFn = (e: LogEvent) => void;

export interface FetchConfig {
  timeoutMs: number;
  maxRedirects: number;
  maxBytes: number;
  userAgent: string;
  accept: string;
  acceptLanguage: string;
}

export interface ScanConfig {
  fetch: FetchConfig;
  snippetLength: number;
  logLevel: LogLevel;
  url?: string;
}
