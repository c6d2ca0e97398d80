import { roundToTenth } from './score.js';
import type { ScanRecord } from './types.js';

export interface IssueFrequency {
  ruleCode: string;
  /** Scans in which the rule reported a warning or failure. */
  scans: number;
}

export interface FleetStats {
  totalScans: number;
  completedScans: number;
  failedScans: number;
  averageScore: number;
  commonIssues: IssueFrequency[];
}

/**
 * Fleet statistics from stored records only. A finding counts once per scan
 * no matter how many elements it summarizes (`count` is not a weight).
 */
export function summarizeScans(records: Iterable<ScanRecord>, limit = 10): FleetStats {
  let totalScans = 0;
  let failedScans = 0;
  const scores: number[] = [];
  const issues = new Map<string, number>();

  for (const r of records) {
    totalScans++;
    if (r.status === 'failed') failedScans++;
    if (r.status !== 'complete' || r.score === null) continue;
    scores.push(r.score);
    const seen = new Set<string>();
    for (const f of r.findings) {
      if (f.severity === 'pass' || seen.has(f.ruleCode)) continue;
      seen.add(f.ruleCode);
      issues.set(f.ruleCode, (issues.get(f.ruleCode) ?? 0) + 1);
    }
  }

  const averageScore = scores.length ? roundToTenth(scores.reduce((a, b) => a + b, 0) / scores.length) : 0;
  const commonIssues = [...issues.entries()]
    .map(([ruleCode, scans]) => ({ ruleCode, scans }))
    .sort((a, b) => b.scans - a.scans || a.ruleCode.localeCompare(b.ruleCode))
    .slice(0, limit);

  return { totalScans, completedScans: scores.length, failedScans, averageScore, commonIssues };
}
