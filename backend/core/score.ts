import type { Finding, Principle, PrincipleCounts, ScanSummary } from './types.js';

const PRINCIPLE_KEYS: Record<Principle, keyof PrincipleCounts> = {
  Perceivable: 'perceivableIssues',
  Operable: 'operableIssues',
  Understandable: 'understandableIssues',
  Robust: 'robustIssues',
};

/** One decimal place, ties to even (62.5 → 62, 63.5 → 64 on the scaled value). */
export function roundToTenth(value: number): number {
  const scaled = value * 10;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) return (floor % 2 === 0 ? floor : floor + 1) / 10;
  return Math.round(scaled) / 10;
}

/** Warnings earn half credit, failures none; an empty set scores 100. */
export function computeScore(passed: number, warnings: number, total: number): number {
  if (total === 0) return 100;
  return roundToTenth(((passed + warnings * 0.5) / total) * 100);
}

export function emptyPrincipleCounts(): PrincipleCounts {
  return { perceivableIssues: 0, operableIssues: 0, understandableIssues: 0, robustIssues: 0 };
}

export function summarize(findings: readonly Finding[]): ScanSummary {
  let passed = 0;
  let warnings = 0;
  let failures = 0;
  const principles = emptyPrincipleCounts();

  for (const f of findings) {
    if (f.severity === 'pass') {
      passed++;
      continue;
    }
    if (f.severity === 'warning') warnings++;
    else failures++;
    principles[PRINCIPLE_KEYS[f.principle]]++;
  }

  const total = findings.length;
  return {
    score: computeScore(passed, warnings, total),
    totalChecks: total,
    passedChecks: passed,
    warnings,
    failures,
    ...principles,
  };
}
