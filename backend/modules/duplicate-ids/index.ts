import { defineRule, plural } from '../../core/rule.js';

/** Distinct values seen more than once, in order of their second occurrence. */
export function duplicatedValues(values: string[]): string[] {
  const seen = new Set<string>();
  const dups = new Set<string>();
  for (const v of values) {
    if (seen.has(v)) dups.add(v);
    seen.add(v);
  }
  return [...dups];
}

const mod = defineRule(
  'duplicate-ids',
  { ruleCode: 'DUPLICATE_ID', wcagReference: '4.1.1', wcagLevel: 'AA', principle: 'Robust' },
  (doc, finding) => {
    const withId = doc.elementsWithAttribute('id');
    const ids = doc.allIds();
    const dups = duplicatedValues(ids);

    if (dups.length) {
      const list = dups
        .slice(0, 5)
        .map((d) => `'${d}'`)
        .join(', ');
      const first = withId.find((el) => el.attr('id') === dups[0]);
      return [
        finding({
          severity: 'fail',
          message: `${plural(dups.length, 'duplicate ID')} found: ${list}`,
          remediation: 'Ensure all ID attributes are unique within the document',
          ...(first ? { element: first.snippet() } : {}),
          count: dups.length,
        }),
      ];
    }
    if (!ids.length) {
      return [finding({ severity: 'pass', message: 'No ID attributes found', remediation: 'N/A - No IDs to check' })];
    }
    return [
      finding({
        severity: 'pass',
        message: `All ${plural(ids.length, 'ID')} are unique`,
        remediation: 'N/A - Check passed',
      }),
    ];
  },
);

export default mod;
