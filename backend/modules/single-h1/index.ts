import { clip, defineRule } from '../../core/rule.js';

const mod = defineRule(
  'single-h1',
  { ruleCode: 'H1_MISSING_OR_MULTIPLE', wcagReference: '2.4.6', wcagLevel: 'AA', principle: 'Understandable' },
  (doc, finding) => {
    const h1s = doc.headings.filter((h) => h.tagName === 'h1');

    if (!h1s.length) {
      return [
        finding({
          severity: 'warning',
          message: 'No <h1> element found on page',
          remediation: 'Add a single <h1> element to serve as the main page heading',
        }),
      ];
    }
    if (h1s.length > 1) {
      const texts = h1s.slice(0, 3).map((h) => clip(h.text(), 30));
      return [
        finding({
          severity: 'warning',
          message: `Multiple <h1> elements found (${h1s.length}): ${texts.join(', ')}`,
          remediation: 'Use only one <h1> per page for the main heading',
          element: h1s[1].snippet(),
          count: h1s.length,
        }),
      ];
    }
    return [
      finding({
        severity: 'pass',
        message: `Page has one <h1>: '${clip(h1s[0].text(), 50)}'`,
        remediation: 'N/A - Check passed',
      }),
    ];
  },
);

export default mod;
