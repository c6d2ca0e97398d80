import { defineRule, plural } from '../../core/rule.js';
import type { Finding } from '../../core/types.js';
import type { DomElement } from '../../src/dom/document.js';
import { getLinkText, normalizeText } from '../../src/a11y/name.js';

export const VAGUE_LINK_TEXTS: ReadonlySet<string> = new Set(['click here', 'read more', 'more', 'here', 'link']);

export function isVagueLinkText(text: string): boolean {
  return VAGUE_LINK_TEXTS.has(normalizeText(text));
}

const mod = defineRule(
  'links',
  { ruleCode: 'LINK_TEXT_EMPTY', wcagReference: '2.4.4', wcagLevel: 'AA', principle: 'Operable' },
  (doc, finding) => {
    const links = doc.links;
    const empty: DomElement[] = [];
    const vague: DomElement[] = [];

    for (const link of links) {
      const { text } = getLinkText(link);
      if (!text) empty.push(link);
      else if (isVagueLinkText(text)) vague.push(link);
    }

    const findings: Finding[] = [];
    if (empty.length) {
      findings.push(
        finding({
          severity: 'fail',
          message: `${plural(empty.length, 'link')} ${empty.length === 1 ? 'has' : 'have'} no text or accessible name`,
          remediation: 'Add descriptive text or aria-label to links',
          element: empty[0].snippet(),
          count: empty.length,
        }),
      );
    }
    if (vague.length) {
      findings.push(
        finding({
          severity: 'warning',
          message: `${plural(vague.length, 'link')} ${vague.length === 1 ? 'has' : 'have'} vague text (e.g., 'click here')`,
          remediation: 'Use descriptive link text that makes sense out of context',
          element: vague[0].snippet(),
          count: vague.length,
        }),
      );
    }
    if (findings.length) return findings;

    if (!links.length) {
      return [finding({ severity: 'pass', message: 'No links found on page', remediation: 'N/A - No links to check' })];
    }
    return [
      finding({
        severity: 'pass',
        message: `All ${plural(links.length, 'link')} have meaningful text`,
        remediation: 'N/A - Check passed',
      }),
    ];
  },
);

export default mod;
