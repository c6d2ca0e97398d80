import { clip, defineRule, plural } from '../../core/rule.js';
import type { DomElement } from '../../src/dom/document.js';

export interface HeadingNode {
  level: 1 | 2 | 3 | 4 | 5 | 6;
  text: string;
  element: DomElement;
}

export interface OutlineIssue {
  heading: HeadingNode;
  description: string;
}

function toLevel(n: number): HeadingNode['level'] | undefined {
  return n === 1 || n === 2 || n === 3 || n === 4 || n === 5 || n === 6 ? n : undefined;
}

/** Level comes from the tag name numeral (`h3` → 3). */
export function outline(headings: DomElement[]): HeadingNode[] {
  const nodes: HeadingNode[] = [];
  for (const el of headings) {
    const level = toLevel(parseInt(el.tagName.substring(1), 10));
    if (level) nodes.push({ level, text: el.text(), element: el });
  }
  return nodes;
}

/**
 * Only the very first heading is held to h1; after that a heading may go
 * down at most one level below its predecessor.
 */
export function outlineIssues(nodes: HeadingNode[]): OutlineIssue[] {
  const issues: OutlineIssue[] = [];
  nodes.forEach((cur, i) => {
    if (i === 0) {
      if (cur.level !== 1) issues.push({ heading: cur, description: `First heading is h${cur.level}, should start with h1` });
      return;
    }
    const prev = nodes[i - 1];
    if (cur.level > prev.level + 1) {
      issues.push({
        heading: cur,
        description: `Skipped from h${prev.level} to h${cur.level} at heading: '${clip(cur.text, 30)}'`,
      });
    }
  });
  return issues;
}

const mod = defineRule(
  'headings-outline',
  { ruleCode: 'HEADING_SKIP_LEVEL', wcagReference: '1.3.1', wcagLevel: 'AA', principle: 'Understandable' },
  (doc, finding) => {
    const nodes = outline(doc.headings);
    if (!nodes.length) {
      return [finding({ severity: 'pass', message: 'No heading elements found on page', remediation: 'N/A - No headings to check' })];
    }

    const issues = outlineIssues(nodes);
    if (issues.length) {
      return [
        finding({
          severity: 'warning',
          message: `Heading hierarchy has ${plural(issues.length, 'issue')}: ${issues[0].description}`,
          remediation: 'Use sequential heading levels (h1 -> h2 -> h3) without skipping',
          element: issues[0].heading.element.snippet(),
          count: issues.length,
        }),
      ];
    }
    return [
      finding({
        severity: 'pass',
        message: `Heading hierarchy is correct (${plural(nodes.length, 'heading')})`,
        remediation: 'N/A - Check passed',
      }),
    ];
  },
);

export default mod;
