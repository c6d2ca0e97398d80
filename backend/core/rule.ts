import type { HtmlDocument } from '../src/dom/document.js';
import type { Finding, FindingInput, Rule, RuleMeta } from './types.js';

export type FindingFactory = (input: FindingInput) => Finding;

export type Evaluator = (doc: HtmlDocument, finding: FindingFactory) => Finding[];

/**
 * Builds a rule whose findings all carry the same taxonomy metadata.
 * The evaluator only decides severity, wording and counts.
 */
export function defineRule(slug: string, meta: RuleMeta, evaluate: Evaluator): Rule {
  const frozenMeta: RuleMeta = Object.freeze({ ...meta });
  const finding: FindingFactory = ({ severity, message, remediation, element, count = 1 }) => ({
    ruleCode: frozenMeta.ruleCode,
    severity,
    message,
    remediation,
    ...(element !== undefined ? { element } : {}),
    wcagReference: frozenMeta.wcagReference,
    wcagLevel: frozenMeta.wcagLevel,
    principle: frozenMeta.principle,
    count,
  });
  return Object.freeze({
    slug,
    meta: frozenMeta,
    evaluate: (doc: HtmlDocument) => evaluate(doc, finding),
  });
}

export function plural(n: number, one: string, many: string = `${one}s`): string {
  return `${n} ${n === 1 ? one : many}`;
}

/** First `max` code points of `text`; never splits a surrogate pair. */
export function clip(text: string, max: number): string {
  return Array.from(text).slice(0, max).join('');
}
