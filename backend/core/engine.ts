import { RuleEvaluationFault, errorMessage } from './errors.js';
import type { Catalogue } from './registry.js';
import type { Finding, LogFn } from './types.js';
import type { HtmlDocument } from '../src/dom/document.js';

export interface RunOptions {
  log?: LogFn;
  url?: string;
}

/**
 * Runs every rule in catalogue order and concatenates their findings.
 * A rule that throws, or returns no finding, aborts the whole run.
 */
export function runRules(catalogue: Catalogue, doc: HtmlDocument, opts: RunOptions = {}): Finding[] {
  const log = opts.log ?? (() => {});
  const findings: Finding[] = [];
  for (const rule of catalogue) {
    const started = Date.now();
    let res: Finding[];
    try {
      res = rule.evaluate(doc);
    } catch (e) {
      log({ level: 'error', module: rule.slug, url: opts.url, msg: 'rule-failed', error: errorMessage(e) });
      throw new RuleEvaluationFault(rule.meta.ruleCode, errorMessage(e), { cause: e });
    }
    if (!res.length) {
      throw new RuleEvaluationFault(rule.meta.ruleCode, 'rule produced no findings');
    }
    log({ level: 'debug', module: rule.slug, url: opts.url, msg: 'rule-finished', elapsed: Date.now() - started, findings: res.length });
    findings.push(...res);
  }
  return findings;
}
