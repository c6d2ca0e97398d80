import { CatalogueError } from './errors.js';
import { PRINCIPLES } from './types.js';
import type { Principle, Rule, WcagLevel } from './types.js';
import images from '../modules/images/index.js';
import htmlLang from '../modules/html-lang/index.js';
import pageTitle from '../modules/page-title/index.js';
import forms from '../modules/forms/index.js';
import buttons from '../modules/buttons/index.js';
import links from '../modules/links/index.js';
import headingsOutline from '../modules/headings-outline/index.js';
import singleH1 from '../modules/single-h1/index.js';
import duplicateIds from '../modules/duplicate-ids/index.js';
import domAria from '../modules/dom-aria/index.js';

export type Catalogue = readonly Rule[];

const WCAG_LEVELS: readonly WcagLevel[] = ['A', 'AA', 'AAA'];

function isPrinciple(v: string): v is Principle {
  return PRINCIPLES.some((p) => p === v);
}

/**
 * Validates rule metadata and freezes the ordering. Bad metadata is a
 * programming error and surfaces here, before any scan runs.
 */
export function createCatalogue(rules: readonly Rule[]): Catalogue {
  const slugs = new Set<string>();
  for (const rule of rules) {
    const { ruleCode, wcagReference, wcagLevel, principle } = rule.meta;
    if (!rule.slug) throw new CatalogueError('Rule without slug');
    if (slugs.has(rule.slug)) throw new CatalogueError(`Duplicate rule slug "${rule.slug}"`);
    slugs.add(rule.slug);
    if (!ruleCode.trim()) throw new CatalogueError(`Rule "${rule.slug}" has an empty rule code`);
    if (!/^\d+\.\d+\.\d+$/.test(wcagReference)) {
      throw new CatalogueError(`Rule "${rule.slug}" has malformed WCAG reference "${wcagReference}"`);
    }
    if (!WCAG_LEVELS.includes(wcagLevel)) {
      throw new CatalogueError(`Rule "${rule.slug}" has unknown WCAG level "${wcagLevel}"`);
    }
    if (!isPrinciple(principle)) {
      throw new CatalogueError(`Rule "${rule.slug}" has unknown principle "${principle}"`);
    }
  }
  return Object.freeze([...rules]);
}

export function defaultCatalogue(): Catalogue {
  return createCatalogue([
    images,
    htmlLang,
    pageTitle,
    forms,
    buttons,
    links,
    headingsOutline,
    singleH1,
    duplicateIds,
    domAria,
  ]);
}
