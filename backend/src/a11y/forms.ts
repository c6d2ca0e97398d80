import type { DomElement, HtmlDocument } from '../dom/document.js';
import { getControlName } from './name.js';
import type { NameSource } from './name.js';

const UNLABELLED_TYPES = new Set(['hidden', 'submit', 'button', 'reset']);

export interface FormControl {
  element: DomElement;
  type: string;
  hasLabel: boolean;
  labelSources: NameSource[];
}

export function controlType(el: DomElement): string {
  if (el.tagName !== 'input') return el.tagName;
  return (el.attr('type') ?? 'text').trim().toLowerCase() || 'text';
}

/** Controls that need a label, in document order. */
export function collectFormControls(doc: HtmlDocument): FormControl[] {
  const fields: FormControl[] = [];
  for (const el of doc.inputs) {
    const type = controlType(el);
    if (UNLABELLED_TYPES.has(type)) continue;
    const { sources } = getControlName(el, doc);
    fields.push({ element: el, type, hasLabel: sources.length > 0, labelSources: sources });
  }
  return fields;
}
