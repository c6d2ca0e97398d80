import type { DomElement, HtmlDocument } from '../dom/document.js';

export type NameSource =
  | 'aria-label'
  | 'aria-labelledby'
  | 'label[for]'
  | 'label-wrapper'
  | 'title'
  | 'value'
  | 'text'
  | 'img-alt';

export interface NameInfo {
  text: string;
  sources: NameSource[];
}

/** Trimmed and lowercased; inner whitespace is kept as is. */
export function normalizeText(s: string | undefined): string {
  return (s ?? '').trim().toLowerCase();
}

function nonBlank(v: string | undefined): v is string {
  return v !== undefined && v.trim().length > 0;
}

/**
 * Names a form control the way assistive tech would find a label for it:
 * explicit label, wrapping label, ARIA and finally `title`.
 */
export function getControlName(el: DomElement, doc: HtmlDocument): NameInfo {
  const texts: string[] = [];
  const sources: NameSource[] = [];

  const id = el.attr('id');
  if (nonBlank(id)) {
    for (const lbl of doc.labelsFor(id)) {
      texts.push(lbl.text());
      sources.push('label[for]');
    }
  }

  const wrapper = el.closest('label');
  if (wrapper) {
    texts.push(wrapper.text());
    sources.push('label-wrapper');
  }

  const ariaLabel = el.attr('aria-label');
  if (nonBlank(ariaLabel)) {
    texts.push(ariaLabel.trim());
    sources.push('aria-label');
  }

  const labelledby = el.attr('aria-labelledby');
  if (nonBlank(labelledby)) {
    texts.push(labelledby.trim());
    sources.push('aria-labelledby');
  }

  const title = el.attr('title');
  if (nonBlank(title)) {
    texts.push(title.trim());
    sources.push('title');
  }

  return { text: texts.filter(Boolean).join(' '), sources };
}

export function getButtonName(el: DomElement): NameInfo {
  const sources: NameSource[] = [];
  const candidates: [NameSource, string | undefined][] = [
    ['text', el.text()],
    ['value', el.attr('value')],
    ['aria-label', el.attr('aria-label')],
    ['aria-labelledby', el.attr('aria-labelledby')],
    ['title', el.attr('title')],
  ];
  let text = '';
  for (const [source, value] of candidates) {
    if (!nonBlank(value)) continue;
    if (!text) text = value.trim();
    sources.push(source);
  }
  return { text, sources };
}

/** Own text, else `aria-label`, else the alt text of the first contained image. */
export function getLinkText(el: DomElement): NameInfo {
  const own = el.text();
  if (own) return { text: own, sources: ['text'] };
  const ariaLabel = (el.attr('aria-label') ?? '').trim();
  if (ariaLabel) return { text: ariaLabel, sources: ['aria-label'] };
  const img = el.find('img')[0];
  const alt = (img?.attr('alt') ?? '').trim();
  if (alt) return { text: alt, sources: ['img-alt'] };
  return { text: '', sources: [] };
}
