import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag } from 'domhandler';
import type { Element } from 'domhandler';
import { DocumentParseError, errorMessage } from '../../core/errors.js';
import { clip } from '../../core/rule.js';
import type { LogFn } from '../../core/types.js';

export const DEFAULT_SNIPPET_LENGTH = 100;

const HEADING_SELECTOR = 'h1,h2,h3,h4,h5,h6';

export type Loader = typeof cheerio.load;

export interface ParseOptions {
  snippetLength?: number;
  log?: LogFn;
  /** Replaces `cheerio.load` for both parse attempts. */
  load?: Loader;
}

/** Read-only handle on one element of a parsed document. */
export class DomElement {
  constructor(
    private readonly $: CheerioAPI,
    private readonly node: Element,
    private readonly snippetLength: number,
  ) {}

  get tagName(): string {
    return this.node.tagName.toLowerCase();
  }

  /** `undefined` when the attribute is absent, `''` when present but empty. */
  attr(name: string): string | undefined {
    const key = name.toLowerCase();
    return Object.prototype.hasOwnProperty.call(this.node.attribs, key) ? this.node.attribs[key] : undefined;
  }

  hasAttr(name: string): boolean {
    return this.attr(name) !== undefined;
  }

  text(): string {
    return this.$(this.node).text().trim();
  }

  parent(): DomElement | undefined {
    const p = this.node.parent;
    return p && isTag(p) ? this.wrap(p) : undefined;
  }

  closest(tagName: string): DomElement | undefined {
    const wanted = tagName.toLowerCase();
    let cur = this.parent();
    while (cur) {
      if (cur.tagName === wanted) return cur;
      cur = cur.parent();
    }
    return undefined;
  }

  find(selector: string): DomElement[] {
    return this.$(this.node)
      .find(selector)
      .toArray()
      .filter(isTag)
      .map((n) => this.wrap(n));
  }

  /** Outer markup of the element, capped at the snippet length in code points. */
  snippet(): string {
    return clip(this.$.html(this.node), this.snippetLength);
  }

  private wrap(n: Element): DomElement {
    return new DomElement(this.$, n, this.snippetLength);
  }
}

/**
 * Immutable view over one parsed HTML document. Every accessor walks the
 * tree on demand and hands out fresh wrappers, so rules cannot observe each
 * other through shared state.
 */
export class HtmlDocument {
  private constructor(
    private readonly $: CheerioAPI,
    readonly snippetLength: number,
    readonly degraded: boolean,
  ) {}

  static parse(text: string, opts: ParseOptions = {}): HtmlDocument {
    const snippetLength = opts.snippetLength ?? DEFAULT_SNIPPET_LENGTH;
    const log = opts.log ?? (() => {});
    const load = opts.load ?? cheerio.load;
    try {
      const $ = load(text);
      log({ level: 'debug', module: 'document', msg: 'parsed', chars: text.length });
      return new HtmlDocument($, snippetLength, false);
    } catch (primary) {
      log({ level: 'warn', module: 'document', msg: 'parse-degraded', error: errorMessage(primary) });
      try {
        const $ = load(text, { xml: { xmlMode: false, decodeEntities: true } });
        return new HtmlDocument($, snippetLength, true);
      } catch (fallback) {
        throw new DocumentParseError(`Unable to parse document: ${errorMessage(fallback)}`, { cause: fallback });
      }
    }
  }

  get title(): string | undefined {
    const first = this.$('title').first();
    return first.length ? first.text().trim() : undefined;
  }

  get htmlElement(): DomElement | undefined {
    return this.select('html')[0];
  }

  get images(): DomElement[] {
    return this.select('img');
  }

  get links(): DomElement[] {
    return this.select('a');
  }

  get forms(): DomElement[] {
    return this.select('form');
  }

  get headings(): DomElement[] {
    return this.select(HEADING_SELECTOR);
  }

  get inputs(): DomElement[] {
    return this.select('input,textarea,select');
  }

  get buttons(): DomElement[] {
    const inputButtons = this.select('input').filter((el) => (el.attr('type') ?? '').toLowerCase() === 'button');
    return [...this.select('button'), ...inputButtons];
  }

  elementsWithRole(role: string): DomElement[] {
    return this.select('[role]').filter((el) => el.attr('role') === role);
  }

  elementsWithAttribute(name: string): DomElement[] {
    return this.select('*').filter((el) => el.hasAttr(name));
  }

  /** Every `id` value in document order, duplicates included. */
  allIds(): string[] {
    return this.elementsWithAttribute('id').map((el) => el.attr('id') ?? '');
  }

  labelsFor(id: string): DomElement[] {
    return this.select('label').filter((el) => el.attr('for') === id);
  }

  querySelectorAll(selector: string): DomElement[] {
    return this.select(selector);
  }

  private select(selector: string): DomElement[] {
    return this.$(selector)
      .toArray()
      .filter(isTag)
      .map((n) => new DomElement(this.$, n, this.snippetLength));
  }
}

export function parseDocument(text: string, opts?: ParseOptions): HtmlDocument {
  return HtmlDocument.parse(text, opts);
}
