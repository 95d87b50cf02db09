/**
 * HTML Parser
 * Cheerio-backed document with attribute queries and visible-text extraction
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { AnyNode, isDocument, isTag, isText } from 'domhandler';
import { ParseError } from './errors';

/** Elements whose text is never part of the page's visible content */
const HIDDEN_TEXT_SELECTOR = 'script, style';

export interface HtmlDocument {
  /**
   * Values of `attribute` on every `tag` element carrying it, in document order
   */
  findAttributeValues(tag: string, attribute: string): string[];

  /**
   * Text outside script/style elements: each text node trimmed, empty nodes
   * dropped, the rest joined with single spaces
   */
  extractVisibleText(): string;
}

export class CheerioDocument implements HtmlDocument {
  constructor(private readonly $: CheerioAPI) {}

  findAttributeValues(tag: string, attribute: string): string[] {
    const values: string[] = [];

    this.$(`${tag}[${attribute}]`).each((_, el) => {
      const value = this.$(el).attr(attribute);
      if (value !== undefined) {
        values.push(value);
      }
    });

    return values;
  }

  extractVisibleText(): string {
    const parts: string[] = [];
    this.collectText(this.$.root().contents(), parts);
    return parts.join(' ');
  }

  private collectText(nodes: Cheerio<AnyNode>, parts: string[]): void {
    nodes.each((_, node) => {
      if (isText(node)) {
        const text = node.data.trim();
        if (text) {
          parts.push(text);
        }
        return;
      }

      if (!isTag(node) && !isDocument(node)) {
        return; // comments, directives
      }

      const $node = this.$(node);
      if ($node.is(HIDDEN_TEXT_SELECTOR)) {
        return;
      }
      this.collectText($node.contents(), parts);
    });
  }
}

/**
 * Parse raw markup. An empty body counts as a failed page.
 */
export function parseHtml(html: string, url: string): HtmlDocument {
  if (html.trim().length === 0) {
    throw new ParseError(url, 'Empty document');
  }

  try {
    return new CheerioDocument(cheerio.load(html));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(url, `Failed to parse HTML: ${message}`, error);
  }
}
