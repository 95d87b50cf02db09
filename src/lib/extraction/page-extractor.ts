/**
 * Page Extractor
 * Turns one fetched page into a PageExtraction
 */

import { LinkDiscoverer } from '../crawling/link-discoverer';
import type { HtmlDocument } from '../scraping/html-parser';
import { PageExtraction } from './extraction.types';
import { PatternSet } from './patterns';

export class PageExtractor {
  constructor(
    private readonly linkDiscoverer: LinkDiscoverer,
    private readonly patterns: PatternSet
  ) {}

  /**
   * Phone numbers and zip codes are matched against the raw markup, so
   * numbers inside attributes and scripts count too.
   */
  extract(document: HtmlDocument, rawHtml: string): PageExtraction {
    return {
      links: this.linkDiscoverer.discoverLinks(document),
      imageUrls: this.linkDiscoverer.discoverImages(document),
      phoneNumbers: this.patterns.phone.findAll(rawHtml),
      zipCodes: this.patterns.zipCode.findAll(rawHtml),
      text: document.extractVisibleText(),
    };
  }
}
