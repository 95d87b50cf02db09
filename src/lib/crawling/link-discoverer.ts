/**
 * Link Discoverer
 * Anchor and image discovery from a parsed document
 */

import type { HtmlDocument } from '../scraping/html-parser';
import { DomainPredicate } from './crawling.types';
import { isAbsoluteHttpUrl, resolveImageUrl } from './url-scope';

export class LinkDiscoverer {
  constructor(
    private readonly isInDomain: DomainPredicate,
    private readonly baseUrl: string
  ) {}

  /**
   * Absolute in-domain anchor targets. Relative hrefs and other schemes are
   * not followed.
   */
  discoverLinks(document: HtmlDocument): Set<string> {
    const links = new Set<string>();

    for (const href of document.findAttributeValues('a', 'href')) {
      if (isAbsoluteHttpUrl(href) && this.isInDomain(href)) {
        links.add(href);
      }
    }

    return links;
  }

  /**
   * Image sources, whatever host they live on
   */
  discoverImages(document: HtmlDocument): Set<string> {
    const images = new Set<string>();

    for (const src of document.findAttributeValues('img', 'src')) {
      if (src.trim().length === 0) continue;
      images.add(resolveImageUrl(src, this.baseUrl));
    }

    return images;
  }
}
