/**
 * URL Scope Utilities
 * Domain membership and image URL resolution. URLs are compared as exact
 * strings; nothing here normalizes a URL.
 */

import { DomainMatchMode, DomainPredicate } from './crawling.types';

/**
 * Whether a link carries an http(s) scheme
 */
export function isAbsoluteHttpUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}

/**
 * Extract the lower-cased hostname of a URL, or '' when it does not parse
 */
export function extractHostname(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Build the in-domain test.
 *
 * `substring` accepts any URL containing the domain text anywhere, which
 * includes subdomains and URLs that only mention the domain in their query.
 * `host` accepts the exact hostname and its subdomains.
 */
export function createDomainPredicate(domain: string, mode: DomainMatchMode = 'substring'): DomainPredicate {
  const target = domain.toLowerCase();

  if (mode === 'host') {
    return (url: string) => {
      const hostname = extractHostname(url);
      return hostname === target || hostname.endsWith(`.${target}`);
    };
  }

  return (url: string) => url.includes(domain);
}

/**
 * Base URL with exactly one trailing slash
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/`;
}

/**
 * Resolve an image source against the base URL.
 * Root-relative sources are concatenated onto the base after stripping their
 * leading slashes; every other source is returned unchanged.
 */
export function resolveImageUrl(src: string, baseUrl: string): string {
  if (!src.startsWith('/')) {
    return src;
  }
  return normalizeBaseUrl(baseUrl) + src.replace(/^\/+/, '');
}
