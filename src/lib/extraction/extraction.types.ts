/**
 * Extraction Types
 * Per-page facts pulled out of one crawled document
 */

export interface PageExtraction {
  /** In-domain absolute links, first occurrence order */
  links: Set<string>;
  /** Image sources, root-relative ones resolved against the base URL */
  imageUrls: Set<string>;
  /** Phone-shaped matches in the raw markup */
  phoneNumbers: Set<string>;
  /** Postal-code matches in the raw markup */
  zipCodes: Set<string>;
  /** Visible text with script/style removed */
  text: string;
}
