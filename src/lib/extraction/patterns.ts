/**
 * Pattern Matchers
 * Precompiled text patterns for contact facts and markup noise
 */

export class TextPattern {
  private readonly global: RegExp;
  private readonly anchored: RegExp;

  constructor(source: string) {
    this.global = new RegExp(source, 'g');
    this.anchored = new RegExp(`^(?:${source})`);
  }

  /**
   * Distinct matches in order of first appearance
   */
  findAll(text: string): Set<string> {
    const matches = new Set<string>();
    for (const match of text.matchAll(this.global)) {
      matches.add(match[0]);
    }
    return matches;
  }

  /**
   * Whether the pattern matches at the very start of `token`
   */
  matchesStart(token: string): boolean {
    return this.anchored.test(token);
  }
}

export interface PatternSet {
  phone: TextPattern;
  zipCode: TextPattern;
  dimensionNoise: TextPattern;
  hashNoise: TextPattern;
}

export const PATTERN_SOURCES = {
  // (555) 123-4567, 555-123-4567, 555 123-4567, (555)123 4567 ...
  phone: String.raw`\(?\d{3}\)? ?-?\d{3}-? *-?\d{4}`,
  zipCode: String.raw`\d{5}(?:-\d{4})?`,
  dimensionNoise: String.raw`\d+(?:px|em|pt|rem)`,
  hashNoise: String.raw`[a-f0-9]{32,64}`,
} as const;

export function compilePatterns(): PatternSet {
  return {
    phone: new TextPattern(PATTERN_SOURCES.phone),
    zipCode: new TextPattern(PATTERN_SOURCES.zipCode),
    dimensionNoise: new TextPattern(PATTERN_SOURCES.dimensionNoise),
    hashNoise: new TextPattern(PATTERN_SOURCES.hashNoise),
  };
}
