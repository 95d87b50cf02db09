/**
 * Report Writer
 * Renders a CrawlResult as the plain-text report and writes it to the
 * console and to disk
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import type { CrawlResult } from '../crawling/crawling.types';

export interface ReportOptions {
  /**
   * Append verb/noun frequency sections after the Nouns section
   */
  includeFrequencies: boolean;
}

interface ReportSection {
  header: string;
  lines(result: CrawlResult): Iterable<string>;
}

// Order and headers are fixed; consumers parse the file by them
const SECTIONS: readonly ReportSection[] = [
  { header: 'Unique URLs', lines: (result) => result.uniqueUrls },
  { header: 'Image URLs', lines: (result) => result.imageUrls },
  { header: 'Phone Numbers', lines: (result) => result.phoneNumbers },
  { header: 'Zip Codes', lines: (result) => result.zipCodes },
  { header: 'Vocabulary (Unique words)', lines: (result) => result.vocabulary },
  { header: 'Verbs', lines: (result) => result.verbs },
  { header: 'Nouns', lines: (result) => result.nouns },
];

const FREQUENCY_SECTIONS: readonly ReportSection[] = [
  { header: 'Verb Frequencies', lines: (result) => formatFrequencies(result.verbFrequencies) },
  { header: 'Noun Frequencies', lines: (result) => formatFrequencies(result.nounFrequencies) },
];

/**
 * Render the report text: a `Report:` title, then each section as a blank
 * line, `<header>:` and one entry per line
 */
export function renderReport(result: CrawlResult, options: ReportOptions): string {
  const sections = options.includeFrequencies ? [...SECTIONS, ...FREQUENCY_SECTIONS] : SECTIONS;
  let output = 'Report:\n';

  for (const section of sections) {
    output += `\n${section.header}:\n`;
    for (const line of section.lines(result)) {
      output += `${line}\n`;
    }
  }

  return output;
}

/**
 * `lemma: count`, most frequent first, ties alphabetical
 */
export function formatFrequencies(frequencies: ReadonlyMap<string, number>): string[] {
  return [...frequencies.entries()]
    .sort(([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : a > b ? 1 : 0))
    .map(([lemma, count]) => `${lemma}: ${count}`);
}

export class ReportWriter {
  constructor(
    private readonly outputPath: string,
    private readonly options: ReportOptions
  ) {}

  /**
   * Print the report and write it as UTF-8. Returns the absolute file path.
   */
  async write(result: CrawlResult): Promise<string> {
    const report = renderReport(result, this.options);
    const filePath = path.resolve(this.outputPath);

    console.log(report.trimEnd());

    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, report, 'utf8');
    return filePath;
  }
}
