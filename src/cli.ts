/**
 * CLI helpers
 */

import type { CrawlSettingsOverrides } from './modules/crawl/crawl.types';
import { ConfigurationError } from './lib/scraping/errors';

/**
 * Parse `--key=value` flags into setting overrides.
 * Supports --url, --domain, --match, --base-url, --output, --concurrency,
 * --frequency and --no-frequencies.
 */
export function parseArgs(args: string[]): CrawlSettingsOverrides {
  const opts: Record<string, string> = {};
  const overrides: CrawlSettingsOverrides = {};

  for (const arg of args) {
    if (arg === '--no-frequencies') {
      overrides.reportFrequencies = false;
      continue;
    }
    const eqIdx = arg.indexOf('=');
    if (arg.startsWith('--') && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    } else {
      throw new ConfigurationError(`Unrecognized argument: ${arg}`);
    }
  }

  if (opts.url !== undefined) overrides.seedUrl = opts.url;
  if (opts.domain !== undefined) overrides.domain = opts.domain;
  if (opts['base-url'] !== undefined) overrides.baseUrl = opts['base-url'];
  if (opts.output !== undefined) overrides.reportPath = opts.output;
  if (opts.concurrency !== undefined) overrides.concurrency = parseInt(opts.concurrency, 10);
  if (opts.match === 'substring' || opts.match === 'host') {
    overrides.domainMatch = opts.match;
  } else if (opts.match !== undefined) {
    throw new ConfigurationError(`--match must be substring or host, got "${opts.match}"`);
  }
  if (opts.frequency === 'occurrences' || opts.frequency === 'distinct') {
    overrides.frequencyMode = opts.frequency;
  } else if (opts.frequency !== undefined) {
    throw new ConfigurationError(`--frequency must be occurrences or distinct, got "${opts.frequency}"`);
  }

  return overrides;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
