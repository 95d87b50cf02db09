import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Crawl target
  SEED_URL: process.env.SEED_URL || '',
  CRAWL_DOMAIN: process.env.CRAWL_DOMAIN || '', // Defaults to the seed hostname
  DOMAIN_MATCH: process.env.DOMAIN_MATCH || 'substring',
  BASE_URL: process.env.BASE_URL || '', // Defaults to the seed origin

  // Report
  REPORT_PATH: process.env.REPORT_PATH || 'report.txt',
  REPORT_FREQUENCIES: process.env.REPORT_FREQUENCIES !== 'false', // Default true
  FREQUENCY_MODE: process.env.FREQUENCY_MODE || 'occurrences',

  // Fetching
  CRAWL_CONCURRENCY: parseInt(process.env.CRAWL_CONCURRENCY || '1', 10),
  FETCH_TIMEOUT: parseInt(process.env.FETCH_TIMEOUT || '15000', 10), // 15 seconds
  USER_AGENT:
    process.env.USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',

  // Resilience
  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '2', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '1000', 10),
} as const;

export default env;
