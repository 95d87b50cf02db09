/**
 * Crawl Integration Tests
 * Full pipeline over an in-memory site: settings → service → report text
 */

import { CrawlErrorType } from '../../lib/scraping/errors';
import { renderReport } from '../../lib/report/report.writer';
import { CrawlEnvironment, createPipelineConfig, resolveCrawlSettings } from '../../modules/crawl/crawl.config';
import { CrawlService } from '../../modules/crawl/crawl.service';
import { CrawlSettingsOverrides } from '../../modules/crawl/crawl.types';
import { sitePages } from '../helpers/fixtures';
import { InMemorySiteFetcher, ScriptedLanguageToolkit, TEST_STOPWORDS } from '../helpers/mocks';

const HOME = 'https://example.test/';
const ABOUT = 'https://example.test/about';
const CONTACT = 'https://example.test/contact';

const environment: CrawlEnvironment = {
  SEED_URL: HOME,
  CRAWL_DOMAIN: '',
  DOMAIN_MATCH: 'substring',
  BASE_URL: '',
  REPORT_PATH: 'report.txt',
  REPORT_FREQUENCIES: true,
  FREQUENCY_MODE: 'occurrences',
  CRAWL_CONCURRENCY: 1,
  FETCH_TIMEOUT: 15000,
  MAX_RETRIES: 2,
  RETRY_BACKOFF_BASE: 1000,
  USER_AGENT: 'test-agent/1.0',
};

const toolkit = new ScriptedLanguageToolkit({
  Welcome: { tag: 'VB' },
  home: { tag: 'NN' },
  Home: { tag: 'NN' },
  Phone: { tag: 'NN', lemma: 'phone' },
  team: { tag: 'NN' },
});

function createService(overrides: CrawlSettingsOverrides = {}): { service: CrawlService; fetcher: InMemorySiteFetcher } {
  const settings = resolveCrawlSettings(overrides, environment);
  const pipeline = createPipelineConfig(settings, { toolkit, stopwords: TEST_STOPWORDS });
  const fetcher = new InMemorySiteFetcher(sitePages);
  return { service: new CrawlService(pipeline, fetcher), fetcher };
}

describe('Crawl pipeline', () => {
  it('should crawl the site and render the full report', async () => {
    const { service } = createService();

    const { result, cancelled } = await service.run();

    expect(cancelled).toBe(false);
    expect(renderReport(result, { includeFrequencies: true })).toBe(
      'Report:\n' +
        `\nUnique URLs:\n${HOME}\n${CONTACT}\n${ABOUT}\n` +
        '\nImage URLs:\nhttps://example.test/img/logo.png\n' +
        '\nPhone Numbers:\n555-987-6543\n' +
        '\nZip Codes:\n30301\n' +
        '\nVocabulary (Unique words):\nwelcome\nhome\nabout\ncontact\nphone\n555-987-6543\nzip\nmissing\nelsewhere\nteam\n' +
        '\nVerbs:\nwelcome\n' +
        '\nNouns:\nhome\nphone\nteam\n' +
        '\nVerb Frequencies:\nwelcome: 1\n' +
        '\nNoun Frequencies:\nhome: 3\nphone: 1\nteam: 1\n'
    );
  });

  it('should list the broken link as a failure', async () => {
    const { service, fetcher } = createService();

    const { result } = await service.run();

    expect(result.failures).toEqual([
      {
        url: 'https://example.test/missing',
        type: CrawlErrorType.FETCH_ERROR,
        message: 'HTTP 404 Not Found',
        statusCode: 404,
      },
    ]);
    expect(fetcher.countRequests('https://example.test/missing')).toBe(1);
    expect(result.statistics.pagesVisited).toBe(3);
  });

  it('should count each lemma once in distinct mode', async () => {
    const { service } = createService({ frequencyMode: 'distinct' });

    const { result } = await service.run();

    expect([...result.nounFrequencies]).toEqual([
      ['home', 1],
      ['phone', 1],
      ['team', 1],
    ]);
  });

  it('should produce the same page set with concurrent fetches', async () => {
    const { service, fetcher } = createService({ concurrency: 3 });

    const { result } = await service.run();

    expect([...result.uniqueUrls].sort()).toEqual([HOME, ABOUT, CONTACT].sort());
    expect(new Set(fetcher.requests).size).toBe(fetcher.requests.length);
  });

  it('should report cancellation', async () => {
    const { service, fetcher } = createService();
    const controller = new AbortController();
    controller.abort();

    const { result, cancelled } = await service.run(controller.signal);

    expect(cancelled).toBe(true);
    expect(fetcher.requests).toEqual([]);
    expect(result.uniqueUrls.size).toBe(0);
    expect(result.vocabulary.size).toBe(0);
  });
});
