#!/usr/bin/env node
/**
 * CLI Entry Point
 * Crawls the configured site and writes report.txt
 */

import { formatDuration, parseArgs } from './cli';
import { createPipelineConfig, resolveCrawlSettings } from './modules/crawl/crawl.config';
import { CrawlService } from './modules/crawl/crawl.service';
import { ReportWriter } from './lib/report';
import { ConfigurationError } from './lib/scraping';

const main = async (): Promise<void> => {
  const settings = resolveCrawlSettings(parseArgs(process.argv.slice(2)));
  const pipeline = createPipelineConfig(settings);
  const service = new CrawlService(pipeline);

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals): void => {
    console.log(`${signal} signal received: stopping crawl`);
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  console.log('');
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log(`🚀 Crawling ${settings.seedUrl}`);
  console.log(`🚀 Domain: ${settings.domain} (${settings.domainMatch} match)`);
  console.log(`🚀 Concurrency: ${settings.concurrency}`);
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log('');

  const { result, cancelled } = await service.run(controller.signal);

  if (cancelled) {
    console.log('⚠️  Crawl cancelled before the frontier was exhausted; no report written');
    process.exitCode = 130;
    return;
  }

  const writer = new ReportWriter(settings.reportPath, { includeFrequencies: settings.reportFrequencies });
  const reportPath = await writer.write(result);

  const { statistics } = result;
  console.log('');
  console.log(`Done in ${formatDuration(statistics.totalTime)}`);
  console.log(`   Visited: ${statistics.pagesVisited}`);
  console.log(`   Failed:  ${statistics.pagesFailed}`);
  console.log(`   Skipped: ${statistics.pagesSkipped}`);
  console.log(`   Links:   ${statistics.linksDiscovered}`);
  console.log(`   Report:  ${reportPath}`);
};

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Crawl failed:', error);
  }
  process.exit(1);
});
