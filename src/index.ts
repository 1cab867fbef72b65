#!/usr/bin/env node
import { Command } from 'commander';
import * as path from 'path';
import { config, ScraperConfig } from './config/config';
import { buildDataset } from './dataset/datasetBuilder';
import { createScrapeOrchestrator } from './scraper/scrapeOrchestrator';
import { describeError } from './utils/errorHandler';
import { logger } from './utils/logger';

interface ScrapeOptions {
  count: string;
  output: string;
  headful?: boolean;
}

interface DatasetOptions {
  count: string;
  root: string;
  headful?: boolean;
}

function parseCount(raw: string): number {
  const count = Number(raw);
  if (!Number.isInteger(count) || count <= 0) {
    console.error(`Error: count must be a positive integer, got '${raw}'`);
    process.exit(1);
  }
  return count;
}

function withHeadful(headful: boolean | undefined): ScraperConfig {
  return headful ? { ...config, browser: { ...config.browser, headless: false } } : config;
}

const program = new Command();

program
  .name('image-dataset')
  .description('Download labeled images from image search results to build training datasets')
  .version('1.0.0');

program
  .command('scrape')
  .description('download images for a single query')
  .argument('<query>', 'search query for images')
  .option('-c, --count <number>', 'number of images to download', config.defaultCount.toString())
  .option('-o, --output <path>', 'output directory', config.defaultOutputFolder)
  .option('--headful', 'show the browser window')
  .action(async (query: string, options: ScrapeOptions) => {
    const count = parseCount(options.count);
    try {
      const orchestrator = createScrapeOrchestrator(withHeadful(options.headful));
      const result = await orchestrator.scrape(query, count, path.resolve(options.output));
      process.exit(result.succeeded > 0 ? 0 : 1);
    } catch (error) {
      console.error('An unexpected error occurred:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('dataset')
  .description('download images for several queries, one folder per query')
  .argument('<queries...>', 'search queries, one label each')
  .option('-c, --count <number>', 'number of images per query', config.defaultCount.toString())
  .option('-r, --root <path>', 'root folder for the per-query folders', config.defaultOutputFolder)
  .option('--headful', 'show the browser window')
  .action(async (queries: string[], options: DatasetOptions) => {
    const count = parseCount(options.count);
    try {
      const orchestrator = createScrapeOrchestrator(withHeadful(options.headful));
      const summary = await buildDataset(orchestrator, queries, count, path.resolve(options.root));

      logger.info(`Total queries processed: ${queries.length}`);
      logger.success(`Successful: ${summary.succeeded.length}`);
      if (summary.failed.length > 0) {
        logger.error(`Failed: ${summary.failed.length}`);
        for (const query of summary.failed) {
          logger.warn(`  - ${query}`);
        }
        process.exit(1);
      }
      logger.success('All datasets built successfully!');
      process.exit(0);
    } catch (error) {
      console.error('An unexpected error occurred:', describeError(error));
      process.exit(1);
    }
  });

program.parseAsync().catch(error => {
  console.error(describeError(error));
  process.exit(1);
});
