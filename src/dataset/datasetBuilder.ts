import * as path from 'path';
import { ScrapeResult, Scraper } from '../scraper/scrapeOrchestrator';
import { ScrapeError, describeError, handleError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export interface DatasetSummary {
  results: ScrapeResult[];
  succeeded: string[];
  failed: string[];
}

/**
 * Folder name for a label: "Hello World!" becomes "hello_world".
 */
export function cleanFolderName(query: string): string {
  return query
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

/**
 * Scrapes each query into its own folder under `rootDir`, one at a time.
 * A query that saves no image is reported as failed; the batch carries on.
 */
export async function buildDataset(
  scraper: Scraper,
  queries: string[],
  count: number,
  rootDir: string
): Promise<DatasetSummary> {
  if (queries.length === 0) {
    throw new ScrapeError('At least one query must be provided', 'INVALID_QUERY');
  }
  if (!Number.isInteger(count) || count <= 0) {
    throw new ScrapeError(`Image count must be a positive integer, got ${count}`, 'INVALID_COUNT');
  }

  logger.info(`Queries: ${queries.join(', ')}`);
  logger.info(`Images per query: ${count} (total: ${queries.length * count})`);

  const summary: DatasetSummary = { results: [], succeeded: [], failed: [] };

  for (const query of queries) {
    const outputDir = path.join(rootDir, cleanFolderName(query));
    logger.info(`Processing query '${query}' into '${outputDir}'`);

    try {
      const result = await scraper.scrape(query, count, outputDir);
      summary.results.push(result);
      if (result.succeeded > 0) {
        summary.succeeded.push(query);
        logger.success(`Completed '${query}': ${result.succeeded}/${count} images`);
      } else {
        summary.failed.push(query);
        logger.error(`No images saved for '${query}'${result.error ? `: ${result.error}` : ''}`);
      }
    } catch (error) {
      handleError(error, `dataset:${query}`);
      summary.failed.push(query);
      logger.error(`Failed to process '${query}': ${describeError(error)}`);
    }
  }

  return summary;
}
