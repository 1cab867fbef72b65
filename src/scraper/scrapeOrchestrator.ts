/**
 * Scrape Orchestrator
 *
 * One query end to end: open a browser session, load the results page,
 * extract candidates (interactive first, markup scan if that falls short),
 * then fetch, validate and write each candidate. Only a failure to reach the
 * results page aborts a run; every per-candidate failure is recorded and
 * the loop moves on.
 */

import * as fs from 'fs-extra';
import { ConsentHandler } from '../browser/consentHandler';
import { PageLoader } from '../browser/pageLoader';
import { RenderedPageHandle, SessionFactory } from '../browser/pageHandle';
import { launchBrowserSession } from '../browser/puppeteerSession';
import { ScraperConfig, config as defaultConfig } from '../config/config';
import { buildFilename, writeAsset } from '../download/assetWriter';
import { AssetFetcher, FetchFailure, ImageFetcher } from '../download/imageFetcher';
import { ImageFormat, ImageValidator, RejectionReason, describeRejection } from '../download/imageValidator';
import { CandidateSet, CandidateUrl } from '../extraction/candidateSet';
import { UrlExtractor } from '../extraction/urlExtractor';
import { ScrapeError, describeError, handleError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { Result, fail, ok } from '../utils/result';
import { ScrapeObserver, ScrapeState, loggingObserver } from './events';

export interface SavedAsset {
  sequence: number;
  url: string;
  filename: string;
  filePath: string;
  format: ImageFormat;
  bytes: number;
}

export type DownloadFailure =
  | { stage: 'fetch'; sequence: number; url: string; failure: FetchFailure }
  | { stage: 'validate'; sequence: number; url: string; rejection: RejectionReason }
  | { stage: 'write'; sequence: number; url: string; message: string };

export interface ScrapeResult {
  query: string;
  outputDir: string;
  state: 'done' | 'aborted';
  attempted: number;
  succeeded: number;
  usedFallback: boolean;
  files: string[];
  failures: DownloadFailure[];
  error?: string;
}

/** Mutable state of one `scrape` call; concurrent calls each get their own. */
interface ScrapeRun {
  state: ScrapeState;
}

interface DownloadJob {
  candidate: CandidateUrl;
  sequence: number;
  filename: string;
}

export interface Scraper {
  scrape(query: string, count: number, outputDir: string): Promise<ScrapeResult>;
}

export interface ScrapeDependencies {
  openSession: SessionFactory;
  loader: PageLoader;
  extractor: UrlExtractor;
  fetcher: AssetFetcher;
  validator: ImageValidator;
  observer: ScrapeObserver;
  concurrency: number;
}

export function describeDownloadFailure(failure: DownloadFailure): string {
  switch (failure.stage) {
    case 'fetch':
      return failure.failure.message;
    case 'validate':
      return describeRejection(failure.rejection);
    case 'write':
      return failure.message;
  }
}

export class ScrapeOrchestrator implements Scraper {
  private lastRun: ScrapeRun = { state: 'init' };

  constructor(private readonly deps: ScrapeDependencies) {}

  /** State of the most recently started run. */
  get currentState(): ScrapeState {
    return this.lastRun.state;
  }

  async scrape(query: string, count: number, outputDir: string): Promise<ScrapeResult> {
    if (!query.trim()) {
      throw new ScrapeError('Search query must not be empty', 'INVALID_QUERY');
    }
    if (!Number.isInteger(count) || count <= 0) {
      throw new ScrapeError(`Image count must be a positive integer, got ${count}`, 'INVALID_COUNT');
    }

    const run: ScrapeRun = { state: 'init' };
    this.lastRun = run;
    logger.info(`Searching for: '${query}' (target: ${count} images, output: ${outputDir})`);

    let session: RenderedPageHandle | null = null;
    try {
      this.transition(run, 'navigating');
      try {
        session = await this.deps.openSession();
        await this.deps.loader.load(session, query, count);
      } catch (error) {
        handleError(error, 'scrape');
        this.transition(run, 'aborted');
        return this.emptyResult(query, outputDir, describeError(error));
      }

      const { candidates, usedFallback } = await this.collectCandidates(run, session, count);
      if (candidates.size === 0) {
        logger.warn('No image URLs found');
      } else {
        logger.info(`Extracted ${candidates.size} image URLs`);
      }

      this.transition(run, 'downloading');
      const outcomes = await this.downloadAll(candidates, query, count, outputDir);
      this.transition(run, 'done');

      const saved = outcomes.flatMap(o => (o.success ? [o.value] : []));
      const failures = outcomes.flatMap(o => (o.success ? [] : [o.reason]));
      logger.info(`Downloaded ${saved.length}/${count} images to '${outputDir}'`);

      return {
        query,
        outputDir,
        state: 'done',
        attempted: outcomes.length,
        succeeded: saved.length,
        usedFallback,
        files: saved.map(s => s.filename),
        failures,
      };
    } finally {
      if (session) {
        await this.release(session);
      }
    }
  }

  private async collectCandidates(
    run: ScrapeRun,
    session: RenderedPageHandle,
    count: number
  ): Promise<{ candidates: CandidateSet; usedFallback: boolean }> {
    this.transition(run, 'extracting');
    const primary = await this.deps.extractor.extractInteractive(session, count);
    const candidates = primary.candidates;
    if (candidates.size >= count) {
      return { candidates, usedFallback: false };
    }

    logger.info(`Only found ${candidates.size} images with primary method, scanning page source...`);
    this.transition(run, 'fallback-extracting');
    try {
      const supplement = await this.deps.extractor.extractFromPage(session, count);
      const added = candidates.union(supplement);
      logger.info(`Page source scan added ${added} new URLs`);
    } catch (error) {
      this.deps.observer.onEvent({
        type: 'warning',
        message: `Page source unavailable, continuing with ${candidates.size} URLs: ${describeError(error)}`,
      });
    }
    return { candidates, usedFallback: true };
  }

  /**
   * Sequence numbers come from provenance order and are fixed before any
   * download starts, so completion order never changes filenames.
   */
  private async downloadAll(
    candidates: CandidateSet,
    query: string,
    count: number,
    outputDir: string
  ): Promise<Result<SavedAsset, DownloadFailure>[]> {
    const jobs: DownloadJob[] = candidates
      .toArray()
      .slice(0, count)
      .map((candidate, i) => ({ candidate, sequence: i + 1, filename: buildFilename(query, i + 1) }));

    try {
      await fs.ensureDir(outputDir);
    } catch (error) {
      this.deps.observer.onEvent({ type: 'warning', message: `Cannot create ${outputDir}: ${describeError(error)}` });
    }

    const outcomes: Result<SavedAsset, DownloadFailure>[] = [];
    const queue = [...jobs];

    const workers = Array.from(
      { length: Math.min(this.deps.concurrency, queue.length) },
      async () => {
        while (queue.length) {
          const job = queue.shift();
          if (!job) break;
          outcomes[job.sequence - 1] = await this.downloadOne(job, outputDir);
        }
      }
    );

    await Promise.all(workers);
    return outcomes;
  }

  private async downloadOne(job: DownloadJob, outputDir: string): Promise<Result<SavedAsset, DownloadFailure>> {
    const { candidate, sequence, filename } = job;
    const { url } = candidate;

    const fetched = await this.deps.fetcher.fetch(url);
    if (!fetched.success) {
      return this.recordFailure({ stage: 'fetch', sequence, url, failure: fetched.reason });
    }

    const verdict = this.deps.validator.validate(fetched.value);
    if (!verdict.success) {
      return this.recordFailure({ stage: 'validate', sequence, url, rejection: verdict.reason });
    }

    try {
      const filePath = await writeAsset(outputDir, filename, fetched.value);
      const bytes = fetched.value.byteLength;
      this.deps.observer.onEvent({ type: 'download-saved', sequence, filename, bytes });
      return ok({ sequence, url, filename, filePath, format: verdict.value, bytes });
    } catch (error) {
      return this.recordFailure({ stage: 'write', sequence, url, message: describeError(error) });
    }
  }

  private recordFailure(failure: DownloadFailure): Result<SavedAsset, DownloadFailure> {
    this.deps.observer.onEvent({
      type: 'download-failed',
      sequence: failure.sequence,
      url: failure.url,
      stage: failure.stage,
      message: describeDownloadFailure(failure),
    });
    return fail(failure);
  }

  private async release(session: RenderedPageHandle): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      logger.warn(`Failed to close browser session: ${describeError(error)}`);
    }
  }

  private transition(run: ScrapeRun, to: ScrapeState): void {
    const from = run.state;
    run.state = to;
    this.deps.observer.onEvent({ type: 'state', from, to });
  }

  private emptyResult(query: string, outputDir: string, error: string): ScrapeResult {
    return {
      query,
      outputDir,
      state: 'aborted',
      attempted: 0,
      succeeded: 0,
      usedFallback: false,
      files: [],
      failures: [],
      error,
    };
  }
}

/**
 * Wires the orchestrator to a real Chromium session and HTTP fetcher.
 */
export function createScrapeOrchestrator(
  options: ScraperConfig = defaultConfig,
  observer: ScrapeObserver = loggingObserver
): ScrapeOrchestrator {
  const consent = new ConsentHandler({ pauseMs: options.timing.consentPauseMs }, observer);
  return new ScrapeOrchestrator({
    openSession: () => launchBrowserSession(options.browser),
    loader: new PageLoader(options.timing, consent, observer),
    extractor: new UrlExtractor({ timing: options.timing }, observer),
    fetcher: new ImageFetcher({ timeoutMs: options.download.timeoutMs, userAgent: options.browser.userAgent }),
    validator: new ImageValidator(options.download.minImageBytes),
    observer,
    concurrency: options.download.concurrency,
  });
}
