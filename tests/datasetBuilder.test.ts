import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { buildDataset, cleanFolderName } from '../src/dataset/datasetBuilder';
import { ScrapeResult, Scraper } from '../src/scraper/scrapeOrchestrator';

class ScriptedScraper implements Scraper {
  readonly calls: { query: string; count: number; outputDir: string }[] = [];

  constructor(private readonly outcomes: Record<string, number | Error>) {}

  async scrape(query: string, count: number, outputDir: string): Promise<ScrapeResult> {
    this.calls.push({ query, count, outputDir });
    const outcome = this.outcomes[query] ?? 0;
    if (outcome instanceof Error) throw outcome;
    return {
      query,
      outputDir,
      state: 'done',
      attempted: count,
      succeeded: outcome,
      usedFallback: false,
      files: Array.from({ length: outcome }, (_, i) => `${cleanFolderName(query)}_${i + 1}.jpg`),
      failures: [],
    };
  }
}

describe('cleanFolderName', () => {
  it('should lowercase and replace runs of other characters with one underscore', () => {
    expect(cleanFolderName('Hello World')).toBe('hello_world');
    expect(cleanFolderName('  Red-Panda!! ')).toBe('red_panda');
    expect(cleanFolderName('Cats & Dogs 2')).toBe('cats_dogs_2');
  });
});

describe('buildDataset', () => {
  const root = path.join('datasets', 'animals');

  it('should scrape each query into its own folder in order', async () => {
    const scraper = new ScriptedScraper({ 'Red Panda': 3, otter: 2 });

    const summary = await buildDataset(scraper, ['Red Panda', 'otter'], 3, root);

    expect(scraper.calls).toEqual([
      { query: 'Red Panda', count: 3, outputDir: path.join(root, 'red_panda') },
      { query: 'otter', count: 3, outputDir: path.join(root, 'otter') },
    ]);
    expect(summary.succeeded).toEqual(['Red Panda', 'otter']);
    expect(summary.failed).toEqual([]);
    expect(summary.results.map(r => r.succeeded)).toEqual([3, 2]);
  });

  it('should count queries without a saved image as failed and carry on', async () => {
    const scraper = new ScriptedScraper({ lynx: 0, wolf: new Error('browser crashed'), fox: 1 });

    const summary = await buildDataset(scraper, ['lynx', 'wolf', 'fox'], 2, root);

    expect(summary.succeeded).toEqual(['fox']);
    expect(summary.failed).toEqual(['lynx', 'wolf']);
    expect(summary.results.map(r => r.query)).toEqual(['lynx', 'fox']);
  });

  it('should reject an empty query list and a bad count', async () => {
    const scraper = new ScriptedScraper({});

    await expect(buildDataset(scraper, [], 5, root)).rejects.toMatchObject({ code: 'INVALID_QUERY' });
    await expect(buildDataset(scraper, ['otter'], 0, root)).rejects.toMatchObject({ code: 'INVALID_COUNT' });
    expect(scraper.calls).toEqual([]);
  });
});
