import { Actor } from 'apify';
import { log } from 'crawlee';

import { LeboncoinFetcher } from './crawlers/leboncoin';
import { ScrapeEngine } from './engine/scrape-engine';
import { ConfigurationError } from './errors';
import { buildSearchRequest } from './input/request';
import { parseInput, type ActorInput } from './input/schema';
import type { NormalizedRecord, RunResult, SearchRequest } from './types';
import { FilterFormatter } from './utils/normalization';

const PUSH_BATCH_SIZE = 100;

class LeboncoinScraper {
  private readonly log = log.child({ prefix: 'LeboncoinScraper' });
  private readonly request: SearchRequest;

  constructor(private readonly input: ActorInput) {
    this.request = buildSearchRequest(input);
  }

  async run(): Promise<RunResult> {
    const proxyConfiguration = await Actor.createProxyConfiguration(this.input.proxyConfiguration);
    const engine = new ScrapeEngine(new LeboncoinFetcher({ proxyConfiguration }), {
      retry: { maxRetries: this.input.maxRetries },
      fetchTimeoutMs: this.input.fetchTimeoutSecs * 1000,
      maxErrors: this.input.maxErrors,
      scopeConcurrency: this.input.scopeConcurrency
    });

    this.log.info('🔎 Leboncoin scraper initialized');
    this.log.info(`📋 Filters: ${FilterFormatter.describe(this.request.filters)}`);
    this.log.info(
      `⚙️  ${this.request.maxPages || 'unlimited'} pages per location, max age ${this.request.maxAgeDays || 'off'} days, ${this.request.outputFormat} output`
    );

    const stream = engine.stream(this.request);
    let batch: NormalizedRecord[] = [];
    let pushed = 0;

    for (;;) {
      const next = await stream.next();
      if (next.done) {
        await this.flush(batch);
        pushed += batch.length;
        this.log.info(`✅ Completed: ${pushed} records stored`);
        return next.value;
      }

      batch.push(next.value);
      if (batch.length >= PUSH_BATCH_SIZE) {
        await this.flush(batch);
        pushed += batch.length;
        batch = [];
        await Actor.setStatusMessage(`Scraped ${pushed} listings`);
      }
    }
  }

  async storeSummary(result: RunResult): Promise<void> {
    await Actor.setValue('OUTPUT', {
      stats: result.stats,
      outcomes: result.outcomes,
      aborted: result.aborted,
      abortReason: result.abortReason ?? null,
      config: {
        locationType: this.request.locationType,
        locations: this.request.locations,
        filters: FilterFormatter.describe(this.request.filters),
        maxPages: this.request.maxPages,
        limitPerPage: this.request.limitPerPage,
        maxAgeDays: this.request.maxAgeDays,
        consecutiveOldLimit: this.request.consecutiveOldLimit,
        stalePolicy: this.request.stalePolicy,
        outputFormat: this.request.outputFormat
      }
    });

    const { stats } = result;
    const message = `${stats.uniqueEmitted} listings from ${stats.pagesFetched} pages (${stats.duplicates} duplicates, ${stats.errors} errors)`;
    await Actor.setStatusMessage(result.aborted ? `Stopped early: ${result.abortReason ?? 'aborted'}. ${message}` : message, {
      isStatusMessageTerminal: true
    });
  }

  private async flush(batch: NormalizedRecord[]): Promise<void> {
    if (batch.length > 0) {
      await Actor.pushData(batch);
    }
  }
}

Actor.main(async () => {
  const rawInput = await Actor.getInput();

  let input: ActorInput;
  try {
    input = parseInput(rawInput);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error('❌ Invalid input configuration', { issues: error.issues });
    }
    throw error;
  }

  if (input.debug) {
    log.setLevel(log.LEVELS.DEBUG);
  }

  const scraper = new LeboncoinScraper(input);
  const result = await scraper.run();
  await scraper.storeSummary(result);
});
