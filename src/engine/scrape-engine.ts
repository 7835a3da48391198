import { setTimeout as delay } from 'node:timers/promises';
import { log } from 'crawlee';
import type { DateTime } from 'luxon';
import { listingFingerprint } from '../deduplication/fingerprinting';
import { FatalFetchError, TransientFetchError, errorMessage } from '../errors';
import { FreshnessGate, INITIAL_FRESHNESS, freshnessPolicy, type FreshnessState } from '../freshness/gate';
import { resolveScopes } from '../locations/resolver';
import type {
  NormalizedRecord,
  PageFetcher,
  PageRequest,
  PageResult,
  RawListing,
  RunResult,
  SearchRequest,
  SearchScope
} from '../types';
import { processWithConcurrency } from '../utils/concurrency';
import { Channel } from '../utils/channel';
import { FilterFormatter, RecordNormalizer } from '../utils/normalization';
import { DEFAULT_RETRY_POLICY, backoffDelay, type RetryPolicy } from './retry';
import { RunContext } from './run-context';
import { INITIAL_SCOPE_STATE, transition, type ScopeLimits, type ScopeState } from './scope-machine';

export const MAX_PAGE_SIZE = 35;
export const DEFAULT_RECORD_BUFFER = 500;

type Deliver = (records: NormalizedRecord[]) => Promise<void>;

export interface EngineOptions {
  retry?: Partial<RetryPolicy>;
  /** Per page-fetch call; an overrun counts as a transient failure. */
  fetchTimeoutMs?: number;
  /** The run aborts once this many errors are counted. 0 disables the threshold. */
  maxErrors?: number;
  /** Scopes processed in parallel. Pages within a scope are always sequential. */
  scopeConcurrency?: number;
  /** Records buffered ahead of the consumer before scope workers wait for it. */
  recordBufferSize?: number;
  now?: () => DateTime;
}

export interface StreamOptions {
  signal?: AbortSignal;
}

export type CollectedRun = RunResult & { records: NormalizedRecord[] };

export function buildPageRequest(scope: SearchScope, page: number, limit: number): PageRequest {
  const size = Math.min(Math.max(1, Math.floor(limit)), MAX_PAGE_SIZE);
  return { scope, page, limit: size, offset: (page - 1) * size };
}

function raceWithSignal<T>(operation: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    operation.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

async function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    // An abort only cuts the wait short; the caller checks the signal next.
    if (!signal.aborted) throw error;
  }
}

export class ScrapeEngine {
  private readonly log = log.child({ prefix: 'ScrapeEngine' });
  private readonly retry: RetryPolicy;
  private readonly fetchTimeoutMs: number;
  private readonly maxErrors: number;
  private readonly scopeConcurrency: number;
  private readonly recordBufferSize: number;
  private readonly now?: () => DateTime;

  constructor(private readonly fetcher: PageFetcher, options: EngineOptions = {}) {
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 30000;
    this.maxErrors = options.maxErrors ?? 10;
    this.scopeConcurrency = Math.max(1, options.scopeConcurrency ?? 1);
    this.recordBufferSize = Math.max(1, options.recordBufferSize ?? DEFAULT_RECORD_BUFFER);
    this.now = options.now;
  }

  /**
   * Yields records as scopes produce them and returns the run summary.
   * Scope resolution runs first, so a ConfigurationError is thrown before
   * any page is requested.
   */
  async *stream(request: SearchRequest, options: StreamOptions = {}): AsyncGenerator<NormalizedRecord, RunResult, undefined> {
    const scopes = resolveScopes(request.locationType, request.locations, request.filters);
    const ctx = new RunContext(this.maxErrors, this.now, options.signal);
    const channel = new Channel<NormalizedRecord>(this.recordBufferSize);
    const deliver: Deliver = async (records) => {
      for (const record of records) {
        // Closed early only when the consumer has stopped reading.
        if (channel.closed) return;
        await channel.push(record);
      }
    };

    this.log.info(`Starting run over ${scopes.length} scope(s)`, {
      fetcher: this.fetcher.name,
      filters: FilterFormatter.describe(request.filters),
      maxPages: request.maxPages,
      maxAgeDays: request.maxAgeDays,
      stalePolicy: request.stalePolicy,
      outputFormat: request.outputFormat
    });

    let failed = false;
    let failure: unknown;
    const execution = this.execute(scopes, request, ctx, deliver)
      .catch((error: unknown) => {
        failed = true;
        failure = error;
      })
      .finally(() => channel.close());

    let drained = false;
    try {
      for await (const record of channel) {
        yield record;
      }
      drained = true;
    } finally {
      if (!drained) {
        ctx.abort('record stream closed by consumer');
        channel.close();
      }
      await execution;
    }

    if (failed) throw failure;

    const result: RunResult = {
      stats: ctx.stats,
      outcomes: ctx.outcomes,
      aborted: ctx.aborted,
      ...(ctx.reason !== undefined ? { abortReason: ctx.reason } : {})
    };

    const summary = `${ctx.stats.uniqueEmitted} records from ${ctx.stats.pagesFetched} pages, ${ctx.stats.duplicates} duplicates, ${ctx.stats.errors} errors`;
    if (result.aborted) {
      this.log.warning(`Run aborted (${ctx.reason ?? 'unknown reason'}): ${summary}`);
    } else {
      this.log.info(`Run finished: ${summary}`);
    }

    return result;
  }

  async run(request: SearchRequest, options: StreamOptions = {}): Promise<CollectedRun> {
    const records: NormalizedRecord[] = [];
    const iterator = this.stream(request, options);

    for (;;) {
      const next = await iterator.next();
      if (next.done) {
        return { ...next.value, records };
      }
      records.push(next.value);
    }
  }

  private async execute(
    scopes: SearchScope[],
    request: SearchRequest,
    ctx: RunContext,
    deliver: Deliver
  ): Promise<void> {
    const gate = new FreshnessGate(freshnessPolicy(request.maxAgeDays, request.consecutiveOldLimit, request.freshnessField));

    await processWithConcurrency(
      scopes,
      async (scope, index) => {
        if (index >= this.scopeConcurrency) {
          await pause(request.delayBetweenLocationsMs, ctx.signal);
        }
        if (ctx.aborted) {
          ctx.recordSkipped(scope.label);
          return;
        }
        await this.runScope(scope, request, ctx, gate, deliver);
      },
      this.scopeConcurrency
    );
  }

  private async runScope(
    scope: SearchScope,
    request: SearchRequest,
    ctx: RunContext,
    gate: FreshnessGate,
    deliver: Deliver
  ): Promise<void> {
    const scopeLog = this.log.child({ prefix: `Scope ${scope.label}` });
    const limits: ScopeLimits = { maxPages: request.maxPages, maxRetries: this.retry.maxRetries };

    let state: ScopeState = INITIAL_SCOPE_STATE;
    let freshness: FreshnessState = INITIAL_FRESHNESS;
    let pageListings: RawListing[] = [];
    let pagesFetched = 0;
    let recordsEmitted = 0;

    while (state.phase !== 'stopped') {
      if (state.phase === 'fetching') {
        if (ctx.aborted) {
          state = transition(state, { type: 'aborted', detail: ctx.reason ?? 'run aborted' }, limits);
          continue;
        }

        const page = buildPageRequest(scope, state.page, request.limitPerPage);
        const result = await this.fetchPage(scope, page, ctx.signal);

        if (ctx.aborted && result.kind !== 'listings') {
          state = transition(state, { type: 'aborted', detail: ctx.reason ?? 'run aborted' }, limits);
          continue;
        }

        switch (result.kind) {
          case 'listings': {
            pagesFetched++;
            ctx.stats.pagesFetched++;
            pageListings = result.listings;
            const lastPage = result.totalPages !== undefined && page.page >= result.totalPages;
            if (page.page === 1 && result.total !== undefined) {
              scopeLog.info(`Found ${result.total} listings upstream`, { totalPages: result.totalPages });
            }
            state = transition(state, { type: 'page-received', count: result.listings.length, lastPage }, limits);
            break;
          }
          case 'rate-limited':
          case 'transient-error': {
            const detail = result.kind === 'rate-limited' ? 'rate limited by upstream' : result.detail;
            const next = transition(state, { type: 'transient-failure', detail }, limits);
            if (next.phase === 'fetching') {
              ctx.stats.retries++;
              const wait = backoffDelay(this.retry, next.attempt, result.kind === 'rate-limited' ? result.retryAfterMs : undefined);
              scopeLog.warning(`Page ${page.page} failed (${detail}), retry ${next.attempt}/${this.retry.maxRetries} in ${wait} ms`);
              await pause(wait, ctx.signal);
            } else {
              scopeLog.error(`Page ${page.page} failed after ${this.retry.maxRetries} retries: ${detail}`);
              ctx.recordError();
            }
            state = next;
            break;
          }
          case 'fatal-error':
            scopeLog.error(`Page ${page.page} rejected upstream: ${result.detail}`);
            ctx.recordError();
            state = transition(state, { type: 'fatal-failure', detail: result.detail }, limits);
            break;
        }
        continue;
      }

      const evaluation = this.evaluatePage(scope, pageListings, request, ctx, gate, freshness, scopeLog);
      freshness = evaluation.freshness;
      recordsEmitted += evaluation.records.length;
      pageListings = [];
      await deliver(evaluation.records);
      scopeLog.debug(`Page ${state.page}: ${evaluation.records.length} records emitted`, { consecutiveStale: freshness.consecutiveStale });

      state = transition(state, { type: 'page-evaluated', staleLimitExceeded: evaluation.staleLimitExceeded }, limits);
      if (state.phase === 'fetching') {
        await pause(request.delayBetweenPagesMs, ctx.signal);
      }
    }

    ctx.recordOutcome({
      scope: scope.label,
      reason: state.reason,
      pagesFetched,
      recordsEmitted,
      ...(state.detail !== undefined ? { detail: state.detail } : {})
    });
    scopeLog.info(`Stopped: ${state.reason}`, { pagesFetched, recordsEmitted });
  }

  /**
   * Walks one page in order. Runs synchronously so the shared fingerprint
   * set and counters are never observed half-updated by another scope; the
   * page's records are delivered afterwards.
   */
  private evaluatePage(
    scope: SearchScope,
    listings: RawListing[],
    request: SearchRequest,
    ctx: RunContext,
    gate: FreshnessGate,
    initial: FreshnessState,
    scopeLog: typeof log
  ): { freshness: FreshnessState; records: NormalizedRecord[]; staleLimitExceeded: boolean } {
    const now = ctx.now();
    let freshness = initial;
    const records: NormalizedRecord[] = [];
    let staleLimitExceeded = false;

    for (const listing of listings) {
      ctx.stats.totalSeen++;

      const id = listingFingerprint(listing);
      if (ctx.fingerprints.seen(id)) {
        ctx.stats.duplicates++;
        continue;
      }
      ctx.fingerprints.record(id);

      const verdict = gate.classify(listing, now);
      const observed = gate.observe(freshness, verdict);
      freshness = observed.state;
      staleLimitExceeded ||= observed.limitExceeded;

      if (verdict === 'stale') {
        ctx.stats.staleSeen++;
        if (request.stalePolicy === 'exclude-stale') {
          ctx.stats.staleExcluded++;
          continue;
        }
      }

      let record: NormalizedRecord;
      try {
        record = RecordNormalizer.project(RecordNormalizer.normalize(listing, scope, now), request.outputFormat);
      } catch (error) {
        scopeLog.warning(`Could not normalize listing ${id}: ${errorMessage(error)}`);
        ctx.recordError();
        continue;
      }

      records.push(record);
      ctx.stats.uniqueEmitted++;
    }

    return { freshness, records, staleLimitExceeded };
  }

  private async fetchPage(scope: SearchScope, request: PageRequest, runSignal: AbortSignal): Promise<PageResult> {
    const timeout = AbortSignal.timeout(this.fetchTimeoutMs);
    const signal = AbortSignal.any([runSignal, timeout]);

    try {
      return await raceWithSignal(this.fetcher.fetch(scope, request, signal), signal);
    } catch (error) {
      if (runSignal.aborted) {
        return { kind: 'transient-error', detail: 'fetch cancelled' };
      }
      if (timeout.aborted) {
        return { kind: 'transient-error', detail: `page fetch timed out after ${this.fetchTimeoutMs} ms` };
      }
      if (error instanceof FatalFetchError) {
        return { kind: 'fatal-error', detail: error.message };
      }
      if (error instanceof TransientFetchError && error.retryAfterMs !== undefined) {
        return { kind: 'rate-limited', retryAfterMs: error.retryAfterMs };
      }
      return { kind: 'transient-error', detail: errorMessage(error) };
    }
  }
}
