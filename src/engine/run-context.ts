import { DateTime } from 'luxon';
import { FingerprintStore } from '../deduplication/fingerprinting';
import { RunAborted } from '../errors';
import type { RunStats, ScopeOutcome, StopReason } from '../types';

export function emptyStats(): RunStats {
  return {
    totalSeen: 0,
    uniqueEmitted: 0,
    duplicates: 0,
    staleSeen: 0,
    staleExcluded: 0,
    pagesFetched: 0,
    scopesProcessed: 0,
    retries: 0,
    errors: 0,
    stoppedEarly: []
  };
}

/**
 * Everything one run mutates: the fingerprint set, the counters and the
 * cancellation handle. Built at run start and passed to every scope worker.
 * Workers share the event loop, so each mutate-then-check below happens in
 * one synchronous step and needs no further locking.
 */
export class RunContext {
  readonly fingerprints = new FingerprintStore();
  readonly stats: RunStats = emptyStats();
  readonly outcomes: ScopeOutcome[] = [];
  private readonly controller = new AbortController();
  private abortReason?: string;

  constructor(
    readonly maxErrors: number,
    readonly now: () => DateTime = () => DateTime.now(),
    external?: AbortSignal
  ) {
    if (external) {
      if (external.aborted) {
        this.abort('run cancelled by caller');
      } else {
        external.addEventListener('abort', () => this.abort('run cancelled by caller'), { once: true });
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get aborted(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | undefined {
    return this.abortReason;
  }

  abort(reason: string): void {
    if (this.aborted) return;
    this.abortReason = reason;
    this.controller.abort(new RunAborted(reason));
  }

  /** Counts one error and aborts the run once the threshold (if any) is reached. */
  recordError(): void {
    this.stats.errors++;
    if (this.maxErrors > 0 && this.stats.errors >= this.maxErrors) {
      this.abort(`error threshold reached (${this.stats.errors} errors)`);
    }
  }

  recordOutcome(outcome: ScopeOutcome): void {
    this.outcomes.push(outcome);
    this.stats.scopesProcessed++;
    if (outcome.reason !== 'end-of-results') {
      this.stats.stoppedEarly.push(this.stopEntry(outcome.scope, outcome.reason, outcome.detail));
    }
  }

  /** A scope the run never started because it was aborted first. */
  recordSkipped(scope: string): void {
    const detail = this.abortReason ?? 'run aborted';
    this.outcomes.push({ scope, reason: 'aborted', pagesFetched: 0, recordsEmitted: 0, detail });
    this.stats.stoppedEarly.push(this.stopEntry(scope, 'aborted', detail));
  }

  private stopEntry(scope: string, reason: StopReason, detail?: string): RunStats['stoppedEarly'][number] {
    return detail !== undefined ? { scope, reason, detail } : { scope, reason };
  }
}
