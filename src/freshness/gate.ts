import { DateTime, Duration } from 'luxon';
import type { FreshnessField, RawListing } from '../types';
import { MarketplaceDateParser } from '../utils/normalization';

export type FreshnessVerdict = 'fresh' | 'stale';

export interface FreshnessState {
  consecutiveStale: number;
}

export interface FreshnessPolicy {
  /** null disables the gate: every listing is fresh and the stale limit never fires. */
  maxAge: Duration | null;
  /** Number of back-to-back stale listings tolerated; one more stops the scope. */
  consecutiveLimit: number;
  field: FreshnessField;
}

export const INITIAL_FRESHNESS: FreshnessState = Object.freeze({ consecutiveStale: 0 });

export function freshnessPolicy(maxAgeDays: number, consecutiveLimit: number, field: FreshnessField): FreshnessPolicy {
  return {
    maxAge: maxAgeDays > 0 ? Duration.fromObject({ days: maxAgeDays }) : null,
    consecutiveLimit,
    field
  };
}

export class FreshnessGate {
  constructor(private readonly policy: FreshnessPolicy) {}

  get enabled(): boolean {
    return this.policy.maxAge !== null;
  }

  /**
   * A listing exactly `maxAge` old is still fresh; only strictly older ones
   * are stale. Listings without a usable timestamp are fresh.
   */
  static classifyTimestamp(timestamp: DateTime | null, maxAge: Duration | null, now: DateTime): FreshnessVerdict {
    if (!maxAge || !timestamp) return 'fresh';

    const ageMs = now.toMillis() - timestamp.toMillis();
    return ageMs > maxAge.as('milliseconds') ? 'stale' : 'fresh';
  }

  static timestampOf(listing: RawListing, field: FreshnessField): DateTime | null {
    if (field === 'publication') {
      return MarketplaceDateParser.parse(listing.first_publication_date);
    }
    return MarketplaceDateParser.parse(listing.index_date) ?? MarketplaceDateParser.parse(listing.first_publication_date);
  }

  classify(listing: RawListing, now: DateTime): FreshnessVerdict {
    if (!this.enabled) return 'fresh';
    return FreshnessGate.classifyTimestamp(FreshnessGate.timestampOf(listing, this.policy.field), this.policy.maxAge, now);
  }

  observe(state: FreshnessState, verdict: FreshnessVerdict): { state: FreshnessState; limitExceeded: boolean } {
    if (verdict === 'fresh') {
      return { state: INITIAL_FRESHNESS, limitExceeded: false };
    }

    const next = { consecutiveStale: state.consecutiveStale + 1 };
    return {
      state: next,
      limitExceeded: this.enabled && next.consecutiveStale > this.policy.consecutiveLimit
    };
  }
}
