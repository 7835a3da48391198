import type { RawListing } from './raw-listing';

export type { RawListing, RawAttribute } from './raw-listing';

export type LocationType = 'none' | 'city' | 'department' | 'region';

export type LocationDescriptor =
  | { kind: 'none' }
  | { kind: 'city'; lat: number; lng: number; radius: number; name?: string; zipcode?: string }
  | { kind: 'department'; code: string }
  | { kind: 'region'; name: string; id: string };

export type SortOrder = 'newest' | 'oldest' | 'cheapest' | 'expensive' | 'relevance';
export type AdType = 'offer' | 'demand';
export type OwnerType = 'all' | 'private' | 'pro';

export type FilterValue =
  | { kind: 'scalar'; value: string | number | boolean }
  | { kind: 'range'; min?: number; max?: number }
  | { kind: 'set'; values: string[] };

export interface PriceRange {
  min?: number;
  max?: number;
}

export interface FilterSet {
  category: string;
  text?: string;
  searchInTitleOnly: boolean;
  price?: PriceRange;
  sort: SortOrder;
  adType: AdType;
  ownerType: OwnerType;
  shippable?: boolean;
  attributes: ReadonlyMap<string, FilterValue>;
}

export interface SearchScope {
  readonly label: string;
  readonly location: Readonly<LocationDescriptor>;
  readonly filters: Readonly<FilterSet>;
}

export interface PageRequest {
  scope: SearchScope;
  page: number;
  limit: number;
  offset: number;
}

export type PageResult =
  | { kind: 'listings'; listings: RawListing[]; totalPages?: number; total?: number }
  | { kind: 'rate-limited'; retryAfterMs?: number }
  | { kind: 'transient-error'; detail: string }
  | { kind: 'fatal-error'; detail: string };

export interface PageFetcher {
  name: string;
  fetch(scope: SearchScope, request: PageRequest, signal: AbortSignal): Promise<PageResult>;
}

export type Scalar = string | number | boolean | null;
export type NormalizedRecord = Record<string, Scalar | Scalar[]>;
export type OutputFormat = 'detailed' | 'compact';

export type StalePolicy = 'emit-stale' | 'exclude-stale';
export type FreshnessField = 'index' | 'publication';

export type StopReason =
  | 'end-of-results'
  | 'stale-limit'
  | 'page-budget'
  | 'error'
  | 'fatal'
  | 'aborted';

export interface SearchRequest {
  locationType: LocationType;
  locations: unknown[];
  filters: FilterSet;
  maxPages: number;
  limitPerPage: number;
  maxAgeDays: number;
  consecutiveOldLimit: number;
  stalePolicy: StalePolicy;
  freshnessField: FreshnessField;
  delayBetweenPagesMs: number;
  delayBetweenLocationsMs: number;
  outputFormat: OutputFormat;
}

export interface ScopeOutcome {
  scope: string;
  reason: StopReason;
  pagesFetched: number;
  recordsEmitted: number;
  detail?: string;
}

export interface RunStats {
  totalSeen: number;
  uniqueEmitted: number;
  duplicates: number;
  staleSeen: number;
  staleExcluded: number;
  pagesFetched: number;
  scopesProcessed: number;
  retries: number;
  errors: number;
  stoppedEarly: Array<{ scope: string; reason: StopReason; detail?: string }>;
}

export interface RunResult {
  stats: RunStats;
  outcomes: ScopeOutcome[];
  aborted: boolean;
  abortReason?: string;
}
