import { log } from 'crawlee';
import { gotScraping } from 'got-scraping';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { RawListingSchema } from '../types/raw-listing';
import type { FilterSet, LocationDescriptor, PageFetcher, PageRequest, PageResult, RawListing, SearchScope, SortOrder } from '../types';

export const SEARCH_ENDPOINT = 'https://api.leboncoin.fr/finder/search';

const SearchResponseSchema = z.object({
  total: z.number().optional(),
  max_pages: z.number().optional(),
  ads: z.array(z.unknown()).nullish()
});

type Range = { min?: number; max?: number };

export interface FinderSearchBody {
  filters: {
    category: { id: string };
    enums: Record<string, string[]>;
    keywords?: { text: string; type?: 'subject' };
    location: Record<string, unknown>;
    ranges: Record<string, Range>;
  };
  limit: number;
  limit_alu: number;
  offset: number;
  sort_by: 'time' | 'price' | 'relevance';
  sort_order?: 'asc' | 'desc';
  owner_type?: 'private' | 'pro';
}

const SORTS: Record<SortOrder, Pick<FinderSearchBody, 'sort_by' | 'sort_order'>> = {
  newest: { sort_by: 'time', sort_order: 'desc' },
  oldest: { sort_by: 'time', sort_order: 'asc' },
  cheapest: { sort_by: 'price', sort_order: 'asc' },
  expensive: { sort_by: 'price', sort_order: 'desc' },
  relevance: { sort_by: 'relevance' }
};

function locationFilter(location: LocationDescriptor, shippable: boolean | undefined): Record<string, unknown> {
  const extra = shippable !== undefined ? { shippable } : {};

  switch (location.kind) {
    case 'none':
      return extra;
    case 'city':
      return {
        locations: [
          {
            locationType: 'city',
            label: location.name ?? '',
            city: location.name ?? '',
            ...(location.zipcode !== undefined ? { zipcode: location.zipcode } : {}),
            area: { lat: location.lat, lng: location.lng, radius: location.radius }
          }
        ],
        ...extra
      };
    case 'department':
      return { locations: [{ locationType: 'department', department_id: location.code }], ...extra };
    case 'region':
      return { locations: [{ locationType: 'region', region_id: location.id }], ...extra };
  }
}

/** Builds the finder API payload for one page of one scope. */
export function buildSearchBody(location: LocationDescriptor, filters: FilterSet, request: PageRequest): FinderSearchBody {
  const enums: Record<string, string[]> = { ad_type: [filters.adType] };
  const ranges: Record<string, Range> = {};

  if (filters.price) {
    ranges.price = { ...filters.price };
  }
  for (const [key, value] of filters.attributes) {
    switch (value.kind) {
      case 'scalar':
        enums[key] = [String(value.value)];
        break;
      case 'set':
        enums[key] = [...value.values];
        break;
      case 'range':
        ranges[key] = {
          ...(value.min !== undefined ? { min: value.min } : {}),
          ...(value.max !== undefined ? { max: value.max } : {})
        };
        break;
    }
  }

  return {
    filters: {
      category: { id: filters.category },
      enums,
      ...(filters.text ? { keywords: { text: filters.text, ...(filters.searchInTitleOnly ? { type: 'subject' as const } : {}) } } : {}),
      location: locationFilter(location, filters.shippable),
      ranges
    },
    limit: request.limit,
    limit_alu: 3,
    offset: request.offset,
    ...SORTS[filters.sort],
    ...(filters.ownerType !== 'all' ? { owner_type: filters.ownerType } : {})
  };
}

/** Seconds or an HTTP date, as `Retry-After` allows. */
export function parseRetryAfter(header: string | undefined, now = Date.now()): number | undefined {
  if (!header) return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export function classifyStatus(statusCode: number, retryAfter?: string): PageResult | undefined {
  if (statusCode === 429) {
    const retryAfterMs = parseRetryAfter(retryAfter);
    return retryAfterMs !== undefined ? { kind: 'rate-limited', retryAfterMs } : { kind: 'rate-limited' };
  }
  if (statusCode === 403 || statusCode === 408 || statusCode >= 500) {
    return { kind: 'transient-error', detail: `HTTP ${statusCode}` };
  }
  if (statusCode >= 400) {
    return { kind: 'fatal-error', detail: `HTTP ${statusCode}` };
  }
  return undefined;
}

export function parseSearchResponse(body: unknown, pageSize: number): PageResult {
  const parsed = SearchResponseSchema.safeParse(body);
  if (!parsed.success) {
    return { kind: 'transient-error', detail: 'unexpected search response shape' };
  }

  const listings: RawListing[] = [];
  for (const [index, ad] of (parsed.data.ads ?? []).entries()) {
    const listing = RawListingSchema.safeParse(ad);
    if (listing.success) {
      listings.push(listing.data);
    } else {
      log.warning(`Skipping malformed ad at index ${index}: ${listing.error.issues[0]?.message ?? 'invalid'}`);
    }
  }

  const { total, max_pages: maxPages } = parsed.data;
  const totalPages = maxPages ?? (total !== undefined ? Math.ceil(total / pageSize) : undefined);

  return {
    kind: 'listings',
    listings,
    ...(totalPages !== undefined ? { totalPages } : {}),
    ...(total !== undefined ? { total } : {})
  };
}

/** The part of a crawlee `ProxyConfiguration` the fetcher uses. */
export interface ProxyUrlSource {
  newUrl(sessionId?: string | number): Promise<string | undefined>;
}

export interface LeboncoinFetcherOptions {
  proxyConfiguration?: ProxyUrlSource;
}

export class LeboncoinFetcher implements PageFetcher {
  readonly name = 'leboncoin';
  private readonly log = log.child({ prefix: 'LeboncoinFetcher' });
  private readonly sessionId = `lbc_${Math.floor(Math.random() * 1e9)}`;

  constructor(private readonly options: LeboncoinFetcherOptions = {}) {}

  async fetch(scope: SearchScope, request: PageRequest, signal: AbortSignal): Promise<PageResult> {
    const body = buildSearchBody(scope.location, scope.filters, request);
    const proxyUrl = await this.options.proxyConfiguration?.newUrl(this.sessionId);

    this.log.debug(`POST page ${request.page} for ${scope.label}`, { offset: request.offset, proxied: proxyUrl !== undefined });

    const response = await gotScraping({
      url: SEARCH_ENDPOINT,
      method: 'POST',
      json: body,
      responseType: 'text',
      proxyUrl,
      signal,
      throwHttpErrors: false,
      headers: {
        'accept': 'application/json',
        'origin': 'https://www.leboncoin.fr',
        'referer': 'https://www.leboncoin.fr/'
      }
    });

    const failure = classifyStatus(response.statusCode, response.headers['retry-after']);
    if (failure) return failure;

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      return { kind: 'transient-error', detail: `invalid JSON from search endpoint: ${errorMessage(error)}` };
    }

    return parseSearchResponse(payload, request.limit);
  }
}
