import { ConfigurationError } from '../errors';
import type { FilterSet, FilterValue, PriceRange, SearchRequest } from '../types';
import type { ActorInput, FilterInput } from './schema';
import { parseSearchUrl } from './url-parser';

/** Top-level category groups accepted by name; any numeric id passes through. */
export const CATEGORY_GROUPS: Readonly<Record<string, string>> = {
  ALL: '0',
  EMPLOI: '71',
  VEHICULES: '1',
  IMMOBILIER: '8',
  VACANCES: '66',
  MULTIMEDIA: '14',
  MAISON: '18',
  FAMILLE: '79',
  MODE: '72',
  LOISIRS: '24',
  ANIMAUX: '75',
  MATERIEL_PROFESSIONNEL: '56',
  SERVICES: '31',
  DONS: '1000',
  DIVERS: '37'
};

export function resolveCategory(category: string): string {
  const trimmed = category.trim();
  if (/^\d+$/.test(trimmed)) return trimmed;

  const id = CATEGORY_GROUPS[trimmed.toUpperCase().replace(/[\s-]+/g, '_')];
  if (id === undefined) {
    throw new ConfigurationError('Invalid input', [
      `category: unknown category "${category}" (use an id or one of ${Object.keys(CATEGORY_GROUPS).join(', ')})`
    ]);
  }
  return id;
}

export function toFilterValue(value: FilterInput): FilterValue {
  if (Array.isArray(value)) {
    return { kind: 'set', values: value.map(String) };
  }
  if (typeof value === 'object') {
    return { kind: 'range', ...value };
  }
  return { kind: 'scalar', value };
}

function priceRange(min: number | undefined, max: number | undefined): PriceRange | undefined {
  if (min === undefined && max === undefined) return undefined;
  return { ...(min !== undefined ? { min } : {}), ...(max !== undefined ? { max } : {}) };
}

/**
 * Merges structured input with an optional search URL. Whatever the URL
 * encodes wins; the remaining fields come from the structured input.
 */
export function buildSearchRequest(input: ActorInput): SearchRequest {
  const fromUrl = input.searchUrl !== undefined ? parseSearchUrl(input.searchUrl) : undefined;

  const attributes = new Map<string, FilterValue>();
  for (const [key, value] of Object.entries(input.filters)) {
    attributes.set(key, toFilterValue(value));
  }
  for (const [key, value] of fromUrl?.attributes ?? []) {
    attributes.set(key, value);
  }

  const text = fromUrl?.text ?? input.searchText?.trim();
  const price = fromUrl?.price ?? priceRange(input.priceMin, input.priceMax);
  const shippable = fromUrl?.shippable ?? input.shippable;

  const filters: FilterSet = {
    category: resolveCategory(fromUrl?.category ?? input.category),
    ...(text ? { text } : {}),
    searchInTitleOnly: fromUrl?.searchInTitleOnly ?? input.searchInTitleOnly,
    ...(price ? { price } : {}),
    sort: fromUrl?.sort ?? input.sort,
    adType: fromUrl?.adType ?? input.adType,
    ownerType: fromUrl?.ownerType ?? input.ownerType,
    ...(shippable !== undefined ? { shippable } : {}),
    attributes
  };

  const urlLocationType = fromUrl?.locationType;

  return {
    locationType: urlLocationType ?? input.locationType,
    locations: urlLocationType !== undefined && fromUrl ? fromUrl.locations : input.locations,
    filters,
    maxPages: input.maxPages,
    limitPerPage: input.limitPerPage,
    maxAgeDays: input.maxAgeDays,
    consecutiveOldLimit: input.consecutiveOldLimit,
    stalePolicy: input.stalePolicy,
    freshnessField: input.freshnessField,
    delayBetweenPagesMs: Math.round(input.delayBetweenPages * 1000),
    delayBetweenLocationsMs: Math.round(input.delayBetweenLocations * 1000),
    outputFormat: input.outputFormat
  };
}
