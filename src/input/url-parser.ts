import { ConfigurationError } from '../errors';
import { DEFAULT_CITY_RADIUS_M } from '../locations/resolver';
import { findCity, findRegionById } from '../locations/reference-data';
import type { AdType, FilterValue, LocationType, OwnerType, PriceRange, SortOrder } from '../types';

export interface ParsedSearchUrl {
  category?: string;
  text?: string;
  searchInTitleOnly?: boolean;
  locationType?: Exclude<LocationType, 'none'>;
  locations: Record<string, unknown>[];
  price?: PriceRange;
  sort?: SortOrder;
  adType?: AdType;
  ownerType?: OwnerType;
  shippable?: boolean;
  attributes: Map<string, FilterValue>;
}

type ParsedLocation = { type: Exclude<LocationType, 'none'>; descriptor: Record<string, unknown> };

const RANGE = /^(min|\d+(?:\.\d+)?)-(max|\d+(?:\.\d+)?)$/;
const SKIPPED_KEYS = new Set(['page']);

function cityName(raw: string): string {
  return raw.replace(/_/g, ' ').trim();
}

function parseCoordinate(value: string | undefined, token: string): number {
  const parsed = Number(value);
  if (value === undefined || value === '' || Number.isNaN(parsed)) {
    throw new ConfigurationError('Invalid search URL', [`locations: bad coordinates in "${token}"`]);
  }
  return parsed;
}

/** `Name_zip` → `{ name, zipcode }`; the zip is only split off when it is all digits. */
function splitCity(part: string): { name: string; zipcode?: string } {
  const pieces = part.split('_');
  const last = pieces[pieces.length - 1];
  if (pieces.length >= 2 && /^\d+$/.test(last)) {
    return { name: cityName(pieces.slice(0, -1).join('_')), zipcode: last };
  }
  return { name: cityName(part) };
}

function parseLocationToken(token: string): ParsedLocation {
  const department = /^d_(\d{1,3}|2[ABab])$/.exec(token);
  if (department) {
    return { type: 'department', descriptor: { code: department[1] } };
  }

  const region = /^r_(\d+)$/.exec(token);
  if (region) {
    const match = findRegionById(region[1]);
    if (!match) {
      throw new ConfigurationError('Invalid search URL', [`locations: unknown region id "${region[1]}"`]);
    }
    return { type: 'region', descriptor: { name: match.name } };
  }

  if (token.includes('__')) {
    const [cityPart, coordinates = ''] = token.split('__');
    const [lat, lng, radius] = coordinates.split('_');
    const city = splitCity(cityPart);
    return {
      type: 'city',
      descriptor: {
        ...city,
        lat: parseCoordinate(lat, token),
        lng: parseCoordinate(lng, token),
        radius: radius === undefined ? DEFAULT_CITY_RADIUS_M : Math.round(parseCoordinate(radius, token))
      }
    };
  }

  const city = splitCity(token);
  const known = city.zipcode !== undefined ? findCity(city.name) : undefined;
  if (!known) {
    throw new ConfigurationError('Invalid search URL', [`locations: unknown city "${token}"`]);
  }
  return {
    type: 'city',
    descriptor: { name: city.name, zipcode: city.zipcode, lat: known.lat, lng: known.lng, radius: DEFAULT_CITY_RADIUS_M }
  };
}

export function parseRange(value: string): { min?: number; max?: number } | undefined {
  const match = RANGE.exec(value.trim());
  if (!match) return undefined;

  const [, min, max] = match;
  return {
    ...(min !== 'min' ? { min: Number(min) } : {}),
    ...(max !== 'max' ? { max: Number(max) } : {})
  };
}

/** Ranges (`min-N`, `N-max`, `A-B`), comma lists, and single values as one-element sets. */
export function parseFilterValue(value: string): FilterValue {
  const range = parseRange(value);
  if (range) return { kind: 'range', ...range };

  const values = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  return { kind: 'set', values };
}

function parseSort(sort: string | null, order: string | null): SortOrder | undefined {
  switch (sort) {
    case 'time':
      return order === 'asc' ? 'oldest' : 'newest';
    case 'price':
      return order === 'desc' ? 'expensive' : 'cheapest';
    case 'relevance':
      return 'relevance';
    default:
      return undefined;
  }
}

/**
 * Turns a marketplace search URL (as copied from the browser) into the
 * filters and locations it encodes. Keys without a dedicated meaning become
 * attribute filters.
 */
export function parseSearchUrl(raw: string): ParsedSearchUrl {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new ConfigurationError('Invalid search URL', [`searchUrl: "${raw}" is not a URL`], { cause: error });
  }

  const params = url.searchParams;
  const result: ParsedSearchUrl = { locations: [], attributes: new Map() };

  const sort = parseSort(params.get('sort'), params.get('order'));
  if (sort) result.sort = sort;

  for (const [key, value] of params) {
    if (SKIPPED_KEYS.has(key) || key === 'sort' || key === 'order' || value === '') continue;

    switch (key) {
      case 'category':
        result.category = value;
        break;
      case 'text':
        result.text = value;
        break;
      case 'search_in':
        result.searchInTitleOnly = value === 'subject';
        break;
      case 'locations': {
        const parsed = value
          .split(',')
          .map((token) => token.trim())
          .filter((token) => token.length > 0)
          .map(parseLocationToken);
        const kinds = new Set(parsed.map((location) => location.type));
        if (kinds.size > 1) {
          throw new ConfigurationError('Invalid search URL', [`locations: mixes ${[...kinds].join(' and ')} locations`]);
        }
        result.locationType = parsed[0]?.type;
        result.locations = parsed.map((location) => location.descriptor);
        break;
      }
      case 'price': {
        const price = parseRange(value) ?? (/^\d+$/.test(value) ? { min: Number(value), max: Number(value) } : undefined);
        if (!price) {
          throw new ConfigurationError('Invalid search URL', [`price: "${value}" is not a price range`]);
        }
        result.price = price;
        break;
      }
      case 'owner_type':
        if (value === 'private' || value === 'pro' || value === 'all') result.ownerType = value;
        break;
      case 'ad_type':
        if (value === 'offer' || value === 'demand') result.adType = value;
        break;
      case 'shippable':
        result.shippable = value === '1' || value === 'true';
        break;
      default:
        result.attributes.set(key, parseFilterValue(value));
    }
  }

  return result;
}
