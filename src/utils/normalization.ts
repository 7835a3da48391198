import { DateTime } from 'luxon';
import type {
  FilterSet,
  FilterValue,
  LocationDescriptor,
  NormalizedRecord,
  OutputFormat,
  RawAttribute,
  RawListing,
  Scalar,
  SearchScope
} from '../types';
import { listingFingerprint } from '../deduplication/fingerprinting';

export const MARKETPLACE_ZONE = 'Europe/Paris';
const MARKETPLACE_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export class MarketplaceDateParser {
  /** Finder API dates are Paris wall-clock time without an offset. */
  static parse(value: string | null | undefined): DateTime | null {
    if (!value) return null;

    const local = DateTime.fromFormat(value.trim(), MARKETPLACE_FORMAT, { zone: MARKETPLACE_ZONE });
    if (local.isValid) return local;

    const iso = DateTime.fromISO(value.trim(), { zone: MARKETPLACE_ZONE });
    return iso.isValid ? iso : null;
  }

  static format(value: string | null | undefined): string | null {
    const parsed = this.parse(value);
    return parsed ? parsed.setZone(MARKETPLACE_ZONE).toFormat(MARKETPLACE_FORMAT) : null;
  }
}

export class FilterFormatter {
  static formatValue(value: FilterValue): string {
    switch (value.kind) {
      case 'scalar':
        return String(value.value);
      case 'range':
        return `${value.min ?? 'min'}-${value.max ?? 'max'}`;
      case 'set':
        return value.values.join(',');
    }
  }

  /** Renders a filter set as one `key=value` line, for record provenance and logs. */
  static describe(filters: FilterSet): string {
    const parts = [`category=${filters.category}`];

    if (filters.text) {
      parts.push(`text=${filters.text}${filters.searchInTitleOnly ? ' (title)' : ''}`);
    }
    if (filters.price) {
      parts.push(`price=${this.formatValue({ kind: 'range', ...filters.price })}`);
    }
    parts.push(`sort=${filters.sort}`, `ad_type=${filters.adType}`, `owner_type=${filters.ownerType}`);
    if (filters.shippable !== undefined) {
      parts.push(`shippable=${filters.shippable}`);
    }
    for (const [key, value] of filters.attributes) {
      parts.push(`${key}=${this.formatValue(value)}`);
    }

    return parts.join(';');
  }
}

export class LocationLabeler {
  static label(location: LocationDescriptor): string {
    switch (location.kind) {
      case 'none':
        return 'everywhere';
      case 'city': {
        const name = location.name ?? 'city';
        return `${name} (${location.lat}, ${location.lng}, ${location.radius}m)`;
      }
      case 'department':
        return `department ${location.code}`;
      case 'region':
        return `region ${location.name}`;
    }
  }
}

const COMPACT_FIELDS = [
  'id',
  'url',
  'title',
  'price',
  'category_name',
  'location_city',
  'location_zipcode',
  'location_department',
  'owner_type',
  'first_publication_date',
  'index_date',
  'image_thumb',
  'search_scope'
] as const;

export class RecordNormalizer {
  static readonly compactFields: readonly string[] = COMPACT_FIELDS;

  /**
   * Flattens one ad into the detailed record shape. Every fixed field is
   * present (null when the ad lacks it); attribute fields vary per category.
   */
  static normalize(listing: RawListing, scope: SearchScope, scrapedAt: DateTime): NormalizedRecord {
    const images: NonNullable<RawListing['images']> = listing.images ?? {};
    const location: NonNullable<RawListing['location']> = listing.location ?? {};
    const owner: NonNullable<RawListing['owner']> = listing.owner ?? {};
    const options: NonNullable<RawListing['options']> = listing.options ?? {};
    const imageUrls = images.urls_large ?? images.urls ?? [];

    const record: NormalizedRecord = {
      id: listingFingerprint(listing),
      url: listing.url ?? null,
      title: listing.subject ?? null,
      description: listing.body ?? null,
      category_id: listing.category_id ?? null,
      category_name: listing.category_name ?? null,
      ad_type: listing.ad_type ?? null,
      status: listing.status ?? null,
      brand: listing.brand ?? null,
      price: listing.price?.[0] ?? null,
      has_phone: listing.has_phone ?? null,
      first_publication_date: MarketplaceDateParser.format(listing.first_publication_date),
      index_date: MarketplaceDateParser.format(listing.index_date),
      expiration_date: MarketplaceDateParser.format(listing.expiration_date),
      image_thumb: images.thumb_url ?? images.small_url ?? imageUrls[0] ?? null,
      image_count: images.nb_images ?? imageUrls.length,
      images: [...imageUrls],
      location_city: location.city ?? location.city_label ?? null,
      location_zipcode: location.zipcode ?? null,
      location_department: location.department_name ?? null,
      location_department_id: location.department_id ?? null,
      location_region: location.region_name ?? null,
      location_region_id: location.region_id ?? null,
      location_country: location.country_id ?? null,
      location_lat: location.lat ?? null,
      location_lng: location.lng ?? null,
      owner_user_id: owner.user_id ?? null,
      owner_store_id: owner.store_id ?? null,
      owner_type: owner.type ?? null,
      owner_name: owner.name ?? null,
      owner_siren: owner.siren ?? null,
      option_urgent: options.urgent ?? false,
      option_booster: options.booster ?? false,
      option_gallery: options.gallery ?? false,
      option_photosup: options.photosup ?? false,
      option_sub_toplist: options.sub_toplist ?? false,
      scraped_at: scrapedAt.setZone(MARKETPLACE_ZONE).toFormat(MARKETPLACE_FORMAT),
      search_scope: scope.label,
      search_category: scope.filters.category,
      search_filters: FilterFormatter.describe(scope.filters)
    };

    for (const attribute of listing.attributes ?? []) {
      const key = this.attributeKey(attribute.key);
      if (!key || key in record) continue;
      record[key] = this.attributeValue(attribute);
    }

    return record;
  }

  static project(record: NormalizedRecord, format: OutputFormat): NormalizedRecord {
    if (format === 'detailed') return record;

    const compact: NormalizedRecord = {};
    for (const field of COMPACT_FIELDS) {
      compact[field] = record[field] ?? null;
    }
    return compact;
  }

  static attributeKey(rawKey: string): string | null {
    const slug = rawKey
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '')
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '_')
      .replace(/^_+|_+$/g, '');

    return slug ? `attr_${slug}` : null;
  }

  private static attributeValue(attribute: RawAttribute): Scalar | Scalar[] {
    const labels = attribute.values_label ?? attribute.values;
    if (labels && labels.length > 1) {
      return [...labels];
    }
    return attribute.value_label ?? attribute.value ?? labels?.[0] ?? null;
  }
}
