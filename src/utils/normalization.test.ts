import { DateTime } from 'luxon';
import { describe, expect, it } from 'vitest';
import type { FilterSet, FilterValue, RawListing, SearchScope } from '../types';
import { FilterFormatter, LocationLabeler, MarketplaceDateParser, RecordNormalizer } from './normalization';

const filters: FilterSet = {
  category: '9',
  text: 'maison',
  searchInTitleOnly: true,
  price: { min: 100000 },
  sort: 'newest',
  adType: 'offer',
  ownerType: 'private',
  attributes: new Map<string, FilterValue>([
    ['real_estate_type', { kind: 'set', values: ['1', '2'] }],
    ['rooms', { kind: 'range', min: 3 }]
  ])
};

const scope: SearchScope = {
  label: 'department 35',
  location: { kind: 'department', code: '35' },
  filters
};

const scrapedAt = DateTime.fromISO('2026-03-10T11:00:00Z');

const listing: RawListing = {
  list_id: 2890012345,
  subject: 'Maison 5 pièces',
  body: 'Jardin et garage.',
  url: 'https://www.leboncoin.fr/ad/ventes_immobilieres/2890012345',
  category_id: '9',
  category_name: 'Ventes immobilières',
  ad_type: 'offer',
  status: 'active',
  price: [289000],
  has_phone: true,
  first_publication_date: '2026-03-08 18:42:10',
  index_date: '2026-03-09 07:05:00',
  images: {
    thumb_url: 'https://img.example/thumb/1.jpg',
    nb_images: 3,
    urls_large: ['https://img.example/large/1.jpg', 'https://img.example/large/2.jpg']
  },
  location: {
    city: 'Rennes',
    zipcode: '35000',
    department_name: 'Ille-et-Vilaine',
    department_id: '35',
    region_name: 'Bretagne',
    region_id: '6',
    country_id: 'FR',
    lat: 48.11,
    lng: -1.68
  },
  owner: { user_id: 'u-1', type: 'private', name: 'Camille' },
  options: { urgent: true },
  attributes: [
    { key: 'rooms', value: '5', value_label: '5' },
    { key: 'Énergie classe', value: 'c', value_label: 'C' },
    { key: 'outside_access', values: ['garden', 'garage'], values_label: ['Jardin', 'Garage'] },
    { key: 'title', value: 'collides' },
    { key: '---', value: 'ignored' }
  ]
};

describe('MarketplaceDateParser', () => {
  it('reads marketplace wall-clock dates in the Paris zone', () => {
    const parsed = MarketplaceDateParser.parse('2026-03-08 18:42:10');
    expect(parsed?.toUTC().toISO()).toBe('2026-03-08T17:42:10.000Z');
  });

  it('falls back to ISO and renders back in marketplace format', () => {
    expect(MarketplaceDateParser.format('2026-03-01T09:30:00Z')).toBe('2026-03-01 10:30:00');
  });

  it('returns null for missing or unreadable dates', () => {
    expect(MarketplaceDateParser.parse(undefined)).toBeNull();
    expect(MarketplaceDateParser.parse('yesterday')).toBeNull();
  });
});

describe('FilterFormatter', () => {
  it('describes the filter set on one line', () => {
    expect(FilterFormatter.describe(filters)).toBe(
      'category=9;text=maison (title);price=100000-max;sort=newest;ad_type=offer;owner_type=private;real_estate_type=1,2;rooms=3-max'
    );
  });
});

describe('LocationLabeler', () => {
  it('labels each location kind', () => {
    expect(LocationLabeler.label({ kind: 'none' })).toBe('everywhere');
    expect(LocationLabeler.label({ kind: 'city', name: 'Rennes', lat: 48.11, lng: -1.68, radius: 5000 })).toBe(
      'Rennes (48.11, -1.68, 5000m)'
    );
    expect(LocationLabeler.label({ kind: 'region', name: 'Bretagne', id: '6' })).toBe('region Bretagne');
  });
});

describe('RecordNormalizer', () => {
  const record = RecordNormalizer.normalize(listing, scope, scrapedAt);

  it('flattens the fixed fields', () => {
    expect(record).toMatchObject({
      id: '2890012345',
      title: 'Maison 5 pièces',
      price: 289000,
      first_publication_date: '2026-03-08 18:42:10',
      index_date: '2026-03-09 07:05:00',
      expiration_date: null,
      image_thumb: 'https://img.example/thumb/1.jpg',
      image_count: 3,
      images: ['https://img.example/large/1.jpg', 'https://img.example/large/2.jpg'],
      location_city: 'Rennes',
      location_department: 'Ille-et-Vilaine',
      owner_type: 'private',
      owner_store_id: null,
      option_urgent: true,
      option_booster: false
    });
  });

  it('records where the listing was found', () => {
    expect(record.scraped_at).toBe('2026-03-10 12:00:00');
    expect(record.search_scope).toBe('department 35');
    expect(record.search_category).toBe('9');
    expect(record.search_filters).toBe(FilterFormatter.describe(filters));
  });

  it('turns attributes into prefixed fields', () => {
    expect(record.attr_rooms).toBe('5');
    expect(record.attr_energie_classe).toBe('C');
    expect(record.attr_outside_access).toEqual(['Jardin', 'Garage']);
    expect(record.attr_title).toBe('collides');
    expect(record.title).toBe('Maison 5 pièces');
  });

  it('fills absent nested objects with nulls', () => {
    const bare = RecordNormalizer.normalize({ list_id: 'abc' }, scope, scrapedAt);
    expect(bare.id).toBe('abc');
    expect(bare.price).toBeNull();
    expect(bare.images).toEqual([]);
    expect(bare.image_count).toBe(0);
    expect(bare.location_city).toBeNull();
  });

  it('keeps the compact projection a subset of the detailed record', () => {
    const compact = RecordNormalizer.project(record, 'compact');

    expect(Object.keys(compact)).toEqual([...RecordNormalizer.compactFields]);
    for (const [key, value] of Object.entries(compact)) {
      expect(record[key]).toEqual(value);
    }
    expect(RecordNormalizer.project(record, 'detailed')).toBe(record);
  });

  it('slugs attribute keys', () => {
    expect(RecordNormalizer.attributeKey('Surface habitable (m²)')).toBe('attr_surface_habitable_m');
    expect(RecordNormalizer.attributeKey('***')).toBeNull();
  });
});
