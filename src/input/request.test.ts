import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { buildSearchRequest, resolveCategory } from './request';
import { parseInput } from './schema';

describe('parseInput', () => {
  it('fills defaults', () => {
    const input = parseInput({});
    expect(input).toMatchObject({
      category: 'ALL',
      locationType: 'none',
      maxPages: 10,
      limitPerPage: 35,
      maxAgeDays: 0,
      consecutiveOldLimit: 5,
      stalePolicy: 'emit-stale',
      outputFormat: 'detailed',
      maxErrors: 10,
      scopeConcurrency: 1
    });
  });

  it('reports every invalid field', () => {
    expect(() => parseInput({ limitPerPage: 50, sort: 'random' })).toThrow(ConfigurationError);
    try {
      parseInput({ limitPerPage: 50, sort: 'random' });
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['sort', 'limitPerPage']);
    }
  });

  it('rejects an inverted price range', () => {
    expect(() => parseInput({ priceMin: 500, priceMax: 100 })).toThrow('priceMin must not exceed priceMax');
  });
});

describe('resolveCategory', () => {
  it('accepts ids and group names', () => {
    expect(resolveCategory('9')).toBe('9');
    expect(resolveCategory('immobilier')).toBe('8');
    expect(resolveCategory('materiel professionnel')).toBe('56');
  });

  it('rejects unknown names', () => {
    expect(() => resolveCategory('spaceships')).toThrow('unknown category "spaceships"');
  });
});

describe('buildSearchRequest', () => {
  it('builds filters from structured input', () => {
    const request = buildSearchRequest(
      parseInput({
        category: 'IMMOBILIER',
        searchText: ' maison ',
        priceMin: 100000,
        filters: { rooms: { min: 3 }, real_estate_type: ['1', 2], furnished: true },
        locationType: 'department',
        locations: [{ code: '35' }],
        delayBetweenPages: 1.5
      })
    );

    expect(request.locationType).toBe('department');
    expect(request.locations).toEqual([{ code: '35' }]);
    expect(request.delayBetweenPagesMs).toBe(1500);
    expect(request.filters).toMatchObject({ category: '8', text: 'maison', price: { min: 100000 }, sort: 'newest' });
    expect(request.filters.shippable).toBeUndefined();
    expect(Object.fromEntries(request.filters.attributes)).toEqual({
      rooms: { kind: 'range', min: 3 },
      real_estate_type: { kind: 'set', values: ['1', '2'] },
      furnished: { kind: 'scalar', value: true }
    });
  });

  it('lets the search URL override what it encodes', () => {
    const request = buildSearchRequest(
      parseInput({
        searchUrl: 'https://www.leboncoin.fr/recherche?category=2&locations=d_69&price=500-max&sort=price&order=asc',
        category: 'IMMOBILIER',
        locationType: 'region',
        locations: [{ name: 'Bretagne' }],
        ownerType: 'pro'
      })
    );

    expect(request.locationType).toBe('department');
    expect(request.locations).toEqual([{ code: '69' }]);
    expect(request.filters).toMatchObject({ category: '2', price: { min: 500 }, sort: 'cheapest', ownerType: 'pro' });
  });
});
