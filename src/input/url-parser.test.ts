import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { parseFilterValue, parseSearchUrl } from './url-parser';

const BASE = 'https://www.leboncoin.fr/recherche';

describe('parseFilterValue', () => {
  it('reads open and closed ranges', () => {
    expect(parseFilterValue('min-1600')).toEqual({ kind: 'range', max: 1600 });
    expect(parseFilterValue('2020-max')).toEqual({ kind: 'range', min: 2020 });
    expect(parseFilterValue('3-5')).toEqual({ kind: 'range', min: 3, max: 5 });
  });

  it('reads comma lists and single values as sets', () => {
    expect(parseFilterValue('BMW,AUDI')).toEqual({ kind: 'set', values: ['BMW', 'AUDI'] });
    expect(parseFilterValue('2')).toEqual({ kind: 'set', values: ['2'] });
  });
});

describe('parseSearchUrl', () => {
  it('reads a city with coordinates and the usual filters', () => {
    const parsed = parseSearchUrl(
      `${BASE}?category=10&locations=Nanterre_92000__48.88822_2.19428_4049&price=min-1600&rooms=3-3&real_estate_type=2&owner_type=private&furnished=1&page=2`
    );

    expect(parsed.category).toBe('10');
    expect(parsed.locationType).toBe('city');
    expect(parsed.locations).toEqual([{ name: 'Nanterre', zipcode: '92000', lat: 48.88822, lng: 2.19428, radius: 4049 }]);
    expect(parsed.price).toEqual({ max: 1600 });
    expect(parsed.ownerType).toBe('private');
    expect([...parsed.attributes.keys()]).toEqual(['rooms', 'real_estate_type', 'furnished']);
    expect(parsed.attributes.get('rooms')).toEqual({ kind: 'range', min: 3, max: 3 });
    expect(parsed.attributes.get('furnished')).toEqual({ kind: 'set', values: ['1'] });
  });

  it('defaults the radius when the URL omits it', () => {
    const parsed = parseSearchUrl(`${BASE}?locations=Lyon__45.76_4.83`);
    expect(parsed.locations).toEqual([{ name: 'Lyon', lat: 45.76, lng: 4.83, radius: 10000 }]);
  });

  it('looks up a city given only by name and zip code', () => {
    const parsed = parseSearchUrl(`${BASE}?locations=Rennes_35000`);
    expect(parsed.locations).toEqual([{ name: 'Rennes', zipcode: '35000', lat: 48.1173, lng: -1.6778, radius: 10000 }]);
  });

  it('rejects a city it cannot place', () => {
    expect(() => parseSearchUrl(`${BASE}?locations=Atlantis_99999`)).toThrow(ConfigurationError);
  });

  it('reads departments and regions', () => {
    expect(parseSearchUrl(`${BASE}?locations=d_75,d_2a`)).toMatchObject({
      locationType: 'department',
      locations: [{ code: '75' }, { code: '2a' }]
    });
    expect(parseSearchUrl(`${BASE}?locations=r_12`)).toMatchObject({
      locationType: 'region',
      locations: [{ name: 'Ile-de-France' }]
    });
  });

  it('refuses to mix location kinds', () => {
    expect(() => parseSearchUrl(`${BASE}?locations=d_75,r_12`)).toThrow('mixes department and region locations');
  });

  it('maps sort and order together', () => {
    expect(parseSearchUrl(`${BASE}?sort=price&order=desc`).sort).toBe('expensive');
    expect(parseSearchUrl(`${BASE}?sort=price&order=asc`).sort).toBe('cheapest');
    expect(parseSearchUrl(`${BASE}?sort=time&order=asc`).sort).toBe('oldest');
    expect(parseSearchUrl(`${BASE}?sort=time`).sort).toBe('newest');
  });

  it('decodes text and flags', () => {
    const parsed = parseSearchUrl(`${BASE}?text=v%C3%A9lo%20%C3%A9lectrique&search_in=subject&shippable=1&ad_type=demand`);
    expect(parsed.text).toBe('vélo électrique');
    expect(parsed.searchInTitleOnly).toBe(true);
    expect(parsed.shippable).toBe(true);
    expect(parsed.adType).toBe('demand');
  });

  it('rejects something that is not a URL', () => {
    expect(() => parseSearchUrl('leboncoin cars')).toThrow('searchUrl: "leboncoin cars" is not a URL');
  });
});
