import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import type { FilterSet, FilterValue } from '../types';
import { resolveScopes } from './resolver';

const filters: FilterSet = {
  category: '9',
  searchInTitleOnly: false,
  sort: 'newest',
  adType: 'offer',
  ownerType: 'all',
  attributes: new Map<string, FilterValue>([['rooms', { kind: 'range', min: 2, max: 4 }]])
};

describe('resolveScopes', () => {
  it('returns a single unconstrained scope for "none"', () => {
    const scopes = resolveScopes('none', [], filters);
    expect(scopes).toHaveLength(1);
    expect(scopes[0].label).toBe('everywhere');
    expect(scopes[0].location).toEqual({ kind: 'none' });
  });

  it('keeps the input order and does not deduplicate', () => {
    const scopes = resolveScopes('department', [{ code: '92' }, { code: 75 }, { code: '92' }], filters);
    expect(scopes.map((scope) => scope.label)).toEqual(['department 92', 'department 75', 'department 92']);
  });

  it('pads and upper-cases department codes', () => {
    const scopes = resolveScopes('department', [{ code: 5 }, { code: '2a' }], filters);
    expect(scopes.map((scope) => scope.location)).toEqual([
      { kind: 'department', code: '05' },
      { kind: 'department', code: '2A' }
    ]);
  });

  it('builds city scopes with the default radius', () => {
    const [scope] = resolveScopes('city', [{ name: 'Nanterre', lat: 48.8938, lng: 2.2064 }], filters);
    expect(scope.location).toEqual({ kind: 'city', name: 'Nanterre', lat: 48.8938, lng: 2.2064, radius: 10000 });
    expect(scope.label).toBe('Nanterre (48.8938, 2.2064, 10000m)');
  });

  it('resolves region names to marketplace ids regardless of case and accents', () => {
    const [scope] = resolveScopes('region', [{ name: 'ile de france' }], filters);
    expect(scope.location).toEqual({ kind: 'region', name: 'Ile-de-France', id: '12' });
    expect(scope.label).toBe('region Ile-de-France');
  });

  it('rejects a city without coordinates', () => {
    expect(() => resolveScopes('city', [{ name: 'Paris' }], filters)).toThrow(ConfigurationError);
  });

  it('names the offending descriptor', () => {
    try {
      resolveScopes('city', [{ lat: 48.85, lng: 2.35 }, { name: 'Lyon', lng: 4.83 }], filters);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.issues).toEqual(['locations[1].lat: Required']);
    }
  });

  it('rejects unknown regions and bad department codes', () => {
    expect(() => resolveScopes('region', [{ name: 'Atlantis' }], filters)).toThrow(/unknown region "Atlantis"/);
    expect(() => resolveScopes('department', [{ code: 'ABC' }], filters)).toThrow(/not a department code/);
  });

  it('rejects empty location lists and locations given with "none"', () => {
    expect(() => resolveScopes('city', [], filters)).toThrow(ConfigurationError);
    expect(() => resolveScopes('none', [{ code: '75' }], filters)).toThrow(ConfigurationError);
  });

  it('produces frozen scopes that carry the filter set', () => {
    const [scope] = resolveScopes('none', [], filters);
    expect(Object.isFrozen(scope)).toBe(true);
    expect(Object.isFrozen(scope.location)).toBe(true);
    expect(scope.filters.category).toBe('9');
    expect(scope.filters.attributes.get('rooms')).toEqual({ kind: 'range', min: 2, max: 4 });
  });
});
