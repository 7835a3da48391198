import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { FilterSet, LocationDescriptor, LocationType, SearchScope } from '../types';
import { LocationLabeler } from '../utils/normalization';
import { findRegion } from './reference-data';

export const DEFAULT_CITY_RADIUS_M = 10000;

const CityDescriptorSchema = z.object({
  name: z.string().trim().min(1).optional(),
  zipcode: z.string().trim().min(1).optional(),
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
  radius: z.number().int().min(0).default(DEFAULT_CITY_RADIUS_M)
});

const DepartmentDescriptorSchema = z.object({
  code: z
    .union([z.string(), z.number().int()])
    .transform((code) => String(code).trim().toUpperCase().padStart(2, '0'))
    .refine((code) => /^(\d{2,3}|2A|2B)$/.test(code), { message: 'not a department code' })
});

const RegionDescriptorSchema = z.object({
  name: z.string().trim().min(1)
});

function describeIssues(index: number, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    return `locations[${index}]${path}: ${issue.message}`;
  });
}

function parseDescriptor(type: Exclude<LocationType, 'none'>, raw: unknown, index: number): LocationDescriptor {
  switch (type) {
    case 'city': {
      const parsed = CityDescriptorSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError('Invalid city location', describeIssues(index, parsed.error));
      }
      return { kind: 'city', ...parsed.data };
    }
    case 'department': {
      const parsed = DepartmentDescriptorSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError('Invalid department location', describeIssues(index, parsed.error));
      }
      return { kind: 'department', code: parsed.data.code };
    }
    case 'region': {
      const parsed = RegionDescriptorSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError('Invalid region location', describeIssues(index, parsed.error));
      }
      const region = findRegion(parsed.data.name);
      if (!region) {
        throw new ConfigurationError('Invalid region location', [`locations[${index}].name: unknown region "${parsed.data.name}"`]);
      }
      return { kind: 'region', name: region.name, id: region.id };
    }
    default: {
      const unreachable: never = type;
      throw new ConfigurationError(`Unsupported location type "${String(unreachable)}"`);
    }
  }
}

export function createScope(location: LocationDescriptor, filters: FilterSet): SearchScope {
  return Object.freeze({
    label: LocationLabeler.label(location),
    location: Object.freeze({ ...location }),
    filters: Object.freeze({ ...filters })
  });
}

/**
 * Expands a location type and its descriptors into the scopes the engine pages through,
 * one per descriptor and in input order. Every descriptor is validated here,
 * so a bad one fails the run before any request goes out.
 */
export function resolveScopes(locationType: LocationType, descriptors: readonly unknown[], filters: FilterSet): SearchScope[] {
  const sharedFilters: FilterSet = { ...filters, attributes: new Map(filters.attributes) };

  if (locationType === 'none') {
    if (descriptors.length > 0) {
      throw new ConfigurationError('Location type "none" does not take locations', [
        `${descriptors.length} location(s) given`
      ]);
    }
    return [createScope({ kind: 'none' }, sharedFilters)];
  }

  if (descriptors.length === 0) {
    throw new ConfigurationError(`Location type "${locationType}" needs at least one location`);
  }

  return descriptors.map((raw, index) => createScope(parseDescriptor(locationType, raw, index), sharedFilters));
}
