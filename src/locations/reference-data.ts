import { readFileSync } from 'node:fs';
import { z } from 'zod';

const RegionsSchema = z.record(z.string(), z.string().regex(/^\d+$/));
const CitiesSchema = z.record(
  z.string(),
  z.object({ lat: z.number(), lng: z.number(), zipcode: z.string() })
);

export type CityCoordinates = z.infer<typeof CitiesSchema>[string];

function loadJson<T>(fileName: string, schema: z.ZodType<T>): T {
  const raw = readFileSync(new URL(`../../data/${fileName}`, import.meta.url), 'utf-8');
  return schema.parse(JSON.parse(raw));
}

let regions: Map<string, { name: string; id: string }> | undefined;
let cities: Map<string, CityCoordinates> | undefined;

/** Case and accent insensitive key: "Île-de-France" and "ile de france" match. */
export function lookupKey(name: string): string {
  return name
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

function regionTable(): Map<string, { name: string; id: string }> {
  if (!regions) {
    regions = new Map(
      Object.entries(loadJson('regions.json', RegionsSchema)).map(([regionName, id]): [string, { name: string; id: string }] => [
        lookupKey(regionName),
        { name: regionName, id }
      ])
    );
  }
  return regions;
}

export function findRegion(name: string): { name: string; id: string } | undefined {
  return regionTable().get(lookupKey(name));
}

export function findRegionById(id: string): { name: string; id: string } | undefined {
  for (const region of regionTable().values()) {
    if (region.id === id) return region;
  }
  return undefined;
}

/** Exact match first, then the first entry whose key contains the name or is contained in it. */
export function findCity(name: string): CityCoordinates | undefined {
  if (!cities) {
    cities = new Map(Object.entries(loadJson('city-coordinates.json', CitiesSchema)));
  }

  const key = lookupKey(name);
  if (!key) return undefined;

  const exact = cities.get(key);
  if (exact) return exact;

  for (const [cityKey, coordinates] of cities) {
    if (cityKey.includes(key) || key.includes(cityKey)) return coordinates;
  }
  return undefined;
}
