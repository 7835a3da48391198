import { z } from 'zod';

const AttributeSchema = z.object({
  key: z.string(),
  key_label: z.string().nullish(),
  value: z.string().nullish(),
  value_label: z.string().nullish(),
  values: z.array(z.string()).nullish(),
  values_label: z.array(z.string()).nullish(),
  generic: z.boolean().nullish()
});

const ImagesSchema = z.object({
  thumb_url: z.string(),
  small_url: z.string(),
  nb_images: z.number(),
  urls: z.array(z.string()),
  urls_thumb: z.array(z.string()),
  urls_large: z.array(z.string())
}).partial();

const LocationSchema = z.object({
  country_id: z.string(),
  region_id: z.string(),
  region_name: z.string(),
  department_id: z.string(),
  department_name: z.string(),
  city_label: z.string(),
  city: z.string(),
  zipcode: z.string(),
  lat: z.number(),
  lng: z.number()
}).partial();

const OwnerSchema = z.object({
  store_id: z.string(),
  user_id: z.string(),
  type: z.string(),
  name: z.string(),
  siren: z.string(),
  no_salesmen: z.boolean()
}).partial();

const OptionsSchema = z.object({
  has_option: z.boolean(),
  booster: z.boolean(),
  photosup: z.boolean(),
  urgent: z.boolean(),
  gallery: z.boolean(),
  sub_toplist: z.boolean()
}).partial();

/**
 * One ad as the finder API returns it. Keys the schema does not name are
 * stripped on parse, so nothing unexpected reaches the normalizer.
 */
export const RawListingSchema = z.object({
  list_id: z.union([z.number(), z.string().min(1)]),
  first_publication_date: z.string().nullish(),
  index_date: z.string().nullish(),
  expiration_date: z.string().nullish(),
  status: z.string().nullish(),
  category_id: z.string().nullish(),
  category_name: z.string().nullish(),
  subject: z.string().nullish(),
  body: z.string().nullish(),
  brand: z.string().nullish(),
  ad_type: z.string().nullish(),
  url: z.string().nullish(),
  price: z.array(z.number()).nullish(),
  images: ImagesSchema.nullish(),
  attributes: z.array(AttributeSchema).nullish(),
  location: LocationSchema.nullish(),
  owner: OwnerSchema.nullish(),
  options: OptionsSchema.nullish(),
  has_phone: z.boolean().nullish()
});

export type RawListing = z.infer<typeof RawListingSchema>;
export type RawAttribute = z.infer<typeof AttributeSchema>;
