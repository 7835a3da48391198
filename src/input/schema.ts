import { z } from 'zod';
import { ConfigurationError } from '../errors';

const FilterInputSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.union([z.string(), z.number()])),
  z.object({
    min: z.number().optional(),
    max: z.number().optional()
  })
]);

export type FilterInput = z.infer<typeof FilterInputSchema>;

export const InputSchema = z.object({
  searchUrl: z.string().url().optional(),
  category: z.string().optional().default('ALL'),
  searchText: z.string().optional(),
  searchInTitleOnly: z.boolean().optional().default(false),
  locationType: z.enum(['none', 'city', 'department', 'region']).optional().default('none'),
  locations: z.array(z.unknown()).optional().default([]),
  filters: z.record(z.string(), FilterInputSchema).optional().default({}),
  priceMin: z.number().min(0).optional(),
  priceMax: z.number().min(0).optional(),
  sort: z.enum(['newest', 'oldest', 'cheapest', 'expensive', 'relevance']).optional().default('newest'),
  adType: z.enum(['offer', 'demand']).optional().default('offer'),
  ownerType: z.enum(['all', 'private', 'pro']).optional().default('all'),
  shippable: z.boolean().optional(),
  maxPages: z.number().int().min(0).optional().default(10),
  limitPerPage: z.number().int().min(1).max(35).optional().default(35),
  maxAgeDays: z.number().min(0).optional().default(0),
  consecutiveOldLimit: z.number().int().min(1).optional().default(5),
  stalePolicy: z.enum(['emit-stale', 'exclude-stale']).optional().default('emit-stale'),
  freshnessField: z.enum(['index', 'publication']).optional().default('index'),
  delayBetweenPages: z.number().min(0).optional().default(0),
  delayBetweenLocations: z.number().min(0).optional().default(0),
  maxRetries: z.number().int().min(0).max(10).optional().default(3),
  fetchTimeoutSecs: z.number().min(1).optional().default(30),
  maxErrors: z.number().int().min(0).optional().default(10),
  scopeConcurrency: z.number().int().min(1).max(10).optional().default(1),
  outputFormat: z.enum(['detailed', 'compact']).optional().default('detailed'),
  proxyConfiguration: z
    .object({
      useApifyProxy: z.boolean().optional(),
      apifyProxyGroups: z.array(z.string()).optional(),
      apifyProxyCountry: z.string().optional(),
      proxyUrls: z.array(z.string()).optional()
    })
    .optional(),
  debug: z.boolean().optional().default(false)
}).refine((input) => input.priceMin === undefined || input.priceMax === undefined || input.priceMin <= input.priceMax, {
  message: 'priceMin must not exceed priceMax',
  path: ['priceMin']
});

export type ActorInput = z.infer<typeof InputSchema>;

export function parseInput(raw: unknown): ActorInput {
  const parsed = InputSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid input',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
