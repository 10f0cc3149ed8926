/**
 * Runtime settings
 *
 * Zod schema for the values the CLI (or a caller) hands in, with defaults
 * and cross-field checks. resolveConfig() turns raw input into AppSettings.
 */

import { z } from 'zod';
import type { AppSettings, BoundingBox } from '@/models';
import { DEFAULT_CONCURRENCY, DEFAULT_TTL_HOURS, MAX_CONCURRENCY } from './download-manager';
import { ConfigurationError } from './errors';
import { DEFAULT_TILE_URL } from './tile-fetcher';
import { MAX_ZOOM, WORLD_MAX_ZOOM } from './tile-utils';

export const DEFAULT_CACHE_DIR = 'cache';
export const DEFAULT_OUTPUT = 'map_bundle.zip';
export const DEFAULT_REGION = 'custom';

const zoom = z.coerce.number().int('must be an integer').min(0, 'must be >= 0').max(MAX_ZOOM, `must be <= ${MAX_ZOOM}`);

/**
 * Bounding box in degrees
 */
export const BoundingBoxSchema = z.object({
  minLat: z.number().min(-90, 'must be >= -90').max(90, 'must be <= 90'),
  maxLat: z.number().min(-90, 'must be >= -90').max(90, 'must be <= 90'),
  minLon: z.number().min(-180, 'must be >= -180').max(180, 'must be <= 180'),
  maxLon: z.number().min(-180, 'must be >= -180').max(180, 'must be <= 180'),
}).refine(
  (bbox) => bbox.minLat <= bbox.maxLat,
  { message: 'must be <= maxLat', path: ['minLat'] }
).refine(
  (bbox) => bbox.minLon <= bbox.maxLon,
  { message: 'must be <= maxLon', path: ['minLon'] }
);

/**
 * Settings schema (input keys match the CLI flags)
 */
export const SettingsSchema = z.object({
  country: z.string().regex(/^[A-Za-z]{2}$/, 'must be a two-letter ISO country code').optional(),
  bbox: BoundingBoxSchema.optional(),
  name: z.string().regex(/^[A-Za-z0-9_-]+$/, 'may only contain letters, digits, "_" and "-"').optional(),
  minZoom: zoom.default(0),
  maxZoom: zoom.default(MAX_ZOOM),
  concurrency: z.coerce.number().int('must be an integer')
    .min(1, 'must be >= 1')
    .max(MAX_CONCURRENCY, `must be <= ${MAX_CONCURRENCY}`)
    .default(DEFAULT_CONCURRENCY),
  ttlHours: z.coerce.number().min(0, 'must be >= 0').default(DEFAULT_TTL_HOURS),
  cacheDir: z.string().min(1, 'cannot be empty').default(DEFAULT_CACHE_DIR),
  tileUrl: z.string()
    .regex(/^https?:\/\//, 'must be an http(s) URL')
    .refine(
      (url) => ['{z}', '{x}', '{y}'].every((token) => url.includes(token)),
      'must contain {z}, {x} and {y}'
    )
    .default(DEFAULT_TILE_URL),
  maxAttempts: z.coerce.number().int('must be an integer').min(1, 'must be >= 1').max(10, 'must be <= 10').default(3),
  retryDelay: z.coerce.number().int('must be an integer').min(0, 'must be >= 0').default(1000),
  timeout: z.coerce.number().int('must be an integer').positive('must be positive').default(15000),
  output: z.string().min(1, 'cannot be empty').default(DEFAULT_OUTPUT),
}).superRefine((settings, ctx) => {
  if (settings.minZoom > settings.maxZoom) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minZoom'], message: 'must be <= maxZoom' });
  }
  if (!settings.country && !settings.bbox && settings.maxZoom > WORLD_MAX_ZOOM) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['country'], message: `or bbox is required above zoom ${WORLD_MAX_ZOOM}` });
  }
  if (settings.name?.toLowerCase() === 'world') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['name'], message: 'is reserved for zoom 0-6 tiles' });
  }
});

/**
 * Raw settings; numeric fields may arrive as strings from the command line
 */
export interface ConfigInput {
  country?: string;
  bbox?: BoundingBox;
  name?: string;
  minZoom?: number | string;
  maxZoom?: number | string;
  concurrency?: number | string;
  ttlHours?: number | string;
  cacheDir?: string;
  tileUrl?: string;
  maxAttempts?: number | string;
  retryDelay?: number | string;
  timeout?: number | string;
  output?: string;
}

/**
 * Validate raw input and apply defaults
 * @throws ConfigurationError listing every issue found
 */
export function resolveConfig(input: ConfigInput): AppSettings {
  const parseResult = SettingsSchema.safeParse(input);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'config';
      return `${field} ${issue.message}`;
    });
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const { name, country, ...rest } = parseResult.data;
  const upperCountry = country?.toUpperCase();

  return {
    ...rest,
    country: upperCountry,
    regionName: (name ?? upperCountry ?? DEFAULT_REGION).toLowerCase(),
  };
}

/**
 * Parse "minLon,minLat,maxLon,maxLat" as given on the command line
 */
export function parseBboxArg(text: string): BoundingBox {
  const parts = text.split(',').map((part) => part.trim());
  const values = parts.map(Number);

  if (parts.length !== 4 || parts.some((part) => part === '') || !values.every(Number.isFinite)) {
    throw new ConfigurationError(`Invalid bbox "${text}"`, ['bbox must be four numbers: minLon,minLat,maxLon,maxLat']);
  }

  const [minLon, minLat, maxLon, maxLat] = values;
  return { minLat, maxLat, minLon, maxLon };
}
