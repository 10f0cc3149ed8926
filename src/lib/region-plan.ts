/**
 * Region planning: the world at low zoom plus one region above it
 */

import type { AppSettings, BoundingBox, TileScope } from '@/models';
import type { CountryRegistry } from './country-registry';
import { ConfigurationError } from './errors';
import { MAX_ZOOM, WORLD_MAX_ZOOM } from './tile-utils';

/** Area fetched for the shared zoom 0-6 layer */
export const WORLD_BBOX: BoundingBox = { minLat: -85, maxLat: 85, minLon: -180, maxLon: 180 };

export interface RegionPlan {
  regionName: string;
  regionBox: BoundingBox | null;   // Null for a world-only run
  world: TileScope | null;       // Null when minZoom > 6
  region: TileScope | null;      // Null when maxZoom < 7 or there is no region box
  layers: TileScope[];
}

/**
 * Split a zoom range into the world layer and the region layer
 */
export function planLayers(regionBox: BoundingBox | null, minZoom: number, maxZoom: number): Pick<RegionPlan, 'world' | 'region' | 'layers'> {
  const worldMax = Math.min(WORLD_MAX_ZOOM, maxZoom);
  const regionMin = Math.max(WORLD_MAX_ZOOM + 1, minZoom);
  const regionMax = Math.min(MAX_ZOOM, maxZoom);

  const world = minZoom <= worldMax ? { bbox: WORLD_BBOX, minZoom, maxZoom: worldMax } : null;
  const region = regionBox && regionMin <= regionMax ? { bbox: regionBox, minZoom: regionMin, maxZoom: regionMax } : null;

  const layers: TileScope[] = [];
  if (world) layers.push(world);
  if (region) layers.push(region);

  return { world, region, layers };
}

/**
 * Resolve the region box (explicit bbox wins over the country) and plan layers.
 * Without either, only the world layer is planned.
 * @throws ConfigurationError for an unknown country, or no area above zoom 6
 */
export function planRegion(settings: AppSettings, countries: CountryRegistry): RegionPlan {
  let regionBox: BoundingBox | null = null;
  if (settings.bbox) {
    regionBox = settings.bbox;
  } else if (settings.country) {
    regionBox = countries.resolve(settings.country);
  } else if (settings.maxZoom > WORLD_MAX_ZOOM) {
    throw new ConfigurationError('No area to download', [`country or bbox is required above zoom ${WORLD_MAX_ZOOM}`]);
  }

  return {
    regionName: settings.regionName,
    regionBox,
    ...planLayers(regionBox, settings.minZoom, settings.maxZoom),
  };
}
