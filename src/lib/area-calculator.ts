/**
 * Area Calculator for tile selection
 * Handles conversion between geographic bounds and tile addresses
 */

import type { BoundingBox, BundleManifest, Scope, TileAddress, TileScope } from '@/models';
import { latLonToTile, MAX_LATITUDE, tileKey } from './tile-utils';

export interface TileRange {
  zoom: number;
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * Normalize a scope to its list of layers
 */
export function scopeLayers(scope: Scope): readonly TileScope[] {
  return 'bbox' in scope ? [scope] : scope;
}

export class AreaCalculator {
  /**
   * Rectangle of tile indices covering a box at one zoom level.
   * Returns null for boxes that cannot be projected: inverted, non-finite,
   * or entirely outside the Web-Mercator latitude band.
   */
  static tileRange(bbox: BoundingBox, zoom: number): TileRange | null {
    if (!Number.isInteger(zoom) || zoom < 0) return null;

    const { minLat, maxLat, minLon, maxLon } = bbox;
    if (![minLat, maxLat, minLon, maxLon].every(Number.isFinite)) return null;
    if (minLat > maxLat || minLon > maxLon) return null;
    if (minLat > MAX_LATITUDE || maxLat < -MAX_LATITUDE) return null;
    if (minLon > 180 || maxLon < -180) return null;

    // North-west corner has the smallest y
    const topLeft = latLonToTile(maxLat, minLon, zoom);
    const bottomRight = latLonToTile(minLat, maxLon, zoom);

    return {
      zoom,
      minX: topLeft.x,
      maxX: bottomRight.x,
      minY: topLeft.y,
      maxY: bottomRight.y,
    };
  }

  /**
   * Lazily yield every address covering the box at one zoom, x-major
   */
  static *enumerateTiles(bbox: BoundingBox, zoom: number): Generator<TileAddress> {
    const range = this.tileRange(bbox, zoom);
    if (!range) return;

    for (let x = range.minX; x <= range.maxX; x++) {
      for (let y = range.minY; y <= range.maxY; y++) {
        yield { zoom, x, y };
      }
    }
  }

  /**
   * Concatenate the per-zoom sequences of every layer, zooms ascending.
   * Overlapping layers may yield an address more than once.
   */
  static *enumerateScope(scope: Scope): Generator<TileAddress> {
    for (const layer of scopeLayers(scope)) {
      for (let zoom = layer.minZoom; zoom <= layer.maxZoom; zoom++) {
        yield* this.enumerateTiles(layer.bbox, zoom);
      }
    }
  }

  /**
   * Count tiles per zoom without enumerating them
   */
  static countTilesByZoom(scope: Scope): Map<number, number> {
    const counts = new Map<number, number>();

    for (const layer of scopeLayers(scope)) {
      for (let zoom = layer.minZoom; zoom <= layer.maxZoom; zoom++) {
        const range = this.tileRange(layer.bbox, zoom);
        const count = range ? (range.maxX - range.minX + 1) * (range.maxY - range.minY + 1) : 0;
        counts.set(zoom, (counts.get(zoom) ?? 0) + count);
      }
    }

    return counts;
  }

  /**
   * Calculate number of tiles in a scope
   */
  static countTiles(scope: Scope): number {
    let total = 0;
    for (const count of this.countTilesByZoom(scope).values()) {
      total += count;
    }
    return total;
  }

  /**
   * Check whether an address lies inside any layer of the scope
   */
  static contains(scope: Scope, address: TileAddress): boolean {
    return scopeLayers(scope).some(layer => {
      if (address.zoom < layer.minZoom || address.zoom > layer.maxZoom) return false;
      const range = this.tileRange(layer.bbox, address.zoom);
      return range !== null &&
        address.x >= range.minX && address.x <= range.maxX &&
        address.y >= range.minY && address.y <= range.maxY;
    });
  }

  /**
   * Expected address set of a scope, keyed by "z/x/y"
   */
  static buildManifest(scope: Scope): BundleManifest {
    const expected = new Map<string, TileAddress>();
    for (const address of this.enumerateScope(scope)) {
      expected.set(tileKey(address), address);
    }
    return { expected };
  }
}
