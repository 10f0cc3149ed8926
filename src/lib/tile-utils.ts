/**
 * Tile addressing and utility functions for Web-Mercator (slippy map) tiles
 */

import type { TileAddress } from '@/models';

/** Latitude limit of the Web-Mercator projection */
export const MAX_LATITUDE = 85.0511287798066;

/** Highest zoom stored under the shared "world" cache partition */
export const WORLD_MAX_ZOOM = 6;

/** Highest zoom accepted by the configuration layer */
export const MAX_ZOOM = 15;

/**
 * Canonical string key for an address
 * @returns Key like "7/100/63"
 */
export function tileKey(address: TileAddress): string {
  return `${address.zoom}/${address.x}/${address.y}`;
}

/**
 * Parse a key produced by tileKey
 * @param key Key like "7/100/63" (a trailing ".png" is accepted)
 * @returns Address or null if invalid
 */
export function parseTileKey(key: string): TileAddress | null {
  const match = key.match(/^(\d+)\/(\d+)\/(\d+)(?:\.png)?$/);

  if (!match) {
    return null;
  }

  const [, z, x, y] = match;
  const address = { zoom: parseInt(z, 10), x: parseInt(x, 10), y: parseInt(y, 10) };

  return isValidTile(address) ? address : null;
}

/**
 * Check 0 <= x, y < 2^zoom on non-negative integers
 */
export function isValidTile(address: TileAddress): boolean {
  const { zoom, x, y } = address;
  if (![zoom, x, y].every(v => Number.isInteger(v) && v >= 0)) {
    return false;
  }
  const n = 2 ** zoom;
  return x < n && y < n;
}

/**
 * Convert latitude/longitude to the tile containing it
 * @param lat Latitude, clamped to +/-MAX_LATITUDE
 * @param lon Longitude, clamped to [-180, 180]
 * @returns Integer tile indices clamped to [0, 2^zoom)
 */
export function latLonToTile(lat: number, lon: number, zoom: number): { x: number; y: number } {
  const n = 2 ** zoom;
  const clampedLat = Math.max(-MAX_LATITUDE, Math.min(MAX_LATITUDE, lat));
  const clampedLon = Math.max(-180, Math.min(180, lon));
  const latRad = (clampedLat * Math.PI) / 180;

  const fx = ((clampedLon + 180) / 360) * n;
  const fy = ((1 - Math.asinh(Math.tan(latRad)) / Math.PI) / 2) * n;

  return {
    x: clampIndex(Math.floor(fx), n),
    y: clampIndex(Math.floor(fy), n),
  };
}

function clampIndex(value: number, n: number): number {
  return Math.max(0, Math.min(n - 1, value));
}

export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'webp';

/** Leading bytes needed to recognise every supported format */
export const IMAGE_HEADER_BYTES = 12;

/**
 * Identify an image by its leading bytes
 */
export function detectImageFormat(data: Uint8Array): ImageFormat | null {
  const startsWith = (bytes: number[], offset = 0): boolean =>
    data.length >= offset + bytes.length && bytes.every((b, i) => data[offset + i] === b);

  if (startsWith([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'png';
  if (startsWith([0xff, 0xd8, 0xff])) return 'jpeg';
  if (startsWith([0x47, 0x49, 0x46, 0x38])) return 'gif';
  if (startsWith([0x52, 0x49, 0x46, 0x46]) && startsWith([0x57, 0x45, 0x42, 0x50], 8)) return 'webp';
  return null;
}

/**
 * Fill a tile server URL template
 * @param template URL containing {z}, {x} and {y}
 */
export function buildTileUrl(template: string, address: TileAddress): string {
  return template
    .replace(/\{z\}/g, String(address.zoom))
    .replace(/\{x\}/g, String(address.x))
    .replace(/\{y\}/g, String(address.y));
}

/**
 * Order by zoom, then x, then y
 */
export function compareTiles(a: TileAddress, b: TileAddress): number {
  return a.zoom - b.zoom || a.x - b.x || a.y - b.y;
}

/**
 * Format bytes to human-readable string
 * @param bytes Number of bytes
 * @returns Formatted string like "25.9 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}
