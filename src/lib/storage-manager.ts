/**
 * Storage Manager for the on-disk tile cache
 * Handles zoom-partitioned paths, freshness checks and atomic writes.
 *
 * Layout: {root}/world/{z}/{x}/{y}.png for zoom 0-6 and
 * {root}/{region}/{z}/{x}/{y}.png above that.
 */

import { randomUUID } from 'node:crypto';
import { constants } from 'node:fs';
import { access, mkdir, open, readdir, readFile, rename, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { CacheEntry, Freshness, Scope, TileAddress } from '@/models';
import { AreaCalculator, scopeLayers } from './area-calculator';
import { CacheError, ConfigurationError } from './errors';
import { logger } from './logger';
import { compareTiles, detectImageFormat, IMAGE_HEADER_BYTES, tileKey, WORLD_MAX_ZOOM } from './tile-utils';

export const WORLD_PARTITION = 'world';

const HOUR_MS = 60 * 60 * 1000;
const TILE_FILE = /^(\d+)\.png$/;
const NUMERIC_DIR = /^\d+$/;

export interface StorageManagerOptions {
  rootDir: string;
  region?: string;               // Partition for zoom > WORLD_MAX_ZOOM, e.g. "sg"
  clock?: () => number;          // Epoch milliseconds
}

export interface StorageInfo {
  tileCount: number;
  totalSize: number;
  partitions: Record<string, number>;   // Tile count per partition
}

export class StorageManager {
  readonly rootDir: string;
  readonly region?: string;
  private clock: () => number;
  private initPromise: Promise<void> | null = null;
  private initialized = false;

  constructor(options: StorageManagerOptions) {
    this.rootDir = resolve(options.rootDir);
    this.clock = options.clock ?? Date.now;

    if (options.region !== undefined) {
      const region = options.region.toLowerCase();
      if (!/^[a-z0-9_-]+$/.test(region) || region === WORLD_PARTITION) {
        throw new ConfigurationError(`Invalid cache region "${options.region}"`);
      }
      this.region = region;
    }
  }

  /**
   * Create the cache root and check it is writable (must be called before use)
   */
  async init(): Promise<void> {
    if (this.initialized) return;
    if (this.initPromise) return this.initPromise;

    this.initPromise = this.initRoot();
    try {
      await this.initPromise;
    } finally {
      this.initPromise = null;
    }
  }

  private async initRoot(): Promise<void> {
    try {
      await mkdir(this.rootDir, { recursive: true });
      await access(this.rootDir, constants.R_OK | constants.W_OK);
      this.initialized = true;
    } catch (error) {
      throw new CacheError(`Cannot open cache directory ${this.rootDir}`, this.rootDir, error);
    }
  }

  /**
   * Partition directory name for a zoom level
   */
  partitionFor(zoom: number): string {
    if (zoom <= WORLD_MAX_ZOOM) return WORLD_PARTITION;
    if (!this.region) {
      throw new ConfigurationError(`Zoom ${zoom} tiles need a cache region (country code or region name)`);
    }
    return this.region;
  }

  /**
   * File path for an address
   */
  pathFor(address: TileAddress): string {
    return join(
      this.rootDir,
      this.partitionFor(address.zoom),
      String(address.zoom),
      String(address.x),
      `${address.y}.png`
    );
  }

  /**
   * Entry for an address, or null when absent, empty, unreadable or not an image
   */
  async getEntry(address: TileAddress): Promise<CacheEntry | null> {
    return this.inspect(address, this.pathFor(address));
  }

  /**
   * Missing if absent (or not a usable image), stale if older than ttlHours, else fresh
   */
  async freshness(address: TileAddress, ttlHours: number): Promise<Freshness> {
    const entry = await this.getEntry(address);
    if (!entry) return 'missing';

    const age = this.clock() - entry.lastModified;
    return age > ttlHours * HOUR_MS ? 'stale' : 'fresh';
  }

  /**
   * Persist tile bytes, replacing any previous entry atomically.
   * Readers see either the old file or the complete new one.
   */
  async write(address: TileAddress, data: Uint8Array): Promise<CacheEntry> {
    if (data.byteLength === 0) {
      throw new Error(`Refusing to cache empty tile ${tileKey(address)}`);
    }

    const path = this.pathFor(address);
    const tempPath = `${path}.${randomUUID()}.tmp`;
    const modified = this.clock();

    await mkdir(dirname(path), { recursive: true });
    try {
      await writeFile(tempPath, data);
      const when = new Date(modified);
      await utimes(tempPath, when, when);
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }

    return { address, path, lastModified: modified, size: data.byteLength };
  }

  /**
   * Read tile bytes, or null if missing, empty or not an image
   */
  async read(address: TileAddress): Promise<Uint8Array | null> {
    try {
      const data = new Uint8Array(await readFile(this.pathFor(address)));
      return detectImageFormat(data) ? data : null;
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  /**
   * Delete a tile
   */
  async delete(address: TileAddress): Promise<void> {
    await rm(this.pathFor(address), { force: true });
  }

  /**
   * Entries inside the scope, ordered by zoom, x, y
   */
  async *iterate(scope: Scope): AsyncGenerator<CacheEntry> {
    const zooms = new Set<number>();
    for (const layer of scopeLayers(scope)) {
      for (let zoom = layer.minZoom; zoom <= layer.maxZoom; zoom++) {
        if (AreaCalculator.tileRange(layer.bbox, zoom)) zooms.add(zoom);
      }
    }

    const inScope = (address: TileAddress): boolean => AreaCalculator.contains(scope, address);
    for (const zoom of [...zooms].sort((a, b) => a - b)) {
      yield* this.scanZoom(this.partitionFor(zoom), zoom, inScope);
    }
  }

  /**
   * Get storage information across every partition
   */
  async getStorageInfo(): Promise<StorageInfo> {
    const info: StorageInfo = { tileCount: 0, totalSize: 0, partitions: {} };

    for (const partition of await this.listDir(this.rootDir)) {
      let count = 0;
      for (const zoomDir of await this.listDir(join(this.rootDir, partition))) {
        if (!NUMERIC_DIR.test(zoomDir)) continue;
        for await (const entry of this.scanZoom(partition, parseInt(zoomDir, 10), () => true)) {
          count++;
          info.totalSize += entry.size;
        }
      }
      if (count > 0) {
        info.partitions[partition] = count;
        info.tileCount += count;
      }
    }

    return info;
  }

  private async *scanZoom(
    partition: string,
    zoom: number,
    accept: (address: TileAddress) => boolean
  ): AsyncGenerator<CacheEntry> {
    const zoomDir = join(this.rootDir, partition, String(zoom));
    const xs = (await this.listDir(zoomDir))
      .filter(name => NUMERIC_DIR.test(name))
      .map(name => parseInt(name, 10))
      .sort((a, b) => a - b);

    for (const x of xs) {
      const addresses = (await this.listDir(join(zoomDir, String(x))))
        .map(name => TILE_FILE.exec(name))
        .filter((match): match is RegExpExecArray => match !== null)
        .map(match => ({ zoom, x, y: parseInt(match[1], 10) }))
        .filter(accept)
        .sort(compareTiles);

      for (const address of addresses) {
        const entry = await this.inspect(address, join(zoomDir, String(x), `${address.y}.png`));
        if (entry) yield entry;
      }
    }
  }

  private async inspect(address: TileAddress, path: string): Promise<CacheEntry | null> {
    try {
      const info = await stat(path);
      if (!info.isFile() || info.size === 0) return null;
      if (!detectImageFormat(await readHeader(path))) {
        logger.debug(`Treating non-image cache entry ${path} as missing`);
        return null;
      }
      return { address, path, lastModified: info.mtimeMs, size: info.size };
    } catch (error) {
      if (!isNotFound(error)) {
        logger.debug(`Treating unreadable cache entry ${path} as missing:`, error);
      }
      return null;
    }
  }

  private async listDir(path: string): Promise<string[]> {
    try {
      return await readdir(path);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }
}

async function readHeader(path: string): Promise<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    const header = new Uint8Array(IMAGE_HEADER_BYTES);
    const { bytesRead } = await handle.read(header, 0, IMAGE_HEADER_BYTES, 0);
    return header.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
