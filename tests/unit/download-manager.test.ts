import { describe, it, expect } from 'vitest';
import { HttpResponse } from 'msw';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { DownloadManager } from '@/lib/download-manager';
import { ConfigurationError } from '@/lib/errors';
import { StorageManager } from '@/lib/storage-manager';
import { TileFetcher } from '@/lib/tile-fetcher';
import { tileKey } from '@/lib/tile-utils';
import type { CacheEntry, DownloadProgress, FetchResult, TileAddress } from '@/models';
import { server } from '../mocks/server';
import { pngTile, recordingTileServer, TEST_TILE_URL } from '../mocks/handlers';
import { createClock, useTempDir } from '../utils/temp-cache';

const HOUR = 60 * 60 * 1000;
const SG_TILES: TileAddress[] = [
  { zoom: 7, x: 100, y: 63 },
  { zoom: 7, x: 101, y: 63 },
];

/**
 * Fetcher that answers from memory after a short delay and tracks overlap
 */
class SlowFetcher extends TileFetcher {
  active = 0;
  peak = 0;
  calls: string[] = [];

  constructor(private onFetch?: (address: TileAddress) => void) {
    super();
  }

  async fetch(address: TileAddress): Promise<FetchResult> {
    this.calls.push(tileKey(address));
    this.onFetch?.(address);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    await new Promise(resolve => setTimeout(resolve, 10));
    this.active--;
    return { ok: true, data: pngTile(address), attempts: 1 };
  }
}

class FailingStorage extends StorageManager {
  async write(): Promise<CacheEntry> {
    throw new Error('disk full');
  }
}

function worldTiles(zoom: number): TileAddress[] {
  const tiles: TileAddress[] = [];
  const n = 2 ** zoom;
  for (let x = 0; x < n; x++) {
    for (let y = 0; y < n; y++) {
      tiles.push({ zoom, x, y });
    }
  }
  return tiles;
}

describe('DownloadManager', () => {
  const { getDir } = useTempDir();

  function createStorage(clock = createClock()): StorageManager {
    return new StorageManager({ rootDir: getDir(), region: 'sg', clock: clock.now });
  }

  function createFetcher(maxAttempts = 3): TileFetcher {
    return new TileFetcher({ urlTemplate: TEST_TILE_URL, maxAttempts, retryDelay: 1, jitter: 0 });
  }

  describe('run', () => {
    it('should download every missing tile into the cache', async () => {
      const { handler, requests } = recordingTileServer();
      server.use(handler);
      const storage = createStorage();
      const manager = new DownloadManager({ fetcher: createFetcher(), storage });

      const summary = await manager.run(SG_TILES);

      expect(summary.total).toBe(2);
      expect(summary.succeeded).toBe(2);
      expect(summary.skipped).toBe(0);
      expect(summary.failed).toBe(0);
      expect(summary.cancelled).toBe(false);
      expect(requests.sort()).toEqual(['7/100/63', '7/101/63']);
      expect(summary.outcomes.get('7/100/63')).toEqual({
        status: 'success',
        address: SG_TILES[0],
        attempts: 1,
        bytes: pngTile(SG_TILES[0]).byteLength,
      });
      expect(await storage.read(SG_TILES[1])).toEqual(pngTile(SG_TILES[1]));
    });

    it('should skip fresh tiles on a second run without any request', async () => {
      const { handler, requests } = recordingTileServer();
      server.use(handler);
      const storage = createStorage();
      const manager = new DownloadManager({ fetcher: createFetcher(), storage });

      await manager.run(SG_TILES, { ttlHours: 24 });
      const second = await manager.run(SG_TILES, { ttlHours: 24 });

      expect(second.skipped).toBe(2);
      expect(second.succeeded).toBe(0);
      expect(second.outcomes.get('7/101/63')).toEqual({ status: 'skipped', address: SG_TILES[1], reason: 'fresh' });
      expect(requests).toHaveLength(2);
    });

    it('should refetch tiles once they are older than the TTL', async () => {
      const { handler, requests } = recordingTileServer();
      server.use(handler);
      const clock = createClock();
      const manager = new DownloadManager({ fetcher: createFetcher(), storage: createStorage(clock) });

      await manager.run(SG_TILES, { ttlHours: 24 });
      clock.advance(24 * HOUR + 1);
      const second = await manager.run(SG_TILES, { ttlHours: 24 });

      expect(second.succeeded).toBe(2);
      expect(requests).toHaveLength(4);
    });

    it('should refetch a cached tile that is not an image', async () => {
      const { handler, requests } = recordingTileServer();
      server.use(handler);
      const storage = createStorage();
      const corrupt = storage.pathFor(SG_TILES[0]);
      await mkdir(dirname(corrupt), { recursive: true });
      await writeFile(corrupt, 'truncated garbage');
      const manager = new DownloadManager({ fetcher: createFetcher(), storage });

      const summary = await manager.run([SG_TILES[0]], { ttlHours: 24 });

      expect(summary.succeeded).toBe(1);
      expect(requests).toEqual(['7/100/63']);
      expect(await storage.read(SG_TILES[0])).toEqual(pngTile(SG_TILES[0]));
    });

    it('should keep going when one tile fails permanently', async () => {
      const { handler } = recordingTileServer(address =>
        address.x === 101 ? new HttpResponse(null, { status: 404, statusText: 'Not Found' }) : undefined
      );
      server.use(handler);
      const storage = createStorage();
      const manager = new DownloadManager({ fetcher: createFetcher(), storage });

      const summary = await manager.run(SG_TILES);

      expect(summary.succeeded).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.failedAddresses).toEqual([{ zoom: 7, x: 101, y: 63 }]);
      expect(summary.outcomes.get('7/101/63')).toEqual({
        status: 'failed',
        address: SG_TILES[1],
        reason: 'HTTP 404: Not Found',
        attempts: 1,
        kind: 'permanent',
      });
      expect(await storage.freshness(SG_TILES[0], 24)).toBe('fresh');
      expect(await storage.freshness(SG_TILES[1], 24)).toBe('missing');
    });

    it('should mark exhausted server errors as transient', async () => {
      const { handler, requests } = recordingTileServer(() =>
        new HttpResponse(null, { status: 503, statusText: 'Service Unavailable' })
      );
      server.use(handler);
      const manager = new DownloadManager({ fetcher: createFetcher(2), storage: createStorage() });

      const summary = await manager.run([SG_TILES[0]]);

      expect(summary.outcomes.get('7/100/63')).toEqual({
        status: 'failed',
        address: SG_TILES[0],
        reason: 'HTTP 503: Service Unavailable',
        attempts: 2,
        kind: 'transient',
      });
      expect(requests).toHaveLength(2);
    });

    it('should process duplicate addresses once', async () => {
      const fetcher = new SlowFetcher();
      const manager = new DownloadManager({ fetcher, storage: createStorage() });

      const summary = await manager.run([SG_TILES[0], SG_TILES[1], { zoom: 7, x: 100, y: 63 }]);

      expect(summary.total).toBe(2);
      expect(fetcher.calls.sort()).toEqual(['7/100/63', '7/101/63']);
    });

    it('should fail invalid addresses without fetching', async () => {
      const fetcher = new SlowFetcher();
      const manager = new DownloadManager({ fetcher, storage: createStorage() });

      const summary = await manager.run([{ zoom: 1, x: 5, y: 0 }]);

      expect(summary.outcomes.get('1/5/0')).toEqual({
        status: 'failed',
        address: { zoom: 1, x: 5, y: 0 },
        reason: 'Invalid tile address',
        attempts: 0,
        kind: 'permanent',
      });
      expect(fetcher.calls).toEqual([]);
    });

    it('should report a cache write error as a failure of that tile only', async () => {
      const fetcher = new SlowFetcher();
      const storage = new FailingStorage({ rootDir: getDir(), region: 'sg' });
      const manager = new DownloadManager({ fetcher, storage });

      const summary = await manager.run([SG_TILES[0]]);

      expect(summary.outcomes.get('7/100/63')).toEqual({
        status: 'failed',
        address: SG_TILES[0],
        reason: 'Cache write failed: disk full',
        attempts: 1,
        kind: 'cache-io',
      });
    });

    it('should never exceed the concurrency limit', async () => {
      const fetcher = new SlowFetcher();
      const manager = new DownloadManager({ fetcher, storage: createStorage() });

      const summary = await manager.run(worldTiles(3), { concurrency: 3 });

      expect(summary.succeeded).toBe(64);
      expect(fetcher.peak).toBe(3);
    });

    it('should pull addresses lazily from the input', async () => {
      let pulled = 0;
      let pulledAtFirstFetch = -1;
      const fetcher = new SlowFetcher(() => {
        if (pulledAtFirstFetch < 0) pulledAtFirstFetch = pulled;
      });
      const manager = new DownloadManager({ fetcher, storage: createStorage() });
      function* addresses(): Generator<TileAddress> {
        for (const tile of worldTiles(2)) {
          pulled++;
          yield tile;
        }
      }

      const summary = await manager.run(addresses(), { concurrency: 2 });

      expect(pulledAtFirstFetch).toBe(2);
      expect(pulled).toBe(16);
      expect(summary.succeeded).toBe(16);
    });

    it('should reject an invalid concurrency', async () => {
      const manager = new DownloadManager({ fetcher: new SlowFetcher(), storage: createStorage() });

      await expect(manager.run(SG_TILES, { concurrency: 0 })).rejects.toThrow(ConfigurationError);
      await expect(manager.run(SG_TILES, { concurrency: 65 })).rejects.toThrow(ConfigurationError);
    });

    it('should fail the run when zoom 7+ tiles have no cache region', async () => {
      const manager = new DownloadManager({ fetcher: new SlowFetcher(), storage: new StorageManager({ rootDir: getDir() }) });

      await expect(manager.run(SG_TILES)).rejects.toThrow(ConfigurationError);
    });

    it('should emit an outcome and a progress update per tile', async () => {
      const outcomes: string[] = [];
      const updates: DownloadProgress[] = [];
      const manager = new DownloadManager({
        fetcher: new SlowFetcher(),
        storage: createStorage(),
        onOutcome: outcome => outcomes.push(outcome.status),
        onProgress: progress => updates.push(progress),
      });

      await manager.run(SG_TILES, { total: 2, zoomTotals: new Map([[7, 2]]) });

      expect(outcomes).toEqual(['success', 'success']);
      expect(updates.map(p => p.current)).toEqual([1, 2]);
      expect(updates[1].zoomCompleted).toBe(2);
      expect(updates[1].percent).toBe(100);
    });
  });

  describe('cancellation', () => {
    it('should stop dispatching when the signal aborts and let in-flight jobs finish', async () => {
      const controller = new AbortController();
      const fetcher = new SlowFetcher(() => controller.abort());
      const manager = new DownloadManager({ fetcher, storage: createStorage() });

      const summary = await manager.run(worldTiles(2), { concurrency: 1, signal: controller.signal });

      expect(summary.cancelled).toBe(true);
      expect(summary.total).toBe(1);
      expect(summary.succeeded).toBe(1);
      expect(fetcher.calls).toEqual(['2/0/0']);
      expect(manager.isCancelled()).toBe(true);
    });

    it('should not start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const fetcher = new SlowFetcher();
      const manager = new DownloadManager({ fetcher, storage: createStorage() });

      const summary = await manager.run(SG_TILES, { signal: controller.signal });

      expect(summary.cancelled).toBe(true);
      expect(summary.total).toBe(0);
      expect(fetcher.calls).toEqual([]);
    });

    it('should stop after cancel() is called', async () => {
      const fetcher = new SlowFetcher();
      const manager: DownloadManager = new DownloadManager({
        fetcher,
        storage: createStorage(),
        onOutcome: () => manager.cancel(),
      });

      const summary = await manager.run(worldTiles(2), { concurrency: 2 });

      expect(summary.cancelled).toBe(true);
      expect(summary.total).toBe(2);
      expect(fetcher.calls).toEqual(['2/0/0', '2/0/1']);
    });
  });
});
