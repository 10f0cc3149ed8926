/**
 * Download Manager for coordinating tile downloads
 */

import type { DownloadOutcome, DownloadProgress, RunSummary, TileAddress } from '@/models';
import { ConfigurationError, errorMessage } from './errors';
import { logger } from './logger';
import { ProgressTracker } from './progress-tracker';
import type { StorageManager } from './storage-manager';
import type { TileFetcher } from './tile-fetcher';
import { compareTiles, isValidTile, tileKey } from './tile-utils';

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_TTL_HOURS = 168;
export const MAX_CONCURRENCY = 64;

export interface DownloadManagerOptions {
  fetcher: TileFetcher;
  storage: StorageManager;
  concurrency?: number;
  ttlHours?: number;
  onOutcome?: (outcome: DownloadOutcome) => void;
  onProgress?: (progress: DownloadProgress) => void;
}

export interface RunOptions {
  concurrency?: number;
  ttlHours?: number;
  signal?: AbortSignal;
  total?: number;                              // For progress reporting
  zoomTotals?: ReadonlyMap<number, number>;    // For progress reporting
}

/**
 * DownloadManager - bounded worker pool over a lazy address sequence
 *
 * - Fresh cache entries are skipped without touching the network
 * - Each miss is fetched once (with the fetcher's own retries) and written to the cache
 * - Per-tile failures become outcomes; siblings keep running
 * - Cancelling stops dispatch; jobs already in flight run to completion
 */
export class DownloadManager {
  private abortController: AbortController | null = null;

  constructor(private options: DownloadManagerOptions) {}

  /**
   * Download every address not already fresh in the cache
   */
  async run(addresses: Iterable<TileAddress>, runOptions: RunOptions = {}): Promise<RunSummary> {
    const concurrency = runOptions.concurrency ?? this.options.concurrency ?? DEFAULT_CONCURRENCY;
    const ttlHours = runOptions.ttlHours ?? this.options.ttlHours ?? DEFAULT_TTL_HOURS;

    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      throw new ConfigurationError(`Concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got ${concurrency}`);
    }
    if (!Number.isFinite(ttlHours) || ttlHours < 0) {
      throw new ConfigurationError(`Cache TTL must be a non-negative number of hours, got ${ttlHours}`);
    }

    await this.options.storage.init();

    const controller = new AbortController();
    this.abortController = controller;
    const external = runOptions.signal;
    const onAbort = (): void => controller.abort();
    if (external) {
      if (external.aborted) controller.abort();
      else external.addEventListener('abort', onAbort, { once: true });
    }

    const startTime = Date.now();
    const outcomes = new Map<string, DownloadOutcome>();
    const seen = new Set<string>();
    const tracker = new ProgressTracker({ total: runOptions.total, zoomTotals: runOptions.zoomTotals });
    const iterator = addresses[Symbol.iterator]();
    const inFlight = new Set<Promise<void>>();
    let exhausted = false;

    const nextAddress = (): TileAddress | null => {
      while (!exhausted) {
        const next = iterator.next();
        if (next.done) {
          exhausted = true;
          break;
        }
        const key = tileKey(next.value);
        if (!seen.has(key)) {
          seen.add(key);
          return next.value;
        }
      }
      return null;
    };

    const record = (outcome: DownloadOutcome): void => {
      outcomes.set(tileKey(outcome.address), outcome);
      const progress = tracker.update(outcome);
      try {
        this.options.onOutcome?.(outcome);
        this.options.onProgress?.(progress);
      } catch (error) {
        logger.warn('Progress callback failed:', error);
      }
    };

    const launch = (address: TileAddress): void => {
      const task: Promise<void> = this.processTile(address, ttlHours)
        .then(record)
        .finally(() => {
          inFlight.delete(task);
        });
      inFlight.add(task);
    };

    const fill = (): void => {
      while (!controller.signal.aborted && inFlight.size < concurrency) {
        const address = nextAddress();
        if (!address) break;
        launch(address);
      }
    };

    try {
      fill();
      while (inFlight.size > 0) {
        await Promise.race(inFlight);
        fill();
      }
    } finally {
      // A fatal error must not leave orphaned jobs writing to the cache
      await Promise.allSettled([...inFlight]);
      external?.removeEventListener('abort', onAbort);
    }

    return this.summarize(outcomes, controller.signal.aborted, Date.now() - startTime);
  }

  /**
   * Stop dispatching new jobs for the current run
   */
  cancel(): void {
    this.abortController?.abort();
  }

  /**
   * Whether the most recent run was cancelled
   */
  isCancelled(): boolean {
    return this.abortController?.signal.aborted ?? false;
  }

  private async processTile(address: TileAddress, ttlHours: number): Promise<DownloadOutcome> {
    const key = tileKey(address);

    if (!isValidTile(address)) {
      return { status: 'failed', address, reason: 'Invalid tile address', attempts: 0, kind: 'permanent' };
    }

    // Configuration errors (e.g. no region for zoom >= 7) are fatal to the run
    const freshness = await this.options.storage.freshness(address, ttlHours);
    if (freshness === 'fresh') {
      logger.debug(`Cache hit for ${key}`);
      return { status: 'skipped', address, reason: 'fresh' };
    }

    const result = await this.options.fetcher.fetch(address);
    if (!result.ok) {
      logger.warn(`Failed to download ${key} after ${result.attempts} attempt(s): ${result.reason}`);
      return {
        status: 'failed',
        address,
        reason: result.reason,
        attempts: result.attempts,
        kind: result.retriable ? 'transient' : 'permanent',
      };
    }

    try {
      await this.options.storage.write(address, result.data);
    } catch (error) {
      logger.warn(`Failed to cache ${key}:`, error);
      return {
        status: 'failed',
        address,
        reason: `Cache write failed: ${errorMessage(error)}`,
        attempts: result.attempts,
        kind: 'cache-io',
      };
    }

    return { status: 'success', address, attempts: result.attempts, bytes: result.data.byteLength };
  }

  private summarize(outcomes: Map<string, DownloadOutcome>, cancelled: boolean, durationMs: number): RunSummary {
    let succeeded = 0;
    let skipped = 0;
    const failedAddresses: TileAddress[] = [];

    for (const outcome of outcomes.values()) {
      if (outcome.status === 'success') succeeded++;
      else if (outcome.status === 'skipped') skipped++;
      else failedAddresses.push(outcome.address);
    }

    failedAddresses.sort(compareTiles);

    return {
      outcomes,
      total: outcomes.size,
      succeeded,
      skipped,
      failed: failedAddresses.length,
      failedAddresses,
      cancelled,
      durationMs,
    };
  }
}
