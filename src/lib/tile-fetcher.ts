/**
 * Tile Fetcher for downloading raster tiles from a tile server
 * Handles timeouts, retries with backoff and response validation.
 * Writing to the cache is left to the caller.
 */

import type { DownloadJob, FetchResult, TileAddress } from '@/models';
import { logger } from './logger';
import { computeBackoffDelay, isRetriableStatus, sleep, type BackoffPolicy } from './retry-policy';
import { buildTileUrl, detectImageFormat, tileKey } from './tile-utils';

export const DEFAULT_TILE_URL = 'https://tile.openstreetmap.org/{z}/{x}/{y}.png';

export interface TileFetcherOptions {
  urlTemplate?: string;
  maxAttempts?: number;
  retryDelay?: number;
  maxRetryDelay?: number;
  jitter?: number;
  timeout?: number;
  userAgent?: string;
  random?: () => number;
}

/**
 * Outcome of a single HTTP attempt
 */
export type AttemptResult =
  | { ok: true; data: Uint8Array }
  | { ok: false; reason: string; retriable: boolean };

/**
 * What to do after an attempt
 */
export type RetryDecision =
  | { action: 'done'; result: FetchResult }
  | { action: 'retry'; job: DownloadJob; delay: number };

export class TileFetcher {
  private urlTemplate: string;
  private maxAttempts: number;
  private backoff: BackoffPolicy;
  private timeout: number;
  private userAgent: string;
  private random: () => number;

  constructor(options: TileFetcherOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? DEFAULT_TILE_URL;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoff = {
      baseDelay: options.retryDelay ?? 1000,
      maxDelay: options.maxRetryDelay ?? 30000,
      jitter: options.jitter ?? 0.5,
    };
    this.timeout = options.timeout ?? 15000;
    this.userAgent = options.userAgent ?? 'tile-bundler/0.1';
    this.random = options.random ?? Math.random;
  }

  /**
   * Fetch a single tile, retrying transient failures.
   * Never throws for network or HTTP failures.
   */
  async fetch(address: TileAddress): Promise<FetchResult> {
    let job: DownloadJob = { address, attempt: 0 };

    for (;;) {
      const result = await this.attempt(job);
      const decision = this.decide(job, result);

      if (decision.action === 'done') {
        if (!decision.result.ok) {
          logger.debug(`Giving up on ${tileKey(address)} after ${decision.result.attempts} attempt(s): ${decision.result.reason}`);
        }
        return decision.result;
      }

      logger.debug(`Retrying ${tileKey(address)} in ${decision.delay}ms (attempt ${decision.job.attempt + 1}/${this.maxAttempts})`);
      await sleep(decision.delay);
      job = decision.job;
    }
  }

  /**
   * Decide between finishing and retrying, given the attempt just made.
   * The job's counter is bumped here and nowhere else.
   */
  decide(job: DownloadJob, result: AttemptResult): RetryDecision {
    const attempts = job.attempt + 1;

    if (result.ok) {
      return { action: 'done', result: { ok: true, data: result.data, attempts } };
    }

    if (!result.retriable || attempts >= this.maxAttempts) {
      return {
        action: 'done',
        result: { ok: false, reason: result.reason, attempts, retriable: result.retriable },
      };
    }

    return {
      action: 'retry',
      job: { address: job.address, attempt: attempts },
      delay: computeBackoffDelay(attempts, this.backoff, this.random),
    };
  }

  /**
   * Perform one HTTP GET for the job's tile
   */
  async attempt(job: DownloadJob): Promise<AttemptResult> {
    const url = this.buildUrl(job.address);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          'Accept': 'image/png,image/*;q=0.8',
          'User-Agent': this.userAgent,
        },
      });

      if (!response.ok) {
        await this.discardBody(response);
        return {
          ok: false,
          reason: `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
          retriable: isRetriableStatus(response.status),
        };
      }

      const data = new Uint8Array(await response.arrayBuffer());

      if (data.byteLength === 0) {
        return { ok: false, reason: 'Empty response body', retriable: false };
      }

      if (!detectImageFormat(data)) {
        return { ok: false, reason: 'Response is not an image', retriable: false };
      }

      return { ok: true, data };
    } catch (error) {
      if (controller.signal.aborted) {
        return { ok: false, reason: `Timeout after ${this.timeout}ms`, retriable: true };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: `Network error: ${message}`, retriable: true };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Build the request URL for a tile
   */
  buildUrl(address: TileAddress): string {
    return buildTileUrl(this.urlTemplate, address);
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      logger.debug('Failed to discard response body:', error);
    }
  }
}
