/**
 * Data models and interfaces for tile-bundler
 */

/**
 * A single tile coordinate. Valid only if 0 <= x, y < 2^zoom.
 */
export interface TileAddress {
  readonly zoom: number;
  readonly x: number;
  readonly y: number;
}

/**
 * Geographic bounds in degrees
 */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/**
 * One layer of a scope: a box covered at every zoom in [minZoom, maxZoom]
 */
export interface TileScope {
  bbox: BoundingBox;
  minZoom: number;
  maxZoom: number;
}

/**
 * A scope is a single layer or an ordered list of layers
 * (e.g. the world at zoom 0-6 plus a country at zoom 7-15).
 */
export type Scope = TileScope | readonly TileScope[];

/**
 * Tile file stored on disk
 */
export interface CacheEntry {
  address: TileAddress;
  path: string;                  // Absolute file path
  lastModified: number;          // Epoch milliseconds
  size: number;                  // Bytes
}

export type Freshness = 'fresh' | 'stale' | 'missing';

/**
 * A cache-miss address queued for fetch. `attempt` counts the attempts
 * already made and never exceeds the fetcher's maxAttempts.
 */
export interface DownloadJob {
  readonly address: TileAddress;
  readonly attempt: number;
}

export type FetchResult =
  | { ok: true; data: Uint8Array; attempts: number }
  | { ok: false; reason: string; attempts: number; retriable: boolean };

export type FailureKind = 'transient' | 'permanent' | 'cache-io';

export type DownloadOutcome =
  | { status: 'success'; address: TileAddress; attempts: number; bytes: number }
  | { status: 'skipped'; address: TileAddress; reason: 'fresh' }
  | { status: 'failed'; address: TileAddress; reason: string; attempts: number; kind: FailureKind };

export type DownloadStatus = DownloadOutcome['status'];

/**
 * Result of one scheduler run
 */
export interface RunSummary {
  outcomes: ReadonlyMap<string, DownloadOutcome>;  // Keyed by "z/x/y"
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  failedAddresses: TileAddress[];
  cancelled: boolean;
  durationMs: number;
}

/**
 * Download progress, emitted after every outcome
 */
export interface DownloadProgress {
  current: number;               // Outcomes so far
  total: number;                 // Expected outcomes (0 when unknown)
  percent: number;               // Percentage (0-100)
  zoom: number;                  // Zoom of the tile that just finished
  zoomCompleted: number;
  zoomTotal: number;
  succeeded: number;
  skipped: number;
  failed: number;
  rate: number;                  // Tiles per second
  timeElapsed: number;           // Milliseconds elapsed
  timeRemaining: number;         // Estimated milliseconds remaining
  lastOutcome: DownloadOutcome;
}

/**
 * The addresses an archive is expected to contain
 */
export interface BundleManifest {
  expected: ReadonlyMap<string, TileAddress>;
}

export type AssemblyResult =
  | {
      status: 'complete';
      archivePath: string;
      entryCount: number;
      bytes: number;
    }
  | {
      status: 'partial';
      archivePath: string;
      entryCount: number;
      bytes: number;
      missing: TileAddress[];
    };

/**
 * Resolved runtime settings
 */
export interface AppSettings {
  country?: string;              // ISO 3166-1 alpha-2
  bbox?: BoundingBox;            // Overrides the country's box
  regionName: string;            // Cache partition for zoom >= 7
  minZoom: number;
  maxZoom: number;
  concurrency: number;
  ttlHours: number;
  cacheDir: string;
  tileUrl: string;               // Template with {z}, {x}, {y}
  maxAttempts: number;
  retryDelay: number;            // Milliseconds
  timeout: number;               // Milliseconds per attempt
  output: string;                // Archive path
}
