/**
 * Progress accounting for a download run: overall and per-zoom counters,
 * throughput and ETA.
 */

import type { DownloadOutcome, DownloadProgress } from '@/models';

export interface ProgressTrackerOptions {
  total?: number;
  zoomTotals?: ReadonlyMap<number, number>;
  clock?: () => number;
}

export class ProgressTracker {
  private readonly startTime: number;
  private readonly total: number;
  private readonly zoomTotals: ReadonlyMap<number, number>;
  private readonly zoomCounts = new Map<number, number>();
  private readonly clock: () => number;
  private completed = 0;
  private succeeded = 0;
  private skipped = 0;
  private failed = 0;

  constructor(options: ProgressTrackerOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.startTime = this.clock();
    this.zoomTotals = options.zoomTotals ?? new Map();
    this.total = options.total ?? sum(this.zoomTotals.values());
  }

  /**
   * Record an outcome and return the updated snapshot
   */
  update(outcome: DownloadOutcome): DownloadProgress {
    const zoom = outcome.address.zoom;
    this.completed++;
    this.zoomCounts.set(zoom, (this.zoomCounts.get(zoom) ?? 0) + 1);

    switch (outcome.status) {
      case 'success':
        this.succeeded++;
        break;
      case 'skipped':
        this.skipped++;
        break;
      case 'failed':
        this.failed++;
        break;
    }

    const elapsed = this.clock() - this.startTime;
    const rate = elapsed > 0 ? this.completed / (elapsed / 1000) : 0;
    const remaining = Math.max(0, this.total - this.completed);

    return {
      current: this.completed,
      total: this.total,
      percent: this.total > 0 ? Math.min(100, Math.round((this.completed / this.total) * 100)) : 0,
      zoom,
      zoomCompleted: this.zoomCounts.get(zoom) ?? 0,
      zoomTotal: this.zoomTotals.get(zoom) ?? 0,
      succeeded: this.succeeded,
      skipped: this.skipped,
      failed: this.failed,
      rate,
      timeElapsed: elapsed,
      timeRemaining: rate > 0 ? Math.round((remaining / rate) * 1000) : 0,
      lastOutcome: outcome,
    };
  }
}

/**
 * One-line progress report, e.g.
 * "[SUCCESS] z7/100/63 | SG Zoom: 1/2 | Overall: 1/2 | 4.0 tiles/s | ETA: 0.3s"
 */
export function formatProgressLine(progress: DownloadProgress, label?: string): string {
  const { zoom, x, y } = progress.lastOutcome.address;
  const status = progress.lastOutcome.status === 'skipped' ? 'CACHE' : progress.lastOutcome.status.toUpperCase();
  const prefix = label ? `${label} ` : '';

  return (
    `[${status}] z${zoom}/${x}/${y} | ` +
    `${prefix}Zoom: ${progress.zoomCompleted}/${progress.zoomTotal} | ` +
    `Overall: ${progress.current}/${progress.total} | ` +
    `${progress.rate.toFixed(1)} tiles/s | ETA: ${(progress.timeRemaining / 1000).toFixed(1)}s`
  );
}

function sum(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}
