import { EventEmitter } from 'events';
import type { ObservationWindow, Source, Station, VisibilityDefaults } from '@skywindow/shared';
import { computeAllAsync, type VisibilityResult } from './aggregator.js';
import type { ScanOptions } from './scanner.js';

/**
 * Visibility Service: runs aggregation jobs and reports progress.
 *
 * Events:
 * - `pair` (jobId, outcome) as each pair finishes
 * - `done` (jobId, result)
 * - `cancelled` (jobId)
 *
 * Each job owns an AbortController; cancelling a job discards whatever it
 * had computed, and no `done` is emitted for it.
 */

export interface VisibilityJob {
  stations: readonly Station[];
  sources: readonly Source[];
  window: ObservationWindow;
  minElevationDeg: number;
}

export class VisibilityService extends EventEmitter {
  private jobs: Map<string, AbortController> = new Map();
  private defaults: VisibilityDefaults;
  private scanOptions: ScanOptions;

  constructor(defaults: VisibilityDefaults, scanOptions: ScanOptions = {}) {
    super();
    this.defaults = defaults;
    this.scanOptions = { maxSamples: defaults.maxSamples, ...scanOptions };
  }

  getDefaults(): VisibilityDefaults {
    return { ...this.defaults };
  }

  get activeJobs(): number {
    return this.jobs.size;
  }

  isRunning(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /**
   * Start a job. Resolves with the full result, or `null` when the job was
   * cancelled before it finished. Validation errors reject.
   */
  async run(jobId: string, job: VisibilityJob): Promise<VisibilityResult | null> {
    this.cancel(jobId);
    const controller = new AbortController();
    this.jobs.set(jobId, controller);
    const started = Date.now();

    try {
      const result = await computeAllAsync(job.stations, job.sources, job.window, job.minElevationDeg, {
        ...this.scanOptions,
        concurrency: this.defaults.concurrency,
        signal: controller.signal,
        onPair: (outcome) => this.emit('pair', jobId, outcome),
      });
      console.log(`🔭 Visibility job ${jobId}: ${result.size} pairs in ${Date.now() - started}ms`);
      this.emit('done', jobId, result);
      return result;
    } catch (err) {
      if (controller.signal.aborted) {
        console.log(`🔭 Visibility job ${jobId} cancelled`);
        this.emit('cancelled', jobId);
        return null;
      }
      throw err;
    } finally {
      if (this.jobs.get(jobId) === controller) this.jobs.delete(jobId);
    }
  }

  cancel(jobId: string): boolean {
    const controller = this.jobs.get(jobId);
    if (!controller) return false;
    controller.abort();
    this.jobs.delete(jobId);
    return true;
  }

  cancelAll() {
    for (const id of [...this.jobs.keys()]) this.cancel(id);
  }
}
