import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { ObservationWindow, PairOutcome, Source, Station } from '@skywindow/shared';
import { DEFAULT_VISIBILITY } from '@skywindow/shared';
import { isVisibilityError } from '../errors.js';
import { planWindow, scan, validateThreshold, type ScanOptions } from './scanner.js';

/**
 * Schedule Aggregator: runs the scanner over every (station, source) pair.
 *
 * Pairs share nothing but the immutable inputs, so each one is scanned in
 * isolation and a bad record only fails its own pair.
 */

export type VisibilityResult = Map<string, PairOutcome>;

export interface AsyncComputeOptions extends ScanOptions {
  concurrency?: number;
  signal?: AbortSignal;
  onPair?: (outcome: PairOutcome) => void;
}

interface PairTask {
  key: string;
  station: Station;
  source: Source;
}

/** Result key for a pair. JSON keeps ids containing any separator apart. */
export function pairKey(stationId: string, sourceId: string): string {
  return JSON.stringify([stationId, sourceId]);
}

/** Cartesian product in (station, source) order; the first duplicate key wins. */
function buildTasks(stations: readonly Station[], sources: readonly Source[]): PairTask[] {
  const seen = new Set<string>();
  const tasks: PairTask[] = [];
  for (const station of stations) {
    for (const source of sources) {
      const key = pairKey(station.id, source.id);
      if (seen.has(key)) {
        console.warn(`🔭 Duplicate pair ${station.id} / ${source.id} ignored`);
        continue;
      }
      seen.add(key);
      tasks.push({ key, station, source });
    }
  }
  return tasks;
}

function runPair(task: PairTask, window: ObservationWindow, thresholdDeg: number, options: ScanOptions): PairOutcome {
  const { station, source } = task;
  try {
    const intervals = [...scan(station, source, window, thresholdDeg, options)];
    return { stationId: station.id, sourceId: source.id, ok: true, intervals };
  } catch (err) {
    if (!isVisibilityError(err)) throw err;
    return {
      stationId: station.id,
      sourceId: source.id,
      ok: false,
      error: err.withContext({ stationId: station.id, sourceId: source.id }).describe(),
    };
  }
}

/**
 * Compute visibility intervals for every pair.
 *
 * @throws {VisibilityError} `InvalidWindow` or `InvalidThreshold` for the whole call; coordinate errors are per pair
 */
export function computeAll(
  stations: readonly Station[],
  sources: readonly Source[],
  window: ObservationWindow,
  thresholdDeg: number,
  options: ScanOptions = {},
): VisibilityResult {
  validateThreshold(thresholdDeg);
  planWindow(window, options.maxSamples);

  const result: VisibilityResult = new Map();
  for (const task of buildTasks(stations, sources)) {
    result.set(task.key, runPair(task, window, thresholdDeg, options));
  }
  return result;
}

/** Entry point for the presentation layer. */
export function computeVisibility(
  stations: readonly Station[],
  sources: readonly Source[],
  window: ObservationWindow,
  minElevationDeg: number,
): VisibilityResult {
  return computeAll(stations, sources, window, minElevationDeg);
}

function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error('Visibility computation aborted');
  err.name = 'AbortError';
  return err;
}

/**
 * Same result as {@link computeAll}, produced by a fixed pool of workers
 * that yield to the event loop between pairs. Aborting the signal rejects
 * with an `AbortError` and drops everything computed so far.
 */
export async function computeAllAsync(
  stations: readonly Station[],
  sources: readonly Source[],
  window: ObservationWindow,
  thresholdDeg: number,
  options: AsyncComputeOptions = {},
): Promise<VisibilityResult> {
  const { concurrency = DEFAULT_VISIBILITY.concurrency, signal, onPair, ...scanOptions } = options;

  validateThreshold(thresholdDeg);
  planWindow(window, scanOptions.maxSamples);
  if (signal?.aborted) throw abortError(signal);

  const tasks = buildTasks(stations, sources);
  const result: VisibilityResult = new Map();
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (next < tasks.length && !failed) {
      const task = tasks[next++];
      await yieldToEventLoop();
      if (failed) return;
      if (signal?.aborted) throw abortError(signal);
      let outcome: PairOutcome;
      try {
        outcome = runPair(task, window, thresholdDeg, scanOptions);
      } catch (err) {
        failed = true;
        throw err;
      }
      result.set(task.key, outcome);
      onPair?.(outcome);
    }
  };

  const size = Math.max(1, Math.min(Math.floor(concurrency) || 1, tasks.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  return result;
}
