import type { ElevationSample, ObservationWindow, Source, Station, VisibilityInterval } from '@skywindow/shared';
import { DEFAULT_VISIBILITY } from '@skywindow/shared';
import { VisibilityError } from '../errors.js';
import { normalizeDegrees, wrapSigned } from '../astro/angles.js';
import { toJulianDate, toSiderealTime } from '../astro/time.js';
import { equatorialToHorizontal, validateSource, validateStation } from '../astro/transform.js';

/**
 * Visibility Scanner: turns a sampled elevation curve into uptime windows.
 *
 * The elevation stream is folded through a two-state machine (below/above
 * the threshold). Rise and set instants are linearly interpolated between
 * the two samples that bracket the crossing; window edges are reported as
 * clipped boundaries and never interpolated.
 */

export interface ScanOptions {
  /** Fixed offset added to every computed elevation, e.g. a flat refraction allowance. */
  elevationOffsetDeg?: number;
  /** Upper bound on samples per scan; larger windows fail with `InvalidWindow`. */
  maxSamples?: number;
}

interface RawSample {
  t: number;  // epoch ms, possibly fractional
  azimuth: number;
  elevation: number;
  lst: number;
}

type ScanState =
  | { kind: 'below' }
  | {
      kind: 'above';
      start: number;
      startClipped: boolean;
      riseAzimuth: number;
      peakElevation: number;
      peakTime: number;
    };

interface WindowPlan {
  startMs: number;
  endMs: number;
  stepMs: number;
  count: number;
}

function invalidWindow(parameter: string, message: string): VisibilityError {
  return new VisibilityError('InvalidWindow', parameter, message);
}

/** @throws {VisibilityError} `InvalidThreshold` when not a finite angle within ±90° */
export function validateThreshold(thresholdDeg: number): void {
  if (!Number.isFinite(thresholdDeg) || thresholdDeg < -90 || thresholdDeg > 90) {
    throw new VisibilityError(
      'InvalidThreshold',
      'minElevationDeg',
      `minimum elevation ${thresholdDeg}° is outside -90..90`,
    );
  }
}

/**
 * Check a window and work out its sampling plan. The sample count is the
 * grid `start + i·step` up to `end`, plus a closing sample at `end` when the
 * step does not divide the window.
 *
 * @throws {VisibilityError} `InvalidWindow`
 */
export function planWindow(window: ObservationWindow, maxSamples = DEFAULT_VISIBILITY.maxSamples): WindowPlan {
  const startMs = window.startUtc instanceof Date ? window.startUtc.getTime() : NaN;
  const endMs = window.endUtc instanceof Date ? window.endUtc.getTime() : NaN;
  if (Number.isNaN(startMs)) throw invalidWindow('startUtc', 'window start is not a valid date');
  if (Number.isNaN(endMs)) throw invalidWindow('endUtc', 'window end is not a valid date');
  if (!Number.isFinite(window.stepSeconds) || window.stepSeconds <= 0) {
    throw invalidWindow('stepSeconds', `step ${window.stepSeconds}s must be a positive number`);
  }
  if (endMs <= startMs) {
    throw invalidWindow('endUtc', 'window end must be after window start');
  }

  const stepMs = window.stepSeconds * 1000;
  const steps = Math.floor((endMs - startMs) / stepMs);
  const count = steps + 1 + (startMs + steps * stepMs < endMs ? 1 : 0);
  if (count > maxSamples) {
    throw invalidWindow('stepSeconds', `window needs ${count} samples, more than the limit of ${maxSamples}`);
  }
  return { startMs, endMs, stepMs, count };
}

function* sampleTimes(plan: WindowPlan): Generator<number> {
  for (let i = 0; i < plan.count; i++) {
    // Index multiplication rather than accumulation keeps the grid drift-free.
    yield Math.min(plan.startMs + i * plan.stepMs, plan.endMs);
  }
}

function observeAt(station: Station, source: Source, t: number, offsetDeg: number): RawSample {
  const lst = toSiderealTime(toJulianDate(new Date(t)), station.longitude);
  const { azimuth, elevation } = equatorialToHorizontal(source.ra, source.dec, station.latitude, lst);
  return { t, azimuth, elevation: Math.min(90, Math.max(-90, elevation + offsetDeg)), lst };
}

/** Position of a source seen from a station at one instant. */
export function observe(station: Station, source: Source, time: Date, options: ScanOptions = {}): ElevationSample {
  const raw = observeAt(station, source, time.getTime(), options.elevationOffsetDeg ?? 0);
  return { time: new Date(raw.t), azimuth: raw.azimuth, elevation: raw.elevation, lst: raw.lst };
}

function* rawSamples(station: Station, source: Source, plan: WindowPlan, offsetDeg: number): Generator<RawSample> {
  for (const t of sampleTimes(plan)) yield observeAt(station, source, t, offsetDeg);
}

/** Fraction along [a, b] at which the elevation crosses the threshold. */
function crossingFraction(a: RawSample, b: RawSample, thresholdDeg: number): number {
  return (thresholdDeg - a.elevation) / (b.elevation - a.elevation);
}

function interpolateAzimuth(a: number, b: number, fraction: number): number {
  return normalizeDegrees(a + wrapSigned(b - a) * fraction);
}

function restartable<T>(factory: () => Generator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}

function prepare(station: Station, source: Source, window: ObservationWindow, options: ScanOptions): WindowPlan {
  const plan = planWindow(window, options.maxSamples);
  validateStation(station);
  validateSource(source);
  if (options.elevationOffsetDeg !== undefined && !Number.isFinite(options.elevationOffsetDeg)) {
    throw new VisibilityError('InvalidThreshold', 'elevationOffsetDeg', 'elevation offset must be a finite number');
  }
  return plan;
}

/**
 * Raw (time, azimuth, elevation) series across the window, for plotting.
 * Lazy and restartable; validation happens on the call, not on iteration.
 */
export function sampleElevation(
  station: Station,
  source: Source,
  window: ObservationWindow,
  options: ScanOptions = {},
): Iterable<ElevationSample> {
  const plan = prepare(station, source, window, options);
  const offset = options.elevationOffsetDeg ?? 0;

  return restartable(function* () {
    for (const s of rawSamples(station, source, plan, offset)) {
      yield { time: new Date(s.t), azimuth: s.azimuth, elevation: s.elevation, lst: s.lst };
    }
  });
}

/**
 * Scan one (station, source) pair for intervals where the elevation
 * strictly exceeds `thresholdDeg`. Intervals come out in time order and
 * never overlap.
 *
 * @throws {VisibilityError} `InvalidThreshold`, `InvalidWindow`, or `InvalidCoordinate`
 */
export function scan(
  station: Station,
  source: Source,
  window: ObservationWindow,
  thresholdDeg: number,
  options: ScanOptions = {},
): Iterable<VisibilityInterval> {
  validateThreshold(thresholdDeg);
  const plan = prepare(station, source, window, options);
  const offset = options.elevationOffsetDeg ?? 0;

  const close = (
    open: Extract<ScanState, { kind: 'above' }>,
    endMs: number,
    endClipped: boolean,
    setAzimuth: number,
  ): VisibilityInterval | null => {
    const start = Math.round(open.start);
    const end = Math.round(endMs);
    // A grazing pass narrower than a millisecond collapses under rounding.
    if (end <= start) return null;
    return {
      stationId: station.id,
      sourceId: source.id,
      start: new Date(start),
      end: new Date(end),
      startClipped: open.startClipped,
      endClipped,
      peakElevation: open.peakElevation,
      peakTime: new Date(Math.round(open.peakTime)),
      riseAzimuth: open.riseAzimuth,
      setAzimuth,
      durationSeconds: (end - start) / 1000,
    };
  };

  return restartable(function* () {
    let state: ScanState = { kind: 'below' };
    let prev: RawSample | null = null;

    for (const sample of rawSamples(station, source, plan, offset)) {
      const up = sample.elevation > thresholdDeg;

      if (state.kind === 'below') {
        if (up) {
          if (prev === null) {
            state = {
              kind: 'above',
              start: sample.t,
              startClipped: true,
              riseAzimuth: sample.azimuth,
              peakElevation: sample.elevation,
              peakTime: sample.t,
            };
          } else {
            const f = crossingFraction(prev, sample, thresholdDeg);
            state = {
              kind: 'above',
              start: prev.t + f * (sample.t - prev.t),
              startClipped: false,
              riseAzimuth: interpolateAzimuth(prev.azimuth, sample.azimuth, f),
              peakElevation: sample.elevation,
              peakTime: sample.t,
            };
          }
        }
      } else if (up) {
        if (sample.elevation > state.peakElevation) {
          const open: Extract<ScanState, { kind: 'above' }> = state;
          state = { ...open, peakElevation: sample.elevation, peakTime: sample.t };
        }
      } else if (prev !== null) {
        const f = crossingFraction(prev, sample, thresholdDeg);
        const interval = close(
          state,
          prev.t + f * (sample.t - prev.t),
          false,
          interpolateAzimuth(prev.azimuth, sample.azimuth, f),
        );
        if (interval) yield interval;
        state = { kind: 'below' };
      }

      prev = sample;
    }

    if (state.kind === 'above' && prev !== null) {
      const interval = close(state, prev.t, true, prev.azimuth);
      if (interval) yield interval;
    }
  });
}
