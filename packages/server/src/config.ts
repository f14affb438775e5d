import type { VisibilityDefaults } from '@skywindow/shared';
import { DEFAULT_VISIBILITY } from '@skywindow/shared';

export interface ServerConfig {
  port: number;
  visibility: VisibilityDefaults;
}

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  accept: (value: number) => boolean,
  parse: (raw: string) => number = parseFloat,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parse(raw);
  if (!Number.isFinite(value) || !accept(value)) {
    console.warn(`⚙️  Ignoring ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

const int = (raw: string) => parseInt(raw, 10);

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: readNumber(env, 'PORT', 3420, (v) => v > 0 && v < 65536, int),
    visibility: {
      stepSeconds: readNumber(env, 'VISIBILITY_DEFAULT_STEP_SECONDS', DEFAULT_VISIBILITY.stepSeconds, (v) => v > 0),
      minElevationDeg: readNumber(
        env,
        'VISIBILITY_DEFAULT_MIN_ELEVATION',
        DEFAULT_VISIBILITY.minElevationDeg,
        (v) => v >= -90 && v <= 90,
      ),
      concurrency: readNumber(env, 'VISIBILITY_CONCURRENCY', DEFAULT_VISIBILITY.concurrency, (v) => v >= 1, int),
      maxSamples: readNumber(env, 'VISIBILITY_MAX_SAMPLES', DEFAULT_VISIBILITY.maxSamples, (v) => v >= 2, int),
    },
  };
}
