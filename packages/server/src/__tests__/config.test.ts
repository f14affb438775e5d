import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_VISIBILITY } from '@skywindow/shared';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    assert.deepStrictEqual(loadConfig({}), { port: 3420, visibility: DEFAULT_VISIBILITY });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      VISIBILITY_CONCURRENCY: '8',
      VISIBILITY_DEFAULT_STEP_SECONDS: '60',
      VISIBILITY_DEFAULT_MIN_ELEVATION: '7.5',
      VISIBILITY_MAX_SAMPLES: '5000',
    });
    assert.deepStrictEqual(config, {
      port: 8080,
      visibility: { stepSeconds: 60, minElevationDeg: 7.5, concurrency: 8, maxSamples: 5000 },
    });
  });

  it('ignores values that do not parse or are out of range', () => {
    const config = loadConfig({
      PORT: 'abc',
      VISIBILITY_CONCURRENCY: '0',
      VISIBILITY_DEFAULT_STEP_SECONDS: '-5',
      VISIBILITY_DEFAULT_MIN_ELEVATION: '95',
      VISIBILITY_MAX_SAMPLES: '',
    });
    assert.deepStrictEqual(config, { port: 3420, visibility: DEFAULT_VISIBILITY });
  });
});
