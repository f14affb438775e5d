// ============================================================================
// Visibility API Routes
// ============================================================================

import { Router, type Response } from 'express';
import { ZodError } from 'zod';
import type { PairOutcome } from '@skywindow/shared';
import { isVisibilityError } from '../errors.js';
import { stationFromGeocentric } from '../astro/geodesy.js';
import { sampleElevation } from './scanner.js';
import type { VisibilityService } from './service.js';
import {
  GeocentricStationSchema,
  SamplesRequestSchema,
  VisibilityRequestSchema,
  toObservationWindow,
} from './schema.js';

export function sendError(res: Response, err: unknown) {
  if (isVisibilityError(err)) {
    return res.status(400).json({ error: err.message, kind: err.kind, parameter: err.parameter });
  }
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'Invalid request', issues: err.issues });
  }
  console.error('🔭 Visibility request failed:', err);
  return res.status(500).json({ error: 'Internal error' });
}

export function createVisibilityRouter(service: VisibilityService): Router {
  const router = Router();

  router.get('/visibility/defaults', (_req, res) => {
    res.json(service.getDefaults());
  });

  // Compute intervals for every (station, source) pair
  router.post('/visibility', async (req, res) => {
    try {
      const body = VisibilityRequestSchema.parse(req.body);
      const jobId = `http-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`;
      const result = await service.run(jobId, {
        stations: body.stations,
        sources: body.sources,
        window: toObservationWindow(body.window),
        minElevationDeg: body.minElevationDeg,
      });
      if (!result) return res.status(409).json({ error: 'Computation cancelled' });

      const pairs: PairOutcome[] = [...result.values()];
      res.json({ pairs });
    } catch (e) {
      sendError(res, e);
    }
  });

  // Raw elevation curve for one pair, for plotting
  router.post('/visibility/samples', (req, res) => {
    try {
      const body = SamplesRequestSchema.parse(req.body);
      const samples = sampleElevation(body.station, body.source, toObservationWindow(body.window), {
        elevationOffsetDeg: body.elevationOffsetDeg,
        maxSamples: service.getDefaults().maxSamples,
      });
      res.json({ stationId: body.station.id, sourceId: body.source.id, samples: [...samples] });
    } catch (e) {
      sendError(res, e);
    }
  });

  // Geocentric XYZ (catalog form) → geodetic station
  router.post('/stations/geodetic', (req, res) => {
    try {
      const { id, x, y, z } = GeocentricStationSchema.parse(req.body);
      res.json(stationFromGeocentric(id, { x, y, z }));
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
