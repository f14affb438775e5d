import { z } from 'zod';
import type {
  ObservationWindow,
  ObservationWindowPayload,
  Source,
  Station,
  VisibilityClientMessage,
  VisibilityRequest,
} from '@skywindow/shared';

// Shape checks only. Coordinate ranges are the engine's job, so a bad RA
// still reaches the aggregator and fails just its own pair.

export const StationSchema = z.object({
  id: z.string().min(1),
  latitude: z.number(),
  longitude: z.number(),
  altitude: z.number().optional(),
}) satisfies z.ZodType<Station>;

export const SourceSchema = z.object({
  id: z.string().min(1),
  ra: z.number(),
  dec: z.number(),
}) satisfies z.ZodType<Source>;

export const WindowSchema = z.object({
  startUtc: z.string().datetime({ offset: true }),
  endUtc: z.string().datetime({ offset: true }),
  stepSeconds: z.number(),
}) satisfies z.ZodType<ObservationWindowPayload>;

export const VisibilityRequestSchema = z.object({
  stations: z.array(StationSchema),
  sources: z.array(SourceSchema),
  window: WindowSchema,
  minElevationDeg: z.number(),
}) satisfies z.ZodType<VisibilityRequest>;

export const SamplesRequestSchema = z.object({
  station: StationSchema,
  source: SourceSchema,
  window: WindowSchema,
  elevationOffsetDeg: z.number().optional(),
});

export const GeocentricStationSchema = z.object({
  id: z.string().min(1),
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const ComputeMessageSchema = VisibilityRequestSchema.extend({
  type: z.literal('compute'),
  requestId: z.string().min(1),
});

export const CancelMessageSchema = z.object({
  type: z.literal('cancel'),
  requestId: z.string().optional(),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  ComputeMessageSchema,
  CancelMessageSchema,
]) satisfies z.ZodType<VisibilityClientMessage>;

export function toObservationWindow(payload: ObservationWindowPayload): ObservationWindow {
  return {
    startUtc: new Date(payload.startUtc),
    endUtc: new Date(payload.endUtc),
    stepSeconds: payload.stepSeconds,
  };
}
