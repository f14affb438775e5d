// ============================================================================
// SkyWindow Visibility Types
// ============================================================================

export interface Station {
  id: string;
  latitude: number;   // geodetic degrees, -90..90
  longitude: number;  // degrees, east-positive (-180..360 accepted)
  altitude?: number;  // meters above the ellipsoid, default 0
}

export interface Source {
  id: string;
  ra: number;         // right ascension, decimal degrees 0..360
  dec: number;        // declination, degrees -90..90
}

export interface ObservationWindow {
  startUtc: Date;
  endUtc: Date;
  stepSeconds: number;
}

export interface HorizontalPosition {
  azimuth: number;    // degrees 0..360, 0 = North, 90 = East
  elevation: number;  // degrees -90..90
}

export interface ElevationSample extends HorizontalPosition {
  time: Date;
  lst: number;        // local mean sidereal time, hours 0..24
}

export interface VisibilityInterval {
  stationId: string;
  sourceId: string;
  start: Date;
  end: Date;
  startClipped: boolean;  // source was already up at window start
  endClipped: boolean;    // source was still up at window end
  peakElevation: number;
  peakTime: Date;
  riseAzimuth: number;
  setAzimuth: number;
  durationSeconds: number;
}

export type VisibilityErrorKind =
  | 'InvalidCalendarDate'
  | 'InvalidWindow'
  | 'InvalidThreshold'
  | 'InvalidCoordinate';

export interface VisibilityErrorInfo {
  kind: VisibilityErrorKind;
  message: string;
  parameter: string;
  stationId?: string;
  sourceId?: string;
}

export type PairOutcome =
  | { stationId: string; sourceId: string; ok: true; intervals: VisibilityInterval[] }
  | { stationId: string; sourceId: string; ok: false; error: VisibilityErrorInfo };

export interface VisibilityDefaults {
  stepSeconds: number;
  minElevationDeg: number;
  concurrency: number;
  maxSamples: number;
}

export const DEFAULT_VISIBILITY: VisibilityDefaults = {
  stepSeconds: 180,       // 3-minute cadence
  minElevationDeg: 0,
  concurrency: 4,
  maxSamples: 1_000_000,
};

// ── Wire formats ────────────────────────────────────────────────────────────

export interface ObservationWindowPayload {
  startUtc: string;   // ISO-8601
  endUtc: string;
  stepSeconds: number;
}

export interface VisibilityRequest {
  stations: Station[];
  sources: Source[];
  window: ObservationWindowPayload;
  minElevationDeg: number;
}

export type VisibilityClientMessage =
  | ({ type: 'compute'; requestId: string } & VisibilityRequest)
  | { type: 'cancel'; requestId?: string };

export type VisibilityServerMessage =
  | { type: 'visibility_pair'; requestId: string; outcome: PairOutcome }
  | { type: 'visibility_done'; requestId: string; pairCount: number }
  | { type: 'visibility_cancelled'; requestId: string }
  | { type: 'visibility_error'; requestId?: string; error: string; kind?: VisibilityErrorKind };
