import type { HorizontalPosition, Source, Station } from '@skywindow/shared';
import { VisibilityError } from '../errors.js';
import * as satellite from 'satellite.js';
import { normalizeDegrees, wrapSigned } from './angles.js';

/**
 * Equatorial (RA/Dec) → horizontal (Az/El) transform.
 *
 * Azimuth convention: 0° = North, increasing toward East (90° = East,
 * 180° = South, 270° = West). Hour angle is positive west of the meridian.
 */

/** cos(latitude) below this is treated as a pole, where azimuth is undefined. */
const POLE_EPSILON = 1e-12;

function checkRange(parameter: string, value: number, min: number, max: number, maxExclusive = false): void {
  const tooHigh = maxExclusive ? value >= max : value > max;
  if (!Number.isFinite(value) || value < min || tooHigh) {
    throw new VisibilityError(
      'InvalidCoordinate',
      parameter,
      `${parameter} ${value} is outside ${min}..${max}${maxExclusive ? ' (exclusive)' : ''}`,
    );
  }
}

export const assertLatitude = (lat: number): void => checkRange('latitude', lat, -90, 90);
export const assertLongitude = (lon: number): void => checkRange('longitude', lon, -180, 360);
export const assertRightAscension = (ra: number): void => checkRange('ra', ra, 0, 360, true);
export const assertDeclination = (dec: number): void => checkRange('dec', dec, -90, 90);

/** @throws {VisibilityError} `InvalidCoordinate` tagged with the station id */
export function validateStation(station: Station): void {
  try {
    assertLatitude(station.latitude);
    assertLongitude(station.longitude);
    if (station.altitude !== undefined && !Number.isFinite(station.altitude)) {
      throw new VisibilityError('InvalidCoordinate', 'altitude', `altitude ${station.altitude} is not a number`);
    }
  } catch (err) {
    if (err instanceof VisibilityError) throw err.withContext({ stationId: station.id });
    throw err;
  }
}

/** @throws {VisibilityError} `InvalidCoordinate` tagged with the source id */
export function validateSource(source: Source): void {
  try {
    assertRightAscension(source.ra);
    assertDeclination(source.dec);
  } catch (err) {
    if (err instanceof VisibilityError) throw err.withContext({ sourceId: source.id });
    throw err;
  }
}

/** Hour angle in degrees, [-180, 180). */
export function hourAngle(lstHours: number, raDeg: number): number {
  return wrapSigned(lstHours * 15 - raDeg);
}

/**
 * Compute azimuth and elevation of a fixed equatorial position.
 *
 * @param ra - right ascension, degrees
 * @param dec - declination, degrees
 * @param lat - geodetic latitude of the observer, degrees
 * @param lst - local sidereal time, hours
 * @throws {VisibilityError} `InvalidCoordinate` before any trigonometry is attempted
 */
export function equatorialToHorizontal(ra: number, dec: number, lat: number, lst: number): HorizontalPosition {
  assertRightAscension(ra);
  assertDeclination(dec);
  assertLatitude(lat);
  if (!Number.isFinite(lst)) {
    throw new VisibilityError('InvalidCoordinate', 'lst', `lst ${lst} is not a number`);
  }

  const h = satellite.degreesToRadians(hourAngle(lst, ra));
  const d = satellite.degreesToRadians(dec);
  const phi = satellite.degreesToRadians(lat);

  const sinEl = Math.sin(d) * Math.sin(phi) + Math.cos(d) * Math.cos(phi) * Math.cos(h);
  const elevation = satellite.radiansToDegrees(Math.asin(Math.min(1, Math.max(-1, sinEl))));

  if (Math.abs(Math.cos(phi)) < POLE_EPSILON) {
    return { azimuth: 0, elevation };
  }

  const y = -Math.sin(h) * Math.cos(d);
  const x = Math.cos(phi) * Math.sin(d) - Math.sin(phi) * Math.cos(d) * Math.cos(h);
  return { azimuth: normalizeDegrees(satellite.radiansToDegrees(Math.atan2(y, x))), elevation };
}
