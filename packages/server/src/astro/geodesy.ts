import * as satellite from 'satellite.js';
import type { Station } from '@skywindow/shared';
import { VisibilityError } from '../errors.js';

// WGS84 polar radius, meters
const WGS84_B = 6_356_752.314245179;

export interface GeocentricPosition {
  x: number;  // meters, ITRF/ECEF
  y: number;
  z: number;
}

export interface GeodeticPosition {
  latitude: number;   // degrees
  longitude: number;  // degrees, east-positive, -180..180
  altitude: number;   // meters above the ellipsoid
}

/**
 * ECEF → geodetic on WGS84. Antenna catalogs list stations as geocentric
 * XYZ, so this is how a catalog record becomes a `Station`. An Earth-fixed
 * position is an ECI position at zero sidereal angle, which lets
 * satellite.js do the ellipsoid iteration.
 */
export function geocentricToGeodetic({ x, y, z }: GeocentricPosition): GeodeticPosition {
  if (![x, y, z].every(Number.isFinite)) {
    throw new VisibilityError('InvalidCoordinate', 'position', `geocentric position (${x}, ${y}, ${z}) is not finite`);
  }

  // satellite.js divides by cos(latitude) for the height
  if (Math.hypot(x, y) < 1e-6) {
    return { latitude: z >= 0 ? 90 : -90, longitude: 0, altitude: Math.abs(z) - WGS84_B };
  }

  const gd = satellite.eciToGeodetic({ x: x / 1000, y: y / 1000, z: z / 1000 }, 0);
  return {
    latitude: satellite.degreesLat(gd.latitude),
    longitude: satellite.degreesLong(gd.longitude),
    altitude: gd.height * 1000,
  };
}

export function geodeticToGeocentric({ latitude, longitude, altitude }: GeodeticPosition): GeocentricPosition {
  const ecf = satellite.geodeticToEcf({
    latitude: satellite.degreesToRadians(latitude),
    longitude: satellite.degreesToRadians(longitude),
    height: altitude / 1000,
  });
  return { x: ecf.x * 1000, y: ecf.y * 1000, z: ecf.z * 1000 };
}

export function stationFromGeocentric(id: string, position: GeocentricPosition): Station {
  try {
    return { id, ...geocentricToGeodetic(position) };
  } catch (err) {
    if (err instanceof VisibilityError) throw err.withContext({ stationId: id });
    throw err;
  }
}
