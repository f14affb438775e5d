export { computeAll, computeAllAsync, computeVisibility, pairKey } from './aggregator.js';
export type { AsyncComputeOptions, VisibilityResult } from './aggregator.js';
export { observe, planWindow, sampleElevation, scan, validateThreshold } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export { VisibilityService } from './service.js';
export type { VisibilityJob } from './service.js';
export { VisibilityError, isVisibilityError } from '../errors.js';
export { dmsToDegrees, hmsToDegrees } from '../astro/angles.js';
export { geocentricToGeodetic, geodeticToGeocentric, stationFromGeocentric } from '../astro/geodesy.js';
export type { GeocentricPosition, GeodeticPosition } from '../astro/geodesy.js';
export { greenwichMeanSiderealTime, julianDateToDate, toJulianDate, toSiderealTime } from '../astro/time.js';
export type { CalendarDate } from '../astro/time.js';
export { equatorialToHorizontal } from '../astro/transform.js';
