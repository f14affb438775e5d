/**
 * Reduce an angle into [0, period). Guards the float case where a tiny
 * negative input would otherwise round up to exactly `period`.
 */
export function wrapPositive(value: number, period: number): number {
  const wrapped = ((value % period) + period) % period;
  return wrapped >= period ? 0 : wrapped;
}

/** Reduce degrees into [0, 360). */
export const normalizeDegrees = (degrees: number): number => wrapPositive(degrees, 360);

/** Reduce degrees into [-180, 180). */
export const wrapSigned = (degrees: number): number => wrapPositive(degrees + 180, 360) - 180;

/**
 * Sexagesimal right ascension (hours, minutes, seconds) to decimal degrees.
 *
 * @example
 * hmsToDegrees(12, 30, 0) // 187.5
 */
export function hmsToDegrees(hours: number, minutes: number, seconds: number): number {
  return (hours + minutes / 60 + seconds / 3600) * 15;
}

/**
 * Sexagesimal declination to decimal degrees. The sign lives on the degree
 * field, which may be a string so that "-00" keeps its sign.
 */
export function dmsToDegrees(degrees: number | string, minutes: number, seconds: number): number {
  const text = String(degrees).trim();
  const sign = text.startsWith('-') ? -1 : 1;
  return sign * (Math.abs(parseFloat(text)) + minutes / 60 + seconds / 3600);
}
