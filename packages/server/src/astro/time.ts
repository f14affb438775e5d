import * as satellite from 'satellite.js';
import { VisibilityError } from '../errors.js';
import { wrapPositive } from './angles.js';

/**
 * Civil time → Julian Date → sidereal time.
 *
 * Sidereal time here is *mean* sidereal time (IAU 1982 GMST polynomial, no
 * nutation term). The equation of the equinoxes is under ~1.2 s of time,
 * far below antenna pointing resolution.
 */

const MS_PER_DAY = 86_400_000;

/** Julian Date of the Unix epoch, 1970-01-01T00:00:00Z */
const UNIX_EPOCH_JD = 2_440_587.5;

/** Julian Date of J2000.0 */
export const J2000_JD = 2_451_545.0;

export interface CalendarDate {
  year: number;
  month: number;    // 1..12
  day: number;      // 1..31
  hour?: number;    // 0..23
  minute?: number;  // 0..59
  second?: number;  // 0..<60, may be fractional
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function invalidDate(parameter: string, message: string): VisibilityError {
  return new VisibilityError('InvalidCalendarDate', parameter, message);
}

function checkField(parameter: string, value: number, min: number, max: number, integer = true): void {
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < min || value > max) {
    throw invalidDate(parameter, `${parameter} ${value} is outside ${min}..${max}`);
  }
}

function calendarToJulianDate(date: CalendarDate): number {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = date;

  checkField('year', year, -4712, 9999);
  checkField('month', month, 1, 12);
  checkField('day', day, 1, daysInMonth(year, month));
  checkField('hour', hour, 0, 23);
  checkField('minute', minute, 0, 59);
  if (!Number.isFinite(second) || second < 0 || second >= 60) {
    throw invalidDate('second', `second ${second} is outside 0..<60`);
  }

  // Meeus, Astronomical Algorithms ch. 7, proleptic Gregorian
  let y = year;
  let m = month;
  if (m <= 2) {
    y -= 1;
    m += 12;
  }
  const a = Math.floor(y / 100);
  const b = 2 - a + Math.floor(a / 4);
  const dayFraction = (hour + minute / 60 + second / 3600) / 24;

  return Math.floor(365.25 * (y + 4716)) + Math.floor(30.6001 * (m + 1)) + day + dayFraction + b - 1524.5;
}

/**
 * Convert a UTC instant to a Julian Date.
 *
 * @throws {VisibilityError} `InvalidCalendarDate` for an invalid `Date` or out-of-range calendar fields
 */
export function toJulianDate(utc: Date | CalendarDate): number {
  if (utc instanceof Date) {
    const ms = utc.getTime();
    if (Number.isNaN(ms)) throw invalidDate('utc', 'Invalid Date');
    return ms / MS_PER_DAY + UNIX_EPOCH_JD;
  }
  return calendarToJulianDate(utc);
}

export function julianDateToDate(julianDate: number): Date {
  return new Date((julianDate - UNIX_EPOCH_JD) * MS_PER_DAY);
}

/** Greenwich mean sidereal time in hours, [0, 24). */
export function greenwichMeanSiderealTime(julianDate: number): number {
  const radians = satellite.gstime(julianDate);
  return wrapPositive((radians * 12) / Math.PI, 24);
}

/**
 * Local mean sidereal time in hours, [0, 24).
 *
 * @param longitudeDeg - east-positive longitude
 */
export function toSiderealTime(julianDate: number, longitudeDeg: number): number {
  return wrapPositive(greenwichMeanSiderealTime(julianDate) + longitudeDeg / 15, 24);
}
