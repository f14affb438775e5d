import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  J2000_JD,
  daysInMonth,
  greenwichMeanSiderealTime,
  isLeapYear,
  julianDateToDate,
  toJulianDate,
  toSiderealTime,
} from '../astro/time.js';
import { assertClose, expectVisibilityError } from './helpers.js';

describe('toJulianDate', () => {
  it('maps J2000.0 exactly from a Date', () => {
    assert.equal(toJulianDate(new Date('2000-01-01T12:00:00Z')), J2000_JD);
  });

  it('maps J2000.0 exactly from calendar fields', () => {
    assert.equal(toJulianDate({ year: 2000, month: 1, day: 1, hour: 12 }), J2000_JD);
  });

  it('handles a date before March (year rollover in the algorithm)', () => {
    // 1957 October 4.81 UT
    assertClose(toJulianDate({ year: 1957, month: 10, day: 4, hour: 19, minute: 26, second: 24 }), 2436116.31, 1e-6);
    // 1988 January 27.0
    assert.equal(toJulianDate({ year: 1988, month: 1, day: 27 }), 2447187.5);
  });

  it('agrees between calendar fields and Date', () => {
    const fromFields = toJulianDate({ year: 2024, month: 3, day: 1, hour: 6, minute: 30, second: 15 });
    const fromDate = toJulianDate(new Date(Date.UTC(2024, 2, 1, 6, 30, 15)));
    assertClose(fromFields, fromDate, 1e-8);
  });

  it('accepts February 29 only in leap years', () => {
    assert.equal(toJulianDate({ year: 2024, month: 2, day: 29 }), toJulianDate({ year: 2024, month: 3, day: 1 }) - 1);
    expectVisibilityError(() => toJulianDate({ year: 2023, month: 2, day: 29 }), 'InvalidCalendarDate');
    expectVisibilityError(() => toJulianDate({ year: 1900, month: 2, day: 29 }), 'InvalidCalendarDate');
  });

  it('reports out-of-range fields with the offending parameter', () => {
    assert.equal(expectVisibilityError(() => toJulianDate({ year: 2024, month: 1, day: 32 }), 'InvalidCalendarDate').parameter, 'day');
    assert.equal(expectVisibilityError(() => toJulianDate({ year: 2024, month: 13, day: 1 }), 'InvalidCalendarDate').parameter, 'month');
    assert.equal(expectVisibilityError(() => toJulianDate({ year: 2024, month: 1, day: 1, hour: 24 }), 'InvalidCalendarDate').parameter, 'hour');
    assert.equal(expectVisibilityError(() => toJulianDate({ year: 2024, month: 1, day: 1, second: 60 }), 'InvalidCalendarDate').parameter, 'second');
    expectVisibilityError(() => toJulianDate(new Date('not a date')), 'InvalidCalendarDate');
  });

  it('converts back to a Date', () => {
    assert.equal(julianDateToDate(J2000_JD).toISOString(), '2000-01-01T12:00:00.000Z');
  });
});

describe('calendar helpers', () => {
  it('applies the Gregorian leap rules', () => {
    assert.equal(isLeapYear(2024), true);
    assert.equal(isLeapYear(2023), false);
    assert.equal(isLeapYear(1900), false);
    assert.equal(isLeapYear(2000), true);
    assert.equal(daysInMonth(2023, 2), 28);
    assert.equal(daysInMonth(2024, 2), 29);
    assert.equal(daysInMonth(2024, 4), 30);
    assert.equal(daysInMonth(2024, 12), 31);
  });
});

describe('sidereal time', () => {
  it('gives the conventional GMST at J2000.0', () => {
    // 67310.54841 s
    assertClose(greenwichMeanSiderealTime(J2000_JD), 18.697374558, 1e-6);
  });

  it('gives GMST at 0h UT on 2024-01-01', () => {
    assertClose(greenwichMeanSiderealTime(toJulianDate(new Date('2024-01-01T00:00:00Z'))), 6.676842, 1e-5);
  });

  it('follows the IAU 1982 polynomial outside the twentieth and twenty-first centuries', () => {
    const polynomialHours = (jd: number) => {
      const t = (jd - J2000_JD) / 36525;
      const seconds = -6.2e-6 * t ** 3 + 0.093104 * t ** 2 + (876600 * 3600 + 8640184.812866) * t + 67310.54841;
      return (((seconds / 3600) % 24) + 24) % 24;
    };

    const jd2100 = toJulianDate({ year: 2100, month: 3, day: 1 });
    const jd1800 = toJulianDate({ year: 1800, month: 3, day: 1 });
    assert.equal(jd2100, 2488128.5);
    assert.equal(jd1800, 2378555.5);

    assertClose(greenwichMeanSiderealTime(jd2100), polynomialHours(jd2100), 1e-6);
    assertClose(greenwichMeanSiderealTime(jd2100), 10.592762, 1e-6);
    assertClose(greenwichMeanSiderealTime(jd1800), polynomialHours(jd1800), 1e-6);
    assertClose(greenwichMeanSiderealTime(jd1800), 10.570248, 1e-6);
  });

  it('repeats after one sidereal day', () => {
    const jd = toJulianDate(new Date('2024-06-15T03:00:00Z'));
    const day = 0.99726957;
    assertClose(greenwichMeanSiderealTime(jd + day), greenwichMeanSiderealTime(jd), 1e-4);
  });

  it('adds east-positive longitude and wraps into [0, 24)', () => {
    assertClose(toSiderealTime(J2000_JD, 15), 19.697374558, 1e-6);
    assertClose(toSiderealTime(J2000_JD, -90), 12.697374558, 1e-6);
    assertClose(toSiderealTime(J2000_JD, 270), 12.697374558, 1e-6);
    assertClose(toSiderealTime(J2000_JD, 90), 0.697374558, 1e-6);
  });

  it('stays in range across a whole year', () => {
    const start = toJulianDate(new Date('2024-01-01T00:00:00Z'));
    for (let d = 0; d <= 366; d += 0.37) {
      const lst = toSiderealTime(start + d, 138);
      assert.ok(lst >= 0 && lst < 24, `lst ${lst} out of range`);
    }
  });
});
