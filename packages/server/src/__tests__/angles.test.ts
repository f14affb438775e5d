import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { normalizeDegrees, wrapPositive, wrapSigned } from '../astro/angles.js';
import { dmsToDegrees, hmsToDegrees } from '../visibility/index.js';
import { assertClose } from './helpers.js';

describe('angle reduction', () => {
  it('wraps into [0, 360)', () => {
    assert.equal(normalizeDegrees(0), 0);
    assert.equal(normalizeDegrees(360), 0);
    assert.equal(normalizeDegrees(-90), 270);
    assert.equal(normalizeDegrees(725), 5);
  });

  it('never returns the period itself for tiny negatives', () => {
    const wrapped = normalizeDegrees(-1e-15);
    assert.ok(wrapped >= 0 && wrapped < 360);
    assert.equal(wrapPositive(-1e-17, 24), 0);
  });

  it('wraps signed angles into [-180, 180)', () => {
    assert.equal(wrapSigned(180), -180);
    assert.equal(wrapSigned(190), -170);
    assert.equal(wrapSigned(-190), 170);
    assert.equal(wrapSigned(45), 45);
  });
});

describe('sexagesimal conversion', () => {
  it('converts right ascension', () => {
    assert.equal(hmsToDegrees(12, 30, 0), 187.5);
    assert.equal(hmsToDegrees(0, 0, 0), 0);
    assertClose(hmsToDegrees(5, 34, 31.94), 83.633083, 1e-6);
  });

  it('converts declination, keeping the sign of a negative zero degree field', () => {
    assert.equal(dmsToDegrees(22, 30, 0), 22.5);
    assert.equal(dmsToDegrees(-22, 30, 0), -22.5);
    assert.equal(dmsToDegrees('-00', 30, 0), -0.5);
    assert.equal(dmsToDegrees('+05', 15, 36), 5.26);
  });
});
