import assert from 'node:assert/strict';
import { VisibilityError } from '../errors.js';
import type { VisibilityErrorKind } from '@skywindow/shared';

export function assertClose(actual: number, expected: number, tolerance: number, label = 'value'): void {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `${label}: expected ${expected} ± ${tolerance}, got ${actual}`,
  );
}

/** Expect `fn` to throw a VisibilityError of the given kind and return it. */
export function expectVisibilityError(fn: () => unknown, kind: VisibilityErrorKind): VisibilityError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  assert.ok(caught instanceof VisibilityError, `expected a VisibilityError, got ${String(caught)}`);
  assert.equal(caught.kind, kind);
  return caught;
}
