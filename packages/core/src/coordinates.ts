/**
 * @module coordinates
 * Conversion of annotation-tool positions into the integer arrays the
 * backend expects.
 *
 * Every component is truncated toward zero, not rounded: `(4.9, 2.1)`
 * becomes `[4, 2]`. Sub-pixel precision is dropped silently.
 */

import type { BoxArray, IntPair, Interval, Localizable } from '@sam-adapter/types';

function component(values: ArrayLike<number>, d: number): number {
  if (values.length <= d) {
    throw new RangeError(`Expected at least 2 dimensions, got ${values.length}`);
  }
  return Math.trunc(values[d]);
}

/** First two components of a position as an integer `[x, y]` pair. */
export function toIntPair(point: Localizable): IntPair {
  return [component(point.position, 0), component(point.position, 1)];
}

export function toIntPairs(points: readonly Localizable[]): IntPair[] {
  return points.map(toIntPair);
}

/** Interval as `[x0, y0, x1, y1]`. The backend crops the wrong region if x and y are swapped. */
export function toBoundingBox(interval: Interval): BoxArray {
  return [
    component(interval.min, 0),
    component(interval.min, 1),
    component(interval.max, 0),
    component(interval.max, 1),
  ];
}
