/**
 * @module result-normalizer
 * Uniform polygon results at the model boundary.
 */

import type { Point, Polygon, SegmentationResult } from '@sam-adapter/types';
import { BackendRuntimeError } from './errors';

/** Zero-vertex polygon returned when a model could not produce a result. */
export const EMPTY_POLYGON: Polygon = Object.freeze([]);

/**
 * The result of a failed segmentation: always a single {@link EMPTY_POLYGON},
 * never an empty list.
 */
export function emptyResult(): SegmentationResult {
  return [EMPTY_POLYGON];
}

/** Whether `result` is the failure result. */
export function isEmptyResult(result: SegmentationResult): boolean {
  return result.length === 1 && result[0].length === 0;
}

/**
 * Zip the backend's parallel contour arrays into polygons.
 * `xs[i][j]` and `ys[i][j]` are the coordinates of vertex `j` of contour `i`.
 */
export function contoursToPolygons(
  xs: readonly (readonly number[])[],
  ys: readonly (readonly number[])[],
): Polygon[] {
  if (xs.length !== ys.length) {
    throw new BackendRuntimeError(
      `Contour count mismatch: ${xs.length} x-lists, ${ys.length} y-lists`,
    );
  }
  return xs.map((cx, i) => {
    const cy = ys[i];
    if (cx.length !== cy.length) {
      throw new BackendRuntimeError(
        `Contour ${i} has ${cx.length} x and ${cy.length} y coordinates`,
      );
    }
    return cx.map((x, j): Point => ({ x, y: cy[j] }));
  });
}
