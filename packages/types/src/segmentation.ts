/**
 * @module segmentation
 * Prompt and result types exchanged between the annotation tool and a
 * segmentation model.
 */

import type { NumericArray, Point } from './common';

/**
 * A position in an arbitrary number of dimensions, as handed over by the
 * annotation tool. Components are floating point; only the first two
 * (x, y) are used for 2D prompts.
 */
export interface Localizable {
  readonly position: ArrayLike<number>;
}

/**
 * Closed n-dimensional interval, `min[d] <= max[d]` for every dimension.
 * Used as a bounding-box prompt (dimensions 0 and 1 only).
 */
export interface Interval {
  readonly min: ArrayLike<number>;
  readonly max: ArrayLike<number>;
}

/** Integer pair `[x, y]` as the backend expects it. */
export type IntPair = [x: number, y: number];

/** Integer box `[x0, y0, x1, y1]`: x before y, min before max. */
export type BoxArray = [x0: number, y0: number, x1: number, y1: number];

/** 2D single-channel raster, row-major, `width * height` samples. */
export interface Raster<T extends NumericArray = NumericArray> {
  data: T;
  width: number;
  height: number;
}

/**
 * Image handed to a model for encoding.
 * `shape` lists the extent of each axis named by `axes`, in order
 * (e.g. `[height, width, channels]` for `"yxc"`).
 */
export interface ImageRaster<T extends NumericArray = NumericArray> {
  data: T;
  shape: readonly number[];
  axes: string;
}

/** Ordered boundary vertices of one segmented region. */
export type Polygon = readonly Point[];

/** Zero or more polygons; `[EMPTY_POLYGON]` when the model had trouble. */
export type SegmentationResult = Polygon[];
