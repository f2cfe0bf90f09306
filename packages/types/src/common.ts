/**
 * @module common
 * Common primitive types used across all packages.
 */

/** 2D integer point in image pixel space. */
export interface Point {
  /** X coordinate (column) */
  x: number;
  /** Y coordinate (row) */
  y: number;
}

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}

/** Typed numeric arrays accepted for image and mask rasters. */
export type NumericArray =
  | Uint8Array
  | Uint8ClampedArray
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array;
