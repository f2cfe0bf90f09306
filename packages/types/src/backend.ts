/**
 * @module backend
 * Contract of the out-of-process segmentation backend.
 *
 * A {@link BackendSession} is bound to exactly one encoded image and is
 * owned by a single model adapter. Sessions are not reentrant: callers must
 * not issue a request before the previous one settled.
 */

import type { DebugTextPrinter } from './logging';
import type {
  BoxArray,
  ImageRaster,
  IntPair,
  Polygon,
  Raster,
} from './segmentation';

/** Options for starting a backend session. */
export interface SessionOptions {
  /**
   * Aborting before the session is ready rejects startup with an
   * interruption error. Requests sent after startup ignore it.
   */
  signal?: AbortSignal;
}

/** A live backend connection bound to one encoded image. */
export interface BackendSession {
  /**
   * Segment from point prompts. Without `negative` the points-only
   * inference is used.
   */
  inferFromPoints(positive: IntPair[], negative?: IntPair[]): Promise<Polygon[]>;
  /** Segment the region inside `[x0, y0, x1, y1]`. */
  inferFromBox(box: BoxArray): Promise<Polygon[]>;
  /** Segment from a mask prompt congruent with the encoded image. */
  inferFromMask(mask: Raster): Promise<Polygon[]>;
  /** Release the backend. */
  close(): void;
}

/** Starts backend sessions for one model family. */
export interface SamBackend {
  initialize(
    image: ImageRaster,
    debugSink: DebugTextPrinter,
    options?: SessionOptions,
  ): Promise<BackendSession>;
}
