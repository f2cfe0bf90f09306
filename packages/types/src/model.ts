/**
 * @module model
 * The capability set every segmentation model family implements.
 */

import type { SessionOptions } from './backend';
import type { Logger } from './logging';
import type {
  ImageRaster,
  Interval,
  Localizable,
  Raster,
  SegmentationResult,
} from './segmentation';

/** Static identity of a model family. Never mutated after definition. */
export interface ModelDescriptor {
  /** Identifier passed to the backend worker and used for weight file names. */
  readonly id: string;
  /** Full display name. */
  readonly fullName: string;
  /** One-line description for model pickers. */
  readonly description: string;
  /** Axis order the input image must have, e.g. `"yxc"`. */
  readonly inputImageAxes: string;
}

/**
 * A segmentation model as seen by the annotation tool.
 *
 * An uninstantiated model only answers identity and installation queries;
 * {@link SamModel.instantiate} yields an active one bound to an image.
 */
export interface SamModel {
  getName(): string;
  getDescription(): string;
  /** Whether the backend's runtime dependencies are present. */
  isInstalled(): boolean;
  /** Only write path for the installed flag, used by installation managers. */
  setInstalled(installed: boolean): void;
  /**
   * Start a model bound to `image`. Failures are reported to `logger` and
   * resolve to `null`.
   */
  instantiate(image: ImageRaster, logger: Logger, options?: SessionOptions): Promise<SamModel | null>;
  /**
   * Segment from positive and negative point prompts.
   * Never rejects; trouble yields `[EMPTY_POLYGON]`.
   */
  fetch2dSegmentationFromPoints(
    positivePoints: readonly Localizable[],
    negativePoints: readonly Localizable[],
  ): Promise<SegmentationResult>;
  /** Segment inside a bounding box. Never rejects. */
  fetch2dSegmentationFromBox(boundingBox: Interval): Promise<SegmentationResult>;
  /** Segment from a mask prompt. Never rejects. */
  fetch2dSegmentationFromMask(mask: Raster): Promise<SegmentationResult>;
  /** Lifecycle hook for when the hosting UI goes away. */
  notifyUiHasBeenClosed(): void;
  /** Release the backend session. Safe to call more than once. */
  closeProcess(): void;
  getInputImageAxes(): string;
}

/** Supplies the installation status of model families. */
export interface InstallationManager {
  isInstalled(descriptor: ModelDescriptor): Promise<boolean>;
}
