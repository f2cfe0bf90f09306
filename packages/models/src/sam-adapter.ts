/**
 * @module sam-adapter
 * Model adapter between the annotation tool and a segmentation backend.
 *
 * Lifecycle: an uninstantiated adapter answers identity and installation
 * queries. {@link SamAdapter.construct} starts a backend session bound to
 * one image and returns an active adapter; {@link SamAdapter.closeProcess}
 * releases it for good.
 *
 * Two tiers of strictness:
 * - `construct` lets backend failures propagate.
 * - `instantiate` and the three `fetch2dSegmentation*` calls report
 *   failures to the logger and fall back to `null` / `[EMPTY_POLYGON]`.
 *
 * @see {@link @sam-adapter/types!SamModel}
 */

import type {
  BackendSession,
  ImageRaster,
  Interval,
  Localizable,
  Logger,
  ModelDescriptor,
  Polygon,
  Raster,
  SamBackend,
  SamModel,
  SegmentationResult,
  SessionOptions,
} from '@sam-adapter/types';
import {
  SessionClosedError,
  createConsoleLogger,
  createFilteringLogger,
  describeError,
  emptyResult,
  toBoundingBox,
  toIntPairs,
} from '@sam-adapter/core';

/**
 * A segmentation model family driven through a {@link SamBackend}.
 *
 * Usage:
 * ```ts
 * const model = new SamAdapter(EFFICIENT_SAM, backend);
 * const active = await model.instantiate(image, logger);
 * const polygons = await active?.fetch2dSegmentationFromBox({ min: [3, 7], max: [20, 15] });
 * active?.closeProcess();
 * ```
 *
 * One active adapter must not be called concurrently; await each call
 * before issuing the next.
 */
export class SamAdapter implements SamModel {
  private readonly descriptor: ModelDescriptor;
  private readonly backend: SamBackend;
  private log: Logger;
  private installed = false;
  private session: BackendSession | null = null;
  private closed = false;

  /**
   * @param descriptor - Identity of the model family.
   * @param backend - Starts sessions for this family.
   * @param logger - Used until an image-bound instance gets its own logger.
   */
  constructor(descriptor: ModelDescriptor, backend: SamBackend, logger?: Logger) {
    this.descriptor = descriptor;
    this.backend = backend;
    this.log = logger ?? createConsoleLogger(descriptor.fullName);
  }

  getName(): string {
    return this.descriptor.fullName;
  }

  getDescription(): string {
    return this.descriptor.description;
  }

  getInputImageAxes(): string {
    return this.descriptor.inputImageAxes;
  }

  /** Family descriptor, for installation managers and registries. */
  getDescriptor(): ModelDescriptor {
    return this.descriptor;
  }

  isInstalled(): boolean {
    return this.installed;
  }

  setInstalled(installed: boolean): void {
    this.installed = installed;
  }

  /** Whether a live backend session is held. */
  isActive(): boolean {
    return this.session !== null;
  }

  /**
   * Start a backend session bound to `image` and return the active adapter.
   * Backend text goes to `logger.info` with contour dumps stripped.
   *
   * @throws MissingArtifactError if backend files are missing.
   * @throws BackendRuntimeError if the backend fails while loading or encoding.
   * @throws InterruptedError if `options.signal` aborts during startup.
   */
  async construct(image: ImageRaster, logger: Logger, options?: SessionOptions): Promise<SamAdapter> {
    const model = new SamAdapter(this.descriptor, this.backend, logger);
    model.installed = this.installed;
    model.session = await this.backend.initialize(image, createFilteringLogger(logger), options);
    return model;
  }

  /** Like {@link construct}, but any failure is logged and yields `null`. */
  async instantiate(
    image: ImageRaster,
    logger: Logger,
    options?: SessionOptions,
  ): Promise<SamAdapter | null> {
    try {
      return await this.construct(image, logger, options);
    } catch (error) {
      logger.error(`${this.getName()} experienced an error: ${describeError(error)}`);
      return null;
    }
  }

  async fetch2dSegmentationFromPoints(
    positivePoints: readonly Localizable[],
    negativePoints: readonly Localizable[],
  ): Promise<SegmentationResult> {
    return this.segment((session) => {
      const positive = toIntPairs(positivePoints);
      const negative = toIntPairs(negativePoints);
      return negative.length === 0
        ? session.inferFromPoints(positive)
        : session.inferFromPoints(positive, negative);
    });
  }

  async fetch2dSegmentationFromBox(boundingBox: Interval): Promise<SegmentationResult> {
    return this.segment((session) => session.inferFromBox(toBoundingBox(boundingBox)));
  }

  async fetch2dSegmentationFromMask(mask: Raster): Promise<SegmentationResult> {
    return this.segment((session) => session.inferFromMask(mask));
  }

  notifyUiHasBeenClosed(): void {
    this.log.info(`${this.getName()}: closing the backend process`);
    this.closeProcess();
  }

  closeProcess(): void {
    const session = this.session;
    if (!session) return;
    this.session = null;
    this.closed = true;
    session.close();
  }

  /** Run one request against the live session; trouble becomes `[EMPTY_POLYGON]`. */
  private async segment(
    request: (session: BackendSession) => Promise<Polygon[]>,
  ): Promise<SegmentationResult> {
    try {
      return await request(this.requireSession());
    } catch (error) {
      this.log.error(
        `${this.getName()}, providing empty result because of some trouble: ${describeError(error)}`,
      );
      return emptyResult();
    }
  }

  private requireSession(): BackendSession {
    if (this.session) return this.session;
    throw new SessionClosedError(
      this.closed
        ? `${this.getName()} has been closed`
        : `${this.getName()} has not been instantiated for an image`,
    );
  }
}

/** Create an uninstantiated model of `family` backed by `backend`. */
export function createSamModel(family: ModelDescriptor, backend: SamBackend): SamAdapter {
  return new SamAdapter(family, backend);
}
