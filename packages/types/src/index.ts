/**
 * @sam-adapter/types
 *
 * Shared type definitions for the SAM model adapters.
 * This package contains zero runtime code — only TypeScript interfaces and
 * types that serve as the "contract" between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { NumericArray, Point, Size } from './common';

// Prompts and results
export type {
  BoxArray,
  ImageRaster,
  IntPair,
  Interval,
  Localizable,
  Polygon,
  Raster,
  SegmentationResult,
} from './segmentation';

// Logging
export type { DebugTextPrinter, Logger } from './logging';

// Backend session
export type { BackendSession, SamBackend, SessionOptions } from './backend';

// Model capability set
export type { InstallationManager, ModelDescriptor, SamModel } from './model';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
