/**
 * @sam-adapter/core
 *
 * Runtime building blocks shared by the model adapters: failure taxonomy,
 * log filtering, coordinate translation and result normalization.
 *
 * @packageDocumentation
 */

// Failure taxonomy
export {
  SamError,
  MissingArtifactError,
  BackendRuntimeError,
  InterruptedError,
  SessionClosedError,
  isSamError,
  describeError,
} from './errors';
export type { SamErrorCode } from './errors';

// Logging
export {
  CONTOUR_MARKER,
  stripContourPayload,
  createFilteringLogger,
  createConsoleLogger,
} from './logging-filter';

// Coordinate translation
export { toIntPair, toIntPairs, toBoundingBox } from './coordinates';

// Result normalization
export { EMPTY_POLYGON, emptyResult, isEmptyResult, contoursToPolygons } from './result-normalizer';

// Event bus
export { EventBusImpl } from './event-bus';
