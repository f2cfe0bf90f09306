/**
 * @sam-adapter/models
 *
 * Segmentation model adapters for SAM-family backends running out of
 * process. Prompts go in as points, boxes or masks; polygons come out.
 *
 * @packageDocumentation
 */

// Model adapter
export { SamAdapter, createSamModel } from './sam-adapter';

// Model families
export {
  DEFAULT_INPUT_IMAGE_AXES,
  EFFICIENT_SAM,
  SAM2_TINY,
  SAM2_SMALL,
  SAM2_LARGE,
  EFFICIENT_VIT_SAM,
  MODEL_FAMILIES,
} from './model-families';

// Registry and installation status
export { ModelRegistry } from './model-registry';
export { FileSystemInstallationManager } from './installation-manager';
export { createModelRegistry } from './model-factory';
export type { CreateModelRegistryOptions, ModelSetup } from './model-factory';

// Backend configuration
export {
  resolveBackendConfig,
  weightsPath,
  requiredArtifacts,
  findMissingArtifact,
} from './backend-config';
export type { BackendConfig, BackendConfigOptions } from './backend-config';

// Out-of-process backend
export { ProcessBackend, ProcessBackendSession, spatialSize } from './process-backend';
export type { SpawnWorker, WorkerProcess } from './process-backend';
export { WorkerReplySchema, encodeArray, dtypeOf, formatRequest, parseLine } from './wire-protocol';
export type { Dtype, EncodedArray, ParsedLine, WorkerReply, WorkerRequest } from './wire-protocol';
