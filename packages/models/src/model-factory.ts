import type { EventBus } from '@sam-adapter/types';
import { resolveBackendConfig, type BackendConfig, type BackendConfigOptions } from './backend-config';
import { FileSystemInstallationManager } from './installation-manager';
import { MODEL_FAMILIES } from './model-families';
import { ModelRegistry } from './model-registry';
import { ProcessBackend, type SpawnWorker } from './process-backend';
import { createSamModel } from './sam-adapter';

export interface CreateModelRegistryOptions extends BackendConfigOptions {
  /** Receives `model:*` notifications. */
  events?: EventBus;
  /** Overrides how worker processes are started. */
  spawn?: SpawnWorker;
  /** Environment consulted for unset config options. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export interface ModelSetup {
  registry: ModelRegistry;
  config: BackendConfig;
  installation: FileSystemInstallationManager;
}

/**
 * Register every known family against out-of-process backends and read
 * their installation status from disk.
 */
export async function createModelRegistry(
  options: CreateModelRegistryOptions = {},
): Promise<ModelSetup> {
  const { events, spawn, env, ...configOptions } = options;
  const config = resolveBackendConfig(configOptions, env);
  const registry = new ModelRegistry(events);

  for (const family of MODEL_FAMILIES) {
    registry.register(family, createSamModel(family, new ProcessBackend(family, config, spawn)));
  }

  const installation = new FileSystemInstallationManager(config);
  await registry.refreshInstallation(installation);
  return { registry, config, installation };
}
