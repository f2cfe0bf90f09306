/**
 * @module backend-config
 * Where the backend worker and its weights live.
 *
 * Resolution order for each setting: explicit option, then environment
 * variable, then default.
 *
 * | Setting        | Variable            | Default                       |
 * | -------------- | ------------------- | ----------------------------- |
 * | `envDir`       | `SAM_ENV_DIR`       | `~/.sam-adapter/env`          |
 * | `python`       | `SAM_PYTHON`        | `python3`                     |
 * | `workerScript` | `SAM_WORKER_SCRIPT` | `<envDir>/sam_worker.py`      |
 */

import { access } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ModelDescriptor } from '@sam-adapter/types';

export interface BackendConfigOptions {
  envDir?: string;
  python?: string;
  workerScript?: string;
}

export interface BackendConfig {
  /** Root of the backend environment. */
  envDir: string;
  /** Interpreter command, or an absolute path to it. */
  python: string;
  /** Worker entry point run by the interpreter. */
  workerScript: string;
  /** Directory holding one `<family id>.pt` weight file per family. */
  weightsDir: string;
}

const DEFAULT_ENV_DIR = path.join(os.homedir(), '.sam-adapter', 'env');
const DEFAULT_PYTHON = 'python3';
const WORKER_SCRIPT_NAME = 'sam_worker.py';
const WEIGHTS_DIR_NAME = 'weights';

/** Fill in unset options from `env` and the defaults. */
export function resolveBackendConfig(
  options: BackendConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): BackendConfig {
  const envDir = options.envDir ?? env.SAM_ENV_DIR ?? DEFAULT_ENV_DIR;
  return {
    envDir,
    python: options.python ?? env.SAM_PYTHON ?? DEFAULT_PYTHON,
    workerScript: options.workerScript ?? env.SAM_WORKER_SCRIPT ?? path.join(envDir, WORKER_SCRIPT_NAME),
    weightsDir: path.join(envDir, WEIGHTS_DIR_NAME),
  };
}

/** Weight file of `family`. */
export function weightsPath(config: BackendConfig, family: ModelDescriptor): string {
  return path.join(config.weightsDir, `${family.id}.pt`);
}

/** Files that must exist before a worker for `family` can start. */
export function requiredArtifacts(config: BackendConfig, family: ModelDescriptor): string[] {
  const files = [config.workerScript, weightsPath(config, family)];
  // A bare command name is looked up on PATH by spawn.
  if (path.isAbsolute(config.python)) files.unshift(config.python);
  return files;
}

/** First required artifact that is missing, or `null` when all are present. */
export async function findMissingArtifact(
  config: BackendConfig,
  family: ModelDescriptor,
): Promise<string | null> {
  for (const file of requiredArtifacts(config, family)) {
    try {
      await access(file);
    } catch {
      return file;
    }
  }
  return null;
}
