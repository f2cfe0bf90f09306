/**
 * @module installation-manager
 * Installation status read from the backend environment on disk.
 */

import type { InstallationManager, ModelDescriptor } from '@sam-adapter/types';
import { findMissingArtifact, type BackendConfig } from './backend-config';

/** A family counts as installed when its worker script and weights are present. */
export class FileSystemInstallationManager implements InstallationManager {
  constructor(private readonly config: BackendConfig) {}

  async isInstalled(descriptor: ModelDescriptor): Promise<boolean> {
    return (await findMissingArtifact(this.config, descriptor)) === null;
  }
}
