/**
 * @module model-registry
 * The set of model families offered to the annotation tool.
 *
 * Each model keeps its own installed flag; the registry only copies what an
 * {@link InstallationManager} reports into them. Models started through
 * {@link ModelRegistry.instantiate} are tracked so the host can close them
 * all when its UI goes away.
 */

import type {
  EventBus,
  ImageRaster,
  InstallationManager,
  Logger,
  ModelDescriptor,
  SamModel,
  SessionOptions,
} from '@sam-adapter/types';

interface RegisteredModel {
  descriptor: ModelDescriptor;
  model: SamModel;
}

export class ModelRegistry {
  private readonly entries: RegisteredModel[] = [];
  private readonly active = new Set<SamModel>();
  private readonly events: EventBus | undefined;

  /** @param events - Receives `model:*` notifications when given. */
  constructor(events?: EventBus) {
    this.events = events;
  }

  /** Add a model under its family descriptor. Names must be unique. */
  register(descriptor: ModelDescriptor, model: SamModel): void {
    if (this.get(model.getName())) {
      throw new Error(`Model already registered: ${model.getName()}`);
    }
    this.entries.push({ descriptor, model });
  }

  /** Registered models in registration order. */
  list(): SamModel[] {
    return this.entries.map((e) => e.model);
  }

  get(name: string): SamModel | undefined {
    return this.entries.find((e) => e.model.getName() === name)?.model;
  }

  /** Models whose backend dependencies are present. */
  installed(): SamModel[] {
    return this.list().filter((m) => m.isInstalled());
  }

  /** Ask `manager` about every family and update the installed flags. */
  async refreshInstallation(manager: InstallationManager): Promise<void> {
    for (const { descriptor, model } of this.entries) {
      const installed = await manager.isInstalled(descriptor);
      if (installed === model.isInstalled()) continue;
      model.setInstalled(installed);
      this.events?.emit('model:installation-changed', { name: model.getName(), installed });
    }
  }

  /**
   * Start the model called `name` for `image`.
   * Failures are reported to `logger` and resolve to `null`.
   */
  async instantiate(
    name: string,
    image: ImageRaster,
    logger: Logger,
    options?: SessionOptions,
  ): Promise<SamModel | null> {
    const model = this.get(name);
    if (!model) {
      logger.error(`Unknown model: ${name}`);
      return null;
    }

    const instance = await model.instantiate(image, logger, options);
    if (!instance) {
      this.events?.emit('model:instantiate-failed', { name });
      return null;
    }
    this.active.add(instance);
    this.events?.emit('model:instantiated', { name });
    return instance;
  }

  /** Number of started models not yet closed through the registry. */
  activeCount(): number {
    return this.active.size;
  }

  /** Tell every started model that the UI is gone. */
  closeAll(): void {
    for (const instance of this.active) {
      instance.notifyUiHasBeenClosed();
    }
    this.active.clear();
    this.events?.emit('model:closed');
  }
}
