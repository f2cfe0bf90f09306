/**
 * @module errors
 * Failure taxonomy shared by backends and model adapters.
 *
 * Constructing a model lets these propagate; instantiation and the
 * segmentation calls catch them, log the message and fall back to a
 * safe default.
 */

/** Discriminator of {@link SamError} subclasses. */
export type SamErrorCode =
  | 'MISSING_ARTIFACT'
  | 'BACKEND_RUNTIME'
  | 'INTERRUPTED'
  | 'SESSION_CLOSED';

/** Base class of every backend failure. */
export class SamError extends Error {
  constructor(
    message: string,
    public readonly code: SamErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SamError';
  }
}

/** A file the backend needs (interpreter, worker script, weights) is absent. */
export class MissingArtifactError extends SamError {
  constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'MISSING_ARTIFACT', options);
    this.name = 'MissingArtifactError';
  }
}

/** The backend process raised an error during initialization or inference. */
export class BackendRuntimeError extends SamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'BACKEND_RUNTIME', options);
    this.name = 'BackendRuntimeError';
  }
}

/** The caller gave up while waiting on the backend. */
export class InterruptedError extends SamError {
  constructor(message = 'Interrupted while waiting for the backend', options?: { cause?: unknown }) {
    super(message, 'INTERRUPTED', options);
    this.name = 'InterruptedError';
  }
}

/** A request reached a model whose backend session was already released. */
export class SessionClosedError extends SamError {
  constructor(message = 'The backend session has been closed') {
    super(message, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
  }
}

/** Narrow an unknown thrown value to the backend failure taxonomy. */
export function isSamError(error: unknown): error is SamError {
  return error instanceof SamError;
}

/** Message text of any thrown value, for log lines. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
