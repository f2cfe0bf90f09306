/**
 * @module logging
 * Logging capability consumed by the model adapters.
 */

/** Sink for user-facing log lines. */
export interface Logger {
  /** Informational message. */
  info(text: string): void;
  /** Error message; the only channel through which segmentation trouble is reported. */
  error(text: string): void;
}

/** Receives raw diagnostic text printed by a backend process. */
export type DebugTextPrinter = (text: string) => void;
