/**
 * @module logging-filter
 * Keeps bulk contour dumps printed by the backend out of user-facing logs.
 */

import type { DebugTextPrinter, Logger } from '@sam-adapter/types';

/** Marks the start of a contour payload in backend output. */
export const CONTOUR_MARKER = 'contours_x';

/**
 * Return the part of `text` worth showing: everything before
 * {@link CONTOUR_MARKER}, or the whole text when the marker is absent.
 */
export function stripContourPayload(text: string): string {
  // A line that opens with the marker is all payload and forwards as "".
  const idx = text.indexOf(CONTOUR_MARKER);
  return idx >= 0 ? text.slice(0, idx) : text;
}

/** Wrap `logger` into a debug sink that forwards filtered text as info. */
export function createFilteringLogger(logger: Logger): DebugTextPrinter {
  return (text) => logger.info(stripContourPayload(text));
}

/** Logger writing to the console, optionally prefixing every line. */
export function createConsoleLogger(prefix?: string): Logger {
  const format = (text: string): string => (prefix ? `[${prefix}] ${text}` : text);
  return {
    info: (text) => console.info(format(text)),
    error: (text) => console.error(format(text)),
  };
}
