/**
 * @module events
 * Type-safe event bus definitions for model lifecycle notifications.
 */

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when a model's installed flag flips. */
  'model:installation-changed': { name: string; installed: boolean };
  /** Fired when a model was started for an image. */
  'model:instantiated': { name: string };
  /** Fired when starting a model failed; the reason went to the logger. */
  'model:instantiate-failed': { name: string };
  /** Fired when every active model was closed. */
  'model:closed': undefined;
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
