/**
 * @module event-bus
 * Type-safe pub/sub emitter for model lifecycle notifications.
 *
 * @see {@link @sam-adapter/types#EventBus} for the interface contract
 * @see {@link @sam-adapter/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@sam-adapter/types';

/** Generic callback type used internally by the event bus. */
type Callback = (...args: unknown[]) => void;

interface Listener {
  callback: Callback;
  once: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept per event in subscription order. A callback
 * subscribed twice is called twice.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<keyof EventMap, Listener[]>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.add(event, callback as Callback, false);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.add(event, callback as Callback, true);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const list = this.listeners.get(event);
    if (!list) return;

    const idx = list.findIndex((l) => l.callback === (callback as Callback));
    if (idx >= 0) list.splice(idx, 1);
    if (list.length === 0) this.listeners.delete(event);
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const list = this.listeners.get(event);
    if (!list) return;

    // Snapshot: listeners may unsubscribe while we iterate.
    for (const listener of [...list]) {
      if (listener.once) this.remove(event, listener);
      listener.callback(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
  }

  private add(event: keyof EventMap, callback: Callback, once: boolean): () => void {
    const listener: Listener = { callback, once };
    const list = this.listeners.get(event);
    if (list) list.push(listener);
    else this.listeners.set(event, [listener]);
    return () => this.remove(event, listener);
  }

  private remove(event: keyof EventMap, listener: Listener): void {
    const list = this.listeners.get(event);
    if (!list) return;
    const idx = list.indexOf(listener);
    if (idx >= 0) list.splice(idx, 1);
    if (list.length === 0) this.listeners.delete(event);
  }
}
