/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * The session facade extends this to gain event capabilities.
 */

import type {
  EventListener,
  EventMap,
  ITypedEmitter,
} from "../interfaces/event-emitter.js";

type AnyListener<M> = (event: M[keyof M]) => void;

/**
 * Concrete typed event emitter over the event map `M`.
 * Uses a Map of Sets for O(1) listener registration and removal.
 *
 * @example
 * ```ts
 * interface DoorEvents {
 *   OPENED: { type: "OPENED"; by: string };
 *   CLOSED: { type: "CLOSED" };
 * }
 * const door = new TypedEmitter<DoorEvents>();
 * door.on("OPENED", (event) => greet(event.by));
 * door.emit({ type: "OPENED", by: "courier" });
 * ```
 */
export class TypedEmitter<M extends EventMap<M>> implements ITypedEmitter<M> {
  private readonly listeners = new Map<keyof M, Set<AnyListener<M>>>();

  on<K extends keyof M>(eventType: K, listener: EventListener<M, K>): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as AnyListener<M>);
  }

  once<K extends keyof M>(eventType: K, listener: EventListener<M, K>): void {
    const wrapper: EventListener<M, K> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<K extends keyof M>(eventType: K, listener: EventListener<M, K>): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as AnyListener<M>);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<K extends keyof M>(event: M[K]): void {
    const set = this.listeners.get(event.type);
    if (set) {
      // Copy, so a listener removing itself does not skip its neighbour.
      for (const listener of [...set]) {
        listener(event);
      }
    }
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }

  /** Number of listeners registered for `eventType`. */
  listenerCount(eventType: keyof M): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }
}
