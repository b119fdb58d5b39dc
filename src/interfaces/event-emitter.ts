/**
 * @module interfaces/event-emitter
 * @description Typed event emitter contract, generic over an event map.
 *
 * An event map associates each event type string with its payload, and
 * every payload carries its own type string in `type`. Listeners receive
 * correctly-typed payloads without runtime type checking.
 */

import type { RadioLinkEventMap } from "../types/events.js";

/**
 * Shape every event map satisfies: the payload under `K` has `type: K`.
 */
export type EventMap<M> = { [K in keyof M]: { readonly type: K } };

/**
 * Listener function signature for one event type of a map.
 */
export type EventListener<M, K extends keyof M> = (event: M[K]) => void;

/**
 * @interface ITypedEmitter
 * @description Typed event emitter over the event map `M`.
 * Provides compile-time safety for event names and payload types.
 */
export interface ITypedEmitter<M extends EventMap<M>> {
  /**
   * Register a listener for a specific event type.
   * @param eventType - The event type to listen for.
   * @param listener - Callback function receiving the typed event payload.
   */
  on<K extends keyof M>(eventType: K, listener: EventListener<M, K>): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<K extends keyof M>(eventType: K, listener: EventListener<M, K>): void;

  /**
   * Remove a previously registered listener.
   */
  off<K extends keyof M>(eventType: K, listener: EventListener<M, K>): void;

  /**
   * Emit an event, invoking the listeners of `event.type` synchronously,
   * in registration order.
   */
  emit<K extends keyof M>(event: M[K]): void;

  /** Drops every listener for every event type. */
  removeAllListeners(): void;
}

/** The facade's emitter. */
export type IRadioLinkEmitter = ITypedEmitter<RadioLinkEventMap>;
