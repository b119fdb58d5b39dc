/**
 * @module interfaces/state-container
 * @description Observable state contracts.
 *
 * A state container owns the latest value of one piece of state and
 * re-broadcasts it on every mutation. Views derived from containers are
 * read-only and never fail.
 */

export type ViewListener<T> = (value: T) => void;

/**
 * Defers a notification until the current mutation has completed.
 */
export type NotificationScheduler = (notify: () => void) => void;

/**
 * @interface ReadonlyView
 * @description Read side of a container or a derived view.
 */
export interface ReadonlyView<T> {
  /** The latest value. */
  readonly value: T;

  /**
   * Registers a listener and immediately calls it with the latest value.
   * @returns Unsubscribe function.
   */
  subscribe(listener: ViewListener<T>): () => void;

  /**
   * Registers a listener for future values only.
   * @returns Unsubscribe function.
   */
  watch(listener: ViewListener<T>): () => void;

  /**
   * Derives a view that reformats every value of this one.
   */
  map<U>(format: (value: T) => U): ReadonlyView<U>;
}

/**
 * @interface IStateContainer
 * @description Write side of a container.
 */
export interface IStateContainer<T> extends ReadonlyView<T> {
  /** Replaces the value and schedules a broadcast of it. */
  set(next: T): void;

  /**
   * Replaces the value with `reducer(current)`. Nothing is broadcast when
   * the reducer returns the current value itself.
   */
  update(reducer: (current: T) => T): void;
}
