/**
 * @module primitives/state-container
 * @description Publish/subscribe holders for the latest value of a piece
 * of state, and read-only views derived from them.
 *
 * Values are treated as immutable snapshots: `set` replaces, never mutates.
 * Each `set` schedules one broadcast carrying the value it set, so
 * listeners receive every value in mutation order even when broadcasts
 * are deferred by the mutation queue.
 */

import type {
  IStateContainer,
  NotificationScheduler,
  ReadonlyView,
  ViewListener,
} from "../interfaces/state-container.js";

const immediate: NotificationScheduler = (notify) => notify();

/**
 * Listener bookkeeping shared by containers and derived views.
 */
abstract class ObservableValue<T> implements ReadonlyView<T> {
  private readonly listeners = new Set<ViewListener<T>>();

  abstract get value(): T;

  subscribe(listener: ViewListener<T>): () => void {
    this.listeners.add(listener);
    listener(this.value);
    return () => {
      this.listeners.delete(listener);
    };
  }

  watch(listener: ViewListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  map<U>(format: (value: T) => U): ReadonlyView<U> {
    return new DerivedView(this, format);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  protected publish(value: T): void {
    for (const listener of [...this.listeners]) {
      listener(value);
    }
  }
}

/**
 * StateContainer — owns one value and re-broadcasts it on every mutation.
 *
 * @example
 * ```ts
 * const queue = new MutationQueue();
 * const state = new StateContainer<RadioState | null>(null, queue.schedule);
 * state.subscribe((s) => render(s));
 * queue.submit(() => state.set("poweredOn"));
 * ```
 */
export class StateContainer<T>
  extends ObservableValue<T>
  implements IStateContainer<T>
{
  private current: T;

  constructor(
    initial: T,
    private readonly schedule: NotificationScheduler = immediate
  ) {
    super();
    this.current = initial;
  }

  get value(): T {
    return this.current;
  }

  set(next: T): void {
    this.current = next;
    this.schedule(() => this.publish(next));
  }

  update(reducer: (current: T) => T): void {
    const next = reducer(this.current);
    if (!Object.is(next, this.current)) {
      this.set(next);
    }
  }

  /** Read-only face of this container. */
  asView(): ReadonlyView<T> {
    return this.map((value) => value);
  }
}

/**
 * A view whose value is `format(source.value)`.
 *
 * Reads are computed from the source's current value (cached per source
 * snapshot). Broadcasts follow the source's broadcasts one for one, in
 * the same order, each formatted from the snapshot that was broadcast.
 */
export class DerivedView<S, T> extends ObservableValue<T> {
  private cache: { input: S; output: T } | null = null;

  constructor(
    private readonly source: ReadonlyView<S>,
    private readonly format: (value: S) => T
  ) {
    super();
    source.watch((value) => {
      this.publish(this.formatCached(value));
    });
  }

  get value(): T {
    return this.formatCached(this.source.value);
  }

  private formatCached(input: S): T {
    if (this.cache && Object.is(this.cache.input, input)) {
      return this.cache.output;
    }
    const output = this.format(input);
    this.cache = { input, output };
    return output;
  }
}
