/**
 * @module primitives/mutation-queue
 * @description Single-writer queue for every state mutation.
 *
 * Commands and radio events are submitted as tasks. A task runs to
 * completion before the next one starts; tasks submitted while another is
 * running (a listener issuing a command, a radio session answering
 * synchronously) wait their turn. Notifications scheduled while a task runs
 * are held back until the task has finished, then delivered in order, so a
 * listener never sees a half-applied mutation.
 */

import type { NotificationScheduler } from "../interfaces/state-container.js";
import type { Logger } from "../logging/logger.js";

type Task = () => void;

export class MutationQueue {
  private readonly tasks: Task[] = [];
  private readonly outbox: Task[] = [];
  private draining = false;

  constructor(private readonly logger: Logger | null = null) {}

  /** Whether a task or its notifications are being processed. */
  get isDraining(): boolean {
    return this.draining;
  }

  /** Number of tasks waiting behind the running one. */
  get pendingTasks(): number {
    return this.tasks.length;
  }

  /**
   * Runs `task` now if the queue is idle, otherwise after everything
   * already queued. Returns once the queue is idle again, unless called
   * from inside a task.
   *
   * @throws The first error raised by a task or notification, after the
   * queue has drained.
   */
  submit(task: Task): void {
    this.tasks.push(task);
    if (!this.draining) {
      this.drain();
    }
  }

  /**
   * Scheduler for state containers: delivers immediately when idle,
   * after the running task otherwise.
   */
  readonly schedule: NotificationScheduler = (notify) => {
    if (this.draining) {
      this.outbox.push(notify);
    } else {
      notify();
    }
  };

  private drain(): void {
    this.draining = true;
    let failure: { error: unknown } | null = null;

    try {
      let task = this.tasks.shift();
      while (task) {
        failure = this.runGuarded(task, failure);
        let notify = this.outbox.shift();
        while (notify) {
          failure = this.runGuarded(notify, failure);
          notify = this.outbox.shift();
        }
        task = this.tasks.shift();
      }
    } finally {
      this.draining = false;
    }

    if (failure) {
      throw failure.error;
    }
  }

  /** Keeps the queue moving past a throwing task; the first error wins. */
  private runGuarded(
    fn: Task,
    failure: { error: unknown } | null
  ): { error: unknown } | null {
    try {
      fn();
      return failure;
    } catch (error) {
      if (failure) {
        this.logger?.error("additional failure while draining: %O", error);
        return failure;
      }
      return { error };
    }
  }
}
