/**
 * @module interfaces/path-discoverer
 * @description IPathDiscoverer — resolves a connected peripheral's
 * requested services and characteristics into known paths.
 */

import type { KnownPath } from "../types/radio.js";
import type { PathDiscoveryEvent } from "../types/events.js";

/**
 * Outcome of a discovery run. Delivered exactly once.
 */
export type PathDiscoveryOutcome =
  | { readonly ok: true; readonly paths: readonly KnownPath[] }
  | { readonly ok: false; readonly error: Error };

export type PathDiscoveryCallback = (outcome: PathDiscoveryOutcome) => void;

/**
 * @interface IPathDiscoverer
 * @description One instance per in-flight connection.
 */
export interface IPathDiscoverer {
  /**
   * @command
   * @description Issues service discovery for the route.
   * @postcondition `onComplete` is called once, after the structural
   * discovery results have been fed through `handle()`.
   */
  start(onComplete: PathDiscoveryCallback): void;

  /**
   * @command
   * @description Feeds a structural-discovery result to the discoverer.
   * Results for other peripherals, or arriving after completion, are
   * ignored.
   */
  handle(event: PathDiscoveryEvent): void;

  /**
   * @command
   * @description Abandons the run without calling `onComplete`.
   */
  dispose(): void;

  /**
   * @query
   * @description True once the run has completed or been disposed.
   */
  readonly isSettled: boolean;
}
