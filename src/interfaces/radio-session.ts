/**
 * @module interfaces/radio-session
 * @description IRadioSession — the radio collaborator driven by the facade.
 *
 * A Radio Session wraps the platform's radio-management API. Every command
 * is fire-and-forget: outcomes arrive later as `RadioSessionEvent`s on the
 * listener registered through `onEvent`. The radio layer offers no
 * cancellation-by-timeout, so a connect stays pending until the session
 * reports success or failure, or the caller cancels it.
 */

import type {
  PeripheralId,
  ServiceId,
  CharacteristicId,
} from "../types/branded.js";
import type { AuthorizationState } from "../types/radio.js";
import type {
  SessionConfiguration,
  ConnectOptions,
} from "../types/config.js";
import type { RadioSessionEvent } from "../types/events.js";

/**
 * Stand-in cause for failures the radio reports without an error object.
 */
export class UnknownRadioError extends Error {
  constructor(message = "Radio reported a failure without a cause") {
    super(message);
    this.name = "UnknownRadioError";
  }
}

/**
 * Scan options forwarded to the radio.
 */
export interface ScanOptions {
  readonly allowDuplicates: boolean;
}

export type RadioSessionListener = (event: RadioSessionEvent) => void;

/**
 * Creates a fresh, unopened session. Called once per `initializeSession`.
 */
export type RadioSessionFactory = () => IRadioSession;

/**
 * @interface IRadioSession
 * @description Command and event surface of the radio collaborator.
 */
export interface IRadioSession {
  // ─── Lifecycle ──────────────────────────────────────────────────

  /**
   * @command
   * @description Opens the session. The session reports its radio state
   * through a `STATE_CHANGED` event once it is known.
   */
  open(config: SessionConfiguration): void;

  /**
   * @command
   * @description Releases the radio. No event is delivered afterwards.
   */
  close(): void;

  /**
   * @description Registers the event listener.
   * @returns Unsubscribe function.
   */
  onEvent(listener: RadioSessionListener): () => void;

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @param filter - Services a peripheral must advertise; `null` for all.
   * @postcondition `PERIPHERAL_DISCOVERED` events until `stopScan()`.
   */
  startScan(filter: readonly ServiceId[] | null, options: ScanOptions): void;

  stopScan(): void;

  /**
   * @command
   * @postcondition Exactly one of `CONNECTED` / `CONNECT_FAILED`, unless
   * the attempt is cancelled through `cancelOrDisconnect`.
   */
  connect(peripheralId: PeripheralId, options: ConnectOptions): void;

  /**
   * @command
   * @description Cancels a pending connect or tears down a live
   * connection; the radio uses one command for both.
   * @postcondition `DISCONNECTED` once the radio has let go.
   */
  cancelOrDisconnect(peripheralId: PeripheralId): void;

  /**
   * @command
   * @postcondition One `SERVICES_DISCOVERED` event.
   */
  discoverServices(
    peripheralId: PeripheralId,
    filter: readonly ServiceId[] | null
  ): void;

  /**
   * @command
   * @postcondition One `CHARACTERISTICS_DISCOVERED` event for `serviceId`.
   */
  discoverCharacteristics(
    peripheralId: PeripheralId,
    serviceId: ServiceId,
    filter: readonly CharacteristicId[] | null
  ): void;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Looks up a peripheral the radio has seen before.
   * @returns The identifier if the radio still knows it, else `null`.
   */
  lookupKnownIdentifier(peripheralId: PeripheralId): PeripheralId | null;

  /**
   * @query
   * @description Peripherals connected to the host (possibly by another
   * application) that expose all of `serviceIds`.
   */
  lookupConnectedMatchingServices(
    serviceIds: readonly ServiceId[]
  ): readonly PeripheralId[];

  /**
   * @query
   * @description The host application's radio authorization.
   */
  getAuthorization(): AuthorizationState;
}
