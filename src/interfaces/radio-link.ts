/**
 * @module interfaces/radio-link
 * @description IRadioLink — the session facade exposed to applications.
 *
 * Commands are fire-and-forget. A rejected command reports through its
 * `onError` callback before the command returns and leaves all state
 * untouched. An accepted command may still fail later, when the Radio
 * Session reports the outcome; that failure is routed to the same
 * callback. State is observed through read-only views that never fail.
 */

import type { PeripheralId, ServiceId, CharacteristicId } from "../types/branded.js";
import type {
  DiscoveredPeripheral,
  KnownPath,
  ReadinessTroubleshooting,
} from "../types/radio.js";
import type {
  SessionConfiguration,
  ScanConfiguration,
  ConnectionConfiguration,
  ReconnectConfiguration,
} from "../types/config.js";
import type { PendingOperation } from "../types/registry.js";
import type { ProtocolAnomaly } from "../types/events.js";
import type { Result } from "../types/result.js";
import type { ReadonlyView } from "./state-container.js";

export type LinkErrorCode =
  | "SYSTEM_NOT_READY"
  | "INVALID_INSTRUCTION"
  | "UNKNOWN_DEVICE"
  | "UNKNOWN_PATH"
  | "RADIO_ERROR";

/**
 * Errors delivered to command callbacks.
 * `RADIO_ERROR` carries the radio's own failure as `cause`.
 */
export class LinkError extends Error {
  constructor(
    message: string,
    public readonly code: LinkErrorCode,
    public readonly peripheralId: PeripheralId | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LinkError";
  }
}

export type ErrorCallback = (error: LinkError) => void;

/**
 * Anomaly bookkeeping returned by `getDiagnostics()`.
 */
export interface RadioLinkDiagnostics {
  readonly anomalyCount: number;
  readonly lastAnomaly: ProtocolAnomaly | null;
}

/**
 * @interface IRadioLink
 */
export interface IRadioLink {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Opens a Radio Session and starts consuming its events.
   * Calling it again replaces the session: the old event stream is
   * discarded and all bookkeeping is reset.
   */
  initializeSession(config: SessionConfiguration): void;

  /**
   * @command
   * @precondition Radio ready; not already scanning.
   * @postcondition `scanning` view is true; discovered peripherals reset.
   */
  startScanning(config: ScanConfiguration, onError: ErrorCallback): void;

  /**
   * @command
   * @precondition A scan is active.
   */
  stopScanning(onError: ErrorCallback): void;

  /**
   * @command
   * @precondition Radio ready; peripheral neither connecting, connected
   *   nor still disconnecting.
   * @postcondition Peripheral is in `connectingPeripherals` until its paths
   *   are resolved (then `connectedPeripherals`) or the attempt fails.
   * @throws {ConfigurationError} code=INVALID_START_DELAY, synchronously,
   *   before the command is queued. Called from inside a view or event
   *   listener, the error leaves that listener and is rethrown by the
   *   mutation queue to the call that started the running task (for
   *   instance the Radio Session delivering an event) once the queue has
   *   drained; the remaining queued work still runs.
   */
  connectPeripheral(config: ConnectionConfiguration, onError: ErrorCallback): void;

  /**
   * @command
   * @precondition Radio ready; no disconnect already pending; peripheral
   *   is connecting or connected.
   * @postcondition Peripheral removed from both sets; disconnect issued.
   */
  cancelConnection(peripheralId: PeripheralId, onError: ErrorCallback): void;

  /**
   * @command
   * @description Resolves the peripheral through the Radio Session and
   * connects to it, with the preconditions of `connectPeripheral`.
   * @throws {ConfigurationError} As `connectPeripheral`.
   */
  reconnectToPeripheral(config: ReconnectConfiguration, onError: ErrorCallback): void;

  /**
   * @command
   * @description Closes the session and clears all state.
   */
  shutdown(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @returns The known path, or `UNKNOWN_PATH`.
   */
  lookupPath(
    peripheralId: PeripheralId,
    serviceId: ServiceId,
    characteristicId: CharacteristicId
  ): Result<KnownPath, LinkError>;

  /** @query Raw radio state and authorization, for readiness problems. */
  troubleshootSystemReady(): ReadinessTroubleshooting;

  /** @query Protocol anomaly counters. */
  getDiagnostics(): RadioLinkDiagnostics;

  // ─── Views ──────────────────────────────────────────────────────

  readonly systemReady: ReadonlyView<boolean>;
  readonly scanning: ReadonlyView<boolean>;
  /** Strongest signal first. */
  readonly availablePeripherals: ReadonlyView<readonly DiscoveredPeripheral[]>;
  readonly connectingPeripherals: ReadonlyView<ReadonlySet<PeripheralId>>;
  readonly connectedPeripherals: ReadonlyView<ReadonlySet<PeripheralId>>;
  readonly knownPaths: ReadonlyView<readonly KnownPath[]>;
  readonly pendingOperations: ReadonlyView<readonly PendingOperation[]>;
}
