/**
 * @module types/config
 * @description Configuration objects accepted by the session facade and
 * forwarded to the Radio Session.
 */

import type { PeripheralId, ServiceId } from "./branded.js";
import type { ConnectionRoute } from "./radio.js";

/**
 * Options for opening a Radio Session.
 */
export interface SessionConfiguration {
  /** Ask the platform to alert the user when the radio is powered off. */
  readonly showPowerAlert: boolean;
}

/**
 * Scan parameters.
 *
 * Scanning only for peripherals advertising known service identifiers is
 * cheaper for the radio. `reportDuplicatePeripherals` delivers every
 * advertisement packet rather than one per peripheral, at a large power cost.
 */
export interface ScanConfiguration {
  /** Services a peripheral must advertise. `null` scans for everything. */
  readonly serviceIdentifiers: readonly ServiceId[] | null;
  readonly reportDuplicatePeripherals: boolean;
}

/**
 * Radio-side connect options. Passed through to the Radio Session as is.
 */
export interface ConnectOptions {
  /** Alert when the peripheral connects while the app is in the background. */
  readonly notifyOnConnection: boolean;
  /** Alert when the peripheral disconnects while the app is in the background. */
  readonly notifyOnDisconnection: boolean;
  /** Alert on every notification while the app is suspended. */
  readonly notifyOnNotification: boolean;
  /** Bridge classic profiles if already connected over low energy. */
  readonly enableTransportBridging: boolean;
  /** Require the notification-center service on connect. */
  readonly requiresAncs: boolean;
  /** Delay before the radio starts connecting, in whole seconds. */
  readonly startDelaySeconds: number;
}

/**
 * A single connect attempt.
 */
export interface ConnectionConfiguration {
  readonly peripheralId: PeripheralId;
  /** Paths to resolve once connected. `null` resolves everything. */
  readonly route: ConnectionRoute | null;
  readonly options: ConnectOptions;
}

/**
 * A reconnect attempt. The peripheral is looked up by identifier first,
 * then among peripherals already connected elsewhere that expose
 * `serviceIdentifiers`.
 */
export interface ReconnectConfiguration {
  readonly peripheralId: PeripheralId;
  readonly serviceIdentifiers: readonly ServiceId[];
  readonly route: ConnectionRoute | null;
  readonly options: ConnectOptions;
}
