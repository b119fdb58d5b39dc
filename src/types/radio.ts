/**
 * @module types/radio
 * @description Data model for radio readiness, discovered peripherals,
 * connection routes and resolved communication paths.
 */

import type {
  PeripheralId,
  ServiceId,
  CharacteristicId,
  Dbm,
  UnixTimestamp,
} from "./branded.js";

// ─── Radio Readiness ────────────────────────────────────────────────

/**
 * Power / availability state reported by the Radio Session.
 * Only `poweredOn` makes the system ready.
 */
export type RadioState =
  | "unknown"
  | "resetting"
  | "unsupported"
  | "unauthorized"
  | "poweredOff"
  | "poweredOn";

export const RADIO_STATES: readonly RadioState[] = [
  "unknown",
  "resetting",
  "unsupported",
  "unauthorized",
  "poweredOff",
  "poweredOn",
] as const;

/**
 * Whether the host application may use the radio at all.
 */
export type AuthorizationState =
  | "notDetermined"
  | "restricted"
  | "denied"
  | "allowedAlways";

/**
 * Pass-through pair returned by the readiness troubleshooting query.
 * `radioState` is `null` until a session has been initialized.
 */
export interface ReadinessTroubleshooting {
  readonly radioState: RadioState | null;
  readonly authorization: AuthorizationState;
}

// ─── Discovery ──────────────────────────────────────────────────────

/**
 * Advertisement payload as reported by the radio. Keys and values are
 * opaque to this library.
 */
export type AdvertisementData = Readonly<Record<string, unknown>>;

/**
 * A peripheral seen in an advertisement report.
 * Two records describe the same peripheral when their `id` matches.
 */
export interface DiscoveredPeripheral {
  readonly id: PeripheralId;
  readonly advertisement: AdvertisementData;
  readonly rssi: Dbm;
  readonly discoveredAt: UnixTimestamp;
}

/**
 * A characteristic reported by structural discovery. The handle is owned
 * by the Radio Session and passed back to it untouched.
 */
export interface DiscoveredCharacteristic {
  readonly id: CharacteristicId;
  readonly handle: unknown;
}

// ─── Routes & Paths ─────────────────────────────────────────────────

/**
 * Services (and per service, characteristics) to resolve after connecting.
 * An empty characteristic list means "every characteristic of the service".
 * Where a route is optional, `null` means "every service".
 */
export type ConnectionRoute = ReadonlyMap<ServiceId, readonly CharacteristicId[]>;

/**
 * A resolved, directly addressable service + characteristic endpoint
 * on a connected peripheral.
 */
export interface KnownPath {
  readonly peripheralId: PeripheralId;
  readonly serviceId: ServiceId;
  readonly characteristicId: CharacteristicId;
  readonly handle: unknown;
}
