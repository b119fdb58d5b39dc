/**
 * @module types/events
 * @description Event catalogs.
 *
 * Two families live here:
 * - `RadioSessionEvent`: what the Radio Session collaborator reports,
 *   asynchronously, in response to commands or radio activity.
 * - `RadioLinkEventMap`: typed events the session facade emits to the
 *   application alongside its state views.
 */

import type {
  PeripheralId,
  ServiceId,
  Dbm,
  UnixTimestamp,
} from "./branded.js";
import type {
  RadioState,
  AdvertisementData,
  DiscoveredCharacteristic,
  KnownPath,
} from "./radio.js";
import type { SessionConfiguration } from "./config.js";

// ─── Radio Session Events ───────────────────────────────────────────

export interface RadioStateChangedEvent {
  readonly type: "STATE_CHANGED";
  readonly state: RadioState;
}

export interface PeripheralDiscoveredEvent {
  readonly type: "PERIPHERAL_DISCOVERED";
  readonly peripheralId: PeripheralId;
  readonly advertisement: AdvertisementData;
  readonly rssi: Dbm;
}

export interface ConnectSucceededEvent {
  readonly type: "CONNECTED";
  readonly peripheralId: PeripheralId;
}

/** `error` is absent when the radio fails without giving a cause. */
export interface ConnectFailedEvent {
  readonly type: "CONNECT_FAILED";
  readonly peripheralId: PeripheralId;
  readonly error?: Error;
}

/** `error` is absent for a graceful disconnect. */
export interface DisconnectedEvent {
  readonly type: "DISCONNECTED";
  readonly peripheralId: PeripheralId;
  readonly error?: Error;
}

export interface ServicesDiscoveredEvent {
  readonly type: "SERVICES_DISCOVERED";
  readonly peripheralId: PeripheralId;
  readonly services: readonly ServiceId[];
  readonly error?: Error;
}

export interface CharacteristicsDiscoveredEvent {
  readonly type: "CHARACTERISTICS_DISCOVERED";
  readonly peripheralId: PeripheralId;
  readonly serviceId: ServiceId;
  readonly characteristics: readonly DiscoveredCharacteristic[];
  readonly error?: Error;
}

/** Structural-discovery results, routed to a Path Discoverer. */
export type PathDiscoveryEvent =
  | ServicesDiscoveredEvent
  | CharacteristicsDiscoveredEvent;

export type RadioSessionEvent =
  | RadioStateChangedEvent
  | PeripheralDiscoveredEvent
  | ConnectSucceededEvent
  | ConnectFailedEvent
  | DisconnectedEvent
  | PathDiscoveryEvent;

export type RadioSessionEventType = RadioSessionEvent["type"];

// ─── Facade Events ──────────────────────────────────────────────────

/** Emitted when a Radio Session has been opened (or replaced). */
export interface SessionInitializedEvent {
  readonly type: "SESSION_INITIALIZED";
  readonly configuration: SessionConfiguration;
  readonly replacedPrevious: boolean;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when a peripheral's paths are resolved and it counts as connected. */
export interface PathsResolvedEvent {
  readonly type: "PATHS_RESOLVED";
  readonly peripheralId: PeripheralId;
  readonly paths: readonly KnownPath[];
  readonly timestamp: UnixTimestamp;
}

/**
 * Kinds of terminal radio events that arrived with no pending operation
 * to route them to.
 */
export type AnomalyKind = "UNEXPECTED_CONNECT" | "UNEXPECTED_CONNECT_FAILURE";

export interface ProtocolAnomaly {
  readonly kind: AnomalyKind;
  readonly peripheralId: PeripheralId;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when a terminal radio event cannot be matched to a caller. */
export interface ProtocolAnomalyEvent {
  readonly type: "PROTOCOL_ANOMALY";
  readonly anomaly: ProtocolAnomaly;
  /** Total anomalies seen by this facade, this one included. */
  readonly total: number;
  readonly timestamp: UnixTimestamp;
}

/**
 * Map of event type string → event payload type.
 * Used by the typed emitter for compile-time safety.
 */
export interface RadioLinkEventMap {
  SESSION_INITIALIZED: SessionInitializedEvent;
  PATHS_RESOLVED: PathsResolvedEvent;
  PROTOCOL_ANOMALY: ProtocolAnomalyEvent;
}

/** Union of all facade event type strings. */
export type RadioLinkEventType = keyof RadioLinkEventMap;

/** Union of all facade event payloads. */
export type RadioLinkEvent = RadioLinkEventMap[RadioLinkEventType];
