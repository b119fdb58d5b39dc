/**
 * @module config
 * @description Standard values and validation for radio configuration
 * objects.
 */

import type {
  CharacteristicId,
  PeripheralId,
  ServiceId,
} from "../types/branded.js";
import { createCharacteristicId, createServiceId } from "../types/branded.js";
import type { ConnectionRoute } from "../types/radio.js";
import type {
  ConnectOptions,
  ConnectionConfiguration,
  ReconnectConfiguration,
  ScanConfiguration,
  SessionConfiguration,
} from "../types/config.js";
import type { ScanOptions } from "../interfaces/radio-session.js";

/**
 * Errors thrown when a configuration object is malformed.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_START_DELAY" | "INVALID_ROUTE"
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// ─── Standard Values ────────────────────────────────────────────────

export const STANDARD_SESSION_CONFIGURATION: SessionConfiguration = {
  showPowerAlert: false,
};

export const STANDARD_SCAN_CONFIGURATION: ScanConfiguration = {
  serviceIdentifiers: null,
  reportDuplicatePeripherals: false,
};

export const STANDARD_CONNECT_OPTIONS: ConnectOptions = {
  notifyOnConnection: false,
  notifyOnDisconnection: false,
  notifyOnNotification: false,
  enableTransportBridging: false,
  requiresAncs: false,
  startDelaySeconds: 0,
};

/**
 * A connect attempt with every alert and bridging option off and no delay.
 */
export function standardConnectionConfiguration(
  peripheralId: PeripheralId,
  route: ConnectionRoute | null
): ConnectionConfiguration {
  return { peripheralId, route, options: STANDARD_CONNECT_OPTIONS };
}

/**
 * Carries a reconnect request over to the peripheral it resolved to.
 */
export function connectionFromReconnect(
  config: ReconnectConfiguration,
  resolvedId: PeripheralId
): ConnectionConfiguration {
  return {
    peripheralId: resolvedId,
    route: config.route,
    options: config.options,
  };
}

// ─── Routes ─────────────────────────────────────────────────────────

/**
 * Builds a route from raw UUID strings.
 *
 * @example
 * ```ts
 * // Heart rate measurement only, plus every battery characteristic
 * const route = createRoute({ "180D": ["2A37"], "180F": [] });
 * ```
 * @throws {ConfigurationError} code=INVALID_ROUTE if two keys normalize
 *   to the same service.
 */
export function createRoute(
  services: Readonly<Record<string, readonly string[]>>
): ConnectionRoute {
  const route = new Map<ServiceId, readonly CharacteristicId[]>();
  for (const [rawService, rawCharacteristics] of Object.entries(services)) {
    const serviceId = createServiceId(rawService);
    if (route.has(serviceId)) {
      throw new ConfigurationError(
        `Service ${serviceId} appears more than once in the route`,
        "INVALID_ROUTE"
      );
    }
    const characteristics = [
      ...new Set(rawCharacteristics.map(createCharacteristicId)),
    ];
    route.set(serviceId, characteristics);
  }
  return route;
}

// ─── Validation ─────────────────────────────────────────────────────

/**
 * @throws {ConfigurationError} code=INVALID_START_DELAY unless the delay
 *   is a non-negative whole number of seconds.
 */
export function validateConnectOptions(options: ConnectOptions): ConnectOptions {
  const delay = options.startDelaySeconds;
  if (!Number.isInteger(delay) || delay < 0) {
    throw new ConfigurationError(
      `startDelaySeconds must be a non-negative integer, got ${delay}`,
      "INVALID_START_DELAY"
    );
  }
  return options;
}

export function scanOptionsFrom(config: ScanConfiguration): ScanOptions {
  return { allowDuplicates: config.reportDuplicatePeripherals };
}
