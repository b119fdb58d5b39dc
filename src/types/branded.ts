/**
 * @module types/branded
 * @description Branded identifier types for the radio-link session model.
 *
 * Peripheral, service and characteristic identifiers are all strings on the
 * wire. Branding keeps them from being swapped for one another: a raw
 * service UUID can never be passed where a peripheral identifier is expected.
 *
 * @example
 * ```ts
 * const raw = "180d";
 * // Type error: string is not assignable to ServiceId
 * const service: ServiceId = raw;
 * // Correct:
 * const service = createServiceId(raw);
 * ```
 */

/** Unique symbol for branding. Not exported — internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Identifier Brands ──────────────────────────────────────────────

/**
 * Opaque identifier of a remote peripheral, stable per physical device
 * for the lifetime of the Radio Session that reported it.
 */
export type PeripheralId = Brand<string, "PeripheralId">;

/**
 * A service UUID, normalized to lower case.
 */
export type ServiceId = Brand<string, "ServiceId">;

/**
 * A characteristic UUID, normalized to lower case.
 */
export type CharacteristicId = Brand<string, "CharacteristicId">;

// ─── Measurement Brands ─────────────────────────────────────────────

/**
 * Received signal strength in dBm (signed integer, typically -100..0).
 */
export type Dbm = Brand<number, "Dbm">;

/**
 * A Unix timestamp in seconds.
 */
export type UnixTimestamp = Brand<number, "UnixTimestamp">;

// ─── Factories ──────────────────────────────────────────────────────

function requireText(raw: string, kind: string): string {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new TypeError(`${kind} must be a non-empty string`);
  }
  return trimmed;
}

/**
 * Brands a peripheral identifier. The value is kept verbatim apart from
 * surrounding whitespace, since radio stacks disagree on its casing.
 */
export function createPeripheralId(raw: string): PeripheralId {
  return requireText(raw, "PeripheralId") as PeripheralId;
}

export function createServiceId(raw: string): ServiceId {
  return requireText(raw, "ServiceId").toLowerCase() as ServiceId;
}

export function createCharacteristicId(raw: string): CharacteristicId {
  return requireText(raw, "CharacteristicId").toLowerCase() as CharacteristicId;
}

/**
 * Brands a signal strength reading, rounding to the nearest whole dBm.
 */
export function createDbm(value: number): Dbm {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Signal strength must be a finite number, got ${value}`);
  }
  return Math.round(value) as Dbm;
}

/**
 * Brands a Unix timestamp. Defaults to the current time, in whole seconds.
 */
export function createUnixTimestamp(seconds?: number): UnixTimestamp {
  return (seconds ?? Math.floor(Date.now() / 1000)) as UnixTimestamp;
}
