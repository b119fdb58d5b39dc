/**
 * @module primitives/formatting
 * @description Pure derivations from raw container values to the views
 * the facade exposes.
 */

import type { PeripheralId } from "../types/branded.js";
import type { DiscoveredPeripheral, KnownPath, RadioState } from "../types/radio.js";
import type { PendingOperation } from "../types/registry.js";

/**
 * Raw radio state → readiness. No state (no session) is not ready.
 */
export function formatSystemReady(state: RadioState | null): boolean {
  return state === "poweredOn";
}

/**
 * Registry snapshot → whether a scan is in progress.
 */
export function formatScanning(operations: readonly PendingOperation[]): boolean {
  return operations.some((op) => op.instruction === "SCANNING");
}

/**
 * Discovered set → list ordered by signal strength, strongest first.
 * Order between equal strengths is unspecified.
 */
export function formatAvailablePeripherals(
  discovered: ReadonlyMap<PeripheralId, DiscoveredPeripheral>
): readonly DiscoveredPeripheral[] {
  return [...discovered.values()].sort((a, b) => b.rssi - a.rssi);
}

/**
 * Defensive copy of an identifier set, so callers cannot reach the
 * container's snapshot.
 */
export function formatIdentifierSet(
  ids: ReadonlySet<PeripheralId>
): ReadonlySet<PeripheralId> {
  return new Set(ids);
}

/**
 * Upserts a peripheral report: a later report replaces the earlier one
 * for the same identifier.
 */
export function upsertPeripheral(
  discovered: ReadonlyMap<PeripheralId, DiscoveredPeripheral>,
  peripheral: DiscoveredPeripheral
): ReadonlyMap<PeripheralId, DiscoveredPeripheral> {
  const next = new Map(discovered);
  next.set(peripheral.id, peripheral);
  return next;
}

export function withIdentifier(
  ids: ReadonlySet<PeripheralId>,
  id: PeripheralId
): ReadonlySet<PeripheralId> {
  if (ids.has(id)) return ids;
  const next = new Set(ids);
  next.add(id);
  return next;
}

export function withoutIdentifier(
  ids: ReadonlySet<PeripheralId>,
  id: PeripheralId
): ReadonlySet<PeripheralId> {
  if (!ids.has(id)) return ids;
  const next = new Set(ids);
  next.delete(id);
  return next;
}

/**
 * Drops every path belonging to `peripheralId`. Returns `paths` itself
 * when there is nothing to drop.
 */
export function prunePaths(
  paths: readonly KnownPath[],
  peripheralId: PeripheralId
): readonly KnownPath[] {
  if (!paths.some((path) => path.peripheralId === peripheralId)) return paths;
  return paths.filter((path) => path.peripheralId !== peripheralId);
}

/**
 * Replaces the paths of one peripheral with a fresh set.
 */
export function replacePaths(
  paths: readonly KnownPath[],
  peripheralId: PeripheralId,
  resolved: readonly KnownPath[]
): readonly KnownPath[] {
  return [...prunePaths(paths, peripheralId), ...resolved];
}
