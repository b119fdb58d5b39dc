/**
 * @module primitives/operation-registry
 * @description Implementation of the IOperationRegistry interface.
 *
 * Entries are keyed by instruction and addressee peripheral id; the
 * callback an entry carries plays no part in its identity.
 */

import type { IOperationRegistry } from "../interfaces/operation-registry.js";
import { RegistryError } from "../interfaces/operation-registry.js";
import type {
  NotificationScheduler,
  ReadonlyView,
} from "../interfaces/state-container.js";
import type { PeripheralId } from "../types/branded.js";
import type {
  AddressedInstruction,
  Instruction,
  OperationFor,
  PendingOperation,
} from "../types/registry.js";
import { StateContainer } from "./state-container.js";

function addresseeId(operation: PendingOperation): PeripheralId | null {
  return operation.addressee ? operation.addressee.peripheralId : null;
}

function sameEntry(a: PendingOperation, b: PendingOperation): boolean {
  return a.instruction === b.instruction && addresseeId(a) === addresseeId(b);
}

function isInstruction<I extends Instruction>(
  operation: PendingOperation,
  instruction: I
): operation is OperationFor<I> {
  return operation.instruction === instruction;
}

function describe(operation: PendingOperation): string {
  const id = addresseeId(operation);
  return id ? `${operation.instruction} → ${id}` : operation.instruction;
}

/**
 * OperationRegistry — ledger of in-flight scan / connect / disconnect
 * operations.
 *
 * @example
 * ```ts
 * const registry = new OperationRegistry();
 * registry.insert(SCANNING_OPERATION);
 * registry.contains("SCANNING"); // true
 * registry.insert(SCANNING_OPERATION); // throws INVALID_INSTRUCTION
 * ```
 */
export class OperationRegistry implements IOperationRegistry {
  private readonly entries: StateContainer<readonly PendingOperation[]>;
  readonly snapshot: ReadonlyView<readonly PendingOperation[]>;

  constructor(schedule?: NotificationScheduler) {
    this.entries = new StateContainer<readonly PendingOperation[]>([], schedule);
    this.snapshot = this.entries.asView();
  }

  // ─── Commands ───────────────────────────────────────────────────

  insert(operation: PendingOperation): void {
    const current = this.entries.value;
    if (current.some((entry) => sameEntry(entry, operation))) {
      throw new RegistryError(
        `Operation already pending: ${describe(operation)}`,
        "INVALID_INSTRUCTION"
      );
    }
    this.entries.set([...current, operation]);
  }

  remove(operation: PendingOperation): void {
    this.entries.set(
      this.entries.value.filter((entry) => !sameEntry(entry, operation))
    );
  }

  clear(): void {
    this.entries.set([]);
  }

  // ─── Queries ────────────────────────────────────────────────────

  contains(instruction: Instruction, forIdentifier?: PeripheralId): boolean {
    return this.entries.value.some(
      (entry) =>
        entry.instruction === instruction &&
        (forIdentifier === undefined || addresseeId(entry) === forIdentifier)
    );
  }

  findAddressee<I extends AddressedInstruction>(
    peripheralId: PeripheralId,
    instruction: I
  ): OperationFor<I> {
    for (const entry of this.entries.value) {
      if (isInstruction(entry, instruction) && addresseeId(entry) === peripheralId) {
        return entry;
      }
    }
    throw new RegistryError(
      `No ${instruction} operation pending for ${peripheralId}`,
      "NOT_FOUND"
    );
  }

  get size(): number {
    return this.entries.value.length;
  }
}
