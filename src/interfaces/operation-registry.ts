/**
 * @module interfaces/operation-registry
 * @description IOperationRegistry — mutual-exclusion ledger of pending
 * scan / connect / disconnect instructions.
 *
 * The registry never holds two entries with the same
 * (instruction, addressee peripheral id) pair. Every mutation publishes
 * the full snapshot.
 */

import type { PeripheralId } from "../types/branded.js";
import type {
  Instruction,
  AddressedInstruction,
  OperationFor,
  PendingOperation,
} from "../types/registry.js";
import type { ReadonlyView } from "./state-container.js";

/**
 * Errors that may be thrown by IOperationRegistry operations.
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_INSTRUCTION" | "NOT_FOUND"
  ) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * @interface IOperationRegistry
 */
export interface IOperationRegistry {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Records a pending operation.
   * @throws {RegistryError} code=INVALID_INSTRUCTION if an entry with the
   *   same instruction and addressee already exists.
   */
  insert(operation: PendingOperation): void;

  /**
   * @command
   * @description Removes the entry matching `operation`'s instruction and
   * addressee. Does nothing if there is none.
   */
  remove(operation: PendingOperation): void;

  /**
   * @command
   * @description Drops every entry.
   */
  clear(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Whether an entry for `instruction` exists, optionally
   * restricted to one addressee.
   */
  contains(instruction: Instruction, forIdentifier?: PeripheralId): boolean;

  /**
   * @query
   * @description Finds the entry routing a terminal radio event back to
   * its caller.
   * @throws {RegistryError} code=NOT_FOUND if there is no such entry.
   */
  findAddressee<I extends AddressedInstruction>(
    peripheralId: PeripheralId,
    instruction: I
  ): OperationFor<I>;

  /**
   * @query
   * @description Every entry, in insertion order.
   */
  readonly snapshot: ReadonlyView<readonly PendingOperation[]>;
}
