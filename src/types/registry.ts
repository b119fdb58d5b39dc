/**
 * @module types/registry
 * @description Pending-operation records held by the Operation Registry.
 *
 * Each record owns the failure callback owed to the caller that issued it.
 * The registry keys records by (instruction, addressee peripheral id);
 * `SCANNING` has no addressee and is therefore a singleton.
 */

import type { PeripheralId } from "./branded.js";
import type { ConnectionRoute } from "./radio.js";
import type { ErrorCallback } from "../interfaces/radio-link.js";

export type Instruction = "SCANNING" | "CONNECTING" | "DISCONNECTING";

export interface Addressee {
  readonly peripheralId: PeripheralId;
  readonly onError: ErrorCallback;
}

export interface ConnectingAddressee extends Addressee {
  /** `null` resolves every service. */
  readonly route: ConnectionRoute | null;
}

export interface ScanningOperation {
  readonly instruction: "SCANNING";
  readonly addressee: null;
}

export interface ConnectingOperation {
  readonly instruction: "CONNECTING";
  readonly addressee: ConnectingAddressee;
}

export interface DisconnectingOperation {
  readonly instruction: "DISCONNECTING";
  readonly addressee: Addressee;
}

export type PendingOperation =
  | ScanningOperation
  | ConnectingOperation
  | DisconnectingOperation;

/** Narrows a registry lookup result to the record type of its instruction. */
export type OperationFor<I extends Instruction> = Extract<
  PendingOperation,
  { instruction: I }
>;

/** Instructions that are addressed to a peripheral. */
export type AddressedInstruction = Exclude<Instruction, "SCANNING">;

export const SCANNING_OPERATION: ScanningOperation = {
  instruction: "SCANNING",
  addressee: null,
};
