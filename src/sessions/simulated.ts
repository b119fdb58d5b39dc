/**
 * @module sessions/simulated
 * @description In-process implementation of the IRadioSession interface.
 *
 * There is no radio behind it: every command is recorded, and events are
 * delivered when the owner calls `deliver()` (or one of its shorthands).
 * Peripherals registered with `definePeripheral()` answer structural
 * discovery on their own, synchronously, the way a radio stack with a
 * warm attribute cache does.
 *
 * Used by the test suite and for running applications without hardware.
 */

import type {
  IRadioSession,
  RadioSessionListener,
  ScanOptions,
} from "../interfaces/radio-session.js";
import type {
  PeripheralId,
  ServiceId,
  CharacteristicId,
} from "../types/branded.js";
import { createDbm } from "../types/branded.js";
import type {
  AdvertisementData,
  AuthorizationState,
  DiscoveredCharacteristic,
  RadioState,
} from "../types/radio.js";
import type { ConnectOptions, SessionConfiguration } from "../types/config.js";
import type { RadioSessionEvent } from "../types/events.js";

// ─── Command Log ────────────────────────────────────────────────────

export type RadioCommand =
  | { readonly type: "OPEN"; readonly config: SessionConfiguration }
  | { readonly type: "CLOSE" }
  | {
      readonly type: "START_SCAN";
      readonly filter: readonly ServiceId[] | null;
      readonly options: ScanOptions;
    }
  | { readonly type: "STOP_SCAN" }
  | {
      readonly type: "CONNECT";
      readonly peripheralId: PeripheralId;
      readonly options: ConnectOptions;
    }
  | { readonly type: "CANCEL_OR_DISCONNECT"; readonly peripheralId: PeripheralId }
  | {
      readonly type: "DISCOVER_SERVICES";
      readonly peripheralId: PeripheralId;
      readonly filter: readonly ServiceId[] | null;
    }
  | {
      readonly type: "DISCOVER_CHARACTERISTICS";
      readonly peripheralId: PeripheralId;
      readonly serviceId: ServiceId;
      readonly filter: readonly CharacteristicId[] | null;
    };

export type RadioCommandType = RadioCommand["type"];

export interface SimulatedRadioSessionOptions {
  /** Radio state reported as soon as the session is opened. */
  readonly initialState?: RadioState;
  /** Default: "allowedAlways". */
  readonly authorization?: AuthorizationState;
}

/**
 * Attribute table of a simulated peripheral: service → characteristics.
 */
export type SimulatedLayout = ReadonlyMap<ServiceId, readonly DiscoveredCharacteristic[]>;

/**
 * SimulatedRadioSession — scripted radio for tests and demos.
 *
 * @example
 * ```ts
 * const radio = new SimulatedRadioSession({ initialState: "poweredOn" });
 * const link = new RadioLink({ sessionFactory: () => radio });
 * link.initializeSession(STANDARD_SESSION_CONFIGURATION);
 * radio.advertise(id, -40);
 * ```
 */
export class SimulatedRadioSession implements IRadioSession {
  private readonly listeners = new Set<RadioSessionListener>();
  private readonly log: RadioCommand[] = [];
  private readonly known = new Set<PeripheralId>();
  private readonly connectedElsewhere = new Map<PeripheralId, readonly ServiceId[]>();
  private readonly layouts = new Map<PeripheralId, SimulatedLayout>();
  private authorization: AuthorizationState;
  private opened = false;
  private closed = false;

  constructor(private readonly options: SimulatedRadioSessionOptions = {}) {
    this.authorization = options.authorization ?? "allowedAlways";
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  open(config: SessionConfiguration): void {
    this.record({ type: "OPEN", config });
    this.opened = true;
    this.closed = false;
    if (this.options.initialState) {
      this.deliver({ type: "STATE_CHANGED", state: this.options.initialState });
    }
  }

  close(): void {
    this.record({ type: "CLOSE" });
    this.opened = false;
    this.closed = true;
    this.listeners.clear();
  }

  onEvent(listener: RadioSessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ─── Commands ───────────────────────────────────────────────────

  startScan(filter: readonly ServiceId[] | null, options: ScanOptions): void {
    this.record({ type: "START_SCAN", filter, options });
  }

  stopScan(): void {
    this.record({ type: "STOP_SCAN" });
  }

  connect(peripheralId: PeripheralId, options: ConnectOptions): void {
    this.known.add(peripheralId);
    this.record({ type: "CONNECT", peripheralId, options });
  }

  cancelOrDisconnect(peripheralId: PeripheralId): void {
    this.record({ type: "CANCEL_OR_DISCONNECT", peripheralId });
  }

  discoverServices(
    peripheralId: PeripheralId,
    filter: readonly ServiceId[] | null
  ): void {
    this.record({ type: "DISCOVER_SERVICES", peripheralId, filter });

    const layout = this.layouts.get(peripheralId);
    if (layout) {
      const services = [...layout.keys()].filter(
        (serviceId) => filter === null || filter.includes(serviceId)
      );
      this.deliver({ type: "SERVICES_DISCOVERED", peripheralId, services });
    }
  }

  discoverCharacteristics(
    peripheralId: PeripheralId,
    serviceId: ServiceId,
    filter: readonly CharacteristicId[] | null
  ): void {
    this.record({ type: "DISCOVER_CHARACTERISTICS", peripheralId, serviceId, filter });

    const characteristics = this.layouts.get(peripheralId)?.get(serviceId);
    if (characteristics) {
      this.deliver({
        type: "CHARACTERISTICS_DISCOVERED",
        peripheralId,
        serviceId,
        characteristics: characteristics.filter(
          (c) => filter === null || filter.includes(c.id)
        ),
      });
    }
  }

  // ─── Queries ────────────────────────────────────────────────────

  lookupKnownIdentifier(peripheralId: PeripheralId): PeripheralId | null {
    return this.known.has(peripheralId) ? peripheralId : null;
  }

  lookupConnectedMatchingServices(
    serviceIds: readonly ServiceId[]
  ): readonly PeripheralId[] {
    const matches: PeripheralId[] = [];
    for (const [id, services] of this.connectedElsewhere) {
      if (serviceIds.every((serviceId) => services.includes(serviceId))) {
        matches.push(id);
      }
    }
    return matches;
  }

  getAuthorization(): AuthorizationState {
    return this.authorization;
  }

  // ─── Scripting ──────────────────────────────────────────────────

  /**
   * Delivers an event to the session's listener, as the radio would.
   * Ignored once the session is closed.
   */
  deliver(event: RadioSessionEvent): void {
    if (this.closed) return;
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  setRadioState(state: RadioState): void {
    this.deliver({ type: "STATE_CHANGED", state });
  }

  advertise(
    peripheralId: PeripheralId,
    rssi: number,
    advertisement: AdvertisementData = {}
  ): void {
    this.known.add(peripheralId);
    this.deliver({
      type: "PERIPHERAL_DISCOVERED",
      peripheralId,
      advertisement,
      rssi: createDbm(rssi),
    });
  }

  /** Makes the peripheral answer structural discovery with `layout`. */
  definePeripheral(peripheralId: PeripheralId, layout: SimulatedLayout): void {
    this.layouts.set(peripheralId, layout);
  }

  /** Marks a peripheral as known to the radio from an earlier session. */
  remember(peripheralId: PeripheralId): void {
    this.known.add(peripheralId);
  }

  /** A peripheral connected to the host by some other application. */
  attachConnectedPeripheral(
    peripheralId: PeripheralId,
    services: readonly ServiceId[]
  ): void {
    this.connectedElsewhere.set(peripheralId, services);
  }

  setAuthorization(authorization: AuthorizationState): void {
    this.authorization = authorization;
  }

  get isOpen(): boolean {
    return this.opened;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /** Every command received so far, oldest first. */
  get commands(): readonly RadioCommand[] {
    return [...this.log];
  }

  /** Commands of one type, narrowed to that type. */
  commandsOfType<T extends RadioCommandType>(
    type: T
  ): Extract<RadioCommand, { type: T }>[] {
    return this.log.filter(
      (command): command is Extract<RadioCommand, { type: T }> => command.type === type
    );
  }

  clearCommands(): void {
    this.log.length = 0;
  }

  private record(command: RadioCommand): void {
    this.log.push(command);
  }
}
