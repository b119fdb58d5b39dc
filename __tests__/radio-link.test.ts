import { describe, it, expect, vi } from "vitest";
import { RadioLink } from "../src/radio-link.js";
import { SimulatedRadioSession } from "../src/sessions/simulated.js";
import type {
  SimulatedLayout,
  SimulatedRadioSessionOptions,
} from "../src/sessions/simulated.js";
import {
  ConfigurationError,
  STANDARD_CONNECT_OPTIONS,
  STANDARD_SCAN_CONFIGURATION,
  STANDARD_SESSION_CONFIGURATION,
  createRoute,
  standardConnectionConfiguration,
} from "../src/config/index.js";
import { LinkError } from "../src/interfaces/radio-link.js";
import type { ErrorCallback } from "../src/interfaces/radio-link.js";
import { UnknownRadioError } from "../src/interfaces/radio-session.js";
import type { RadioSessionListener } from "../src/interfaces/radio-session.js";
import type { RadioSessionEvent } from "../src/types/events.js";
import {
  createCharacteristicId,
  createDbm,
  createPeripheralId,
  createServiceId,
  createUnixTimestamp,
} from "../src/types/branded.js";
import type { PeripheralId } from "../src/types/branded.js";
import type { DiscoveredPeripheral, KnownPath } from "../src/types/radio.js";
import { SCANNING_OPERATION } from "../src/types/registry.js";
import type { PendingOperation } from "../src/types/registry.js";
import type {
  PathsResolvedEvent,
  ProtocolAnomalyEvent,
  SessionInitializedEvent,
} from "../src/types/events.js";

// ─── Fixtures ───────────────────────────────────────────────────────

const NOW = createUnixTimestamp(1_700_000_000);

const A = createPeripheralId("peripheral-a");
const B = createPeripheralId("peripheral-b");
const C = createPeripheralId("peripheral-c");

const heartRate = createServiceId("180d");
const measurement = createCharacteristicId("2a37");

const layout: SimulatedLayout = new Map([
  [heartRate, [{ id: measurement, handle: "hr-handle" }]],
]);
const route = createRoute({ "180d": ["2a37"] });

const heartRatePath = (peripheralId: PeripheralId): KnownPath => ({
  peripheralId,
  serviceId: heartRate,
  characteristicId: measurement,
  handle: "hr-handle",
});

function collector(): { errors: LinkError[]; onError: ErrorCallback } {
  const errors: LinkError[] = [];
  return {
    errors,
    onError: (error) => {
      errors.push(error);
    },
  };
}

function ready(
  options: SimulatedRadioSessionOptions = { initialState: "poweredOn" }
): { link: RadioLink; radio: SimulatedRadioSession } {
  const radio = new SimulatedRadioSession(options);
  const link = new RadioLink({ sessionFactory: () => radio, clock: () => NOW });
  link.initializeSession(STANDARD_SESSION_CONFIGURATION);
  return { link, radio };
}

function connect(link: RadioLink, id: PeripheralId, onError: ErrorCallback): void {
  link.connectPeripheral(standardConnectionConfiguration(id, route), onError);
}

const ids = (peripherals: readonly DiscoveredPeripheral[]): PeripheralId[] =>
  peripherals.map((p) => p.id);

const instructions = (operations: readonly PendingOperation[]): string[] =>
  operations.map((op) => `${op.instruction}:${op.addressee?.peripheralId ?? "-"}`);

/**
 * A radio whose unsubscribe does not take effect: it can still reach every
 * listener it was ever given after the facade has let go of it.
 */
class LingeringRadioSession extends SimulatedRadioSession {
  private readonly everyListener = new Set<RadioSessionListener>();

  onEvent(listener: RadioSessionListener): () => void {
    this.everyListener.add(listener);
    return super.onEvent(listener);
  }

  deliverAfterClose(event: RadioSessionEvent): void {
    for (const listener of this.everyListener) {
      listener(event);
    }
  }
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("RadioLink", () => {
  describe("initializeSession()", () => {
    it("should open the session and become ready when the radio powers on", () => {
      const { link, radio } = ready();
      expect(radio.isOpen).toBe(true);
      expect(radio.commands[0]).toEqual({
        type: "OPEN",
        config: STANDARD_SESSION_CONFIGURATION,
      });
      expect(link.systemReady.value).toBe(true);
    });

    it("should follow radio state changes", () => {
      const { link, radio } = ready();
      const seen: boolean[] = [];
      link.systemReady.watch((value) => seen.push(value));
      radio.setRadioState("poweredOff");
      radio.setRadioState("poweredOn");
      expect(seen).toEqual([false, true]);
    });

    it("should replace an earlier session and reset all state", () => {
      const radios: SimulatedRadioSession[] = [];
      const link = new RadioLink({
        sessionFactory: () => {
          const radio = new SimulatedRadioSession({ initialState: "poweredOn" });
          radios.push(radio);
          return radio;
        },
        clock: () => NOW,
      });
      const events: SessionInitializedEvent[] = [];
      link.on("SESSION_INITIALIZED", (event) => events.push(event));

      link.initializeSession(STANDARD_SESSION_CONFIGURATION);
      connect(link, A, collector().onError);
      link.initializeSession({ showPowerAlert: true });

      const [first, second] = radios;
      expect(first!.isOpen).toBe(false);
      expect(first!.listenerCount).toBe(0);
      expect(second!.isOpen).toBe(true);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(link.pendingOperations.value).toEqual([]);
      expect(link.systemReady.value).toBe(true);
      expect(events).toEqual([
        {
          type: "SESSION_INITIALIZED",
          configuration: STANDARD_SESSION_CONFIGURATION,
          replacedPrevious: false,
          timestamp: NOW,
        },
        {
          type: "SESSION_INITIALIZED",
          configuration: { showPowerAlert: true },
          replacedPrevious: true,
          timestamp: NOW,
        },
      ]);
    });

    it("should ignore events from a replaced session", () => {
      const stale = new LingeringRadioSession({ initialState: "poweredOn" });
      const current = new SimulatedRadioSession({ initialState: "poweredOn" });
      const sessions = [stale, current];
      const link = new RadioLink({
        sessionFactory: () => sessions.shift() ?? current,
        clock: () => NOW,
      });
      link.initializeSession(STANDARD_SESSION_CONFIGURATION);
      link.initializeSession(STANDARD_SESSION_CONFIGURATION);

      stale.deliverAfterClose({ type: "STATE_CHANGED", state: "poweredOff" });
      stale.deliverAfterClose({ type: "CONNECTED", peripheralId: A });
      stale.deliverAfterClose({
        type: "PERIPHERAL_DISCOVERED",
        peripheralId: B,
        advertisement: {},
        rssi: createDbm(-50),
      });

      expect(link.systemReady.value).toBe(true);
      expect(link.getDiagnostics().anomalyCount).toBe(0);
      expect(link.availablePeripherals.value).toEqual([]);
    });

    it("should let a view listener issue commands", () => {
      const radio = new SimulatedRadioSession({ initialState: "poweredOn" });
      const link = new RadioLink({ sessionFactory: () => radio });
      const { errors, onError } = collector();
      link.systemReady.watch((isReady) => {
        if (isReady) link.startScanning(STANDARD_SCAN_CONFIGURATION, onError);
      });

      link.initializeSession(STANDARD_SESSION_CONFIGURATION);

      expect(errors).toEqual([]);
      expect(link.scanning.value).toBe(true);
      expect(radio.commandsOfType("START_SCAN")).toHaveLength(1);
    });
  });

  describe("startScanning()", () => {
    it("should reject when the radio is not ready", () => {
      const { link, radio } = ready({});
      const { errors, onError } = collector();
      link.startScanning(STANDARD_SCAN_CONFIGURATION, onError);

      expect(errors.map((e) => e.code)).toEqual(["SYSTEM_NOT_READY"]);
      expect(link.scanning.value).toBe(false);
      expect(radio.commandsOfType("START_SCAN")).toEqual([]);
    });

    it("should reject a second scan and keep one entry", () => {
      const { link, radio } = ready();
      const first = collector();
      const second = collector();

      link.startScanning(STANDARD_SCAN_CONFIGURATION, first.onError);
      link.startScanning(STANDARD_SCAN_CONFIGURATION, second.onError);

      expect(first.errors).toEqual([]);
      expect(second.errors.map((e) => e.code)).toEqual(["INVALID_INSTRUCTION"]);
      expect(link.pendingOperations.value).toEqual([SCANNING_OPERATION]);
      expect(link.scanning.value).toBe(true);
      expect(radio.commandsOfType("START_SCAN")).toEqual([
        { type: "START_SCAN", filter: null, options: { allowDuplicates: false } },
      ]);
    });

    it("should pass the service filter and duplicate reporting to the radio", () => {
      const { link, radio } = ready();
      link.startScanning(
        { serviceIdentifiers: [heartRate], reportDuplicatePeripherals: true },
        collector().onError
      );
      expect(radio.commandsOfType("START_SCAN")).toEqual([
        { type: "START_SCAN", filter: [heartRate], options: { allowDuplicates: true } },
      ]);
    });

    it("should clear peripherals discovered before the scan", () => {
      const { link, radio } = ready();
      radio.advertise(A, -50);
      expect(ids(link.availablePeripherals.value)).toEqual([A]);

      link.startScanning(STANDARD_SCAN_CONFIGURATION, collector().onError);
      expect(link.availablePeripherals.value).toEqual([]);
    });
  });

  describe("stopScanning()", () => {
    it("should reject when no scan is running", () => {
      const { link, radio } = ready();
      const { errors, onError } = collector();
      link.stopScanning(onError);
      expect(errors.map((e) => e.code)).toEqual(["INVALID_INSTRUCTION"]);
      expect(radio.commandsOfType("STOP_SCAN")).toEqual([]);
    });

    it("should stop the radio and clear the scanning entry", () => {
      const { link, radio } = ready();
      link.startScanning(STANDARD_SCAN_CONFIGURATION, collector().onError);
      link.stopScanning(collector().onError);
      expect(link.scanning.value).toBe(false);
      expect(radio.commandsOfType("STOP_SCAN")).toHaveLength(1);
    });
  });

  describe("availablePeripherals", () => {
    it("should order peripherals by signal strength as reports arrive", () => {
      const { link, radio } = ready();
      link.startScanning(STANDARD_SCAN_CONFIGURATION, collector().onError);
      const seen: PeripheralId[][] = [];
      link.availablePeripherals.watch((list) => seen.push(ids(list)));

      radio.advertise(A, -40);
      radio.advertise(B, -70);
      expect(ids(link.availablePeripherals.value)).toEqual([A, B]);

      radio.advertise(B, -30);
      expect(ids(link.availablePeripherals.value)).toEqual([B, A]);
      expect(seen).toEqual([[A], [A, B], [B, A]]);
    });

    it("should keep the latest report for each peripheral", () => {
      const { link, radio } = ready();
      radio.advertise(A, -60, { localName: "Band" });
      radio.advertise(A, -45, { localName: "Band v2" });
      expect(link.availablePeripherals.value).toEqual([
        { id: A, advertisement: { localName: "Band v2" }, rssi: -45, discoveredAt: NOW },
      ]);
    });
  });

  describe("connectPeripheral()", () => {
    it("should track the attempt and issue the connect", () => {
      const { link, radio } = ready();
      const { onError } = collector();
      connect(link, A, onError);

      expect([...link.connectingPeripherals.value]).toEqual([A]);
      expect(link.pendingOperations.value).toEqual([
        { instruction: "CONNECTING", addressee: { peripheralId: A, onError, route } },
      ]);
      expect(radio.commandsOfType("CONNECT")).toEqual([
        { type: "CONNECT", peripheralId: A, options: STANDARD_CONNECT_OPTIONS },
      ]);
    });

    it("should resolve paths before reporting the peripheral connected", () => {
      const { link, radio } = ready();
      radio.definePeripheral(A, layout);
      const { errors, onError } = collector();
      const resolved: PathsResolvedEvent[] = [];
      link.on("PATHS_RESOLVED", (event) => resolved.push(event));
      const pathsWhenConnected: number[] = [];
      link.connectedPeripherals.watch(() => {
        pathsWhenConnected.push(link.knownPaths.value.length);
      });

      connect(link, A, onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });

      expect(errors).toEqual([]);
      expect([...link.connectedPeripherals.value]).toEqual([A]);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(link.pendingOperations.value).toEqual([]);
      expect(link.knownPaths.value).toEqual([heartRatePath(A)]);
      expect(pathsWhenConnected).toEqual([1]);
      expect(resolved).toEqual([
        { type: "PATHS_RESOLVED", peripheralId: A, paths: [heartRatePath(A)], timestamp: NOW },
      ]);
      expect(radio.commandsOfType("DISCOVER_SERVICES")).toEqual([
        { type: "DISCOVER_SERVICES", peripheralId: A, filter: [heartRate] },
      ]);
      expect(radio.commandsOfType("DISCOVER_CHARACTERISTICS")).toEqual([
        {
          type: "DISCOVER_CHARACTERISTICS",
          peripheralId: A,
          serviceId: heartRate,
          filter: [measurement],
        },
      ]);
    });

    it("should reject a second connect to the same peripheral", () => {
      const { link, radio } = ready();
      const first = collector();
      const second = collector();
      connect(link, A, first.onError);
      connect(link, A, second.onError);

      expect(first.errors).toEqual([]);
      expect(second.errors.map((e) => e.code)).toEqual(["INVALID_INSTRUCTION"]);
      expect(second.errors[0]!.peripheralId).toBe(A);
      expect(radio.commandsOfType("CONNECT")).toHaveLength(1);
    });

    it("should reject a connect to a connected peripheral", () => {
      const { link, radio } = ready();
      radio.definePeripheral(A, layout);
      connect(link, A, collector().onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });

      const { errors, onError } = collector();
      connect(link, A, onError);
      expect(errors.map((e) => e.code)).toEqual(["INVALID_INSTRUCTION"]);
      expect(link.connectingPeripherals.value.size).toBe(0);
    });

    it("should reject when the radio is not ready", () => {
      const { link, radio } = ready({ initialState: "poweredOff" });
      const { errors, onError } = collector();
      connect(link, A, onError);
      expect(errors.map((e) => e.code)).toEqual(["SYSTEM_NOT_READY"]);
      expect(radio.commandsOfType("CONNECT")).toEqual([]);
    });

    it("should reject a connect while the peripheral is still disconnecting", () => {
      const { link, radio } = ready();
      radio.definePeripheral(A, layout);
      connect(link, A, collector().onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });
      link.cancelConnection(A, collector().onError);

      const { errors, onError } = collector();
      connect(link, A, onError);

      expect(errors.map((e) => [e.code, e.peripheralId])).toEqual([["INVALID_INSTRUCTION", A]]);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(instructions(link.pendingOperations.value)).toEqual([`DISCONNECTING:${A}`]);
      expect(radio.commandsOfType("CONNECT")).toHaveLength(1);
    });

    it("should throw on an invalid start delay", () => {
      const { link } = ready();
      expect(() =>
        link.connectPeripheral(
          {
            peripheralId: A,
            route: null,
            options: { ...STANDARD_CONNECT_OPTIONS, startDelaySeconds: -1 },
          },
          collector().onError
        )
      ).toThrow(ConfigurationError);
      expect(link.connectingPeripherals.value.size).toBe(0);
    });
  });

  describe("invalid connect options from a listener", () => {
    it("should surface the error to the caller that started the task", () => {
      const { link, radio } = ready();
      const { errors, onError } = collector();
      let fired = false;
      link.availablePeripherals.watch(() => {
        if (fired) return;
        fired = true;
        link.startScanning(STANDARD_SCAN_CONFIGURATION, onError);
        link.connectPeripheral(
          {
            peripheralId: A,
            route: null,
            options: { ...STANDARD_CONNECT_OPTIONS, startDelaySeconds: 2.5 },
          },
          onError
        );
      });

      expect(() => radio.advertise(A, -40)).toThrow(ConfigurationError);
      expect(link.scanning.value).toBe(true);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(radio.commandsOfType("CONNECT")).toEqual([]);
      expect(errors).toEqual([]);
    });
  });

  describe("connect failure", () => {
    it("should route the radio's error to the caller", () => {
      const { link, radio } = ready();
      const { errors, onError } = collector();
      const failure = new Error("peer rejected");
      connect(link, A, onError);
      radio.deliver({ type: "CONNECT_FAILED", peripheralId: A, error: failure });

      expect(errors).toHaveLength(1);
      expect(errors[0]).toBeInstanceOf(LinkError);
      expect(errors[0]!.code).toBe("RADIO_ERROR");
      expect(errors[0]!.cause).toBe(failure);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(link.connectedPeripherals.value.size).toBe(0);
      expect(link.pendingOperations.value).toEqual([]);
    });

    it("should supply a cause when the radio gives none", () => {
      const { link, radio } = ready();
      const { errors, onError } = collector();
      connect(link, A, onError);
      radio.deliver({ type: "CONNECT_FAILED", peripheralId: A });

      expect(errors).toHaveLength(1);
      expect(errors[0]!.cause).toBeInstanceOf(UnknownRadioError);
    });
  });

  describe("path discovery failure", () => {
    it("should report the error, never connect, and tear the link down", () => {
      const { link, radio } = ready();
      const failure = new Error("attribute table unavailable");
      const cancelsAtCallback: number[] = [];
      const errors: LinkError[] = [];
      const connectedSeen: PeripheralId[][] = [];
      link.connectedPeripherals.watch((set) => connectedSeen.push([...set]));

      connect(link, A, (error) => {
        errors.push(error);
        cancelsAtCallback.push(radio.commandsOfType("CANCEL_OR_DISCONNECT").length);
      });
      radio.deliver({ type: "CONNECTED", peripheralId: A });
      radio.deliver({
        type: "SERVICES_DISCOVERED",
        peripheralId: A,
        services: [],
        error: failure,
      });

      expect(errors).toHaveLength(1);
      expect(errors[0]!.code).toBe("RADIO_ERROR");
      expect(errors[0]!.peripheralId).toBe(A);
      expect(errors[0]!.cause).toBe(failure);
      expect(cancelsAtCallback).toEqual([0]);
      expect(radio.commandsOfType("CANCEL_OR_DISCONNECT")).toEqual([
        { type: "CANCEL_OR_DISCONNECT", peripheralId: A },
      ]);
      expect(connectedSeen).toEqual([]);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(instructions(link.pendingOperations.value)).toEqual([`DISCONNECTING:${A}`]);

      radio.deliver({ type: "DISCONNECTED", peripheralId: A });
      expect(link.pendingOperations.value).toEqual([]);
      expect(errors).toHaveLength(1);
    });

    it("should reject a retry issued from the failure callback", () => {
      const { link, radio } = ready();
      const retry = collector();
      const failures: LinkError[] = [];

      connect(link, A, (error) => {
        failures.push(error);
        connect(link, A, retry.onError);
      });
      radio.deliver({ type: "CONNECTED", peripheralId: A });
      radio.deliver({
        type: "SERVICES_DISCOVERED",
        peripheralId: A,
        services: [],
        error: new Error("attribute table unavailable"),
      });

      expect(failures).toHaveLength(1);
      expect(retry.errors.map((e) => e.code)).toEqual(["INVALID_INSTRUCTION"]);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(instructions(link.pendingOperations.value)).toEqual([`DISCONNECTING:${A}`]);
      expect(radio.commandsOfType("CONNECT")).toHaveLength(1);

      radio.deliver({ type: "DISCONNECTED", peripheralId: A });
      connect(link, A, retry.onError);
      expect(retry.errors).toHaveLength(1);
      expect([...link.connectingPeripherals.value]).toEqual([A]);
    });
  });

  describe("cancelConnection()", () => {
    it("should reject an unknown peripheral without touching state", () => {
      const { link, radio } = ready();
      connect(link, A, collector().onError);
      const pendingListener = vi.fn();
      link.pendingOperations.watch(pendingListener);

      const { errors, onError } = collector();
      link.cancelConnection(B, onError);

      expect(errors.map((e) => e.code)).toEqual(["UNKNOWN_DEVICE"]);
      expect(pendingListener).not.toHaveBeenCalled();
      expect(instructions(link.pendingOperations.value)).toEqual([`CONNECTING:${A}`]);
      expect(radio.commandsOfType("CANCEL_OR_DISCONNECT")).toEqual([]);
    });

    it("should cancel a pending connect", () => {
      const { link, radio } = ready();
      const connectErrors = collector();
      const cancelErrors = collector();
      connect(link, A, connectErrors.onError);
      link.cancelConnection(A, cancelErrors.onError);

      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(instructions(link.pendingOperations.value)).toEqual([
        `CONNECTING:${A}`,
        `DISCONNECTING:${A}`,
      ]);
      expect(radio.commandsOfType("CANCEL_OR_DISCONNECT")).toHaveLength(1);

      radio.deliver({ type: "DISCONNECTED", peripheralId: A });
      expect(link.pendingOperations.value).toEqual([]);
      expect(connectErrors.errors).toEqual([]);
      expect(cancelErrors.errors).toEqual([]);
    });

    it("should reject a second cancel while the first is pending", () => {
      const { link } = ready();
      connect(link, A, collector().onError);
      link.cancelConnection(A, collector().onError);

      const { errors, onError } = collector();
      link.cancelConnection(A, onError);
      expect(errors.map((e) => e.code)).toEqual(["INVALID_INSTRUCTION"]);
    });

    it("should skip path discovery for a connect that lands during teardown", () => {
      const { link, radio } = ready();
      radio.definePeripheral(A, layout);
      connect(link, A, collector().onError);
      link.cancelConnection(A, collector().onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });

      expect(radio.commandsOfType("DISCOVER_SERVICES")).toEqual([]);
      expect(link.connectedPeripherals.value.size).toBe(0);
      expect(link.getDiagnostics().anomalyCount).toBe(0);
    });

    it("should disconnect a connected peripheral and prune its paths", () => {
      const { link, radio } = ready();
      radio.definePeripheral(A, layout);
      connect(link, A, collector().onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });

      link.cancelConnection(A, collector().onError);
      expect(link.connectedPeripherals.value.size).toBe(0);
      expect(link.knownPaths.value).toEqual([heartRatePath(A)]);

      radio.deliver({ type: "DISCONNECTED", peripheralId: A });
      expect(link.knownPaths.value).toEqual([]);

      const lookup = link.lookupPath(A, heartRate, measurement);
      expect(lookup.ok).toBe(false);
      if (!lookup.ok) expect(lookup.error.code).toBe("UNKNOWN_PATH");

      const { errors, onError } = collector();
      connect(link, A, onError);
      expect(errors).toEqual([]);
      expect(radio.commandsOfType("CONNECT")).toHaveLength(2);
      expect([...link.connectingPeripherals.value]).toEqual([A]);
    });
  });

  describe("disconnection", () => {
    it("should fail every pending operation when the radio reports an error", () => {
      const { link, radio } = ready();
      const connectErrors = collector();
      const cancelErrors = collector();
      const failure = new Error("supervision timeout");
      connect(link, A, connectErrors.onError);
      link.cancelConnection(A, cancelErrors.onError);

      radio.deliver({ type: "DISCONNECTED", peripheralId: A, error: failure });

      expect(connectErrors.errors.map((e) => [e.code, e.cause])).toEqual([
        ["RADIO_ERROR", failure],
      ]);
      expect(cancelErrors.errors.map((e) => [e.code, e.cause])).toEqual([
        ["RADIO_ERROR", failure],
      ]);
      expect(link.pendingOperations.value).toEqual([]);
    });

    it("should call every callback even when one throws", () => {
      const { link, radio } = ready();
      const cancelErrors = collector();
      connect(link, A, () => {
        throw new Error("listener failure");
      });
      link.cancelConnection(A, cancelErrors.onError);

      expect(() =>
        radio.deliver({ type: "DISCONNECTED", peripheralId: A, error: new Error("link lost") })
      ).toThrow("listener failure");

      expect(cancelErrors.errors.map((e) => e.code)).toEqual(["RADIO_ERROR"]);
      expect(link.pendingOperations.value).toEqual([]);
      expect(link.connectingPeripherals.value.size).toBe(0);
    });

    it("should clear a peripheral that drops on its own", () => {
      const { link, radio } = ready();
      radio.definePeripheral(A, layout);
      radio.definePeripheral(B, layout);
      connect(link, A, collector().onError);
      connect(link, B, collector().onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });
      radio.deliver({ type: "CONNECTED", peripheralId: B });

      radio.deliver({ type: "DISCONNECTED", peripheralId: A, error: new Error("out of range") });

      expect([...link.connectedPeripherals.value]).toEqual([B]);
      expect(link.knownPaths.value).toEqual([heartRatePath(B)]);
    });
  });

  describe("protocol anomalies", () => {
    it("should count terminal events that match no pending connect", () => {
      const { link, radio } = ready();
      const anomalies: ProtocolAnomalyEvent[] = [];
      link.on("PROTOCOL_ANOMALY", (event) => anomalies.push(event));

      radio.deliver({ type: "CONNECTED", peripheralId: C });
      radio.deliver({ type: "CONNECT_FAILED", peripheralId: C });

      expect(link.getDiagnostics()).toEqual({
        anomalyCount: 2,
        lastAnomaly: { kind: "UNEXPECTED_CONNECT_FAILURE", peripheralId: C, timestamp: NOW },
      });
      expect(anomalies.map((e) => [e.anomaly.kind, e.total])).toEqual([
        ["UNEXPECTED_CONNECT", 1],
        ["UNEXPECTED_CONNECT_FAILURE", 2],
      ]);
      expect(link.connectedPeripherals.value.size).toBe(0);
    });

    it("should count a repeated connect while paths are resolving", () => {
      const { link, radio } = ready();
      connect(link, A, collector().onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });
      radio.deliver({ type: "CONNECTED", peripheralId: A });

      expect(link.getDiagnostics().anomalyCount).toBe(1);
      expect(radio.commandsOfType("DISCOVER_SERVICES")).toHaveLength(1);
    });

    it("should start with a clean record", () => {
      const { link } = ready();
      expect(link.getDiagnostics()).toEqual({ anomalyCount: 0, lastAnomaly: null });
    });
  });

  describe("reconnectToPeripheral()", () => {
    it("should connect to a peripheral the radio remembers", () => {
      const { link, radio } = ready();
      radio.remember(A);
      link.reconnectToPeripheral(
        { peripheralId: A, serviceIdentifiers: [], route, options: STANDARD_CONNECT_OPTIONS },
        collector().onError
      );
      expect(radio.commandsOfType("CONNECT").map((c) => c.peripheralId)).toEqual([A]);
      expect([...link.connectingPeripherals.value]).toEqual([A]);
    });

    it("should fall back to a peripheral connected elsewhere with the services", () => {
      const { link, radio } = ready();
      radio.attachConnectedPeripheral(B, [heartRate]);
      link.reconnectToPeripheral(
        { peripheralId: C, serviceIdentifiers: [heartRate], route, options: STANDARD_CONNECT_OPTIONS },
        collector().onError
      );
      expect(radio.commandsOfType("CONNECT").map((c) => c.peripheralId)).toEqual([B]);
    });

    it("should reject a peripheral that cannot be resolved", () => {
      const { link, radio } = ready();
      const { errors, onError } = collector();
      link.reconnectToPeripheral(
        { peripheralId: C, serviceIdentifiers: [], route: null, options: STANDARD_CONNECT_OPTIONS },
        onError
      );
      expect(errors.map((e) => [e.code, e.peripheralId])).toEqual([["UNKNOWN_DEVICE", C]]);
      expect(radio.commandsOfType("CONNECT")).toEqual([]);
    });
  });

  describe("lookupPath()", () => {
    it("should return a resolved path", () => {
      const { link, radio } = ready();
      radio.definePeripheral(A, layout);
      connect(link, A, collector().onError);
      radio.deliver({ type: "CONNECTED", peripheralId: A });

      expect(link.lookupPath(A, heartRate, measurement)).toEqual({
        ok: true,
        value: heartRatePath(A),
      });
    });
  });

  describe("troubleshootSystemReady()", () => {
    it("should report no state before a session exists", () => {
      const link = new RadioLink({ sessionFactory: () => new SimulatedRadioSession() });
      expect(link.troubleshootSystemReady()).toEqual({
        radioState: null,
        authorization: "notDetermined",
      });
    });

    it("should report the radio state and authorization", () => {
      const { link } = ready({ initialState: "unauthorized", authorization: "denied" });
      expect(link.systemReady.value).toBe(false);
      expect(link.troubleshootSystemReady()).toEqual({
        radioState: "unauthorized",
        authorization: "denied",
      });
    });
  });

  describe("shutdown()", () => {
    it("should close the session and clear every view", () => {
      const { link, radio } = ready();
      link.startScanning(STANDARD_SCAN_CONFIGURATION, collector().onError);
      radio.advertise(A, -40);
      connect(link, A, collector().onError);

      link.shutdown();

      expect(radio.isOpen).toBe(false);
      expect(link.systemReady.value).toBe(false);
      expect(link.scanning.value).toBe(false);
      expect(link.availablePeripherals.value).toEqual([]);
      expect(link.connectingPeripherals.value.size).toBe(0);
      expect(link.pendingOperations.value).toEqual([]);

      const { errors, onError } = collector();
      link.startScanning(STANDARD_SCAN_CONFIGURATION, onError);
      expect(errors.map((e) => e.code)).toEqual(["SYSTEM_NOT_READY"]);
    });

    it("should drop facade event listeners", () => {
      const { link, radio } = ready();
      const listener = vi.fn();
      link.on("PROTOCOL_ANOMALY", listener);

      link.shutdown();
      link.initializeSession(STANDARD_SESSION_CONFIGURATION);
      radio.deliver({ type: "CONNECTED", peripheralId: C });

      expect(link.getDiagnostics().anomalyCount).toBe(1);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("invariants under random sequences", () => {
    function generator(seed: number): () => number {
      let state = seed >>> 0;
      return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 0x100000000;
      };
    }

    const peripherals = ["p0", "p1", "p2"].map(createPeripheralId);

    function check(link: RadioLink): void {
      const connecting = link.connectingPeripherals.value;
      const connected = link.connectedPeripherals.value;
      const pending = link.pendingOperations.value;
      const keys = instructions(pending);

      expect(new Set(keys).size).toBe(keys.length);
      for (const id of connecting) {
        expect(connected.has(id)).toBe(false);
        expect(keys).toContain(`CONNECTING:${id}`);
      }
      for (const path of link.knownPaths.value) {
        const settled =
          connected.has(path.peripheralId) ||
          keys.includes(`DISCONNECTING:${path.peripheralId}`);
        expect(settled).toBe(true);
      }
    }

    it.each([3, 17, 256, 4096])("should hold across 400 steps (seed %i)", (seed) => {
      const { link, radio } = ready();
      // p2 has no layout, so its path discovery stays open until an error lands.
      radio.definePeripheral(peripherals[0]!, layout);
      radio.definePeripheral(peripherals[1]!, layout);
      const next = generator(seed);
      const { onError } = collector();

      for (let step = 0; step < 400; step++) {
        const id = peripherals[Math.floor(next() * peripherals.length)] ?? A;
        const roll = next();

        if (roll < 0.25) {
          connect(link, id, onError);
        } else if (roll < 0.45) {
          link.cancelConnection(id, onError);
        } else if (roll < 0.6) {
          radio.deliver({ type: "CONNECTED", peripheralId: id });
        } else if (roll < 0.7) {
          radio.deliver({ type: "CONNECT_FAILED", peripheralId: id });
        } else if (roll < 0.85) {
          radio.deliver({ type: "DISCONNECTED", peripheralId: id });
        } else {
          radio.deliver({
            type: "SERVICES_DISCOVERED",
            peripheralId: id,
            services: [],
            error: new Error("gatt"),
          });
        }

        check(link);
      }
    });
  });
});
