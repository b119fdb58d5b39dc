/**
 * @module radio-link
 * @description RadioLink — the session facade that wires the registry,
 * state containers, path discoverers and the Radio Session together.
 *
 * Every command and every radio event runs as one task on a single
 * mutation queue, so registry and container updates never interleave.
 * Views are broadcast after each task completes.
 *
 * Connection lifecycle, per peripheral:
 * - `connectPeripheral` → connecting set + CONNECTING entry → `connect`
 * - CONNECTED → path discovery → connected set, entry removed
 * - CONNECT_FAILED / discovery failure → entry removed, caller's onError
 * - `cancelConnection` → both sets cleared + DISCONNECTING entry →
 *   `cancelOrDisconnect`
 * - DISCONNECTED → every entry for the peripheral removed, paths pruned
 *
 * @example
 * ```ts
 * const link = new RadioLink({ sessionFactory: () => new SimulatedRadioSession() });
 * link.initializeSession(STANDARD_SESSION_CONFIGURATION);
 *
 * link.systemReady.subscribe((ready) => {
 *   if (ready) link.startScanning(STANDARD_SCAN_CONFIGURATION, console.error);
 * });
 * link.availablePeripherals.subscribe((list) => render(list));
 * ```
 */

import { TypedEmitter } from "./primitives/base-emitter.js";
import { MutationQueue } from "./primitives/mutation-queue.js";
import { StateContainer } from "./primitives/state-container.js";
import { OperationRegistry } from "./primitives/operation-registry.js";
import { PathDiscoverer } from "./primitives/path-discoverer.js";
import {
  formatAvailablePeripherals,
  formatIdentifierSet,
  formatScanning,
  formatSystemReady,
  prunePaths,
  replacePaths,
  upsertPeripheral,
  withIdentifier,
  withoutIdentifier,
} from "./primitives/formatting.js";
import type { IRadioLink, ErrorCallback, RadioLinkDiagnostics } from "./interfaces/radio-link.js";
import { LinkError } from "./interfaces/radio-link.js";
import type { IRadioSession, RadioSessionFactory } from "./interfaces/radio-session.js";
import { UnknownRadioError } from "./interfaces/radio-session.js";
import { RegistryError } from "./interfaces/operation-registry.js";
import type { ReadonlyView } from "./interfaces/state-container.js";
import type { PathDiscoveryOutcome } from "./interfaces/path-discoverer.js";
import {
  connectionFromReconnect,
  scanOptionsFrom,
  validateConnectOptions,
} from "./config/index.js";
import { createLogger } from "./logging/logger.js";
import { DEFAULT_LOG_NAMESPACE } from "./logging/logger.js";
import type { Logger } from "./logging/logger.js";
import type {
  PeripheralId,
  ServiceId,
  CharacteristicId,
  UnixTimestamp,
} from "./types/branded.js";
import { createUnixTimestamp } from "./types/branded.js";
import type {
  DiscoveredPeripheral,
  KnownPath,
  RadioState,
  ReadinessTroubleshooting,
} from "./types/radio.js";
import type {
  ConnectionConfiguration,
  ReconnectConfiguration,
  ScanConfiguration,
  SessionConfiguration,
} from "./types/config.js";
import type {
  AddressedInstruction,
  ConnectingOperation,
  OperationFor,
  PendingOperation,
} from "./types/registry.js";
import { SCANNING_OPERATION } from "./types/registry.js";
import type {
  AnomalyKind,
  ProtocolAnomaly,
  RadioLinkEvent,
  RadioLinkEventMap,
  RadioSessionEvent,
} from "./types/events.js";
import type { IRadioLinkEmitter } from "./interfaces/event-emitter.js";
import type { Result } from "./types/result.js";
import { ok, err } from "./types/result.js";

// ─── Configuration ────────────────────────────────────────────────

export interface RadioLinkConfig {
  /** Creates the Radio Session opened by `initializeSession`. */
  sessionFactory: RadioSessionFactory;
  /** Root `debug` namespace. Default: "radio-link" */
  logNamespace?: string;
  /** Timestamp source for discovery records and events. Default: wall clock, seconds. */
  clock?: () => UnixTimestamp;
}

const wallClock = (): UnixTimestamp => createUnixTimestamp();

// ─── Facade ───────────────────────────────────────────────────────

export class RadioLink
  extends TypedEmitter<RadioLinkEventMap>
  implements IRadioLink, IRadioLinkEmitter
{
  private readonly config: Required<RadioLinkConfig>;
  private readonly log: Logger;
  private readonly queue: MutationQueue;

  private session: IRadioSession | null = null;
  private sessionUnsub: (() => void) | null = null;

  // State containers
  private readonly radioState: StateContainer<RadioState | null>;
  private readonly discovered: StateContainer<ReadonlyMap<PeripheralId, DiscoveredPeripheral>>;
  private readonly connecting: StateContainer<ReadonlySet<PeripheralId>>;
  private readonly connected: StateContainer<ReadonlySet<PeripheralId>>;
  private readonly paths: StateContainer<readonly KnownPath[]>;
  private readonly registry: OperationRegistry;

  /** In-flight path resolution, one per connecting peripheral. */
  private readonly discoverers = new Map<PeripheralId, PathDiscoverer>();

  private anomalyCount = 0;
  private lastAnomaly: ProtocolAnomaly | null = null;

  // Views
  readonly systemReady: ReadonlyView<boolean>;
  readonly scanning: ReadonlyView<boolean>;
  readonly availablePeripherals: ReadonlyView<readonly DiscoveredPeripheral[]>;
  readonly connectingPeripherals: ReadonlyView<ReadonlySet<PeripheralId>>;
  readonly connectedPeripherals: ReadonlyView<ReadonlySet<PeripheralId>>;
  readonly knownPaths: ReadonlyView<readonly KnownPath[]>;
  readonly pendingOperations: ReadonlyView<readonly PendingOperation[]>;

  constructor(config: RadioLinkConfig) {
    super();
    this.config = {
      sessionFactory: config.sessionFactory,
      logNamespace: config.logNamespace ?? DEFAULT_LOG_NAMESPACE,
      clock: config.clock ?? wallClock,
    };
    this.log = createLogger("link", this.config.logNamespace);
    this.queue = new MutationQueue(this.log.child("queue"));

    const schedule = this.queue.schedule;
    this.radioState = new StateContainer<RadioState | null>(null, schedule);
    this.discovered = new StateContainer<ReadonlyMap<PeripheralId, DiscoveredPeripheral>>(
      new Map(),
      schedule
    );
    this.connecting = new StateContainer<ReadonlySet<PeripheralId>>(new Set(), schedule);
    this.connected = new StateContainer<ReadonlySet<PeripheralId>>(new Set(), schedule);
    this.paths = new StateContainer<readonly KnownPath[]>([], schedule);
    this.registry = new OperationRegistry(schedule);

    this.systemReady = this.radioState.map(formatSystemReady);
    this.scanning = this.registry.snapshot.map(formatScanning);
    this.availablePeripherals = this.discovered.map(formatAvailablePeripherals);
    this.connectingPeripherals = this.connecting.map(formatIdentifierSet);
    this.connectedPeripherals = this.connected.map(formatIdentifierSet);
    this.knownPaths = this.paths.asView();
    this.pendingOperations = this.registry.snapshot;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  initializeSession(configuration: SessionConfiguration): void {
    this.queue.submit(() => {
      const replacedPrevious = this.session !== null;
      if (replacedPrevious) {
        this.log.debug("replacing radio session");
        this.closeSession();
      }

      const session = this.config.sessionFactory();
      this.session = session;
      this.sessionUnsub = session.onEvent((event) => {
        this.queue.submit(() => this.handleEvent(session, event));
      });

      this.emitAfterTask({
        type: "SESSION_INITIALIZED",
        configuration,
        replacedPrevious,
        timestamp: this.config.clock(),
      });
      session.open(configuration);
    });
  }

  shutdown(): void {
    this.queue.submit(() => {
      if (this.session) {
        this.log.debug("shutting down");
        this.closeSession();
      }
    });
    this.removeAllListeners();
  }

  // ─── Commands ───────────────────────────────────────────────────

  startScanning(config: ScanConfiguration, onError: ErrorCallback): void {
    this.queue.submit(() => {
      const session = this.readySession(onError);
      if (!session) return;

      if (this.registry.contains("SCANNING")) {
        this.reject(onError, new LinkError("A scan is already running", "INVALID_INSTRUCTION"));
        return;
      }

      this.registry.insert(SCANNING_OPERATION);
      this.discovered.set(new Map());
      this.log.debug("scan started (filter: %o)", config.serviceIdentifiers ?? "none");
      session.startScan(config.serviceIdentifiers, scanOptionsFrom(config));
    });
  }

  stopScanning(onError: ErrorCallback): void {
    this.queue.submit(() => {
      if (!this.registry.contains("SCANNING")) {
        this.reject(onError, new LinkError("No scan is running", "INVALID_INSTRUCTION"));
        return;
      }

      this.session?.stopScan();
      this.registry.remove(SCANNING_OPERATION);
      this.log.debug("scan stopped");
    });
  }

  connectPeripheral(config: ConnectionConfiguration, onError: ErrorCallback): void {
    validateConnectOptions(config.options);
    this.queue.submit(() => this.connectNow(config, onError));
  }

  cancelConnection(peripheralId: PeripheralId, onError: ErrorCallback): void {
    this.queue.submit(() => {
      const session = this.readySession(onError, peripheralId);
      if (!session) return;

      if (this.registry.contains("DISCONNECTING", peripheralId)) {
        this.reject(
          onError,
          new LinkError(`Already disconnecting from ${peripheralId}`, "INVALID_INSTRUCTION", peripheralId)
        );
        return;
      }

      if (!this.connecting.value.has(peripheralId) && !this.connected.value.has(peripheralId)) {
        this.reject(
          onError,
          new LinkError(`${peripheralId} is neither connecting nor connected`, "UNKNOWN_DEVICE", peripheralId)
        );
        return;
      }

      this.beginTeardown(session, peripheralId, onError);
    });
  }

  reconnectToPeripheral(config: ReconnectConfiguration, onError: ErrorCallback): void {
    validateConnectOptions(config.options);
    this.queue.submit(() => {
      const session = this.readySession(onError, config.peripheralId);
      if (!session) return;

      const resolved =
        session.lookupKnownIdentifier(config.peripheralId) ??
        (config.serviceIdentifiers.length > 0
          ? session.lookupConnectedMatchingServices(config.serviceIdentifiers)[0]
          : undefined) ??
        null;

      if (resolved === null) {
        this.reject(
          onError,
          new LinkError(`Cannot resolve ${config.peripheralId}`, "UNKNOWN_DEVICE", config.peripheralId)
        );
        return;
      }

      this.log.debug("reconnect %s resolved to %s", config.peripheralId, resolved);
      this.connectNow(connectionFromReconnect(config, resolved), onError);
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  lookupPath(
    peripheralId: PeripheralId,
    serviceId: ServiceId,
    characteristicId: CharacteristicId
  ): Result<KnownPath, LinkError> {
    const path = this.paths.value.find(
      (candidate) =>
        candidate.peripheralId === peripheralId &&
        candidate.serviceId === serviceId &&
        candidate.characteristicId === characteristicId
    );
    if (!path) {
      return err(
        new LinkError(
          `No path ${serviceId}/${characteristicId} on ${peripheralId}`,
          "UNKNOWN_PATH",
          peripheralId
        )
      );
    }
    return ok(path);
  }

  troubleshootSystemReady(): ReadinessTroubleshooting {
    return {
      radioState: this.radioState.value,
      authorization: this.session?.getAuthorization() ?? "notDetermined",
    };
  }

  getDiagnostics(): RadioLinkDiagnostics {
    return { anomalyCount: this.anomalyCount, lastAnomaly: this.lastAnomaly };
  }

  // ─── Command Internals ──────────────────────────────────────────

  private connectNow(config: ConnectionConfiguration, onError: ErrorCallback): void {
    const { peripheralId } = config;
    const session = this.readySession(onError, peripheralId);
    if (!session) return;

    if (this.registry.contains("CONNECTING", peripheralId)) {
      this.reject(
        onError,
        new LinkError(`Already connecting to ${peripheralId}`, "INVALID_INSTRUCTION", peripheralId)
      );
      return;
    }

    if (this.connected.value.has(peripheralId)) {
      this.reject(
        onError,
        new LinkError(`Already connected to ${peripheralId}`, "INVALID_INSTRUCTION", peripheralId)
      );
      return;
    }

    if (this.registry.contains("DISCONNECTING", peripheralId)) {
      // The pending DISCONNECTED would settle the new attempt silently.
      this.reject(
        onError,
        new LinkError(`Still disconnecting from ${peripheralId}`, "INVALID_INSTRUCTION", peripheralId)
      );
      return;
    }

    this.connecting.update((ids) => withIdentifier(ids, peripheralId));
    this.registry.insert({
      instruction: "CONNECTING",
      addressee: { peripheralId, onError, route: config.route },
    });
    this.log.debug("connecting to %s", peripheralId);
    session.connect(peripheralId, config.options);
  }

  /**
   * Optimistic teardown shared by `cancelConnection` and failed path
   * discovery: clears both sets, records the disconnect and issues it.
   */
  private beginTeardown(
    session: IRadioSession,
    peripheralId: PeripheralId,
    onError: ErrorCallback
  ): void {
    this.disposeDiscoverer(peripheralId);
    this.connecting.update((ids) => withoutIdentifier(ids, peripheralId));
    this.connected.update((ids) => withoutIdentifier(ids, peripheralId));
    this.registry.insert({
      instruction: "DISCONNECTING",
      addressee: { peripheralId, onError },
    });
    this.log.debug("disconnecting from %s", peripheralId);
    session.cancelOrDisconnect(peripheralId);
  }

  /** The open session if the radio is powered on; rejects otherwise. */
  private readySession(
    onError: ErrorCallback,
    peripheralId: PeripheralId | null = null
  ): IRadioSession | null {
    if (!this.session || !formatSystemReady(this.radioState.value)) {
      this.reject(
        onError,
        new LinkError(
          `Radio is not ready (state: ${this.radioState.value ?? "no session"})`,
          "SYSTEM_NOT_READY",
          peripheralId
        )
      );
      return null;
    }
    return this.session;
  }

  private reject(onError: ErrorCallback, error: LinkError): void {
    this.log.debug("rejected: %s (%s)", error.message, error.code);
    onError(error);
  }

  // ─── Event Handling ─────────────────────────────────────────────

  private handleEvent(session: IRadioSession, event: RadioSessionEvent): void {
    if (session !== this.session) {
      // Stream of a replaced or closed session.
      return;
    }

    switch (event.type) {
      case "STATE_CHANGED":
        this.log.debug("radio state: %s", event.state);
        this.radioState.set(event.state);
        break;

      case "PERIPHERAL_DISCOVERED":
        this.discovered.update((current) =>
          upsertPeripheral(current, {
            id: event.peripheralId,
            advertisement: event.advertisement,
            rssi: event.rssi,
            discoveredAt: this.config.clock(),
          })
        );
        break;

      case "CONNECTED":
        this.handleConnected(session, event.peripheralId);
        break;

      case "CONNECT_FAILED":
        this.handleConnectFailed(event.peripheralId, event.error);
        break;

      case "DISCONNECTED":
        this.handleDisconnected(event.peripheralId, event.error);
        break;

      case "SERVICES_DISCOVERED":
      case "CHARACTERISTICS_DISCOVERED":
        this.discoverers.get(event.peripheralId)?.handle(event);
        break;
    }
  }

  private handleConnected(session: IRadioSession, peripheralId: PeripheralId): void {
    const entry = this.takeAddressee(peripheralId, "CONNECTING", false);
    if (!entry || this.discoverers.has(peripheralId)) {
      this.reportAnomaly("UNEXPECTED_CONNECT", peripheralId);
      return;
    }

    if (this.registry.contains("DISCONNECTING", peripheralId)) {
      // Cancelled while connecting; DISCONNECTED will settle it.
      this.log.debug("%s connected during teardown, skipping path discovery", peripheralId);
      return;
    }

    const discoverer = new PathDiscoverer(
      session,
      peripheralId,
      entry.addressee.route,
      this.log.child("paths")
    );
    this.discoverers.set(peripheralId, discoverer);
    discoverer.start((outcome) => {
      if (this.discoverers.get(peripheralId) === discoverer) {
        this.discoverers.delete(peripheralId);
      }
      this.handlePathsDiscovered(session, entry, outcome);
    });
  }

  private handlePathsDiscovered(
    session: IRadioSession,
    entry: ConnectingOperation,
    outcome: PathDiscoveryOutcome
  ): void {
    const { peripheralId, onError } = entry.addressee;
    this.registry.remove(entry);

    if (outcome.ok) {
      this.paths.update((current) => replacePaths(current, peripheralId, outcome.paths));
      this.connecting.update((ids) => withoutIdentifier(ids, peripheralId));
      this.connected.update((ids) => withIdentifier(ids, peripheralId));
      this.log.debug("%s connected with %d paths", peripheralId, outcome.paths.length);
      this.emitAfterTask({
        type: "PATHS_RESOLVED",
        peripheralId,
        paths: outcome.paths,
        timestamp: this.config.clock(),
      });
      return;
    }

    this.log.warn("path discovery failed on %s: %s", peripheralId, outcome.error.message);
    try {
      onError(
        new LinkError(`Path discovery failed on ${peripheralId}`, "RADIO_ERROR", peripheralId, {
          cause: outcome.error,
        })
      );
    } finally {
      if (!this.registry.contains("DISCONNECTING", peripheralId)) {
        this.beginTeardown(session, peripheralId, (error) => {
          this.log.warn("teardown of %s failed: %s", peripheralId, error.message);
        });
      }
    }
  }

  private handleConnectFailed(peripheralId: PeripheralId, cause: Error | undefined): void {
    const entry = this.takeAddressee(peripheralId, "CONNECTING");
    if (!entry) {
      this.reportAnomaly("UNEXPECTED_CONNECT_FAILURE", peripheralId);
      return;
    }

    this.disposeDiscoverer(peripheralId);
    this.connecting.update((ids) => withoutIdentifier(ids, peripheralId));
    this.log.debug("connect to %s failed", peripheralId);
    entry.addressee.onError(radioFailure(peripheralId, cause));
  }

  private handleDisconnected(peripheralId: PeripheralId, cause: Error | undefined): void {
    const removed: PendingOperation[] = [];
    const connecting = this.takeAddressee(peripheralId, "CONNECTING");
    if (connecting) removed.push(connecting);
    const disconnecting = this.takeAddressee(peripheralId, "DISCONNECTING");
    if (disconnecting) removed.push(disconnecting);

    this.disposeDiscoverer(peripheralId);
    this.connecting.update((ids) => withoutIdentifier(ids, peripheralId));
    this.connected.update((ids) => withoutIdentifier(ids, peripheralId));
    this.paths.update((current) => prunePaths(current, peripheralId));
    this.log.debug(
      "%s disconnected%s (%d pending operations settled)",
      peripheralId,
      cause ? ` with error: ${cause.message}` : "",
      removed.length
    );

    if (cause) {
      this.notifyAll(removed, radioFailure(peripheralId, cause));
    }
  }

  // ─── Internal ───────────────────────────────────────────────────

  /**
   * Looks up the entry owed a terminal event. With `remove`, the entry is
   * also taken out of the registry.
   */
  private takeAddressee<I extends AddressedInstruction>(
    peripheralId: PeripheralId,
    instruction: I,
    remove = true
  ): OperationFor<I> | null {
    try {
      const entry = this.registry.findAddressee(peripheralId, instruction);
      if (remove) this.registry.remove(entry);
      return entry;
    } catch (error) {
      if (error instanceof RegistryError && error.code === "NOT_FOUND") {
        return null;
      }
      throw error;
    }
  }

  /**
   * Calls every operation's callback, even when one throws.
   * @throws The first callback's error, after all have run.
   */
  private notifyAll(operations: readonly PendingOperation[], error: LinkError): void {
    let failure: { error: unknown } | null = null;
    for (const operation of operations) {
      try {
        operation.addressee?.onError(error);
      } catch (thrown) {
        if (failure) {
          this.log.error("additional callback failure: %O", thrown);
        } else {
          failure = { error: thrown };
        }
      }
    }
    if (failure) {
      throw failure.error;
    }
  }

  private disposeDiscoverer(peripheralId: PeripheralId): void {
    const discoverer = this.discoverers.get(peripheralId);
    if (discoverer) {
      discoverer.dispose();
      this.discoverers.delete(peripheralId);
    }
  }

  private reportAnomaly(kind: AnomalyKind, peripheralId: PeripheralId): void {
    const anomaly: ProtocolAnomaly = {
      kind,
      peripheralId,
      timestamp: this.config.clock(),
    };
    this.anomalyCount += 1;
    this.lastAnomaly = anomaly;
    this.log.warn("protocol anomaly #%d: %s for %s", this.anomalyCount, kind, peripheralId);
    this.emitAfterTask({
      type: "PROTOCOL_ANOMALY",
      anomaly,
      total: this.anomalyCount,
      timestamp: anomaly.timestamp,
    });
  }

  /** Facade events go out with the view broadcasts of the same task. */
  private emitAfterTask(event: RadioLinkEvent): void {
    this.queue.schedule(() => this.emit(event));
  }

  /** Drops the session, its event stream and all bookkeeping. */
  private closeSession(): void {
    this.sessionUnsub?.();
    this.sessionUnsub = null;
    this.session?.close();
    this.session = null;

    for (const discoverer of this.discoverers.values()) {
      discoverer.dispose();
    }
    this.discoverers.clear();

    const dropped = this.registry.size;
    if (dropped > 0) {
      this.log.debug("dropping %d pending operations", dropped);
    }
    this.registry.clear();
    this.radioState.set(null);
    this.discovered.set(new Map());
    this.connecting.set(new Set());
    this.connected.set(new Set());
    this.paths.set([]);
  }
}

// ─── Utility ───────────────────────────────────────────────────────

function radioFailure(peripheralId: PeripheralId, cause: Error | undefined): LinkError {
  const reason = cause ?? new UnknownRadioError();
  return new LinkError(`Radio failure on ${peripheralId}: ${reason.message}`, "RADIO_ERROR", peripheralId, {
    cause: reason,
  });
}
