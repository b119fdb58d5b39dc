/**
 * @module primitives/path-discoverer
 * @description Implementation of the IPathDiscoverer interface.
 *
 * Resolution runs in two rounds against the Radio Session:
 *   1. service discovery for the route's services (or all of them);
 *   2. characteristic discovery for every discovered service the route
 *      asks for, tracked in an awaited-service set.
 * The first error fails the run. Results still in flight after that are
 * ignored when they arrive. When the awaited set empties, every
 * (service, characteristic) pair becomes a KnownPath.
 */

import type {
  IPathDiscoverer,
  PathDiscoveryCallback,
  PathDiscoveryOutcome,
} from "../interfaces/path-discoverer.js";
import type { IRadioSession } from "../interfaces/radio-session.js";
import type {
  PeripheralId,
  ServiceId,
  CharacteristicId,
} from "../types/branded.js";
import type {
  ConnectionRoute,
  DiscoveredCharacteristic,
  KnownPath,
} from "../types/radio.js";
import type {
  CharacteristicsDiscoveredEvent,
  PathDiscoveryEvent,
  ServicesDiscoveredEvent,
} from "../types/events.js";
import type { Logger } from "../logging/logger.js";

type Phase = "IDLE" | "SERVICES" | "CHARACTERISTICS" | "SETTLED";

/**
 * PathDiscoverer — one connect attempt's path resolution.
 *
 * @example
 * ```ts
 * const discoverer = new PathDiscoverer(session, id, route);
 * discoverer.start((outcome) => {
 *   if (outcome.ok) record(outcome.paths);
 * });
 * // Radio events for `id` are then fed through discoverer.handle(event)
 * ```
 */
export class PathDiscoverer implements IPathDiscoverer {
  private phase: Phase = "IDLE";
  private onComplete: PathDiscoveryCallback | null = null;
  private readonly awaited = new Set<ServiceId>();
  private readonly resolved = new Map<ServiceId, readonly DiscoveredCharacteristic[]>();

  constructor(
    private readonly session: IRadioSession,
    readonly peripheralId: PeripheralId,
    private readonly route: ConnectionRoute | null,
    private readonly logger: Logger | null = null
  ) {}

  get isSettled(): boolean {
    return this.phase === "SETTLED";
  }

  // ─── Commands ───────────────────────────────────────────────────

  start(onComplete: PathDiscoveryCallback): void {
    if (this.phase !== "IDLE") {
      throw new Error(`Path discovery for ${this.peripheralId} already started`);
    }
    this.onComplete = onComplete;

    if (this.route && this.route.size === 0) {
      // Nothing requested, nothing to resolve.
      this.complete({ ok: true, paths: [] });
      return;
    }

    this.phase = "SERVICES";
    const filter = this.route ? [...this.route.keys()] : null;
    this.logger?.debug("discovering services of %s: %o", this.peripheralId, filter ?? "all");
    this.session.discoverServices(this.peripheralId, filter);
  }

  handle(event: PathDiscoveryEvent): void {
    if (this.isSettled || event.peripheralId !== this.peripheralId) {
      return;
    }

    switch (event.type) {
      case "SERVICES_DISCOVERED":
        this.handleServices(event);
        break;
      case "CHARACTERISTICS_DISCOVERED":
        this.handleCharacteristics(event);
        break;
    }
  }

  dispose(): void {
    this.phase = "SETTLED";
    this.onComplete = null;
    this.awaited.clear();
    this.resolved.clear();
  }

  // ─── Internal ───────────────────────────────────────────────────

  private handleServices(event: ServicesDiscoveredEvent): void {
    if (this.phase !== "SERVICES") return;

    if (event.error) {
      this.complete({ ok: false, error: event.error });
      return;
    }

    const targets = [...new Set(event.services)].filter(
      (serviceId) => this.route === null || this.route.has(serviceId)
    );

    if (targets.length === 0) {
      this.logger?.debug("no requested service on %s", this.peripheralId);
      this.complete({ ok: true, paths: [] });
      return;
    }

    this.phase = "CHARACTERISTICS";
    for (const serviceId of targets) {
      this.awaited.add(serviceId);
    }
    for (const serviceId of targets) {
      this.session.discoverCharacteristics(
        this.peripheralId,
        serviceId,
        this.characteristicFilter(serviceId)
      );
    }
  }

  private handleCharacteristics(event: CharacteristicsDiscoveredEvent): void {
    if (this.phase !== "CHARACTERISTICS" || !this.awaited.has(event.serviceId)) {
      return;
    }

    if (event.error) {
      this.complete({ ok: false, error: event.error });
      return;
    }

    this.awaited.delete(event.serviceId);
    this.resolved.set(event.serviceId, event.characteristics);

    if (this.awaited.size === 0) {
      this.complete({ ok: true, paths: this.flatten() });
    }
  }

  /** `null` (all characteristics) when the route lists none for the service. */
  private characteristicFilter(serviceId: ServiceId): readonly CharacteristicId[] | null {
    const requested = this.route?.get(serviceId);
    return requested && requested.length > 0 ? requested : null;
  }

  private flatten(): readonly KnownPath[] {
    const paths: KnownPath[] = [];
    for (const [serviceId, characteristics] of this.resolved) {
      for (const characteristic of characteristics) {
        paths.push({
          peripheralId: this.peripheralId,
          serviceId,
          characteristicId: characteristic.id,
          handle: characteristic.handle,
        });
      }
    }
    return paths;
  }

  private complete(outcome: PathDiscoveryOutcome): void {
    const callback = this.onComplete;
    this.dispose();
    callback?.(outcome);
  }
}
