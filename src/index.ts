/**
 * @module radio-link
 * @description Connection-lifecycle layer for short-range radio
 * peripherals.
 *
 * Turns a callback-driven radio-management API (scan, connect, discover
 * paths, disconnect) into a session model with explicit readiness,
 * deduplicated pending-operation tracking and observable state views.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Configuration ──────────────────────────────────────────────────
export * from "./config/index.js";

// ─── Radio Sessions ─────────────────────────────────────────────────
export { SimulatedRadioSession } from "./sessions/simulated.js";
export type {
  RadioCommand,
  RadioCommandType,
  SimulatedLayout,
  SimulatedRadioSessionOptions,
} from "./sessions/simulated.js";

// ─── Logging ────────────────────────────────────────────────────────
export { createLogger, DEFAULT_LOG_NAMESPACE } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

// ─── Session Facade ─────────────────────────────────────────────────
export { RadioLink } from "./radio-link.js";
export type { RadioLinkConfig } from "./radio-link.js";
