/**
 * @module interfaces
 * @description Public interface exports for radio-link.
 */

export * from "./event-emitter.js";
export * from "./state-container.js";
export * from "./radio-session.js";
export * from "./operation-registry.js";
export * from "./path-discoverer.js";
export * from "./radio-link.js";
