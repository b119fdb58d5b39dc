/**
 * @module types
 * @description Public type exports for radio-link.
 */

export * from "./branded.js";
export * from "./radio.js";
export * from "./config.js";
export * from "./registry.js";
export * from "./result.js";
export * from "./events.js";
