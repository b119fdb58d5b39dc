/**
 * @module primitives
 * @description Building blocks of the session facade: the typed emitter,
 * the mutation queue, state containers, the operation registry, the path
 * discoverer and the view formatters.
 */

export { TypedEmitter } from "./base-emitter.js";
export { MutationQueue } from "./mutation-queue.js";
export { StateContainer, DerivedView } from "./state-container.js";
export { OperationRegistry } from "./operation-registry.js";
export { PathDiscoverer } from "./path-discoverer.js";
export * from "./formatting.js";
