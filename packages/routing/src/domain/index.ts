/**
 * Core domain for the route inspection engine.
 *
 * - Graph: mutable weighted multigraph operations
 * - Errors: the failure taxonomy shared by every stage
 */

export * from "./graph.js";
export * from "./errors.js";
