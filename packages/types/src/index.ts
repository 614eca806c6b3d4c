/**
 * @trail-postman/types
 *
 * Shared domain types for the route inspection engine.
 *
 * - Graph: Weighted trail network
 * - Route: The closed walk covering every segment
 * - Config: Start node, labels and distance unit
 */

export * from "./graph.js";
export * from "./route.js";
export * from "./config.js";
