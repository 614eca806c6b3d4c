/**
 * @trail-postman/routing
 *
 * Route inspection (Chinese Postman) engine for trail networks.
 *
 * Key concepts:
 * - Graph: weighted multigraph parsed from an adjacency file
 * - Dead end: a node with a single segment, walked in and back out
 * - Eulerization: duplicating shortest paths until every node is even
 * - Circuit: a closed walk covering every segment
 *
 * Pipeline:
 * 1. Parse adjacency text -> Graph
 * 2. Double dead-end segments
 * 3. Pair odd nodes and duplicate their shortest paths
 * 4. Extract an Euler circuit (Hierholzer)
 * 5. Format labels and distance
 */

// Domain
export * from "./domain/index.js";

// Modules
export * from "./ingestion/index.js";
export { fixDeadEnds } from "./augment/dead-ends.js";
export { eulerize, pairOddNodes, type EulerizeResult } from "./augment/eulerize.js";
export { dijkstra, distanceTo, shortestPath } from "./search/dijkstra.js";
export { extractCircuit } from "./circuit/hierholzer.js";
export {
  alphabetize,
  nodeLabel,
  lengthFeet,
  lengthMiles,
  toDistanceUnit,
  FEET_PER_MILE,
  MILES,
  DEFAULT_LABEL_SEPARATOR,
} from "./export/path-format.js";
export {
  loadBaseConfig,
  loadProfileConfig,
  listProfiles,
  findConfigsRoot,
  getHardcodedDefaults,
  validateRouteConfig,
  validateProfileConfig,
  RouteConfigSchema,
  ProfileConfigSchema,
  deepMerge,
  type ProfileConfig,
  type ResolvedRouteConfig,
} from "./config/route-config.js";
export * from "./route/index.js";
