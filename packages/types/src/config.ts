/**
 * Route configuration shape, shared by the engine and the CLI.
 */

/** Distance unit that totals are reported in */
export interface DistanceUnit {
  /** Display name, e.g. "miles" */
  name: string;
  /** How many feet make one unit */
  feetPerUnit: number;
}

export interface RouteConfig {
  /** Node the circuit starts and ends at */
  startNode: number;
  /** Separator between node labels */
  labelSeparator: string;
  unit: DistanceUnit;
  /** Decimal places kept when truncating the distance */
  decimals: number;
}

/** Summary of a named profile */
export interface ProfileInfo {
  name: string;
  description: string;
}
