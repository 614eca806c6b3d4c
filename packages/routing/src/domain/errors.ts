/**
 * Error taxonomy for the route inspection pipeline.
 *
 * Every failure is fatal to the run; nothing here is retried.
 */

/** A token in the adjacency file is not a non-negative integer */
export class FormatError extends Error {
  constructor(
    message: string,
    /** 1-based line number in the input file */
    readonly lineNumber: number,
    readonly token: string,
  ) {
    super(message);
    this.name = "FormatError";
  }
}

/** A contract between pipeline stages was broken (a bug, not bad input) */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/** A node index has no letter label (only A-Z are available) */
export class LabelRangeError extends Error {
  constructor(readonly node: number) {
    super(`Node ${node} has no letter label (only 26 nodes, A-Z, can be labeled)`);
    this.name = "LabelRangeError";
  }
}

/** A configuration file holds an unusable value */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
