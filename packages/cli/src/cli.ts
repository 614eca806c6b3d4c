/**
 * Line-prompt front end for the route solver.
 *
 * Asks for an adjacency file path, solves it, and prints the circuit and
 * its length. Any failure prints `Problem: <message>` and yields exit code 1.
 */

import { once } from "node:events";
import type { Interface } from "node:readline/promises";
import type { RouteConfig, RouteSolution } from "@trail-postman/types";
import { listProfiles, loadBaseConfig, loadProfileConfig, solveRouteFile } from "@trail-postman/routing";

/** Where the CLI reads and writes; real stdio in main.ts, fakes in tests */
export interface CliIO {
  /** Show `prompt` and resolve with the line the user typed */
  ask(prompt: string): Promise<string>;
  out(line: string): void;
  err(line: string): void;
}

export interface CliOptions {
  /** Configuration profile name (from `--profile <name>`) */
  profile?: string;
  /** Print the available profiles instead of solving (`--list-profiles`) */
  listProfiles?: boolean;
}

/**
 * Stdio-backed {@link CliIO}. When the input ends before a line arrives,
 * `ask` resolves with an empty answer.
 */
export function createReadlineIO(rl: Interface): CliIO {
  const closed = once(rl, "close").then(() => "");
  return {
    ask: async (prompt) => {
      console.log(prompt);
      return Promise.race([closed, rl.question("")]);
    },
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  };
}

/** Parse `--profile <name>`, `--profile=<name>` and `--list-profiles` from argv (after the script path) */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--profile") {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error("--profile needs a profile name");
      }
      options.profile = value;
      i++;
    } else if (arg === "--list-profiles") {
      options.listProfiles = true;
    } else if (arg !== undefined && arg.startsWith("--profile=")) {
      options.profile = arg.slice("--profile=".length);
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return options;
}

function resolveConfig(options: CliOptions): RouteConfig {
  if (options.profile) {
    return loadProfileConfig(options.profile);
  }
  return loadBaseConfig();
}

/** Output lines for a solved route */
export function formatSolution(solution: RouteSolution, config: RouteConfig): string[] {
  const path = solution.labels ?? solution.circuit.join(config.labelSeparator);
  return [path, `${solution.distance} ${solution.unit}`];
}

/**
 * Run one prompt/solve/print cycle.
 *
 * @returns Process exit code
 */
export async function runCli(io: CliIO, options: CliOptions = {}): Promise<number> {
  try {
    if (options.listProfiles) {
      for (const profile of listProfiles()) {
        io.out(profile.description ? `${profile.name} - ${profile.description}` : profile.name);
      }
      return 0;
    }

    const filePath = (await io.ask("File Path >")).trim();
    if (filePath === "") {
      throw new Error("no file path given");
    }
    const config = resolveConfig(options);
    const solution = solveRouteFile(filePath, config);
    for (const line of formatSolution(solution, config)) {
      io.out(line);
    }
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.err(`Problem: ${message}`);
    return 1;
  }
}
