/**
 * Entry point: `npm start -- [--profile <name>] [--list-profiles]`
 *
 * Usage: npx tsx packages/cli/src/main.ts
 */

import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { createReadlineIO, parseArgs, runCli, type CliOptions } from "./cli.js";

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Problem: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const rl = createInterface({ input: stdin, output: stdout });
  const io = createReadlineIO(rl);

  try {
    return await runCli(io, options);
  } finally {
    rl.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Problem:", err);
    process.exitCode = 1;
  },
);
