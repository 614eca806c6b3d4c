/**
 * Layered JSON config for route output.
 *
 * A base config holds the full RouteConfig; named profiles are partial
 * overrides that deep-merge on top of it.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { ProfileInfo, RouteConfig } from "@trail-postman/types";
import { ConfigError } from "../domain/errors.js";
import { DEFAULT_LABEL_SEPARATOR, MILES } from "../export/path-format.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Config with the profile it came from, when any */
export type ResolvedRouteConfig = RouteConfig & { _profile?: ProfileInfo };

export function getHardcodedDefaults(): RouteConfig {
  return {
    startNode: 0,
    labelSeparator: DEFAULT_LABEL_SEPARATOR,
    unit: { ...MILES },
    decimals: 2,
  };
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Leaf-level deep merge: source values override target values. */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = target[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const NON_NEGATIVE_INTEGER = "must be a non-negative integer";

export const RouteConfigSchema = z.object({
  startNode: z.number().int(NON_NEGATIVE_INTEGER).nonnegative(NON_NEGATIVE_INTEGER),
  labelSeparator: z.string(),
  unit: z.object({
    name: z.string(),
    feetPerUnit: z.number().positive("must be a positive number").finite("must be a positive number"),
  }),
  decimals: z
    .number()
    .int("must be an integer from 0 to 6")
    .min(0, "must be an integer from 0 to 6")
    .max(6, "must be an integer from 0 to 6"),
});

/** A profile file: partial overrides deep-merged over the base config */
export const ProfileConfigSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  overrides: z.record(z.unknown()),
});

export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;

function formatIssues(error: z.ZodError, source: string): string {
  const message = error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
  return `${source}: ${message}`;
}

/**
 * Check an untyped value against {@link RouteConfigSchema}.
 *
 * @param source - Where the value came from, for error messages
 */
export function validateRouteConfig(value: unknown, source: string): RouteConfig {
  const parsed = RouteConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error, source));
  }
  return parsed.data;
}

/** Check an untyped value against {@link ProfileConfigSchema} */
export function validateProfileConfig(value: unknown, source: string): ProfileConfig {
  const parsed = ProfileConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error, source));
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/route/`.
 * Works from both source (packages/routing/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "route");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // __dirname is packages/routing/src/config
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "route");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/**
 * Load the base config. Falls back to hardcoded defaults when the file is
 * missing or unreadable; a readable file with bad values is a ConfigError.
 */
export function loadBaseConfig(configsRoot: string = findConfigsRoot()): RouteConfig {
  const filePath = join(configsRoot, "base.json");

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[config] Using built-in defaults (${reason})`);
    return getHardcodedDefaults();
  }
  return validateRouteConfig(deepMerge({ ...getHardcodedDefaults() }, isPlainObject(parsed) ? parsed : {}), filePath);
}

/** Load a profile config, merging its overrides on top of the base. */
export function loadProfileConfig(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): ResolvedRouteConfig {
  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) {
    throw new ConfigError(`Unknown profile "${profileName}" (no ${filePath})`);
  }

  const profile = validateProfileConfig(JSON.parse(readFileSync(filePath, "utf-8")), filePath);

  const base = loadBaseConfig(configsRoot);
  const merged = validateRouteConfig(deepMerge({ ...base }, profile.overrides), filePath);

  return {
    ...merged,
    _profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles from the profiles directory. */
export function listProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");

  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir)
    .filter((f) => f.endsWith(".json"))
    .sort();
  const profiles: ProfileInfo[] = [];

  for (const file of files) {
    try {
      const parsed = ProfileConfigSchema.safeParse(JSON.parse(readFileSync(join(profilesDir, file), "utf-8")));
      if (parsed.success) {
        profiles.push({ name: parsed.data.name, description: parsed.data.description });
      } else {
        console.warn(`[config] ${formatIssues(parsed.error, `Skipping profile ${file}`)}`);
      }
    } catch (err) {
      console.warn(`[config] Skipping profile ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return profiles;
}
