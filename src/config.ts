// Tool configuration (.aictx/config.yaml) and root discovery.

import { existsSync, readFileSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { BUILTIN_ADAPTERS } from "./exporter.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import { DEFAULT_CONVENTION_VERSION, MANIFEST_FILE } from "./manifest.js";

export const AICTX_DIR = ".aictx";
export const CONFIG_FILE = "config.yaml";
export const LOG_LEVEL_ENV = "AICTX_LOG_LEVEL";

export const AictxConfigSchema = z.object({
  convention_version: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? DEFAULT_CONVENTION_VERSION : String(v))),
  adapters: z
    .array(z.string().min(1))
    .nullish()
    .transform((list) => (list && list.length > 0 ? list : [...BUILTIN_ADAPTERS])),
  plugins: z.array(z.string().min(1)).nullish().transform((list) => list ?? []),
  project: z.string().optional(),
});

export type AictxConfig = z.infer<typeof AictxConfigSchema>;

export function defaultConfig(): AictxConfig {
  return {
    convention_version: DEFAULT_CONVENTION_VERSION,
    adapters: [...BUILTIN_ADAPTERS],
    plugins: [],
  };
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/** Walk upward from `start` until a `.aictx` directory is found. */
export function findAictxDir(start: string): string | null {
  let current = resolve(start);
  for (;;) {
    const candidate = join(current, AICTX_DIR);
    if (isDirectory(candidate)) return candidate;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * The explicit root if given; otherwise the nearest directory (walking up)
 * holding manifests.yaml, rules/ or tasks/; otherwise `start` itself.
 */
export function findContextRoot(start: string, explicitRoot?: string): string {
  if (explicitRoot !== undefined) return resolve(explicitRoot);
  const origin = resolve(start);
  let current = origin;
  for (;;) {
    if (
      existsSync(join(current, MANIFEST_FILE)) ||
      isDirectory(join(current, "rules")) ||
      isDirectory(join(current, "tasks"))
    ) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) return origin;
    current = parent;
  }
}

export function parseConfig(input: unknown, source: string): AictxConfig {
  const result = AictxConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}`,
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function loadConfig(aictxDir: string): AictxConfig {
  const path = join(aictxDir, CONFIG_FILE);
  if (!existsSync(path)) return defaultConfig();
  let data: unknown;
  try {
    data = yaml.load(readFileSync(path, "utf-8"), { schema: yaml.DEFAULT_SCHEMA });
  } catch (err) {
    throw new ConfigError(
      `Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseConfig(data, path);
}

export function logLevelFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = "info"
): LogLevel {
  const value = env[LOG_LEVEL_ENV];
  if (value === undefined || value === "") return fallback;
  if (!isLogLevel(value)) {
    throw new ConfigError(
      `Invalid ${LOG_LEVEL_ENV}: ${value}. Must be debug, info, warn, or error.`
    );
  }
  return value;
}
