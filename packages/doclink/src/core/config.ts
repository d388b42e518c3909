import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";

import { ConfigError, errorMessage } from "./errors.js";
import { CANONICAL_TYPES, isCanonicalType } from "./type-normalizer.js";
import { DEFAULT_BASELINE_PATH } from "./baseline-store.js";

import type { CanonicalType } from "./type-normalizer.js";
import type { DoclinkConfig, LogCategory } from "../types/index.js";

export const CONFIG_FILENAMES = ["doclink.yaml", "doclink.yml"];

const LOG_CATEGORIES: readonly LogCategory[] = ["parse", "validate", "baseline", "match", "watch", "scaffold"];

/**
 * Defaults for every optional setting.
 * Used when no config file exists and as the base a config file is merged into.
 */
export function createDefaultConfig(): DoclinkConfig {
  return {
    version: "1",
    sources: {
      code: ["src/**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}"],
      docs: ["docs/**/*.md", "README.md"],
      ignore: ["**/node_modules/**", "**/dist/**"],
    },
    types: { aliases: {} },
    baseline: { path: DEFAULT_BASELINE_PATH },
    check: { failOnWarnings: false },
    debug: { enabled: false },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isLogCategory(value: unknown): value is LogCategory {
  return typeof value === "string" && (LOG_CATEGORIES as readonly string[]).includes(value);
}

export function findConfigPath(projectRoot: string, configPath?: string): string | null {
  if (configPath) {
    const resolved = path.resolve(projectRoot, configPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  for (const filename of CONFIG_FILENAMES) {
    const candidate = path.resolve(projectRoot, filename);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

export function loadConfig(projectRoot: string, configPath?: string): DoclinkConfig {
  const found = findConfigPath(projectRoot, configPath);
  if (!found) return createDefaultConfig();

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigError(`Invalid config at ${found}: ${errorMessage(err)}`, { cause: err });
  }
  return validateConfig(parsed ?? {}, found);
}

export function validateConfig(data: unknown, filePath: string): DoclinkConfig {
  const invalid = (reason: string) => new ConfigError(`Invalid config at ${filePath}: ${reason}`);
  if (!isRecord(data)) throw invalid("expected a mapping");

  const config = createDefaultConfig();

  // version
  if (data.version != null) {
    if (typeof data.version !== "string" || data.version !== "1") {
      throw invalid("'version' must be \"1\"");
    }
  }

  // sources
  if (data.sources != null) {
    if (!isRecord(data.sources)) throw invalid("'sources' must be a mapping");
    for (const key of ["code", "docs", "ignore"] as const) {
      const value = data.sources[key];
      if (value == null) continue;
      if (!isStringArray(value)) throw invalid(`'sources.${key}' must be a list of glob patterns`);
      config.sources[key] = value;
    }
  }

  // types.aliases
  if (data.types != null) {
    if (!isRecord(data.types)) throw invalid("'types' must be a mapping");
    const aliases = data.types.aliases;
    if (aliases != null) {
      if (!isRecord(aliases)) throw invalid("'types.aliases' must be a mapping");
      const parsedAliases: Record<string, CanonicalType> = {};
      for (const [alias, target] of Object.entries(aliases)) {
        if (isCanonicalType(alias.trim().toLowerCase())) {
          throw invalid(`'types.aliases.${alias}' redefines a canonical type`);
        }
        const canonical = typeof target === "string" ? target.trim().toLowerCase() : "";
        if (!isCanonicalType(canonical)) {
          throw invalid(`'types.aliases.${alias}' must be one of: ${CANONICAL_TYPES.join(", ")}`);
        }
        parsedAliases[alias] = canonical;
      }
      config.types.aliases = parsedAliases;
    }
  }

  // baseline
  if (data.baseline != null) {
    if (!isRecord(data.baseline)) throw invalid("'baseline' must be a mapping");
    if (data.baseline.path != null) {
      if (typeof data.baseline.path !== "string" || !data.baseline.path) {
        throw invalid("'baseline.path' must be a non-empty string");
      }
      config.baseline.path = data.baseline.path;
    }
  }

  // check
  if (data.check != null) {
    if (!isRecord(data.check)) throw invalid("'check' must be a mapping");
    if (data.check.failOnWarnings != null) {
      if (typeof data.check.failOnWarnings !== "boolean") throw invalid("'check.failOnWarnings' must be a boolean");
      config.check.failOnWarnings = data.check.failOnWarnings;
    }
  }

  // debug
  if (data.debug != null) {
    if (!isRecord(data.debug)) throw invalid("'debug' must be a mapping");
    if (data.debug.enabled != null) {
      if (typeof data.debug.enabled !== "boolean") throw invalid("'debug.enabled' must be a boolean");
      config.debug.enabled = data.debug.enabled;
    }
    if (data.debug.categories != null) {
      const categories = data.debug.categories;
      if (!Array.isArray(categories) || !categories.every(isLogCategory)) {
        throw invalid(`'debug.categories' must be a list of: ${LOG_CATEGORIES.join(", ")}`);
      }
      config.debug.categories = categories;
    }
  }

  return config;
}
