import type { CanonicalType } from "../core/type-normalizer.js";

export type LogCategory = "parse" | "validate" | "baseline" | "match" | "watch" | "scaffold";

export interface DoclinkConfig {
  version: string;
  sources: {
    code: string[];
    docs: string[];
    ignore: string[];
  };
  types: {
    aliases: Record<string, CanonicalType>;
  };
  baseline: {
    path: string;
  };
  check: {
    failOnWarnings: boolean;
  };
  debug: {
    enabled: boolean;
    categories?: LogCategory[];
  };
}

export interface DebugLogger {
  log(category: LogCategory, message: string, data?: object): void;
}
