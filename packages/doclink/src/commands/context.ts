import * as path from "node:path";

import { resolveBaselinePath } from "../core/baseline-store.js";
import { loadConfig } from "../core/config.js";
import { DoclinkError } from "../core/errors.js";
import { createLogger } from "../core/logger.js";

import type { RunContext } from "../core/pipeline.js";

export interface CommandContext extends RunContext {
  baselinePath: string; // absolute
}

export function createCommandContext(options: {
  config?: string;
  projectRoot?: string;
  baseline?: string;
}): CommandContext {
  const projectRoot = path.resolve(options.projectRoot ?? ".");
  const config = loadConfig(projectRoot, options.config);
  const logger = createLogger(projectRoot, config.debug);
  const baselinePath = resolveBaselinePath(projectRoot, options.baseline ?? config.baseline.path);
  return { projectRoot, config, logger, baselinePath };
}

// configuration, baseline and input errors end the command with status 2
export function reportFatal(err: unknown): number {
  if (err instanceof DoclinkError) {
    console.error(`Error: ${err.message}`);
    return 2;
  }
  throw err;
}
