/**
 * Debug logger - structured JSON-lines logging for pipeline runs
 * Writes to a rotatable log file under the project's .doclink directory
 */

import * as fs from "node:fs";
import * as path from "node:path";

import type { DebugLogger, DoclinkConfig, LogCategory } from "../types/index.js";

interface LoggerConfig {
  categories: LogCategory[] | null; // null = all categories
  logFile: string;
  maxFileSize: number;
}

export class FileLogger implements DebugLogger {
  private config: LoggerConfig;

  constructor(projectRoot: string, categories?: LogCategory[]) {
    this.config = {
      categories: categories?.length ? categories : null,
      logFile: path.join(projectRoot, ".doclink", "debug.log"),
      maxFileSize: 1024 * 1024, // 1MB
    };
  }

  get logFile(): string {
    return this.config.logFile;
  }

  log(category: LogCategory, message: string, data?: object): void {
    if (this.config.categories && !this.config.categories.includes(category)) return;

    const entry = JSON.stringify({
      ...data, // spread first so reserved keys take precedence
      t: new Date().toISOString(),
      pid: process.pid,
      cat: category,
      msg: message,
    });

    this.writeLogSafe(entry + "\n");
  }

  private writeLogSafe(line: string): void {
    try {
      fs.mkdirSync(path.dirname(this.config.logFile), { recursive: true });
      this.tryRotate();
      fs.appendFileSync(this.config.logFile, line);
    } catch {
      // best-effort; a failed write drops the entry
    }
  }

  private tryRotate(): void {
    if (!fs.existsSync(this.config.logFile)) return;
    const stats = fs.statSync(this.config.logFile);
    if (stats.size <= this.config.maxFileSize) return;

    const backup = this.config.logFile + ".1";
    fs.rmSync(backup, { force: true });
    fs.renameSync(this.config.logFile, backup);
  }
}

class NoopLogger implements DebugLogger {
  log(): void {
    // disabled
  }
}

export function createNoopLogger(): DebugLogger {
  return new NoopLogger();
}

/**
 * Logging is on when the config enables it or DOCLINK_DEBUG is set.
 */
export function createLogger(
  projectRoot: string,
  debug: DoclinkConfig["debug"],
  env: NodeJS.ProcessEnv = process.env,
): DebugLogger {
  const enabled = debug.enabled || Boolean(env.DOCLINK_DEBUG);
  if (!enabled) return createNoopLogger();
  return new FileLogger(projectRoot, debug.categories);
}
