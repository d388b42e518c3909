import * as fs from "node:fs";
import * as path from "node:path";
import { glob } from "glob";

import { MissingInputError } from "./errors.js";

import type { DoclinkConfig } from "../types/index.js";

const CODE_DIR_PATTERN = "**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}";
const DOCS_DIR_PATTERN = "**/*.{md,markdown}";

const ALWAYS_IGNORED = ["**/node_modules/**", "**/.git/**"];

// explicit paths from the command line; omitted roles fall back to config globs
export interface SourceSelection {
  code?: string;
  doc?: string;
}

export interface CollectedFiles {
  // absolute paths, sorted
  code: string[];
  docs: string[];
}

async function expandPatterns(cwd: string, patterns: readonly string[], ignore: readonly string[]): Promise<string[]> {
  const found = new Set<string>();
  for (const pattern of patterns) {
    const matches = await glob(pattern, {
      cwd,
      ignore: [...ALWAYS_IGNORED, ...ignore],
      nodir: true,
      absolute: true,
    });
    for (const match of matches) found.add(path.resolve(match));
  }
  return [...found].sort();
}

async function expandPath(
  projectRoot: string,
  input: string,
  role: "code" | "documentation",
  dirPattern: string,
  ignore: readonly string[],
): Promise<string[]> {
  const resolved = path.resolve(projectRoot, input);
  if (!fs.existsSync(resolved)) throw new MissingInputError(input, role);

  // a file given explicitly is read even when the config would ignore it
  if (!fs.statSync(resolved).isDirectory()) return [resolved];
  return expandPatterns(resolved, [dirPattern], ignore);
}

export async function collectFiles(
  projectRoot: string,
  config: DoclinkConfig,
  selection: SourceSelection = {},
): Promise<CollectedFiles> {
  const { ignore } = config.sources;

  const code = selection.code
    ? await expandPath(projectRoot, selection.code, "code", CODE_DIR_PATTERN, ignore)
    : await expandPatterns(projectRoot, config.sources.code, ignore);
  const docs = selection.doc
    ? await expandPath(projectRoot, selection.doc, "documentation", DOCS_DIR_PATTERN, ignore)
    : await expandPatterns(projectRoot, config.sources.docs, ignore);

  return { code, docs };
}
