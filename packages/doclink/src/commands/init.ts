import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";

import { CONFIG_FILENAMES, createDefaultConfig } from "../core/config.js";

import type { DoclinkConfig, InitOptions } from "../types/index.js";

const CODE_EXTENSIONS = "{ts,tsx,mts,cts,js,jsx,mjs,cjs}";

function isDirectory(p: string): boolean {
  return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

// suggest source globs from the directories that exist
export function detectSources(projectPath: string): { code: string[]; docs: string[] } {
  const code = isDirectory(path.join(projectPath, "src"))
    ? [`src/**/*.${CODE_EXTENSIONS}`]
    : [`**/*.${CODE_EXTENSIONS}`];

  const docs: string[] = [];
  if (isDirectory(path.join(projectPath, "docs"))) docs.push("docs/**/*.md");
  if (fs.existsSync(path.join(projectPath, "README.md"))) docs.push("README.md");
  if (docs.length === 0) docs.push("**/*.md");

  return { code, docs };
}

// the subset of settings a fresh project should see in its config file
export function buildConfigFile(config: DoclinkConfig): Record<string, unknown> {
  return {
    version: config.version,
    sources: config.sources,
    types: { aliases: config.types.aliases },
    baseline: { path: config.baseline.path },
    check: { failOnWarnings: config.check.failOnWarnings },
  };
}

async function promptSources(detected: { code: string[]; docs: string[] }): Promise<{ code: string[]; docs: string[] }> {
  const { input } = await import("@inquirer/prompts");
  const split = (value: string) =>
    value
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);

  const code = await input({
    message: "Source globs (comma-separated):",
    default: detected.code.join(", "),
    validate: (value: string) => (split(value).length > 0 ? true : "At least one glob is required"),
  });
  const docs = await input({
    message: "Documentation globs (comma-separated):",
    default: detected.docs.join(", "),
    validate: (value: string) => (split(value).length > 0 ? true : "At least one glob is required"),
  });
  return { code: split(code), docs: split(docs) };
}

export async function initCommand(projectPath: string | undefined, options: InitOptions): Promise<number> {
  const resolved = path.resolve(projectPath ?? ".");
  if (!isDirectory(resolved)) {
    console.error(`Error: directory not found: ${resolved}`);
    return 2;
  }

  const configPath = path.resolve(resolved, CONFIG_FILENAMES[0] ?? "doclink.yaml");

  // check for existing config
  if (fs.existsSync(configPath) && !options.yes) {
    const { confirm } = await import("@inquirer/prompts");
    const overwrite = await confirm({
      message: `${path.basename(configPath)} already exists. Overwrite?`,
      default: false,
    });
    if (!overwrite) {
      console.log("Aborted.");
      return 0;
    }
  }

  const detected = detectSources(resolved);
  const sources = options.yes ? detected : await promptSources(detected);

  const config = createDefaultConfig();
  config.sources.code = sources.code;
  config.sources.docs = sources.docs;

  const content = yaml.dump(buildConfigFile(config), {
    lineWidth: 120,
    noRefs: true,
    quotingType: '"',
  });
  fs.writeFileSync(configPath, content, "utf8");

  console.log(`Created ${path.basename(configPath)}`);
  console.log(`  code: ${sources.code.join(", ")}`);
  console.log(`  docs: ${sources.docs.join(", ")}`);
  return 0;
}
