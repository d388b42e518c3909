#!/usr/bin/env node
import { Option, program } from "commander";

import { getPackageVersion } from "../core/paths.js";

import type { BaselineOptions, CheckOptions, InitOptions, ScaffoldOptions, WatchOptions } from "../types/index.js";

program
  .name("doclink")
  .description("Keeps code and its markdown documentation linked, argument by argument")
  .version(getPackageVersion());

program
  .command("check [code] [doc]")
  .description("Validate code-to-documentation links")
  .option("-c, --config <file>", "Path to doclink.yaml")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["human", "json"]).default("human"))
  .option("--project-root <path>", "Project root (default: current directory)")
  .option("--baseline <path>", "Baseline file (default: .doclink/baseline.yaml)")
  .option("--fail-on-warnings", "Exit with status 1 on warnings too")
  .option("--verbose", "Show info findings")
  .action(async (code: string | undefined, doc: string | undefined, options: CheckOptions) => {
    const { checkCommand } = await import("../commands/check.js");
    const exitCode = await checkCommand(code, doc, options);
    process.exit(exitCode);
  });

program
  .command("baseline [code] [doc]")
  .description("Accept the current findings as the baseline")
  .option("-c, --config <file>", "Path to doclink.yaml")
  .option("--project-root <path>", "Project root (default: current directory)")
  .option("--baseline <path>", "Baseline file (default: .doclink/baseline.yaml)")
  .action(async (code: string | undefined, doc: string | undefined, options: BaselineOptions) => {
    const { baselineCommand } = await import("../commands/baseline.js");
    const exitCode = await baselineCommand(code, doc, options);
    process.exit(exitCode);
  });

program
  .command("scaffold [code] [doc]")
  .description("Suggest links for unannotated code and write the accepted ones")
  .option("-c, --config <file>", "Path to doclink.yaml")
  .option("--project-root <path>", "Project root (default: current directory)")
  .option("--dry-run", "Show what would be annotated without writing")
  .option("-y, --yes", "Accept every suggestion without prompting")
  .action(async (code: string | undefined, doc: string | undefined, options: ScaffoldOptions) => {
    const { scaffoldCommand } = await import("../commands/scaffold.js");
    const exitCode = await scaffoldCommand(code, doc, options);
    process.exit(exitCode);
  });

program
  .command("watch [code] [doc]")
  .description("Re-validate whenever a watched file changes")
  .option("-c, --config <file>", "Path to doclink.yaml")
  .option("--project-root <path>", "Project root (default: current directory)")
  .action(async (code: string | undefined, doc: string | undefined, options: WatchOptions) => {
    const { watchCommand } = await import("../commands/watch.js");
    const exitCode = await watchCommand(code, doc, options);
    process.exit(exitCode);
  });

program
  .command("init [path]")
  .description("Create a doclink.yaml for the project")
  .option("-y, --yes", "Non-interactive mode (skip prompts)")
  .action(async (projectPath: string | undefined, options: InitOptions) => {
    const { initCommand } = await import("../commands/init.js");
    const exitCode = await initCommand(projectPath, options);
    process.exit(exitCode);
  });

program.exitOverride((err) => {
  // usage errors exit with status 2; help and version keep their own code
  process.exit(err.exitCode === 0 ? 0 : 2);
});

await program.parseAsync();
