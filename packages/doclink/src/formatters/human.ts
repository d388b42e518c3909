import type { ChalkInstance } from "chalk";
import type {
  BaselinedResult,
  BaselineSnapshot,
  CheckResult,
  FileFailure,
  LinkSuggestion,
  Severity,
} from "../types/index.js";

type ChalkColor = "red" | "yellow" | "blue";

export interface HumanFormatOptions {
  color?: boolean;
  verbose?: boolean; // include info findings
}

const RULE = "─".repeat(60);

const ICONS: Record<Severity, string> = { error: "[X]", warning: "[!]", info: "[i]" };
const COLORS: Record<Severity, ChalkColor> = { error: "red", warning: "yellow", info: "blue" };

export async function loadChalk(color = true): Promise<ChalkInstance> {
  const { default: chalk, Chalk } = await import("chalk");
  return color ? chalk : new Chalk({ level: 0 });
}

/**
 * The fixed three-line rendering of a finding:
 * status and location, the concrete explanation, then the linked id and next step.
 */
export function formatFinding(chalk: ChalkInstance, result: BaselinedResult): string {
  const { severity, entity, location } = result;
  const known = result.baseline === "known" && result.originalSeverity ? ` (baselined ${result.originalSeverity})` : "";
  const head = `${ICONS[severity]} ${severity} in ${entity.name} (${location.file}:${location.line})${known}`;

  return [
    chalk[COLORS[severity]](head),
    `    -> ${result.message}`,
    `    -> [${result.docId}] ${result.hint ?? "No action needed."}`,
  ].join("\n");
}

export function formatFailure(chalk: ChalkInstance, failure: FileFailure): string {
  return [
    chalk.red(`${ICONS.error} ${failure.kind} in ${failure.file}`),
    `    -> ${failure.message}`,
    `    -> ${failure.hint ?? "Fix the file and run again."}`,
  ].join("\n");
}

function pushGroup(lines: string[], chalk: ChalkInstance, title: string, color: ChalkColor, body: string[]): void {
  if (body.length === 0) return;
  lines.push(chalk[color].bold(`${title} (${body.length})`));
  lines.push(chalk[color](RULE));
  lines.push(...body);
  lines.push("");
}

export async function formatCheckHuman(result: CheckResult, options: HumanFormatOptions = {}): Promise<string> {
  const chalk = await loadChalk(options.color);
  const lines: string[] = [];
  const { stats } = result;

  lines.push(chalk.bold(`doclink check: ${result.project}`));
  lines.push(chalk.dim(`Baseline: ${result.baseline.mode} (${result.baseline.path})`));
  lines.push(
    chalk.dim(
      `Files: ${result.files.code.length} code, ${result.files.docs.length} docs | ` +
        `Entities: ${stats.entities} (${stats.linkedEntities} linked, ${stats.skippedEntities} skipped) | ` +
        `Sections: ${stats.sections}`,
    ),
  );
  lines.push("");

  const bySeverity = (severity: Severity) =>
    result.results.filter((r) => r.severity === severity).map((r) => formatFinding(chalk, r));

  pushGroup(lines, chalk, "FILE FAILURES", "red", result.failures.map((f) => formatFailure(chalk, f)));
  pushGroup(lines, chalk, "ERRORS", "red", bySeverity("error"));
  pushGroup(lines, chalk, "WARNINGS", "yellow", bySeverity("warning"));
  if (options.verbose) pushGroup(lines, chalk, "INFO", "blue", bySeverity("info"));

  // summary
  const s = result.summary;
  lines.push(chalk.bold("SUMMARY"));
  lines.push(RULE);
  lines.push(`  Errors: ${s.errors}`);
  lines.push(`  Warnings: ${s.warnings}`);
  lines.push(`  Info: ${s.infos}`);
  lines.push(`  Baselined: ${s.known} known, ${s.new} new`);
  if (result.failures.length > 0) lines.push(chalk.red(`  File failures: ${result.failures.length}`));
  lines.push("");

  if (result.blocking) {
    lines.push(chalk.red.bold("RESULT: FAIL"));
  } else if (s.warnings > 0) {
    lines.push(chalk.yellow.bold("RESULT: PASS (with warnings)"));
  } else {
    lines.push(chalk.green.bold("RESULT: PASS"));
  }

  return lines.join("\n");
}

export function formatSuggestion(chalk: ChalkInstance, suggestion: LinkSuggestion): string {
  const { entity, section } = suggestion;
  const title = section.title ? ` '${section.title}'` : "";
  return [
    chalk.blue(`[?] ${entity.name} (${entity.file}:${entity.line})`),
    `    -> looks like section${title} (${section.file}:${section.line}), confidence ${suggestion.score.toFixed(2)}`,
    `    -> [${section.id}] accept to add \`// @docs: [${section.id}]\` above ${entity.name}`,
  ].join("\n");
}

export async function formatBaselineHuman(
  snapshot: BaselineSnapshot,
  path: string,
  failures: readonly FileFailure[],
  options: HumanFormatOptions = {},
): Promise<string> {
  const chalk = await loadChalk(options.color);
  const lines: string[] = [];
  lines.push(chalk.green(`Baseline written to ${path} (${snapshot.entries.length} entries)`));
  for (const failure of failures) {
    lines.push(formatFailure(chalk, failure));
  }
  if (failures.length > 0) {
    lines.push(chalk.yellow(`${failures.length} file(s) could not be read and are not part of the baseline.`));
  }
  return lines.join("\n");
}
