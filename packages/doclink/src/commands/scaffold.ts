import * as fs from "node:fs";
import * as path from "node:path";

import { collectFiles } from "../core/discovery.js";
import { MIN_CONFIDENCE, findCandidates } from "../core/heuristic.js";
import { parseProject } from "../core/pipeline.js";
import { formatSuggestion, loadChalk } from "../formatters/human.js";
import { applyAnnotations, toAnnotation } from "../scaffold/annotation-writer.js";
import { createCommandContext, reportFatal } from "./context.js";

import type { CommandContext } from "./context.js";
import type { LinkDecision, LinkDecisionKind, LinkSuggestion, ScaffoldOptions } from "../types/index.js";

export type DecisionPrompt = (suggestion: LinkSuggestion) => Promise<LinkDecisionKind>;

async function promptDecision(suggestion: LinkSuggestion): Promise<LinkDecisionKind> {
  const { select } = await import("@inquirer/prompts");
  return select<LinkDecisionKind>({
    message: `Link ${suggestion.entity.name} to '${suggestion.section.id}'?`,
    choices: [
      { name: "Accept", value: "accept" },
      { name: "Reject", value: "reject" },
      { name: "Skip", value: "skip" },
    ],
    default: "skip",
  });
}

// group accepted suggestions per source file and write the annotations
function writeAccepted(ctx: CommandContext, accepted: readonly LinkSuggestion[], dryRun: boolean): string[] {
  const byFile = new Map<string, LinkSuggestion[]>();
  for (const suggestion of accepted) {
    const list = byFile.get(suggestion.entity.file) ?? [];
    list.push(suggestion);
    byFile.set(suggestion.entity.file, list);
  }

  const touched: string[] = [];
  for (const [file, suggestions] of byFile) {
    const absPath = path.resolve(ctx.projectRoot, file);
    const source = fs.readFileSync(absPath, "utf8");
    const updated = applyAnnotations(source, suggestions.map(toAnnotation));
    if (updated === source) continue;

    if (!dryRun) fs.writeFileSync(absPath, updated, "utf8");
    ctx.logger.log("scaffold", dryRun ? "annotations previewed" : "annotations written", {
      file,
      count: suggestions.length,
    });
    touched.push(file);
  }
  return touched;
}

export async function scaffoldCommand(
  codePath: string | undefined,
  docPath: string | undefined,
  options: ScaffoldOptions,
  decide: DecisionPrompt = promptDecision,
): Promise<number> {
  let ctx: CommandContext;
  let suggestions: LinkSuggestion[];
  try {
    ctx = createCommandContext(options);
    const files = await collectFiles(ctx.projectRoot, ctx.config, { code: codePath, doc: docPath });
    const project = parseProject(ctx, files);
    suggestions = findCandidates(project.entities, project.sections);
    ctx.logger.log("match", "suggestions computed", { count: suggestions.length });
    if (project.failures.length > 0) {
      console.error(`Warning: ${project.failures.length} file(s) could not be read and were not considered.`);
    }
  } catch (err) {
    return reportFatal(err);
  }

  if (suggestions.length === 0) {
    console.log(`No link suggestions above ${MIN_CONFIDENCE.toFixed(2)} confidence.`);
    return 0;
  }

  const chalk = await loadChalk();
  const decisions: LinkDecision[] = [];
  for (const suggestion of suggestions) {
    console.log(formatSuggestion(chalk, suggestion));
    const decision = options.yes ? "accept" : await decide(suggestion);
    decisions.push({ suggestion, decision });
  }

  const accepted = decisions.filter((d) => d.decision === "accept").map((d) => d.suggestion);
  const touched = writeAccepted(ctx, accepted, options.dryRun === true);

  const rejected = decisions.filter((d) => d.decision === "reject").length;
  const skipped = decisions.length - accepted.length - rejected;
  const verb = options.dryRun ? "Would annotate" : "Annotated";
  console.log(`${verb} ${accepted.length} declaration(s) in ${touched.length} file(s); ${rejected} rejected, ${skipped} skipped.`);
  for (const file of touched) console.log(`  ${file}`);
  return 0;
}
