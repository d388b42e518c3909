import { parseTypeScriptSource } from "../adapters/typescript-source.js";
import { tokenizeMarkdown } from "../adapters/markdown-tokens.js";
import { readSourceFile } from "../adapters/source-files.js";
import { applyBaseline, createSnapshot, summarize } from "./baseline.js";
import { loadBaseline, saveBaseline } from "./baseline-store.js";
import { extractEntities } from "./code-extractor.js";
import { collectFiles } from "./discovery.js";
import { DuplicateDocIdError, ParseFailureError, errorMessage } from "./errors.js";
import { toProjectPath } from "./paths.js";
import { extractSections } from "./section-extractor.js";
import { hasBlockingFindings, validateLinks } from "./validator.js";

import type { CollectedFiles, SourceSelection } from "./discovery.js";
import type {
  BaselineSnapshot,
  CheckResult,
  CodeEntity,
  DebugLogger,
  DocSection,
  DoclinkConfig,
  FileFailure,
  ValidationResult,
} from "../types/index.js";

export const REPORT_VERSION = "1";

const PARSE_FAILURE_HINT = "Fix the file or exclude it through 'sources.ignore' in doclink.yaml.";
const DUPLICATE_ID_HINT = "Give every documented section its own @docs-id; this document is skipped until then.";

export interface ParsedProject {
  codeFiles: string[]; // project-relative
  docFiles: string[];
  entities: CodeEntity[];
  sections: DocSection[];
  failures: FileFailure[];
  skippedEntities: number;
}

export interface RunContext {
  projectRoot: string;
  config: DoclinkConfig;
  logger: DebugLogger;
}

function parseFailure(err: unknown, file: string): FileFailure {
  if (err instanceof ParseFailureError) {
    return { kind: "parse-failure", file, message: err.message, hint: PARSE_FAILURE_HINT };
  }
  return { kind: "parse-failure", file, message: `Failed to parse ${file}: ${errorMessage(err)}`, hint: PARSE_FAILURE_HINT };
}

function duplicateFailure(err: DuplicateDocIdError): FileFailure {
  return { kind: "duplicate-doc-id", file: err.file, message: err.message, hint: DUPLICATE_ID_HINT };
}

function parseCodeFiles(ctx: RunContext, files: readonly string[], failures: FileFailure[]): CodeEntity[] {
  const entities: CodeEntity[] = [];
  for (const absPath of files) {
    const file = toProjectPath(ctx.projectRoot, absPath);
    try {
      const declarations = parseTypeScriptSource(readSourceFile(absPath, file), file);
      const extracted = extractEntities(declarations, file);
      ctx.logger.log("parse", "code file parsed", { file, entities: extracted.length });
      entities.push(...extracted);
    } catch (err) {
      const failure = parseFailure(err, file);
      ctx.logger.log("parse", "code file failed", { file, error: failure.message });
      failures.push(failure);
    }
  }
  return entities;
}

/**
 * Extract sections document by document. A document that repeats an id,
 * internally or against an earlier document, is dropped whole and its ids
 * are reported back so entities pointing at them can be skipped.
 */
function parseDocFiles(
  ctx: RunContext,
  files: readonly string[],
  failures: FileFailure[],
): { sections: DocSection[]; droppedIds: Set<string> } {
  const sections: DocSection[] = [];
  const ownerById = new Map<string, DocSection>();
  const droppedIds = new Set<string>();

  for (const absPath of files) {
    const file = toProjectPath(ctx.projectRoot, absPath);
    let docSections: DocSection[];
    try {
      docSections = extractSections(tokenizeMarkdown(readSourceFile(absPath, file)), file);
      assertNotDeclaredEarlier(docSections, ownerById, file);
    } catch (err) {
      if (err instanceof DuplicateDocIdError) {
        for (const id of err.sectionIds) droppedIds.add(id);
        ctx.logger.log("parse", "document dropped", { file, docId: err.docId });
        failures.push(duplicateFailure(err));
      } else {
        const failure = parseFailure(err, file);
        ctx.logger.log("parse", "document failed", { file, error: failure.message });
        failures.push(failure);
      }
      continue;
    }

    for (const section of docSections) ownerById.set(section.id, section);
    ctx.logger.log("parse", "document parsed", { file, sections: docSections.length });
    sections.push(...docSections);
  }

  return { sections, droppedIds };
}

function assertNotDeclaredEarlier(
  docSections: readonly DocSection[],
  ownerById: ReadonlyMap<string, DocSection>,
  file: string,
): void {
  for (const section of docSections) {
    const earlier = ownerById.get(section.id);
    if (!earlier) continue;
    throw new DuplicateDocIdError({
      file,
      docId: section.id,
      lines: [earlier.line, section.line],
      sectionIds: docSections.map((s) => s.id),
      firstFile: earlier.file,
    });
  }
}

export function parseProject(ctx: RunContext, files: CollectedFiles): ParsedProject {
  const failures: FileFailure[] = [];
  const allEntities = parseCodeFiles(ctx, files.code, failures);
  const { sections, droppedIds } = parseDocFiles(ctx, files.docs, failures);

  // an id whose document was dropped has no trustworthy target
  const entities = allEntities.filter((e) => e.docId === undefined || !droppedIds.has(e.docId));

  return {
    codeFiles: files.code.map((f) => toProjectPath(ctx.projectRoot, f)),
    docFiles: files.docs.map((f) => toProjectPath(ctx.projectRoot, f)),
    entities,
    sections,
    failures,
    skippedEntities: allEntities.length - entities.length,
  };
}

export function validateProject(ctx: RunContext, project: ParsedProject): ValidationResult[] {
  const results = validateLinks(project.entities, project.sections, { aliases: ctx.config.types.aliases });
  ctx.logger.log("validate", "validation finished", {
    entities: project.entities.length,
    sections: project.sections.length,
    findings: results.length,
  });
  return results;
}

export interface CheckRequest extends RunContext {
  selection?: SourceSelection;
  baselinePath: string; // absolute
  failOnWarnings?: boolean;
}

export function buildCheckResult(
  req: CheckRequest,
  project: ParsedProject,
  results: readonly ValidationResult[],
  snapshot: BaselineSnapshot | null,
): CheckResult {
  const baselined = applyBaseline(results, snapshot);
  const failOnWarnings = req.failOnWarnings ?? req.config.check.failOnWarnings;

  return {
    version: REPORT_VERSION,
    project: req.projectRoot,
    files: { code: project.codeFiles, docs: project.docFiles },
    stats: {
      entities: project.entities.length,
      linkedEntities: project.entities.filter((e) => e.docId !== undefined).length,
      sections: project.sections.length,
      skippedEntities: project.skippedEntities,
    },
    baseline: {
      mode: snapshot ? "warm" : "cold",
      path: toProjectPath(req.projectRoot, req.baselinePath),
    },
    results: baselined,
    failures: project.failures,
    summary: summarize(baselined),
    blocking: project.failures.length > 0 || hasBlockingFindings(baselined, { failOnWarnings }),
  };
}

/**
 * One full validation pass: load the baseline once, collect and parse
 * every file, cross-reference, then classify against the baseline.
 */
export async function runCheck(req: CheckRequest): Promise<CheckResult> {
  const snapshot = loadBaseline(req.baselinePath);
  req.logger.log("baseline", snapshot ? "baseline loaded" : "no baseline, cold mode", {
    path: req.baselinePath,
    entries: snapshot?.entries.length ?? 0,
  });

  const files = await collectFiles(req.projectRoot, req.config, req.selection);
  const project = parseProject(req, files);
  const results = validateProject(req, project);
  return buildCheckResult(req, project, results, snapshot);
}

export interface BaselineDump {
  snapshot: BaselineSnapshot;
  project: ParsedProject;
}

// record the current finding set as accepted; never reads the previous baseline
export async function runBaselineDump(req: CheckRequest): Promise<BaselineDump> {
  const files = await collectFiles(req.projectRoot, req.config, req.selection);
  const project = parseProject(req, files);
  const snapshot = createSnapshot(validateProject(req, project));

  saveBaseline(req.baselinePath, snapshot);
  req.logger.log("baseline", "baseline written", { path: req.baselinePath, entries: snapshot.entries.length });
  return { snapshot, project };
}
