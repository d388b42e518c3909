import { DuplicateDocIdError } from "./errors.js";
import { normalize } from "./type-normalizer.js";
import { toEntityRef, toSectionRef } from "../types/index.js";

import type { TypeAliases } from "./type-normalizer.js";
import type {
  Arg,
  CodeEntity,
  DocSection,
  Parameter,
  ValidationResult,
} from "../types/index.js";

export interface ValidateOptions {
  aliases?: TypeAliases;
}

export type SectionIndex = ReadonlyMap<string, DocSection>;

/**
 * Build the id → section lookup once per validation.
 * Two sections sharing an id is a pre-condition failure, not a finding.
 */
export function buildSectionIndex(sections: readonly DocSection[]): SectionIndex {
  const index = new Map<string, DocSection>();
  for (const section of sections) {
    const existing = index.get(section.id);
    if (existing) {
      throw new DuplicateDocIdError({
        file: section.file,
        docId: section.id,
        lines: [existing.line, section.line],
        sectionIds: [section.id],
        firstFile: existing.file === section.file ? undefined : existing.file,
      });
    }
    index.set(section.id, section);
  }
  return index;
}

function sectionLabel(section: DocSection): string {
  return section.title ?? section.id;
}

function formatType(raw: string, normalized: string): string {
  return `'${raw}' (${normalized})`;
}

function checkArguments(
  entity: CodeEntity,
  docId: string,
  section: DocSection,
  options: ValidateOptions,
): ValidationResult[] {
  const paramsByName = new Map<string, Parameter>(entity.parameters.map((p) => [p.name, p]));
  const argsByName = new Map<string, Arg>(section.args.map((a) => [a.name, a]));
  const base = {
    location: { file: entity.file, line: entity.line },
    entity: toEntityRef(entity),
    section: toSectionRef(section),
    docId,
  };

  // one ghost per documented name, however often the section repeats it
  const ghosts: ValidationResult[] = [...argsByName.values()]
    .filter((arg) => !paramsByName.has(arg.name))
    .map((arg): ValidationResult => ({
      ...base,
      severity: "warning",
      kind: "ghost-argument",
      subject: arg.name,
      message: `Ghost argument: '${arg.name}' is documented in '${sectionLabel(section)}' but ${entity.name} has no such parameter.`,
      hint: `Remove '${arg.name}' from the documentation or add it to the signature of ${entity.name}.`,
    }));

  const missing: ValidationResult[] = entity.parameters
    .filter((param) => !argsByName.has(param.name))
    .map((param): ValidationResult => ({
      ...base,
      severity: "warning",
      kind: "missing-argument",
      subject: param.name,
      message: `Missing argument: parameter '${param.name}' of ${entity.name} is not documented in '${sectionLabel(section)}'.`,
      hint: `Document '${param.name}' in the section marked '${docId}' (${section.file}:${section.line}).`,
    }));

  const mismatches: ValidationResult[] = [];
  for (const param of entity.parameters) {
    const arg = argsByName.get(param.name);
    if (param.type === undefined || arg?.type === undefined) continue;

    const codeNormalized = normalize(param.type, options.aliases);
    const docNormalized = normalize(arg.type, options.aliases);
    if (codeNormalized === "unknown" || docNormalized === "unknown" || codeNormalized === docNormalized) continue;

    mismatches.push({
      ...base,
      severity: "warning",
      kind: "type-mismatch",
      subject: param.name,
      types: { code: param.type, doc: arg.type, codeNormalized, docNormalized },
      message: `Type mismatch on '${param.name}': code has ${formatType(param.type, codeNormalized)}, docs say ${formatType(arg.type, docNormalized)}.`,
      hint: `Change the documented type of '${param.name}' to '${param.type}', or declare '${arg.type}' as an alias in doclink.yaml.`,
    });
  }

  return [...ghosts, ...missing, ...mismatches];
}

function validateEntity(
  entity: CodeEntity,
  docId: string,
  index: SectionIndex,
  options: ValidateOptions,
): ValidationResult[] {
  const location = { file: entity.file, line: entity.line };
  const section = index.get(docId);

  if (!section) {
    return [
      {
        severity: "error",
        kind: "link-missing",
        location,
        entity: toEntityRef(entity),
        docId,
        message: `Documentation id '${docId}' linked from ${entity.name} was not found in any documentation file.`,
        hint: `Add \`<!-- @docs-id: ${docId} -->\` above the section that documents ${entity.name}, or fix the annotation.`,
      },
    ];
  }

  const verified: ValidationResult = {
    severity: "info",
    kind: "link-verified",
    location,
    entity: toEntityRef(entity),
    section: toSectionRef(section),
    docId,
    message: `Link verified: ${entity.name} <-> '${sectionLabel(section)}' (${section.file}:${section.line}).`,
  };

  return [verified, ...checkArguments(entity, docId, section, options)];
}

/**
 * Cross-reference code entities against documentation sections.
 * Pure: no I/O, and the result order depends only on the input order.
 */
export function validateLinks(
  entities: readonly CodeEntity[],
  sections: readonly DocSection[],
  options: ValidateOptions = {},
): ValidationResult[] {
  const index = buildSectionIndex(sections);
  const results: ValidationResult[] = [];

  for (const entity of entities) {
    // unlinked entities belong to the heuristic matcher
    if (entity.docId === undefined) continue;
    results.push(...validateEntity(entity, entity.docId, index, options));
  }

  return results;
}

export function hasBlockingFindings(
  results: readonly Pick<ValidationResult, "severity">[],
  options: { failOnWarnings?: boolean } = {},
): boolean {
  return results.some((r) => r.severity === "error" || (options.failOnWarnings === true && r.severity === "warning"));
}
