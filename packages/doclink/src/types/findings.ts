import type { EntityRef, SectionRef } from "./entities.js";
import type { CanonicalType } from "../core/type-normalizer.js";

export type Severity = "info" | "warning" | "error";

export type FindingKind =
  | "link-verified"
  | "link-missing"
  | "ghost-argument"
  | "missing-argument"
  | "type-mismatch";

export interface SourceLocation {
  file: string;
  line: number;
}

export interface TypeComparison {
  code: string;
  doc: string;
  codeNormalized: CanonicalType;
  docNormalized: CanonicalType;
}

export interface ValidationResult {
  severity: Severity;
  kind: FindingKind;
  location: SourceLocation;
  message: string;
  hint?: string;
  entity: EntityRef;
  section?: SectionRef;
  docId: string;
  subject?: string; // offending argument/parameter name
  types?: TypeComparison;
}

export type BaselineStatus = "new" | "known";

export interface BaselinedResult extends ValidationResult {
  baseline: BaselineStatus;
  originalSeverity?: Severity; // set when a known finding was demoted
}

export interface BaselineEntry {
  fingerprint: string;
  kind: FindingKind;
  entity: string;
  file: string;
  docId: string;
  subject?: string;
}

export interface BaselineSnapshot {
  readonly version: "1";
  readonly generatedAt: string;
  readonly entries: readonly BaselineEntry[];
  readonly fingerprints: ReadonlySet<string>;
}

export interface LinkSuggestion {
  entity: EntityRef;
  section: SectionRef;
  score: number;
}

export type LinkDecisionKind = "accept" | "reject" | "skip";

export interface LinkDecision {
  suggestion: LinkSuggestion;
  decision: LinkDecisionKind;
}

export type FailureKind = "parse-failure" | "duplicate-doc-id";

export interface FileFailure {
  kind: FailureKind;
  file: string;
  message: string;
  hint?: string;
}

export interface FindingSummary {
  errors: number;
  warnings: number;
  infos: number;
  known: number;
  new: number;
}

export interface CheckResult {
  version: string;
  project: string;
  files: {
    code: string[];
    docs: string[];
  };
  stats: {
    entities: number;
    linkedEntities: number;
    sections: number;
    skippedEntities: number;
  };
  baseline: {
    mode: "cold" | "warm";
    path: string;
  };
  results: BaselinedResult[];
  failures: FileFailure[];
  summary: FindingSummary;
  blocking: boolean;
}
