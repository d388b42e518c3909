export type {
  Parameter,
  EntityKind,
  CodeEntity,
  Arg,
  ArgStrategyKind,
  DocSection,
  DeclarationNode,
  MarkdownToken,
  EntityRef,
  SectionRef,
} from "./entities.js";

export { toEntityRef, toSectionRef } from "./entities.js";

export type {
  Severity,
  FindingKind,
  SourceLocation,
  TypeComparison,
  ValidationResult,
  BaselineStatus,
  BaselinedResult,
  BaselineEntry,
  BaselineSnapshot,
  LinkSuggestion,
  LinkDecisionKind,
  LinkDecision,
  FailureKind,
  FileFailure,
  FindingSummary,
  CheckResult,
} from "./findings.js";

export type { LogCategory, DoclinkConfig, DebugLogger } from "./config.js";

export type {
  CheckOptions,
  BaselineOptions,
  ScaffoldOptions,
  WatchOptions,
  InitOptions,
} from "./cli-options.js";
