// primary public API
export { runCheck, runBaselineDump, parseProject, validateProject, buildCheckResult } from "./core/pipeline.js";
export type { CheckRequest, ParsedProject, RunContext, BaselineDump } from "./core/pipeline.js";

export { validateLinks, buildSectionIndex, hasBlockingFindings } from "./core/validator.js";
export { findCandidates, scoreMatch, similarity, MIN_CONFIDENCE } from "./core/heuristic.js";
export { normalize, typesDiffer, CANONICAL_TYPES } from "./core/type-normalizer.js";
export type { CanonicalType, TypeAliases } from "./core/type-normalizer.js";
export { extractSections } from "./core/section-extractor.js";
export { extractEntities } from "./core/code-extractor.js";
export { extractArgs, ARG_STRATEGIES } from "./core/arg-strategies.js";
export type { ArgStrategy } from "./core/arg-strategies.js";

// baseline
export { fingerprint, createSnapshot, applyBaseline, summarize } from "./core/baseline.js";
export { loadBaseline, saveBaseline, parseBaseline, serializeBaseline } from "./core/baseline-store.js";

// config & errors
export { loadConfig, createDefaultConfig } from "./core/config.js";
export {
  DoclinkError,
  ParseFailureError,
  DuplicateDocIdError,
  BaselineCorruptionError,
  ConfigError,
  MissingInputError,
} from "./core/errors.js";

// adapters
export { parseTypeScriptSource } from "./adapters/typescript-source.js";
export { tokenizeMarkdown } from "./adapters/markdown-tokens.js";
export { applyAnnotations } from "./scaffold/annotation-writer.js";
export type { Annotation } from "./scaffold/annotation-writer.js";
export { RunScheduler } from "./watch/run-scheduler.js";

// primary types
export type {
  CodeEntity,
  DocSection,
  Parameter,
  Arg,
  DeclarationNode,
  MarkdownToken,
  ValidationResult,
  BaselinedResult,
  BaselineSnapshot,
  LinkSuggestion,
  LinkDecision,
  CheckResult,
  FileFailure,
  Severity,
  FindingKind,
  DoclinkConfig,
} from "./types/index.js";
