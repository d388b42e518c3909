import { createHash } from "node:crypto";

import type {
  BaselinedResult,
  BaselineEntry,
  BaselineSnapshot,
  FindingSummary,
  ValidationResult,
} from "../types/index.js";

export const BASELINE_VERSION = "1";

// line numbers and message wording are left out so unrelated edits don't invalidate entries
export function fingerprint(result: ValidationResult): string {
  const identity = [result.kind, result.entity.file, result.entity.name, result.docId, result.subject ?? ""].join("|");
  return createHash("sha256").update(identity).digest("hex").slice(0, 16);
}

export function toBaselineEntry(result: ValidationResult): BaselineEntry {
  const entry: BaselineEntry = {
    fingerprint: fingerprint(result),
    kind: result.kind,
    entity: result.entity.name,
    file: result.entity.file,
    docId: result.docId,
  };
  if (result.subject !== undefined) entry.subject = result.subject;
  return entry;
}

export function snapshotFromEntries(entries: readonly BaselineEntry[], generatedAt: string): BaselineSnapshot {
  return Object.freeze({
    version: BASELINE_VERSION,
    generatedAt,
    entries: Object.freeze([...entries]),
    fingerprints: new Set(entries.map((e) => e.fingerprint)),
  });
}

/** Fingerprint the full finding set, whatever its severities. */
export function createSnapshot(
  results: readonly ValidationResult[],
  generatedAt: string = new Date().toISOString(),
): BaselineSnapshot {
  const seen = new Set<string>();
  const entries: BaselineEntry[] = [];
  for (const result of results) {
    const entry = toBaselineEntry(result);
    if (seen.has(entry.fingerprint)) continue;
    seen.add(entry.fingerprint);
    entries.push(entry);
  }
  return snapshotFromEntries(entries, generatedAt);
}

/**
 * Cold (no snapshot): findings pass through unchanged.
 * Warm: known findings are demoted to info; the rest keep their severity.
 */
export function applyBaseline(
  results: readonly ValidationResult[],
  snapshot: BaselineSnapshot | null,
): BaselinedResult[] {
  if (!snapshot) {
    return results.map((r): BaselinedResult => ({ ...r, baseline: "new" }));
  }

  return results.map((r): BaselinedResult => {
    if (!snapshot.fingerprints.has(fingerprint(r))) {
      return { ...r, baseline: "new" };
    }
    return r.severity === "info"
      ? { ...r, baseline: "known" }
      : { ...r, baseline: "known", severity: "info", originalSeverity: r.severity };
  });
}

export function summarize(results: readonly BaselinedResult[]): FindingSummary {
  const summary: FindingSummary = { errors: 0, warnings: 0, infos: 0, known: 0, new: 0 };
  for (const r of results) {
    if (r.severity === "error") summary.errors++;
    else if (r.severity === "warning") summary.warnings++;
    else summary.infos++;

    if (r.baseline === "known") summary.known++;
    else summary.new++;
  }
  return summary;
}
