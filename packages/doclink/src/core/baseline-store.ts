import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";

import { BASELINE_VERSION, snapshotFromEntries } from "./baseline.js";
import { BaselineCorruptionError, errorMessage } from "./errors.js";

import type { BaselineEntry, BaselineSnapshot, FindingKind } from "../types/index.js";

export const DEFAULT_BASELINE_PATH = ".doclink/baseline.yaml";

const FINDING_KINDS: readonly FindingKind[] = [
  "link-verified",
  "link-missing",
  "ghost-argument",
  "missing-argument",
  "type-mismatch",
];

interface BaselineFile {
  version: string;
  generated_at: string;
  entries: {
    fingerprint: string;
    kind: FindingKind;
    entity: string;
    file: string;
    doc_id: string;
    subject?: string;
  }[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isFindingKind(value: unknown): value is FindingKind {
  return typeof value === "string" && (FINDING_KINDS as readonly string[]).includes(value);
}

function parseEntry(raw: unknown, index: number, filePath: string): BaselineEntry {
  const fail = (reason: string) => new BaselineCorruptionError(filePath, `entry ${index + 1} ${reason}`);

  if (!isRecord(raw)) throw fail("is not an object");
  if (typeof raw.fingerprint !== "string" || !raw.fingerprint) throw fail("has no 'fingerprint'");
  if (!isFindingKind(raw.kind)) throw fail(`has an unknown 'kind': ${String(raw.kind)}`);
  if (typeof raw.entity !== "string") throw fail("has no 'entity'");
  if (typeof raw.file !== "string") throw fail("has no 'file'");
  if (typeof raw.doc_id !== "string") throw fail("has no 'doc_id'");
  if (raw.subject != null && typeof raw.subject !== "string") throw fail("has a non-string 'subject'");

  const entry: BaselineEntry = {
    fingerprint: raw.fingerprint,
    kind: raw.kind,
    entity: raw.entity,
    file: raw.file,
    docId: raw.doc_id,
  };
  if (typeof raw.subject === "string") entry.subject = raw.subject;
  return entry;
}

export function parseBaseline(content: string, filePath: string): BaselineSnapshot {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    throw new BaselineCorruptionError(filePath, `not valid YAML (${errorMessage(err)})`, { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new BaselineCorruptionError(filePath, "expected a mapping at the top level");
  }
  if (parsed.version !== BASELINE_VERSION) {
    throw new BaselineCorruptionError(
      filePath,
      `unsupported version '${String(parsed.version)}' (expected '${BASELINE_VERSION}')`,
    );
  }
  if (!Array.isArray(parsed.entries)) {
    throw new BaselineCorruptionError(filePath, "'entries' must be a list");
  }

  const entries = parsed.entries.map((raw: unknown, i: number) => parseEntry(raw, i, filePath));
  const generatedAt = typeof parsed.generated_at === "string" ? parsed.generated_at : "";
  return snapshotFromEntries(entries, generatedAt);
}

/**
 * Load the snapshot once at invocation start.
 * Absent file → null (cold mode); anything unreadable or malformed throws.
 */
export function loadBaseline(filePath: string): BaselineSnapshot | null {
  if (!fs.existsSync(filePath)) return null;

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new BaselineCorruptionError(filePath, `cannot be read (${errorMessage(err)})`, { cause: err });
  }
  return parseBaseline(content, filePath);
}

export function serializeBaseline(snapshot: BaselineSnapshot): string {
  const file: BaselineFile = {
    version: snapshot.version,
    generated_at: snapshot.generatedAt,
    entries: snapshot.entries.map((e) => ({
      fingerprint: e.fingerprint,
      kind: e.kind,
      entity: e.entity,
      file: e.file,
      doc_id: e.docId,
      ...(e.subject !== undefined ? { subject: e.subject } : {}),
    })),
  };
  return yaml.dump(file, { lineWidth: 120, noRefs: true, quotingType: '"' });
}

export function saveBaseline(filePath: string, snapshot: BaselineSnapshot): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, serializeBaseline(snapshot), "utf8");
}

export function resolveBaselinePath(projectRoot: string, configured?: string): string {
  return path.resolve(projectRoot, configured ?? DEFAULT_BASELINE_PATH);
}
