import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

import { createSnapshot } from "../../src/core/baseline.js";
import {
  loadBaseline,
  parseBaseline,
  resolveBaselinePath,
  saveBaseline,
  serializeBaseline,
} from "../../src/core/baseline-store.js";
import { BaselineCorruptionError } from "../../src/core/errors.js";
import { makeResult } from "../helpers/fixtures.js";

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "doclink-baseline-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("baseline store", () => {
  it("returns null when no baseline exists", () => {
    expect(loadBaseline(path.join(tmpDir, "missing.yaml"))).toBeNull();
  });

  it("writes and reads back a snapshot", () => {
    const snapshot = createSnapshot(
      [makeResult(), makeResult({ severity: "info", kind: "link-verified", subject: undefined })],
      "2026-01-01T00:00:00.000Z",
    );
    const file = path.join(tmpDir, ".doclink", "baseline.yaml");

    saveBaseline(file, snapshot);
    const loaded = loadBaseline(file);

    expect(loaded?.version).toBe("1");
    expect(loaded?.generatedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(loaded?.entries).toEqual(snapshot.entries);
    expect([...(loaded?.fingerprints ?? [])]).toEqual(snapshot.entries.map((e) => e.fingerprint));
  });

  it("serializes with snake_case keys", () => {
    const text = serializeBaseline(createSnapshot([makeResult()], "2026-01-01T00:00:00.000Z"));
    expect(text).toMatch(/^version: "1"\n/);
    expect(text).toContain("    doc_id: auth-login\n");
    expect(text).toContain("    subject: password\n");
  });

  it("rejects invalid YAML", () => {
    expect(() => parseBaseline("entries: [unclosed", "b.yaml")).toThrow(BaselineCorruptionError);
  });

  it("rejects an unsupported version", () => {
    expect(() => parseBaseline('version: "2"\nentries: []\n', "b.yaml")).toThrow(
      "Baseline at b.yaml is unusable: unsupported version '2' (expected '1')",
    );
  });

  it("rejects entries that are not a list", () => {
    expect(() => parseBaseline('version: "1"\nentries: nope\n', "b.yaml")).toThrow("'entries' must be a list");
  });

  it("rejects an entry of unknown kind", () => {
    const text = [
      'version: "1"',
      "entries:",
      "  - fingerprint: abc",
      "    kind: bogus",
      "    entity: login",
      "    file: src/auth.ts",
      "    doc_id: auth-login",
      "",
    ].join("\n");
    expect(() => parseBaseline(text, "b.yaml")).toThrow("entry 1 has an unknown 'kind': bogus");
  });

  it("treats an empty file as corrupt, not absent", () => {
    const file = path.join(tmpDir, "empty.yaml");
    fs.writeFileSync(file, "");
    expect(() => loadBaseline(file)).toThrow(BaselineCorruptionError);
  });

  it("resolves the path against the project root", () => {
    expect(resolveBaselinePath("/project")).toBe(path.resolve("/project", ".doclink/baseline.yaml"));
    expect(resolveBaselinePath("/project", "ci/baseline.yaml")).toBe(path.resolve("/project", "ci/baseline.yaml"));
  });
});
