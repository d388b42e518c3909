import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";

import { createDefaultConfig } from "../../src/core/config.js";
import { MissingInputError } from "../../src/core/errors.js";
import { createNoopLogger } from "../../src/core/logger.js";
import { runBaselineDump, runCheck } from "../../src/core/pipeline.js";
import { AUTH_DOC, AUTH_SOURCE, createTempProject, writeFiles } from "../helpers/project.js";

import type { CheckRequest } from "../../src/core/pipeline.js";

let root: string;

function request(overrides: Partial<CheckRequest> = {}): CheckRequest {
  return {
    projectRoot: root,
    config: createDefaultConfig(),
    logger: createNoopLogger(),
    baselinePath: path.join(root, ".doclink", "baseline.yaml"),
    ...overrides,
  };
}

beforeEach(() => {
  root = createTempProject("doclink-pipeline-");
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("runCheck", () => {
  beforeEach(() => {
    writeFiles(root, { "src/auth.ts": AUTH_SOURCE, "docs/auth.md": AUTH_DOC });
  });

  it("validates every linked entity in a cold run", async () => {
    const result = await runCheck(request());

    expect(result.files).toEqual({ code: ["src/auth.ts"], docs: ["docs/auth.md"] });
    expect(result.stats).toEqual({ entities: 3, linkedEntities: 2, sections: 2, skippedEntities: 0 });
    expect(result.baseline).toEqual({ mode: "cold", path: ".doclink/baseline.yaml" });
    expect(result.results.map((r) => `${r.entity.name}:${r.kind}:${r.subject ?? ""}`)).toEqual([
      "login:link-verified:",
      "login:ghost-argument:tenant_id",
      "login:missing-argument:password",
      "logout:link-missing:",
    ]);
    expect(result.results[3]?.location).toEqual({ file: "src/auth.ts", line: 5 });
    expect(result.summary).toEqual({ errors: 1, warnings: 2, infos: 1, known: 0, new: 4 });
    expect(result.failures).toEqual([]);
    expect(result.blocking).toBe(true);
  });

  it("gates only new findings once a baseline exists", async () => {
    const dump = await runBaselineDump(request());
    expect(dump.snapshot.entries).toHaveLength(4);
    expect(fs.existsSync(path.join(root, ".doclink", "baseline.yaml"))).toBe(true);

    const warm = await runCheck(request());
    expect(warm.baseline.mode).toBe("warm");
    expect(warm.summary).toEqual({ errors: 0, warnings: 0, infos: 4, known: 4, new: 0 });
    expect(warm.blocking).toBe(false);

    // a new undocumented parameter shows up as the only new finding
    writeFiles(root, {
      "src/auth.ts": AUTH_SOURCE.replace("login(username: string, password: string)", "login(username: string, password: string, otp: string)"),
    });
    const regressed = await runCheck(request());
    const fresh = regressed.results.filter((r) => r.baseline === "new");
    expect(fresh.map((r) => [r.kind, r.subject, r.severity])).toEqual([["missing-argument", "otp", "warning"]]);
    expect(regressed.blocking).toBe(false);
    expect((await runCheck(request({ failOnWarnings: true }))).blocking).toBe(true);
  });

  it("narrows the run to explicit paths", async () => {
    writeFiles(root, { "other/extra.ts": "// @docs: [nowhere]\nexport function extra() {}\n" });
    const result = await runCheck(request({ selection: { code: "other", doc: "docs/auth.md" } }));

    expect(result.files.code).toEqual(["other/extra.ts"]);
    expect(result.results.map((r) => r.kind)).toEqual(["link-missing"]);
  });

  it("fails fast on a missing input path", async () => {
    await expect(runCheck(request({ selection: { code: "nope" } }))).rejects.toThrow(MissingInputError);
  });
});

describe("file failures", () => {
  it("records a parse failure and keeps validating the other files", async () => {
    writeFiles(root, {
      "src/auth.ts": AUTH_SOURCE,
      "src/broken.ts": "export function broken(a: string {\n}\n",
      "docs/auth.md": AUTH_DOC,
    });

    const result = await runCheck(request());
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({ kind: "parse-failure", file: "src/broken.ts" });
    expect(result.results).toHaveLength(4);
    expect(result.blocking).toBe(true);
  });

  it("drops a document that re-declares an id and skips entities pointing at it", async () => {
    writeFiles(root, {
      "src/auth.ts": [
        "// @docs: [auth-login]",
        "export function login(username: string) {}",
        "// @docs: [other-id]",
        "export function other() {}",
        "// @docs: [third]",
        "export function third() {}",
        "",
      ].join("\n"),
      "docs/first.md": "<!-- @docs-id: auth-login -->\n## Login\n\n<!-- @docs-id: third -->\n## Third\n",
      "docs/second.md": "<!-- @docs-id: other-id -->\n## Other\n\n<!-- @docs-id: auth-login -->\n## Login again\n",
    });

    const result = await runCheck(request());
    expect(result.failures).toEqual([
      {
        kind: "duplicate-doc-id",
        file: "docs/second.md",
        message: "Documentation id 'auth-login' in docs/second.md is already declared in docs/first.md",
        hint: "Give every documented section its own @docs-id; this document is skipped until then.",
      },
    ]);
    expect(result.stats.sections).toBe(2);
    expect(result.stats.skippedEntities).toBe(2);
    expect(result.results.map((r) => `${r.entity.name}:${r.kind}`)).toEqual(["third:link-verified"]);
    expect(result.blocking).toBe(true);
  });
});
