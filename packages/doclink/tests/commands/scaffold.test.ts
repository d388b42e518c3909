import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";

import { scaffoldCommand } from "../../src/commands/scaffold.js";
import { AUTH_DOC, AUTH_SOURCE, createTempProject, writeFiles } from "../helpers/project.js";

import type { LinkSuggestion } from "../../src/types/index.js";

let root: string;

beforeEach(() => {
  root = createTempProject("doclink-scaffold-");
  writeFiles(root, { "src/auth.ts": AUTH_SOURCE, "docs/auth.md": AUTH_DOC });
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function readSource(): string {
  return fs.readFileSync(path.join(root, "src", "auth.ts"), "utf8");
}

describe("scaffold command", () => {
  it("offers the matching section and writes an accepted link", async () => {
    const offered: LinkSuggestion[] = [];
    const exitCode = await scaffoldCommand(undefined, undefined, { projectRoot: root }, (suggestion) => {
      offered.push(suggestion);
      return Promise.resolve("accept");
    });

    expect(exitCode).toBe(0);
    expect(offered.map((s) => [s.entity.name, s.section.id])).toEqual([["createUser", "create-account"]]);
    expect(readSource().split("\n").slice(5, 8)).toEqual([
      "",
      "// @docs: [create-account]",
      "export function createUser(name: string) {}",
    ]);
  });

  it("accepts everything with --yes", async () => {
    const decide = vi.fn(() => Promise.resolve("reject" as const));
    await scaffoldCommand(undefined, undefined, { projectRoot: root, yes: true }, decide);

    expect(decide).not.toHaveBeenCalled();
    expect(readSource()).toContain("// @docs: [create-account]\nexport function createUser");
  });

  it("writes nothing on a dry run", async () => {
    await scaffoldCommand(undefined, undefined, { projectRoot: root, dryRun: true, yes: true });
    expect(readSource()).toBe(AUTH_SOURCE);
  });

  it("writes nothing for rejected or skipped suggestions", async () => {
    await scaffoldCommand(undefined, undefined, { projectRoot: root }, () => Promise.resolve("reject"));
    await scaffoldCommand(undefined, undefined, { projectRoot: root }, () => Promise.resolve("skip"));
    expect(readSource()).toBe(AUTH_SOURCE);
  });
});
