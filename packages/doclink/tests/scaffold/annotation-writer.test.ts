import { describe, it, expect } from "vitest";

import { applyAnnotations, toAnnotation } from "../../src/scaffold/annotation-writer.js";

const source = [
  "export function createUser(name: string) {}",
  "class Store {",
  "  save(item: Item) {}",
  "}",
  "",
].join("\n");

describe("applyAnnotations", () => {
  it("inserts annotations above each declaration with its indentation", () => {
    const result = applyAnnotations(source, [
      { line: 1, docId: "create-user" },
      { line: 3, docId: "store-save" },
    ]);

    expect(result).toBe(
      [
        "// @docs: [create-user]",
        "export function createUser(name: string) {}",
        "class Store {",
        "  // @docs: [store-save]",
        "  save(item: Item) {}",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("leaves already annotated declarations alone", () => {
    const annotated = "// @docs: [existing]\nexport function f() {}\n";
    expect(applyAnnotations(annotated, [{ line: 2, docId: "other" }])).toBe(annotated);
  });

  it("applies one annotation per line and ignores lines out of range", () => {
    const result = applyAnnotations(source, [
      { line: 1, docId: "first" },
      { line: 1, docId: "second" },
      { line: 42, docId: "nowhere" },
    ]);
    expect(result.split("\n").slice(0, 2)).toEqual(["// @docs: [first]", "export function createUser(name: string) {}"]);
    expect(result.split("\n")).toHaveLength(6);
  });

  it("keeps CRLF line endings", () => {
    expect(applyAnnotations("function f() {}\r\n", [{ line: 1, docId: "f" }])).toBe(
      "// @docs: [f]\r\nfunction f() {}\r\n",
    );
  });
});

describe("toAnnotation", () => {
  it("targets the entity line with the section id", () => {
    expect(
      toAnnotation({
        entity: { name: "createUser", file: "src/users.ts", line: 7 },
        section: { id: "create-user", file: "docs/users.md", line: 1 },
        score: 0.9,
      }),
    ).toEqual({ line: 7, docId: "create-user" });
  });
});
