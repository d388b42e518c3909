import { describe, it, expect } from "vitest";

import { parseTypeScriptSource } from "../../src/adapters/typescript-source.js";
import { extractEntities } from "../../src/core/code-extractor.js";
import { ParseFailureError } from "../../src/core/errors.js";

const source = [
  "// @docs: [auth-login]",
  "export function login(username: string, password: string): Promise<void> {",
  "  return Promise.resolve();",
  "}",
  "",
  "// unrelated note",
  "",
  "export const logout = (session: Session, ...reasons: string[]) => {};",
  "",
  "class Store {",
  "  /** @docs: [store-save] */",
  "  save(this: Store, { id, name }: Item, force?: boolean) {}",
  "}",
  "const legacy = function (a, b) { return a + b; };",
].join("\n");

describe("parseTypeScriptSource", () => {
  it("surfaces functions, arrows and methods in source order", () => {
    const declarations = parseTypeScriptSource(source, "src/auth.ts");

    expect(declarations).toEqual([
      {
        name: "login",
        kind: "function",
        line: 2,
        parameters: [
          { name: "username", type: "string" },
          { name: "password", type: "string" },
        ],
        returnType: "Promise<void>",
        leadingComments: ["// @docs: [auth-login]"],
      },
      {
        name: "logout",
        kind: "arrow",
        line: 8,
        parameters: [
          { name: "session", type: "Session" },
          { name: "reasons", type: "string[]" },
        ],
        leadingComments: [],
      },
      {
        name: "Store.save",
        kind: "method",
        line: 12,
        parameters: [
          { name: "{ id, name }", type: "Item" },
          { name: "force", type: "boolean" },
        ],
        leadingComments: ["/** @docs: [store-save] */"],
      },
      {
        name: "legacy",
        kind: "function",
        line: 14,
        parameters: [{ name: "a" }, { name: "b" }],
        leadingComments: [],
      },
    ]);
  });

  it("keeps a contiguous comment block and stops at a blank line", () => {
    const text = ["// @docs: [far]", "", "// @docs: [near]", "// more notes", "function f() {}"].join("\n");
    const [decl] = parseTypeScriptSource(text, "src/f.ts");
    expect(decl?.leadingComments).toEqual(["// @docs: [near]", "// more notes"]);
  });

  it("folds overload signatures into one declaration carrying the annotation", () => {
    const text = [
      "// @docs: [parse]",
      "export function parse(input: string): number;",
      "export function parse(input: number): number;",
      "export function parse(input: string | number): number {",
      "  return Number(input);",
      "}",
    ].join("\n");

    const declarations = parseTypeScriptSource(text, "src/parse.ts");

    expect(declarations).toEqual([
      {
        name: "parse",
        kind: "function",
        line: 2,
        parameters: [{ name: "input", type: "string | number" }],
        returnType: "number",
        leadingComments: ["// @docs: [parse]"],
      },
    ]);
    expect(extractEntities(declarations, "src/parse.ts").map((e) => [e.name, e.line, e.docId])).toEqual([
      ["parse", 2, "parse"],
    ]);
  });

  it("folds method overloads the same way", () => {
    const text = [
      "class Reader {",
      "  // @docs: [reader-read]",
      "  read(id: string): string;",
      "  read(id: string, fallback: string): string;",
      "  read(id: string, fallback?: string) {",
      "    return fallback ?? id;",
      "  }",
      "}",
    ].join("\n");

    expect(parseTypeScriptSource(text, "src/reader.ts")).toEqual([
      {
        name: "Reader.read",
        kind: "method",
        line: 3,
        parameters: [
          { name: "id", type: "string" },
          { name: "fallback", type: "string" },
        ],
        leadingComments: ["// @docs: [reader-read]"],
      },
    ]);
  });

  it("keeps ambient function declarations", () => {
    expect(parseTypeScriptSource("declare function ping(host: string): void;\n", "src/env.ts")).toEqual([
      { name: "ping", kind: "function", line: 1, parameters: [{ name: "host", type: "string" }], returnType: "void", leadingComments: [] },
    ]);
  });

  it("parses JSX in .tsx files", () => {
    const text = "export function Button(props: Props) {\n  return <button>{props.label}</button>;\n}\n";
    expect(parseTypeScriptSource(text, "src/Button.tsx").map((d) => d.name)).toEqual(["Button"]);
  });

  it("raises a parse failure on a syntax error", () => {
    expect(() => parseTypeScriptSource("export function broken(a: string {\n}\n", "src/broken.ts")).toThrow(
      ParseFailureError,
    );
    expect(() => parseTypeScriptSource("export function broken(a: string {\n}\n", "src/broken.ts")).toThrow(
      /^Failed to parse src\/broken\.ts: line \d+: /,
    );
  });

  it("raises a parse failure on an unsupported extension", () => {
    expect(() => parseTypeScriptSource("fn main() {}", "src/main.rs")).toThrow(
      "Failed to parse src/main.rs: unsupported file type '.rs' (supported: .ts, .mts, .cts, .tsx, .js, .mjs, .cjs, .jsx)",
    );
  });
});
