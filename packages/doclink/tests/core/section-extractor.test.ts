import { describe, it, expect } from "vitest";

import { DuplicateDocIdError } from "../../src/core/errors.js";
import { extractDocsIdFromHtml, extractSections } from "../../src/core/section-extractor.js";

import type { MarkdownToken } from "../../src/types/index.js";

const tokens: MarkdownToken[] = [
  { type: "heading", depth: 1, text: "Auth", line: 1 },
  { type: "html", raw: "<!-- @docs-id: auth-login -->\n", line: 3 },
  { type: "heading", depth: 2, text: "Login", line: 4 },
  {
    type: "table",
    header: ["Name", "Type", "Description"],
    rows: [["username", "string", "The login name"]],
    line: 6,
  },
  { type: "html", raw: "<!-- @docs-id: auth-logout -->\n", line: 10 },
  { type: "heading", depth: 2, text: "Logout", line: 11 },
  { type: "paragraph", text: "Ends the session.", line: 13 },
];

describe("extractDocsIdFromHtml", () => {
  it("reads the id from a marker comment", () => {
    expect(extractDocsIdFromHtml("<!-- @docs-id: auth-login -->")).toBe("auth-login");
    expect(extractDocsIdFromHtml("<!--@docs-id:x-->\n")).toBe("x");
  });

  it("ignores other comments", () => {
    expect(extractDocsIdFromHtml("<!-- TODO: write more -->")).toBeNull();
    expect(extractDocsIdFromHtml("<div>@docs-id: nope</div>")).toBeNull();
  });
});

describe("extractSections", () => {
  it("splits the document at each marker", () => {
    expect(extractSections(tokens, "docs/auth.md")).toEqual([
      {
        id: "auth-login",
        title: "Login",
        file: "docs/auth.md",
        line: 3,
        args: [{ name: "username", type: "string", description: "The login name" }],
        strategy: "table",
      },
      { id: "auth-logout", title: "Logout", file: "docs/auth.md", line: 10, args: [] },
    ]);
  });

  it("returns nothing for a document without markers", () => {
    expect(extractSections([{ type: "paragraph", text: "Hello", line: 1 }], "README.md")).toEqual([]);
  });

  it("leaves the title out when the section has no heading", () => {
    const [section] = extractSections([{ type: "html", raw: "<!-- @docs-id: bare -->", line: 1 }], "docs/a.md");
    expect(section).toEqual({ id: "bare", file: "docs/a.md", line: 1, args: [] });
  });

  it("rejects a document that declares an id twice", () => {
    const duplicated: MarkdownToken[] = [
      { type: "html", raw: "<!-- @docs-id: auth-login -->", line: 1 },
      { type: "html", raw: "<!-- @docs-id: auth-logout -->", line: 5 },
      { type: "html", raw: "<!-- @docs-id: auth-login -->", line: 9 },
    ];

    let caught: unknown;
    try {
      extractSections(duplicated, "docs/auth.md");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DuplicateDocIdError);
    if (!(caught instanceof DuplicateDocIdError)) return;
    expect(caught.message).toBe("Documentation id 'auth-login' in docs/auth.md is declared more than once (lines 1, 9)");
    expect(caught.lines).toEqual([1, 9]);
    expect(caught.sectionIds).toEqual(["auth-login", "auth-logout"]);
  });
});
