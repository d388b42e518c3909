import { marked } from "marked";

import type { Token, Tokens } from "marked";
import type { MarkdownToken } from "../types/index.js";

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === "heading";
}

function isTable(token: Token): token is Tokens.Table {
  return token.type === "table";
}

function isList(token: Token): token is Tokens.List {
  return token.type === "list";
}

function isParagraph(token: Token): token is Tokens.Paragraph {
  return token.type === "paragraph";
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) if (ch === "\n") count++;
  return count;
}

function toMarkdownToken(token: Token, line: number): MarkdownToken | null {
  if (token.type === "space") return null;
  if (token.type === "html") return { type: "html", raw: token.raw, line };
  if (isHeading(token)) return { type: "heading", depth: token.depth, text: token.text, line };
  if (isTable(token)) {
    return {
      type: "table",
      header: token.header.map((cell) => cell.text.trim()),
      rows: token.rows.map((row) => row.map((cell) => cell.text.trim())),
      line,
    };
  }
  if (isList(token)) return { type: "list", items: token.items.map((item) => item.text), line };
  if (isParagraph(token)) return { type: "paragraph", text: token.text, line };
  return { type: "other", raw: token.raw, line };
}

/**
 * Flatten a markdown document into block tokens with 1-based start lines.
 * Lines are recovered by summing the newlines of each token's raw text.
 */
export function tokenizeMarkdown(text: string): MarkdownToken[] {
  const normalized = text.replace(/\r\n?/g, "\n");
  const tokens: MarkdownToken[] = [];

  let line = 1;
  for (const token of marked.lexer(normalized)) {
    // blank lines ahead of a block belong to the space token or the block's raw text
    const leading = /^\n*/.exec(token.raw)?.[0].length ?? 0;
    const mapped = toMarkdownToken(token, line + leading);
    if (mapped) tokens.push(mapped);
    line += countNewlines(token.raw);
  }
  return tokens;
}
