import { extractArgs } from "./arg-strategies.js";
import { DuplicateDocIdError } from "./errors.js";

import type { DocSection, MarkdownToken } from "../types/index.js";

const MARKER_PATTERN = /^<!--\s*@docs-id:\s*(\S+?)\s*-->/;

// <!-- @docs-id: auth-login -->
export function extractDocsIdFromHtml(raw: string): string | null {
  const match = MARKER_PATTERN.exec(raw.trim());
  return match?.[1] ?? null;
}

interface OpenSection {
  id: string;
  line: number;
  body: MarkdownToken[];
}

function closeSection(open: OpenSection, file: string): DocSection {
  const heading = open.body.find((t) => t.type === "heading");
  const { args, strategy } = extractArgs(open.body);

  const section: DocSection = { id: open.id, file, line: open.line, args };
  if (heading?.type === "heading" && heading.text.trim()) section.title = heading.text.trim();
  if (strategy) section.strategy = strategy;
  return section;
}

/**
 * Split a document's token stream into sections at each @docs-id marker.
 * Throws DuplicateDocIdError when the document declares an id twice.
 */
export function extractSections(tokens: readonly MarkdownToken[], file: string): DocSection[] {
  const sections: DocSection[] = [];
  let open: OpenSection | null = null;

  for (const token of tokens) {
    const id = token.type === "html" ? extractDocsIdFromHtml(token.raw) : null;
    if (id) {
      if (open) sections.push(closeSection(open, file));
      open = { id, line: token.line, body: [] };
      continue;
    }
    open?.body.push(token);
  }
  if (open) sections.push(closeSection(open, file));

  assertUniqueIds(sections, file);
  return sections;
}

function assertUniqueIds(sections: readonly DocSection[], file: string): void {
  const linesById = new Map<string, number[]>();
  for (const section of sections) {
    const lines = linesById.get(section.id) ?? [];
    lines.push(section.line);
    linesById.set(section.id, lines);
  }

  for (const [docId, lines] of linesById) {
    if (lines.length > 1) {
      throw new DuplicateDocIdError({
        file,
        docId,
        lines,
        sectionIds: [...linesById.keys()],
      });
    }
  }
}
