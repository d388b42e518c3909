import { extractDocsIdFromComment } from "../core/code-extractor.js";

import type { LinkSuggestion } from "../types/index.js";

export interface Annotation {
  line: number; // 1-based declaration line
  docId: string;
}

export function toAnnotation(suggestion: LinkSuggestion): Annotation {
  return { line: suggestion.entity.line, docId: suggestion.section.id };
}

function isAnnotated(lineAbove: string | undefined): boolean {
  if (lineAbove === undefined) return false;
  const trimmed = lineAbove.trim();
  if (!trimmed.startsWith("//") && !trimmed.startsWith("/*") && !trimmed.startsWith("*")) return false;
  return extractDocsIdFromComment(trimmed) !== null;
}

/**
 * Insert `// @docs: [id]` above each annotated declaration line.
 * Applied bottom-up so earlier insertions never shift later targets.
 */
export function applyAnnotations(source: string, annotations: readonly Annotation[]): string {
  const eol = source.includes("\r\n") ? "\r\n" : "\n";
  const lines = source.split(/\r?\n/);

  const byLine = new Map<number, Annotation>();
  for (const annotation of annotations) {
    if (!byLine.has(annotation.line)) byLine.set(annotation.line, annotation);
  }
  const ordered = [...byLine.values()].sort((a, b) => b.line - a.line);

  for (const { line, docId } of ordered) {
    const index = line - 1;
    const target = lines[index];
    if (target === undefined || index < 0) continue;
    if (isAnnotated(lines[index - 1])) continue;

    const indent = /^[ \t]*/.exec(target)?.[0] ?? "";
    lines.splice(index, 0, `${indent}// @docs: [${docId}]`);
  }

  return lines.join(eol);
}
