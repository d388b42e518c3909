import type { CodeEntity, DeclarationNode } from "../types/index.js";

const ANNOTATION_PATTERN = /@docs:\s*(?:\[\s*([^\]]*?)\s*\]|([^\s*]+))/;

/**
 * Extract the documentation id from one comment.
 * Accepts `// @docs: [id]`, `/// @docs: id`, block and JSDoc comments.
 */
export function extractDocsIdFromComment(comment: string): string | null {
  const lines = comment
    .trim()
    .replace(/^\/\*+|\*+\/$/g, "")
    .split("\n")
    .map((line) => line.trim().replace(/^(?:\/{2,}|\*+)\s?/, "").trim());

  for (const line of lines) {
    if (!line.startsWith("@docs:")) continue;
    const match = ANNOTATION_PATTERN.exec(line);
    const id = (match?.[1] ?? match?.[2] ?? "").trim();
    if (id) return id;
  }
  return null;
}

// closest annotated comment to the declaration wins
export function findDocsAnnotation(leadingComments: readonly string[]): string | undefined {
  for (let i = leadingComments.length - 1; i >= 0; i--) {
    const comment = leadingComments[i];
    if (comment === undefined) continue;
    const id = extractDocsIdFromComment(comment);
    if (id) return id;
  }
  return undefined;
}

export function extractEntities(declarations: readonly DeclarationNode[], file: string): CodeEntity[] {
  return declarations.map((decl) => {
    const entity: CodeEntity = {
      name: decl.name,
      kind: decl.kind,
      file,
      line: decl.line,
      parameters: decl.parameters.map((p) => (p.type !== undefined ? { name: p.name, type: p.type } : { name: p.name })),
    };
    if (decl.returnType !== undefined) entity.returnType = decl.returnType;
    const docId = findDocsAnnotation(decl.leadingComments);
    if (docId !== undefined) entity.docId = docId;
    return entity;
  });
}
