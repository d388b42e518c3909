export interface Parameter {
  name: string;
  type?: string; // absent for untyped languages
}

export type EntityKind = "function" | "method" | "arrow";

export interface CodeEntity {
  name: string;
  kind: EntityKind;
  file: string;
  line: number;
  parameters: Parameter[];
  returnType?: string;
  docId?: string;
}

export interface Arg {
  name: string;
  type?: string;
  description: string;
}

export type ArgStrategyKind = "table" | "list" | "definition";

export interface DocSection {
  id: string;
  title?: string;
  file: string;
  line: number; // line of the @docs-id marker
  args: Arg[];
  strategy?: ArgStrategyKind;
}

/**
 * A function-like declaration as surfaced by a language adapter.
 * `leadingComments` is the contiguous comment block directly above the
 * declaration, closest comment last.
 */
export interface DeclarationNode {
  name: string;
  kind: EntityKind;
  line: number;
  parameters: Parameter[];
  returnType?: string;
  leadingComments: string[];
}

export type MarkdownToken =
  | { type: "html"; raw: string; line: number }
  | { type: "heading"; depth: number; text: string; line: number }
  | { type: "table"; header: string[]; rows: string[][]; line: number }
  | { type: "list"; items: string[]; line: number }
  | { type: "paragraph"; text: string; line: number }
  | { type: "other"; raw: string; line: number };

// identity records; entities and sections never point at each other
export interface EntityRef {
  name: string;
  file: string;
  line: number;
}

export interface SectionRef {
  id: string;
  title?: string;
  file: string;
  line: number;
}

export function toEntityRef(entity: CodeEntity): EntityRef {
  return { name: entity.name, file: entity.file, line: entity.line };
}

export function toSectionRef(section: DocSection): SectionRef {
  const ref: SectionRef = { id: section.id, file: section.file, line: section.line };
  if (section.title !== undefined) ref.title = section.title;
  return ref;
}
