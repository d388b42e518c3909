export class DoclinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// fatal for a single source or documentation file
export class ParseFailureError extends DoclinkError {
  readonly file: string;

  constructor(file: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${file}: ${reason}`, options);
    this.file = file;
  }
}

// the id target is ambiguous; the document must not be validated against
export class DuplicateDocIdError extends DoclinkError {
  readonly file: string;
  readonly docId: string;
  readonly lines: number[];
  readonly sectionIds: string[];

  constructor(input: { file: string; docId: string; lines: number[]; sectionIds: string[]; firstFile?: string }) {
    const where = input.firstFile
      ? `already declared in ${input.firstFile}`
      : `declared more than once (lines ${input.lines.join(", ")})`;
    super(`Documentation id '${input.docId}' in ${input.file} is ${where}`);
    this.file = input.file;
    this.docId = input.docId;
    this.lines = input.lines;
    this.sectionIds = input.sectionIds;
  }
}

export class BaselineCorruptionError extends DoclinkError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Baseline at ${path} is unusable: ${reason}`, options);
    this.path = path;
  }
}

export class ConfigError extends DoclinkError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// a code or documentation path given on the command line does not exist
export class MissingInputError extends DoclinkError {
  readonly path: string;

  constructor(path: string, role: "code" | "documentation") {
    super(`${role === "code" ? "Code" : "Documentation"} path not found: ${path}`);
    this.path = path;
  }
}
