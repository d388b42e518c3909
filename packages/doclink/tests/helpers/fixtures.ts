import type { CodeEntity, DocSection, ValidationResult } from "../../src/types/index.js";

export function makeEntity(overrides: Partial<CodeEntity> = {}): CodeEntity {
  return {
    name: "login",
    kind: "function",
    file: "src/auth.ts",
    line: 12,
    parameters: [
      { name: "username", type: "string" },
      { name: "password", type: "string" },
    ],
    docId: "auth-login",
    ...overrides,
  };
}

export function makeSection(overrides: Partial<DocSection> = {}): DocSection {
  return {
    id: "auth-login",
    title: "Login",
    file: "docs/auth.md",
    line: 3,
    args: [{ name: "username", type: "string", description: "The login name" }],
    strategy: "table",
    ...overrides,
  };
}

export function makeResult(overrides: Partial<ValidationResult> = {}): ValidationResult {
  return {
    severity: "warning",
    kind: "missing-argument",
    location: { file: "src/auth.ts", line: 12 },
    message: "Missing argument: parameter 'password' of login is not documented in 'Login'.",
    hint: "Document 'password' in the section marked 'auth-login' (docs/auth.md:3).",
    entity: { name: "login", file: "src/auth.ts", line: 12 },
    section: { id: "auth-login", title: "Login", file: "docs/auth.md", line: 3 },
    docId: "auth-login",
    subject: "password",
    ...overrides,
  };
}
