import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

export function createTempProject(prefix: string): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), { recursive: true });
    fs.writeFileSync(abs, content, "utf8");
  }
}

export const AUTH_SOURCE = [
  "// @docs: [auth-login]",
  "export function login(username: string, password: string) {}",
  "",
  "// @docs: [auth-missing]",
  "export function logout(session: string) {}",
  "",
  "export function createUser(name: string) {}",
  "",
].join("\n");

export const AUTH_DOC = [
  "<!-- @docs-id: auth-login -->",
  "## Login",
  "",
  "- `username` (`string`): The login name",
  "- `tenant_id` (`string`): Tenant scope",
  "",
  "<!-- @docs-id: create-account -->",
  "## Create User",
  "",
  "| Name | Type |",
  "| --- | --- |",
  "| name | string |",
  "",
].join("\n");
