import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "doclink";

let _packageRoot: string | null = null;

// walk up from this module's location to find the package root
// works from both src/core/ and dist/core/
export function getPackageRoot(): string {
  if (_packageRoot) return _packageRoot;

  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    const pkgJsonPath = path.join(dir, "package.json");
    if (fs.existsSync(pkgJsonPath) && readPackageName(pkgJsonPath) === PACKAGE_NAME) {
      _packageRoot = dir;
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new Error(`Could not find ${PACKAGE_NAME} package root`);
}

function readPackageName(pkgJsonPath: string): string | undefined {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgJsonPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "name" in pkg && typeof pkg.name === "string") {
      return pkg.name;
    }
  } catch {
    // malformed package.json, keep walking
  }
  return undefined;
}

export function getPackageVersion(): string {
  const pkgJsonPath = path.join(getPackageRoot(), "package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgJsonPath, "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

// project-relative, forward-slash path used in findings and fingerprints
export function toProjectPath(projectRoot: string, absPath: string): string {
  const rel = path.relative(projectRoot, absPath);
  const display = rel && !rel.startsWith("..") && !path.isAbsolute(rel) ? rel : absPath;
  return display.split(path.sep).join("/");
}
