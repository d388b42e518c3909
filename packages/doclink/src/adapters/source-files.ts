import * as fs from "node:fs";

import { ParseFailureError, errorMessage } from "../core/errors.js";

export const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

/**
 * Read a source or documentation file as UTF-8.
 * `displayPath` is what ends up in the failure message.
 */
export function readSourceFile(absPath: string, displayPath: string = absPath): string {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(absPath);
  } catch (err) {
    throw new ParseFailureError(displayPath, `cannot be read (${errorMessage(err)})`, { cause: err });
  }
  if (!stat.isFile()) throw new ParseFailureError(displayPath, "not a regular file");
  if (stat.size > MAX_FILE_SIZE) {
    throw new ParseFailureError(displayPath, `file is ${stat.size} bytes, larger than the ${MAX_FILE_SIZE} byte limit`);
  }

  try {
    return fs.readFileSync(absPath, "utf8");
  } catch (err) {
    throw new ParseFailureError(displayPath, `cannot be read (${errorMessage(err)})`, { cause: err });
  }
}
