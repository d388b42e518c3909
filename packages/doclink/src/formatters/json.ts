import type { CheckResult } from "../types/index.js";

export function formatCheckJson(result: CheckResult): string {
  return JSON.stringify(result, null, 2);
}

