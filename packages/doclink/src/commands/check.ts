import { runCheck } from "../core/pipeline.js";
import { formatCheckHuman } from "../formatters/human.js";
import { formatCheckJson } from "../formatters/json.js";
import { createCommandContext, reportFatal } from "./context.js";

import type { CheckOptions, CheckResult } from "../types/index.js";

export async function checkCommand(
  codePath: string | undefined,
  docPath: string | undefined,
  options: CheckOptions,
): Promise<number> {
  let result: CheckResult;
  try {
    const ctx = createCommandContext(options);
    result = await runCheck({
      ...ctx,
      selection: { code: codePath, doc: docPath },
      failOnWarnings: options.failOnWarnings,
    });
  } catch (err) {
    return reportFatal(err);
  }

  const format = options.format ?? "human";
  if (format === "json") {
    console.log(formatCheckJson(result));
  } else {
    console.log(await formatCheckHuman(result, { verbose: options.verbose }));
  }

  // exit code: 1 on blocking findings or unreadable files
  return result.blocking ? 1 : 0;
}
