import { toProjectPath } from "../core/paths.js";
import { runBaselineDump } from "../core/pipeline.js";
import { formatBaselineHuman } from "../formatters/human.js";
import { createCommandContext, reportFatal } from "./context.js";

import type { BaselineDump } from "../core/pipeline.js";
import type { BaselineOptions } from "../types/index.js";

export async function baselineCommand(
  codePath: string | undefined,
  docPath: string | undefined,
  options: BaselineOptions,
): Promise<number> {
  let dump: BaselineDump;
  let displayPath: string;
  try {
    const ctx = createCommandContext(options);
    dump = await runBaselineDump({ ...ctx, selection: { code: codePath, doc: docPath } });
    displayPath = toProjectPath(ctx.projectRoot, ctx.baselinePath);
  } catch (err) {
    return reportFatal(err);
  }

  console.log(await formatBaselineHuman(dump.snapshot, displayPath, dump.project.failures));
  return 0;
}
