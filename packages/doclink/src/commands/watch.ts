import * as fs from "node:fs";
import * as path from "node:path";

import { collectFiles } from "../core/discovery.js";
import { errorMessage } from "../core/errors.js";
import { runCheck } from "../core/pipeline.js";
import { formatCheckHuman } from "../formatters/human.js";
import { RunScheduler } from "../watch/run-scheduler.js";
import { createCommandContext, reportFatal } from "./context.js";

import type { CommandContext } from "./context.js";
import type { WatchOptions } from "../types/index.js";

// directories holding the watched files; fs.watch on a directory also sees replacements
function watchedDirectories(files: readonly string[]): string[] {
  return [...new Set(files.map((f) => path.dirname(f)))].sort();
}

export async function watchCommand(
  codePath: string | undefined,
  docPath: string | undefined,
  options: WatchOptions,
): Promise<number> {
  let ctx: CommandContext;
  let directories: string[];
  const selection = { code: codePath, doc: docPath };
  try {
    ctx = createCommandContext(options);
    const files = await collectFiles(ctx.projectRoot, ctx.config, selection);
    directories = watchedDirectories([...files.code, ...files.docs]);
  } catch (err) {
    return reportFatal(err);
  }

  // rendering happens inside the run so a discarded run is never printed
  const scheduler = new RunScheduler<string>({
    run: async () => formatCheckHuman(await runCheck({ ...ctx, selection })),
    onResult: (text) => {
      console.log(`\n[${new Date().toLocaleTimeString()}] doclink watch`);
      console.log(text);
    },
    onError: (err) => {
      console.error(`Error: ${errorMessage(err)}`);
    },
  });

  const watchers = directories.map((dir) =>
    fs.watch(dir, (_event, filename) => {
      ctx.logger.log("watch", "change detected", { dir, file: filename ?? null });
      scheduler.trigger();
    }),
  );

  await scheduler.runNow();
  console.log(`Watching ${directories.length} director${directories.length === 1 ? "y" : "ies"}. Press Ctrl+C to stop.`);

  return new Promise<number>((resolve) => {
    process.once("SIGINT", () => {
      for (const watcher of watchers) watcher.close();
      scheduler.stop();
      resolve(0);
    });
  });
}
