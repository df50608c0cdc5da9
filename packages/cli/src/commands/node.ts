import type { Command } from "commander";
import { resolveRootPath } from "@coffer/core/config";
import { checkRunningNode } from "@coffer/runtime";
import type { RunOptions } from "@coffer/node/run";
import { printResult, type CliIo, type OutputOptions } from "../lib/io.js";

export interface NodeCommandDeps {
  io: CliIo;
  runNode: (options: RunOptions) => Promise<void>;
}

export function registerNodeCommands(
  program: Command,
  deps: NodeCommandDeps,
): void {
  program
    .command("start")
    .description("Run a storage node in the foreground")
    .action(async () => {
      const { root } = program.opts<{ root?: string }>();
      await deps.runNode({ rootPath: root });
    });

  program
    .command("status")
    .description("Show the storage node running under the root path")
    .action(async () => {
      const opts = program.opts<OutputOptions & { root?: string }>();
      const metadata = await checkRunningNode(resolveRootPath(opts.root));
      if (!metadata) {
        printResult(deps.io, opts, { running: false }, "No node running");
        return;
      }
      printResult(
        deps.io,
        opts,
        { running: true, ...metadata },
        [
          `Node ${metadata.nodeId} running (pid ${metadata.pid})`,
          `  mode:    ${metadata.mode}`,
          `  health:  ${metadata.healthPort === null ? "disabled" : `http://localhost:${metadata.healthPort}/health`}`,
          `  version: ${metadata.version}`,
          `  since:   ${metadata.startedAt}`,
        ].join("\n"),
      );
    });
}
