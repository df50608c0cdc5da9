import { Command, CommanderError } from "commander";
import { runStorageNode, type RunOptions } from "@coffer/node/run";
import { registerBlobCommands } from "./commands/blob.js";
import { registerNodeCommands } from "./commands/node.js";
import { formatError, processIo, type CliIo } from "./lib/io.js";
import type { OwnerDeps } from "./lib/owner.js";

export const CLI_VERSION = "0.1.0";

export interface CliDeps extends OwnerDeps {
  io?: CliIo;
  runNode?: (options: RunOptions) => Promise<void>;
}

export function createProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? processIo;
  const program = new Command();

  program
    .name("coffer")
    .description("Encrypted blob storage across storage nodes")
    .version(CLI_VERSION)
    .option("--root <path>", "Root path (default: $COFFER_ROOT_PATH or ~/.coffer)")
    .option("--json", "Output as JSON")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text),
    });

  registerNodeCommands(program, {
    io,
    runNode: deps.runNode ?? runStorageNode,
  });
  registerBlobCommands(program, { ...deps, io });

  return program;
}

/** Parse and run; resolves with the process exit code. */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps = {},
): Promise<number> {
  const io = deps.io ?? processIo;
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version exit through here with code 0
      return err.exitCode;
    }
    io.err(formatError(err, program.opts()));
    return 1;
  }
}
