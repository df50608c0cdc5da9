import { readFile, writeFile } from "node:fs/promises";
import { InvalidArgumentError, type Command } from "commander";
import { hexToBytes } from "@noble/hashes/utils.js";
import { CofferError } from "@coffer/core/errors";
import { printResult, type CliIo, type OutputOptions } from "../lib/io.js";
import { withOwnerSession, type OwnerDeps } from "../lib/owner.js";

export interface BlobCommandDeps extends OwnerDeps {
  io: CliIo;
}

type GlobalOptions = OutputOptions & { root?: string };

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return parsed;
}

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number of milliseconds.");
  }
  return parsed;
}

function parseSeed(value: string): Uint8Array {
  if (!/^(?:[0-9a-fA-F]{2})+$/.test(value)) {
    throw new InvalidArgumentError("Must be an even-length hex string.");
  }
  return hexToBytes(value);
}

export function registerBlobCommands(
  program: Command,
  deps: BlobCommandDeps,
): void {
  const { io } = deps;
  const globals = () => program.opts<GlobalOptions>();

  program
    .command("put")
    .description("Encrypt a file, keep a local copy and request replicas")
    .argument("<blobId>", "Blob identifier")
    .argument("<file>", "File to store")
    .option("-r, --replicas <n>", "Number of replicas to request", parseCount, 0)
    .option("-w, --wait", "Wait for each replica to acknowledge")
    .option("-t, --timeout <ms>", "Acknowledgement timeout", parseTimeout)
    .action(
      async (
        blobId: string,
        file: string,
        opts: { replicas: number; wait?: boolean; timeout?: number },
      ) => {
        const data = new Uint8Array(await readFile(file));
        const result = await withOwnerSession(globals().root, deps, ({ client }) =>
          client.storeBlob(blobId, data, opts.replicas, {
            awaitAcknowledgements: opts.wait ?? false,
            timeoutMs: opts.timeout,
          }),
        );
        const acked = opts.wait
          ? `, acknowledged by ${result.acknowledgedBy.join(", ") || "none"}`
          : "";
        printResult(
          io,
          globals(),
          { blobId, bytes: data.length, ...result },
          `Stored ${blobId} (${data.length} bytes), ${result.replicasRequested} replica(s) requested${acked}`,
        );
      },
    );

  program
    .command("get")
    .description("Decrypt a blob from the local copy")
    .argument("<blobId>", "Blob identifier")
    .option("-o, --output <file>", "Write to a file instead of stdout")
    .action(async (blobId: string, opts: { output?: string }) => {
      const result = await withOwnerSession(globals().root, deps, ({ client }) =>
        client.retrieveBlob(blobId),
      );
      if (!result.found) {
        throw new CofferError("BLOB_NOT_FOUND", `No local copy of ${blobId}`, {
          blobId,
        });
      }
      if (opts.output === undefined) {
        io.out(result.data);
        return;
      }
      await writeFile(opts.output, result.data);
      printResult(
        io,
        globals(),
        { blobId, bytes: result.data.length, output: opts.output },
        `Wrote ${result.data.length} bytes to ${opts.output}`,
      );
    });

  program
    .command("restore")
    .description("Fetch a replica back into the local copy")
    .argument("<blobId>", "Blob identifier")
    .option("-t, --timeout <ms>", "Response timeout", parseTimeout)
    .action(async (blobId: string, opts: { timeout?: number }) => {
      const result = await withOwnerSession(globals().root, deps, ({ client }) =>
        client.restoreBlob(blobId, { timeoutMs: opts.timeout }),
      );
      printResult(
        io,
        globals(),
        { blobId, ...result },
        `Restored ${blobId} from ${result.nodeId}`,
      );
    });

  program
    .command("prove")
    .description("Challenge a replica to prove it holds a blob")
    .argument("<blobId>", "Blob identifier")
    .option("-s, --seed <hex>", "Challenge seed (random when omitted)", parseSeed)
    .option("-t, --timeout <ms>", "Response timeout", parseTimeout)
    .action(
      async (blobId: string, opts: { seed?: Uint8Array; timeout?: number }) => {
        const result = await withOwnerSession(
          globals().root,
          deps,
          ({ client }) =>
            client.verifyReplica(blobId, {
              seed: opts.seed,
              timeoutMs: opts.timeout,
            }),
        );
        printResult(
          io,
          globals(),
          { blobId, ...result },
          result.verified
            ? `Replica of ${blobId} on ${result.nodeId} verified`
            : `Replica of ${blobId} on ${result.nodeId} ${result.found ? "returned a wrong proof" : "is missing"}`,
        );
        if (!result.verified) {
          throw new CofferError(
            "PROOF_FAILED",
            `Proof of storage failed for ${blobId}`,
            { blobId, nodeId: result.nodeId, found: result.found },
          );
        }
      },
    );

  program
    .command("delete")
    .description("Delete a blob locally and on every replica")
    .argument("<blobId>", "Blob identifier")
    .action(async (blobId: string) => {
      await withOwnerSession(globals().root, deps, ({ client }) =>
        client.deleteBlob(blobId),
      );
      printResult(io, globals(), { blobId, deleted: true }, `Deleted ${blobId}`);
    });
}
