import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH, ROOT_PATH_ENV } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the root path to an absolute path: the explicit input, else
 * COFFER_ROOT_PATH, else ~/.coffer.
 */
export function resolveRootPath(
  input?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return resolve(expandHomePath(input ?? env[ROOT_PATH_ENV] ?? DEFAULT_ROOT_PATH));
}

export interface RootLayout {
  root: string;
  configPath: string;
  /** Records the encryption mode chosen on first start. */
  profilePath: string;
  pidPath: string;
  nodeKeyPath: string;
  blobsDir: string;
  keysDir: string;
  keyDatabasePath: string;
  ownerBlobsDir: string;
  ownerKeysDir: string;
}

/** Where everything lives under a root path. */
export function rootLayout(root: string): RootLayout {
  return {
    root,
    configPath: join(root, "config.json"),
    profilePath: join(root, "profile.json"),
    pidPath: join(root, "node.json"),
    nodeKeyPath: join(root, "node-key.json"),
    blobsDir: join(root, "blobs"),
    keysDir: join(root, "keys"),
    keyDatabasePath: join(root, "keys.db"),
    ownerBlobsDir: join(root, "owner", "blobs"),
    ownerKeysDir: join(root, "owner", "keys"),
  };
}
