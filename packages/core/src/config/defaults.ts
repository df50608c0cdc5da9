import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".coffer");

/** Overrides the root path when no explicit path is passed. */
export const ROOT_PATH_ENV = "COFFER_ROOT_PATH";
/** Overrides `node.id` from config.json. */
export const NODE_ID_ENV = "COFFER_NODE_ID";
