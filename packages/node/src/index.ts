import { runStorageNode } from "./run.js";

runStorageNode({ rootPath: process.env.COFFER_ROOT_PATH }).catch((err) => {
  console.error("Failed to start storage node:", err);
  process.exit(1);
});
