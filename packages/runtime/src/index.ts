export {
  writePidFile,
  readPidFile,
  removePidFile,
  checkRunningNode,
  pidFilePath,
  NodeMetadataSchema,
  type NodeMetadata,
} from "./pid.js";
