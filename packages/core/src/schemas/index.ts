export {
  DEFAULTS,
  KeyVaultBackend,
  BusBackend,
  QueuesSchema,
  NodeConfigSchema,
  type NodeConfig,
  type LoggingConfig,
  type BusConfig,
} from "./node-config.js";
