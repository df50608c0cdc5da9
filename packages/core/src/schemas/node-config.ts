import { z } from "zod";
import { DEFAULT_QUEUES } from "../bus/queues.js";
import { ENCRYPTION_MODES } from "../node/layer.js";
import { BLOB_ID_PATTERN } from "../storage/paths.js";

export const DEFAULTS = {
  node: {
    mode: "per-document" as const,
  },
  storage: {
    keyVault: "filesystem" as const,
  },
  bus: {
    backend: "redis" as const,
    url: "redis://localhost:6379",
    blockTimeoutSeconds: 5,
    queues: DEFAULT_QUEUES,
  },
  client: {
    responseTimeoutMs: 10_000,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  health: {
    enabled: true,
    port: 8080,
  },
};

export const KeyVaultBackend = z.enum(["filesystem", "sqlite"]);
export const BusBackend = z.enum(["redis", "memory"]);

const queueName = (fallback: string) => z.string().min(1).default(fallback);

export const QueuesSchema = z.object({
  storeRequests: queueName(DEFAULTS.bus.queues.storeRequests),
  storeResponses: queueName(DEFAULTS.bus.queues.storeResponses),
  retrieveRequests: queueName(DEFAULTS.bus.queues.retrieveRequests),
  retrieveResponses: queueName(DEFAULTS.bus.queues.retrieveResponses),
  proofRequests: queueName(DEFAULTS.bus.queues.proofRequests),
  proofResponses: queueName(DEFAULTS.bus.queues.proofResponses),
  deleteRequests: queueName(DEFAULTS.bus.queues.deleteRequests),
});

export const NodeConfigSchema = z.object({
  node: z
    .object({
      id: z
        .string()
        .regex(BLOB_ID_PATTERN)
        .optional()
        .describe("Stable node id; generated on first start when absent"),
      mode: z.enum(ENCRYPTION_MODES).default(DEFAULTS.node.mode),
    })
    .default(DEFAULTS.node),
  storage: z
    .object({
      keyVault: KeyVaultBackend.default(DEFAULTS.storage.keyVault),
    })
    .default(DEFAULTS.storage),
  bus: z
    .object({
      backend: BusBackend.default(DEFAULTS.bus.backend),
      url: z.url().default(DEFAULTS.bus.url),
      blockTimeoutSeconds: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.bus.blockTimeoutSeconds),
      queues: QueuesSchema.default({ ...DEFAULTS.bus.queues }),
    })
    .default({ ...DEFAULTS.bus, queues: { ...DEFAULTS.bus.queues } }),
  client: z
    .object({
      responseTimeoutMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.client.responseTimeoutMs),
    })
    .default(DEFAULTS.client),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  health: z
    .object({
      enabled: z.boolean().default(DEFAULTS.health.enabled),
      port: z.number().int().min(1).max(65535).default(DEFAULTS.health.port),
    })
    .default(DEFAULTS.health),
});

export type NodeConfig = z.infer<typeof NodeConfigSchema>;
export type LoggingConfig = NodeConfig["logging"];
export type BusConfig = NodeConfig["bus"];
