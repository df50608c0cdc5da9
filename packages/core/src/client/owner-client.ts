/**
 * Owner side of the protocol.
 *
 * The owner encrypts with a per-blob key it keeps to itself (the owner
 * layer), keeps a local copy, and asks storage nodes for replicas of the
 * ciphertext. Nodes only ever see and return owner ciphertext.
 */

import { randomBytes } from "@noble/hashes/utils.js";
import type { MessageBus, Subscription } from "../bus/interface.js";
import { DEFAULT_QUEUES, type QueueNames } from "../bus/queues.js";
import { decrypt, encrypt, generateKey } from "../crypto/cipher.js";
import { computeProof, proofsEqual } from "../crypto/proof.js";
import { CofferError } from "../errors/catalog.js";
import type { KeyVault } from "../keys/vault.js";
import type { Logger } from "../logger/index.js";
import {
  decodeMessage,
  encodeMessage,
  type ProofResponse,
  type RetrieveResponse,
  type StoreResponse,
} from "../protocol/messages.js";
import type { BlobStore } from "../storage/adapters/interface.js";
import { assertValidBlobId } from "../storage/paths.js";
import {
  ResponseRouter,
  type PendingResponse,
  type WaitOptions,
} from "./response-router.js";

export const DEFAULT_RESPONSE_TIMEOUT_MS = 10_000;
const DEFAULT_SEED_LENGTH = 32;

export interface OwnerClientOptions {
  blobStore: BlobStore;
  keyVault: KeyVault;
  bus: MessageBus;
  logger: Logger;
  queues?: QueueNames;
  responseTimeoutMs?: number;
}

export interface StoreOptions extends WaitOptions {
  /** Wait for a store response per replica before resolving. */
  awaitAcknowledgements?: boolean;
}

export interface StoreResult {
  replicasRequested: number;
  /** Node ids that acknowledged, in arrival order. Empty unless awaited. */
  acknowledgedBy: string[];
}

export type LocalRetrieveResult =
  | { found: true; data: Uint8Array }
  | { found: false; data: null };

export interface RestoreResult {
  restored: true;
  nodeId: string;
}

export interface VerifyOptions extends WaitOptions {
  /** Fresh random bytes when omitted. */
  seed?: Uint8Array;
}

export interface VerifyResult {
  nodeId: string;
  found: boolean;
  verified: boolean;
}

export interface OwnerClient {
  /** Subscribe to the response queues. */
  start(): void;
  /** Unsubscribe and reject outstanding waits. */
  stop(): Promise<void>;
  storeBlob(
    blobId: string,
    data: Uint8Array,
    replicas?: number,
    options?: StoreOptions,
  ): Promise<StoreResult>;
  retrieveBlob(blobId: string): Promise<LocalRetrieveResult>;
  restoreBlob(blobId: string, options?: WaitOptions): Promise<RestoreResult>;
  requestProof(
    blobId: string,
    seed: Uint8Array,
    options?: WaitOptions,
  ): Promise<ProofResponse>;
  requestProofOfStorage(
    blobId: string,
    seed: Uint8Array,
  ): Promise<Uint8Array | null>;
  verifyReplica(blobId: string, options?: VerifyOptions): Promise<VerifyResult>;
  deleteBlob(blobId: string): Promise<void>;
}

export function createOwnerClient(options: OwnerClientOptions): OwnerClient {
  const { blobStore, keyVault, bus, logger } = options;
  const queues = options.queues ?? DEFAULT_QUEUES;
  const timeoutMs = options.responseTimeoutMs ?? DEFAULT_RESPONSE_TIMEOUT_MS;

  const stores = new ResponseRouter<StoreResponse>("store", timeoutMs);
  const retrieves = new ResponseRouter<RetrieveResponse>("retrieve", timeoutMs);
  const proofs = new ResponseRouter<ProofResponse>("proof", timeoutMs);
  let subscriptions: Subscription[] = [];

  function requireStarted(): void {
    if (subscriptions.length === 0) {
      throw new CofferError(
        "CLIENT_NOT_STARTED",
        "Owner client must be started before waiting for responses",
      );
    }
  }

  function route(source: string) {
    return async (payload: Uint8Array): Promise<void> => {
      const decoded = decodeMessage(payload);
      if (!decoded.ok) {
        logger.debug(
          { source, reason: decoded.reason },
          "Dropped malformed response",
        );
        return;
      }
      const message = decoded.message;
      let taken = false;
      switch (message.type) {
        case "store_response":
          taken = stores.deliver(message);
          break;
        case "retrieve_response":
          taken = retrieves.deliver(message);
          break;
        case "proof_of_storage_response":
          taken = proofs.deliver(message);
          break;
        default:
          logger.debug(
            { source, type: message.type },
            "Dropped non-response message",
          );
          return;
      }
      if (!taken) {
        logger.debug(
          { source, type: message.type, blobId: message.blobId },
          "No one waiting for response",
        );
      }
    };
  }

  async function localProof(
    blobId: string,
    seed: Uint8Array,
  ): Promise<Uint8Array | null> {
    const stored = await blobStore.retrieve(blobId);
    return stored ? computeProof(stored, seed) : null;
  }

  /** Send a request for an already registered wait; a failed send cancels it. */
  async function sendAndWait<T>(
    pending: PendingResponse<T>,
    send: () => Promise<void>,
  ): Promise<T> {
    const [response] = await Promise.all([
      pending.promise,
      send().catch((err: unknown) => {
        pending.cancel(err);
        throw err;
      }),
    ]);
    return response;
  }

  async function requestProof(
    blobId: string,
    seed: Uint8Array,
    waitOptions: WaitOptions = {},
  ): Promise<ProofResponse> {
    assertValidBlobId(blobId);
    requireStarted();
    return sendAndWait(proofs.register(blobId, waitOptions), () =>
      bus.publish(
        queues.proofRequests,
        encodeMessage({ type: "proof_of_storage_request", blobId, seed }),
      ),
    );
  }

  return {
    start() {
      if (subscriptions.length > 0) return;
      subscriptions = [
        queues.storeResponses,
        queues.retrieveResponses,
        queues.proofResponses,
      ].map((queue) => bus.subscribe(queue, route(queue)));
      logger.info("Owner client listening for responses");
    },

    async stop() {
      const current = subscriptions;
      subscriptions = [];
      const reason = new CofferError("CLIENT_STOPPED", "Owner client stopped");
      stores.rejectAll(reason);
      retrieves.rejectAll(reason);
      proofs.rejectAll(reason);
      await Promise.all(current.map((s) => s.unsubscribe()));
    },

    async storeBlob(blobId, data, replicas = 0, storeOptions = {}) {
      assertValidBlobId(blobId);
      const key = generateKey();
      const ciphertext = encrypt(key, data);
      await blobStore.store(blobId, ciphertext);
      await keyVault.storeKey(blobId, key);

      if (replicas <= 0) {
        return { replicasRequested: 0, acknowledgedBy: [] };
      }

      const awaiting = storeOptions.awaitAcknowledgements === true;
      if (awaiting) requireStarted();
      const pending = awaiting
        ? Array.from({ length: replicas }, () =>
            stores.register(blobId, {
              timeoutMs: storeOptions.timeoutMs,
              signal: storeOptions.signal,
              accept: (response) => response.stored,
            }),
          )
        : [];
      const acks = Promise.allSettled(pending.map((p) => p.promise));

      const request = encodeMessage({
        type: "store_request",
        blobId,
        data: ciphertext,
      });
      try {
        for (let i = 0; i < replicas; i++) {
          await bus.publish(queues.storeRequests, request);
        }
      } catch (err) {
        for (const p of pending) p.cancel(err);
        throw err;
      }
      logger.debug({ blobId, replicas }, "Requested replicas");

      const settled = await acks;
      storeOptions.signal?.throwIfAborted();
      const acknowledgedBy = settled.flatMap((result) =>
        result.status === "fulfilled" ? [result.value.nodeId] : [],
      );
      return { replicasRequested: replicas, acknowledgedBy };
    },

    async retrieveBlob(blobId) {
      assertValidBlobId(blobId);
      const stored = await blobStore.retrieve(blobId);
      if (!stored) return { found: false, data: null };
      const key = await keyVault.retrieveKey(blobId);
      if (!key) return { found: false, data: null };
      return { found: true, data: decrypt(key, stored) };
    },

    async restoreBlob(blobId, waitOptions = {}) {
      assertValidBlobId(blobId);
      requireStarted();
      // Every node answers; the first one holding a replica wins.
      const pending = retrieves.register(blobId, {
        ...waitOptions,
        accept: (candidate) => candidate.found && candidate.data !== null,
      });
      const response = await sendAndWait(pending, () =>
        bus.broadcast(
          queues.retrieveRequests,
          encodeMessage({ type: "retrieve_request", blobId }),
        ),
      );
      const { data } = response;
      if (!data) {
        throw new CofferError("RESTORE_FAILED", `Empty restore for ${blobId}`);
      }

      // Refuse bytes the local key cannot open.
      const key = await keyVault.retrieveKey(blobId);
      if (key) decrypt(key, data);
      await blobStore.store(blobId, data);
      logger.info({ blobId, nodeId: response.nodeId }, "Restored blob");
      return { restored: true, nodeId: response.nodeId };
    },

    requestProof,

    async requestProofOfStorage(blobId, seed) {
      assertValidBlobId(blobId);
      return localProof(blobId, seed);
    },

    async verifyReplica(blobId, verifyOptions = {}) {
      const seed = verifyOptions.seed ?? randomBytes(DEFAULT_SEED_LENGTH);
      const expected = await localProof(blobId, seed);
      const response = await requestProof(blobId, seed, verifyOptions);
      const verified =
        expected !== null &&
        response.proof !== null &&
        proofsEqual(expected, response.proof);
      return { nodeId: response.nodeId, found: response.found, verified };
    },

    async deleteBlob(blobId) {
      assertValidBlobId(blobId);
      await keyVault.deleteKey(blobId);
      await blobStore.delete(blobId);
      await bus.broadcast(
        queues.deleteRequests,
        encodeMessage({ type: "delete_request", blobId }),
      );
      logger.debug({ blobId }, "Deleted blob");
    },
  };
}
