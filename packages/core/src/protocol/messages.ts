/**
 * Message records exchanged over the bus.
 *
 * On the wire every message is a UTF-8 JSON object with a `type`
 * discriminator, snake_case field names and base64 binary fields. In code
 * the same records use camelCase and Uint8Array.
 */

import { z } from "zod";
import { BLOB_ID_PATTERN } from "../storage/paths.js";

export const MESSAGE_TYPES = [
  "store_request",
  "store_response",
  "retrieve_request",
  "retrieve_response",
  "proof_of_storage_request",
  "proof_of_storage_response",
  "delete_request",
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface StoreRequest {
  readonly type: "store_request";
  readonly blobId: string;
  readonly data: Uint8Array;
}

export interface StoreResponse {
  readonly type: "store_response";
  readonly blobId: string;
  readonly nodeId: string;
  readonly stored: boolean;
}

export interface RetrieveRequest {
  readonly type: "retrieve_request";
  readonly blobId: string;
}

export interface RetrieveResponse {
  readonly type: "retrieve_response";
  readonly blobId: string;
  readonly nodeId: string;
  readonly data: Uint8Array | null;
  readonly found: boolean;
}

export interface ProofRequest {
  readonly type: "proof_of_storage_request";
  readonly blobId: string;
  readonly seed: Uint8Array;
}

export interface ProofResponse {
  readonly type: "proof_of_storage_response";
  readonly blobId: string;
  readonly nodeId: string;
  readonly proof: Uint8Array | null;
  readonly found: boolean;
}

export interface DeleteRequest {
  readonly type: "delete_request";
  readonly blobId: string;
}

export type RequestMessage =
  | StoreRequest
  | RetrieveRequest
  | ProofRequest
  | DeleteRequest;

export type ResponseMessage = StoreResponse | RetrieveResponse | ProofResponse;

export type Message = RequestMessage | ResponseMessage;

export type RequestType = RequestMessage["type"];
export type ResponseType = ResponseMessage["type"];

// --- Wire schemas ---

const toBytes = (value: string): Uint8Array =>
  new Uint8Array(Buffer.from(value, "base64"));

const BlobIdSchema = z.string().regex(BLOB_ID_PATTERN);
const NodeIdSchema = z.string();
const BytesSchema = z.base64().transform(toBytes);
const NullableBytesSchema = z.base64().nullable().transform((value) =>
  value === null ? null : toBytes(value),
);

export const StoreRequestSchema = z
  .object({
    type: z.literal("store_request"),
    blob_id: BlobIdSchema,
    data: BytesSchema,
  })
  .transform(
    (wire): StoreRequest => ({
      type: wire.type,
      blobId: wire.blob_id,
      data: wire.data,
    }),
  );

export const StoreResponseSchema = z
  .object({
    type: z.literal("store_response"),
    blob_id: BlobIdSchema,
    node_id: NodeIdSchema,
    stored: z.boolean(),
  })
  .transform(
    (wire): StoreResponse => ({
      type: wire.type,
      blobId: wire.blob_id,
      nodeId: wire.node_id,
      stored: wire.stored,
    }),
  );

export const RetrieveRequestSchema = z
  .object({
    type: z.literal("retrieve_request"),
    blob_id: BlobIdSchema,
  })
  .transform(
    (wire): RetrieveRequest => ({ type: wire.type, blobId: wire.blob_id }),
  );

export const RetrieveResponseSchema = z
  .object({
    type: z.literal("retrieve_response"),
    blob_id: BlobIdSchema,
    node_id: NodeIdSchema,
    data: NullableBytesSchema,
    found: z.boolean(),
  })
  .transform(
    (wire): RetrieveResponse => ({
      type: wire.type,
      blobId: wire.blob_id,
      nodeId: wire.node_id,
      data: wire.data,
      found: wire.found,
    }),
  );

export const ProofRequestSchema = z
  .object({
    type: z.literal("proof_of_storage_request"),
    blob_id: BlobIdSchema,
    seed: BytesSchema,
  })
  .transform(
    (wire): ProofRequest => ({
      type: wire.type,
      blobId: wire.blob_id,
      seed: wire.seed,
    }),
  );

export const ProofResponseSchema = z
  .object({
    type: z.literal("proof_of_storage_response"),
    blob_id: BlobIdSchema,
    node_id: NodeIdSchema,
    proof: NullableBytesSchema,
    found: z.boolean(),
  })
  .transform(
    (wire): ProofResponse => ({
      type: wire.type,
      blobId: wire.blob_id,
      nodeId: wire.node_id,
      proof: wire.proof,
      found: wire.found,
    }),
  );

export const DeleteRequestSchema = z
  .object({
    type: z.literal("delete_request"),
    blob_id: BlobIdSchema,
  })
  .transform(
    (wire): DeleteRequest => ({ type: wire.type, blobId: wire.blob_id }),
  );

const SCHEMAS = {
  store_request: StoreRequestSchema,
  store_response: StoreResponseSchema,
  retrieve_request: RetrieveRequestSchema,
  retrieve_response: RetrieveResponseSchema,
  proof_of_storage_request: ProofRequestSchema,
  proof_of_storage_response: ProofResponseSchema,
  delete_request: DeleteRequestSchema,
} satisfies Record<MessageType, z.ZodType<Message>>;

// --- Codec ---

export type DecodeResult =
  | { ok: true; message: Message }
  | { ok: false; reason: string };

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isMessageType(value: unknown): value is MessageType {
  return (
    typeof value === "string" &&
    (MESSAGE_TYPES as readonly string[]).includes(value)
  );
}

/**
 * Parse a payload from the bus. Never throws: anything that is not a
 * well-formed message comes back as `{ ok: false, reason }`.
 */
export function decodeMessage(payload: Uint8Array): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(payload));
  } catch (err) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : "unreadable payload",
    };
  }

  if (typeof parsed !== "object" || parsed === null || !("type" in parsed)) {
    return { ok: false, reason: "missing message type" };
  }
  if (!isMessageType(parsed.type)) {
    return { ok: false, reason: `unknown message type: ${String(parsed.type)}` };
  }

  const result = SCHEMAS[parsed.type].safeParse(parsed);
  if (!result.success) {
    return { ok: false, reason: result.error.message };
  }
  return { ok: true, message: result.data };
}

const fromBytes = (value: Uint8Array): string =>
  Buffer.from(value).toString("base64");

function toWire(message: Message): Record<string, unknown> {
  switch (message.type) {
    case "store_request":
      return {
        type: message.type,
        blob_id: message.blobId,
        data: fromBytes(message.data),
      };
    case "store_response":
      return {
        type: message.type,
        blob_id: message.blobId,
        node_id: message.nodeId,
        stored: message.stored,
      };
    case "retrieve_request":
    case "delete_request":
      return { type: message.type, blob_id: message.blobId };
    case "retrieve_response":
      return {
        type: message.type,
        blob_id: message.blobId,
        node_id: message.nodeId,
        data: message.data === null ? null : fromBytes(message.data),
        found: message.found,
      };
    case "proof_of_storage_request":
      return {
        type: message.type,
        blob_id: message.blobId,
        seed: fromBytes(message.seed),
      };
    case "proof_of_storage_response":
      return {
        type: message.type,
        blob_id: message.blobId,
        node_id: message.nodeId,
        proof: message.proof === null ? null : fromBytes(message.proof),
        found: message.found,
      };
  }
}

/** Serialize a message to UTF-8 JSON bytes for the bus. */
export function encodeMessage(message: Message): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(toWire(message)));
}
