export {
  MESSAGE_TYPES,
  StoreRequestSchema,
  StoreResponseSchema,
  RetrieveRequestSchema,
  RetrieveResponseSchema,
  ProofRequestSchema,
  ProofResponseSchema,
  DeleteRequestSchema,
  decodeMessage,
  encodeMessage,
  type MessageType,
  type StoreRequest,
  type StoreResponse,
  type RetrieveRequest,
  type RetrieveResponse,
  type ProofRequest,
  type ProofResponse,
  type DeleteRequest,
  type RequestMessage,
  type ResponseMessage,
  type RequestType,
  type ResponseType,
  type Message,
  type DecodeResult,
} from "./messages.js";
