import { join } from "node:path";
import { InvalidBlobIdError } from "../errors/catalog.js";

/**
 * Blob ids double as file names: alphanumeric first character, then
 * alphanumerics, dot, underscore or hyphen, 255 characters at most.
 */
export const BLOB_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,254}$/;

export function isValidBlobId(blobId: string): boolean {
  return BLOB_ID_PATTERN.test(blobId);
}

/** @throws InvalidBlobIdError */
export function assertValidBlobId(blobId: string): void {
  if (!isValidBlobId(blobId)) {
    throw new InvalidBlobIdError(blobId);
  }
}

/** "{dir}/{blobId}.blob" */
export function buildBlobPath(dir: string, blobId: string): string {
  assertValidBlobId(blobId);
  return join(dir, `${blobId}.blob`);
}

/** "{dir}/{blobId}.key" */
export function buildKeyPath(dir: string, blobId: string): string {
  assertValidBlobId(blobId);
  return join(dir, `${blobId}.key`);
}
