/**
 * The node key encrypts everything a node-keyed storage node holds.
 * Loading it is an explicit bootstrap step; the key is then handed to the
 * node layer, never looked up globally.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils.js";
import { z } from "zod";
import { KEY_LENGTH, generateKey } from "../crypto/cipher.js";
import { KeyLengthError } from "../errors/catalog.js";

const NodeKeyFileSchema = z.object({
  key: z.string().regex(/^[0-9a-fA-F]*$/),
  createdAt: z.string(),
});

type NodeKeyFile = z.infer<typeof NodeKeyFileSchema>;

/**
 * Loads the node key from disk, or generates a new random one and
 * persists it with mode 0600.
 *
 * @throws KeyLengthError if the stored key is not 32 bytes
 */
export function loadOrCreateNodeKey(keyPath: string): Uint8Array {
  if (existsSync(keyPath)) {
    const raw = readFileSync(keyPath, "utf-8");
    const data = NodeKeyFileSchema.parse(JSON.parse(raw));
    if (data.key.length % 2 !== 0) {
      throw new KeyLengthError(KEY_LENGTH, data.key.length / 2);
    }
    const key = hexToBytes(data.key);
    if (key.length !== KEY_LENGTH) {
      throw new KeyLengthError(KEY_LENGTH, key.length);
    }
    return key;
  }

  const key = generateKey();
  mkdirSync(dirname(keyPath), { recursive: true });

  const data: NodeKeyFile = {
    key: bytesToHex(key),
    createdAt: new Date().toISOString(),
  };
  writeFileSync(keyPath, JSON.stringify(data, null, 2), { mode: 0o600 });

  return key;
}
