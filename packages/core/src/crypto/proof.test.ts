import { describe, it, expect } from "vitest";
import { sha256 } from "@noble/hashes/sha2.js";
import { PROOF_LENGTH, computeProof, proofsEqual } from "./proof.js";

const encoder = new TextEncoder();

describe("computeProof", () => {
  const data = encoder.encode("owner ciphertext");
  const seed = encoder.encode("xyz");

  it("is SHA-256 over data followed by seed", () => {
    const expected = sha256(encoder.encode("owner ciphertextxyz"));
    expect(computeProof(data, seed)).toEqual(expected);
    expect(computeProof(data, seed)).toHaveLength(PROOF_LENGTH);
  });

  it("is deterministic", () => {
    expect(computeProof(data, seed)).toEqual(computeProof(data, seed));
  });

  it("changes with the seed", () => {
    const other = computeProof(data, encoder.encode("xyw"));
    expect(proofsEqual(computeProof(data, seed), other)).toBe(false);
  });

  it("changes with the data", () => {
    const other = computeProof(encoder.encode("owner ciphertexT"), seed);
    expect(proofsEqual(computeProof(data, seed), other)).toBe(false);
  });
});

describe("proofsEqual", () => {
  it("compares contents", () => {
    expect(proofsEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(
      true,
    );
    expect(proofsEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(
      false,
    );
  });

  it("returns false on length mismatch", () => {
    expect(proofsEqual(new Uint8Array([1]), new Uint8Array([1, 0]))).toBe(
      false,
    );
  });
});
