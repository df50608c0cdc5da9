import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ModeMismatchError } from "@coffer/core/errors";
import { ensureProfile } from "./profile.js";

describe("ensureProfile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "profile-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("records the mode on first start", async () => {
    const profilePath = join(tempDir, "profile.json");

    const profile = await ensureProfile(profilePath, "node-keyed");

    expect(profile.mode).toBe("node-keyed");
    const onDisk = JSON.parse(await readFile(profilePath, "utf-8"));
    expect(onDisk.mode).toBe("node-keyed");
  });

  it("accepts a later start in the same mode", async () => {
    const profilePath = join(tempDir, "profile.json");
    const first = await ensureProfile(profilePath, "per-document");

    await expect(ensureProfile(profilePath, "per-document")).resolves.toEqual(
      first,
    );
  });

  it("refuses to start in another mode", async () => {
    const profilePath = join(tempDir, "profile.json");
    await ensureProfile(profilePath, "per-document");

    await expect(ensureProfile(profilePath, "node-keyed")).rejects.toThrow(
      ModeMismatchError,
    );
  });

  it("rejects a profile with an unknown mode", async () => {
    const profilePath = join(tempDir, "profile.json");
    await writeFile(
      profilePath,
      JSON.stringify({ mode: "plaintext", createdAt: "2026-01-01" }),
    );

    await expect(ensureProfile(profilePath, "per-document")).rejects.toThrow();
  });
});
