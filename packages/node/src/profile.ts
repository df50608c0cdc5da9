/**
 * The encryption mode is a property of the deployment, not of a single
 * run: blobs written in one mode cannot be read in the other. The first
 * start records the mode in `profile.json`; later starts must match it.
 */

import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { ModeMismatchError } from "@coffer/core/errors";
import { ENCRYPTION_MODES, type EncryptionMode } from "@coffer/core/node";

const ProfileSchema = z.object({
  mode: z.enum(ENCRYPTION_MODES),
  createdAt: z.string(),
});

export type Profile = z.infer<typeof ProfileSchema>;

/**
 * @throws ModeMismatchError if the root was created under another mode
 */
export async function ensureProfile(
  profilePath: string,
  mode: EncryptionMode,
): Promise<Profile> {
  let raw: string | undefined;
  try {
    raw = await readFile(profilePath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
  }

  if (raw === undefined) {
    const profile: Profile = { mode, createdAt: new Date().toISOString() };
    await writeFile(profilePath, JSON.stringify(profile, null, 2) + "\n");
    return profile;
  }

  const profile = ProfileSchema.parse(JSON.parse(raw));
  if (profile.mode !== mode) {
    throw new ModeMismatchError(profile.mode, mode);
  }
  return profile;
}
