import crypto from "crypto";
import fs from "fs/promises";
import path from "path";
import { Logger } from "@/src/main/logging/logger";
import { FolderAccessError } from "@/src/shared/errors";
import { failure, success, type Outcome } from "@/src/shared/models/results";

const logger = Logger.create("Library.FolderAccess");

/**
 * Capability for reading the library folder. Obtained from
 * `acquireFolderAccess`, given back with `release()`; releasing twice is a no-op.
 */
export type FolderGrant = {
  readonly folderPath: string;
  /** Current grant token; differs from the one passed in when that was stale */
  readonly token: string;
  readonly refreshed: boolean;
  readonly released: boolean;
  release(): void;
};

function hashId(id: string) {
  return crypto.createHash("sha1").update(id).digest("hex");
}

/**
 * Token for one specific folder on one specific device. Moving, replacing
 * or re-creating the folder changes it.
 */
export async function createFolderToken(folderPath: string): Promise<string> {
  const real = await fs.realpath(folderPath);
  const st = await fs.stat(real);
  return hashId(`${real}\0${st.dev}\0${st.ino}`);
}

export async function acquireFolderAccess(
  folderPath: string | null,
  token: string | null
): Promise<Outcome<FolderGrant>> {
  if (!folderPath) return failure(new FolderAccessError(null));
  const resolved = path.resolve(folderPath);

  let current: string;
  try {
    const st = await fs.stat(resolved);
    if (!st.isDirectory()) throw new Error("Not a directory");
    await fs.access(resolved, fs.constants.R_OK);
    current = await createFolderToken(resolved);
  } catch (err) {
    logger.warn("folder access denied", { folderPath: resolved, err });
    return failure(new FolderAccessError(resolved, { cause: err }));
  }

  const refreshed = token !== current;
  if (refreshed) logger.info("folder grant was stale, refreshed", { folderPath: resolved });

  let released = false;
  return success({
    folderPath: resolved,
    token: current,
    refreshed,
    get released() {
      return released;
    },
    release() {
      if (released) return;
      released = true;
      logger.debug("folder access released", { folderPath: resolved });
    }
  });
}

