import fs from "fs/promises";
import path from "path";
import { AUDIO_FILE_EXTENSIONS } from "@/src/main/library/audioExtensions";
import { Logger } from "@/src/main/logging/logger";

const logger = Logger.create("Library.Walk");

export type AudioFileEntry = {
  filePath: string;
  /** Modification time in whole milliseconds */
  mtimeMs: number;
};

/**
 * Lists supported audio files under `root`, recursively. Symbolic links are
 * not followed. The root itself must be readable (its failure is thrown);
 * unreadable subfolders and files that vanish mid-walk are skipped.
 *
 * Paths are compared byte-for-byte later on: a file whose name changes case
 * or Unicode normalization between scans shows up as a different file.
 */
export async function listAudioFilesRecursive(root: string): Promise<Map<string, AudioFileEntry>> {
  const out = new Map<string, AudioFileEntry>();
  const rootPath = path.resolve(root);
  const stack: string[] = [rootPath];

  while (stack.length) {
    const dir = stack.pop();
    if (dir === undefined) break;
    let entries: Array<{ name: string; isDirectory(): boolean; isFile(): boolean }> = [];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (dir === rootPath) throw err;
      logger.warn("skipping unreadable folder", { dir, err });
      continue;
    }

    for (const ent of entries) {
      const p = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        stack.push(p);
        continue;
      }
      if (!ent.isFile() || !AUDIO_FILE_EXTENSIONS.has(path.extname(ent.name).toLowerCase())) continue;
      try {
        const st = await fs.stat(p);
        // Date keeps whole milliseconds, which is what the catalog stores.
        out.set(p, { filePath: p, mtimeMs: st.mtime.getTime() });
      } catch (err) {
        logger.debug("file disappeared during scan", { filePath: p, err });
      }
    }
  }

  return out;
}
