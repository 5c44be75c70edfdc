import path from "path";
import { parseFile } from "music-metadata";
import { Logger } from "@/src/main/logging/logger";
import type { BookMetadata, ChapterInfo } from "@/src/shared/models/audiobook";

const logger = Logger.create("Library.Metadata");

export type ExtractedBook = {
  metadata: BookMetadata;
  /** Strictly increasing by startTime, or empty */
  chapters: ChapterInfo[];
};

/**
 * Reads descriptive metadata and chapters from an audio file.
 *
 * Implementations never reject: a file that cannot be parsed yields
 * filename-derived metadata and no chapters. Calls on distinct files may run
 * concurrently.
 */
export interface MetadataExtractor {
  extract(filePath: string): Promise<BookMetadata>;
  extractChapters(filePath: string): Promise<ChapterInfo[]>;
  /** Both of the above from a single read of the file. */
  extractAll(filePath: string): Promise<ExtractedBook>;
}

export function metadataFromFileName(filePath: string): BookMetadata {
  return { title: path.basename(filePath, path.extname(filePath)), duration: 0 };
}

/**
 * Keeps a chapter list only if every start is finite, non-negative and
 * strictly greater than the one before; anything else means "no chapters".
 */
export function normalizeChapters(chapters: ChapterInfo[]): ChapterInfo[] {
  let prev = -Infinity;
  for (const c of chapters) {
    if (!Number.isFinite(c.startTime) || c.startTime < 0 || c.startTime <= prev) return [];
    prev = c.startTime;
  }
  return chapters;
}

type RawChapter = { title?: unknown; sampleOffset?: unknown };

/** Starts are sample offsets; no usable sample rate means no chapters. */
function toChapters(raw: readonly RawChapter[], sampleRate: number | undefined): ChapterInfo[] {
  if (raw.length === 0 || typeof sampleRate !== "number" || !Number.isFinite(sampleRate) || sampleRate <= 0) {
    return [];
  }
  return normalizeChapters(
    raw.map((c, idx) => {
      const title = typeof c.title === "string" ? c.title.trim() : "";
      return { title: title || `Chapter ${idx + 1}`, startTime: Number(c.sampleOffset) / sampleRate };
    })
  );
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const v of values) {
    const s = v?.trim();
    if (s) return s;
  }
  return undefined;
}

/** MetadataExtractor backed by music-metadata. */
export class MusicMetadataExtractor implements MetadataExtractor {
  async extract(filePath: string): Promise<BookMetadata> {
    return (await this.extractAll(filePath)).metadata;
  }

  async extractChapters(filePath: string): Promise<ChapterInfo[]> {
    return (await this.extractAll(filePath)).chapters;
  }

  async extractAll(filePath: string): Promise<ExtractedBook> {
    try {
      const mm = await parseFile(filePath, { includeChapters: true, skipCovers: true });
      const fallback = metadataFromFileName(filePath);

      const author = firstNonEmpty(mm.common.artist, mm.common.artists?.join(", "), mm.common.albumartist);
      const duration =
        typeof mm.format.duration === "number" && Number.isFinite(mm.format.duration) && mm.format.duration > 0
          ? mm.format.duration
          : 0;
      const year =
        typeof mm.common.year === "number" && Number.isInteger(mm.common.year) && mm.common.year > 0
          ? mm.common.year
          : undefined;
      const rawChapters: readonly RawChapter[] = mm.format.chapters ?? [];

      return {
        metadata: {
          title: firstNonEmpty(mm.common.album, mm.common.title) ?? fallback.title,
          author,
          genre: firstNonEmpty(mm.common.genre?.[0]),
          year,
          duration
        },
        chapters: toChapters(rawChapters, mm.format.sampleRate)
      };
    } catch (err) {
      logger.warn("failed to parse", { filePath, err });
      return { metadata: metadataFromFileName(filePath), chapters: [] };
    }
  }
}
