import fs from "fs/promises";
import os from "os";
import path from "path";
import type { ExtractedBook, MetadataExtractor } from "@/src/main/library/metadata";
import { metadataFromFileName } from "@/src/main/library/metadata";
import type { Book, BookMetadata, ChapterInfo } from "@/src/shared/models/audiobook";
import type { PlaybackTransport } from "@/src/shared/models/playback";

export async function makeTempDir(prefix = "audioshelf-test-"): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Writes a placeholder audio file and pins its mtime. */
export async function writeAudioFile(filePath: string, mtime: Date = new Date("2024-03-01T10:00:00.000Z")) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, "not really audio");
  await fs.utimes(filePath, mtime, mtime);
  return filePath;
}

/** In-memory extractor keyed by path; unknown paths fall back to the file name. */
export class FakeExtractor implements MetadataExtractor {
  readonly calls: string[] = [];
  private readonly byPath = new Map<string, ExtractedBook>();

  set(filePath: string, metadata: Partial<BookMetadata>, chapters: ChapterInfo[] = []) {
    this.byPath.set(filePath, { metadata: { duration: 0, ...metadata }, chapters });
  }

  async extract(filePath: string) {
    return (await this.extractAll(filePath)).metadata;
  }

  async extractChapters(filePath: string) {
    return (await this.extractAll(filePath)).chapters;
  }

  async extractAll(filePath: string): Promise<ExtractedBook> {
    this.calls.push(filePath);
    return this.byPath.get(filePath) ?? { metadata: metadataFromFileName(filePath), chapters: [] };
  }
}

export class FakeTransport implements PlaybackTransport {
  currentTime = 0;
  duration = 0;
  rate = 1;
  readonly seeks: number[] = [];

  seek(seconds: number) {
    this.seeks.push(seconds);
    this.currentTime = seconds;
  }
}

export function makeBook(overrides: Partial<Book> = {}): Book {
  return {
    id: "book-1",
    filePath: "/library/book.m4b",
    duration: 3600,
    fileModDate: "2024-03-01T10:00:00.000Z",
    playbackPosition: 0,
    lastPlayedDate: null,
    isCompleted: false,
    hasChapters: false,
    ...overrides
  };
}
