import fs from "fs/promises";
import { z } from "zod";
import { writeTextFile } from "@/src/main/persistence/jsonStore";
import type { CatalogReader, CatalogStore } from "@/src/main/persistence/catalogStore";
import { Logger } from "@/src/main/logging/logger";
import { BackupFormatError, OperationCancelledError, toLibraryError } from "@/src/shared/errors";
import type { Book, Bookmark } from "@/src/shared/models/audiobook";
import {
  BACKUP_FORMAT_VERSION,
  type BackupBook,
  type BackupBookmark,
  type BackupDocument
} from "@/src/shared/models/backup";
import { failure, success, type ImportResult, type Outcome } from "@/src/shared/models/results";

const logger = Logger.create("Library.Backup");

const IsoDate = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s).toISOString());

const Seconds = z.number().finite().nonnegative();

// Only the outer shape decides whether the document is usable at all;
// entries and bookmarks are validated one by one so a bad one is skipped.
const DocumentSchema = z.object({
  exportDate: z.string().optional(),
  version: z.string().optional(),
  books: z.array(z.unknown())
});

const EntrySchema = z.object({
  filePath: z.string().min(1),
  playbackPosition: Seconds,
  lastPlayedDate: IsoDate.nullable().default(null),
  isCompleted: z.boolean().default(false),
  bookmarks: z.array(z.unknown()).default([])
});

const BookmarkEntrySchema = z.object({
  timestamp: Seconds,
  name: z.string().trim().min(1),
  note: z.string().nullable().default(null),
  createdDate: IsoDate
});

function compareCodeUnits(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toBackupBookmark(bm: Bookmark): BackupBookmark {
  return { timestamp: bm.timestamp, name: bm.name, note: bm.note, createdDate: bm.createdDate };
}

function toBackupBook(book: Book, bookmarks: Bookmark[]): BackupBook {
  return {
    filePath: book.filePath,
    playbackPosition: book.playbackPosition,
    lastPlayedDate: book.lastPlayedDate,
    isCompleted: book.isCompleted,
    bookmarks: bookmarks
      .slice()
      .sort((a, b) => a.timestamp - b.timestamp || compareCodeUnits(a.createdDate, b.createdDate))
      .map(toBackupBookmark)
  };
}

/** Books sorted by path and bookmarks by timestamp, so two exports of the same catalog diff cleanly. */
export function buildBackupDocument(catalog: CatalogReader, exportDate: Date = new Date()): BackupDocument {
  const books = catalog
    .findAll()
    .sort((a, b) => compareCodeUnits(a.filePath, b.filePath))
    .map((book) => toBackupBook(book, catalog.bookmarksFor(book.id)));
  return { exportDate: exportDate.toISOString(), version: BACKUP_FORMAT_VERSION, books };
}

export function serializeBackup(doc: BackupDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export function parseBackup(text: string): z.infer<typeof DocumentSchema> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new BackupFormatError("The progress file is not valid JSON.", { cause: err });
  }
  const parsed = DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BackupFormatError("The progress file is in an unsupported format.", { cause: parsed.error });
  }
  return parsed.data;
}

function clampPosition(position: number, book: Book) {
  return book.duration > 0 ? Math.min(position, book.duration) : position;
}

/**
 * Exports progress and bookmarks, and merges an exported document back in.
 *
 * Import matches books by `filePath` and never creates a book. Progress from
 * the document overwrites the catalog's; bookmarks are added unless the book
 * already has one at the same timestamp.
 */
export class ProgressBackup {
  constructor(private readonly store: CatalogStore) {}

  exportDocument(exportDate?: Date): BackupDocument {
    return buildBackupDocument(this.store, exportDate);
  }

  async exportToFile(filePath: string, exportDate?: Date): Promise<Outcome<{ booksExported: number }>> {
    const doc = this.exportDocument(exportDate);
    try {
      await writeTextFile(filePath, serializeBackup(doc));
    } catch (err) {
      logger.error("export failed", { filePath, err });
      return failure(toLibraryError(err));
    }
    logger.info("exported progress", { filePath, books: doc.books.length });
    return success({ booksExported: doc.books.length });
  }

  async importFromFile(filePath: string, options: { signal?: AbortSignal } = {}): Promise<Outcome<ImportResult>> {
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      logger.warn("cannot read progress file", { filePath, err });
      return failure(new BackupFormatError("Could not read the progress file.", { cause: err }));
    }
    return await this.importJson(text, options);
  }

  async importJson(text: string, { signal }: { signal?: AbortSignal } = {}): Promise<Outcome<ImportResult>> {
    let entries: unknown[];
    try {
      entries = parseBackup(text).books;
    } catch (err) {
      logger.warn("rejected progress file", { err });
      return failure(toLibraryError(err));
    }

    try {
      const result = await this.store.transact(async (tx) => {
        const counts: ImportResult = { booksUpdated: 0, bookmarksCreated: 0, booksNotFound: 0, entriesRejected: 0 };

        for (const rawEntry of entries) {
          const entry = EntrySchema.safeParse(rawEntry);
          if (!entry.success) {
            counts.entriesRejected += 1;
            continue;
          }
          const book = tx.findByPath(entry.data.filePath);
          if (!book) {
            counts.booksNotFound += 1;
            continue;
          }

          tx.updateProgress(book.id, {
            playbackPosition: clampPosition(entry.data.playbackPosition, book),
            lastPlayedDate: entry.data.lastPlayedDate,
            isCompleted: entry.data.isCompleted
          });
          counts.booksUpdated += 1;

          const timestamps = new Set(tx.bookmarksFor(book.id).map((bm) => bm.timestamp));
          for (const rawBookmark of entry.data.bookmarks) {
            const bm = BookmarkEntrySchema.safeParse(rawBookmark);
            if (!bm.success) {
              counts.entriesRejected += 1;
              continue;
            }
            if (timestamps.has(bm.data.timestamp)) continue;
            tx.addBookmark({ bookId: book.id, ...bm.data });
            timestamps.add(bm.data.timestamp);
            counts.bookmarksCreated += 1;
          }
        }

        if (signal?.aborted) throw new OperationCancelledError("Progress import");
        await tx.save();
        return counts;
      });

      logger.info("imported progress", result);
      return success(result);
    } catch (err) {
      if (!(err instanceof OperationCancelledError)) logger.error("import failed", { err });
      return failure(toLibraryError(err));
    }
  }
}
