import crypto from "crypto";
import fs from "fs/promises";
import { z } from "zod";
import { readJsonFile, writeJsonFile } from "@/src/main/persistence/jsonStore";
import { CATALOG_FILE, getUserDataFilePath } from "@/src/main/persistence/paths";
import { Logger } from "@/src/main/logging/logger";
import { CatalogCommitError } from "@/src/shared/errors";
import type {
  Book,
  BookId,
  BookMetadataFields,
  Bookmark,
  BookmarkId
} from "@/src/shared/models/audiobook";

const logger = Logger.create("Persistence.Catalog");

const CATALOG_VERSION = 1;

const BookSchema = z.object({
  id: z.string().min(1),
  filePath: z.string().min(1),
  title: z.string().optional(),
  author: z.string().optional(),
  genre: z.string().optional(),
  year: z.number().int().optional(),
  duration: z.number().nonnegative().catch(0),
  fileModDate: z.string(),
  playbackPosition: z.number().nonnegative().catch(0),
  lastPlayedDate: z.string().nullable().catch(null),
  isCompleted: z.boolean().catch(false),
  hasChapters: z.boolean().catch(false)
});

const BookmarkSchema = z.object({
  id: z.string().min(1),
  bookId: z.string().min(1),
  timestamp: z.number().nonnegative(),
  name: z.string().min(1),
  note: z.string().nullable().catch(null),
  createdDate: z.string()
});

// Records are validated one at a time on load; invalid ones are skipped.
const CatalogFileSchema = z.object({
  version: z.literal(CATALOG_VERSION),
  books: z.array(z.unknown()),
  bookmarks: z.array(z.unknown())
});

type CatalogFile = {
  version: typeof CATALOG_VERSION;
  books: Book[];
  bookmarks: Bookmark[];
};

type Snapshot = {
  books: ReadonlyMap<BookId, Book>;
  bookmarks: ReadonlyMap<BookmarkId, Bookmark>;
};

export type ProgressPatch = Partial<Pick<Book, "playbackPosition" | "lastPlayedDate" | "isCompleted">>;

export type NewBookmark = Omit<Bookmark, "id">;

/** Read side shared by the committed store and an open transaction. */
export interface CatalogReader {
  findAll(): Book[];
  findById(id: BookId): Book | undefined;
  findByPath(filePath: string): Book | undefined;
  /** Bookmarks of one book, ascending by timestamp. */
  bookmarksFor(bookId: BookId): Bookmark[];
}

function byTimestamp(a: Bookmark, b: Bookmark) {
  return a.timestamp - b.timestamp || a.createdDate.localeCompare(b.createdDate);
}

class SnapshotView implements CatalogReader {
  protected books: Map<BookId, Book>;
  protected bookmarks: Map<BookmarkId, Bookmark>;
  protected idByPath = new Map<string, BookId>();
  protected bookmarkIdsByBook = new Map<BookId, Set<BookmarkId>>();

  constructor(snapshot: Snapshot) {
    this.books = new Map(snapshot.books);
    this.bookmarks = new Map(snapshot.bookmarks);
    for (const book of this.books.values()) this.idByPath.set(book.filePath, book.id);
    for (const bm of this.bookmarks.values()) this.indexBookmark(bm);
  }

  findAll(): Book[] {
    return Array.from(this.books.values(), (b) => ({ ...b }));
  }

  findById(id: BookId): Book | undefined {
    const book = this.books.get(id);
    return book ? { ...book } : undefined;
  }

  findByPath(filePath: string): Book | undefined {
    const id = this.idByPath.get(filePath);
    return id ? this.findById(id) : undefined;
  }

  bookmarksFor(bookId: BookId): Bookmark[] {
    const ids = this.bookmarkIdsByBook.get(bookId);
    if (!ids) return [];
    const out: Bookmark[] = [];
    for (const id of ids) {
      const bm = this.bookmarks.get(id);
      if (bm) out.push({ ...bm });
    }
    return out.sort(byTimestamp);
  }

  protected indexBookmark(bm: Bookmark) {
    const set = this.bookmarkIdsByBook.get(bm.bookId) ?? new Set<BookmarkId>();
    set.add(bm.id);
    this.bookmarkIdsByBook.set(bm.bookId, set);
  }
}

/**
 * A caller's working set. Mutations stay local until `save()`, which commits
 * all of them at once; anything not saved when the transaction callback
 * returns is discarded.
 */
export class CatalogTransaction extends SnapshotView {
  private dirty = false;
  private closed = false;

  constructor(
    private readonly store: CatalogStore,
    snapshot: Snapshot
  ) {
    super(snapshot);
  }

  get hasChanges() {
    return this.dirty;
  }

  /**
   * Creates the book for `filePath`, or refreshes the metadata of the one
   * already there. Identity, progress and bookmarks of an existing book are
   * left alone.
   */
  upsert(filePath: string, fields: BookMetadataFields): { book: Book; created: boolean } {
    this.assertOpen();
    const existingId = this.idByPath.get(filePath);
    const existing = existingId ? this.books.get(existingId) : undefined;
    if (existing) {
      const book: Book = {
        ...existing,
        title: fields.title,
        author: fields.author,
        genre: fields.genre,
        year: fields.year,
        duration: fields.duration,
        fileModDate: fields.fileModDate,
        hasChapters: fields.hasChapters
      };
      this.books.set(book.id, book);
      this.dirty = true;
      return { book: { ...book }, created: false };
    }

    const book: Book = {
      id: crypto.randomUUID(),
      filePath,
      title: fields.title,
      author: fields.author,
      genre: fields.genre,
      year: fields.year,
      duration: fields.duration,
      fileModDate: fields.fileModDate,
      playbackPosition: 0,
      lastPlayedDate: null,
      isCompleted: false,
      hasChapters: fields.hasChapters
    };
    this.books.set(book.id, book);
    this.idByPath.set(filePath, book.id);
    this.dirty = true;
    return { book: { ...book }, created: true };
  }

  updateProgress(bookId: BookId, patch: ProgressPatch): Book | undefined {
    this.assertOpen();
    const existing = this.books.get(bookId);
    if (!existing) return undefined;
    const book: Book = { ...existing, ...patch };
    this.books.set(bookId, book);
    this.dirty = true;
    return { ...book };
  }

  /** Removes a book together with its bookmarks. */
  delete(bookId: BookId): boolean {
    this.assertOpen();
    const book = this.books.get(bookId);
    if (!book) return false;
    for (const id of this.bookmarkIdsByBook.get(bookId) ?? []) this.bookmarks.delete(id);
    this.bookmarkIdsByBook.delete(bookId);
    this.idByPath.delete(book.filePath);
    this.books.delete(bookId);
    this.dirty = true;
    return true;
  }

  addBookmark(input: NewBookmark): Bookmark | undefined {
    this.assertOpen();
    if (!this.books.has(input.bookId)) return undefined;
    const bm: Bookmark = { ...input, id: crypto.randomUUID() };
    this.bookmarks.set(bm.id, bm);
    this.indexBookmark(bm);
    this.dirty = true;
    return { ...bm };
  }

  deleteBookmark(bookmarkId: BookmarkId): boolean {
    this.assertOpen();
    const bm = this.bookmarks.get(bookmarkId);
    if (!bm) return false;
    this.bookmarks.delete(bookmarkId);
    this.bookmarkIdsByBook.get(bm.bookId)?.delete(bookmarkId);
    this.dirty = true;
    return true;
  }

  /** Commits every pending mutation. Throws CatalogCommitError and leaves the committed state as it was on failure. */
  async save(): Promise<void> {
    this.assertOpen();
    if (!this.dirty) return;
    await this.store.commit({ books: this.books, bookmarks: this.bookmarks });
    this.dirty = false;
  }

  /** @internal */
  close() {
    this.closed = true;
  }

  private assertOpen() {
    if (this.closed) throw new Error("Catalog transaction used after it finished");
  }
}

/**
 * Durable book/bookmark repository backed by one JSON file.
 *
 * Reads see the last committed state. Writes go through `transact`, which
 * runs callers one at a time so there is a single logical writer.
 */
export class CatalogStore implements CatalogReader {
  private committed: SnapshotView;
  private snapshot: Snapshot;
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    readonly filePath: string,
    snapshot: Snapshot
  ) {
    this.snapshot = snapshot;
    this.committed = new SnapshotView(snapshot);
  }

  static async open(filePath: string = getUserDataFilePath(CATALOG_FILE)): Promise<CatalogStore> {
    return new CatalogStore(filePath, await loadSnapshot(filePath));
  }

  findAll(): Book[] {
    return this.committed.findAll();
  }

  findById(id: BookId): Book | undefined {
    return this.committed.findById(id);
  }

  findByPath(filePath: string): Book | undefined {
    return this.committed.findByPath(filePath);
  }

  bookmarksFor(bookId: BookId): Bookmark[] {
    return this.committed.bookmarksFor(bookId);
  }

  /**
   * Runs `fn` against a fresh working set once every earlier writer is done.
   * Concurrent writers therefore never interleave; between two of them the
   * later one wins at `save()` granularity.
   */
  transact<T>(fn: (tx: CatalogTransaction) => Promise<T> | T): Promise<T> {
    const run = this.queue.then(async () => {
      const tx = new CatalogTransaction(this, this.snapshot);
      try {
        return await fn(tx);
      } finally {
        tx.close();
      }
    });
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** @internal called by CatalogTransaction.save */
  async commit(next: Snapshot): Promise<void> {
    const books = Array.from(next.books.values()).sort((a, b) => a.filePath.localeCompare(b.filePath));
    const bookmarks = Array.from(next.bookmarks.values()).sort(
      (a, b) => a.bookId.localeCompare(b.bookId) || byTimestamp(a, b)
    );
    const file: CatalogFile = { version: CATALOG_VERSION, books, bookmarks };
    try {
      await writeJsonFile(this.filePath, file);
    } catch (err) {
      logger.error("commit failed", { filePath: this.filePath, err });
      throw new CatalogCommitError({ cause: err });
    }
    this.snapshot = { books: new Map(next.books), bookmarks: new Map(next.bookmarks) };
    this.committed = new SnapshotView(this.snapshot);
  }
}

async function loadSnapshot(filePath: string): Promise<Snapshot> {
  const raw = await readJsonFile(filePath, { version: CATALOG_VERSION, books: [], bookmarks: [] }).catch(
    (err: unknown) => {
      logger.warn("catalog file is unreadable", { filePath, err });
      return null;
    }
  );
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    await quarantine(filePath);
    return { books: new Map(), bookmarks: new Map() };
  }

  const books = new Map<BookId, Book>();
  const seenPaths = new Set<string>();
  let skipped = 0;
  for (const raw of parsed.data.books) {
    const record = BookSchema.safeParse(raw);
    if (!record.success) {
      skipped += 1;
      continue;
    }
    const book = record.data;
    // First record wins if a hand-edited file repeats a path.
    if (seenPaths.has(book.filePath) || books.has(book.id)) continue;
    seenPaths.add(book.filePath);
    books.set(book.id, book);
  }
  const bookmarks = new Map<BookmarkId, Bookmark>();
  for (const raw of parsed.data.bookmarks) {
    const record = BookmarkSchema.safeParse(raw);
    if (!record.success) {
      skipped += 1;
      continue;
    }
    if (books.has(record.data.bookId)) bookmarks.set(record.data.id, record.data);
  }
  if (skipped > 0) logger.warn("skipped invalid catalog records", { filePath, skipped });
  return { books, bookmarks };
}

async function quarantine(filePath: string) {
  const aside = `${filePath}.corrupt-${Date.now()}`;
  try {
    await fs.rename(filePath, aside);
    logger.warn("catalog file did not match the expected format; moved aside", { filePath, aside });
  } catch (err) {
    logger.warn("catalog file did not match the expected format and could not be moved aside", { filePath, err });
  }
}
