import type { MetadataExtractor } from "@/src/main/library/metadata";
import type { CatalogStore } from "@/src/main/persistence/catalogStore";
import { Logger } from "@/src/main/logging/logger";
import { NotFoundError, ValidationError, toLibraryError } from "@/src/shared/errors";
import type { Book, BookId, Bookmark, BookmarkId, ChapterInfo } from "@/src/shared/models/audiobook";
import type { PlaybackState, PlaybackTransport } from "@/src/shared/models/playback";
import { failure, success, type Outcome } from "@/src/shared/models/results";

const logger = Logger.create("Playback.Session");

export type PlaybackSessionOptions = {
  /**
   * Seconds into a chapter after which "previous" restarts the chapter
   * instead of going to the one before.
   */
  restartThresholdSeconds?: number;
  now?: () => Date;
};

/** Index of the last chapter starting at or before `time`; 0 if none does; -1 without chapters. */
export function chapterIndexAt(chapters: readonly ChapterInfo[], time: number): number {
  if (chapters.length === 0) return -1;
  for (let i = chapters.length - 1; i >= 0; i--) {
    if (chapters[i].startTime <= time) return i;
  }
  return 0;
}

/**
 * Chapter-aware view of one open book on top of the external transport.
 * While a book is open this is the only writer of its progress fields.
 */
export class PlaybackSession {
  private book: Book | null = null;
  private chapterList: ChapterInfo[] = [];
  private bookmarkList: Bookmark[] = [];
  private chapterIndex = -1;
  private readonly restartThreshold: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: CatalogStore,
    private readonly extractor: MetadataExtractor,
    private readonly transport: PlaybackTransport,
    options: PlaybackSessionOptions = {}
  ) {
    this.restartThreshold = options.restartThresholdSeconds ?? 3;
    this.now = options.now ?? (() => new Date());
  }

  get currentBook(): Book | null {
    return this.book;
  }

  get chapters(): readonly ChapterInfo[] {
    return this.chapterList;
  }

  /** Bookmarks of the open book, ascending by timestamp */
  get bookmarks(): readonly Bookmark[] {
    return this.bookmarkList;
  }

  get currentChapterIndex(): number {
    return this.chapterIndex;
  }

  get state(): PlaybackState {
    return {
      isPlaying: this.book !== null,
      rate: this.transport.rate,
      chapterIndex: this.chapterIndex,
      position: this.transport.currentTime
    };
  }

  async open(bookId: BookId): Promise<Outcome<Book>> {
    const book = this.store.findById(bookId);
    if (!book) return failure(new NotFoundError("Book"));

    this.book = book;
    this.chapterList = book.hasChapters ? await this.extractor.extractChapters(book.filePath) : [];
    this.reloadBookmarks();
    this.transport.seek(book.playbackPosition);
    this.chapterIndex = chapterIndexAt(this.chapterList, book.playbackPosition);
    logger.debug("opened", { bookId, chapters: this.chapterList.length, bookmarks: this.bookmarkList.length });
    return success(book);
  }

  currentChapter(time: number = this.transport.currentTime): ChapterInfo | undefined {
    const idx = chapterIndexAt(this.chapterList, time);
    return idx >= 0 ? this.chapterList[idx] : undefined;
  }

  /** Re-derives the current chapter from the live position. */
  updateCurrentChapter(): number {
    this.chapterIndex = chapterIndexAt(this.chapterList, this.transport.currentTime);
    return this.chapterIndex;
  }

  goToChapter(chapter: ChapterInfo) {
    this.transport.seek(chapter.startTime);
    this.updateCurrentChapter();
  }

  nextChapter() {
    const next = this.updateCurrentChapter() + 1;
    if (next <= 0 || next >= this.chapterList.length) return;
    this.goToChapter(this.chapterList[next]);
  }

  /** Restarts the current chapter, or goes to the previous one when close to its start. */
  previousChapter() {
    const idx = this.updateCurrentChapter();
    if (idx < 0) return;
    const current = this.chapterList[idx];
    if (this.transport.currentTime - current.startTime > this.restartThreshold) {
      this.goToChapter(current);
      return;
    }
    if (idx === 0) return;
    this.goToChapter(this.chapterList[idx - 1]);
  }

  async addBookmark(name: string, note?: string | null): Promise<Outcome<Bookmark>> {
    const book = this.book;
    if (!book) return failure(new NotFoundError("Open book"));
    const trimmed = name.trim();
    if (!trimmed) return failure(new ValidationError("Bookmark name must not be empty"));
    const timestamp = this.transport.currentTime;
    if (!Number.isFinite(timestamp)) return failure(new ValidationError("Position must be a finite number"));

    const trimmedNote = note?.trim();
    try {
      const created = await this.store.transact(async (tx) => {
        const bm = tx.addBookmark({
          bookId: book.id,
          timestamp: Math.max(0, timestamp),
          name: trimmed,
          note: trimmedNote ? trimmedNote : null,
          createdDate: this.now().toISOString()
        });
        if (!bm) throw new NotFoundError("Book");
        await tx.save();
        return bm;
      });
      this.reloadBookmarks();
      return success(created);
    } catch (err) {
      logger.error("failed to add bookmark", { bookId: book.id, err });
      return failure(toLibraryError(err));
    }
  }

  async deleteBookmark(bookmarkId: BookmarkId): Promise<Outcome<void>> {
    const book = this.book;
    if (!book) return failure(new NotFoundError("Open book"));
    try {
      const removed = await this.store.transact(async (tx) => {
        const ok = tx.deleteBookmark(bookmarkId);
        if (ok) await tx.save();
        return ok;
      });
      this.reloadBookmarks();
      return removed ? success(undefined) : failure(new NotFoundError("Bookmark"));
    } catch (err) {
      logger.error("failed to delete bookmark", { bookId: book.id, bookmarkId, err });
      return failure(toLibraryError(err));
    }
  }

  jumpToBookmark(bookmark: Bookmark) {
    this.transport.seek(bookmark.timestamp);
    this.updateCurrentChapter();
  }

  /** Persists the live position as the book's resume point. */
  async recordProgress(time: number = this.transport.currentTime): Promise<Outcome<Book>> {
    const book = this.book;
    if (!book) return failure(new NotFoundError("Open book"));
    if (!Number.isFinite(time)) return failure(new ValidationError("Position must be a finite number"));

    const duration = book.duration > 0 ? book.duration : this.transport.duration;
    const position = Math.max(0, duration > 0 ? Math.min(time, duration) : time);
    try {
      const updated = await this.store.transact(async (tx) => {
        const next = tx.updateProgress(book.id, {
          playbackPosition: position,
          lastPlayedDate: this.now().toISOString()
        });
        if (!next) throw new NotFoundError("Book");
        await tx.save();
        return next;
      });
      this.book = updated;
      this.chapterIndex = chapterIndexAt(this.chapterList, position);
      return success(updated);
    } catch (err) {
      logger.error("failed to record progress", { bookId: book.id, err });
      return failure(toLibraryError(err));
    }
  }

  close() {
    this.book = null;
    this.chapterList = [];
    this.bookmarkList = [];
    this.chapterIndex = -1;
  }

  private reloadBookmarks() {
    this.bookmarkList = this.book ? this.store.bookmarksFor(this.book.id) : [];
  }
}
