import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PlaybackSession, chapterIndexAt } from "@/src/main/playback/playbackSession";
import { CatalogStore } from "@/src/main/persistence/catalogStore";
import type { Book, ChapterInfo } from "@/src/shared/models/audiobook";
import { FakeExtractor, FakeTransport, makeTempDir, removeDir } from "@/tests/helpers/fixtures";

const FILE = "/library/road.m4b";
const NOW = new Date("2024-06-01T12:00:00.000Z");
const CHAPTERS: ChapterInfo[] = [
  { title: "A", startTime: 0 },
  { title: "B", startTime: 600 },
  { title: "C", startTime: 1200 }
];

describe("chapterIndexAt", () => {
  it("picks the last chapter starting at or before the time", () => {
    expect(chapterIndexAt(CHAPTERS, 0)).toBe(0);
    expect(chapterIndexAt(CHAPTERS, 599)).toBe(0);
    expect(chapterIndexAt(CHAPTERS, 600)).toBe(1);
    expect(chapterIndexAt(CHAPTERS, 1199)).toBe(1);
    expect(chapterIndexAt(CHAPTERS, 5000)).toBe(2);
  });

  it("falls back to the first chapter before it starts and to -1 without chapters", () => {
    expect(chapterIndexAt([{ title: "Late", startTime: 30 }], 10)).toBe(0);
    expect(chapterIndexAt([], 10)).toBe(-1);
  });
});

describe("PlaybackSession", () => {
  let dir: string;
  let store: CatalogStore;
  let extractor: FakeExtractor;
  let transport: FakeTransport;
  let session: PlaybackSession;

  async function addBook(fields: { hasChapters: boolean; duration?: number; playbackPosition?: number }): Promise<Book> {
    return await store.transact(async (tx) => {
      const { book } = tx.upsert(FILE, {
        title: "The Long Road",
        duration: fields.duration ?? 3600,
        fileModDate: "2024-03-01T10:00:00.000Z",
        hasChapters: fields.hasChapters
      });
      const updated = tx.updateProgress(book.id, { playbackPosition: fields.playbackPosition ?? 0 }) ?? book;
      await tx.save();
      return updated;
    });
  }

  async function openAt(time: number, book?: Book) {
    const b = book ?? (await addBook({ hasChapters: true }));
    const opened = await session.open(b.id);
    expect(opened.ok).toBe(true);
    transport.currentTime = time;
    return b;
  }

  beforeEach(async () => {
    dir = await makeTempDir();
    store = await CatalogStore.open(path.join(dir, "catalog.json"));
    extractor = new FakeExtractor();
    extractor.set(FILE, { title: "The Long Road", duration: 3600 }, CHAPTERS);
    transport = new FakeTransport();
    transport.duration = 3600;
    session = new PlaybackSession(store, extractor, transport, { now: () => NOW });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("opens a book at its saved position with chapters and bookmarks", async () => {
    const book = await addBook({ hasChapters: true, playbackPosition: 700 });

    const result = await session.open(book.id);

    expect(result.ok).toBe(true);
    expect(transport.seeks).toEqual([700]);
    expect(session.chapters).toEqual(CHAPTERS);
    expect(session.currentChapterIndex).toBe(1);
    expect(session.bookmarks).toEqual([]);
    expect(session.state).toEqual({ isPlaying: true, rate: 1, chapterIndex: 1, position: 700 });
  });

  it("does not read chapters for a book without them", async () => {
    const book = await addBook({ hasChapters: false });

    await session.open(book.id);

    expect(extractor.calls).toEqual([]);
    expect(session.chapters).toEqual([]);
    expect(session.currentChapter()).toBeUndefined();
    expect(session.currentChapterIndex).toBe(-1);
  });

  it("reports NOT_FOUND for an unknown book", async () => {
    const result = await session.open("missing");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("NOT_FOUND");
  });

  it("resolves the current chapter from the live position", async () => {
    await openAt(0);

    expect(session.currentChapter(599)?.title).toBe("A");
    expect(session.currentChapter(600)?.title).toBe("B");
    expect(session.currentChapter(1199)?.title).toBe("B");
    transport.currentTime = 1500;
    expect(session.currentChapter()?.title).toBe("C");
  });

  it("moves to the next chapter and stays put on the last one", async () => {
    await openAt(650);

    session.nextChapter();
    expect(transport.currentTime).toBe(1200);
    expect(session.currentChapterIndex).toBe(2);

    session.nextChapter();
    expect(transport.currentTime).toBe(1200);
  });

  it("restarts the chapter when more than the threshold into it", async () => {
    await openAt(605);

    session.previousChapter();

    expect(transport.currentTime).toBe(600);
    expect(session.currentChapterIndex).toBe(1);
  });

  it("goes to the previous chapter when close to the chapter start", async () => {
    await openAt(603);

    session.previousChapter();

    expect(transport.currentTime).toBe(0);
    expect(session.currentChapterIndex).toBe(0);
  });

  it("honours a custom restart threshold", async () => {
    session = new PlaybackSession(store, extractor, transport, { restartThresholdSeconds: 4, now: () => NOW });
    await openAt(604);

    session.previousChapter();

    expect(transport.currentTime).toBe(0);
  });

  it("does nothing when going back at the very start of the first chapter", async () => {
    await openAt(2);
    const seeksBefore = transport.seeks.length;

    session.previousChapter();

    expect(transport.seeks).toHaveLength(seeksBefore);
    expect(transport.currentTime).toBe(2);
  });

  it("jumps to a chapter directly", async () => {
    await openAt(0);

    session.goToChapter(CHAPTERS[2]);

    expect(transport.currentTime).toBe(1200);
    expect(session.currentChapterIndex).toBe(2);
  });

  it("adds a bookmark at the live position", async () => {
    const book = await openAt(750.5);

    const result = await session.addBookmark("  Good part  ", "  remember this ");

    expect(result.ok).toBe(true);
    expect(store.bookmarksFor(book.id)).toMatchObject([
      {
        bookId: book.id,
        timestamp: 750.5,
        name: "Good part",
        note: "remember this",
        createdDate: "2024-06-01T12:00:00.000Z"
      }
    ]);
    expect(session.bookmarks).toHaveLength(1);
  });

  it("stores a blank note as null", async () => {
    const book = await openAt(10);

    await session.addBookmark("Mark", "   ");

    expect(store.bookmarksFor(book.id)[0].note).toBeNull();
  });

  it("rejects a bookmark with an empty name", async () => {
    const book = await openAt(10);

    const result = await session.addBookmark("   ");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("VALIDATION");
      expect(result.error.message).toBe("Bookmark name must not be empty");
    }
    expect(store.bookmarksFor(book.id)).toEqual([]);
  });

  it("rejects a bookmark while the live position is not a number", async () => {
    const book = await addBook({ hasChapters: false, playbackPosition: 1234 });
    await session.open(book.id);

    for (const time of [Number.NaN, Number.POSITIVE_INFINITY]) {
      transport.currentTime = time;
      const result = await session.addBookmark("Too early");
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("VALIDATION");
    }

    const reopened = await CatalogStore.open(store.filePath);
    expect(reopened.findAll()).toHaveLength(1);
    expect(reopened.findById(book.id)?.playbackPosition).toBe(1234);
    expect(reopened.bookmarksFor(book.id)).toEqual([]);
  });

  it("deletes and jumps to bookmarks", async () => {
    const book = await openAt(100);
    await session.addBookmark("First");
    transport.currentTime = 1300;
    await session.addBookmark("Second");
    const [first, second] = session.bookmarks;

    session.jumpToBookmark(first);
    expect(transport.currentTime).toBe(100);
    expect(session.currentChapterIndex).toBe(0);

    expect(await session.deleteBookmark(second.id)).toEqual({ ok: true, value: undefined });
    expect(store.bookmarksFor(book.id).map((b) => b.name)).toEqual(["First"]);
    expect(session.bookmarks.map((b) => b.name)).toEqual(["First"]);

    const again = await session.deleteBookmark(second.id);
    expect(again.ok).toBe(false);
    if (!again.ok) expect(again.error.code).toBe("NOT_FOUND");
  });

  it("records progress with the play date", async () => {
    const book = await openAt(0);

    const result = await session.recordProgress(1250);

    expect(result.ok).toBe(true);
    expect(store.findById(book.id)).toMatchObject({
      playbackPosition: 1250,
      lastPlayedDate: "2024-06-01T12:00:00.000Z",
      isCompleted: false
    });
    expect(session.currentChapterIndex).toBe(2);
  });

  it("clamps recorded progress to the duration and rejects non-finite times", async () => {
    const book = await openAt(0);

    await session.recordProgress(99999);
    expect(store.findById(book.id)?.playbackPosition).toBe(3600);

    await session.recordProgress(-5);
    expect(store.findById(book.id)?.playbackPosition).toBe(0);

    const bad = await session.recordProgress(Number.NaN);
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.code).toBe("VALIDATION");
  });

  it("uses the transport duration when the catalog has none", async () => {
    const book = await addBook({ hasChapters: false, duration: 0 });
    await session.open(book.id);
    transport.duration = 1000;

    await session.recordProgress(1500);

    expect(store.findById(book.id)?.playbackPosition).toBe(1000);
  });

  it("clears its state on close", async () => {
    await openAt(700);

    session.close();

    expect(session.currentBook).toBeNull();
    expect(session.chapters).toEqual([]);
    expect(session.currentChapterIndex).toBe(-1);
    const result = await session.recordProgress(10);
    expect(result.ok).toBe(false);
  });
});
