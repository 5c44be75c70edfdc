import path from "path";
import { isAfter, subDays } from "date-fns";
import type { Book } from "@/src/shared/models/audiobook";
import type { SortBy } from "@/src/shared/models/userSettings";

export type SmartCollection = "recentlyAdded" | "shortBooks" | "longBooks" | "notStarted" | "nearlyFinished";

export const SMART_COLLECTIONS: Record<SmartCollection, { label: string }> = {
  recentlyAdded: { label: "Recently Added" },
  shortBooks: { label: "Short Books" },
  longBooks: { label: "Long Books" },
  notStarted: { label: "Not Started" },
  nearlyFinished: { label: "Nearly Finished" }
};

export type LibraryCategory =
  | { kind: "all" }
  | { kind: "inProgress" }
  | { kind: "completed" }
  | { kind: "smart"; collection: SmartCollection }
  | { kind: "author"; name: string }
  | { kind: "genre"; name: string }
  | { kind: "year"; year: number };

export type LibraryQuery = {
  category?: LibraryCategory;
  search?: string;
  sortBy?: SortBy;
  /** Window for "Recently Added" */
  recentlyAddedDays?: number;
  now?: Date;
};

const HOUR = 3600;

export function displayTitle(book: Book): string {
  return book.title?.trim() || path.basename(book.filePath, path.extname(book.filePath));
}

export function displayAuthor(book: Book): string {
  return book.author?.trim() || "Unknown Author";
}

/** Fraction listened, 0..1; 0 when the duration is unknown. */
export function progressOf(book: Book): number {
  if (!book.duration || book.duration <= 0) return 0;
  return Math.max(0, Math.min(1, book.playbackPosition / book.duration));
}

export function isInProgress(book: Book): boolean {
  return book.playbackPosition > 0 && !book.isCompleted;
}

export function matchesSmartCollection(
  collection: SmartCollection,
  book: Book,
  now: Date = new Date(),
  recentlyAddedDays = 30
): boolean {
  switch (collection) {
    case "recentlyAdded": {
      const mod = new Date(book.fileModDate);
      return !Number.isNaN(mod.getTime()) && isAfter(mod, subDays(now, recentlyAddedDays));
    }
    case "shortBooks":
      return book.duration > 0 && book.duration < 4 * HOUR;
    case "longBooks":
      return book.duration > 10 * HOUR;
    case "notStarted":
      return book.playbackPosition === 0 && !book.isCompleted;
    case "nearlyFinished":
      return progressOf(book) > 0.85 && !book.isCompleted && book.duration > 0;
  }
}

function matchesCategory(book: Book, category: LibraryCategory, now: Date, recentlyAddedDays: number) {
  switch (category.kind) {
    case "all":
      return true;
    case "inProgress":
      return isInProgress(book);
    case "completed":
      return book.isCompleted;
    case "smart":
      return matchesSmartCollection(category.collection, book, now, recentlyAddedDays);
    case "author":
      return book.author === category.name;
    case "genre":
      return book.genre === category.name;
    case "year":
      return book.year === category.year;
  }
}

function matchesSearch(book: Book, query: string) {
  return [book.title, book.author, book.genre].some((field) => field?.toLowerCase().includes(query));
}

export function sortBooks(books: readonly Book[], sortBy: SortBy): Book[] {
  const arr = [...books];
  const lower = (s: string) => s.toLowerCase();
  const played = (b: Book) => (b.lastPlayedDate ? new Date(b.lastPlayedDate).getTime() || 0 : 0);

  arr.sort((a, b) => {
    if (sortBy === "title") {
      return lower(displayTitle(a)).localeCompare(lower(displayTitle(b)), undefined, { numeric: true });
    }
    if (sortBy === "author") {
      return (
        lower(displayAuthor(a)).localeCompare(lower(displayAuthor(b))) ||
        lower(displayTitle(a)).localeCompare(lower(displayTitle(b)))
      );
    }
    if (sortBy === "year") {
      return (b.year ?? 0) - (a.year ?? 0);
    }
    if (sortBy === "duration") {
      return a.duration - b.duration;
    }
    if (sortBy === "recentlyPlayed") {
      return played(b) - played(a);
    }
    // progress
    return progressOf(b) - progressOf(a);
  });

  return arr;
}

/** Category filter, then search, then sort. */
export function queryBooks(books: readonly Book[], query: LibraryQuery = {}): Book[] {
  const now = query.now ?? new Date();
  const days = query.recentlyAddedDays ?? 30;
  const category = query.category ?? { kind: "all" };
  const search = query.search?.trim().toLowerCase() ?? "";

  const filtered = books.filter(
    (b) => matchesCategory(b, category, now, days) && (!search || matchesSearch(b, search))
  );
  return sortBooks(filtered, query.sortBy ?? "title");
}

export type LibraryGroupings = {
  authors: string[];
  genres: string[];
  /** Newest first */
  years: number[];
};

export function groupings(books: readonly Book[]): LibraryGroupings {
  const nonEmpty = (values: Array<string | undefined>) =>
    Array.from(new Set(values.filter((v): v is string => !!v && v.length > 0))).sort((a, b) => a.localeCompare(b));
  return {
    authors: nonEmpty(books.map((b) => b.author)),
    genres: nonEmpty(books.map((b) => b.genre)),
    years: Array.from(new Set(books.map((b) => b.year ?? 0).filter((y) => y > 0))).sort((a, b) => b - a)
  };
}
