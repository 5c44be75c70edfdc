import { describe, expect, it } from "vitest";
import {
  displayAuthor,
  displayTitle,
  groupings,
  isInProgress,
  matchesSmartCollection,
  progressOf,
  queryBooks,
  sortBooks
} from "@/src/shared/library/bookQueries";
import { makeBook } from "@/tests/helpers/fixtures";

const NOW = new Date("2024-06-01T00:00:00.000Z");

const a = makeBook({
  id: "a",
  filePath: "/library/a.m4b",
  title: "Book 10",
  author: "Zed",
  genre: "Fiction",
  year: 2001,
  duration: 3000,
  fileModDate: "2024-05-25T00:00:00.000Z"
});
const b = makeBook({
  id: "b",
  filePath: "/library/b.m4b",
  title: "Book 2",
  author: "Amy",
  genre: "History",
  year: 2015,
  duration: 40000,
  playbackPosition: 36000,
  lastPlayedDate: "2024-05-30T00:00:00.000Z"
});
const c = makeBook({
  id: "c",
  filePath: "/library/zebra tales.mp3",
  duration: 20000,
  isCompleted: true,
  fileModDate: "2023-01-01T00:00:00.000Z",
  lastPlayedDate: "2024-05-01T00:00:00.000Z"
});
const d = makeBook({
  id: "d",
  filePath: "/library/d.m4b",
  title: "apple",
  author: "Amy",
  genre: "Fiction",
  year: 2015,
  duration: 10000,
  playbackPosition: 1000
});
const BOOKS = [a, b, c, d];

const ids = (books: { id: string }[]) => books.map((x) => x.id);

describe("display helpers", () => {
  it("falls back to the file name and a placeholder author", () => {
    expect(displayTitle(c)).toBe("zebra tales");
    expect(displayTitle(makeBook({ title: "   " }))).toBe("book");
    expect(displayAuthor(c)).toBe("Unknown Author");
    expect(displayAuthor(a)).toBe("Zed");
  });

  it("derives progress and in-progress state", () => {
    expect(progressOf(b)).toBe(0.9);
    expect(progressOf(makeBook({ duration: 0, playbackPosition: 10 }))).toBe(0);
    expect(progressOf(makeBook({ duration: 100, playbackPosition: 250 }))).toBe(1);
    expect(isInProgress(d)).toBe(true);
    expect(isInProgress(a)).toBe(false);
    expect(isInProgress(makeBook({ playbackPosition: 5, isCompleted: true }))).toBe(false);
  });
});

describe("sortBooks", () => {
  it.each([
    ["title", ["d", "b", "a", "c"]],
    ["author", ["d", "b", "c", "a"]],
    ["year", ["b", "d", "a", "c"]],
    ["duration", ["a", "d", "c", "b"]],
    ["recentlyPlayed", ["b", "c", "a", "d"]],
    ["progress", ["b", "d", "a", "c"]]
  ] as const)("sorts by %s", (sortBy, expected) => {
    expect(ids(sortBooks(BOOKS, sortBy))).toEqual(expected);
  });

  it("does not mutate its input", () => {
    const input = [...BOOKS];
    sortBooks(input, "duration");
    expect(ids(input)).toEqual(["a", "b", "c", "d"]);
  });
});

describe("smart collections", () => {
  it.each([
    ["recentlyAdded", ["a"]],
    ["shortBooks", ["a", "d"]],
    ["longBooks", ["b"]],
    ["notStarted", ["a"]],
    ["nearlyFinished", ["b"]]
  ] as const)("%s", (collection, expected) => {
    expect(ids(BOOKS.filter((book) => matchesSmartCollection(collection, book, NOW)))).toEqual(expected);
  });

  it("respects the recently-added window", () => {
    expect(matchesSmartCollection("recentlyAdded", a, NOW, 3)).toBe(false);
    expect(matchesSmartCollection("recentlyAdded", makeBook({ fileModDate: "garbage" }), NOW)).toBe(false);
  });
});

describe("queryBooks", () => {
  it("filters by category", () => {
    expect(ids(queryBooks(BOOKS, { category: { kind: "all" } }))).toEqual(["d", "b", "a", "c"]);
    expect(ids(queryBooks(BOOKS, { category: { kind: "inProgress" } }))).toEqual(["d", "b"]);
    expect(ids(queryBooks(BOOKS, { category: { kind: "completed" } }))).toEqual(["c"]);
    expect(ids(queryBooks(BOOKS, { category: { kind: "author", name: "Amy" } }))).toEqual(["d", "b"]);
    expect(ids(queryBooks(BOOKS, { category: { kind: "genre", name: "Fiction" } }))).toEqual(["d", "a"]);
    expect(ids(queryBooks(BOOKS, { category: { kind: "year", year: 2015 } }))).toEqual(["d", "b"]);
    expect(
      ids(queryBooks(BOOKS, { category: { kind: "smart", collection: "recentlyAdded" }, now: NOW }))
    ).toEqual(["a"]);
  });

  it("searches title, author and genre case-insensitively", () => {
    expect(ids(queryBooks(BOOKS, { search: "amy" }))).toEqual(["d", "b"]);
    expect(ids(queryBooks(BOOKS, { search: "  BOOK " }))).toEqual(["b", "a"]);
    expect(ids(queryBooks(BOOKS, { search: "history" }))).toEqual(["b"]);
  });

  it("applies the category before the search", () => {
    expect(ids(queryBooks(BOOKS, { category: { kind: "inProgress" }, search: "apple" }))).toEqual(["d"]);
    expect(ids(queryBooks(BOOKS, { category: { kind: "completed" }, search: "apple" }))).toEqual([]);
  });

  it("honours an explicit sort", () => {
    expect(ids(queryBooks(BOOKS, { sortBy: "duration" }))).toEqual(["a", "d", "c", "b"]);
  });
});

describe("groupings", () => {
  it("lists distinct authors, genres and years", () => {
    expect(groupings(BOOKS)).toEqual({
      authors: ["Amy", "Zed"],
      genres: ["Fiction", "History"],
      years: [2015, 2001]
    });
  });
});
