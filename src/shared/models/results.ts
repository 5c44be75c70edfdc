import type { LibraryError } from "@/src/shared/errors";

export type ScanResult = {
  added: number;
  updated: number;
  removed: number;
  /** One-line human-readable summary */
  summary: string;
};

export type ImportResult = {
  booksUpdated: number;
  bookmarksCreated: number;
  booksNotFound: number;
  /** Entries or bookmarks that failed validation and were skipped */
  entriesRejected: number;
};

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: LibraryError };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(error: LibraryError): Outcome<T> {
  return { ok: false, error };
}

export function summarizeScan(counts: { added: number; updated: number; removed: number }): string {
  if (counts.added === 0 && counts.updated === 0 && counts.removed === 0) {
    return "Library is up to date.";
  }
  return `Added ${counts.added}, updated ${counts.updated}, removed ${counts.removed} book(s).`;
}

export function summarizeImport(result: ImportResult): string {
  const lines = [`Updated ${result.booksUpdated} book(s).`];
  if (result.bookmarksCreated > 0) lines.push(`Imported ${result.bookmarksCreated} bookmark(s).`);
  if (result.booksNotFound > 0) lines.push(`Skipped ${result.booksNotFound} book(s) not in library.`);
  if (result.entriesRejected > 0) lines.push(`Ignored ${result.entriesRejected} malformed item(s).`);
  return lines.join("\n");
}
