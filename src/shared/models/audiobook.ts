export type BookId = string;
export type BookmarkId = string;

/**
 * One cataloged audio file.
 *
 * Metadata fields are owned by the library scanner; progress fields
 * (`playbackPosition`, `lastPlayedDate`, `isCompleted`) are only written by a
 * playback session, an explicit reset/complete action, or a backup import.
 */
export type Book = {
  id: BookId;
  /** Absolute path on disk; unique across the catalog */
  filePath: string;
  title?: string;
  author?: string;
  genre?: string;
  year?: number;
  /** Seconds, 0 when unknown */
  duration: number;
  /** File mtime observed at the last scan (ISO) */
  fileModDate: string;
  /** Seconds into the book */
  playbackPosition: number;
  lastPlayedDate: string | null; // ISO
  isCompleted: boolean;
  hasChapters: boolean;
};

export type Bookmark = {
  id: BookmarkId;
  /** Owning book */
  bookId: BookId;
  /** Seconds into the book */
  timestamp: number;
  name: string;
  note: string | null;
  createdDate: string; // ISO
};

/** Derived from the file on demand; never persisted. */
export type ChapterInfo = {
  title: string;
  startTime: number;
};

export type BookMetadata = {
  title?: string;
  author?: string;
  genre?: string;
  year?: number;
  duration: number;
};

/** Metadata fields the scanner may overwrite on an existing record. */
export type BookMetadataFields = BookMetadata & {
  fileModDate: string;
  hasChapters: boolean;
};
