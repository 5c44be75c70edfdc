export const BACKUP_FORMAT_VERSION = "1.0";

export type BackupBookmark = {
  timestamp: number;
  name: string;
  note: string | null;
  createdDate: string; // ISO
};

export type BackupBook = {
  /** Match key against the catalog on import */
  filePath: string;
  playbackPosition: number;
  lastPlayedDate: string | null; // ISO
  isCompleted: boolean;
  bookmarks: BackupBookmark[];
};

/** Portable progress + bookmark document (JSON, UTF-8). */
export type BackupDocument = {
  exportDate: string; // ISO
  version: string;
  books: BackupBook[];
};
