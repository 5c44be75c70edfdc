export type SortBy = "title" | "author" | "year" | "duration" | "recentlyPlayed" | "progress";

export type UserSettings = {
  /** Absolute path of the designated library folder. */
  libraryFolderPath: string | null;
  /** Opaque access grant for `libraryFolderPath`; refreshed when stale. */
  libraryFolderToken: string | null;
  /** Default sort mode for book lists. */
  sortBy: SortBy;
  /** Preferred presentation of book lists. */
  viewMode: "grid" | "bigGrid" | "list";
  /** Window used by the "Recently Added" smart collection. */
  recentlyAddedDays: number;
};

export const DEFAULT_USER_SETTINGS: UserSettings = {
  libraryFolderPath: null,
  libraryFolderToken: null,
  sortBy: "title",
  viewMode: "grid",
  recentlyAddedDays: 30
};
