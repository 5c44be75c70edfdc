import path from "path";
import { acquireFolderAccess, type FolderGrant } from "@/src/main/library/folderAccess";
import { MusicMetadataExtractor, type MetadataExtractor } from "@/src/main/library/metadata";
import { ProgressBackup } from "@/src/main/library/progressBackup";
import { LibraryScanner, type ScanOptions } from "@/src/main/library/scanner";
import { CatalogStore, type ProgressPatch } from "@/src/main/persistence/catalogStore";
import { CATALOG_FILE, getUserDataFilePath } from "@/src/main/persistence/paths";
import { loadSettings, saveSettings } from "@/src/main/persistence/settingsStore";
import { PlaybackSession, type PlaybackSessionOptions } from "@/src/main/playback/playbackSession";
import { getConfig } from "@/src/main/config";
import { Logger } from "@/src/main/logging/logger";
import { FolderAccessError, NotFoundError, toLibraryError } from "@/src/shared/errors";
import { groupings, queryBooks, type LibraryGroupings, type LibraryQuery } from "@/src/shared/library/bookQueries";
import type { Book, BookId } from "@/src/shared/models/audiobook";
import type { PlaybackTransport } from "@/src/shared/models/playback";
import { failure, success, type ImportResult, type Outcome, type ScanResult } from "@/src/shared/models/results";
import type { UserSettings } from "@/src/shared/models/userSettings";

const logger = Logger.create("Library.Service");

export type LibraryServiceOptions = {
  dataDir?: string;
  extractor?: MetadataExtractor;
  scanConcurrency?: number;
};

/**
 * Entry point for everything outside the core: folder lifecycle, scans,
 * library queries, book actions, backups and playback sessions.
 * Keep callers thin and delegate here.
 */
export class LibraryService {
  private grant: FolderGrant | null = null;

  private constructor(
    readonly store: CatalogStore,
    private settings: UserSettings,
    private readonly dataDir: string,
    private readonly extractor: MetadataExtractor,
    private readonly scanner: LibraryScanner,
    private readonly backup: ProgressBackup
  ) {}

  static async create(options: LibraryServiceOptions = {}): Promise<LibraryService> {
    const dataDir = options.dataDir ?? getConfig().dataDir;
    const store = await CatalogStore.open(getUserDataFilePath(CATALOG_FILE, dataDir));
    const settings = await loadSettings(dataDir);
    const extractor = options.extractor ?? new MusicMetadataExtractor();
    const scanner = new LibraryScanner(store, extractor, options.scanConcurrency ?? getConfig().scanConcurrency);
    return new LibraryService(store, settings, dataDir, extractor, scanner, new ProgressBackup(store));
  }

  get folderPath(): string | null {
    return this.settings.libraryFolderPath;
  }

  get hasFolderAccess(): boolean {
    return this.grant !== null && !this.grant.released;
  }

  get userSettings(): UserSettings {
    return { ...this.settings };
  }

  async updateSettings(patch: Partial<Pick<UserSettings, "sortBy" | "viewMode" | "recentlyAddedDays">>) {
    this.settings = { ...this.settings, ...patch };
    await saveSettings(this.settings, this.dataDir);
  }

  /**
   * (Re)acquires access to the designated folder, refreshing a stale token.
   * Failure leaves the service without access; queries then return no books.
   */
  async startFolderAccess(): Promise<Outcome<FolderGrant>> {
    this.stopFolderAccess();
    const acquired = await acquireFolderAccess(this.settings.libraryFolderPath, this.settings.libraryFolderToken);
    if (!acquired.ok) return acquired;

    this.grant = acquired.value;
    if (acquired.value.refreshed) {
      this.settings = { ...this.settings, libraryFolderToken: acquired.value.token };
      try {
        await saveSettings(this.settings, this.dataDir);
      } catch (err) {
        logger.warn("could not persist refreshed folder token", { err });
      }
    }
    return acquired;
  }

  stopFolderAccess() {
    this.grant?.release();
    this.grant = null;
  }

  /** Replaces the designated folder, then scans it. */
  async selectFolder(folderPath: string, options: ScanOptions = {}): Promise<Outcome<ScanResult>> {
    const resolved = path.resolve(folderPath);
    const previous = this.settings;
    this.settings = { ...this.settings, libraryFolderPath: resolved, libraryFolderToken: null };

    const access = await this.startFolderAccess();
    if (!access.ok) {
      this.settings = previous;
      if (previous.libraryFolderPath) await this.startFolderAccess();
      return access;
    }
    try {
      await saveSettings(this.settings, this.dataDir);
    } catch (err) {
      logger.error("could not persist library folder", { folderPath: resolved, err });
      return failure(toLibraryError(err));
    }
    return await this.scanLibrary(options);
  }

  async scanLibrary(options: ScanOptions = {}): Promise<Outcome<ScanResult>> {
    if (!this.hasFolderAccess) {
      const access = await this.startFolderAccess();
      if (!access.ok) return access;
    }
    const grant = this.grant;
    if (!grant) return failure(new FolderAccessError(this.settings.libraryFolderPath));
    const result = await this.scanner.scan(grant.folderPath, options);
    if (result.ok) logger.info(`Library scan: ${result.value.summary}`);
    return result;
  }

  /** Books visible to the caller; none while the folder is inaccessible. */
  books(query: LibraryQuery = {}): Book[] {
    if (!this.hasFolderAccess) return [];
    return queryBooks(this.store.findAll(), {
      sortBy: this.settings.sortBy,
      recentlyAddedDays: this.settings.recentlyAddedDays,
      ...query
    });
  }

  groupings(): LibraryGroupings {
    return groupings(this.books());
  }

  resetProgress(bookId: BookId): Promise<Outcome<Book>> {
    return this.patchProgress(bookId, { playbackPosition: 0, lastPlayedDate: null, isCompleted: false });
  }

  markCompleted(bookId: BookId): Promise<Outcome<Book>> {
    return this.patchProgress(bookId, { isCompleted: true, playbackPosition: 0 });
  }

  markNotCompleted(bookId: BookId): Promise<Outcome<Book>> {
    return this.patchProgress(bookId, { isCompleted: false });
  }

  exportProgress(filePath: string) {
    return this.backup.exportToFile(filePath);
  }

  importProgress(filePath: string, options: { signal?: AbortSignal } = {}): Promise<Outcome<ImportResult>> {
    return this.backup.importFromFile(filePath, options);
  }

  openSession(transport: PlaybackTransport, options?: PlaybackSessionOptions): PlaybackSession {
    return new PlaybackSession(this.store, this.extractor, transport, options);
  }

  /** Releases the folder grant; call on process shutdown. */
  shutdown() {
    this.stopFolderAccess();
  }

  private async patchProgress(bookId: BookId, patch: ProgressPatch): Promise<Outcome<Book>> {
    try {
      const updated = await this.store.transact(async (tx) => {
        const book = tx.updateProgress(bookId, patch);
        if (book) await tx.save();
        return book;
      });
      return updated ? success(updated) : failure(new NotFoundError("Book"));
    } catch (err) {
      logger.error("failed to update progress", { bookId, err });
      return failure(toLibraryError(err));
    }
  }
}
