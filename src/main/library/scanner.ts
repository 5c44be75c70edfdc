import { listAudioFilesRecursive, type AudioFileEntry } from "@/src/main/library/listAudioFiles";
import type { ExtractedBook, MetadataExtractor } from "@/src/main/library/metadata";
import type { CatalogStore } from "@/src/main/persistence/catalogStore";
import { runPool } from "@/src/main/workers/extractionPool";
import { getConfig } from "@/src/main/config";
import { Logger } from "@/src/main/logging/logger";
import { FolderAccessError, OperationCancelledError, toLibraryError } from "@/src/shared/errors";
import type { Book } from "@/src/shared/models/audiobook";
import { failure, success, summarizeScan, type Outcome, type ScanResult } from "@/src/shared/models/results";

const logger = Logger.create("Library.Scanner");

export type ScanProgress =
  | { type: "scanned"; totalFiles: number; toExtract: number }
  | { type: "extracted"; filePath: string; countDone: number; toExtract: number }
  | { type: "done"; result: ScanResult };

export type ScanOptions = {
  signal?: AbortSignal;
  onProgress?: (event: ScanProgress) => void;
};

type PlannedScan = {
  added: AudioFileEntry[];
  updated: AudioFileEntry[];
  removed: Book[];
};

/** True when the file on disk is strictly newer than what the last scan saw. */
export function isModifiedSince(book: Book, mtimeMs: number): boolean {
  const stored = Date.parse(book.fileModDate);
  return !Number.isFinite(stored) || mtimeMs > stored;
}

export function planScan(onDisk: ReadonlyMap<string, AudioFileEntry>, catalog: readonly Book[]): PlannedScan {
  const byPath = new Map(catalog.map((b) => [b.filePath, b] as const));
  const plan: PlannedScan = { added: [], updated: [], removed: [] };

  for (const entry of onDisk.values()) {
    const book = byPath.get(entry.filePath);
    if (!book) plan.added.push(entry);
    else if (isModifiedSince(book, entry.mtimeMs)) plan.updated.push(entry);
  }
  for (const book of catalog) {
    if (!onDisk.has(book.filePath)) plan.removed.push(book);
  }
  return plan;
}

/**
 * Mirrors one folder tree into the catalog.
 *
 * The walk and the catalog are each read once per scan. Metadata extraction
 * runs on a bounded pool outside the catalog's write path; the resulting
 * creates, updates and deletes are then applied and saved as one commit.
 * Books whose file is gone are deleted outright, bookmarks included.
 */
export class LibraryScanner {
  private running: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: CatalogStore,
    private readonly extractor: MetadataExtractor,
    private readonly concurrency: number = getConfig().scanConcurrency
  ) {}

  /** Scans run one after another; a scan started later sees the earlier one's commit. */
  scan(folderPath: string, options: ScanOptions = {}): Promise<Outcome<ScanResult>> {
    const run = this.running.then(() =>
      this.runScan(folderPath, options).catch((err: unknown) => {
        logger.error("scan failed", { folderPath, err });
        return failure<ScanResult>(toLibraryError(err));
      })
    );
    this.running = run;
    return run;
  }

  private async runScan(folderPath: string, { signal, onProgress }: ScanOptions): Promise<Outcome<ScanResult>> {
    logger.info("scan start", { folderPath });

    let onDisk: Map<string, AudioFileEntry>;
    try {
      onDisk = await listAudioFilesRecursive(folderPath);
    } catch (err) {
      logger.error("cannot read library folder", { folderPath, err });
      return failure(new FolderAccessError(folderPath, { cause: err }));
    }

    const plan = planScan(onDisk, this.store.findAll());
    const toExtract = [...plan.added, ...plan.updated];
    onProgress?.({ type: "scanned", totalFiles: onDisk.size, toExtract: toExtract.length });

    const extracted = await runPool(toExtract, (entry) => this.extractor.extractAll(entry.filePath), {
      concurrency: this.concurrency,
      signal,
      onResult: (entry, _result, countDone) =>
        onProgress?.({ type: "extracted", filePath: entry.filePath, countDone, toExtract: toExtract.length })
    });
    if (signal?.aborted) return this.cancelled();

    const byPath = new Map<string, ExtractedBook>();
    toExtract.forEach((entry, idx) => {
      const result = extracted[idx];
      if (result) byPath.set(entry.filePath, result);
    });

    let result: ScanResult;
    try {
      result = await this.store.transact(async (tx) => {
        const counts = { added: 0, updated: 0, removed: 0 };
        for (const entry of toExtract) {
          const ex = byPath.get(entry.filePath);
          if (!ex) continue;
          const { created } = tx.upsert(entry.filePath, {
            ...ex.metadata,
            fileModDate: new Date(entry.mtimeMs).toISOString(),
            hasChapters: ex.chapters.length > 0
          });
          if (created) counts.added += 1;
          else counts.updated += 1;
        }
        for (const book of plan.removed) {
          if (tx.delete(book.id)) counts.removed += 1;
        }
        if (signal?.aborted) throw new OperationCancelledError("Library scan");
        await tx.save();
        return { ...counts, summary: summarizeScan(counts) };
      });
    } catch (err) {
      if (err instanceof OperationCancelledError) return this.cancelled();
      throw err;
    }

    logger.info("scan done", { folderPath, ...result });
    try {
      onProgress?.({ type: "done", result });
    } catch (err) {
      logger.warn("scan progress listener failed", { folderPath, err });
    }
    return success(result);
  }

  private cancelled(): Outcome<ScanResult> {
    logger.info("scan cancelled, catalog unchanged");
    return failure(new OperationCancelledError("Library scan"));
  }
}
