export type LibraryErrorCode =
  | "FOLDER_ACCESS"
  | "BACKUP_FORMAT"
  | "COMMIT_FAILED"
  | "CANCELLED"
  | "VALIDATION"
  | "NOT_FOUND"
  | "INTERNAL";

/**
 * Base class for every failure a public library operation reports.
 * Callers switch on `code`; `message` is meant for display.
 */
export class LibraryError extends Error {
  readonly code: LibraryErrorCode;

  constructor(code: LibraryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The library folder is missing, unreadable, or was never selected. */
export class FolderAccessError extends LibraryError {
  readonly folderPath: string | null;

  constructor(folderPath: string | null, options?: { cause?: unknown }) {
    super("FOLDER_ACCESS", folderPath ? `No folder access: ${folderPath}` : "No library folder selected", options);
    this.folderPath = folderPath;
  }
}

export class BackupFormatError extends LibraryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKUP_FORMAT", message, options);
  }
}

export class CatalogCommitError extends LibraryError {
  constructor(options?: { cause?: unknown }) {
    super("COMMIT_FAILED", `Failed to save library: ${describeError(options?.cause)}`, options);
  }
}

export class OperationCancelledError extends LibraryError {
  constructor(operation: string) {
    super("CANCELLED", `${operation} was cancelled`);
  }
}

export class ValidationError extends LibraryError {
  constructor(message: string) {
    super("VALIDATION", message);
  }
}

export class NotFoundError extends LibraryError {
  constructor(what: string) {
    super("NOT_FOUND", `${what} not found`);
  }
}

/** Anything thrown that is not one of the failures above. */
export class UnexpectedError extends LibraryError {
  constructor(options?: { cause?: unknown }) {
    super("INTERNAL", describeError(options?.cause), options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "Unknown error");
}

/** Wraps anything thrown into a LibraryError, keeping typed errors as they are. */
export function toLibraryError(err: unknown): LibraryError {
  if (err instanceof LibraryError) return err;
  return new UnexpectedError({ cause: err });
}
