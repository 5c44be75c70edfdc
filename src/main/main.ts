import { parseArgs } from "util";
import { LibraryService } from "@/src/main/library/libraryService";
import { Logger } from "@/src/main/logging/logger";
import { displayAuthor, displayTitle, progressOf, type LibraryCategory } from "@/src/shared/library/bookQueries";
import { formatScrubberTime } from "@/src/shared/library/formatTime";
import { summarizeImport, type Outcome } from "@/src/shared/models/results";
import type { SortBy } from "@/src/shared/models/userSettings";

const logger = Logger.create("Main");

const USAGE = `Usage: audioshelf <command> [args]

Commands:
  folder <path>          Use <path> as the library folder and scan it
  scan                   Rescan the library folder
  list [--search q] [--sort title|author|year|duration|recentlyPlayed|progress]
       [--category all|inProgress|completed]
  export <file>          Write progress and bookmarks to <file>
  import <file>          Merge progress and bookmarks from <file>
  reset <bookId>         Clear a book's progress
  complete <bookId>      Mark a book as finished
  uncomplete <bookId>    Move a finished book back to the library`;

const SORTS: readonly SortBy[] = ["title", "author", "year", "duration", "recentlyPlayed", "progress"];

function isSortBy(value: string): value is SortBy {
  return SORTS.some((s) => s === value);
}

function parseCategory(value: string | undefined): LibraryCategory {
  if (value === "inProgress") return { kind: "inProgress" };
  if (value === "completed") return { kind: "completed" };
  return { kind: "all" };
}

function report<T>(outcome: Outcome<T>, onSuccess: (value: T) => string): number {
  if (outcome.ok) {
    console.log(onSuccess(outcome.value));
    return 0;
  }
  console.error(`${outcome.error.code}: ${outcome.error.message}`);
  return 1;
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) throw new Error(`Missing <${name}>\n\n${USAGE}`);
  return value;
}

async function run(library: LibraryService, argv: string[], signal: AbortSignal): Promise<number> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      search: { type: "string" },
      sort: { type: "string" },
      category: { type: "string" }
    }
  });
  const [command, arg] = positionals;

  switch (command) {
    case "folder":
      return report(await library.selectFolder(requireArg(arg, "path"), { signal }), (r) => r.summary);
    case "scan":
      return report(await library.scanLibrary({ signal }), (r) => r.summary);
    case "list": {
      await library.startFolderAccess();
      const sortBy = values.sort && isSortBy(values.sort) ? values.sort : undefined;
      const books = library.books({ search: values.search, sortBy, category: parseCategory(values.category) });
      for (const b of books) {
        const pct = Math.round(progressOf(b) * 100);
        console.log(
          `${b.id}  ${displayTitle(b)} - ${displayAuthor(b)}  ${formatScrubberTime(b.playbackPosition)} (${pct}%)${b.isCompleted ? " done" : ""}`
        );
      }
      return 0;
    }
    case "export":
      return report(await library.exportProgress(requireArg(arg, "file")), (r) => `Exported ${r.booksExported} book(s).`);
    case "import":
      return report(await library.importProgress(requireArg(arg, "file"), { signal }), summarizeImport);
    case "reset":
      return report(await library.resetProgress(requireArg(arg, "bookId")), (b) => `Reset ${displayTitle(b)}.`);
    case "complete":
      return report(await library.markCompleted(requireArg(arg, "bookId")), (b) => `Completed ${displayTitle(b)}.`);
    case "uncomplete":
      return report(await library.markNotCompleted(requireArg(arg, "bookId")), (b) => `Reopened ${displayTitle(b)}.`);
    default:
      console.log(USAGE);
      return command ? 1 : 0;
  }
}

async function bootstrap() {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const library = await LibraryService.create();
  try {
    process.exitCode = await run(library, process.argv.slice(2), controller.signal);
  } finally {
    library.shutdown();
  }
}

bootstrap().catch((err: unknown) => {
  logger.error("fatal error", { err });
  process.exitCode = 1;
});
