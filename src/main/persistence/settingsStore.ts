import { z } from "zod";
import { readJsonFile, writeJsonFile } from "@/src/main/persistence/jsonStore";
import { getUserDataFilePath, SETTINGS_FILE } from "@/src/main/persistence/paths";
import { Logger } from "@/src/main/logging/logger";
import type { UserSettings } from "@/src/shared/models/userSettings";
import { DEFAULT_USER_SETTINGS } from "@/src/shared/models/userSettings";

const logger = Logger.create("Persistence.Settings");

// Every field is optional and falls back on its own, so adding a setting never invalidates an existing file.
const StoredSettingsSchema = z.object({
  libraryFolderPath: z.string().min(1).nullable().optional().catch(undefined),
  libraryFolderToken: z.string().min(1).nullable().optional().catch(undefined),
  sortBy: z
    .enum(["title", "author", "year", "duration", "recentlyPlayed", "progress"])
    .optional()
    .catch(undefined),
  viewMode: z.enum(["grid", "bigGrid", "list"]).optional().catch(undefined),
  recentlyAddedDays: z.number().int().positive().optional().catch(undefined)
});

export async function loadSettings(dataDir?: string): Promise<UserSettings> {
  const filePath = getUserDataFilePath(SETTINGS_FILE, dataDir);
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath, {});
  } catch (err) {
    logger.warn("unreadable settings file, using defaults", { filePath, err });
    return { ...DEFAULT_USER_SETTINGS };
  }
  const parsed = StoredSettingsSchema.safeParse(raw);
  if (!parsed.success) return { ...DEFAULT_USER_SETTINGS };
  const stored = parsed.data;
  return {
    libraryFolderPath: stored.libraryFolderPath ?? DEFAULT_USER_SETTINGS.libraryFolderPath,
    libraryFolderToken: stored.libraryFolderToken ?? DEFAULT_USER_SETTINGS.libraryFolderToken,
    sortBy: stored.sortBy ?? DEFAULT_USER_SETTINGS.sortBy,
    viewMode: stored.viewMode ?? DEFAULT_USER_SETTINGS.viewMode,
    recentlyAddedDays: stored.recentlyAddedDays ?? DEFAULT_USER_SETTINGS.recentlyAddedDays
  };
}

export async function saveSettings(settings: UserSettings, dataDir?: string): Promise<void> {
  await writeJsonFile(getUserDataFilePath(SETTINGS_FILE, dataDir), settings);
}
