import path from "path";
import { getConfig } from "@/src/main/config";

export const CATALOG_FILE = "catalog.json";
export const SETTINGS_FILE = "settings.json";

export function getUserDataFilePath(fileName: string, dataDir: string = getConfig().dataDir) {
  return path.join(dataDir, fileName);
}
