/** Lower-case extensions (with dot) of files the library picks up. */
export const AUDIO_FILE_EXTENSIONS: ReadonlySet<string> = new Set([".m4b", ".m4a", ".mp3"]);
