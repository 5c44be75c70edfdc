import type { Bookmark } from "@/src/shared/models/audiobook";

/** Scrubber-style time: `h:mm:ss` from one hour up, `m:ss` below. */
export function formatScrubberTime(seconds: number): string {
  const total = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const ss = String(s).padStart(2, "0");
  if (h > 0) return `${h}:${String(m).padStart(2, "0")}:${ss}`;
  return `${m}:${ss}`;
}

/** `1x`, `1.5x`, `0.75x` */
export function speedLabel(rate: number): string {
  if (Number.isInteger(rate)) return `${rate}x`;
  return `${Number(rate.toPrecision(2))}x`;
}

export function bookmarkDisplayName(bookmark: Pick<Bookmark, "name" | "timestamp">): string {
  if (bookmark.name) return bookmark.name;
  return `Bookmark at ${formatScrubberTime(bookmark.timestamp)}`;
}
