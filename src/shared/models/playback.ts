/**
 * Read/write contract of the external audio engine.
 *
 * The engine itself (decode, output, buffering) lives outside this package;
 * a playback session only reads its clock and asks it to seek.
 */
export type PlaybackTransport = {
  /** Live position in seconds */
  readonly currentTime: number;
  /** Seconds, 0 when not yet known */
  readonly duration: number;
  /** Playback speed multiplier */
  rate: number;
  seek(seconds: number): void;
};

export type PlaybackState = {
  isPlaying: boolean;
  rate: number;
  /** Index into the open book's chapter list, -1 when it has none */
  chapterIndex: number;
  /** Seconds into the book */
  position: number;
};
