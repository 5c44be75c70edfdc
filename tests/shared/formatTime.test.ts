import { describe, expect, it } from "vitest";
import { bookmarkDisplayName, formatScrubberTime, speedLabel } from "@/src/shared/library/formatTime";

describe("formatScrubberTime", () => {
  it("uses m:ss below one hour", () => {
    expect(formatScrubberTime(0)).toBe("0:00");
    expect(formatScrubberTime(59.9)).toBe("0:59");
    expect(formatScrubberTime(61)).toBe("1:01");
    expect(formatScrubberTime(3599)).toBe("59:59");
  });

  it("uses h:mm:ss from one hour up", () => {
    expect(formatScrubberTime(3600)).toBe("1:00:00");
    expect(formatScrubberTime(3725)).toBe("1:02:05");
    expect(formatScrubberTime(36000)).toBe("10:00:00");
  });

  it("shows zero for negative or non-finite input", () => {
    expect(formatScrubberTime(-3)).toBe("0:00");
    expect(formatScrubberTime(Number.NaN)).toBe("0:00");
    expect(formatScrubberTime(Number.POSITIVE_INFINITY)).toBe("0:00");
  });
});

describe("speedLabel", () => {
  it("drops trailing zeros", () => {
    expect(speedLabel(1)).toBe("1x");
    expect(speedLabel(2)).toBe("2x");
    expect(speedLabel(1.5)).toBe("1.5x");
    expect(speedLabel(0.75)).toBe("0.75x");
  });
});

describe("bookmarkDisplayName", () => {
  it("prefers the name and falls back to the time", () => {
    expect(bookmarkDisplayName({ name: "Good part", timestamp: 65 })).toBe("Good part");
    expect(bookmarkDisplayName({ name: "", timestamp: 65 })).toBe("Bookmark at 1:05");
  });
});
