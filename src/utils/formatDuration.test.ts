// Tests for the compact duration label.
import { describe, expect, it } from "vitest";
import formatDuration from "@/utils/formatDuration";

describe("formatDuration", () => {
  it("renders zero and invalid values as 0s", () => {
    expect(formatDuration(0)).toBe("0s");
    expect(formatDuration(-4)).toBe("0s");
    expect(formatDuration(undefined)).toBe("0s");
    expect(formatDuration(Number.NaN)).toBe("0s");
  });

  it("omits empty units", () => {
    expect(formatDuration(150)).toBe("2m 30s");
    expect(formatDuration(3600)).toBe("1h");
    expect(formatDuration(3725.9)).toBe("1h 2m 5s");
  });

  it("keeps seconds for short values", () => {
    expect(formatDuration(9.4)).toBe("9s");
  });
});
