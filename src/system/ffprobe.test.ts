import { describe, expect, it, vi } from "vitest";
import { parseDuration, probeDuration } from "@/system/ffprobe";
import type { CommandExecutor, CommandResult } from "@/system/shellCommand";

const result = (overrides: Partial<CommandResult> = {}): CommandResult => ({
  code: 0,
  signal: null,
  output: "",
  timedOut: false,
  aborted: false,
  ...overrides
});

describe("parseDuration", () => {
  it("reads the first non-empty line", () => {
    expect(parseDuration("\n 12.5\n")).toBe(12.5);
  });

  it("rejects values that are not positive numbers", () => {
    expect(parseDuration("N/A")).toBeUndefined();
    expect(parseDuration("0")).toBeUndefined();
    expect(parseDuration("")).toBeUndefined();
  });
});

describe("probeDuration", () => {
  it("asks ffprobe for the container duration", async () => {
    const execute = vi.fn<CommandExecutor>(async () => result({ output: "42.000000\n" }));

    const duration = await probeDuration(' "/in/bg.mp4" ', {
      ffprobePath: "/opt/ffprobe",
      execute,
      timeoutMs: 500
    });

    expect(duration).toBe(42);
    expect(execute).toHaveBeenCalledWith(
      "/opt/ffprobe",
      ["-v", "error", "-show_entries", "format=duration", "-of", "csv=p=0", "--", "/in/bg.mp4"],
      { timeoutMs: 500 }
    );
  });

  it("returns undefined when ffprobe fails or cannot run", async () => {
    expect(
      await probeDuration("/in/bg.mp4", {
        execute: async () => result({ code: 1, output: "No such file" })
      })
    ).toBeUndefined();
    expect(
      await probeDuration("/in/bg.mp4", {
        execute: async () => {
          throw new Error("spawn ffprobe ENOENT");
        }
      })
    ).toBeUndefined();
  });

  it("does not run anything for an empty path", async () => {
    const execute = vi.fn<CommandExecutor>();
    expect(await probeDuration("  ", { execute })).toBeUndefined();
    expect(execute).not.toHaveBeenCalled();
  });
});
