import { describe, expect, it, vi } from "vitest";
import { buildConcatList, buildMergeArgs, mergeClips } from "@/jobs/merge";
import type { CommandExecutor } from "@/system/shellCommand";

const session = { directory: "/out/s" };

describe("buildConcatList", () => {
  it("orders entries by file name and escapes quotes", () => {
    expect(buildConcatList(["/out/s/clip_002_4s.mp4", "/out/it's/clip_001_4s.mp4"])).toBe(
      "file '/out/it'\\''s/clip_001_4s.mp4'\nfile '/out/s/clip_002_4s.mp4'\n"
    );
  });
});

describe("mergeClips", () => {
  it("writes the list and stream-copies into one file", async () => {
    const writeText = vi.fn(async () => undefined);
    const execute = vi.fn<CommandExecutor>(async () => ({
      code: 0,
      signal: null,
      output: "",
      timedOut: false,
      aborted: false
    }));

    const merged = await mergeClips(session, ["/out/s/clip_001_4s.mp4"], {
      ffmpegPath: "/opt/ffmpeg",
      execute,
      writeText
    });

    expect(merged).toEqual({
      ok: true,
      outputPath: "/out/s/final_merged.mp4",
      message: "Merged 1 clip(s) into /out/s/final_merged.mp4"
    });
    expect(writeText).toHaveBeenCalledWith("/out/s/concat.txt", "file '/out/s/clip_001_4s.mp4'\n");
    expect(execute).toHaveBeenCalledWith(
      "/opt/ffmpeg",
      buildMergeArgs("/out/s/concat.txt", "/out/s/final_merged.mp4")
    );
  });

  it("refuses to merge nothing", async () => {
    const execute = vi.fn<CommandExecutor>();
    const merged = await mergeClips(session, [], { execute });
    expect(merged.ok).toBe(false);
    expect(merged.message).toBe("No rendered clips to merge.");
    expect(execute).not.toHaveBeenCalled();
  });

  it("reports the tail of ffmpeg output on failure", async () => {
    const merged = await mergeClips(session, ["/out/s/clip_001_4s.mp4"], {
      writeText: async () => undefined,
      execute: async () => ({
        code: 1,
        signal: null,
        output: "first\n\nInvalid data found\n",
        timedOut: false,
        aborted: false
      })
    });
    expect(merged.ok).toBe(false);
    expect(merged.message).toBe("Merge failed (exit code 1):\nfirst\nInvalid data found");
  });

  it("reports a list write error", async () => {
    const merged = await mergeClips(session, ["/out/s/clip_001_4s.mp4"], {
      writeText: async () => {
        throw new Error("read-only file system");
      },
      execute: vi.fn<CommandExecutor>()
    });
    expect(merged.message).toBe("Merge failed: read-only file system");
  });
});
