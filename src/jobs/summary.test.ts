import { describe, expect, it, vi } from "vitest";
import type { RenderSettings } from "@/config/settings";
import { formatReportDate, redactSettings, renderSummary, writeSummary } from "@/jobs/summary";
import { createOutcome } from "@/jobs/types";

const settings: RenderSettings = {
  backgroundVideo: "/media/in/bg.mp4",
  overlayVideo: "/media/in/loop.mov",
  musicFile: "/media/in/track.mp3",
  clipLength: 10,
  clipCount: 2,
  musicStart: 5,
  audioMode: "fixed",
  codec: "libx264",
  normalizeAudio: true,
  workers: 2,
  outputDir: "/media/out/"
};

const outcomes = [
  createOutcome({ index: 0 }, "succeeded", "✅ clip_001_10s.mp4 rendered"),
  createOutcome({ index: 1 }, "failed", "❌ clip_002_10s.mp4 failed (exit code 1)")
];

const reportDate = new Date(2026, 2, 1, 9, 5, 7);
const silent = () => undefined;

describe("formatReportDate", () => {
  it("prints local date and time", () => {
    expect(formatReportDate(reportDate)).toBe("2026-03-01 09:05:07");
  });
});

describe("redactSettings", () => {
  it("keeps file names only", () => {
    const values = Object.fromEntries(redactSettings(settings));
    expect(values.Background).toBe("bg.mp4");
    expect(values.Output).toBe("out");
  });
});

describe("renderSummary", () => {
  it("renders the settings and each outcome", () => {
    const expected = [
      "loopcut render session",
      "=".repeat(50),
      "",
      "Session: session_2026-03-01_09-05-07",
      "Date: 2026-03-01 09:05:07",
      "",
      "Settings:",
      "-".repeat(50),
      "Background: bg.mp4",
      "Overlay: loop.mov",
      "Music: track.mp3",
      "Music start: 5s",
      "Audio mode: fixed",
      "Clip length: 10s",
      "Number of clips: 2",
      "Codec: libx264",
      "Audio normalization: yes",
      "Workers: 2",
      "Output: out",
      "",
      "=".repeat(50),
      "Results:",
      "-".repeat(50),
      "",
      "Success: 1/2",
      "",
      "✅ clip_001_10s.mp4 rendered",
      "❌ clip_002_10s.mp4 failed (exit code 1)",
      ""
    ].join("\n");

    expect(
      renderSummary({ id: "session_2026-03-01_09-05-07" }, settings, outcomes, reportDate)
    ).toBe(expected);
  });

  it("only differs in the date line between runs", () => {
    const session = { id: "session_x" };
    const first = renderSummary(session, settings, outcomes, reportDate).split("\n");
    const second = renderSummary(session, settings, outcomes, new Date(2027, 0, 1)).split("\n");
    const differing = first.filter((line, index) => line !== second[index]);
    expect(differing).toEqual(["Date: 2026-03-01 09:05:07"]);
  });
});

describe("writeSummary", () => {
  it("writes summary.txt into the session folder", async () => {
    const writeText = vi.fn(async () => undefined);
    const summaryPath = await writeSummary(
      { id: "session_x", directory: "/out/session_x" },
      settings,
      outcomes,
      { now: () => reportDate, log: silent, writeText }
    );
    expect(summaryPath).toBe("/out/session_x/summary.txt");
    expect(writeText).toHaveBeenCalledWith(
      "/out/session_x/summary.txt",
      renderSummary({ id: "session_x" }, settings, outcomes, reportDate)
    );
  });

  it("returns null instead of throwing when the write fails", async () => {
    const summaryPath = await writeSummary(
      { id: "session_x", directory: "/out/session_x" },
      settings,
      outcomes,
      {
        now: () => reportDate,
        log: silent,
        writeText: async () => {
          throw new Error("disk full");
        }
      }
    );
    expect(summaryPath).toBeNull();
  });
});
