// Plain-text session report written next to the rendered clips.
import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { RenderSettings } from "@/config/settings";
import { formatSeconds } from "@/jobs/ffmpegArgs";
import type { Session } from "@/jobs/session";
import type { JobOutcome } from "@/jobs/types";
import { fileNameOf } from "@/system/path";
import makeDebug, { type Logger } from "@/utils/debug";

export const SUMMARY_FILE_NAME = "summary.txt";

const RULE = "=".repeat(50);
const THIN_RULE = "-".repeat(50);

const pad = (value: number) => String(value).padStart(2, "0");

export const formatReportDate = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

// Paths are reduced to file names so the report can be shared.
export const redactSettings = (settings: RenderSettings): Array<[string, string]> => [
  ["Background", fileNameOf(settings.backgroundVideo)],
  ["Overlay", fileNameOf(settings.overlayVideo)],
  ["Music", fileNameOf(settings.musicFile)],
  ["Music start", `${formatSeconds(settings.musicStart)}s`],
  ["Audio mode", settings.audioMode],
  ["Clip length", `${formatSeconds(settings.clipLength)}s`],
  ["Number of clips", String(settings.clipCount)],
  ["Codec", settings.codec],
  ["Audio normalization", settings.normalizeAudio ? "yes" : "no"],
  ["Workers", String(settings.workers)],
  ["Output", fileNameOf(settings.outputDir)]
];

export const countSucceeded = (outcomes: readonly JobOutcome[]) =>
  outcomes.filter((outcome) => outcome.succeeded).length;

export const renderSummary = (
  session: Pick<Session, "id">,
  settings: RenderSettings,
  outcomes: readonly JobOutcome[],
  date: Date
) => {
  const lines = [
    "loopcut render session",
    RULE,
    "",
    `Session: ${session.id}`,
    `Date: ${formatReportDate(date)}`,
    "",
    "Settings:",
    THIN_RULE,
    ...redactSettings(settings).map(([label, value]) => `${label}: ${value}`),
    "",
    RULE,
    "Results:",
    THIN_RULE,
    "",
    `Success: ${countSucceeded(outcomes)}/${outcomes.length}`,
    "",
    ...outcomes.map((outcome) => outcome.message)
  ];
  return `${lines.join("\n")}\n`;
};

export type SummaryOptions = {
  now?: () => Date;
  log?: Logger;
  writeText?: (filePath: string, contents: string) => Promise<void>;
};

// Best effort: a failed write is logged and reported as null, never thrown.
export const writeSummary = async (
  session: Pick<Session, "id" | "directory">,
  settings: RenderSettings,
  outcomes: readonly JobOutcome[],
  options: SummaryOptions = {}
): Promise<string | null> => {
  const log = options.log ?? makeDebug("jobs:summary");
  const writeText =
    options.writeText ?? ((filePath, contents) => writeFile(filePath, contents, "utf8"));
  const summaryPath = path.join(session.directory, SUMMARY_FILE_NAME);
  const contents = renderSummary(
    session,
    settings,
    outcomes,
    (options.now ?? (() => new Date()))()
  );
  try {
    await writeText(summaryPath, contents);
    log("summary written to %s", summaryPath);
    return summaryPath;
  } catch (error) {
    log("summary write failed: %O", error);
    return null;
  }
};
