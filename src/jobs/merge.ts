// Optional concatenation of a session's clips into one file.
import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { Session } from "@/jobs/session";
import { runCommand, tailLines, type CommandExecutor } from "@/system/shellCommand";
import makeDebug from "@/utils/debug";
import { formatError } from "@/utils/errors";

export const CONCAT_LIST_NAME = "concat.txt";
export const MERGED_FILE_NAME = "final_merged.mp4";

export type MergeResult = {
  ok: boolean;
  outputPath: string;
  message: string;
};

export type MergeOptions = {
  ffmpegPath?: string;
  execute?: CommandExecutor;
  writeText?: (filePath: string, contents: string) => Promise<void>;
};

const debug = makeDebug("jobs:merge");

// Concat demuxer entries, one per clip, ordered by file name.
export const buildConcatList = (clipPaths: readonly string[]) => {
  const sorted = [...clipPaths].sort((left, right) =>
    path.basename(left).localeCompare(path.basename(right))
  );
  return sorted
    .map((clipPath) => `file '${clipPath.replace(/'/g, "'\\''")}'\n`)
    .join("");
};

export const buildMergeArgs = (listPath: string, outputPath: string) => [
  "-y",
  "-hide_banner",
  "-f",
  "concat",
  "-safe",
  "0",
  "-i",
  listPath,
  "-c",
  "copy",
  outputPath
];

export const mergeClips = async (
  session: Pick<Session, "directory">,
  clipPaths: readonly string[],
  options: MergeOptions = {}
): Promise<MergeResult> => {
  const outputPath = path.join(session.directory, MERGED_FILE_NAME);
  if (clipPaths.length === 0) {
    return { ok: false, outputPath, message: "No rendered clips to merge." };
  }
  const execute = options.execute ?? runCommand;
  const writeText =
    options.writeText ?? ((filePath, contents) => writeFile(filePath, contents, "utf8"));
  const listPath = path.join(session.directory, CONCAT_LIST_NAME);

  try {
    await writeText(listPath, buildConcatList(clipPaths));
    const result = await execute(
      options.ffmpegPath ?? "ffmpeg",
      buildMergeArgs(listPath, outputPath)
    );
    if (result.code !== 0) {
      debug("merge failed: code=%s", result.code);
      return {
        ok: false,
        outputPath,
        message: `Merge failed (exit code ${result.code ?? "none"}):\n${tailLines(result.output, 20)}`
      };
    }
    return { ok: true, outputPath, message: `Merged ${clipPaths.length} clip(s) into ${outputPath}` };
  } catch (error) {
    debug("merge could not run: %O", error);
    return { ok: false, outputPath, message: `Merge failed: ${formatError(error)}` };
  }
};
