// Runs one render job as a single ffmpeg process and reports a structured outcome.
import { writeFile } from "node:fs/promises";
import { buildRenderArgs, formatSeconds } from "@/jobs/ffmpegArgs";
import {
  FAILURE_MARK,
  SUCCESS_MARK,
  clipNameOf,
  createOutcome,
  type JobOutcome,
  type JobStatus,
  type RenderJob
} from "@/jobs/types";
import {
  formatCommandLine,
  runCommand,
  tailLines,
  type CommandExecutor,
  type CommandResult
} from "@/system/shellCommand";
import makeDebug, { type Logger } from "@/utils/debug";
import { formatError } from "@/utils/errors";

export type JobRunner = (job: RenderJob, signal?: AbortSignal) => Promise<JobOutcome>;

export type JobRunnerOptions = {
  ffmpegPath?: string;
  // Timeout is clipLength * timeoutFactor seconds.
  timeoutFactor?: number;
  execute?: CommandExecutor;
  log?: Logger;
  now?: () => Date;
  writeLog?: (path: string, contents: string) => Promise<void>;
};

export const DEFAULT_TIMEOUT_FACTOR = 20;
export const FAILURE_TAIL_LINES = 20;

const defaultWriteLog = (path: string, contents: string) =>
  writeFile(path, contents, "utf8");

export const resolveTimeoutMs = (clipLength: number, factor = DEFAULT_TIMEOUT_FACTOR) =>
  Math.max(1, Math.round(clipLength * factor * 1000));

type RunVerdict = {
  status: JobStatus;
  message: string;
  exitCode?: number | null;
};

const withLogRef = (text: string, logPath?: string) =>
  logPath ? `${text} (log: ${logPath})` : text;

const judge = (
  job: RenderJob,
  result: CommandResult,
  timeoutMs: number
): RunVerdict => {
  const name = clipNameOf(job);
  if (result.aborted) {
    return {
      status: "canceled",
      message: `${FAILURE_MARK} ${name} (canceled)`,
      exitCode: result.code
    };
  }
  if (result.timedOut) {
    return {
      status: "timeout",
      message: withLogRef(
        `${FAILURE_MARK} ${name} (timeout after ${formatSeconds(timeoutMs / 1000)}s)`,
        job.logPath
      ),
      exitCode: result.code
    };
  }
  if (result.code !== 0) {
    const reason =
      result.code === null ? `signal ${result.signal ?? "unknown"}` : `exit code ${result.code}`;
    const tail = tailLines(result.output, FAILURE_TAIL_LINES);
    const head = withLogRef(`${FAILURE_MARK} ${name} failed (${reason})`, job.logPath);
    return {
      status: "failed",
      message: tail ? `${head}. Last lines:\n${tail}` : head,
      exitCode: result.code
    };
  }
  return {
    status: "succeeded",
    message: withLogRef(`${SUCCESS_MARK} ${name} rendered`, job.logPath),
    exitCode: result.code
  };
};

export const formatJobLog = (entry: {
  commandLine: string;
  startedAt: Date;
  finishedAt: Date;
  output: string;
  exitCode: number | null | undefined;
  note?: string;
}) => {
  const lines = [
    "COMMAND:",
    entry.commandLine,
    "",
    `Started: ${entry.startedAt.toISOString()}`,
    "",
    entry.output.replace(/\s+$/, ""),
    "",
    `Finished: ${entry.finishedAt.toISOString()}`,
    `Return code: ${entry.exitCode ?? "none"}`
  ];
  if (entry.note) {
    lines.push(entry.note);
  }
  return `${lines.join("\n")}\n`;
};

// The returned runner never rejects: every failure becomes a failed outcome.
export const createJobRunner = (options: JobRunnerOptions = {}): JobRunner => {
  const ffmpegPath = options.ffmpegPath ?? "ffmpeg";
  const timeoutFactor = options.timeoutFactor ?? DEFAULT_TIMEOUT_FACTOR;
  const execute = options.execute ?? runCommand;
  const log = options.log ?? makeDebug("jobs:runner");
  const now = options.now ?? (() => new Date());
  const writeLog = options.writeLog ?? defaultWriteLog;

  return async (job, signal) => {
    const name = clipNameOf(job);
    const startedAt = now();
    const startedMs = Date.now();
    const timeoutMs = resolveTimeoutMs(job.clipLength, timeoutFactor);
    let verdict: RunVerdict;
    let output = "";
    let note: string | undefined;
    let commandLine = "";

    try {
      const args = buildRenderArgs(job);
      commandLine = formatCommandLine(ffmpegPath, args);
      log("render start: %s", name);
      const result = await execute(ffmpegPath, args, { timeoutMs, signal });
      output = result.output;
      verdict = judge(job, result, timeoutMs);
      if (verdict.status === "timeout") {
        note = `Timed out after ${timeoutMs}ms`;
      }
    } catch (error) {
      const reason = formatError(error);
      log("render error: %s %O", name, error);
      verdict = {
        status: "error",
        message: `${FAILURE_MARK} ${name} failed to run ffmpeg: ${reason}`
      };
      note = `Error: ${reason}`;
    }

    let message = verdict.message;
    if (job.logPath) {
      try {
        await writeLog(
          job.logPath,
          formatJobLog({
            commandLine,
            startedAt,
            finishedAt: now(),
            output,
            exitCode: verdict.exitCode,
            note
          })
        );
      } catch (error) {
        log("log write failed for %s: %O", name, error);
        message = `${message} [log write failed: ${formatError(error)}]`;
      }
    }

    log("render %s: %s", verdict.status, name);
    return createOutcome(job, verdict.status, message, {
      exitCode: verdict.exitCode,
      durationMs: Date.now() - startedMs
    });
  };
};
