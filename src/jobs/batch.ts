// Host-facing render flow: settings in, callbacks out. Everything that can
// stop the batch happens before the first job is dispatched.
import {
  parseRenderSettings,
  type RenderSettings,
  type RenderSettingsInput
} from "@/config/settings";
import { createJobRunner, type JobRunner } from "@/jobs/jobRunner";
import { planJobs, validateSettings, type MediaDurations } from "@/jobs/plan";
import {
  combineReporters,
  toPercentReporter,
  type PercentCallback,
  type ProgressReporter
} from "@/jobs/progress";
import { runJobs } from "@/jobs/scheduler";
import { createSession, type Session } from "@/jobs/session";
import { countSucceeded, writeSummary } from "@/jobs/summary";
import type { JobOutcome, RenderJob } from "@/jobs/types";
import { checkFfmpeg, type FfmpegStatus } from "@/system/ffmpeg";
import type { CommandExecutor } from "@/system/shellCommand";
import makeDebug, { type Logger } from "@/utils/debug";
import { formatError } from "@/utils/errors";

export type BatchCallbacks = {
  // (percent 0-100, message of the job that just finished)
  onProgress?: PercentCallback;
  // Raw per-job updates for hosts that draw their own progress.
  onUpdate?: ProgressReporter;
  onFinished?: (summaryMessage: string, outcomes: JobOutcome[]) => void;
  // Infrastructure failures that kept the batch from running at all.
  onError?: (message: string) => void;
};

export type BatchDeps = {
  ffmpegPath?: string;
  ffprobePath?: string;
  timeoutFactor?: number;
  execute?: CommandExecutor;
  runner?: JobRunner;
  checkTools?: () => Promise<FfmpegStatus>;
  durations?: MediaDurations;
  availableParallelism?: number;
  signal?: AbortSignal;
  now?: () => Date;
  log?: Logger;
};

export type BatchResult = {
  settings: RenderSettings;
  session: Session;
  jobs: RenderJob[];
  outcomes: JobOutcome[];
  summaryPath: string | null;
  succeeded: number;
  canceled: boolean;
};

export const formatFinishedMessage = (
  succeeded: number,
  total: number,
  directory: string,
  canceled = false
) => {
  const head = `Rendered ${succeeded}/${total} clips successfully!\n\nOutput: ${directory}`;
  return canceled ? `${head}\n\nBatch canceled before all clips finished.` : head;
};

export const runBatch = async (
  input: RenderSettingsInput,
  callbacks: BatchCallbacks = {},
  deps: BatchDeps = {}
): Promise<BatchResult | null> => {
  const log = deps.log ?? makeDebug("jobs:batch");
  // Components keep their own namespaces unless the caller injected a logger.
  const componentLog = deps.log;

  const fail = (message: string) => {
    log("batch not started: %s", message);
    callbacks.onError?.(message);
    return null;
  };

  const parsed = parseRenderSettings(input);
  if (!parsed.ok) {
    return fail(parsed.problems.join("\n"));
  }
  const { settings } = parsed;

  const problems = validateSettings(settings, deps.durations);
  if (problems.length > 0) {
    return fail(problems.join("\n"));
  }

  const checkTools =
    deps.checkTools ??
    (() =>
      checkFfmpeg({
        ffmpegPath: deps.ffmpegPath,
        ffprobePath: deps.ffprobePath,
        execute: deps.execute
      }));
  const status = await checkTools();
  if (status.state !== "ready") {
    return fail(status.details ? `${status.message} (${status.details})` : status.message);
  }

  let session: Session;
  try {
    session = await createSession(settings.outputDir, { now: deps.now, log: componentLog });
  } catch (error) {
    return fail(formatError(error));
  }

  const jobs = planJobs(settings, session);
  const runner =
    deps.runner ??
    createJobRunner({
      ffmpegPath: deps.ffmpegPath,
      timeoutFactor: deps.timeoutFactor,
      execute: deps.execute,
      now: deps.now,
      log: componentLog
    });

  const outcomes = await runJobs(jobs, {
    concurrency: settings.workers,
    runner,
    onProgress: combineReporters(
      callbacks.onProgress ? toPercentReporter(callbacks.onProgress) : undefined,
      callbacks.onUpdate
    ),
    signal: deps.signal,
    availableParallelism: deps.availableParallelism,
    log: componentLog
  });

  const summaryPath = await writeSummary(session, settings, outcomes, {
    now: deps.now,
    log: componentLog
  });
  const succeeded = countSucceeded(outcomes);
  const canceled = deps.signal?.aborted ?? false;
  callbacks.onFinished?.(
    formatFinishedMessage(succeeded, outcomes.length, session.directory, canceled),
    outcomes
  );

  return { settings, session, jobs, outcomes, summaryPath, succeeded, canceled };
};
