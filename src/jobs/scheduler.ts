// Bounded fan-out of render jobs. Each job is its own ffmpeg process, so a
// crash in one encode cannot touch another job's state.
import { availableParallelism } from "node:os";
import type { JobRunner } from "@/jobs/jobRunner";
import type { ProgressReporter } from "@/jobs/progress";
import {
  FAILURE_MARK,
  clipNameOf,
  createOutcome,
  type JobOutcome,
  type RenderJob
} from "@/jobs/types";
import makeDebug, { type Logger } from "@/utils/debug";
import { formatError } from "@/utils/errors";

export type SchedulerOptions = {
  concurrency: number;
  runner: JobRunner;
  onProgress?: ProgressReporter;
  // Stops new dispatches and is forwarded to in-flight runners.
  signal?: AbortSignal;
  // Upper bound for concurrency; defaults to the host's execution units.
  availableParallelism?: number;
  log?: Logger;
};

export const clampConcurrency = (
  requested: number,
  jobCount: number,
  available: number
) => {
  const wanted = Number.isFinite(requested) ? Math.floor(requested) : 1;
  const ceiling = Math.max(1, Math.floor(available));
  return Math.max(1, Math.min(wanted, ceiling, Math.max(1, jobCount)));
};

const workerFault = (job: RenderJob, error: unknown) =>
  createOutcome(
    job,
    "error",
    `${FAILURE_MARK} ${clipNameOf(job)} worker exception: ${formatError(error)}`
  );

const notStarted = (job: RenderJob) =>
  createOutcome(job, "canceled", `${FAILURE_MARK} ${clipNameOf(job)} (canceled before start)`);

// Resolves with one outcome per job, in completion order. Never rejects
// because of a job; runner faults become failed outcomes for that slot.
export const runJobs = async (
  jobs: readonly RenderJob[],
  options: SchedulerOptions
): Promise<JobOutcome[]> => {
  const log = options.log ?? makeDebug("jobs:scheduler");
  const total = jobs.length;
  const outcomes: JobOutcome[] = [];
  if (total === 0) {
    return outcomes;
  }

  const limit = clampConcurrency(
    options.concurrency,
    total,
    options.availableParallelism ?? availableParallelism()
  );
  const { runner, onProgress, signal } = options;
  let cursor = 0;

  log("dispatching %d job(s) with concurrency %d", total, limit);

  // Runs on the event loop only, so the list and counter update serially.
  const record = (outcome: JobOutcome) => {
    outcomes.push(outcome);
    try {
      onProgress?.({ completed: outcomes.length, total, outcome });
    } catch (error) {
      log("progress callback failed: %O", error);
    }
  };

  const runOne = async (job: RenderJob) => {
    let outcome: JobOutcome;
    try {
      outcome = await runner(job, signal);
    } catch (error) {
      log("worker fault for job %d: %O", job.index, error);
      outcome = workerFault(job, error);
    }
    record(outcome);
  };

  const worker = async () => {
    while (cursor < total && !signal?.aborted) {
      const job = jobs[cursor];
      cursor += 1;
      if (job) {
        await runOne(job);
      }
    }
  };

  await Promise.all(Array.from({ length: limit }, () => worker()));

  if (cursor < total) {
    log("batch aborted: %d job(s) never started", total - cursor);
    for (const job of jobs.slice(cursor)) {
      record(notStarted(job));
    }
  }

  return outcomes;
};
