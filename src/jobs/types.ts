// Job and outcome types shared across the render flow.
import { fileNameOf } from "@/system/path";

// One clip to produce. Frozen on creation; runners only read it.
export type RenderJob = Readonly<{
  index: number;
  clipLength: number;
  overlaySource: string;
  backgroundSource: string;
  audioSource: string;
  backgroundOffset: number;
  audioOffset: number;
  outputPath: string;
  codec: string;
  normalizeAudio: boolean;
  logPath?: string;
}>;

export type JobStatus = "succeeded" | "failed" | "timeout" | "error" | "canceled";

export type JobOutcome = Readonly<{
  index: number;
  succeeded: boolean;
  status: JobStatus;
  message: string;
  logPath?: string;
  exitCode?: number | null;
  durationMs?: number;
}>;

const assertNonNegative = (value: number, label: string) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${label} must be a finite number >= 0 (got ${value}).`);
  }
};

export const createRenderJob = (fields: RenderJob): RenderJob => {
  if (!Number.isInteger(fields.index) || fields.index < 0) {
    throw new Error(`Job index must be an integer >= 0 (got ${fields.index}).`);
  }
  if (!Number.isFinite(fields.clipLength) || fields.clipLength <= 0) {
    throw new Error(`Clip length must be positive (got ${fields.clipLength}).`);
  }
  assertNonNegative(fields.backgroundOffset, "Background offset");
  assertNonNegative(fields.audioOffset, "Audio offset");
  if (!fields.outputPath.trim()) {
    throw new Error("Job output path is empty.");
  }
  return Object.freeze({ ...fields });
};

export const clipNameOf = (job: Pick<RenderJob, "outputPath">) =>
  fileNameOf(job.outputPath);

export const SUCCESS_MARK = "✅";
export const FAILURE_MARK = "❌";

export const createOutcome = (
  job: Pick<RenderJob, "index" | "logPath">,
  status: JobStatus,
  message: string,
  details: { exitCode?: number | null; durationMs?: number } = {}
): JobOutcome =>
  Object.freeze({
    index: job.index,
    succeeded: status === "succeeded",
    status,
    message,
    ...(job.logPath !== undefined ? { logPath: job.logPath } : {}),
    ...details
  });
