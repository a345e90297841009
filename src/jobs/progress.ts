// Progress contract between the scheduler and whatever displays it.
import type { JobOutcome } from "@/jobs/types";

export type ProgressUpdate = {
  completed: number;
  total: number;
  outcome: JobOutcome;
};

// Called once per finished job, in completion order.
export type ProgressReporter = (update: ProgressUpdate) => void;

export type PercentCallback = (percent: number, message: string) => void;

export const computePercent = (completed: number, total: number) => {
  if (!Number.isFinite(total) || total <= 0) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.floor((completed / total) * 100)));
};

// Adapts scheduler updates to the (percent, message) shape hosts expect.
export const toPercentReporter =
  (callback: PercentCallback): ProgressReporter =>
  ({ completed, total, outcome }) => {
    callback(computePercent(completed, total), outcome.message);
  };

export const combineReporters =
  (...reporters: Array<ProgressReporter | undefined>): ProgressReporter =>
  (update) => {
    for (const reporter of reporters) {
      reporter?.(update);
    }
  };

export type ProgressStream = {
  write: (chunk: string) => unknown;
  isTTY?: boolean;
};

const BAR_WIDTH = 24;

export const renderProgressLine = (
  completed: number,
  total: number,
  label = "Rendering progress"
) => {
  const percent = computePercent(completed, total);
  const filled = Math.round((percent / 100) * BAR_WIDTH);
  const bar = `${"#".repeat(filled)}${"-".repeat(BAR_WIDTH - filled)}`;
  return `${label} |${bar}| ${completed}/${total} clips ${percent}%`;
};

// Line-mode bar: redraws in place on a TTY, one line per update otherwise.
export const createProgressBar = (stream: ProgressStream) => {
  let lastLine = "";
  const update: ProgressReporter = ({ completed, total }) => {
    lastLine = renderProgressLine(completed, total);
    stream.write(stream.isTTY ? `\r${lastLine}` : `${lastLine}\n`);
  };
  const done = () => {
    if (stream.isTTY && lastLine) {
      stream.write("\n");
    }
  };
  return { update, done };
};
