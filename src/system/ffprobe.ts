import { sanitizePath } from "@/system/path";
import { runCommand, type CommandExecutor } from "@/system/shellCommand";
import makeDebug from "@/utils/debug";
import { formatError } from "@/utils/errors";

export type ProbeOptions = {
  ffprobePath?: string;
  execute?: CommandExecutor;
  timeoutMs?: number;
};

const debug = makeDebug("system:ffprobe");
const PROBE_TIMEOUT_MS = 10_000;

export const parseDuration = (raw: string) => {
  const firstLine = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find(Boolean);
  if (!firstLine) {
    return undefined;
  }
  const parsed = Number.parseFloat(firstLine);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

// Duration in seconds, or undefined when ffprobe cannot tell.
export const probeDuration = async (filePath: string, options: ProbeOptions = {}) => {
  const normalizedPath = sanitizePath(filePath);
  if (!normalizedPath) {
    return undefined;
  }
  const execute = options.execute ?? runCommand;
  const args = [
    "-v",
    "error",
    "-show_entries",
    "format=duration",
    "-of",
    "csv=p=0",
    "--",
    normalizedPath
  ];
  debug("ffprobe args: %o", args);
  try {
    const result = await execute(options.ffprobePath ?? "ffprobe", args, {
      timeoutMs: options.timeoutMs ?? PROBE_TIMEOUT_MS
    });
    if (result.code !== 0 || result.timedOut) {
      debug("probe failed: code=%s raw=%s", result.code, result.output.slice(-1500));
      return undefined;
    }
    return parseDuration(result.output);
  } catch (error) {
    debug("probe could not run: %s", formatError(error));
    return undefined;
  }
};
