import { runCommand, type CommandExecutor } from "@/system/shellCommand";
import makeDebug from "@/utils/debug";
import { formatError } from "@/utils/errors";

export type FfmpegStatus = {
  state: "ready" | "missing";
  message: string;
  details?: string;
  ffmpegVersion?: string;
  ffprobeVersion?: string;
};

export type ToolOptions = {
  ffmpegPath?: string;
  ffprobePath?: string;
  execute?: CommandExecutor;
};

export const CPU_CODEC = "libx264";
export const GPU_CODEC = "h264_nvenc";

const debug = makeDebug("system:ffmpeg");
const CHECK_TIMEOUT_MS = 5_000;

const findVersionLine = (output: string, prefix: string) =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.toLowerCase().startsWith(prefix.toLowerCase())) ?? "";

const getFirstLine = (value: string) =>
  value.split(/\r?\n/).map((line) => line.trim()).find(Boolean) ?? "";

const runProgram = async (
  execute: CommandExecutor,
  program: string,
  expectedPrefix: string
) => {
  try {
    const output = await execute(program, ["-version"], { timeoutMs: CHECK_TIMEOUT_MS });
    const versionLine = findVersionLine(output.output, expectedPrefix);

    if (output.code !== 0 && !versionLine) {
      return {
        ok: false,
        error: output.output.trim() || `Exit code ${output.code ?? "none"}`
      } as const;
    }

    return {
      ok: true,
      version: versionLine || getFirstLine(output.output)
    } as const;
  } catch (error) {
    return { ok: false, error: formatError(error) } as const;
  }
};

// Checks that both ffmpeg and ffprobe can be executed.
export const checkFfmpeg = async (options: ToolOptions = {}): Promise<FfmpegStatus> => {
  const execute = options.execute ?? runCommand;
  const [ffmpegResult, ffprobeResult] = await Promise.all([
    runProgram(execute, options.ffmpegPath ?? "ffmpeg", "ffmpeg version"),
    runProgram(execute, options.ffprobePath ?? "ffprobe", "ffprobe version")
  ]);

  if (!ffmpegResult.ok || !ffprobeResult.ok) {
    debug("ffmpeg check failed: %o %o", ffmpegResult, ffprobeResult);
    return {
      state: "missing",
      message:
        "FFmpeg not found. Install ffmpeg and ffprobe, add them to PATH, or set LOOPCUT_FFMPEG / LOOPCUT_FFPROBE.",
      details: [
        !ffmpegResult.ok ? `ffmpeg: ${ffmpegResult.error}` : null,
        !ffprobeResult.ok ? `ffprobe: ${ffprobeResult.error}` : null
      ]
        .filter(Boolean)
        .join(" | ")
    };
  }

  return {
    state: "ready",
    message: "FFmpeg is ready.",
    ffmpegVersion: ffmpegResult.version,
    ffprobeVersion: ffprobeResult.version
  };
};

export const parseEncoderNames = (output: string) =>
  output
    .split(/\r?\n/)
    .map((line) => line.trim().split(/\s+/))
    // Encoder rows look like "V....D libx264  description"; legend rows use "=".
    .filter(
      (parts) =>
        parts.length >= 2 && parts[1] !== "=" && /^[VAS][A-Z.]{5}$/.test(parts[0] ?? "")
    )
    .map((parts) => parts[1] ?? "");

export const hasEncoder = async (name: string, options: ToolOptions = {}) => {
  const execute = options.execute ?? runCommand;
  try {
    const result = await execute(options.ffmpegPath ?? "ffmpeg", ["-hide_banner", "-encoders"], {
      timeoutMs: CHECK_TIMEOUT_MS
    });
    return parseEncoderNames(result.output).includes(name);
  } catch (error) {
    debug("encoder check failed for %s: %s", name, formatError(error));
    return false;
  }
};

export const resolveCodec = async (preferGpu: boolean, options: ToolOptions = {}) => {
  if (preferGpu && (await hasEncoder(GPU_CODEC, options))) {
    debug("using GPU encoder %s", GPU_CODEC);
    return GPU_CODEC;
  }
  debug("using CPU encoder %s", CPU_CODEC);
  return CPU_CODEC;
};
