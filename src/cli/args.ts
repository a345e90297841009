// Command-line flag parsing for the render CLI.
import { parseArgs } from "node:util";
import { APP_NAME, APP_TAGLINE } from "@/config/app";

export type CliOptions = {
  background: string;
  overlay: string;
  music: string;
  length?: number;
  count?: number;
  musicStart: number;
  slidingAudio: boolean;
  workers?: number;
  gpu: boolean;
  normalize: boolean;
  output: string;
  merge: boolean;
  verbose: boolean;
};

export type CliParseResult =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const USAGE = `${APP_NAME}: ${APP_TAGLINE}

Usage:
  ${APP_NAME} --background <file> --overlay <file> --music <file> [options]

Options:
  -b, --background <file>   background video, cut into consecutive windows
  -a, --overlay <file>      overlay video centred on every clip
  -m, --music <file>        music track
  -l, --length <seconds>    clip length (default: overlay duration)
  -n, --count <clips>       number of clips (default: all that fit)
      --all                 render every clip the background allows (default)
      --music-start <s>     where the music window starts (default 0)
      --sliding-audio       advance the music window with each clip
  -w, --workers <n>         parallel ffmpeg processes (default: half the CPUs)
      --gpu                 use h264_nvenc when ffmpeg has it
      --normalize           apply loudnorm to the music
  -o, --output <dir>        output folder (default ./output)
      --merge               concatenate the rendered clips afterwards
  -v, --verbose             debug logging
  -h, --help                show this help
`;

const parsePositive = (raw: string | undefined, flag: string, integer: boolean) => {
  if (raw === undefined) {
    return { ok: true, value: undefined } as const;
  }
  const value = Number(raw);
  const valid = Number.isFinite(value) && value > 0 && (!integer || Number.isInteger(value));
  if (!valid) {
    return {
      ok: false,
      error: `--${flag} expects a positive ${integer ? "integer" : "number"} (got "${raw}")`
    } as const;
  }
  return { ok: true, value } as const;
};

const FLAGS = {
  background: { type: "string", short: "b" },
  overlay: { type: "string", short: "a" },
  music: { type: "string", short: "m" },
  length: { type: "string", short: "l" },
  count: { type: "string", short: "n" },
  all: { type: "boolean", default: false },
  "music-start": { type: "string" },
  "sliding-audio": { type: "boolean", default: false },
  workers: { type: "string", short: "w" },
  gpu: { type: "boolean", default: false },
  normalize: { type: "boolean", default: false },
  output: { type: "string", short: "o", default: "./output" },
  merge: { type: "boolean", default: false },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false }
} as const;

const readFlags = (argv: readonly string[]) =>
  parseArgs({ args: [...argv], strict: true, allowPositionals: false, options: FLAGS }).values;

export const parseCliArgs = (argv: readonly string[]): CliParseResult => {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (error) {
    return { kind: "error", message: error instanceof Error ? error.message : String(error) };
  }

  if (values.help) {
    return { kind: "help" };
  }

  const missing = (["background", "overlay", "music"] as const).filter(
    (flag) => !values[flag]?.trim()
  );
  if (missing.length > 0) {
    return {
      kind: "error",
      message: `Missing required ${missing.map((flag) => `--${flag}`).join(", ")}`
    };
  }

  const length = parsePositive(values.length, "length", false);
  const count = parsePositive(values.count, "count", true);
  const workers = parsePositive(values.workers, "workers", true);
  if (!length.ok) {
    return { kind: "error", message: length.error };
  }
  if (!count.ok) {
    return { kind: "error", message: count.error };
  }
  if (!workers.ok) {
    return { kind: "error", message: workers.error };
  }

  const musicStartRaw = values["music-start"] ?? "0";
  const musicStart = Number(musicStartRaw);
  if (!Number.isFinite(musicStart) || musicStart < 0) {
    return {
      kind: "error",
      message: `--music-start expects a number >= 0 (got "${musicStartRaw}")`
    };
  }

  if (values.all && values.count !== undefined) {
    return { kind: "error", message: "Use either --count or --all, not both" };
  }

  return {
    kind: "run",
    options: {
      background: values.background ?? "",
      overlay: values.overlay ?? "",
      music: values.music ?? "",
      length: length.value,
      count: count.value,
      musicStart,
      slidingAudio: values["sliding-audio"] ?? false,
      workers: workers.value,
      gpu: values.gpu ?? false,
      normalize: values.normalize ?? false,
      output: values.output ?? "./output",
      merge: values.merge ?? false,
      verbose: values.verbose ?? false
    }
  };
};
