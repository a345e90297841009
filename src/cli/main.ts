// Line-mode entry point: probe inputs, render the batch, print the summary.
import { parseCliArgs, USAGE, type CliOptions } from "@/cli/args";
import { defaultWorkerCount, resolveSettings } from "@/cli/resolveSettings";
import { loadToolConfig, type ToolConfig } from "@/config/app";
import { runBatch } from "@/jobs/batch";
import { mergeClips } from "@/jobs/merge";
import type { MediaDurations } from "@/jobs/plan";
import { createProgressBar } from "@/jobs/progress";
import { GPU_CODEC, resolveCodec } from "@/system/ffmpeg";
import { probeDuration } from "@/system/ffprobe";
import makeDebug, { enableDebugLogging } from "@/utils/debug";
import { formatError } from "@/utils/errors";
import formatDuration from "@/utils/formatDuration";

const debug = makeDebug("cli");

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_USAGE = 2;

const probeInputs = async (options: CliOptions, tools: ToolConfig): Promise<MediaDurations> => {
  const probe = (filePath: string) =>
    probeDuration(filePath, { ffprobePath: tools.ffprobePath });
  const [background, overlay, music] = await Promise.all([
    probe(options.background),
    probe(options.overlay),
    probe(options.music)
  ]);
  return { background, overlay, music };
};

const main = async (argv: readonly string[]): Promise<number> => {
  const parsed = parseCliArgs(argv);
  if (parsed.kind === "help") {
    process.stdout.write(USAGE);
    return EXIT_OK;
  }
  if (parsed.kind === "error") {
    process.stderr.write(`${parsed.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }
  const { options } = parsed;
  if (options.verbose) {
    enableDebugLogging();
  }

  let tools: ToolConfig;
  try {
    tools = loadToolConfig();
  } catch (error) {
    process.stderr.write(`${formatError(error)}\n`);
    return EXIT_USAGE;
  }

  const durations = await probeInputs(options, tools);
  debug("probed durations: %o", durations);
  const codec = await resolveCodec(options.gpu, { ffmpegPath: tools.ffmpegPath });
  if (options.gpu && codec !== GPU_CODEC) {
    process.stderr.write(`${GPU_CODEC} not available in ffmpeg; falling back to ${codec}.\n`);
  }

  const resolved = resolveSettings(options, durations, codec);
  if (!resolved.ok) {
    process.stderr.write(`${resolved.message}\n`);
    return EXIT_USAGE;
  }
  const { settings } = resolved;
  process.stderr.write(
    `Rendering ${settings.clipCount} clip(s) of ${formatDuration(settings.clipLength)} ` +
      `with ${settings.workers ?? defaultWorkerCount()} worker(s). Codec: ${codec}.\n`
  );

  const controller = new AbortController();
  const onInterrupt = () => {
    process.stderr.write("\nInterrupted: stopping ffmpeg and writing a partial summary...\n");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const bar = createProgressBar(process.stderr);
  let fatal: string | undefined;
  try {
    const result = await runBatch(
      settings,
      {
        onUpdate: bar.update,
        onFinished: (message, outcomes) => {
          bar.done();
          process.stdout.write(`\n${outcomes.map((outcome) => outcome.message).join("\n")}\n`);
          process.stdout.write(`\n${message}\n`);
        },
        onError: (message) => {
          fatal = message;
        }
      },
      {
        ffmpegPath: tools.ffmpegPath,
        ffprobePath: tools.ffprobePath,
        timeoutFactor: tools.timeoutFactor,
        durations,
        signal: controller.signal
      }
    );

    if (!result) {
      process.stderr.write(`${fatal ?? "Batch could not start."}\n`);
      return EXIT_FAILED;
    }
    if (result.summaryPath) {
      process.stdout.write(`Summary saved: ${result.summaryPath}\n`);
    }

    if (options.merge && !result.canceled) {
      const rendered = result.outcomes
        .filter((outcome) => outcome.succeeded)
        .map((outcome) => result.jobs[outcome.index]?.outputPath)
        .filter((clipPath): clipPath is string => Boolean(clipPath));
      const merged = await mergeClips(result.session, rendered, {
        ffmpegPath: tools.ffmpegPath
      });
      process.stdout.write(`${merged.message}\n`);
    }

    return result.succeeded === result.jobs.length ? EXIT_OK : EXIT_FAILED;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
};

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${formatError(error)}\n`);
    process.exitCode = EXIT_FAILED;
  }
);
