// Shared ffmpeg argument helpers to keep encoding behavior consistent.
import type { RenderJob } from "@/jobs/types";

export const OUTPUT_WIDTH = 1080;
export const OUTPUT_HEIGHT = 1920;
export const VIDEO_BITRATE = "3500k";
export const AUDIO_BITRATE = "192k";
export const LOUDNORM_FILTER = "loudnorm=I=-16:LRA=11:TP=-1.5";

export const getExtension = (path: string) => {
  const clean = path.trim().toLowerCase();
  const dotIndex = clean.lastIndexOf(".");
  return dotIndex >= 0 ? clean.slice(dotIndex + 1) : "";
};

// Millisecond precision without float noise ("2.5", not "2.500000001").
export const formatSeconds = (seconds: number) => {
  if (Number.isInteger(seconds)) {
    return String(seconds);
  }
  return seconds.toFixed(3).replace(/0+$/, "").replace(/\.$/, "");
};

export const buildAudioArgs = (
  outputPath: string,
  options?: { normalize?: boolean }
) => {
  const args: string[] = [];
  if (options?.normalize) {
    args.push("-af", LOUDNORM_FILTER);
  }
  const extension = getExtension(outputPath);
  if (extension === "webm") {
    args.push("-c:a", "libopus", "-b:a", "160k");
    return args;
  }
  // MP4, MOV and MKV all take AAC for predictable playback.
  args.push("-c:a", "aac", "-b:a", AUDIO_BITRATE);
  return args;
};

export const buildContainerArgs = (outputPath: string) => {
  const extension = getExtension(outputPath);
  return extension === "mp4" || extension === "m4v" || extension === "mov"
    ? ["-movflags", "+faststart"]
    : [];
};

// Overlay is centred over a 9:16 crop of the background, both trimmed to the clip.
export const buildOverlayFilter = (clipLength: number) => {
  const duration = formatSeconds(clipLength);
  return [
    `[0:v]trim=duration=${duration},setpts=PTS-STARTPTS,format=rgba[main]`,
    `[1:v]trim=duration=${duration},setpts=PTS-STARTPTS,` +
      `crop=ih*9/16:ih,scale=${OUTPUT_WIDTH}:${OUTPUT_HEIGHT}[bg]`,
    "[bg][main]overlay=(W-w)/2:(H-h)/2:shortest=1[v]"
  ].join(";");
};

// Pure function of the job so identical jobs log identical invocations.
export const buildRenderArgs = (job: RenderJob) => {
  const duration = formatSeconds(job.clipLength);
  return [
    "-y",
    "-hide_banner",
    // Loop the overlay once so short loops still cover the clip.
    "-stream_loop",
    "1",
    "-i",
    job.overlaySource,
    "-ss",
    formatSeconds(job.backgroundOffset),
    "-t",
    duration,
    "-i",
    job.backgroundSource,
    "-ss",
    formatSeconds(job.audioOffset),
    "-t",
    duration,
    "-i",
    job.audioSource,
    "-filter_complex",
    buildOverlayFilter(job.clipLength),
    "-map",
    "[v]",
    "-map",
    "2:a",
    "-t",
    duration,
    "-c:v",
    job.codec,
    "-b:v",
    VIDEO_BITRATE,
    "-pix_fmt",
    "yuv420p",
    ...buildAudioArgs(job.outputPath, { normalize: job.normalizeAudio }),
    ...buildContainerArgs(job.outputPath),
    job.outputPath
  ];
};
