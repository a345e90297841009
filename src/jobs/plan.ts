// Turns render settings into the session's job list.
import type { RenderSettings } from "@/config/settings";
import {
  audioExtensionsLabel,
  isSupportedAudioPath,
  isSupportedVideoPath,
  videoExtensionsLabel
} from "@/domain/media";
import { formatSeconds } from "@/jobs/ffmpegArgs";
import type { Session } from "@/jobs/session";
import { createRenderJob, type RenderJob } from "@/jobs/types";

// Probed input durations in seconds; missing or non-positive means unknown.
export type MediaDurations = {
  background?: number;
  overlay?: number;
  music?: number;
};

const known = (value?: number): value is number =>
  typeof value === "number" && Number.isFinite(value) && value > 0;

export const maxClipCount = (backgroundDuration: number | undefined, clipLength: number) => {
  if (!known(backgroundDuration) || !(clipLength > 0)) {
    return 0;
  }
  return Math.floor(backgroundDuration / clipLength);
};

export const backgroundOffsetFor = (index: number, clipLength: number) => index * clipLength;

export const audioOffsetFor = (settings: RenderSettings, index: number) =>
  settings.audioMode === "sliding"
    ? settings.musicStart + index * settings.clipLength
    : settings.musicStart;

// End of the music window the whole batch reads from.
export const musicWindowEnd = (settings: RenderSettings) =>
  audioOffsetFor(settings, settings.clipCount - 1) + settings.clipLength;

// Returns human-readable problems; an empty list means the batch can start.
export const validateSettings = (
  settings: RenderSettings,
  durations: MediaDurations = {}
) => {
  const problems: string[] = [];

  if (!isSupportedVideoPath(settings.backgroundVideo)) {
    problems.push(`Background video must be one of: ${videoExtensionsLabel()}`);
  }
  if (!isSupportedVideoPath(settings.overlayVideo)) {
    problems.push(`Overlay video must be one of: ${videoExtensionsLabel()}`);
  }
  if (!isSupportedAudioPath(settings.musicFile)) {
    problems.push(`Music file must be one of: ${audioExtensionsLabel()} (or a video file)`);
  }

  if (known(durations.overlay) && settings.clipLength > durations.overlay) {
    problems.push(
      `Clip length (${formatSeconds(settings.clipLength)}s) exceeds overlay duration ` +
        `(${durations.overlay.toFixed(1)}s)`
    );
  }

  if (known(durations.background)) {
    const max = maxClipCount(durations.background, settings.clipLength);
    if (settings.clipCount > max) {
      problems.push(
        `Requested ${settings.clipCount} clips but only ${max} possible with ` +
          `${formatSeconds(settings.clipLength)}s clips`
      );
    }
  }

  if (known(durations.music)) {
    const end = musicWindowEnd(settings);
    if (end > durations.music) {
      problems.push(
        `Music segment (${formatSeconds(settings.musicStart)}s to ${formatSeconds(end)}s) ` +
          `exceeds music duration (${durations.music.toFixed(1)}s)`
      );
    }
  }

  return problems;
};

export const planJobs = (
  settings: RenderSettings,
  session: Pick<Session, "clipPath" | "logPathFor">
): RenderJob[] =>
  Array.from({ length: settings.clipCount }, (_, index) => {
    const outputPath = session.clipPath(index, settings.clipLength);
    return createRenderJob({
      index,
      clipLength: settings.clipLength,
      overlaySource: settings.overlayVideo,
      backgroundSource: settings.backgroundVideo,
      audioSource: settings.musicFile,
      backgroundOffset: backgroundOffsetFor(index, settings.clipLength),
      audioOffset: audioOffsetFor(settings, index),
      outputPath,
      codec: settings.codec,
      normalizeAudio: settings.normalizeAudio,
      logPath: session.logPathFor(outputPath)
    });
  });
