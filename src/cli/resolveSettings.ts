// Turns parsed flags plus probed durations into render settings.
import { availableParallelism } from "node:os";
import type { CliOptions } from "@/cli/args";
import type { RenderSettingsInput } from "@/config/settings";
import { maxClipCount, type MediaDurations } from "@/jobs/plan";

export const defaultWorkerCount = (units = availableParallelism()) =>
  Math.max(1, Math.floor(units / 2));

// Fills in the defaults that depend on probed durations.
export const resolveSettings = (
  options: CliOptions,
  durations: MediaDurations,
  codec: string,
  workers = defaultWorkerCount()
): { ok: true; settings: RenderSettingsInput } | { ok: false; message: string } => {
  const clipLength =
    options.length ??
    (durations.overlay !== undefined ? Math.floor(durations.overlay) : undefined);
  if (clipLength === undefined) {
    return {
      ok: false,
      message: "Could not detect the overlay duration; pass --length explicitly."
    };
  }
  if (clipLength <= 0) {
    return {
      ok: false,
      message: "The overlay is shorter than one second; pass --length explicitly."
    };
  }

  const available = maxClipCount(durations.background, clipLength);
  const clipCount = options.count ?? available;
  if (clipCount <= 0) {
    return {
      ok: false,
      message:
        durations.background === undefined
          ? "Could not detect the background duration; pass --count explicitly."
          : `The background is shorter than one ${clipLength}s clip.`
    };
  }

  return {
    ok: true,
    settings: {
      backgroundVideo: options.background,
      overlayVideo: options.overlay,
      musicFile: options.music,
      clipLength,
      clipCount,
      musicStart: options.musicStart,
      audioMode: options.slidingAudio ? "sliding" : "fixed",
      codec,
      normalizeAudio: options.normalize,
      workers: options.workers ?? workers,
      outputDir: options.output
    }
  };
};

