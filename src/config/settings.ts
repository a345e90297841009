// Typed render settings shared by the CLI and any other host.
import { z } from "zod";

export const AUDIO_MODES = ["fixed", "sliding"] as const;

export type AudioMode = (typeof AUDIO_MODES)[number];

const pathField = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);

export const renderSettingsSchema = z.object({
  backgroundVideo: pathField("Background video"),
  overlayVideo: pathField("Overlay video"),
  musicFile: pathField("Music file"),
  clipLength: z.number().positive("Clip length must be positive"),
  clipCount: z.number().int().min(1, "Number of clips must be at least 1"),
  musicStart: z.number().min(0, "Music start cannot be negative").default(0),
  // "fixed" reuses musicStart for every clip, "sliding" advances it per clip.
  audioMode: z.enum(AUDIO_MODES).default("fixed"),
  codec: z.string().trim().min(1).default("libx264"),
  normalizeAudio: z.boolean().default(false),
  workers: z.number().int().min(1, "Workers must be at least 1").default(2),
  outputDir: z.string().trim().min(1).default("./output")
});

export type RenderSettingsInput = z.input<typeof renderSettingsSchema>;
export type RenderSettings = z.output<typeof renderSettingsSchema>;

export type SettingsParseResult =
  | { ok: true; settings: RenderSettings }
  | { ok: false; problems: string[] };

export const parseRenderSettings = (input: unknown): SettingsParseResult => {
  const parsed = renderSettingsSchema.safeParse(input);
  if (parsed.success) {
    return { ok: true, settings: parsed.data };
  }
  return {
    ok: false,
    problems: parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
  };
};
