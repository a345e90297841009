// Centralized app metadata and environment-driven tool configuration.
import { z } from "zod";

export const APP_NAME = "loopcut";
export const APP_TAGLINE = "Batch vertical clip renderer";

const envSchema = z.object({
  LOOPCUT_FFMPEG: z.string().trim().min(1).default("ffmpeg"),
  LOOPCUT_FFPROBE: z.string().trim().min(1).default("ffprobe"),
  // Per-job timeout is clip length multiplied by this factor.
  LOOPCUT_TIMEOUT_FACTOR: z.coerce.number().positive().default(20)
});

export type AppEnv = z.infer<typeof envSchema>;

export type ToolConfig = {
  ffmpegPath: string;
  ffprobePath: string;
  timeoutFactor: number;
};

export const loadToolConfig = (
  env: Record<string, string | undefined> = process.env
): ToolConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${details}`);
  }
  return {
    ffmpegPath: parsed.data.LOOPCUT_FFMPEG,
    ffprobePath: parsed.data.LOOPCUT_FFPROBE,
    timeoutFactor: parsed.data.LOOPCUT_TIMEOUT_FACTOR
  };
};
