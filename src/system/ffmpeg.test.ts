import { describe, expect, it, vi } from "vitest";
import {
  CPU_CODEC,
  GPU_CODEC,
  checkFfmpeg,
  hasEncoder,
  parseEncoderNames,
  resolveCodec
} from "@/system/ffmpeg";
import type { CommandExecutor, CommandResult } from "@/system/shellCommand";

const result = (overrides: Partial<CommandResult> = {}): CommandResult => ({
  code: 0,
  signal: null,
  output: "",
  timedOut: false,
  aborted: false,
  ...overrides
});

const ENCODERS = [
  "Encoders:",
  " V..... = Video",
  " A..... = Audio",
  " ------",
  " V....D libx264              libx264 H.264 / AVC",
  " V....D h264_nvenc           NVIDIA NVENC H.264 encoder",
  " A....D aac                  AAC (Advanced Audio Coding)"
].join("\n");

describe("checkFfmpeg", () => {
  it("reports both versions when the tools run", async () => {
    const execute: CommandExecutor = async (program) =>
      result({
        output:
          program === "ffmpeg"
            ? "ffmpeg version 6.1 Copyright (c) 2000-2023\nbuilt with gcc"
            : "ffprobe version 6.1 Copyright (c) 2007-2023\n"
      });

    expect(await checkFfmpeg({ execute })).toEqual({
      state: "ready",
      message: "FFmpeg is ready.",
      ffmpegVersion: "ffmpeg version 6.1 Copyright (c) 2000-2023",
      ffprobeVersion: "ffprobe version 6.1 Copyright (c) 2007-2023"
    });
  });

  it("names the tool that could not start", async () => {
    const execute: CommandExecutor = async (program) => {
      if (program === "/opt/ffprobe") {
        throw new Error("spawn /opt/ffprobe ENOENT");
      }
      return result({ output: "ffmpeg version 6.1" });
    };

    const status = await checkFfmpeg({ ffprobePath: "/opt/ffprobe", execute });

    expect(status.state).toBe("missing");
    expect(status.details).toBe("ffprobe: spawn /opt/ffprobe ENOENT");
  });
});

describe("parseEncoderNames", () => {
  it("lists encoder names and skips the legend", () => {
    expect(parseEncoderNames(ENCODERS)).toEqual(["libx264", "h264_nvenc", "aac"]);
  });
});

describe("resolveCodec", () => {
  it("prefers the GPU encoder when ffmpeg has it", async () => {
    const execute = vi.fn<CommandExecutor>(async () => result({ output: ENCODERS }));
    expect(await resolveCodec(true, { execute })).toBe(GPU_CODEC);
    expect(execute).toHaveBeenCalledWith("ffmpeg", ["-hide_banner", "-encoders"], {
      timeoutMs: 5000
    });
  });

  it("falls back to the CPU encoder", async () => {
    const execute = vi.fn<CommandExecutor>(async () =>
      result({ output: " V....D libx264  libx264 H.264" })
    );
    expect(await resolveCodec(true, { execute })).toBe(CPU_CODEC);
    expect(await resolveCodec(false, { execute })).toBe(CPU_CODEC);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("treats an encoder listing failure as unavailable", async () => {
    expect(
      await hasEncoder(GPU_CODEC, {
        execute: async () => {
          throw new Error("spawn ffmpeg ENOENT");
        }
      })
    ).toBe(false);
  });
});
