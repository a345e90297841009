// Shared path helpers for shell and ffmpeg interactions.
import path from "node:path";

export const sanitizePath = (value: string) =>
  value.trim().replace(/^"+|"+$/g, "");

// File name only, for reports that should not expose local folder layout.
export const fileNameOf = (value: string) => {
  const clean = sanitizePath(value);
  if (!clean) {
    return clean;
  }
  return path.basename(clean.replace(/[/\\]+$/, "").replace(/\\/g, "/"));
};

