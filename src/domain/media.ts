// Domain helpers for classifying media inputs.
const SUPPORTED_VIDEO_EXTENSIONS = [".mp4", ".mov", ".mkv", ".webm", ".avi"];
const SUPPORTED_AUDIO_EXTENSIONS = [".mp3", ".wav", ".aac", ".m4a", ".flac", ".ogg"];

const hasExtension = (path: string, extensions: string[]) => {
  const lowerName = path.trim().toLowerCase();
  return extensions.some((ext) => lowerName.endsWith(ext));
};

export const isSupportedVideoPath = (path: string) =>
  hasExtension(path, SUPPORTED_VIDEO_EXTENSIONS);

// Music can also come from a video container's audio track.
export const isSupportedAudioPath = (path: string) =>
  hasExtension(path, SUPPORTED_AUDIO_EXTENSIONS) || isSupportedVideoPath(path);

export const videoExtensionsLabel = () =>
  SUPPORTED_VIDEO_EXTENSIONS.map((ext) => ext.slice(1)).join(", ");

export const audioExtensionsLabel = () =>
  SUPPORTED_AUDIO_EXTENSIONS.map((ext) => ext.slice(1)).join(", ");
