// One batch invocation's output scope: <base>/<session_id>/ with a logs/ folder.
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { formatSeconds } from "@/jobs/ffmpegArgs";
import { sanitizePath } from "@/system/path";
import makeDebug, { type Logger } from "@/utils/debug";
import { SessionError } from "@/utils/errors";

export type Session = {
  id: string;
  directory: string;
  logDirectory: string;
  createdAt: Date;
  clipPath: (index: number, clipLength: number) => string;
  logPathFor: (clipPath: string) => string;
};

export type SessionOptions = {
  now?: () => Date;
  log?: Logger;
};

const LOG_FOLDER = "logs";
const MAX_ID_ATTEMPTS = 100;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

// Local time, sortable as text: session_2026-03-01_09-05-07.
export const formatSessionId = (date: Date) =>
  `session_${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
  `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;

// Zero-padded ordinal keeps clips sorted; distinct indices never collide.
export const generateClipFilename = (index: number, clipLength: number) =>
  `clip_${pad(index + 1, 3)}_${formatSeconds(clipLength)}s.mp4`;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

// Creates the session folder without reusing an existing one; two runs in the
// same second get a numeric suffix.
const claimSessionDirectory = async (baseDir: string, baseId: string) => {
  for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt += 1) {
    const id = attempt === 1 ? baseId : `${baseId}_${attempt}`;
    const directory = path.join(baseDir, id);
    try {
      await mkdir(directory);
      return { id, directory };
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        continue;
      }
      throw new SessionError(directory, error);
    }
  }
  throw new SessionError(
    path.join(baseDir, baseId),
    new Error(`${MAX_ID_ATTEMPTS} sessions already exist for this timestamp`)
  );
};

export const createSession = async (
  baseOutputDir: string,
  options: SessionOptions = {}
): Promise<Session> => {
  const log = options.log ?? makeDebug("jobs:session");
  const createdAt = (options.now ?? (() => new Date()))();
  const baseDir = path.resolve(sanitizePath(baseOutputDir) || ".");

  try {
    await mkdir(baseDir, { recursive: true });
  } catch (error) {
    throw new SessionError(baseDir, error);
  }

  const { id, directory } = await claimSessionDirectory(baseDir, formatSessionId(createdAt));
  const logDirectory = path.join(directory, LOG_FOLDER);
  try {
    await mkdir(logDirectory);
  } catch (error) {
    throw new SessionError(logDirectory, error);
  }

  log("created session %s", directory);
  return {
    id,
    directory,
    logDirectory,
    createdAt,
    clipPath: (index, clipLength) =>
      path.join(directory, generateClipFilename(index, clipLength)),
    logPathFor: (clipPath) => path.join(logDirectory, `${path.basename(clipPath)}.log`)
  };
};
