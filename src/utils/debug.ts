import createDebug from "debug";

// Central debug namespace helper so logs stay consistent across modules.
const BASE_NAMESPACE = "loopcut";

// Anything shaped like a debug instance; lets callers inject their own sink.
export type Logger = (formatter: string, ...args: unknown[]) => void;

export const makeDebug = (scope: string) => createDebug(`${BASE_NAMESPACE}:${scope}`);

export const enableDebugLogging = (pattern = `${BASE_NAMESPACE}:*`) => {
  createDebug.enable(pattern);
};

export default makeDebug;
