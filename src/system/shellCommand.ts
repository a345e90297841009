import { spawn } from "node:child_process";
import makeDebug from "@/utils/debug";

export type CommandOptions = {
  cwd?: string;
  env?: Record<string, string>;
  // Hard limit; the process is killed with SIGKILL once it elapses.
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type CommandResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  // stdout and stderr interleaved in arrival order.
  output: string;
  timedOut: boolean;
  aborted: boolean;
};

export type CommandExecutor = (
  program: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

const debug = makeDebug("system:shell");

const quoteArg = (value: string) => {
  if (value === "") {
    return "''";
  }
  if (!/[\s'"\\;&|<>()$`*?[\]{}]/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
};

// Renders a copy-pasteable shell line for logs.
export const formatCommandLine = (program: string, args: readonly string[]) =>
  [program, ...args].map(quoteArg).join(" ");

export const tailLines = (output: string, count: number) =>
  output
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(-count)
    .join("\n");

const abortedResult = (): CommandResult => ({
  code: null,
  signal: null,
  output: "",
  timedOut: false,
  aborted: true
});

// Spawns one process and resolves once it exits. Rejects only when the
// process could not be started (missing binary, bad cwd). After a timeout or
// abort the result settles on process exit, even if a descendant still holds
// the output pipes.
export const runCommand: CommandExecutor = (program, args, options = {}) => {
  if (options.signal?.aborted) {
    return Promise.resolve(abortedResult());
  }

  return new Promise<CommandResult>((resolve, reject) => {
    const chunks: string[] = [];
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    debug("spawn %s %o", program, args);
    const child = spawn(program, [...args], {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true
    });

    const settle = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener("abort", onAbort);
      // Leftover descendants must not keep the pipes (and the event loop) alive.
      child.stdout.destroy();
      child.stderr.destroy();
      debug("%s done: code=%s signal=%s", program, code, signal);
      resolve({ code, signal, output: chunks.join(""), timedOut, aborted });
    };

    const hasExited = () => child.exitCode !== null || child.signalCode !== null;

    const stop = (killSignal: NodeJS.Signals) => {
      if (hasExited()) {
        settle(child.exitCode, child.signalCode);
        return;
      }
      child.kill(killSignal);
    };

    const onAbort = () => {
      aborted = true;
      debug("abort: killing %s (pid %s)", program, child.pid);
      stop("SIGTERM");
    };

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      chunks.push(chunk);
    });
    child.stderr.on("data", (chunk: string) => {
      chunks.push(chunk);
    });

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        debug("timeout after %dms: killing %s", options.timeoutMs, program);
        stop("SIGKILL");
      }, options.timeoutMs);
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener("abort", onAbort);
      debug("%s spawn failed: %O", program, error);
      reject(error);
    });

    child.on("exit", (code, signal) => {
      if (timedOut || aborted) {
        settle(code, signal);
      }
    });

    child.on("close", (code, signal) => {
      settle(code, signal);
    });
  });
};
