import { spawn } from "node:child_process";
import { access, constants } from "node:fs/promises";
import path from "node:path";
import { log } from "./log";

export interface ExecResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** True when the process was killed for running past `timeoutMs`. */
  timedOut: boolean;
}

/**
 * Runs `file` to completion. Resolves with whatever exit status the process
 * had (including after a timeout kill); rejects only when the process could
 * not be spawned at all, e.g. `ENOENT` for a missing binary.
 */
export const execFile = async (
  file: string,
  args: string[],
  opts?: {
    cwd?: string;
    timeoutMs?: number;
    inputText?: string;
    env?: NodeJS.ProcessEnv;
  },
): Promise<ExecResult> => {
  const timeoutMs = opts?.timeoutMs ?? 60_000;
  return await new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(file, args, {
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      log.warn("exec timeout, killing process", { file, timeoutMs });
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => (stdout += d));
    child.stderr.on("data", (d: string) => (stderr += d));

    // the child may exit before reading its input
    child.stdin.on("error", (err) => log.debug("exec stdin closed early", { file, error: err.message }));

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on("close", (code, signal) => {
      clearTimeout(timer);
      resolve({ code, signal, stdout, stderr, timedOut });
    });

    if (opts?.inputText) {
      child.stdin.write(opts.inputText);
    }
    child.stdin.end();
  });
};

export const isNotFound = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

const isExecutable = (file: string) =>
  access(file, constants.X_OK).then(
    () => true,
    () => false,
  );

/**
 * Finds `bin` the way spawn would: as given when it contains a slash,
 * otherwise in each directory of `searchPath`. Null when nothing executable
 * matches.
 */
export const resolveExecutable = async (bin: string, searchPath = process.env.PATH ?? ""): Promise<string | null> => {
  const candidates = bin.includes("/")
    ? [bin]
    : searchPath
        .split(path.delimiter)
        .filter(Boolean)
        .map((dir) => path.join(dir, bin));
  for (const candidate of candidates) {
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
};
