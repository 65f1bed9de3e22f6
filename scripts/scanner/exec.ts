import { execFile } from "node:child_process";

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  timeoutMs: number;
}

export type ExecFile = (file: string, args: readonly string[], options: ExecOptions) => Promise<ExecResult>;

const MAX_BUFFER = 16 * 1024 * 1024;

/** execFile with a hard timeout; the child is killed when it runs over. */
export const runCommand: ExecFile = (file, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      { cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: MAX_BUFFER, encoding: "utf8" },
      (error, stdout, stderr) => {
        if (error) {
          reject(Object.assign(error, { stdout, stderr }));
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });

/** Last few lines of a failed command's stderr, for a one-line reason. */
export function stderrTail(error: unknown, lines = 3): string | null {
  if (typeof error !== "object" || error === null || !("stderr" in error) || typeof error.stderr !== "string") {
    return null;
  }
  const tail = error.stderr.trim().split(/\r?\n/).slice(-lines).join(" | ");
  return tail === "" ? null : tail;
}
