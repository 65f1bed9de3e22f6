import fs from "fs-extra";
import path from "node:path";

import { sanitizeProjectKey } from "../keys/project-key";
import { describeError, ResourceLimitExceeded, ScannerFailure } from "../shared/errors";
import { runCommand, stderrTail, type ExecFile } from "./exec";

export interface WorkspaceOptions {
  baseDir: string;
  workerId: number;
  cloneTimeoutMs: number;
  maxRepoBytes: number;
  exec?: ExecFile;
  cloneUrl?: (owner: string, name: string) => string;
}

const defaultCloneUrl = (owner: string, name: string) => `https://github.com/${owner}/${name}.git`;

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(unit === 0 ? 0 : 1)} ${units[unit]}`;
}

/** Total size of regular files below `dir`; symlinks are not followed. */
export async function directorySize(dir: string): Promise<number> {
  let total = 0;
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(entryPath);
    } else if (entry.isFile()) {
      total += (await fs.lstat(entryPath)).size;
    }
  }
  return total;
}

// Git marks pack files read-only; restore the owner write bit so removal succeeds everywhere.
async function makeWritable(target: string): Promise<void> {
  const stats = await fs.lstat(target);
  if (stats.isSymbolicLink()) {
    return;
  }
  await fs.chmod(target, stats.mode | 0o200 | (stats.isDirectory() ? 0o100 : 0));
  if (stats.isDirectory()) {
    for (const name of await fs.readdir(target)) {
      await makeWritable(path.join(target, name));
    }
  }
}

/**
 * One clone directory per (repository, worker) pair under `baseDir`, so parallel workers
 * never share a checkout.
 */
export class Workspace {
  readonly baseDir: string;
  readonly workerId: number;
  private readonly cloneTimeoutMs: number;
  private readonly maxRepoBytes: number;
  private readonly exec: ExecFile;
  private readonly cloneUrl: (owner: string, name: string) => string;

  constructor(options: WorkspaceOptions) {
    this.baseDir = options.baseDir;
    this.workerId = options.workerId;
    this.cloneTimeoutMs = options.cloneTimeoutMs;
    this.maxRepoBytes = options.maxRepoBytes;
    this.exec = options.exec ?? runCommand;
    this.cloneUrl = options.cloneUrl ?? defaultCloneUrl;
  }

  directoryFor(owner: string, name: string): string {
    return path.join(this.baseDir, `${sanitizeProjectKey(owner, name)}_${this.workerId}`);
  }

  /** Shallow clone; raises ScannerFailure on a failed or timed-out clone and ResourceLimitExceeded when too large. */
  async clone(owner: string, name: string): Promise<string> {
    const dir = this.directoryFor(owner, name);
    await this.cleanup(dir);
    await fs.ensureDir(this.baseDir);

    try {
      await this.exec("git", ["clone", "--depth", "1", "--quiet", this.cloneUrl(owner, name), dir], {
        timeoutMs: this.cloneTimeoutMs,
      });
    } catch (error) {
      await this.cleanup(dir);
      const detail = stderrTail(error) ?? describeError(error);
      throw new ScannerFailure(`git clone failed for ${owner}/${name}: ${detail}`, { cause: error });
    }

    const size = await directorySize(dir);
    if (size > this.maxRepoBytes) {
      await this.cleanup(dir);
      throw new ResourceLimitExceeded(
        `${owner}/${name} is ${formatBytes(size)} (limit ${formatBytes(this.maxRepoBytes)})`,
        this.maxRepoBytes,
        size
      );
    }
    return dir;
  }

  async cleanup(dir: string): Promise<void> {
    if (!(await fs.pathExists(dir))) {
      return;
    }
    await makeWritable(dir);
    await fs.remove(dir);
  }
}
