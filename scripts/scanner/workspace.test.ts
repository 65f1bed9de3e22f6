import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { ResourceLimitExceeded, ScannerFailure } from "../shared/errors";
import type { ExecFile } from "./exec";
import { directorySize, formatBytes, Workspace } from "./workspace";

// Stands in for `git clone`: writes a small checkout into the target directory.
const fakeClone: ExecFile = async (_file, args) => {
  const dir = args[args.length - 1];
  await fs.outputFile(path.join(dir, "README.md"), "0123456789");
  await fs.outputFile(path.join(dir, "src", "main.ts"), "export {};\n");
  return { stdout: "", stderr: "" };
};

describe("formatBytes", () => {
  it("picks a readable unit", () => {
    expect(formatBytes(10)).toBe("10 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(3 * 1024 ** 3)).toBe("3.0 GB");
  });
});

describe("Workspace", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "rcs-workspace-"));
  });

  it("clones into a per-worker directory", async () => {
    const exec = vi.fn(fakeClone);
    const workspace = new Workspace({ baseDir, workerId: 3, cloneTimeoutMs: 1000, maxRepoBytes: 1024, exec });

    const dir = await workspace.clone("acme", "widgets");

    expect(dir).toBe(path.join(baseDir, "acme_widgets_3"));
    expect(exec).toHaveBeenCalledWith(
      "git",
      ["clone", "--depth", "1", "--quiet", "https://github.com/acme/widgets.git", dir],
      { timeoutMs: 1000 }
    );
    expect(await directorySize(dir)).toBe(21);
  });

  it("removes a clone over the size limit", async () => {
    const workspace = new Workspace({ baseDir, workerId: 1, cloneTimeoutMs: 1000, maxRepoBytes: 20, exec: fakeClone });

    const attempt = workspace.clone("acme", "widgets");

    await expect(attempt).rejects.toBeInstanceOf(ResourceLimitExceeded);
    await expect(attempt).rejects.toMatchObject({ limit: 20, actual: 21 });
    expect(await fs.pathExists(workspace.directoryFor("acme", "widgets"))).toBe(false);
  });

  it("reports the tail of git's stderr when the clone fails", async () => {
    const exec: ExecFile = async (_file, args) => {
      await fs.ensureDir(args[args.length - 1]);
      throw Object.assign(new Error("Command failed: git clone"), {
        stderr: "Cloning into 'x'...\nfatal: repository not found\n",
      });
    };
    const workspace = new Workspace({ baseDir, workerId: 1, cloneTimeoutMs: 1000, maxRepoBytes: 1024, exec });

    const attempt = workspace.clone("acme", "gone");

    await expect(attempt).rejects.toBeInstanceOf(ScannerFailure);
    await expect(attempt).rejects.toThrow("git clone failed for acme/gone: Cloning into 'x'... | fatal: repository not found");
    expect(await fs.pathExists(workspace.directoryFor("acme", "gone"))).toBe(false);
  });

  it("removes read-only files on cleanup", async () => {
    const workspace = new Workspace({ baseDir, workerId: 1, cloneTimeoutMs: 1000, maxRepoBytes: 1024 });
    const dir = workspace.directoryFor("acme", "widgets");
    const pack = path.join(dir, ".git", "objects", "pack", "pack-1.pack");
    await fs.outputFile(pack, "data");
    await fs.chmod(pack, 0o444);
    await fs.chmod(path.dirname(pack), 0o555);

    await workspace.cleanup(dir);

    expect(await fs.pathExists(dir)).toBe(false);
  });
});
