// Git helpers for the develop pipeline.
// Purpose: locate the enclosing checkout and read the HEAD sha used as the build id.
// Assumes git is on PATH when currentSha is called.

import fs from "node:fs";
import path from "node:path";

import { execa } from "execa";

import { GitError } from "../core/errors.js";
import type { SourceControl } from "../develop/ports.js";

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export async function currentSha(repoRoot: string): Promise<string> {
  let stdout: string;
  try {
    const result = await execa("git", ["rev-parse", "HEAD"], { cwd: repoRoot, stdio: "pipe" });
    stdout = result.stdout;
  } catch (err) {
    throw new GitError(`Unable to resolve HEAD in ${repoRoot}`, err);
  }

  const sha = stdout.trim();
  if (!sha) {
    throw new GitError(`git rev-parse HEAD returned no revision in ${repoRoot}`);
  }
  return sha;
}

export function createGitSourceControl(): SourceControl {
  return { findRepoRoot, currentSha };
}
