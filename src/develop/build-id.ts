import { GitError } from "../core/errors.js";

import type { SourceControl } from "./ports.js";

declare const BUILD_ID_BRAND: unique symbol;

/** Source revision that tags every image built in a run and every image reference written to its config. */
export type BuildId = string & { readonly [BUILD_ID_BRAND]: true };

export async function readBuildId(sourceControl: SourceControl, repoRoot: string): Promise<BuildId> {
  const sha = await sourceControl.currentSha(repoRoot);
  return toBuildId(sha);
}

export function toBuildId(value: string): BuildId {
  const trimmed = value.trim();
  if (!isBuildId(trimmed)) {
    throw new GitError(`Invalid build id "${value}": image tags allow only [A-Za-z0-9._-]`);
  }
  return trimmed;
}

function isBuildId(value: string): value is BuildId {
  return /^[A-Za-z0-9._-]+$/.test(value);
}

export function imageReference(imageName: string, buildId: BuildId): string {
  return `${imageName}:${buildId}`;
}
