import path from "node:path";

export const IMAGE_DIRECTORY = path.join("qhub", "template", "{{ cookiecutter.repo_directory }}", "image");

export function developDirectoryPath(repoRoot: string): string {
  return path.join(repoRoot, ".qhub", "develop");
}

export function imageDirectoryPath(repoRoot: string): string {
  return path.join(repoRoot, IMAGE_DIRECTORY);
}

export function developLogPath(repoRoot: string, buildId: string): string {
  return path.join(repoRoot, ".qhub", "logs", `develop-${buildId}.jsonl`);
}
