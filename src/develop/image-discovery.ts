import fs from "node:fs";
import path from "node:path";

import { DirectoryNotFoundError } from "../core/errors.js";

export const DOCKERFILE_PREFIX = "Dockerfile";

export type ImageDefinition = {
  dockerfilePath: string;
  imageName: string;
};

export type DiscoveredImages = {
  dockerfilePaths: string[];
  imageNames: string[];
  definitions: ImageDefinition[];
};

// Non-recursive; entries keep the order of the directory listing.
export function listDockerfileImages(directory: string): DiscoveredImages {
  let entries: string[];
  try {
    entries = fs.readdirSync(directory);
  } catch (err) {
    throw new DirectoryNotFoundError(directory, err);
  }

  const dockerfilePaths: string[] = [];
  const imageNames: string[] = [];
  const definitions: ImageDefinition[] = [];

  for (const entry of entries) {
    if (!entry.startsWith(DOCKERFILE_PREFIX)) continue;

    const dockerfilePath = path.join(directory, entry);
    const imageName = path.extname(entry).slice(1);
    dockerfilePaths.push(dockerfilePath);
    imageNames.push(imageName);
    definitions.push({ dockerfilePath, imageName });
  }

  return { dockerfilePaths, imageNames, definitions };
}
