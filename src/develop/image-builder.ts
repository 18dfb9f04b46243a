import path from "node:path";

import type { EventLogger } from "../core/logger.js";
import type { ProgressReporter } from "../core/progress.js";

import { imageReference, type BuildId } from "./build-id.js";
import type { ImageDefinition } from "./image-discovery.js";
import type { ClusterControl } from "./ports.js";

export type BuildImagesInput = {
  definitions: ImageDefinition[];
  contextDir: string;
  buildId: BuildId;
  profile: string;
  cluster: Pick<ClusterControl, "imageBuild">;
  reporter: ProgressReporter;
  logger?: EventLogger;
};

// Builds run one at a time; the first failure stops the rest.
export async function buildImages(input: BuildImagesInput): Promise<string[]> {
  const built: string[] = [];

  for (const definition of input.definitions) {
    const image = imageReference(definition.imageName, input.buildId);
    const dockerfile = path.basename(definition.dockerfilePath);

    await input.reporter.timed(
      {
        stage: "build-image",
        start: `Building ${dockerfile} image "${image}"`,
        end: `Built ${dockerfile} image "${image}"`,
      },
      () =>
        input.cluster.imageBuild(
          definition.dockerfilePath,
          input.contextDir,
          definition.imageName,
          input.buildId,
          input.profile,
        ),
    );

    input.logger?.log({
      type: "image.build",
      stage: "build-image",
      payload: { image, dockerfile: definition.dockerfilePath },
    });
    built.push(image);
  }

  return built;
}
