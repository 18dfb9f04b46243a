/**
 * Configuration synthesis for the develop pipeline.
 * Purpose: load or generate qhub-config.yaml, override the domain, inject built image tags, persist.
 * Assumptions: the build id passed here is the same value used to tag the built images.
 * Usage: const config = await initializeConfiguration({ directory, buildId, buildImages, domain, renderer, reporter }).
 */

import path from "node:path";

import { ConfigStructureError } from "../core/errors.js";
import type { EventLogger } from "../core/logger.js";
import type { ProgressReporter } from "../core/progress.js";
import {
  freezeConfig,
  isRecord,
  loadQhubConfig,
  qhubConfigPath,
  writeQhubConfig,
  type QhubConfig,
  type SynthesizedConfig,
} from "../core/qhub-config.js";

import { imageReference, type BuildId } from "./build-id.js";
import type { ConfigRenderer, DefaultConfigOptions } from "./ports.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEVELOP_PROJECT_NAME = "qhubdevelop";
export const DEVELOP_NAMESPACE = "dev";

/** default_images key -> image name produced by the matching Dockerfile. */
export const BUILT_IMAGE_COMPONENTS = {
  jupyterhub: "jupyterhub",
  jupyterlab: "jupyterlab",
  dask_worker: "dask-worker",
  dask_gateway: "dask-gateway",
  conda_store: "conda-store",
} as const;

// =============================================================================
// TYPES
// =============================================================================

export type InitializeConfigurationInput = {
  directory: string;
  buildId: BuildId;
  buildImages: boolean;
  domain: string;
  configPath?: string;
  cwd?: string;
  renderer: ConfigRenderer;
  reporter: ProgressReporter;
  logger?: EventLogger;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function initializeConfiguration(
  input: InitializeConfigurationInput,
): Promise<SynthesizedConfig> {
  const targetPath = qhubConfigPath(input.directory);
  const config = await loadBaseConfiguration(input);

  config.domain = input.domain;

  if (input.buildImages) {
    applyImageTags(config, input.buildId);
  }

  input.reporter.print(`Generated QHub configuration at path=${targetPath}`);
  writeQhubConfig(targetPath, config);
  input.logger?.log({
    type: "config.write",
    stage: "synthesize-config",
    payload: { path: targetPath, domain: input.domain, images_overridden: input.buildImages },
  });

  return freezeConfig(config);
}

export function defaultConfigOptions(domain: string): DefaultConfigOptions {
  return {
    domain,
    cloudProvider: "local",
    ciProvider: "none",
    repository: null,
    authProvider: "password",
    namespace: DEVELOP_NAMESPACE,
    repositoryAutoProvision: false,
    authAutoProvision: false,
    terraformState: null,
    disablePrompt: true,
  };
}

export function applyImageTags(config: QhubConfig, buildId: BuildId): void {
  const defaultImages: Record<string, string> = {};
  for (const [component, imageName] of Object.entries(BUILT_IMAGE_COMPONENTS)) {
    defaultImages[component] = imageReference(imageName, buildId);
  }
  config.default_images = defaultImages;

  const profiles = config.profiles;
  if (!isRecord(profiles)) {
    throw new ConfigStructureError("profiles", "a mapping");
  }

  const jupyterlabProfiles: unknown = profiles.jupyterlab;
  if (!Array.isArray(jupyterlabProfiles)) {
    throw new ConfigStructureError("profiles.jupyterlab", "a list");
  }
  const jupyterlabImage = imageReference(BUILT_IMAGE_COMPONENTS.jupyterlab, buildId);
  jupyterlabProfiles.forEach((profile: unknown, index) => {
    if (!isRecord(profile)) {
      throw new ConfigStructureError(`profiles.jupyterlab[${index}]`, "a mapping");
    }
    const override = profile.kubespawner_override;
    if (!isRecord(override)) {
      throw new ConfigStructureError(
        `profiles.jupyterlab[${index}].kubespawner_override`,
        "a mapping",
      );
    }
    override.image = jupyterlabImage;
  });

  const daskWorkerProfiles = profiles.dask_worker;
  if (!isRecord(daskWorkerProfiles)) {
    throw new ConfigStructureError("profiles.dask_worker", "a mapping");
  }
  const daskWorkerImage = imageReference(BUILT_IMAGE_COMPONENTS.dask_worker, buildId);
  for (const [name, profile] of Object.entries(daskWorkerProfiles)) {
    if (!isRecord(profile)) {
      throw new ConfigStructureError(`profiles.dask_worker.${name}`, "a mapping");
    }
    profile.image = daskWorkerImage;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function loadBaseConfiguration(input: InitializeConfigurationInput): Promise<QhubConfig> {
  if (input.configPath) {
    const basePath = path.resolve(input.cwd ?? process.cwd(), input.configPath);
    input.reporter.print(`Using base configuration at ${basePath}`);
    return loadQhubConfig(basePath);
  }

  input.reporter.print("Generating default configuration");
  return input.renderer.renderDefaultConfig(DEVELOP_PROJECT_NAME, defaultConfigOptions(input.domain));
}
