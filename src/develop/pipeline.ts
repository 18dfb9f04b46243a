/**
 * Develop pipeline entrypoint.
 * Purpose: provision minikube, build images, synthesize qhub-config.yaml, render, and deploy, in order.
 * Assumptions: every stage is fail-fast; completed stages are never rolled back (the cluster stays up).
 * Usage: await runDevelop(parseDevelopOptions({}), { ports: createDefaultPorts(tools) }).
 */

import type { AnsiFormatter } from "../core/error-format.js";
import { NotInRepositoryError } from "../core/errors.js";
import { JsonlLogger, type EventLogger } from "../core/logger.js";
import { createProgressReporter, type ProgressReporter } from "../core/progress.js";
import { QHUB_CONFIG_FILENAME, qhubConfigPath, type SynthesizedConfig } from "../core/qhub-config.js";

import { readBuildId, type BuildId } from "./build-id.js";
import { provisionCluster } from "./cluster.js";
import { initializeConfiguration } from "./config-synthesizer.js";
import { buildImages } from "./image-builder.js";
import { listDockerfileImages } from "./image-discovery.js";
import type { DevelopOptions } from "./options.js";
import { developDirectoryPath, developLogPath, imageDirectoryPath } from "./paths.js";
import type { DevelopPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type DevelopContext = {
  ports: DevelopPorts;
  cwd?: string;
  logger?: EventLogger;
  write?: (line: string) => void;
  format?: AnsiFormatter;
  now?: () => number;
};

export type DevelopResult = {
  buildId: BuildId;
  repoRoot: string;
  developDirectory: string;
  config: SynthesizedConfig;
  images: string[];
  minikubePath: string;
};

export const DEV_GUIDE_URL = "https://docs.qhub.dev/en/stable/source/dev_guide/";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runDevelop(
  options: DevelopOptions,
  context: DevelopContext,
): Promise<DevelopResult> {
  const { ports } = context;
  const cwd = context.cwd ?? process.cwd();

  const repoRoot = ports.sourceControl.findRepoRoot(cwd);
  if (repoRoot === null) {
    throw new NotInRepositoryError(cwd);
  }

  const buildId = await readBuildId(ports.sourceControl, repoRoot);
  const developDirectory = developDirectoryPath(repoRoot);
  const logger =
    context.logger ?? new JsonlLogger(developLogPath(repoRoot, buildId), { build_id: buildId });
  const reporter = createProgressReporter({
    verbose: options.verbose,
    logger,
    write: context.write,
    format: context.format,
    now: context.now,
  });

  logger.log({
    type: "develop.start",
    payload: {
      build_id: buildId,
      profile: options.profile,
      kubernetes_version: options.kubernetesVersion,
      build_images: options.buildImages,
      domain: options.domain,
    },
  });

  await provisionCluster({
    cluster: ports.cluster,
    kubernetesVersion: options.kubernetesVersion,
    profile: options.profile,
    reporter,
  });

  const images = options.buildImages
    ? await buildDevelopImages({ repoRoot, buildId, options, ports, reporter, logger })
    : [];

  reporter.rule("Installing QHub");
  const config = await reporter.timed(
    {
      stage: "synthesize-config",
      start: `Initializing ${QHUB_CONFIG_FILENAME} in directory=${developDirectory}`,
      end: `Initialized ${QHUB_CONFIG_FILENAME} in directory=${developDirectory}`,
    },
    () =>
      initializeConfiguration({
        directory: developDirectory,
        buildId,
        buildImages: options.buildImages,
        domain: options.domain,
        configPath: options.config,
        cwd,
        renderer: ports.configRenderer,
        reporter,
        logger,
      }),
  );

  await reporter.timed(
    {
      stage: "render",
      start: `Rendering ${QHUB_CONFIG_FILENAME} terraform files to directory=${developDirectory}`,
      end: `Rendered ${QHUB_CONFIG_FILENAME} terraform files to directory=${developDirectory}`,
    },
    () =>
      ports.templateRenderer.renderTemplates(developDirectory, qhubConfigPath(developDirectory), {
        force: true,
      }),
  );

  await reporter.timed(
    {
      stage: "deploy",
      start: `Deploying QHub from directory=${developDirectory}`,
      end: `Deployed QHub from directory=${developDirectory}`,
    },
    () =>
      ports.deployer.deploy(config, {
        cwd: developDirectory,
        dnsProvider: null,
        dnsAutoProvision: false,
        disablePrompt: true,
        verbose: options.verbose,
      }),
  );

  const minikubePath = await ports.cluster.downloadBinary();
  reporter.print(`Development documentation ${DEV_GUIDE_URL}`);
  reporter.print(
    `When done with development delete the minikube cluster via "${minikubePath} delete --profile=${options.profile}"`,
  );

  logger.log({
    type: "develop.complete",
    payload: { build_id: buildId, images, develop_directory: developDirectory },
  });

  return { buildId, repoRoot, developDirectory, config, images, minikubePath };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function buildDevelopImages(args: {
  repoRoot: string;
  buildId: BuildId;
  options: DevelopOptions;
  ports: DevelopPorts;
  reporter: ProgressReporter;
  logger: EventLogger;
}): Promise<string[]> {
  const imageDirectory = imageDirectoryPath(args.repoRoot);

  args.reporter.rule("Building Docker images");
  return args.reporter.timed(
    {
      stage: "build-images",
      start: `Building Docker images from directory=${imageDirectory}`,
      end: `Built Docker images from directory=${imageDirectory}`,
    },
    async () => {
      const discovered = listDockerfileImages(imageDirectory);
      return buildImages({
        definitions: discovered.definitions,
        contextDir: imageDirectory,
        buildId: args.buildId,
        profile: args.options.profile,
        cluster: args.ports.cluster,
        reporter: args.reporter,
        logger: args.logger,
      });
    },
  );
}
