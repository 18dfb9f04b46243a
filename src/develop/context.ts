/**
 * Composition root for develop runs.
 * Purpose: wire the default git, minikube, template, and qhub CLI adapters into DevelopPorts.
 * Assumptions: adapters are thin and overrideable per port for tests.
 * Usage: buildDevelopContext({ tools, ports: { cluster: fakeCluster } }).
 */

import type { AnsiFormatter } from "../core/error-format.js";
import type { EventLogger } from "../core/logger.js";
import { createDefaultConfigRenderer } from "../providers/default-config.js";
import { createGitSourceControl } from "../providers/git.js";
import { createMinikubeCluster } from "../providers/minikube.js";
import { createQhubDeployer, createQhubTemplateRenderer } from "../providers/qhub.js";

import type { ToolOptions } from "./options.js";
import type { DevelopContext } from "./pipeline.js";
import type { DevelopPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildDevelopContextInput = {
  tools: ToolOptions;
  ports?: Partial<DevelopPorts>;
  cwd?: string;
  logger?: EventLogger;
  write?: (line: string) => void;
  format?: AnsiFormatter;
};

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(tools: ToolOptions): DevelopPorts {
  return {
    sourceControl: createGitSourceControl(),
    cluster: createMinikubeCluster({ bin: tools.minikubeBin }),
    configRenderer: createDefaultConfigRenderer(),
    templateRenderer: createQhubTemplateRenderer({ bin: tools.qhubBin }),
    deployer: createQhubDeployer({ bin: tools.qhubBin }),
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildDevelopContext(input: BuildDevelopContextInput): DevelopContext {
  const ports: DevelopPorts = {
    ...createDefaultPorts(input.tools),
    ...input.ports,
  };

  return {
    ports,
    cwd: input.cwd,
    logger: input.logger,
    write: input.write,
    format: input.format,
  };
}
