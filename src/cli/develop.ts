import type { Command } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLineKind,
} from "../core/error-format.js";
import { buildDevelopContext } from "../develop/context.js";
import { parseDevelopOptions, parseToolOptions } from "../develop/options.js";
import { runDevelop, type DevelopContext, type DevelopResult } from "../develop/pipeline.js";

// =============================================================================
// TYPES
// =============================================================================

export type DevelopCommandFlags = {
  profile?: string;
  kubernetesVersion?: string;
  domain?: string;
  config?: string;
  buildImages?: boolean;
  quiet?: boolean;
  debug?: boolean;
  minikubeBin?: string;
  qhubBin?: string;
};

export type DevelopCommandDeps = {
  createContext?: (flags: DevelopCommandFlags, format: AnsiFormatter) => DevelopContext;
  writeError?: (line: string) => void;
  errorStream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerDevelopCommand(program: Command, deps: DevelopCommandDeps = {}): void {
  program
    .command("develop")
    .description("Start minikube, build QHub images, and deploy a local development QHub")
    .option("--profile <name>", "Minikube profile name")
    .option("--kubernetes-version <version>", "Kubernetes version for minikube")
    .option("--domain <domain>", "Domain written into qhub-config.yaml")
    .option("--config <path>", "Base qhub-config.yaml to start from instead of the default")
    .option("--no-build-images", "Reuse previously built images instead of rebuilding")
    .option("--quiet", "Hide stage timing banners", false)
    .option("--debug", "Print error codes, causes, and stacks on failure", false)
    .option("--minikube-bin <path>", "minikube binary (env: QHUB_DEVELOP_MINIKUBE_BIN)")
    .option("--qhub-bin <path>", "qhub binary (env: QHUB_DEVELOP_QHUB_BIN)")
    .action(async (opts: DevelopCommandFlags) => {
      await developCommand(opts, deps);
    });
}

// =============================================================================
// DEVELOP COMMAND
// =============================================================================

export async function developCommand(
  flags: DevelopCommandFlags,
  deps: DevelopCommandDeps = {},
): Promise<DevelopResult | null> {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: process.stdout, useColor: deps.useColor }),
  );
  const errorFormat = createAnsiFormatter(
    resolveColorEnabled({ stream: deps.errorStream ?? process.stderr, useColor: deps.useColor }),
  );
  const writeError = deps.writeError ?? ((line: string) => console.error(line));

  try {
    const options = parseDevelopOptions({
      verbose: !flags.quiet,
      buildImages: flags.buildImages ?? true,
      profile: flags.profile,
      kubernetesVersion: flags.kubernetesVersion,
      domain: flags.domain,
      config: flags.config,
    });
    const context = deps.createContext
      ? deps.createContext(flags, format)
      : buildDevelopContext({ tools: parseToolOptions(flags), format });

    return await runDevelop(options, context);
  } catch (err) {
    for (const line of formatErrorLines(err, { mode: flags.debug ? "debug" : "short" })) {
      writeError(errorFormat(line.text, ERROR_LINE_STYLES[line.kind]));
    }
    process.exitCode = 1;
    return null;
  }
}

const ERROR_LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};
