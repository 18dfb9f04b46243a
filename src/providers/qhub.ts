/**
 * qhub CLI adapters for rendering and deployment.
 * Purpose: run `qhub render` and `qhub deploy` against the synthesized qhub-config.yaml.
 * Assumptions: the config file has already been written to the develop directory.
 * Usage: createQhubTemplateRenderer({ bin }); createQhubDeployer({ bin }).
 */

import path from "node:path";

import { execa } from "execa";

import { DeployError } from "../core/errors.js";
import { QHUB_CONFIG_FILENAME, type SynthesizedConfig } from "../core/qhub-config.js";
import type { Deployer, DeployOptions, TemplateRenderer } from "../develop/ports.js";

export type QhubCliOptions = {
  bin?: string;
};

export function createQhubTemplateRenderer(options: QhubCliOptions = {}): TemplateRenderer {
  const bin = options.bin ?? "qhub";

  return {
    async renderTemplates(outputDir, configPath, opts) {
      const args = buildRenderArgs(outputDir, configPath, opts.force);
      try {
        await execa(bin, args, { stdio: "inherit" });
      } catch (err) {
        throw new DeployError(`qhub render failed for ${configPath}`, err);
      }
    },
  };
}

export function createQhubDeployer(options: QhubCliOptions = {}): Deployer {
  const bin = options.bin ?? "qhub";

  return {
    // qhub reads qhub-config.yaml from opts.cwd; config only names the project in failures.
    async deploy(config, opts) {
      const args = buildDeployArgs(opts);
      try {
        await execa(bin, args, { cwd: opts.cwd, stdio: opts.verbose ? "inherit" : "pipe" });
      } catch (err) {
        throw new DeployError(`qhub deploy failed for project ${describeProject(config)}`, err);
      }
    },
  };
}

export function buildRenderArgs(outputDir: string, configPath: string, force: boolean): string[] {
  const args = ["render", "--config", path.resolve(configPath), "--output", path.resolve(outputDir)];
  if (force) args.push("--force");
  return args;
}

export function buildDeployArgs(opts: Omit<DeployOptions, "cwd">): string[] {
  const args = ["deploy", "--config", QHUB_CONFIG_FILENAME];
  if (opts.dnsProvider) args.push("--dns-provider", opts.dnsProvider);
  if (opts.dnsAutoProvision) args.push("--dns-auto-provision");
  if (opts.disablePrompt) args.push("--disable-prompt");
  return args;
}

function describeProject(config: SynthesizedConfig): string {
  const name = config.project_name;
  return typeof name === "string" && name.length > 0 ? name : "(unnamed)";
}
