/**
 * Collaborator ports for the develop pipeline.
 * Purpose: keep git, minikube, config rendering, and qhub render/deploy behind injectable interfaces.
 * Assumptions: every call is awaited sequentially; implementations raise on failure.
 * Usage: createDefaultPorts({ minikubeBin, qhubBin }) and override single ports in tests.
 */

import type { QhubConfig, SynthesizedConfig } from "../core/qhub-config.js";

// =============================================================================
// TYPES
// =============================================================================

export interface SourceControl {
  findRepoRoot(startDir: string): string | null;
  currentSha(repoRoot: string): Promise<string>;
}

export interface ClusterControl {
  start(kubernetesVersion: string, profile: string): Promise<void>;
  status(profile: string): Promise<boolean>;
  configureMetallb(profile: string): Promise<void>;
  addonsEnable(addon: string, profile: string): Promise<void>;
  imageBuild(
    dockerfilePath: string,
    contextDir: string,
    imageName: string,
    tag: string,
    profile: string,
  ): Promise<void>;
  downloadBinary(): Promise<string>;
}

export type DefaultConfigOptions = {
  domain: string;
  cloudProvider: "local";
  ciProvider: "none";
  repository: null;
  authProvider: "password";
  namespace: string;
  repositoryAutoProvision: false;
  authAutoProvision: false;
  terraformState: string | null;
  disablePrompt: true;
};

export interface ConfigRenderer {
  renderDefaultConfig(projectName: string, options: DefaultConfigOptions): Promise<QhubConfig>;
}

export interface TemplateRenderer {
  renderTemplates(outputDir: string, configPath: string, opts: { force: boolean }): Promise<void>;
}

export type DeployOptions = {
  cwd: string;
  dnsProvider: string | null;
  dnsAutoProvision: boolean;
  disablePrompt: boolean;
  verbose: boolean;
};

export interface Deployer {
  /** Deploys the qhub-config.yaml persisted in `options.cwd`; `config` is the frozen snapshot of that file. */
  deploy(config: SynthesizedConfig, options: DeployOptions): Promise<void>;
}

export type DevelopPorts = {
  sourceControl: SourceControl;
  cluster: ClusterControl;
  configRenderer: ConfigRenderer;
  templateRenderer: TemplateRenderer;
  deployer: Deployer;
};
