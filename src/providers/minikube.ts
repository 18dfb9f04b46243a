/**
 * Minikube-backed cluster control.
 * Purpose: map ClusterControl calls onto the minikube CLI (start, status, metallb, image build).
 * Assumptions: minikube drives its own timeouts; no call here retries.
 * Usage: createMinikubeCluster({ bin: "minikube" }) and inject as the pipeline's cluster port.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { ClusterError, ImageBuildError } from "../core/errors.js";
import type { ClusterControl } from "../develop/ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type MinikubeOptions = {
  bin?: string;
  env?: NodeJS.ProcessEnv;
  cacheDir?: string;
  version?: string;
};

export type MetallbRange = {
  start: string;
  end: string;
};

export const MINIKUBE_VERSION = "v1.22.0";
const METALLB_RANGE_START = 100;
const METALLB_RANGE_END = 150;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createMinikubeCluster(options: MinikubeOptions = {}): ClusterControl {
  const bin = options.bin ?? "minikube";
  const env = options.env ?? process.env;
  const version = options.version ?? MINIKUBE_VERSION;
  const cacheDir = options.cacheDir ?? path.join(os.homedir(), ".cache", "qhub-develop");

  return {
    async start(kubernetesVersion, profile) {
      try {
        const args = ["start", `--kubernetes-version=${kubernetesVersion}`, `--profile=${profile}`];
        await execa(bin, args, { stdio: "inherit" });
      } catch (err) {
        throw new ClusterError(`minikube start failed for profile ${profile}`, err);
      }
    },

    async status(profile) {
      const result = await execa(bin, ["status", `--profile=${profile}`], {
        stdio: "pipe",
        reject: false,
      });
      return result.exitCode === 0;
    },

    async configureMetallb(profile) {
      const ip = await clusterIp(bin, profile);
      const range = metallbRange(ip);
      try {
        await execa(bin, ["addons", "configure", "metallb", `--profile=${profile}`], {
          input: `${range.start}\n${range.end}\n`,
          stdio: ["pipe", "pipe", "pipe"],
        });
      } catch (err) {
        throw new ClusterError(`Failed to configure metallb for profile ${profile}`, err);
      }
    },

    async addonsEnable(addon, profile) {
      try {
        await execa(bin, ["addons", "enable", addon, `--profile=${profile}`], { stdio: "pipe" });
      } catch (err) {
        throw new ClusterError(`Failed to enable minikube addon ${addon}`, err);
      }
    },

    async imageBuild(dockerfilePath, contextDir, imageName, tag, profile) {
      const image = `${imageName}:${tag}`;
      const dockerfile = path.relative(contextDir, dockerfilePath);
      try {
        await execa(
          bin,
          ["image", "build", "-t", image, "-f", dockerfile, contextDir, `--profile=${profile}`],
          { stdio: "inherit" },
        );
      } catch (err) {
        throw new ImageBuildError(`Failed to build image "${image}" from ${dockerfilePath}`, err);
      }
    },

    async downloadBinary() {
      const located = locateBinary(bin, env.PATH);
      if (located) return located;

      const target = path.join(cacheDir, `minikube-${version}`);
      if (isExecutableFile(target)) return target;

      await downloadRelease(minikubeDownloadUrl(version, process.platform, process.arch), target);
      return target;
    },
  };
}

export function metallbRange(clusterIpAddress: string): MetallbRange {
  const octets = clusterIpAddress.trim().split(".");
  if (octets.length !== 4 || octets.some((octet) => !/^\d{1,3}$/.test(octet))) {
    throw new ClusterError(`minikube ip returned an unexpected address: "${clusterIpAddress}"`);
  }

  const prefix = octets.slice(0, 3).join(".");
  return {
    start: `${prefix}.${METALLB_RANGE_START}`,
    end: `${prefix}.${METALLB_RANGE_END}`,
  };
}

export function locateBinary(bin: string, searchPath: string | undefined): string | null {
  if (bin.includes("/") || bin.includes("\\")) {
    const resolved = path.resolve(bin);
    return isExecutableFile(resolved) ? resolved : null;
  }

  for (const dir of (searchPath ?? "").split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, bin);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

export function minikubeDownloadUrl(
  version: string,
  platform: NodeJS.Platform,
  arch: string,
): string {
  const osName = platform === "win32" ? "windows" : platform;
  const archName = arch === "x64" ? "amd64" : arch;
  const suffix = platform === "win32" ? ".exe" : "";
  return `https://github.com/kubernetes/minikube/releases/download/${version}/minikube-${osName}-${archName}${suffix}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function clusterIp(bin: string, profile: string): Promise<string> {
  try {
    const result = await execa(bin, ["ip", `--profile=${profile}`], { stdio: "pipe" });
    return result.stdout.trim();
  } catch (err) {
    throw new ClusterError(`Unable to read minikube ip for profile ${profile}`, err);
  }
}

async function downloadRelease(url: string, target: string): Promise<void> {
  const response = await fetch(url).catch((err: unknown) => {
    throw new ClusterError(`Failed to download minikube from ${url}`, err);
  });
  if (!response.ok) {
    throw new ClusterError(`Failed to download minikube from ${url}: HTTP ${response.status}`);
  }

  // Only a complete, executable file is ever moved to the cached path.
  const partial = `${target}.tmp`;
  try {
    const body = Buffer.from(await response.arrayBuffer());
    await fse.outputFile(partial, body);
    await fse.chmod(partial, 0o755);
    await fse.move(partial, target, { overwrite: true });
  } catch (err) {
    await fse.remove(partial);
    throw new ClusterError(`Failed to install minikube to ${target}`, err);
  }
}

function isExecutableFile(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}
