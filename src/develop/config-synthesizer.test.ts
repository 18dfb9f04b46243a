import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";
import YAML from "yaml";

import { ConfigLoadError, ConfigMalformedError, ConfigStructureError } from "../core/errors.js";
import { createProgressReporter } from "../core/progress.js";
import { loadQhubConfig, type QhubConfig } from "../core/qhub-config.js";

import { FakeConfigRenderer, Timeline, sampleQhubConfig } from "./__tests__/fakes.js";
import { toBuildId } from "./build-id.js";
import {
  BUILT_IMAGE_COMPONENTS,
  DEVELOP_PROJECT_NAME,
  applyImageTags,
  initializeConfiguration,
} from "./config-synthesizer.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

const BUILD_ID = toBuildId("0f1e2d3c");

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function writeYaml(dir: string, name: string, value: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, YAML.stringify(value), "utf8");
  return filePath;
}

function setup(build?: () => QhubConfig) {
  const root = makeTempDir("config-synth-");
  const output: string[] = [];
  const renderer = new FakeConfigRenderer(new Timeline(), build);
  const reporter = createProgressReporter({ verbose: true, write: (line) => output.push(line) });
  return { root, directory: path.join(root, ".qhub", "develop"), output, renderer, reporter };
}

function collectProfileImages(config: unknown): string[] {
  const doc = config as {
    profiles: {
      jupyterlab: Array<{ kubespawner_override: { image: string } }>;
      dask_worker: Record<string, { image: string }>;
    };
  };
  return [
    ...doc.profiles.jupyterlab.map((profile) => profile.kubespawner_override.image),
    ...Object.values(doc.profiles.dask_worker).map((profile) => profile.image),
  ];
}

// =============================================================================
// TESTS
// =============================================================================

describe("initializeConfiguration", () => {
  it("generates the default config with fixed local settings and prompts disabled", async () => {
    const { directory, output, renderer, reporter } = setup();

    await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: false,
      domain: "dev.example.test",
      renderer,
      reporter,
    });

    expect(renderer.calls).toEqual([
      {
        projectName: DEVELOP_PROJECT_NAME,
        options: {
          domain: "dev.example.test",
          cloudProvider: "local",
          ciProvider: "none",
          repository: null,
          authProvider: "password",
          namespace: "dev",
          repositoryAutoProvision: false,
          authAutoProvision: false,
          terraformState: null,
          disablePrompt: true,
        },
      },
    ]);
    expect(output).toEqual([
      "Generating default configuration",
      `Generated QHub configuration at path=${path.join(directory, "qhub-config.yaml")}`,
    ]);
  });

  it("tags default images and every profile image with the build id", async () => {
    const { directory, renderer, reporter } = setup();

    const config = await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: true,
      domain: "dev.example.test",
      renderer,
      reporter,
    });

    expect(config.default_images).toEqual({
      jupyterhub: "jupyterhub:0f1e2d3c",
      jupyterlab: "jupyterlab:0f1e2d3c",
      dask_worker: "dask-worker:0f1e2d3c",
      dask_gateway: "dask-gateway:0f1e2d3c",
      conda_store: "conda-store:0f1e2d3c",
    });
    expect(collectProfileImages(config)).toEqual([
      "jupyterlab:0f1e2d3c",
      "jupyterlab:0f1e2d3c",
      "dask-worker:0f1e2d3c",
      "dask-worker:0f1e2d3c",
    ]);
  });

  it("leaves images untouched when builds are disabled", async () => {
    const { directory, renderer, reporter } = setup();
    const base = sampleQhubConfig();

    const config = await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: false,
      domain: "dev.example.test",
      renderer,
      reporter,
    });

    expect(config.default_images).toEqual(base.default_images);
    expect(collectProfileImages(config)).toEqual(collectProfileImages(base));
  });

  it("overrides the domain of a loaded base config and persists it", async () => {
    const { root, directory, output, renderer, reporter } = setup();
    const basePath = writeYaml(root, "base.yaml", {
      ...sampleQhubConfig(),
      domain: "from-file.example.test",
      extra_key: { keep: true },
    });

    const config = await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: true,
      domain: "override.example.test",
      configPath: "base.yaml",
      cwd: root,
      renderer,
      reporter,
    });

    expect(renderer.calls).toHaveLength(0);
    expect(output[0]).toBe(`Using base configuration at ${basePath}`);
    expect(config.domain).toBe("override.example.test");
    expect(config.extra_key).toEqual({ keep: true });

    const reloaded = loadQhubConfig(path.join(directory, "qhub-config.yaml"));
    expect(reloaded.domain).toBe("override.example.test");
    expect(reloaded.default_images).toEqual(config.default_images);
    expect(collectProfileImages(reloaded)).toEqual(collectProfileImages(config));
  });

  it("overwrites an existing qhub-config.yaml in an existing directory", async () => {
    const { directory, renderer, reporter } = setup();
    fs.mkdirSync(directory, { recursive: true });
    fs.writeFileSync(path.join(directory, "qhub-config.yaml"), "stale: true\n", "utf8");

    await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: false,
      domain: "dev.example.test",
      renderer,
      reporter,
    });

    const reloaded = loadQhubConfig(path.join(directory, "qhub-config.yaml"));
    expect(reloaded.stale).toBeUndefined();
    expect(reloaded.project_name).toBe("qhubdevelop");
  });

  it("returns a frozen document", async () => {
    const { directory, renderer, reporter } = setup();

    const config = await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: true,
      domain: "dev.example.test",
      renderer,
      reporter,
    });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.profiles)).toBe(true);
    expect(Object.isFrozen(config.default_images)).toBe(true);
  });

  it("fails with a structural error when profiles are missing and builds are enabled", async () => {
    const { root, directory, renderer, reporter } = setup();
    writeYaml(root, "no-profiles.yaml", { project_name: "qhubdevelop", domain: "x" });

    const result = await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: true,
      domain: "dev.example.test",
      configPath: "no-profiles.yaml",
      cwd: root,
      renderer,
      reporter,
    }).catch((err: unknown) => err);

    expect(result).toBeInstanceOf(ConfigStructureError);
    expect((result as ConfigStructureError).keyPath).toBe("profiles");
    expect(fs.existsSync(path.join(directory, "qhub-config.yaml"))).toBe(false);
  });

  it("writes nothing when a jupyterlab profile lacks kubespawner_override", async () => {
    const { root, directory, renderer, reporter } = setup();
    writeYaml(root, "bare-profile.yaml", {
      project_name: "qhubdevelop",
      profiles: { jupyterlab: [{ display_name: "Bare" }], dask_worker: {} },
    });

    const result = await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: true,
      domain: "dev.example.test",
      configPath: "bare-profile.yaml",
      cwd: root,
      renderer,
      reporter,
    }).catch((err: unknown) => err);

    expect(result).toBeInstanceOf(ConfigStructureError);
    expect((result as ConfigStructureError).keyPath).toBe("profiles.jupyterlab[0].kubespawner_override");
    expect(fs.existsSync(path.join(directory, "qhub-config.yaml"))).toBe(false);
  });

  it("accepts a config without profiles when builds are disabled", async () => {
    const { root, directory, renderer, reporter } = setup();
    writeYaml(root, "no-profiles.yaml", { project_name: "qhubdevelop" });

    const config = await initializeConfiguration({
      directory,
      buildId: BUILD_ID,
      buildImages: false,
      domain: "dev.example.test",
      configPath: "no-profiles.yaml",
      cwd: root,
      renderer,
      reporter,
    });

    expect(config).toEqual({ project_name: "qhubdevelop", domain: "dev.example.test" });
  });

  it("reports unreadable and malformed override configs with their path", async () => {
    const { root, directory, renderer, reporter } = setup();
    fs.writeFileSync(path.join(root, "broken.yaml"), "key: [unclosed\n", "utf8");
    fs.writeFileSync(path.join(root, "list.yaml"), "- a\n- b\n", "utf8");

    const base = { directory, buildId: BUILD_ID, buildImages: false, domain: "d", cwd: root, renderer, reporter };

    const missing = await initializeConfiguration({ ...base, configPath: "missing.yaml" }).catch(
      (err: unknown) => err,
    );
    expect(missing).toBeInstanceOf(ConfigLoadError);
    expect((missing as ConfigLoadError).configPath).toBe(path.join(root, "missing.yaml"));

    const broken = await initializeConfiguration({ ...base, configPath: "broken.yaml" }).catch(
      (err: unknown) => err,
    );
    expect(broken).toBeInstanceOf(ConfigMalformedError);
    expect((broken as ConfigMalformedError).configPath).toBe(path.join(root, "broken.yaml"));

    const list = await initializeConfiguration({ ...base, configPath: "list.yaml" }).catch(
      (err: unknown) => err,
    );
    expect(list).toBeInstanceOf(ConfigMalformedError);
    expect((list as ConfigMalformedError).message).toBe(
      `Malformed configuration at ${path.join(root, "list.yaml")}: expected a YAML mapping at the document root`,
    );
  });
});

describe("applyImageTags", () => {
  it("rejects a jupyterlab profile without kubespawner_override", () => {
    const config: QhubConfig = {
      profiles: { jupyterlab: [{ display_name: "Bare" }], dask_worker: {} },
    };

    let error: unknown = null;
    try {
      applyImageTags(config, BUILD_ID);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigStructureError);
    expect((error as ConfigStructureError).keyPath).toBe("profiles.jupyterlab[0].kubespawner_override");
    expect((error as ConfigStructureError).message).toBe(
      'Configuration key "profiles.jupyterlab[0].kubespawner_override" must be a mapping',
    );
  });

  it("names the offending key when a profile section has the wrong shape", () => {
    const config: QhubConfig = { profiles: { jupyterlab: {}, dask_worker: {} } };

    expect(() => applyImageTags(config, BUILD_ID)).toThrow(
      'Configuration key "profiles.jupyterlab" must be a list',
    );
  });

  it("covers exactly the five built components", () => {
    expect(Object.keys(BUILT_IMAGE_COMPONENTS)).toEqual([
      "jupyterhub",
      "jupyterlab",
      "dask_worker",
      "dask_gateway",
      "conda_store",
    ]);
  });
});
