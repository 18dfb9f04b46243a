import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import Handlebars from "handlebars";

import { ConfigError } from "../core/errors.js";
import { parseQhubConfig, type QhubConfig } from "../core/qhub-config.js";
import type { ConfigRenderer, DefaultConfigOptions } from "../develop/ports.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export const DEFAULT_IMAGE_VERSION = "v0.3.12";

export type DefaultConfigRendererOptions = {
  templatePath?: string;
  imageVersion?: string;
};

export function createDefaultConfigRenderer(
  options: DefaultConfigRendererOptions = {},
): ConfigRenderer {
  return {
    async renderDefaultConfig(projectName, configOptions) {
      const templatePath = options.templatePath ?? resolveDefaultTemplatePath();
      return renderDefaultConfig(templatePath, projectName, configOptions, {
        imageVersion: options.imageVersion ?? DEFAULT_IMAGE_VERSION,
      });
    },
  };
}

export function renderDefaultConfig(
  templatePath: string,
  projectName: string,
  configOptions: DefaultConfigOptions,
  extra: { imageVersion: string },
): QhubConfig {
  const template = loadTemplate(templatePath);

  let output: string;
  try {
    output = template(buildTemplateValues(projectName, configOptions, extra.imageVersion));
  } catch (err) {
    throw new ConfigError(`Failed to render default configuration template ${templatePath}`, err);
  }

  if (/\{\{[^}]+\}\}/.test(output)) {
    throw new ConfigError(`Default configuration template ${templatePath} left unrendered placeholders`);
  }

  return parseQhubConfig(output, templatePath);
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_FILE = path.join("templates", "qhub-config.yaml.hbs");
const TEMPLATE_CACHE = new Map<string, Handlebars.TemplateDelegate>();

function buildTemplateValues(
  projectName: string,
  configOptions: DefaultConfigOptions,
  imageVersion: string,
): Record<string, string> {
  return {
    project_name: yamlString(projectName),
    provider: configOptions.cloudProvider,
    domain: yamlString(configOptions.domain),
    namespace: yamlString(configOptions.namespace),
    ci_cd: configOptions.ciProvider,
    auth_provider: configOptions.authProvider,
    terraform_state: configOptions.terraformState ?? "remote",
    image_version: imageVersion,
    hub_title: yamlString(`QHub - ${projectName}`),
    welcome: yamlString(`Welcome to the ${projectName} development deployment.`),
  };
}

function yamlString(value: string): string {
  return JSON.stringify(value);
}

function loadTemplate(templatePath: string): Handlebars.TemplateDelegate {
  const cached = TEMPLATE_CACHE.get(templatePath);
  if (cached) return cached;

  let source: string;
  try {
    source = fs.readFileSync(templatePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Default configuration template not found at ${templatePath}`, err);
  }

  const compiled = Handlebars.compile(source, { noEscape: true });
  TEMPLATE_CACHE.set(templatePath, compiled);
  return compiled;
}

function resolveDefaultTemplatePath(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const root = findUp(moduleDir, (dir) => fs.existsSync(path.join(dir, TEMPLATE_FILE)));
  if (!root) {
    throw new ConfigError(`Unable to locate ${TEMPLATE_FILE} above ${moduleDir}`);
  }
  return path.join(root, TEMPLATE_FILE);
}

function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
