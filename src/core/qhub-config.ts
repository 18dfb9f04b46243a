/**
 * QHub configuration document model and YAML persistence.
 * Purpose: load, validate, persist, and freeze the qhub-config.yaml mapping handed to render/deploy.
 * Assumptions: unknown keys are preserved verbatim; only the image and domain fields are interpreted.
 * Usage: loadQhubConfig(path); writeQhubConfig(path, config); freezeConfig(config).
 */

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";
import YAML from "yaml";
import { z } from "zod";

import { ConfigLoadError, ConfigMalformedError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export const QHUB_CONFIG_FILENAME = "qhub-config.yaml";

export type QhubConfig = { [key: string]: unknown };

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type SynthesizedConfig = DeepReadonly<QhubConfig>;

const QhubConfigSchema = z.record(z.string(), z.unknown());

// =============================================================================
// PUBLIC API
// =============================================================================

export function qhubConfigPath(directory: string): string {
  return path.join(directory, QHUB_CONFIG_FILENAME);
}

export function parseQhubConfig(raw: string, sourcePath: string): QhubConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigMalformedError(sourcePath, detail, err);
  }

  const result = QhubConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigMalformedError(sourcePath, "expected a YAML mapping at the document root");
  }

  return result.data;
}

export function loadQhubConfig(configPath: string): QhubConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigLoadError(configPath, err);
  }

  return parseQhubConfig(raw, configPath);
}

export function writeQhubConfig(configPath: string, config: QhubConfig): void {
  fse.ensureDirSync(path.dirname(configPath));
  fs.writeFileSync(configPath, YAML.stringify(config), "utf8");
}

export function freezeConfig(config: QhubConfig): SynthesizedConfig {
  return deepFreeze(config);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// INTERNALS
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}
