// Config read/write/locate and settings resolution

import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { input, select } from "@inquirer/prompts";
import { getConfigPath, normalizePath } from "./paths.js";
import { ConfigError, errorCode } from "./errors.js";
import * as logger from "./logger.js";
import { CXX_STANDARDS, isCxxStandard, isSettingsKey } from "./types.js";
import type { Config, GeneratorSettings } from "./types.js";

const SCHEMA_URL =
  "https://cdn.jsdelivr.net/npm/cmakegen@latest/schema.json";

export const DEFAULT_SETTINGS: Readonly<GeneratorSettings> = {
  projectName: "VulkanSandbox",
  cxxStandard: "20",
  cmakeMinimumVersion: "3.20",
  dependency: "Vulkan",
  extension: ".cpp",
  buildDir: "build",
  outputFile: "CMakeLists.txt",
};

const CMAKE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_.+-]*$/;
const CMAKE_VERSION = /^\d+(\.\d+){0,3}$/;

export function configExists(): boolean {
  return fs.existsSync(getConfigPath());
}

export function loadConfig(): Config | null {
  const configPath = getConfigPath();
  let raw: string;

  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err: unknown) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(message, extractLineColumn(message, raw));
  }

  return parseConfig(parsed);
}

function extractLineColumn(
  message: string,
  raw: string,
): { line: number; column: number } | undefined {
  // Newer Node releases report "at line X column Y"
  const lineColMatch = message.match(/at line (\d+) column (\d+)/);
  if (lineColMatch) {
    return {
      line: parseInt(lineColMatch[1], 10),
      column: parseInt(lineColMatch[2], 10),
    };
  }

  // Node 20 reports "at position N"
  const posMatch = message.match(/at position (\d+)/);
  if (posMatch) {
    const pos = parseInt(posMatch[1], 10);
    const lines = raw.slice(0, pos).split("\n");
    return {
      line: lines.length,
      column: lines[lines.length - 1].length + 1,
    };
  }

  return undefined;
}

/**
 * Validate a parsed config document. Unknown keys are rejected so that a
 * typo in a setting name does not silently fall back to the default.
 */
export function parseConfig(value: unknown): Config {
  if (!isRecord(value)) {
    throw new ConfigError("config must be a JSON object");
  }

  const config: Config = {};

  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case "$schema":
        if (typeof entry !== "string") {
          throw new ConfigError(`"$schema" must be a string`);
        }
        config.$schema = entry;
        break;
      case "defaults":
        config.defaults = parsePartialSettings(entry, "defaults");
        break;
      case "projects": {
        if (!isRecord(entry)) {
          throw new ConfigError(`"projects" must be an object`);
        }
        const projects: Record<string, Partial<GeneratorSettings>> = {};
        for (const [root, settings] of Object.entries(entry)) {
          projects[root] = parsePartialSettings(settings, `projects["${root}"]`);
        }
        config.projects = projects;
        break;
      }
      default:
        throw new ConfigError(`unknown key "${key}"`);
    }
  }

  return config;
}

export function parsePartialSettings(
  value: unknown,
  where: string,
): Partial<GeneratorSettings> {
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be an object`);
  }

  const settings: Partial<GeneratorSettings> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isSettingsKey(key)) {
      throw new ConfigError(`unknown setting "${key}" in ${where}`);
    }
    if (typeof entry !== "string") {
      throw new ConfigError(`${where}.${key} must be a string`);
    }
    const problem = validateSetting(key, entry);
    if (problem) {
      throw new ConfigError(`${where}.${key} ${problem}`);
    }
    if (key === "cxxStandard") {
      if (isCxxStandard(entry)) settings.cxxStandard = entry;
    } else {
      settings[key] = entry;
    }
  }
  return settings;
}

/**
 * Check a single setting value. Returns a description of the problem,
 * or null when the value is acceptable.
 */
export function validateSetting(
  key: keyof GeneratorSettings,
  value: string,
): string | null {
  switch (key) {
    case "projectName":
    case "dependency":
      return CMAKE_IDENTIFIER.test(value)
        ? null
        : `must be a CMake identifier, got "${value}"`;
    case "cxxStandard":
      return isCxxStandard(value)
        ? null
        : `must be one of ${CXX_STANDARDS.join(", ")}, got "${value}"`;
    case "cmakeMinimumVersion":
      return CMAKE_VERSION.test(value)
        ? null
        : `must be a version like 3.20, got "${value}"`;
    case "extension":
      return value.length > 1 && value.startsWith(".")
        ? null
        : `must start with "." and name a suffix, got "${value}"`;
    case "buildDir":
    case "outputFile":
      return isSingleSegment(value)
        ? null
        : `must be a single file name, got "${value}"`;
  }
}

function isSingleSegment(value: string): boolean {
  return (
    value.length > 0 &&
    value !== "." &&
    value !== ".." &&
    !value.includes("/") &&
    !value.includes("\\")
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function saveConfig(config: Config): Promise<void> {
  const configPath = getConfigPath();
  const dir = path.dirname(configPath);

  await fsp.mkdir(dir, { recursive: true });

  const toWrite: Config = { $schema: SCHEMA_URL, ...config };
  toWrite.$schema = SCHEMA_URL;

  await fsp.writeFile(configPath, JSON.stringify(toWrite, null, 2) + "\n");
}

/**
 * Layer settings for a scan root: built-in defaults, then the config's
 * `defaults`, then any `projects` entry whose key normalizes to the same
 * root, then explicit overrides (CLI flags).
 */
export function resolveSettings(
  config: Config | null,
  root: string,
  overrides: Partial<GeneratorSettings> = {},
): GeneratorSettings {
  const normalizedRoot = normalizePath(root);
  let projectSettings: Partial<GeneratorSettings> = {};

  for (const [projectKey, settings] of Object.entries(config?.projects ?? {})) {
    if (normalizePath(projectKey) === normalizedRoot) {
      projectSettings = { ...projectSettings, ...settings };
    }
  }

  return {
    ...DEFAULT_SETTINGS,
    ...config?.defaults,
    ...projectSettings,
    ...overrides,
  };
}

export function setProjectSettings(
  config: Config,
  root: string,
  settings: Partial<GeneratorSettings>,
): Config {
  const updated = structuredClone(config);
  const key = normalizePath(root);
  if (!updated.projects) updated.projects = {};
  updated.projects[key] = { ...updated.projects[key], ...settings };
  return updated;
}

/**
 * Ask for the settings that differ between projects and store them as the
 * `projects` entry for `root`. Returns the saved config.
 */
export async function initProjectConfig(root: string): Promise<Config> {
  const config = loadConfig() ?? {};
  const current = resolveSettings(config, root);

  logger.header("cmakegen init");
  logger.info(`  Settings for ${normalizePath(root)} will be saved to:`);
  logger.dim(`    ${getConfigPath()}\n`);

  const projectName = await input({
    message: "Project name",
    default: current.projectName,
    validate: (value) => validateSetting("projectName", value) ?? true,
  });

  const cxxStandard = await select({
    message: "C++ standard",
    choices: CXX_STANDARDS.map((std) => ({ name: `C++${std}`, value: std })),
    default: current.cxxStandard,
  });

  const dependency = await input({
    message: "Required package (find_package name)",
    default: current.dependency,
    validate: (value) => validateSetting("dependency", value) ?? true,
  });

  const updated = setProjectSettings(config, root, {
    projectName,
    cxxStandard,
    dependency,
  });
  await saveConfig(updated);
  logger.success("\n  Config saved.");
  logger.dim('  Run "cmakegen" to generate CMakeLists.txt.');

  return updated;
}
