// Core interfaces and types

export const CXX_STANDARDS = ["98", "11", "14", "17", "20", "23", "26"] as const;

export type CxxStandard = (typeof CXX_STANDARDS)[number];

export interface GeneratorSettings {
  projectName: string;
  cxxStandard: CxxStandard;
  cmakeMinimumVersion: string;
  dependency: string;
  extension: string;
  buildDir: string;
  outputFile: string;
}

export type SettingsKey = keyof GeneratorSettings;

export const SETTINGS_KEYS: readonly SettingsKey[] = [
  "projectName",
  "cxxStandard",
  "cmakeMinimumVersion",
  "dependency",
  "extension",
  "buildDir",
  "outputFile",
];

export interface Config {
  $schema?: string;
  defaults?: Partial<GeneratorSettings>;
  projects?: Record<string, Partial<GeneratorSettings>>;
}

export interface CollectOptions {
  extension: string;
  buildDir: string;
}

export type WriteStatus = "created" | "updated" | "unchanged";

export type GenerateResult =
  | { status: "empty"; sources: [] }
  | {
      status: "dry-run";
      sources: string[];
      content: string;
      outputPath: string;
    }
  | {
      status: "written";
      sources: string[];
      content: string;
      outputPath: string;
      writeStatus: WriteStatus;
    };

export function isCxxStandard(value: string): value is CxxStandard {
  return CXX_STANDARDS.some((std) => std === value);
}

export function isSettingsKey(key: string): key is SettingsKey {
  return SETTINGS_KEYS.some((k) => k === key);
}
