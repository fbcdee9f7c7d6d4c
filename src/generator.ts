// Collect sources and emit the build descriptor

import path from "node:path";
import { collectSources } from "./collector.js";
import { renderCMakeLists, writeCMakeLists } from "./emitter.js";
import type { GenerateResult, GeneratorSettings } from "./types.js";

export interface GenerateParams {
  root: string;
  settings: GeneratorSettings;
  dryRun: boolean;
}

/**
 * One full regeneration. An empty scan is not an error: the result says
 * so and the existing descriptor, if any, is left alone.
 */
export async function generate(params: GenerateParams): Promise<GenerateResult> {
  const { root, settings, dryRun } = params;

  const sources = collectSources(root, {
    extension: settings.extension,
    buildDir: settings.buildDir,
  });

  if (sources.length === 0) {
    return { status: "empty", sources: [] };
  }

  const content = renderCMakeLists(sources, settings);
  const outputPath = path.join(root, settings.outputFile);

  if (dryRun) {
    return { status: "dry-run", sources, content, outputPath };
  }

  const writeStatus = await writeCMakeLists(root, settings.outputFile, content);
  return { status: "written", sources, content, outputPath, writeStatus };
}
