// Human-readable run summaries

import { ConfigError, ScanError, WriteError } from "./errors.js";
import * as logger from "./logger.js";
import type {
  GenerateResult,
  GeneratorSettings,
  WriteStatus,
} from "./types.js";

const ISSUE_HINT = "If this is a bug, please report it with the command you ran.";

export function pluralize(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? "s" : ""}`;
}

export function printGenerateResult(
  result: GenerateResult,
  settings: GeneratorSettings,
  verbose: boolean,
): void {
  const { extension, outputFile } = settings;

  switch (result.status) {
    case "empty":
      logger.warn(
        `  No *${extension} files found. ${outputFile} was not written.`,
      );
      return;
    case "dry-run":
      logger.raw(result.content);
      return;
    case "written":
      if (verbose) {
        for (const source of result.sources) {
          logger.dim(`    ${source}`);
        }
      }
      logger.success(
        `  ${outputFile} ${describeWrite(result.writeStatus)}, found ${pluralize(result.sources.length, `${extension} file`)}.`,
      );
      return;
  }
}

function describeWrite(status: WriteStatus): string {
  switch (status) {
    case "created":
      return "created";
    case "updated":
      return "updated";
    case "unchanged":
      return "written (no changes)";
  }
}

/**
 * Run a command body, turning known failures into a message and a
 * non-zero exit code instead of a crash.
 */
export async function handleErrors(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (
      err instanceof ConfigError ||
      err instanceof ScanError ||
      err instanceof WriteError
    ) {
      logger.error(`\n  ${err.userMessage}`);
      process.exitCode = 1;
    } else {
      const message =
        err instanceof Error ? (err.stack ?? err.message) : String(err);
      logger.error(`\n  Unexpected error: ${message}`);
      logger.dim(`\n  ${ISSUE_HINT}`);
      process.exitCode = 1;
    }
  }
}
