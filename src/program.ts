// Command definitions

import { Command } from "commander";
import path from "node:path";
import fsp from "node:fs/promises";
import {
  configExists,
  loadConfig,
  resolveSettings,
  parsePartialSettings,
  initProjectConfig,
} from "./config.js";
import { generate } from "./generator.js";
import { getConfigPath } from "./paths.js";
import { handleErrors, printGenerateResult } from "./report.js";
import * as logger from "./logger.js";

const VERSION = "0.1.0";

interface GenerateOptions {
  root?: string;
  output?: string;
  name?: string;
  std?: string;
  dependency?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("cmakegen")
    .description("Generate CMakeLists.txt from the C++ sources in a project tree")
    .version(VERSION)
    // Options after a subcommand name belong to the subcommand (init -C <dir>)
    .enablePositionalOptions()
    .option("-C, --root <dir>", "Directory to scan (defaults to the current directory)")
    .option("-o, --output <file>", "Descriptor file name")
    .option("--name <project>", "CMake project and target name")
    .option("--std <version>", "C++ standard (98, 11, 14, 17, 20, 23, 26)")
    .option("--dependency <name>", "Package passed to find_package")
    .option("--dry-run", "Print the descriptor instead of writing it")
    .option("--verbose", "List every collected source file")
    .option("--no-color", "Disable color output")
    .hook("preAction", (_program, actionCommand) => {
      logger.setColorEnabled(actionCommand.opts().color !== false);
    })
    .action(async (opts: GenerateOptions) => {
      await handleErrors(async () => {
        const root = path.resolve(opts.root ?? process.cwd());
        const overrides = parsePartialSettings(flagOverrides(opts), "options");
        const settings = resolveSettings(loadConfig(), root, overrides);

        const result = await generate({
          root,
          settings,
          dryRun: !!opts.dryRun,
        });

        printGenerateResult(result, settings, !!opts.verbose);
      });
    });

  // init command
  program
    .command("init")
    .description("Save project name, standard and dependency for this directory")
    .option("-C, --root <dir>", "Project directory (defaults to the current directory)")
    .option("--no-color", "Disable color output")
    .action(async (opts: { root?: string }) => {
      await handleErrors(async () => {
        await initProjectConfig(path.resolve(opts.root ?? process.cwd()));
      });
    });

  // config command
  program
    .command("config")
    .description("Show the config file location and contents")
    .option("--no-color", "Disable color output")
    .action(async () => {
      await handleErrors(async () => {
        const configPath = getConfigPath();

        logger.header("cmakegen config");

        logger.info("  Config file:");
        logger.dim(`    ${configPath}`);

        if (configExists()) {
          const content = await fsp.readFile(configPath, "utf-8");
          logger.info("\n  Contents:");
          for (const line of content.trimEnd().split("\n")) {
            logger.dim(`    ${line}`);
          }
        } else {
          logger.dim("    (not created yet, built-in defaults apply)");
        }
      });
    });

  return program;
}

// --- Helpers ---

function flagOverrides(opts: GenerateOptions): Record<string, string> {
  const flags: Record<string, string | undefined> = {
    outputFile: opts.output,
    projectName: opts.name,
    cxxStandard: opts.std,
    dependency: opts.dependency,
  };

  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) defined[key] = value;
  }
  return defined;
}
