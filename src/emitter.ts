// CMakeLists.txt rendering and writing

import fsp from "node:fs/promises";
import path from "node:path";
import { WriteError, errorCode } from "./errors.js";
import type { GeneratorSettings, WriteStatus } from "./types.js";

const INDENT = "    ";

// Characters that end or alter an unquoted CMake argument
const NEEDS_QUOTING = /[\s()#"\\$;]/;

/**
 * Format one source path as a CMake argument. Plain paths pass through;
 * anything CMake would split or expand is written as a quoted argument.
 */
export function formatCMakeArgument(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  const escaped = value.replace(/[\\"$;]/g, (ch) => `\\${ch}`);
  return `"${escaped}"`;
}

export function renderCMakeLists(
  sources: string[],
  settings: GeneratorSettings,
): string {
  const { projectName, cxxStandard, cmakeMinimumVersion, dependency } =
    settings;
  const srcList = sources
    .map((s) => INDENT + formatCMakeArgument(s))
    .join("\n");

  return `cmake_minimum_required(VERSION ${cmakeMinimumVersion})
project(${projectName} LANGUAGES CXX)

set(CMAKE_CXX_STANDARD ${cxxStandard})
set(CMAKE_CXX_STANDARD_REQUIRED ON)
set(CMAKE_EXPORT_COMPILE_COMMANDS ON)

# Source files
set(SRC
${srcList}
)

add_executable(${projectName} \${SRC})

# ${dependency} (must be installed on the system)
find_package(${dependency} REQUIRED)
target_include_directories(${projectName} PRIVATE \${${dependency}_INCLUDE_DIRS})
target_link_libraries(${projectName} PRIVATE \${${dependency}_LIBRARIES})

# Project root include path
target_include_directories(${projectName} PRIVATE
    \${CMAKE_SOURCE_DIR}
)
`;
}

/**
 * Write the descriptor, replacing whatever was there. The returned status
 * only describes how the new content compares to the old one; the write
 * happens regardless.
 */
export async function writeCMakeLists(
  root: string,
  outputFile: string,
  content: string,
): Promise<WriteStatus> {
  const outputPath = path.join(root, outputFile);

  // Only labels the result; an unreadable old file is still replaced
  let existed = true;
  let previous: string | null = null;
  try {
    previous = await fsp.readFile(outputPath, "utf-8");
  } catch (err: unknown) {
    existed = errorCode(err) !== "ENOENT";
  }

  try {
    await fsp.writeFile(outputPath, content, "utf-8");
  } catch (err: unknown) {
    throw new WriteError(outputPath, err);
  }

  if (!existed) return "created";
  return previous === content ? "unchanged" : "updated";
}
