import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fsp from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { collectSources, isCollectable } from "../src/collector.js";
import { ScanError } from "../src/errors.js";
import type { CollectOptions } from "../src/types.js";

const OPTIONS: CollectOptions = { extension: ".cpp", buildDir: "build" };

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), "cmakegen-collector-test-"));
});

afterEach(async () => {
  await fsp.rm(tmpDir, { recursive: true, force: true });
});

async function touch(...relPaths: string[]): Promise<void> {
  for (const rel of relPaths) {
    const full = path.join(tmpDir, rel);
    await fsp.mkdir(path.dirname(full), { recursive: true });
    await fsp.writeFile(full, "");
  }
}

function sorted(values: string[]): string[] {
  return [...values].sort();
}

describe("collectSources", () => {
  it("excludes build output and hidden files", async () => {
    await touch("main.cpp", "build/cached.cpp", ".hidden.cpp", "lib/util.cpp");

    const sources = collectSources(tmpDir, OPTIONS);
    expect(sorted(sources)).toEqual(["lib/util.cpp", "main.cpp"]);
  });

  it("returns an empty array when no sources exist", async () => {
    await touch("README.md", "include/app.h");
    expect(collectSources(tmpDir, OPTIONS)).toEqual([]);
  });

  it("returns an empty array for an empty directory", () => {
    expect(collectSources(tmpDir, OPTIONS)).toEqual([]);
  });

  it("skips build directories at any depth", async () => {
    await touch(
      "engine/build/gen.cpp",
      "engine/build/nested/deep.cpp",
      "engine/core.cpp",
    );
    expect(collectSources(tmpDir, OPTIONS)).toEqual(["engine/core.cpp"]);
  });

  it("does not treat directories that merely contain the build name as build output", async () => {
    await touch("buildtools/gen.cpp", "prebuild/step.cpp");
    expect(sorted(collectSources(tmpDir, OPTIONS))).toEqual([
      "buildtools/gen.cpp",
      "prebuild/step.cpp",
    ]);
  });

  it("walks hidden directories but skips hidden files", async () => {
    await touch(".generated/proto.cpp", ".generated/.tmp.cpp");
    expect(collectSources(tmpDir, OPTIONS)).toEqual([".generated/proto.cpp"]);
  });

  it("matches the suffix exactly", async () => {
    await touch("a.cpp", "b.cpp.bak", "c.cc", "d.hpp", "e.CPP");
    expect(collectSources(tmpDir, OPTIONS)).toEqual(["a.cpp"]);
  });

  it("does not collect directories whose name ends with the suffix", async () => {
    await touch("weird.cpp/inner.cpp");
    expect(collectSources(tmpDir, OPTIONS)).toEqual(["weird.cpp/inner.cpp"]);
  });

  it("honours a custom extension and build directory", async () => {
    await touch("src/app.cc", "out/app.cc", "build/app.cc", "src/legacy.cpp");
    const sources = collectSources(tmpDir, { extension: ".cc", buildDir: "out" });
    expect(sorted(sources)).toEqual(["build/app.cc", "src/app.cc"]);
  });

  it("uses forward slashes for nested paths", async () => {
    await touch("rhi/vulkan/device.cpp");
    expect(collectSources(tmpDir, OPTIONS)).toEqual(["rhi/vulkan/device.cpp"]);
  });

  it("returns the same sequence on repeated runs", async () => {
    await touch(
      "main.cpp",
      "core/app.cpp",
      "core/window.cpp",
      "renderer/sky.cpp",
      "renderer/shadow.cpp",
    );
    const first = collectSources(tmpDir, OPTIONS);
    const second = collectSources(tmpDir, OPTIONS);
    expect(second).toEqual(first);
    expect(first).toHaveLength(5);
  });

  it("lists a directory's files together (depth-first)", async () => {
    await touch("a/one.cpp", "a/two.cpp", "b/three.cpp");
    const sources = collectSources(tmpDir, OPTIONS);
    const aIndexes = sources
      .map((s, i) => (s.startsWith("a/") ? i : -1))
      .filter((i) => i >= 0);
    expect(aIndexes).toHaveLength(2);
    expect(Math.abs(aIndexes[0] - aIndexes[1])).toBe(1);
  });

  it("agrees with isCollectable over every file in the tree", async () => {
    const files = [
      "main.cpp",
      "build/cached.cpp",
      ".hidden.cpp",
      "lib/util.cpp",
      "lib/.swap.cpp",
      "lib/build/x.cpp",
      "docs/notes.txt",
      ".cache/obj.cpp",
    ];
    await touch(...files);

    const expected = files.filter((f) => isCollectable(f.split("/"), OPTIONS));
    expect(sorted(collectSources(tmpDir, OPTIONS))).toEqual(sorted(expected));
    expect(sorted(expected)).toEqual([".cache/obj.cpp", "lib/util.cpp", "main.cpp"]);
  });

  it.skipIf(process.platform === "win32")(
    "treats backslashes in file names as ordinary characters",
    async () => {
      await touch("v1\\.draft.cpp", "old\\build\\x.cpp");
      expect(sorted(collectSources(tmpDir, OPTIONS))).toEqual([
        "old\\build\\x.cpp",
        "v1\\.draft.cpp",
      ]);
    },
  );

  it("throws ScanError when the root cannot be read", () => {
    const missing = path.join(tmpDir, "does-not-exist");
    let caught: unknown;
    try {
      collectSources(missing, OPTIONS);
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ScanError);
    if (caught instanceof ScanError) {
      expect(caught.path).toBe(missing);
      expect(caught.message).toContain("ENOENT");
    }
  });
});

describe("isCollectable", () => {
  it("accepts a plain source path", () => {
    expect(isCollectable(["lib", "util.cpp"], OPTIONS)).toBe(true);
  });

  it("rejects paths with a build segment", () => {
    expect(isCollectable(["build", "cached.cpp"], OPTIONS)).toBe(false);
    expect(isCollectable(["a", "build", "b", "c.cpp"], OPTIONS)).toBe(false);
  });

  it("rejects hidden leaf names only", () => {
    expect(isCollectable([".hidden.cpp"], OPTIONS)).toBe(false);
    expect(isCollectable([".git", "hook.cpp"], OPTIONS)).toBe(true);
  });

  it("does not split names on backslashes", () => {
    expect(isCollectable(["v1\\.draft.cpp"], OPTIONS)).toBe(true);
    expect(isCollectable(["old\\build\\x.cpp"], OPTIONS)).toBe(true);
  });

  it("rejects an empty path", () => {
    expect(isCollectable([], OPTIONS)).toBe(false);
    expect(isCollectable([""], OPTIONS)).toBe(false);
  });
});
