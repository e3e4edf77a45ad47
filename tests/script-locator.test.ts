import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { locateScript } from "../src/locator/script-locator.js";

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "anvil-locate-"));
  await mkdir(join(root, "a", "b", "c"), { recursive: true });
  await mkdir(join(root, "x", "y"), { recursive: true });
  await writeFile(join(root, "a", "hammer"), "#!/bin/sh\nexit 0\n", { mode: 0o755 });
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("locateScript", () => {
  test("finds a script in an ancestor directory", () => {
    expect(locateScript(join(root, "a", "b", "c"), "hammer")).toBe(
      join(root, "a", "hammer"),
    );
  });

  test("finds a script in the start directory itself", () => {
    expect(locateScript(join(root, "a"), "hammer")).toBe(join(root, "a", "hammer"));
  });

  test("nearest script wins", async () => {
    await writeFile(join(root, "a", "b", "hammer"), "#!/bin/sh\n");
    expect(locateScript(join(root, "a", "b", "c"), "hammer")).toBe(
      join(root, "a", "b", "hammer"),
    );
  });

  test("returns undefined for a disjoint tree", () => {
    // A name nothing above the temp dir will have
    expect(locateScript(join(root, "x", "y"), "anvil-locator-missing-script")).toBeUndefined();
  });

  test("skips directories with the script's name", async () => {
    await mkdir(join(root, "a", "b", "c", "hammer"));
    expect(locateScript(join(root, "a", "b", "c"), "hammer")).toBe(
      join(root, "a", "hammer"),
    );
  });

  test("resolves relative start directories", () => {
    const found = locateScript(join(root, "a", "b", "c", "..", "c"), "hammer");
    expect(found).toBe(join(root, "a", "hammer"));
  });
});
