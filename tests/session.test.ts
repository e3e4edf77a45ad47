import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { chmod, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RunResult } from "../contracts/types.js";
import { loadConfig } from "../src/config/env.js";
import { createActivityIndicator } from "../src/editor/activity.js";
import type { EditorHost } from "../src/editor/host.js";
import { createFileHost } from "../src/editor/file-host.js";
import type { FileHost } from "../src/editor/file-host.js";
import { createSession } from "../src/session.js";
import { createMemorySurface } from "../src/sink/surface.js";
import type { MemorySurface } from "../src/sink/surface.js";
import { NoDocumentError } from "../src/util/errors.js";

let testDir: string;
let projectDir: string;
let binDir: string;
let filePath: string;

async function writeScript(path: string, body: string): Promise<void> {
  await writeFile(path, `#!/bin/sh\n${body}\n`, "utf8");
  await chmod(path, 0o755);
}

const testConfig = () =>
  loadConfig({
    ANVIL_SCRIPT_DIR: binDir,
    ANVIL_LM_FAST_MODEL: "fast-model",
    ANVIL_LM_SMART_MODEL: "smart-model",
    ANVIL_LM_BASE_PATH: "http://localhost:8080/v1",
  });

function stubHost(document = { filePath, languageTag: "text" }): {
  host: EditorHost;
  errors: string[];
} {
  const errors: string[] = [];
  return {
    errors,
    host: {
      activeDocument: () => document,
      save: async () => {},
      reload: async () => {},
      focus: () => {},
      notifyError: (message) => {
        errors.push(message);
      },
    },
  };
}

async function open(host?: FileHost) {
  const fileHost = host ?? (await createFileHost({ filePath }));
  const surfaces: MemorySurface[] = [];
  const session = createSession({
    config: testConfig(),
    host: fileHost,
    surfaces: () => {
      const surface = createMemorySurface();
      surfaces.push(surface);
      return surface;
    },
  });
  return { session, host: fileHost, surfaces };
}

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), "anvil-session-test-"));
  projectDir = join(testDir, "project");
  binDir = join(testDir, "bin");
  await mkdir(join(projectDir, "src"), { recursive: true });
  await mkdir(binDir);
  filePath = join(projectDir, "src", "notes.txt");
  await writeFile(filePath, "broken\n", "utf8");

  await writeScript(
    join(projectDir, "hammer"),
    `grep -q fixed '${filePath}' || { echo "missing fix" >&2; exit 1; }`,
  );
  await writeScript(join(binDir, "hammer"), `echo "fixing $1 $2"\necho fixed >> "$2"`);
  await writeScript(join(binDir, "edit"), `echo "$4" >> "$2"`);
  await writeScript(join(binDir, "explain"), `echo "$3|$4|$5|$6"`);
});

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true });
});

describe("Session", () => {
  test("hammer fixes the file and passes on the second verification", async () => {
    const { session, host, surfaces } = await open();

    const outcome = await session.hammer.start();

    expect(outcome.reason).toBe("success");
    expect(outcome.verifications).toBe(2);
    expect(outcome.corrections).toBe(1);
    expect(outcome.lastExitCode).toBe(0);
    expect(host.buffer).toBe("broken\nfixed\n");
    expect(host.externalChanges).toBe(1);
    expect(surfaces).toHaveLength(1);
    expect(surfaces[0]!.text()).toBe(
      [
        "Hammer mode started",
        "missing fix",
        "status: 1",
        `fixing text ${filePath}`,
        "status: 0",
        "Hammer succeeded",
        "",
      ].join("\n"),
    );
    expect(session.hammer.isRunning()).toBe(false);
    expect(session.indicator.active).toBe(false);
  });

  test("hammer reports a missing verification script", async () => {
    await rm(join(projectDir, "hammer"));
    const errors: string[] = [];
    const host = await createFileHost({ filePath, onError: (m) => errors.push(m) });
    const { session } = await open(host);

    const outcome = await session.hammer.start();

    expect(outcome.reason).toBe("script-not-found");
    expect(errors).toEqual(["Could not find hammer, add it to the base dir of this project"]);
  });

  test("edit runs once and reloads the file", async () => {
    const { session, host, surfaces } = await open();

    const outcome = await session.edit.edit("add a line");

    expect(outcome.reason).toBe("completed");
    expect(outcome.exitCode).toBe(0);
    expect(host.buffer).toBe("broken\nadd a line\n");
    expect(await readFile(filePath, "utf8")).toBe("broken\nadd a line\n");
    expect(surfaces[0]!.text()).toBe(`Editing ${filePath}\nEdit finished (exit 0)\n`);
  });

  test("runAction streams an ad-hoc action with its arguments", async () => {
    const { session, surfaces } = await open();

    const result = await session.runAction({
      action: "explain",
      lineRange: "3-4",
      prompt: "why",
    });

    expect(result.exitCode).toBe(0);
    expect(surfaces[0]!.text()).toBe("3-4|why|fast-model|http://localhost:8080/v1\n");
  });

  test("runAction reports a missing action as a spawn failure", async () => {
    const { session } = await open();

    const result = await session.runAction({ action: "nonexistent" });

    expect(result.exitCode).toBe(127);
    expect(result.spawnError).toMatch(/ENOENT/);
  });

  test("runAction rejects actions outside the script directory", async () => {
    const { session } = await open();

    await expect(session.runAction({ action: "../project/hammer" })).rejects.toThrow(
      /Invalid action "\.\.\/project\/hammer"/,
    );
  });

  test("hammer, edit and actions each get their own surface", async () => {
    const { session, surfaces } = await open();

    await session.hammer.start();
    await session.edit.edit("again");
    await session.runAction({ action: "explain" });

    expect(surfaces).toHaveLength(3);
  });

  test("hammer keeps edits saved to the file during a verification run", async () => {
    await writeScript(
      join(projectDir, "hammer"),
      `grep -q fixed '${filePath}' && exit 0\necho user-edit >> '${filePath}'\nexit 1`,
    );
    await writeScript(join(binDir, "hammer"), `echo "fixer sees: $(tr '\\n' ' ' < "$2")"\necho fixed >> "$2"`);
    const { session, host, surfaces } = await open();

    const outcome = await session.hammer.start();

    expect(outcome.reason).toBe("success");
    expect(surfaces[0]!.text()).toContain("fixer sees: broken user-edit \n");
    expect(await readFile(filePath, "utf8")).toBe("broken\nuser-edit\nfixed\n");
    expect(host.buffer).toBe("broken\nuser-edit\nfixed\n");
  });

  test("runAction without a document notifies and rejects", async () => {
    const { host, errors } = stubHost();
    const session = createSession({
      config: testConfig(),
      host: { ...host, activeDocument: () => undefined },
      surfaces: createMemorySurface,
    });

    await expect(session.runAction({ action: "explain" })).rejects.toBeInstanceOf(NoDocumentError);
    expect(errors).toEqual(['Action "explain" needs a file to work on']);
  });

  test("an edit finishing during a hammer loop leaves the indicator on", async () => {
    const verifyScript = join(projectDir, "hammer");
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const changes: boolean[] = [];
    const indicator = createActivityIndicator((active) => changes.push(active));
    const session = createSession({
      config: testConfig(),
      host: stubHost().host,
      surfaces: createMemorySurface,
      indicator,
      runner: {
        async run(request): Promise<RunResult> {
          if (request.command === verifyScript) await gate;
          return { exitCode: 0, combinedOutput: [], durationMs: 1 };
        },
      },
    });

    const loop = session.hammer.start();
    await session.edit.edit("meanwhile");
    expect(indicator.active).toBe(true);

    release();
    await loop;
    expect(indicator.active).toBe(false);
    expect(changes).toEqual([true, false]);
  });
});
