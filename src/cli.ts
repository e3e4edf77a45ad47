#!/usr/bin/env node

import { defineCommand, runMain } from "citty";
import { loadConfig, parseBudget } from "./config/env.js";
import { formatLineRange } from "./actions/request.js";
import { createActivityIndicator } from "./editor/activity.js";
import { createFileHost } from "./editor/file-host.js";
import { createConsoleReporter } from "./reporter/console.js";
import { createJsonReporter } from "./reporter/json.js";
import type { Reporter } from "./reporter/types.js";
import { createSession } from "./session.js";
import type { Session } from "./session.js";
import { createStreamSurface } from "./sink/surface.js";
import { pickSecrets } from "./util/sanitize.js";

const sharedArgs = {
  file: {
    type: "positional",
    required: true,
    description: "File to work on",
  },
  lang: {
    type: "string",
    description: "Language tag (inferred from the extension if omitted)",
  },
  model: {
    type: "string",
    description: "LLM model override",
  },
  "base-path": {
    type: "string",
    description: "LLM service URL override",
  },
  json: {
    type: "string",
    description: "Write JSONL events to this file instead of stderr",
  },
} as const;

function parseLine(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || String(n) !== value.trim()) {
    throw new Error(`--${flag} must be an integer, got "${value}"`);
  }
  return n;
}

async function openSession(args: {
  file: string;
  lang?: string;
  model?: string;
  "base-path"?: string;
  json?: string;
  budget?: string;
}): Promise<Session> {
  const config = loadConfig(process.env);
  const secrets = pickSecrets(process.env);
  const reporter: Reporter = args.json
    ? createJsonReporter(args.json, secrets)
    : createConsoleReporter(secrets);
  const host = await createFileHost({
    filePath: args.file,
    languageTag: args.lang,
    onError: (message) => process.stderr.write(`error: ${message}\n`),
  });

  return createSession({
    config,
    host,
    surfaces: () => createStreamSurface(process.stdout),
    reporter,
    indicator: createActivityIndicator((active) => {
      process.title = active ? "anvil (running)" : "anvil";
    }),
    model: args.model,
    basePath: args["base-path"],
    budget: args.budget === undefined ? undefined : parseBudget(args.budget),
  });
}

const hammer = defineCommand({
  meta: {
    name: "hammer",
    description: "Run the project's hammer script and let the LLM fix failures until it passes",
  },
  args: {
    ...sharedArgs,
    budget: {
      type: "string",
      description: "Maximum verification runs (default ANVIL_HAMMER_BUDGET or 5)",
    },
  },
  async run({ args }) {
    const session = await openSession(args);
    const outcome = await session.hammer.start();
    process.exit(outcome.reason === "success" ? 0 : 1);
  },
});

const edit = defineCommand({
  meta: { name: "edit", description: "Ask the LLM to edit a file once" },
  args: {
    ...sharedArgs,
    instruction: {
      type: "positional",
      required: true,
      description: "What to change",
    },
  },
  async run({ args }) {
    const session = await openSession(args);
    const outcome = await session.edit.edit(args.instruction);
    process.exit(outcome.reason === "completed" && outcome.spawnError === undefined ? 0 : 1);
  },
});

const run = defineCommand({
  meta: {
    name: "run",
    description: "Run any action script (prompt, rewrite, explain, ...) and stream its output",
  },
  args: {
    action: {
      type: "positional",
      required: true,
      description: "Action script name in the script directory",
    },
    ...sharedArgs,
    prompt: {
      type: "string",
      description: "Prompt text passed to the action",
    },
    start: {
      type: "string",
      description: "First line of the range",
    },
    end: {
      type: "string",
      description: "Last line of the range",
    },
    line: {
      type: "string",
      description: "Cursor line, used when no range is given",
    },
  },
  async run({ args }) {
    const session = await openSession(args);
    const result = await session.runAction({
      action: args.action,
      prompt: args.prompt,
      lineRange: formatLineRange(
        parseLine(args.start, "start"),
        parseLine(args.end, "end"),
        parseLine(args.line, "line"),
      ),
    });
    process.exit(result.exitCode);
  },
});

const main = defineCommand({
  meta: {
    name: "anvil",
    version: "0.1.0",
    description: "Drive build/test feedback loops with an LLM fixer",
  },
  subCommands: { hammer, edit, run },
});

runMain(main);
