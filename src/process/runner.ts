import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { constants } from "node:os";
import type { Readable } from "node:stream";
import type { RunRequest, RunResult } from "../../contracts/types.js";
import { errorMessage } from "../util/errors.js";

/** Exit code reported when the command could not be spawned at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Per-stream output callbacks. Each chunk arrives as the chunk text split
 * on "\n": the first element continues the previous (partial) line and the
 * last element is the start of the next one, "" when the chunk ended with
 * a newline.
 */
export interface RunHandlers {
  onStdout?: (lines: string[]) => void;
  onStderr?: (lines: string[]) => void;
}

export interface ProcessRunner {
  /** Start a command. Resolves exactly once, when the process has exited. */
  run(request: RunRequest, handlers?: RunHandlers): Promise<RunResult>;
}

export interface ProcessRunnerOptions {
  /** Extra environment merged over the inherited one */
  env?: Record<string, string>;
}

function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

export function createProcessRunner(
  opts: ProcessRunnerOptions = {},
): ProcessRunner {
  return {
    run(request: RunRequest, handlers: RunHandlers = {}): Promise<RunResult> {
      return new Promise((res) => {
        const start = performance.now();
        const combinedOutput: string[] = [];
        let settled = false;

        const finish = (exitCode: number, spawnError?: string): void => {
          if (settled) return;
          settled = true;
          res({
            exitCode,
            combinedOutput,
            durationMs: Math.round(performance.now() - start),
            spawnError,
          });
        };

        let child: ChildProcess;
        try {
          child = spawn(request.command, [...request.argv], {
            cwd: request.cwd,
            env: opts.env ? { ...process.env, ...opts.env } : undefined,
            // Commands are non-interactive; an open stdin makes some CLIs wait
            stdio: ["ignore", "pipe", "pipe"],
            shell: false,
          });
        } catch (err) {
          finish(SPAWN_FAILURE_EXIT_CODE, errorMessage(err));
          return;
        }

        const forward = (
          stream: Readable | null,
          deliver: ((lines: string[]) => void) | undefined,
        ): void => {
          if (!stream) return;
          stream.setEncoding("utf8");
          stream.on("data", (text: string) => {
            combinedOutput.push(text);
            deliver?.(text.split("\n"));
          });
        };
        forward(child.stdout, handlers.onStdout);
        forward(child.stderr, handlers.onStderr);

        // ENOENT / EACCES surface here, before any "close"
        child.on("error", (err) => {
          finish(SPAWN_FAILURE_EXIT_CODE, err.message);
        });

        // "close" waits for both pipes to drain, so every chunk precedes it
        child.on("close", (code, signal) => {
          if (code !== null) {
            finish(code);
          } else {
            finish(signal ? signalExitCode(signal) : 1);
          }
        });
      });
    },
  };
}
