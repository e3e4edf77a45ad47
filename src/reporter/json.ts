import { appendFileSync, statSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve } from "node:path";
import type {
  EditOutcome,
  LoopId,
  LoopOutcome,
  Phase,
  RunRequest,
  RunResult,
  TerminationReason,
} from "../../contracts/types.js";
import type { Reporter } from "./types.js";
import { describeRequest } from "../process/request.js";
import { redact, truncate, MAX_OUTPUT_BYTES } from "../util/sanitize.js";

interface PhaseStartEvent {
  event: "phase_start";
  loopId: LoopId;
  phase: Phase;
  command: string;
}

interface PhaseCompleteEvent {
  event: "phase_complete";
  loopId: LoopId;
  phase: Phase;
  exitCode: number;
  durationMs: number;
  outputBytes: number;
  spawnError?: string;
}

interface LoopCompleteEvent {
  event: "loop_complete";
  loopId: LoopId;
  reason: TerminationReason;
  verifications: number;
  corrections: number;
  lastExitCode?: number;
  durationMs: number;
}

interface EditCompleteEvent {
  event: "edit_complete";
  loopId: LoopId;
  reason: EditOutcome["reason"];
  exitCode?: number;
  spawnError?: string;
  durationMs: number;
}

type JsonReporterEventPayload =
  | PhaseStartEvent
  | PhaseCompleteEvent
  | LoopCompleteEvent
  | EditCompleteEvent;

type JsonReporterEvent = JsonReporterEventPayload & {
  timestamp: string;
};

function hasTraversalSegment(inputPath: string): boolean {
  return inputPath.split(/[\\/]+/).some((segment) => segment === "..");
}

function resolveReporterPath(filePath: string): string {
  if (hasTraversalSegment(filePath)) {
    throw new Error(`Invalid reporter path: traversal segments are not allowed: "${filePath}"`);
  }

  const resolvedPath = resolve(filePath);
  if (!isAbsolute(filePath)) {
    const cwd = resolve(process.cwd());
    const rel = relative(cwd, resolvedPath);
    if (rel.startsWith("..") || isAbsolute(rel)) {
      throw new Error(
        `Invalid reporter path: relative path resolves outside cwd "${cwd}": "${filePath}"`,
      );
    }
  }

  const parentDir = dirname(resolvedPath);
  let parentStats: ReturnType<typeof statSync>;
  try {
    parentStats = statSync(parentDir);
  } catch {
    throw new Error(
      `Invalid reporter path: parent directory does not exist: "${parentDir}"`,
    );
  }

  if (!parentStats.isDirectory()) {
    throw new Error(`Invalid reporter path: parent is not a directory: "${parentDir}"`);
  }

  return resolvedPath;
}

/** Append one JSON object per line to filePath */
export function createJsonReporter(
  filePath: string,
  env: Record<string, string>,
): Reporter {
  const resolvedPath = resolveReporterPath(filePath);

  function sanitize(text: string): string {
    return truncate(redact(text, env), MAX_OUTPUT_BYTES);
  }

  function append(event: JsonReporterEventPayload): void {
    const payload: JsonReporterEvent = {
      timestamp: new Date().toISOString(),
      ...event,
    };
    appendFileSync(resolvedPath, JSON.stringify(payload) + "\n", "utf8");
  }

  return {
    phaseStart(loopId: LoopId, phase: Phase, request: RunRequest): void {
      append({
        event: "phase_start",
        loopId,
        phase,
        command: sanitize(describeRequest(request)),
      });
    },

    phaseComplete(loopId: LoopId, phase: Phase, result: RunResult): void {
      const event: PhaseCompleteEvent = {
        event: "phase_complete",
        loopId,
        phase,
        exitCode: result.exitCode,
        durationMs: result.durationMs,
        outputBytes: Buffer.byteLength(result.combinedOutput.join(""), "utf8"),
      };

      if (result.spawnError !== undefined) {
        event.spawnError = sanitize(result.spawnError);
      }

      append(event);
    },

    loopComplete(outcome: LoopOutcome): void {
      append({ event: "loop_complete", ...outcome });
    },

    editComplete(outcome: EditOutcome): void {
      const event: EditCompleteEvent = { event: "edit_complete", ...outcome };
      if (outcome.spawnError !== undefined) {
        event.spawnError = sanitize(outcome.spawnError);
      }
      append(event);
    },
  };
}
