import type {
  EditOutcome,
  LoopId,
  LoopOutcome,
  Phase,
  RunRequest,
  RunResult,
} from "../../contracts/types.js";
import type { Reporter } from "./types.js";
import { describeRequest } from "../process/request.js";
import { redact, truncate, MAX_OUTPUT_BYTES } from "../util/sanitize.js";

export function createConsoleReporter(
  env: Record<string, string>,
  out: NodeJS.WritableStream = process.stderr,
): Reporter {
  function sanitize(text: string): string {
    return truncate(redact(text, env), MAX_OUTPUT_BYTES);
  }

  return {
    phaseStart(loopId: LoopId, phase: Phase, request: RunRequest): void {
      out.write(`[${loopId}] ${phase}: ${sanitize(describeRequest(request))}\n`);
    },

    phaseComplete(loopId: LoopId, phase: Phase, result: RunResult): void {
      const icon = result.exitCode === 0 ? "+" : "x";
      out.write(`[${loopId}] [${icon}] ${phase} (exit ${result.exitCode}, ${result.durationMs}ms)\n`);
      if (result.spawnError !== undefined) {
        out.write(`    error: ${sanitize(result.spawnError)}\n`);
      }
    },

    loopComplete(outcome: LoopOutcome): void {
      out.write("\n--- Hammer Summary ---\n");
      out.write(`Loop ID:       ${outcome.loopId}\n`);
      out.write(`Result:        ${outcome.reason}\n`);
      out.write(`Verifications: ${outcome.verifications}\n`);
      out.write(`Corrections:   ${outcome.corrections}\n`);
      if (outcome.lastExitCode !== undefined) {
        out.write(`Last exit:     ${outcome.lastExitCode}\n`);
      }
      out.write(`Duration:      ${outcome.durationMs}ms\n`);
      out.write("---\n");
    },

    editComplete(outcome: EditOutcome): void {
      const exit = outcome.exitCode !== undefined ? `, exit ${outcome.exitCode}` : "";
      out.write(`[${outcome.loopId}] edit ${outcome.reason}${exit} (${outcome.durationMs}ms)\n`);
      if (outcome.spawnError !== undefined) {
        out.write(`    error: ${sanitize(outcome.spawnError)}\n`);
      }
    },
  };
}
