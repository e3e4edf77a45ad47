import { dirname } from "node:path";
import type {
  LoopId,
  LoopOutcome,
  TerminationReason,
} from "../../contracts/types.js";
import { DUMMY_LINE_RANGE, buildActionRequest } from "../actions/request.js";
import { runStreamed } from "../actions/run.js";
import { DEFAULT_HAMMER_BUDGET } from "../config/env.js";
import { DEFAULT_SCRIPT_NAME, locateScript } from "../locator/script-locator.js";
import { createRunRequest } from "../process/request.js";
import { LoopBusyError, errorMessage } from "../util/errors.js";
import { generateRunId } from "../util/run-id.js";
import { MAX_PROMPT_BYTES, truncate } from "../util/sanitize.js";
import type {
  HammerController,
  HammerOptions,
  HammerState,
  LoopState,
} from "./types.js";

export const HAMMER_STARTED = "Hammer mode started";

export function statusLine(
  reason: TerminationReason,
  detail: { scriptName: string; error?: string },
): string {
  switch (reason) {
    case "success":
      return "Hammer succeeded";
    case "budget-exhausted":
      return "Hammer hit loop limit";
    case "script-not-found":
      return `Could not find ${detail.scriptName}, add it to the base dir of this project`;
    case "no-document":
      return "Hammer needs a file to work on";
    case "spawn-failed":
      return `Hammer could not run ${detail.scriptName}: ${detail.error ?? "spawn failed"}`;
    case "fixer-spawn-failed":
      return `Hammer could not run the fixer: ${detail.error ?? "spawn failed"}`;
  }
}

/**
 * The hammer loop: run the project's verification script, and while it
 * fails hand its output to the fixer action, reload the file and verify
 * again, until it passes or the budget runs out.
 */
export function createHammerController(opts: HammerOptions): HammerController {
  const { host, sink, runner, reporter } = opts;
  const scriptName = opts.scriptName ?? DEFAULT_SCRIPT_NAME;
  const budget = opts.budget ?? DEFAULT_HAMMER_BUDGET;
  const fixerAction = opts.fixerAction ?? "hammer";
  const locate = opts.locate ?? locateScript;

  let state: HammerState = { phase: "idle" };
  let activeLoop: LoopId | undefined;

  function transition(next: HammerState): HammerState {
    const prev = state;
    state = next;
    opts.onTransition?.(prev, next);
    return next;
  }

  async function verify(loop: LoopState): Promise<HammerState> {
    if (loop.remainingAttempts === 0) {
      return { phase: "terminated", reason: "budget-exhausted" };
    }
    // Spend the attempt up front so a run that never exits cleanly still counts
    loop.remainingAttempts--;
    loop.verifications++;

    sink.focus();
    const result = await runStreamed({
      runner,
      sink,
      request: createRunRequest({
        command: loop.verificationScriptPath,
        context: loop.document,
      }),
      loopId: loop.loopId,
      phase: "verify",
      reporter,
    });

    loop.lastExitCode = result.exitCode;
    loop.verificationLog = result.combinedOutput.join("");
    sink.appendLine(`status: ${result.exitCode}`);

    if (result.spawnError !== undefined) {
      loop.verifyError = result.spawnError;
      return { phase: "terminated", reason: "spawn-failed" };
    }
    if (result.exitCode === 0) {
      return { phase: "terminated", reason: "success" };
    }
    // A fix made on the last attempt could never be verified
    if (loop.remainingAttempts === 0) {
      return { phase: "terminated", reason: "budget-exhausted" };
    }
    return {
      phase: "correcting",
      attempt: loop.verifications,
      exitCode: result.exitCode,
    };
  }

  async function correct(loop: LoopState): Promise<HammerState> {
    host.focus(loop.document);
    await host.save(loop.document);
    sink.focus();

    const request = buildActionRequest(opts.actions, {
      action: fixerAction,
      document: loop.document,
      lineRange: DUMMY_LINE_RANGE,
      prompt: truncate(loop.verificationLog.replace(/\0/g, ""), MAX_PROMPT_BYTES),
      model: opts.model,
      basePath: opts.basePath,
    });
    loop.corrections++;
    const result = await runStreamed({
      runner,
      sink,
      request,
      loopId: loop.loopId,
      phase: "correct",
      reporter,
    });

    host.focus(loop.document);
    if (result.spawnError !== undefined) {
      loop.fixerError = result.spawnError;
      return { phase: "terminated", reason: "fixer-spawn-failed" };
    }

    // The fixer's exit code is not inspected: the next verification decides
    await host.reload(loop.document);
    return { phase: "verifying", attempt: loop.verifications + 1 };
  }

  async function step(loop: LoopState, current: HammerState): Promise<HammerState> {
    switch (current.phase) {
      case "verifying":
        return verify(loop);
      case "correcting":
        return correct(loop);
      case "idle":
      case "terminated":
        return current;
    }
  }

  function conclude(
    loopId: LoopId,
    reason: TerminationReason,
    started: number,
    loop?: LoopState,
  ): LoopOutcome {
    const line = statusLine(reason, {
      scriptName,
      error: loop?.verifyError ?? loop?.fixerError,
    });
    sink.appendLine(line);
    if (reason === "script-not-found" || reason === "no-document") {
      host.notifyError(line);
    }

    const outcome: LoopOutcome = {
      loopId,
      reason,
      verifications: loop?.verifications ?? 0,
      corrections: loop?.corrections ?? 0,
      lastExitCode: loop?.lastExitCode,
      durationMs: Math.round(performance.now() - started),
    };
    reporter?.loopComplete(outcome);
    return outcome;
  }

  return {
    state: () => state,

    isRunning: () => activeLoop !== undefined,

    async start(): Promise<LoopOutcome> {
      if (activeLoop !== undefined) {
        throw new LoopBusyError(activeLoop);
      }
      const loopId = generateRunId();
      activeLoop = loopId;
      const started = performance.now();

      try {
        sink.createOrReset();
        sink.appendLine(HAMMER_STARTED);
        opts.indicator?.begin();

        const document = host.activeDocument();
        if (!document) {
          transition({ phase: "terminated", reason: "no-document" });
          return conclude(loopId, "no-document", started);
        }

        const scriptPath = locate(dirname(document.filePath), scriptName);
        if (scriptPath === undefined) {
          transition({ phase: "terminated", reason: "script-not-found" });
          return conclude(loopId, "script-not-found", started);
        }

        const loop: LoopState = {
          loopId,
          remainingAttempts: budget,
          sink,
          document,
          verificationScriptPath: scriptPath,
          verificationLog: "",
          verifications: 0,
          corrections: 0,
        };

        let current = transition({ phase: "verifying", attempt: 1 });
        while (current.phase === "verifying" || current.phase === "correcting") {
          current = transition(await step(loop, current));
        }
        if (current.phase !== "terminated") {
          throw new Error(`Hammer loop stopped in state ${current.phase}`);
        }
        return conclude(loopId, current.reason, started, loop);
      } catch (err) {
        sink.appendLine(`Hammer aborted: ${errorMessage(err)}`);
        transition({ phase: "idle" });
        throw err;
      } finally {
        opts.indicator?.end();
        activeLoop = undefined;
      }
    },
  };
}
