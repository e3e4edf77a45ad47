import type { EditOutcome } from "../../contracts/types.js";
import { DUMMY_LINE_RANGE, buildActionRequest } from "../actions/request.js";
import type { ActionDefaults } from "../actions/request.js";
import { runStreamed } from "../actions/run.js";
import type { ActivityIndicator } from "../editor/activity.js";
import type { EditorHost } from "../editor/host.js";
import type { ProcessRunner } from "../process/runner.js";
import type { Reporter } from "../reporter/types.js";
import type { OutputSink } from "../sink/output-sink.js";
import { generateRunId } from "../util/run-id.js";

export interface EditOptions {
  runner: ProcessRunner;
  host: EditorHost;
  sink: OutputSink;
  actions: ActionDefaults;
  /** Action name inside the script directory (default "edit") */
  action?: string;
  model?: string;
  basePath?: string;
  indicator?: ActivityIndicator;
  reporter?: Reporter;
}

export interface EditController {
  /** Hand the active file and an instruction to the edit action, once */
  edit(instruction: string): Promise<EditOutcome>;
}

export function createEditController(opts: EditOptions): EditController {
  const { host, sink, runner, reporter } = opts;
  const action = opts.action ?? "edit";

  return {
    async edit(instruction: string): Promise<EditOutcome> {
      const loopId = generateRunId();
      const started = performance.now();
      const elapsed = (): number => Math.round(performance.now() - started);

      const document = host.activeDocument();
      if (!document) {
        host.notifyError("Edit needs a file to work on");
        const outcome: EditOutcome = { loopId, reason: "no-document", durationMs: elapsed() };
        reporter?.editComplete(outcome);
        return outcome;
      }

      // Build before touching anything so a bad instruction leaves no trace
      const request = buildActionRequest(opts.actions, {
        action,
        document,
        lineRange: DUMMY_LINE_RANGE,
        prompt: instruction,
        model: opts.model,
        basePath: opts.basePath,
      });

      await host.save(document);
      opts.indicator?.begin();
      try {
        sink.createOrReset();
        sink.appendLine(`Editing ${document.filePath}`);

        const result = await runStreamed({
          runner,
          sink,
          request,
          loopId,
          phase: "edit",
          reporter,
        });

        host.focus(document);
        await host.reload(document);
        sink.appendLine(
          result.spawnError !== undefined
            ? `Edit could not start: ${result.spawnError}`
            : `Edit finished (exit ${result.exitCode})`,
        );

        const outcome: EditOutcome = {
          loopId,
          reason: "completed",
          exitCode: result.exitCode,
          spawnError: result.spawnError,
          durationMs: elapsed(),
        };
        reporter?.editComplete(outcome);
        return outcome;
      } finally {
        opts.indicator?.end();
      }
    },
  };
}
