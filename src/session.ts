import type { RunResult } from "../contracts/types.js";
import { buildActionRequest } from "./actions/request.js";
import type { ActionInvocation } from "./actions/request.js";
import { runStreamed } from "./actions/run.js";
import type { AnvilConfig } from "./config/env.js";
import { createEditController } from "./edit/controller.js";
import type { EditController } from "./edit/controller.js";
import { createActivityIndicator, shareIndicator } from "./editor/activity.js";
import type { ActivityIndicator } from "./editor/activity.js";
import type { EditorHost } from "./editor/host.js";
import { createHammerController } from "./hammer/controller.js";
import type { HammerController } from "./hammer/types.js";
import { createProcessRunner } from "./process/runner.js";
import type { ProcessRunner } from "./process/runner.js";
import type { Reporter } from "./reporter/types.js";
import { createOutputSink } from "./sink/output-sink.js";
import type { SurfaceFactory } from "./sink/surface.js";
import { NoDocumentError } from "./util/errors.js";
import { generateRunId } from "./util/run-id.js";

export interface SessionOptions {
  config: AnvilConfig;
  host: EditorHost;
  /** Creates the viewport each command streams into */
  surfaces: SurfaceFactory;
  reporter?: Reporter;
  /** Override process runner (for testing) */
  runner?: ProcessRunner;
  indicator?: ActivityIndicator;
  /** Per-session overrides of the configured LM settings */
  model?: string;
  basePath?: string;
  budget?: number;
}

export interface Session {
  readonly hammer: HammerController;
  readonly edit: EditController;
  /** Run any action once, streaming its output into the action sink */
  runAction(inv: Omit<ActionInvocation, "document">): Promise<RunResult>;
  readonly indicator: ActivityIndicator;
}

/**
 * One user session: a hammer loop, an edit command and ad-hoc actions
 * sharing a runner, an activity indicator and a reporter. Each command
 * holds its own share of the indicator and keeps its own sink, so
 * repeated invocations reuse their viewport.
 */
export function createSession(opts: SessionOptions): Session {
  const runner = opts.runner ?? createProcessRunner();
  const indicator = opts.indicator ?? createActivityIndicator();
  const member = shareIndicator(indicator);
  const actionIndicator = member();
  const actions = opts.config;

  const hammer = createHammerController({
    runner,
    host: opts.host,
    sink: createOutputSink(opts.surfaces),
    actions,
    scriptName: opts.config.hammerScript,
    budget: opts.budget ?? opts.config.hammerBudget,
    model: opts.model,
    basePath: opts.basePath,
    indicator: member(),
    reporter: opts.reporter,
  });

  const edit = createEditController({
    runner,
    host: opts.host,
    sink: createOutputSink(opts.surfaces),
    actions,
    model: opts.model,
    basePath: opts.basePath,
    indicator: member(),
    reporter: opts.reporter,
  });

  const actionSink = createOutputSink(opts.surfaces);

  return {
    hammer,
    edit,
    indicator,

    async runAction(inv): Promise<RunResult> {
      const document = opts.host.activeDocument();
      if (!document) {
        const message = `Action "${inv.action}" needs a file to work on`;
        opts.host.notifyError(message);
        throw new NoDocumentError(message);
      }
      const request = buildActionRequest(actions, {
        model: opts.model,
        basePath: opts.basePath,
        ...inv,
        document,
      });

      await opts.host.save(document);
      actionIndicator.begin();
      try {
        actionSink.createOrReset();
        const result = await runStreamed({
          runner,
          sink: actionSink,
          request,
          loopId: generateRunId(),
          phase: "action",
          reporter: opts.reporter,
        });
        opts.host.focus(document);
        return result;
      } finally {
        actionIndicator.end();
      }
    },
  };
}
