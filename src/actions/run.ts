import type { LoopId, Phase, RunRequest, RunResult } from "../../contracts/types.js";
import type { ProcessRunner, RunHandlers } from "../process/runner.js";
import type { OutputSink } from "../sink/output-sink.js";
import type { Reporter } from "../reporter/types.js";

/** Route both output streams of a run into one sink, in arrival order */
export function sinkHandlers(sink: OutputSink): RunHandlers {
  return {
    onStdout: (lines) => sink.append(lines),
    onStderr: (lines) => sink.append(lines),
  };
}

export interface StreamedRunOptions {
  runner: ProcessRunner;
  sink: OutputSink;
  request: RunRequest;
  loopId: LoopId;
  phase: Phase;
  reporter?: Reporter;
}

/** Run one request, streaming into the sink and reporting start/complete */
export async function runStreamed(opts: StreamedRunOptions): Promise<RunResult> {
  opts.reporter?.phaseStart(opts.loopId, opts.phase, opts.request);
  const result = await opts.runner.run(opts.request, sinkHandlers(opts.sink));
  opts.reporter?.phaseComplete(opts.loopId, opts.phase, result);
  return result;
}
