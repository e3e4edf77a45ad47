import type {
  EditOutcome,
  LoopId,
  LoopOutcome,
  Phase,
  RunRequest,
  RunResult,
} from "../../contracts/types.js";

export interface Reporter {
  /** Called when a subprocess is about to start */
  phaseStart(loopId: LoopId, phase: Phase, request: RunRequest): void;
  /** Called when a subprocess has exited (or failed to spawn) */
  phaseComplete(loopId: LoopId, phase: Phase, result: RunResult): void;
  /** Called when a hammer loop terminates */
  loopComplete(outcome: LoopOutcome): void;
  /** Called when a one-shot edit finishes */
  editComplete(outcome: EditOutcome): void;
}
