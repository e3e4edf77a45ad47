import type {
  DocumentContext,
  LoopId,
  LoopOutcome,
  TerminationReason,
} from "../../contracts/types.js";
import type { ActionDefaults } from "../actions/request.js";
import type { ActivityIndicator } from "../editor/activity.js";
import type { EditorHost } from "../editor/host.js";
import type { ProcessRunner } from "../process/runner.js";
import type { Reporter } from "../reporter/types.js";
import type { OutputSink } from "../sink/output-sink.js";

/** Controller states; a loop moves verifying ⇄ correcting until terminated */
export type HammerState =
  | { phase: "idle" }
  | { phase: "verifying"; attempt: number }
  | { phase: "correcting"; attempt: number; exitCode: number }
  | { phase: "terminated"; reason: TerminationReason };

/** Mutable record of the loop in flight. Owned by the controller. */
export interface LoopState {
  loopId: LoopId;
  remainingAttempts: number;
  sink: OutputSink;
  document: DocumentContext;
  verificationScriptPath: string;
  lastExitCode?: number;
  /** Combined output of the latest verification run */
  verificationLog: string;
  verifications: number;
  corrections: number;
  /** Set when the fixer could not be spawned */
  fixerError?: string;
  /** Set when the verification script could not be spawned */
  verifyError?: string;
}

export interface HammerOptions {
  runner: ProcessRunner;
  host: EditorHost;
  sink: OutputSink;
  /** Script directory and LM defaults for the fixer action */
  actions: ActionDefaults;
  /** Verification script file name (default "hammer") */
  scriptName?: string;
  /** Maximum verification runs per loop (default 5) */
  budget?: number;
  /** Fixer action name inside the script directory (default "hammer") */
  fixerAction?: string;
  /** Model override for the fixer */
  model?: string;
  /** LM service URL override for the fixer */
  basePath?: string;
  /** Verification script lookup (default: locateScript) */
  locate?: (startDir: string, scriptName: string) => string | undefined;
  indicator?: ActivityIndicator;
  reporter?: Reporter;
  /** Called on every state change */
  onTransition?: (from: HammerState, to: HammerState) => void;
}

export interface HammerController {
  /**
   * Run a loop to completion. Rejects with LoopBusyError while another
   * loop of this controller is in flight.
   */
  start(): Promise<LoopOutcome>;
  state(): HammerState;
  isRunning(): boolean;
}
