/** Unique loop identifier, 8-char hex string */
export type LoopId = string;

/** The document a command operates on */
export interface DocumentContext {
  /** Absolute path of the file being edited */
  filePath: string;
  /** Language tag passed to actions (e.g. "typescript", "go") */
  languageTag: string;
}

/** A single external command invocation. Immutable once built. */
export interface RunRequest {
  readonly command: string;
  /** Arguments as an argv array, never a shell string */
  readonly argv: readonly string[];
  /** Working directory (default: the invoking process's cwd) */
  readonly cwd?: string;
  /** Document the run was issued for, if any */
  readonly context?: DocumentContext;
}

/** Outcome of a single ProcessRunner invocation */
export interface RunResult {
  exitCode: number;
  /** Output chunks from both streams, in arrival order */
  combinedOutput: string[];
  durationMs: number;
  /** Set when the command could not be spawned */
  spawnError?: string;
}

/** Which part of a command a run belongs to */
export type Phase = "verify" | "correct" | "edit" | "action";

/** Why a hammer loop stopped */
export type TerminationReason =
  | "success"
  | "budget-exhausted"
  | "script-not-found"
  | "no-document"
  | "spawn-failed"
  | "fixer-spawn-failed";

/** Final report for a hammer loop */
export interface LoopOutcome {
  loopId: LoopId;
  reason: TerminationReason;
  verifications: number;
  corrections: number;
  lastExitCode?: number;
  durationMs: number;
}

/** Final report for a one-shot edit */
export interface EditOutcome {
  loopId: LoopId;
  reason: "completed" | "no-document";
  exitCode?: number;
  spawnError?: string;
  durationMs: number;
}
