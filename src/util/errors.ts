export class AnvilError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = "AnvilError";
  }
}

/** A RunRequest or action invocation that cannot be spawned safely */
export class RequestError extends AnvilError {
  constructor(message: string, cause?: unknown) {
    super(message, "INVALID_REQUEST", cause);
    this.name = "RequestError";
  }
}

export class ConfigError extends AnvilError {
  constructor(message: string, cause?: unknown) {
    super(message, "INVALID_CONFIG", cause);
    this.name = "ConfigError";
  }
}

/** A command that works on a file was run with no active document */
export class NoDocumentError extends AnvilError {
  constructor(message: string) {
    super(message, "NO_DOCUMENT");
    this.name = "NoDocumentError";
  }
}

/** start() called while a hammer loop is still in flight */
export class LoopBusyError extends AnvilError {
  constructor(loopId: string) {
    super(`Hammer loop ${loopId} is already running`, "LOOP_BUSY");
    this.name = "LoopBusyError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
