import type { DocumentContext, RunRequest } from "../../contracts/types.js";
import { RequestError } from "../util/errors.js";
import { shellQuote } from "../util/shell.js";

export interface RunRequestInit {
  command: string;
  argv?: readonly string[];
  cwd?: string;
  context?: DocumentContext;
}

function assertSpawnable(label: string, value: string): void {
  // spawn() throws on NUL; argv is never shell-parsed so nothing else needs escaping
  if (value.includes("\0")) {
    throw new RequestError(`${label} contains a NUL byte`);
  }
}

/**
 * Build an immutable RunRequest. This is the only place arguments are
 * checked before they reach a child process.
 */
export function createRunRequest(init: RunRequestInit): RunRequest {
  if (init.command.trim() === "") {
    throw new RequestError("Empty command");
  }
  assertSpawnable("Command", init.command);
  const argv = [...(init.argv ?? [])];
  argv.forEach((arg, i) => assertSpawnable(`Argument ${i + 1}`, arg));
  if (init.cwd !== undefined) assertSpawnable("Working directory", init.cwd);

  const context = init.context ? Object.freeze({ ...init.context }) : undefined;
  return Object.freeze({
    command: init.command,
    argv: Object.freeze(argv),
    cwd: init.cwd,
    context,
  });
}

/** Render a request as a shell-quoted command line, for logs */
export function describeRequest(request: RunRequest): string {
  return shellQuote([request.command, ...request.argv]);
}
