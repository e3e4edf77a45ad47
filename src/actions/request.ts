import { join } from "node:path";
import type { DocumentContext, RunRequest } from "../../contracts/types.js";
import type { AnvilConfig } from "../config/env.js";
import { createRunRequest } from "../process/request.js";
import { assertPathConfined } from "../util/path.js";
import { RequestError, errorMessage } from "../util/errors.js";

/** Actions that default to the smart model; everything else gets the fast one */
const SMART_ACTIONS = new Set(["prompt", "fileprompt", "rewrite", "fix", "edit", "hammer"]);

/** Line range sent when an action works on the whole file */
export const DUMMY_LINE_RANGE = "1";

export interface ActionInvocation {
  /** Script name inside the script directory */
  action: string;
  document: DocumentContext;
  /** "41" or "41-42", see formatLineRange */
  lineRange?: string;
  prompt?: string;
  /** Model override (default depends on the action) */
  model?: string;
  /** LM service URL override */
  basePath?: string;
}

export type ActionDefaults = Pick<AnvilConfig, "scriptDir" | "fastModel" | "smartModel" | "lmBasePath">;

export function defaultModelFor(action: string, defaults: ActionDefaults): string {
  return SMART_ACTIONS.has(action) ? defaults.smartModel : defaults.fastModel;
}

/**
 * Line range argument: "start-end" for a range, otherwise the cursor
 * line, otherwise the dummy range.
 */
export function formatLineRange(
  start?: number,
  end?: number,
  cursorLine?: number,
): string {
  if (start !== undefined && end !== undefined) {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end < start) {
      throw new RequestError(`Invalid line range: ${start}-${end}`);
    }
    return `${start}-${end}`;
  }
  if (cursorLine !== undefined) {
    if (!Number.isInteger(cursorLine) || cursorLine < 1) {
      throw new RequestError(`Invalid cursor line: ${cursorLine}`);
    }
    return String(cursorLine);
  }
  return DUMMY_LINE_RANGE;
}

/**
 * Build the request for an action script. Every action takes the same
 * positional arguments:
 *   languageTag filePath lineRange prompt model basePath
 */
export function buildActionRequest(
  defaults: ActionDefaults,
  inv: ActionInvocation,
): RunRequest {
  const command = join(defaults.scriptDir, inv.action);
  try {
    assertPathConfined(command, defaults.scriptDir);
  } catch (err) {
    throw new RequestError(`Invalid action "${inv.action}": ${errorMessage(err)}`, err);
  }

  return createRunRequest({
    command,
    argv: [
      inv.document.languageTag,
      inv.document.filePath,
      inv.lineRange ?? DUMMY_LINE_RANGE,
      inv.prompt ?? "",
      inv.model ?? defaultModelFor(inv.action, defaults),
      inv.basePath ?? defaults.lmBasePath,
    ],
    context: inv.document,
  });
}
