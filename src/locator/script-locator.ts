import { accessSync, constants, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

/** Default name of the project's verification script */
export const DEFAULT_SCRIPT_NAME = "hammer";

function isReadableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Walk upward from startDir looking for a readable regular file named
 * scriptName. Returns its absolute path, or undefined once the filesystem
 * root has been checked.
 */
export function locateScript(
  startDir: string,
  scriptName: string = DEFAULT_SCRIPT_NAME,
): string | undefined {
  let dir = resolve(startDir);

  for (;;) {
    const candidate = join(dir, scriptName);
    if (isReadableFile(candidate)) return candidate;

    const parent = dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}
