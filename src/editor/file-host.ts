import { readFile, writeFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import type { DocumentContext } from "../../contracts/types.js";
import type { EditorHost } from "./host.js";

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ".c": "c",
  ".cc": "cpp",
  ".cpp": "cpp",
  ".cs": "cs",
  ".css": "css",
  ".go": "go",
  ".h": "c",
  ".html": "html",
  ".java": "java",
  ".js": "javascript",
  ".jsx": "javascriptreact",
  ".json": "json",
  ".kt": "kotlin",
  ".lua": "lua",
  ".md": "markdown",
  ".mjs": "javascript",
  ".php": "php",
  ".py": "python",
  ".rb": "ruby",
  ".rs": "rust",
  ".sh": "sh",
  ".swift": "swift",
  ".ts": "typescript",
  ".tsx": "typescriptreact",
  ".yaml": "yaml",
  ".yml": "yaml",
};

/** Language tag for a path, "text" when the extension is unknown */
export function inferLanguageTag(filePath: string): string {
  return LANGUAGE_BY_EXTENSION[extname(filePath).toLowerCase()] ?? "text";
}

export interface FileHost extends EditorHost {
  /** Current buffer text */
  readonly buffer: string;
  /** Replace the buffer text; the file changes on the next save */
  setBuffer(text: string): void;
  /** Number of reloads that found the file changed on disk */
  readonly externalChanges: number;
}

/**
 * Headless host over a single file: the buffer is the file's text as last
 * loaded, unless replaced through setBuffer. save only writes a buffer that
 * differs from what was last read, so edits made on disk by anyone else
 * survive it. Errors go to the supplied callback (stderr in the CLI).
 */
export async function createFileHost(opts: {
  filePath: string;
  languageTag?: string;
  onError?: (message: string) => void;
}): Promise<FileHost> {
  const doc: DocumentContext = {
    filePath: resolve(opts.filePath),
    languageTag: opts.languageTag ?? inferLanguageTag(opts.filePath),
  };
  let onDisk = await readFile(doc.filePath, "utf-8");
  let buffer = onDisk;
  let externalChanges = 0;

  function assertOwnDocument(target: DocumentContext): void {
    if (target.filePath !== doc.filePath) {
      throw new Error(`Unknown document: ${target.filePath}`);
    }
  }

  return {
    get buffer(): string {
      return buffer;
    },
    get externalChanges(): number {
      return externalChanges;
    },

    setBuffer(text: string): void {
      buffer = text;
    },

    activeDocument: () => doc,

    async save(target: DocumentContext): Promise<void> {
      assertOwnDocument(target);
      if (buffer === onDisk) return;
      await writeFile(doc.filePath, buffer, "utf-8");
      onDisk = buffer;
    },

    async reload(target: DocumentContext): Promise<void> {
      assertOwnDocument(target);
      const text = await readFile(doc.filePath, "utf-8");
      if (text !== buffer) externalChanges++;
      buffer = text;
      onDisk = text;
    },

    focus(target: DocumentContext): void {
      assertOwnDocument(target);
    },

    notifyError(message: string): void {
      opts.onError?.(message);
    },
  };
}
