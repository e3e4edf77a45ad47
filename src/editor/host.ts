import type { DocumentContext } from "../../contracts/types.js";

/**
 * The editor the controllers drive. Controllers never touch buffer text:
 * they save before handing a file to a subprocess and reload afterwards.
 */
export interface EditorHost {
  /** The document the user is editing, if any */
  activeDocument(): DocumentContext | undefined;
  /** Persist the document's buffer to disk */
  save(doc: DocumentContext): Promise<void>;
  /** Replace the document's buffer with what is on disk */
  reload(doc: DocumentContext): Promise<void>;
  /** Return focus to the document's view */
  focus(doc: DocumentContext): void;
  /** Surface a non-fatal error to the user */
  notifyError(message: string): void;
}
