import type { DisplaySurface, SurfaceFactory } from "./surface.js";

export interface OutputSink {
  /** Clear the current surface if still valid, otherwise create a new one */
  createOrReset(): void;
  /**
   * Insert lines at the insertion point. The first line continues the
   * current last line; each call is applied as one unit.
   */
  append(chunk: string | readonly string[]): void;
  /** Append text followed by a line break */
  appendLine(text: string): void;
  focus(): void;
  /** True while a valid surface is held */
  isActive(): boolean;
  contents(): string;
}

export function createOutputSink(factory: SurfaceFactory): OutputSink {
  let surface: DisplaySurface | undefined;

  function ensureSurface(): DisplaySurface {
    if (!surface || !surface.isValid()) {
      surface = factory();
    }
    return surface;
  }

  const sink: OutputSink = {
    createOrReset(): void {
      if (surface && surface.isValid()) {
        surface.clear();
        return;
      }
      surface = factory();
    },

    append(chunk: string | readonly string[]): void {
      const text = typeof chunk === "string" ? chunk : chunk.join("\n");
      if (text === "") return;
      ensureSurface().insert(text);
    },

    appendLine(text: string): void {
      sink.append([text, ""]);
    },

    focus(): void {
      ensureSurface().focus();
    },

    isActive: () => surface !== undefined && surface.isValid(),

    contents: () => (surface && surface.isValid() ? surface.text() : ""),
  };

  return sink;
}
