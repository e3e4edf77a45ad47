/**
 * A display surface: the viewport streamed output is rendered into
 * (an editor split, a terminal, an in-memory buffer).
 */
export interface DisplaySurface {
  /** False once the surface has been closed by its owner */
  isValid(): boolean;
  /** Remove all content, keeping the surface */
  clear(): void;
  /** Insert text at the insertion point (always the end) */
  insert(text: string): void;
  /** Make this surface the active view */
  focus(): void;
  /** Rendered content */
  text(): string;
}

export type SurfaceFactory = () => DisplaySurface;

export interface MemorySurface extends DisplaySurface {
  /** Close the surface; it reports invalid afterwards */
  dispose(): void;
  /** Number of focus() calls, for hosts that track the active view */
  readonly focusCount: number;
}

export function createMemorySurface(): MemorySurface {
  let content = "";
  let disposed = false;
  let focusCount = 0;

  return {
    isValid: () => !disposed,
    clear(): void {
      content = "";
    },
    insert(text: string): void {
      content += text;
    },
    focus(): void {
      focusCount++;
    },
    text: () => content,
    dispose(): void {
      disposed = true;
    },
    get focusCount(): number {
      return focusCount;
    },
  };
}

/** Mirrors inserted text to a writable stream, e.g. process.stdout */
export function createStreamSurface(
  stream: NodeJS.WritableStream & { destroyed?: boolean },
): DisplaySurface {
  let content = "";

  return {
    isValid: () => stream.writable && stream.destroyed !== true,
    clear(): void {
      content = "";
    },
    insert(text: string): void {
      content += text;
      stream.write(text);
    },
    focus(): void {},
    text: () => content,
  };
}
