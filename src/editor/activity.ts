/** The "command in progress" indicator (a status bar colour, a title) */
export interface ActivityIndicator {
  readonly active: boolean;
  /** Mark as busy. No-op when already busy. */
  begin(): void;
  /** Restore the idle state. No-op when already idle. */
  end(): void;
}

export function createActivityIndicator(
  onChange?: (active: boolean) => void,
): ActivityIndicator {
  let active = false;

  return {
    get active(): boolean {
      return active;
    },
    begin(): void {
      if (active) return;
      active = true;
      onChange?.(true);
    },
    end(): void {
      if (!active) return;
      active = false;
      onChange?.(false);
    },
  };
}

/**
 * Hands out one indicator per command over a shared display indicator.
 * The display stays active while any member is active.
 */
export function shareIndicator(display: ActivityIndicator): () => ActivityIndicator {
  let busy = 0;

  return () =>
    createActivityIndicator((active) => {
      busy += active ? 1 : -1;
      if (busy > 0) display.begin();
      else display.end();
    });
}
