/** Inclusive timestamp bounds. Either side may be left open. */
export interface TimeWindow {
  readonly from?: string | undefined;
  readonly to?: string | undefined;
}

/**
 * Checks a raw log timestamp against a window by string comparison.
 *
 * Valid only for timestamps in the same fixed-width ISO-8601 form
 * (e.g. 2025-07-11T17:07:36.000000Z), which sort lexically.
 */
export function isWithinWindow(timestamp: string, window: TimeWindow): boolean {
  if (window.from !== undefined && timestamp < window.from) return false;
  if (window.to !== undefined && timestamp > window.to) return false;
  return true;
}

