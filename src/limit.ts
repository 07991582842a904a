import type { Appendable } from "./text.js";

export const DEFAULT_TRUNCATED_INDICATOR = "... (total: %d)";

/**
 * Passes text through to a destination until `limit` characters have been
 * written. The first append that does not fit is cut off at the limit and
 * marks the appendable as exceeded; every later append is dropped.
 */
export class LimitAppendable implements Appendable {
  private readonly destination: Appendable;
  private remaining: number;
  private exceeded = false;

  constructor(destination: Appendable, limit: number) {
    this.destination = destination;
    this.remaining = limit;
  }

  append(text: string): void {
    if (this.exceeded || text.length === 0) return;
    if (text.length <= this.remaining) {
      this.destination.append(text);
      this.remaining -= text.length;
      return;
    }
    if (this.remaining > 0) {
      this.destination.append(text.slice(0, this.remaining));
      this.remaining = 0;
    }
    this.exceeded = true;
  }

  get limitExceeded(): boolean {
    return this.exceeded;
  }
}

/** Format a truncated indicator template; `%d` is the total input length, `%%` a literal `%`. */
export function formatTruncatedIndicator(template: string, totalLength: number): string {
  return template.replace(/%[d%]/g, (token) => (token === "%d" ? String(totalLength) : "%"));
}
