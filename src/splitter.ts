/**
 * Splits `key=value&key=value` text into segments.
 *
 * Span mode works on a `[start, end)` range of a string. Stream mode receives
 * the text in chunks and only emits a segment once its terminating `&` (or the
 * end of the input) has been seen.
 */

import { StreamClosedError } from "./errors.js";

export interface SegmentHandler {
  /** One segment, the `[start, end)` range of `s`, without its delimiter. */
  segment(s: string, start: number, end: number): void;
  /** A `&` between two segments. */
  delimiter(): void;
  /** When true, the splitter stops emitting (stream mode keeps consuming input). */
  isDone(): boolean;
}

export function splitSpan(
  s: string,
  start: number,
  end: number,
  handler: SegmentHandler,
): void {
  let cursor = start;
  let index: number;
  while ((index = indexOf(s, "&", cursor, end)) !== -1) {
    if (handler.isDone()) return;
    handler.segment(s, cursor, index);
    if (handler.isDone()) return;
    handler.delimiter();
    cursor = index + 1;
  }
  if (!handler.isDone()) {
    handler.segment(s, cursor, end);
  }
}

/** Index of the `=` separating name from value in `[start, end)`, or -1. */
export function indexOfSeparator(s: string, start: number, end: number): number {
  return indexOf(s, "=", start, end);
}

export function indexOf(s: string, ch: string, start: number, end: number): number {
  const index = s.indexOf(ch, start);
  return index === -1 || index >= end ? -1 : index;
}

export class StreamSplitter {
  private readonly handler: SegmentHandler;
  private pending = "";
  private read = 0;
  private ended = false;

  constructor(handler: SegmentHandler) {
    this.handler = handler;
  }

  /** Number of characters consumed so far. */
  get charactersRead(): number {
    return this.read;
  }

  push(chunk: string): void {
    if (this.ended) {
      throw new StreamClosedError("Input already ended");
    }
    this.read += chunk.length;
    if (this.handler.isDone()) {
      this.pending = "";
      return;
    }

    let cursor = 0;
    let index: number;
    while ((index = chunk.indexOf("&", cursor)) !== -1) {
      const segment = this.pending + chunk.slice(cursor, index);
      this.pending = "";
      cursor = index + 1;
      this.handler.segment(segment, 0, segment.length);
      if (this.handler.isDone()) return;
      this.handler.delimiter();
      if (this.handler.isDone()) return;
    }
    this.pending += chunk.slice(cursor);
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    if (!this.handler.isDone()) {
      this.handler.segment(this.pending, 0, this.pending.length);
    }
    this.pending = "";
  }
}
