/**
 * Writer that obfuscates everything written to it once it is closed.
 *
 * Whether a value must be obfuscated depends on its name, which may arrive in
 * an earlier or later write than the value itself, and a `&` only ends a
 * segment once the whole text is known. The writer therefore buffers all
 * written text and runs the obfuscator over it once, on `close()`.
 *
 * A writer is single-use and not meant to be shared between callers.
 * Closing it more than once is a no-op; writing after close fails with
 * `StreamClosedError`.
 */

import {
  StreamClosedError,
  checkOffsetAndLength,
  checkStartAndEnd,
  requireNonNull,
} from "./errors.js";
import type { Obfuscator } from "./obfuscator.js";
import { type Appendable, TextBuffer } from "./text.js";

export class ObfuscatingWriter implements Appendable {
  private readonly obfuscator: Obfuscator;
  private readonly destination: Appendable;
  private buffer = new TextBuffer();
  private closed = false;

  constructor(obfuscator: Obfuscator, destination: Appendable) {
    this.obfuscator = obfuscator;
    this.destination = destination;
  }

  /** Write a single UTF-16 code unit. */
  write(charCode: number): void;
  /** Write a string, or `length` characters of it starting at `offset`. */
  write(text: string, offset?: number, length?: number): void;
  /** Write an array of characters, or `length` of them starting at `offset`. */
  write(chars: readonly string[], offset?: number, length?: number): void;
  write(
    input: number | string | readonly string[],
    offset?: number,
    length?: number,
  ): void {
    requireNonNull(input, "input");
    this.ensureOpen();
    if (typeof input === "number") {
      this.buffer.append(String.fromCharCode(input & 0xffff));
      return;
    }
    const off = offset ?? 0;
    const len = length ?? input.length - off;
    checkOffsetAndLength(input.length, off, len);
    if (typeof input === "string") {
      this.buffer.append(input.slice(off, off + len));
    } else {
      this.buffer.append(input.slice(off, off + len).join(""));
    }
  }

  /** Append `text`, or its `[start, end)` span. */
  append(text: string, start = 0, end?: number): void {
    requireNonNull(text, "text");
    this.ensureOpen();
    const stop = end ?? text.length;
    checkStartAndEnd(text, start, stop);
    this.buffer.append(text.slice(start, stop));
  }

  /** Does nothing: nothing can be obfuscated before the text is complete. */
  flush(): void {}

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const text = this.buffer.toString();
    this.buffer = new TextBuffer();
    this.obfuscator.obfuscateTextTo(text, this.destination);
    if (this.destination.close) {
      this.destination.close();
    } else {
      this.destination.flush?.();
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StreamClosedError("Stream closed");
    }
  }
}
