/**
 * The single-value obfuscator capability.
 *
 * An obfuscator turns a piece of text into a masked representation. The
 * request parameter and header obfuscators only depend on this class; the
 * concrete masks below (`all`, `fixedLength`, `none`) are the strategies they
 * are usually configured with.
 */

import {
  IllegalConfigurationError,
  checkStartAndEnd,
  requireNonNull,
} from "./errors.js";
import { ObfuscatingWriter } from "./obfuscating-writer.js";
import { type Appendable, TextBuffer, type TextChunks, decodeChunks } from "./text.js";

export abstract class Obfuscator {
  /** Obfuscate `s`, or the `[start, end)` span of it, into a new string. */
  obfuscateText(s: string, start = 0, end?: number): string {
    const sb = new TextBuffer();
    this.obfuscateTextTo(s, sb, start, end);
    return sb.toString();
  }

  /** Obfuscate `s`, or the `[start, end)` span of it, and append the result to `destination`. */
  obfuscateTextTo(
    s: string,
    destination: Appendable,
    start = 0,
    end?: number,
  ): void {
    requireNonNull(s, "text");
    requireNonNull(destination, "destination");
    const stop = end ?? s.length;
    checkStartAndEnd(s, start, stop);
    this.appendObfuscated(s, start, stop, destination);
  }

  /**
   * Obfuscate text read from a synchronous source of chunks.
   * The input is always consumed completely.
   */
  obfuscateReader(input: Iterable<string>, destination: Appendable): void {
    requireNonNull(input, "input");
    requireNonNull(destination, "destination");
    let text = "";
    for (const chunk of input) text += chunk;
    this.appendObfuscated(text, 0, text.length, destination);
  }

  /**
   * Obfuscate text read from an asynchronous source, such as a Node readable
   * stream. Byte chunks are decoded as UTF-8.
   */
  async obfuscateStream(input: TextChunks, destination: Appendable): Promise<void> {
    requireNonNull(input, "input");
    requireNonNull(destination, "destination");
    let text = "";
    for await (const chunk of decodeChunks(input)) text += chunk;
    this.appendObfuscated(text, 0, text.length, destination);
  }

  /**
   * Returns a writer that collects everything written to it, and obfuscates it
   * to `destination` when it is closed.
   */
  streamTo(destination: Appendable): ObfuscatingWriter {
    return new ObfuscatingWriter(this, requireNonNull(destination, "destination"));
  }

  /** Wrap a value so that its string form is obfuscated, while the value itself stays retrievable. */
  obfuscateObject<T>(value: T): Obfuscated<T> {
    return new Obfuscated(requireNonNull(value, "value"), this);
  }

  protected abstract appendObfuscated(
    s: string,
    start: number,
    end: number,
    destination: Appendable,
  ): void;
}

/**
 * A value paired with its obfuscated string form. `toString()` is safe to log;
 * `value()` returns the original reference.
 */
export class Obfuscated<T> {
  private readonly original: T;
  private readonly obfuscator: Obfuscator;
  private representation: string | undefined;

  constructor(value: T, obfuscator: Obfuscator) {
    this.original = value;
    this.obfuscator = obfuscator;
  }

  value(): T {
    return this.original;
  }

  toString(): string {
    if (this.representation === undefined) {
      this.representation = this.obfuscator.obfuscateText(String(this.original));
    }
    return this.representation;
  }

  toJSON(): string {
    return this.toString();
  }
}

function checkMaskChar(maskChar: string): string {
  if (typeof maskChar !== "string" || maskChar.length !== 1) {
    throw new IllegalConfigurationError(
      `mask character must be a single character, got: ${JSON.stringify(maskChar)}`,
    );
  }
  return maskChar;
}

class AllObfuscator extends Obfuscator {
  private readonly maskChar: string;

  constructor(maskChar: string) {
    super();
    this.maskChar = checkMaskChar(maskChar);
  }

  protected appendObfuscated(
    _s: string,
    start: number,
    end: number,
    destination: Appendable,
  ): void {
    destination.append(this.maskChar.repeat(end - start));
  }

  toString(): string {
    return `Obfuscator.all(${this.maskChar})`;
  }
}

class FixedLengthObfuscator extends Obfuscator {
  private readonly mask: string;

  constructor(length: number, maskChar: string) {
    super();
    if (!Number.isInteger(length) || length < 0) {
      throw new IllegalConfigurationError(
        `fixed length must be a non-negative integer, got: ${length}`,
      );
    }
    this.mask = checkMaskChar(maskChar).repeat(length);
  }

  protected appendObfuscated(
    _s: string,
    _start: number,
    _end: number,
    destination: Appendable,
  ): void {
    destination.append(this.mask);
  }

  toString(): string {
    return `Obfuscator.fixedLength(${this.mask.length})`;
  }
}

class NoneObfuscator extends Obfuscator {
  protected appendObfuscated(
    s: string,
    start: number,
    end: number,
    destination: Appendable,
  ): void {
    destination.append(s.slice(start, end));
  }

  toString(): string {
    return "Obfuscator.none()";
  }
}

const NONE = new NoneObfuscator();

/** Replaces every character with `maskChar`. */
export function all(maskChar = "*"): Obfuscator {
  return new AllObfuscator(maskChar);
}

/** Replaces any text with exactly `length` copies of `maskChar`. */
export function fixedLength(length: number, maskChar = "*"): Obfuscator {
  return new FixedLengthObfuscator(length, maskChar);
}

/** The identity obfuscator. Always the same instance. */
export function none(): Obfuscator {
  return NONE;
}
