import type { Writable } from "node:stream";
import { StringDecoder } from "node:string_decoder";

/**
 * A destination that obfuscated text is appended to.
 *
 * `flush` and `close` are optional; the streaming writer calls them when the
 * destination provides them.
 */
export interface Appendable {
  append(text: string): void;
  flush?(): void;
  close?(): void;
}

/** Growable in-memory text sink. */
export class TextBuffer implements Appendable {
  private parts: string[] = [];
  private size = 0;

  append(text: string): void {
    if (text.length === 0) return;
    this.parts.push(text);
    this.size += text.length;
  }

  get length(): number {
    return this.size;
  }

  clear(): void {
    this.parts = [];
    this.size = 0;
  }

  toString(): string {
    if (this.parts.length > 1) {
      // Collapse so repeated toString() calls stay cheap.
      this.parts = [this.parts.join("")];
    }
    return this.parts.length === 0 ? "" : this.parts[0];
  }
}

export interface WritableAppendableOptions {
  /** End the stream when the appendable is closed. Defaults to true. */
  end?: boolean;
}

/**
 * Adapt a Node writable stream (a file, a socket, process.stdout) to an
 * `Appendable`. Pass `{ end: false }` for streams that must stay open, such as
 * process.stdout.
 */
export function writableAppendable(
  stream: Writable,
  options: WritableAppendableOptions = {},
): Appendable {
  const end = options.end ?? true;
  return {
    append(text: string): void {
      if (text.length > 0) stream.write(text);
    },
    close(): void {
      if (end) stream.end();
    },
  };
}

/** Chunks of an asynchronous text source; byte chunks are UTF-8. */
export type TextChunks = AsyncIterable<string | Uint8Array>;

/**
 * Yields the text of `input`. Byte chunks are decoded as UTF-8, with a
 * character split across chunks joined back together.
 */
export async function* decodeChunks(input: TextChunks): AsyncGenerator<string> {
  const decoder = new StringDecoder("utf8");
  for await (const chunk of input) {
    if (typeof chunk === "string") {
      const pending = decoder.end();
      if (pending) yield pending;
      yield chunk;
    } else {
      yield decoder.write(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  }
  const rest = decoder.end();
  if (rest) yield rest;
}
