/**
 * application/x-www-form-urlencoded percent-encoding with a selectable
 * character encoding.
 *
 * Unreserved characters (A-Z a-z 0-9 . - * _) are kept, a space is written as
 * "+", and everything else becomes one "%XX" per byte of the character's
 * encoded form.
 */

import { DecodingError, EncodingError } from "./errors.js";

export type Charset = "utf-8" | "utf-16le" | "iso-8859-1" | "us-ascii";

const CHARSET_ALIASES: Record<string, Charset> = {
  "utf-8": "utf-8",
  utf8: "utf-8",
  "utf-16le": "utf-16le",
  utf16le: "utf-16le",
  "iso-8859-1": "iso-8859-1",
  "iso8859-1": "iso-8859-1",
  latin1: "iso-8859-1",
  "us-ascii": "us-ascii",
  ascii: "us-ascii",
};

const BUFFER_ENCODINGS: Record<Charset, BufferEncoding> = {
  "utf-8": "utf8",
  "utf-16le": "utf16le",
  "iso-8859-1": "latin1",
  "us-ascii": "ascii",
};

/** Resolve a charset name case-insensitively; unknown names fail with `EncodingError`. */
export function resolveCharset(name: string): Charset {
  const alias = String(name).toLowerCase();
  const charset = Object.hasOwn(CHARSET_ALIASES, alias) ? CHARSET_ALIASES[alias] : undefined;
  if (charset === undefined) {
    throw new EncodingError(`Unsupported character encoding: ${name}`);
  }
  return charset;
}

function isUnreserved(code: number): boolean {
  return (
    (code >= 0x61 && code <= 0x7a) || // a-z
    (code >= 0x41 && code <= 0x5a) || // A-Z
    (code >= 0x30 && code <= 0x39) || // 0-9
    code === 0x2e || // .
    code === 0x2d || // -
    code === 0x2a || // *
    code === 0x5f // _
  );
}

const HEX = "0123456789ABCDEF";

function checkEncodable(run: string, charset: Charset): void {
  const max = charset === "us-ascii" ? 0x7f : charset === "iso-8859-1" ? 0xff : -1;
  for (let i = 0; i < run.length; i++) {
    const code = run.charCodeAt(i);
    if (max !== -1 && code > max) {
      throw new EncodingError(
        `Character U+${code.toString(16).toUpperCase().padStart(4, "0")} cannot be encoded in ${charset}`,
      );
    }
    if (code >= 0xd800 && code <= 0xdbff) {
      const next = run.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        i++;
        continue;
      }
      throw new EncodingError(`Unpaired surrogate at index ${i}`);
    }
    if (code >= 0xdc00 && code <= 0xdfff) {
      throw new EncodingError(`Unpaired surrogate at index ${i}`);
    }
  }
}

export function percentEncode(text: string, charset: Charset = "utf-8"): string {
  let out = "";
  let i = 0;
  while (i < text.length) {
    const code = text.charCodeAt(i);
    if (isUnreserved(code)) {
      out += text[i];
      i++;
    } else if (code === 0x20) {
      out += "+";
      i++;
    } else {
      let j = i + 1;
      while (j < text.length) {
        const c = text.charCodeAt(j);
        if (isUnreserved(c) || c === 0x20) break;
        j++;
      }
      const run = text.slice(i, j);
      checkEncodable(run, charset);
      for (const byte of Buffer.from(run, BUFFER_ENCODINGS[charset])) {
        out += "%" + HEX[byte >> 4] + HEX[byte & 0x0f];
      }
      i = j;
    }
  }
  return out;
}

function hexValue(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30;
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10;
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10;
  return -1;
}

function decodeBytes(bytes: number[], charset: Charset): string {
  const buffer = Buffer.from(bytes);
  if (charset === "utf-16le" && buffer.length % 2 === 1) {
    // a trailing half code unit decodes to U+FFFD
    return buffer.subarray(0, buffer.length - 1).toString("utf16le") + "\uFFFD";
  }
  return buffer.toString(BUFFER_ENCODINGS[charset]);
}

export function percentDecode(text: string, charset: Charset = "utf-8"): string {
  if (text.indexOf("%") === -1 && text.indexOf("+") === -1) return text;

  let out = "";
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "+") {
      out += " ";
      i++;
    } else if (ch === "%") {
      const bytes: number[] = [];
      while (i < text.length && text[i] === "%") {
        if (i + 3 > text.length) {
          throw new DecodingError(`Incomplete escape sequence at index ${i}: ${text}`);
        }
        const hi = hexValue(text.charCodeAt(i + 1));
        const lo = hexValue(text.charCodeAt(i + 2));
        if (hi === -1 || lo === -1) {
          throw new DecodingError(`Illegal hex characters in escape pattern at index ${i}: ${text}`);
        }
        bytes.push((hi << 4) | lo);
        i += 3;
      }
      out += decodeBytes(bytes, charset);
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}
