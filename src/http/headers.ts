/**
 * Header value obfuscation.
 *
 * Header names are always matched case-insensitively. Values are obfuscated as
 * a whole: no parsing, no percent-encoding and no output limit.
 */

import { requireNonNull } from "../errors.js";
import { type Obfuscated, type Obfuscator, all } from "../obfuscator.js";
import {
  CASE_INSENSITIVE,
  ObfuscatorRegistry,
  type RegistryBuilder,
} from "../registry.js";
import type { Appendable } from "../text.js";

/** Header names that carry credentials in common HTTP setups. */
export const SENSITIVE_HEADERS: readonly string[] = [
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "cookie",
  "set-cookie",
  "x-auth-token",
  "x-forwarded-authorization",
  "www-authenticate",
  "proxy-authenticate",
  "x-goog-api-key",
];

export type HeaderRecord = Record<string, string | string[] | number | undefined>;

export class HeaderObfuscator {
  private readonly registry: ObfuscatorRegistry;

  constructor(registry: ObfuscatorRegistry) {
    this.registry = registry;
  }

  static builder(): HeaderObfuscatorBuilder {
    return new HeaderObfuscatorBuilder();
  }

  obfuscateHeader(name: string, value: string): string {
    return this.obfuscator(name).obfuscateText(value);
  }

  obfuscateHeaderTo(name: string, value: string, destination: Appendable): void {
    this.obfuscator(name).obfuscateTextTo(value, destination);
  }

  /** Pairs `value` with its obfuscated form; `value()` returns `value` itself. */
  obfuscateHeaderValue(name: string, value: string): Obfuscated<string> {
    return this.obfuscator(name).obfuscateObject(value);
  }

  /**
   * Obfuscate a whole header map, such as Node's `IncomingHttpHeaders`.
   *
   * - Returns a new object; the input is not modified
   * - Array values are obfuscated element by element
   * - Numbers are converted to strings, `undefined` values are dropped
   */
  obfuscateHeaders(headers: HeaderRecord): Record<string, string | string[]> {
    requireNonNull(headers, "headers");
    const entries: Array<[string, string | string[]]> = [];
    for (const [name, value] of Object.entries(headers)) {
      if (value === undefined) continue;
      const obfuscator = this.obfuscator(name);
      entries.push([
        name,
        Array.isArray(value)
          ? value.map((v) => obfuscator.obfuscateText(v))
          : obfuscator.obfuscateText(String(value)),
      ]);
    }
    // fromEntries defines own properties, so "__proto__" stays a plain key
    return Object.fromEntries(entries);
  }

  /** The obfuscator for a header; the identity obfuscator if none was registered. */
  obfuscator(name: string): Obfuscator {
    return this.registry.lookup(requireNonNull(name, "name"));
  }

  toString(): string {
    return `HeaderObfuscator[obfuscators=${this.registry}]`;
  }
}

export class HeaderObfuscatorBuilder {
  private readonly obfuscators: RegistryBuilder = ObfuscatorRegistry.builder();

  withHeader(name: string, obfuscator: Obfuscator): this {
    this.obfuscators.withEntry(name, obfuscator, CASE_INSENSITIVE);
    return this;
  }

  /** Adds every name in `SENSITIVE_HEADERS` with the same obfuscator. */
  withSensitiveHeaders(obfuscator: Obfuscator = all()): this {
    for (const name of SENSITIVE_HEADERS) this.withHeader(name, obfuscator);
    return this;
  }

  transform<R>(f: (builder: this) => R): R {
    return f(this);
  }

  build(): HeaderObfuscator {
    return new HeaderObfuscator(this.obfuscators.build());
  }
}
