/**
 * Name-keyed obfuscator registry.
 *
 * Entries carry their own case sensitivity. Case-sensitive names only collide
 * with identical case-sensitive names, case-insensitive names only with
 * case-insensitive names that are equal ignoring case. A case-sensitive "Foo"
 * and a case-insensitive "foo" are two independent entries; on lookup the
 * exact case-sensitive match wins.
 */

import { DuplicateKeyError, requireNonNull } from "./errors.js";
import { type Obfuscator, none } from "./obfuscator.js";

export type CaseSensitivity = "case-sensitive" | "case-insensitive";

export const CASE_SENSITIVE: CaseSensitivity = "case-sensitive";
export const CASE_INSENSITIVE: CaseSensitivity = "case-insensitive";

export interface RegistryEntry {
  readonly name: string;
  readonly obfuscator: Obfuscator;
  readonly caseSensitivity: CaseSensitivity;
}

function foldCase(name: string): string {
  return name.toLowerCase();
}

export class ObfuscatorRegistry {
  private readonly sensitive: ReadonlyMap<string, Obfuscator>;
  private readonly insensitive: ReadonlyMap<string, Obfuscator>;
  private readonly entryList: readonly RegistryEntry[];

  /** Use `ObfuscatorRegistry.builder()`. */
  constructor(entries: readonly RegistryEntry[]) {
    const sensitive = new Map<string, Obfuscator>();
    const insensitive = new Map<string, Obfuscator>();
    for (const entry of entries) {
      if (entry.caseSensitivity === CASE_SENSITIVE) {
        sensitive.set(entry.name, entry.obfuscator);
      } else {
        insensitive.set(foldCase(entry.name), entry.obfuscator);
      }
    }
    this.sensitive = sensitive;
    this.insensitive = insensitive;
    this.entryList = Object.freeze([...entries]);
  }

  static builder(): RegistryBuilder {
    return new RegistryBuilder();
  }

  /** The registered obfuscator for `name`, or `undefined`. */
  get(name: string): Obfuscator | undefined {
    requireNonNull(name, "name");
    return this.sensitive.get(name) ?? this.insensitive.get(foldCase(name));
  }

  /** The registered obfuscator for `name`, or the identity obfuscator. */
  lookup(name: string): Obfuscator {
    return this.get(name) ?? none();
  }

  get size(): number {
    return this.entryList.length;
  }

  isEmpty(): boolean {
    return this.entryList.length === 0;
  }

  /** Entries in insertion order. */
  entries(): readonly RegistryEntry[] {
    return this.entryList;
  }

  toString(): string {
    const parts = this.entryList.map(
      (e) =>
        `${e.name}${e.caseSensitivity === CASE_INSENSITIVE ? " (i)" : ""}=${String(e.obfuscator)}`,
    );
    return `{${parts.join(", ")}}`;
  }
}

/**
 * Collects entries for an `ObfuscatorRegistry`. The default case sensitivity
 * only affects entries added after it is changed.
 */
export class RegistryBuilder {
  private readonly entries: RegistryEntry[] = [];
  private readonly sensitiveNames = new Set<string>();
  private readonly insensitiveNames = new Set<string>();
  private defaultCaseSensitivity: CaseSensitivity = CASE_SENSITIVE;

  withEntry(
    name: string,
    obfuscator: Obfuscator,
    caseSensitivity: CaseSensitivity = this.defaultCaseSensitivity,
  ): this {
    requireNonNull(name, "name");
    requireNonNull(obfuscator, "obfuscator");
    requireNonNull(caseSensitivity, "caseSensitivity");

    if (caseSensitivity === CASE_SENSITIVE) {
      if (this.sensitiveNames.has(name)) {
        throw new DuplicateKeyError(`Duplicate key: ${name} (case sensitive)`);
      }
      this.sensitiveNames.add(name);
    } else {
      const folded = foldCase(name);
      if (this.insensitiveNames.has(folded)) {
        throw new DuplicateKeyError(`Duplicate key: ${name} (case insensitive)`);
      }
      this.insensitiveNames.add(folded);
    }
    this.entries.push({ name, obfuscator, caseSensitivity });
    return this;
  }

  caseSensitiveByDefault(): this {
    this.defaultCaseSensitivity = CASE_SENSITIVE;
    return this;
  }

  caseInsensitiveByDefault(): this {
    this.defaultCaseSensitivity = CASE_INSENSITIVE;
    return this;
  }

  build(): ObfuscatorRegistry {
    return new ObfuscatorRegistry(this.entries);
  }
}
