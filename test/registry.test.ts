import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { DuplicateKeyError, NullArgumentError } from "../src/errors.js";
import { all, fixedLength, none } from "../src/obfuscator.js";
import {
  CASE_INSENSITIVE,
  CASE_SENSITIVE,
  ObfuscatorRegistry,
} from "../src/registry.js";

describe("registry", () => {
  it("looks up case-sensitive entries exactly", () => {
    const mask = all();
    const registry = ObfuscatorRegistry.builder().withEntry("foo", mask).build();
    assert.equal(registry.get("foo"), mask);
    assert.equal(registry.get("Foo"), undefined);
    assert.equal(registry.lookup("FOO"), none());
  });

  it("looks up case-insensitive entries ignoring case", () => {
    const mask = all();
    const registry = ObfuscatorRegistry.builder()
      .withEntry("Authorization", mask, CASE_INSENSITIVE)
      .build();
    assert.equal(registry.get("authorization"), mask);
    assert.equal(registry.get("AUTHORIZATION"), mask);
    assert.equal(registry.get("authorisation"), undefined);
  });

  it("applies the default case sensitivity to entries added after it changes", () => {
    const first = all();
    const second = fixedLength(3);
    const registry = ObfuscatorRegistry.builder()
      .withEntry("first", first)
      .caseInsensitiveByDefault()
      .withEntry("second", second)
      .caseSensitiveByDefault()
      .build();
    assert.equal(registry.get("FIRST"), undefined);
    assert.equal(registry.get("SECOND"), second);
    assert.deepEqual(
      registry.entries().map((e) => e.caseSensitivity),
      [CASE_SENSITIVE, CASE_INSENSITIVE],
    );
  });

  it("rejects duplicates under the same case sensitivity", () => {
    const builder = ObfuscatorRegistry.builder()
      .withEntry("foo", all())
      .withEntry("bar", all(), CASE_INSENSITIVE);
    assert.throws(() => builder.withEntry("foo", none()), {
      name: "DuplicateKeyError",
      message: "Duplicate key: foo (case sensitive)",
    });
    assert.throws(() => builder.withEntry("BAR", none(), CASE_INSENSITIVE), DuplicateKeyError);
    // only differing in case is fine when case sensitive
    builder.withEntry("Foo", none());
    assert.equal(builder.build().size, 3);
  });

  it("keeps case-sensitive and case-insensitive entries with the same name apart", () => {
    const exact = all();
    const folded = fixedLength(3);
    const registry = ObfuscatorRegistry.builder()
      .withEntry("Foo", exact, CASE_SENSITIVE)
      .withEntry("foo", folded, CASE_INSENSITIVE)
      .build();
    assert.equal(registry.size, 2);
    assert.equal(registry.get("Foo"), exact);
    assert.equal(registry.get("foo"), folded);
    assert.equal(registry.get("FOO"), folded);
  });

  it("is not affected by later builder changes", () => {
    const builder = ObfuscatorRegistry.builder().withEntry("a", all());
    const registry = builder.build();
    builder.withEntry("b", all());
    assert.equal(registry.size, 1);
    assert.equal(registry.get("b"), undefined);
  });

  it("describes its entries in insertion order", () => {
    const registry = ObfuscatorRegistry.builder()
      .withEntry("zeta", all())
      .withEntry("alpha", fixedLength(4), CASE_INSENSITIVE)
      .build();
    assert.equal(
      registry.toString(),
      "{zeta=Obfuscator.all(*), alpha (i)=Obfuscator.fixedLength(4)}",
    );
    assert.equal(ObfuscatorRegistry.builder().build().isEmpty(), true);
  });

  it("rejects missing names and obfuscators", () => {
    const builder = ObfuscatorRegistry.builder();
    assert.throws(() => builder.withEntry(null as unknown as string, all()), NullArgumentError);
    assert.throws(
      () => builder.withEntry("foo", undefined as unknown as ReturnType<typeof all>),
      NullArgumentError,
    );
  });
});
