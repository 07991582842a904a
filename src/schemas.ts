/**
 * Valibot schemas for obfuscation config files.
 *
 * The config types below are inferred from the schemas; the builders in
 * config.ts turn a validated config into obfuscators.
 */

import * as v from "valibot";

// ---------------------------------------------------------------------------
// Obfuscators
// ---------------------------------------------------------------------------

const MaskCharSchema = v.pipe(v.string(), v.length(1, "maskChar must be a single character"));

const AllObfuscatorSchema = v.object({
  type: v.literal("all"),
  maskChar: v.optional(MaskCharSchema),
});

const FixedLengthObfuscatorSchema = v.object({
  type: v.literal("fixed-length"),
  length: v.pipe(v.number(), v.integer(), v.minValue(0)),
  maskChar: v.optional(MaskCharSchema),
});

const NoneObfuscatorSchema = v.object({
  type: v.literal("none"),
});

export const ObfuscatorSpecSchema = v.variant("type", [
  AllObfuscatorSchema,
  FixedLengthObfuscatorSchema,
  NoneObfuscatorSchema,
]);

// ---------------------------------------------------------------------------
// Entries
// ---------------------------------------------------------------------------

const NameSchema = v.pipe(v.string(), v.minLength(1, "name must not be empty"));

const ParameterEntrySchema = v.object({
  name: NameSchema,
  obfuscator: ObfuscatorSpecSchema,
  caseSensitive: v.optional(v.boolean()),
});

const HeaderEntrySchema = v.object({
  name: NameSchema,
  obfuscator: ObfuscatorSpecSchema,
});

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

export const ObfuscationConfigSchema = v.object({
  caseSensitiveByDefault: v.optional(v.boolean(), true),
  encoding: v.optional(v.string(), "utf-8"),
  limit: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0))),
  truncatedIndicator: v.optional(v.nullable(v.string())),
  parameters: v.optional(v.array(ParameterEntrySchema), []),
  headers: v.optional(v.array(HeaderEntrySchema), []),
});

export type ObfuscatorSpec = v.InferOutput<typeof ObfuscatorSpecSchema>;
export type ObfuscationConfig = v.InferOutput<typeof ObfuscationConfigSchema>;
