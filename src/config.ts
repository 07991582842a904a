/**
 * Obfuscation configuration.
 *
 * Env vars:
 *   HTTP_OBFUSCATION_CONFIG        path to a JSON config file (optional)
 *   HTTP_OBFUSCATION_LIMIT         output limit override, non-negative integer
 *   HTTP_OBFUSCATION_NO_INDICATOR  "1" to drop the truncated indicator
 */

import fs from "node:fs";

import * as v from "valibot";

import { IllegalConfigurationError } from "./errors.js";
import { HeaderObfuscator } from "./http/headers.js";
import { type Obfuscator, all, fixedLength, none } from "./obfuscator.js";
import { CASE_INSENSITIVE, CASE_SENSITIVE } from "./registry.js";
import { RequestParameterObfuscator } from "./request-parameter-obfuscator.js";
import {
  type ObfuscationConfig,
  ObfuscationConfigSchema,
  type ObfuscatorSpec,
} from "./schemas.js";

export type { ObfuscationConfig, ObfuscatorSpec } from "./schemas.js";

export const CONFIG_ENV = {
  file: "HTTP_OBFUSCATION_CONFIG",
  limit: "HTTP_OBFUSCATION_LIMIT",
  noIndicator: "HTTP_OBFUSCATION_NO_INDICATOR",
} as const;

export function parseObfuscationConfig(raw: unknown): ObfuscationConfig {
  const result = v.safeParse(ObfuscationConfigSchema, raw);
  if (!result.success) {
    throw new IllegalConfigurationError(
      `Invalid obfuscation config: ${v.summarize(result.issues)}`,
    );
  }
  return result.output;
}

export function readObfuscationConfigFile(path: string): ObfuscationConfig {
  const text = fs.readFileSync(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e: unknown) {
    throw new IllegalConfigurationError(`${path} is not valid JSON`, { cause: e });
  }
  return parseObfuscationConfig(raw);
}

export function parseLimit(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new IllegalConfigurationError(
      `limit must be a non-negative integer, got: ${value}`,
    );
  }
  return parseInt(value, 10);
}

export function loadObfuscationConfig(
  env: NodeJS.ProcessEnv = process.env,
): ObfuscationConfig {
  const file = env[CONFIG_ENV.file];
  let config = file ? readObfuscationConfigFile(file) : parseObfuscationConfig({});

  const limit = env[CONFIG_ENV.limit];
  if (limit !== undefined && limit !== "") {
    config = { ...config, limit: parseLimit(limit) };
  }
  if (env[CONFIG_ENV.noIndicator] === "1") {
    config = { ...config, truncatedIndicator: null };
  }
  return config;
}

export function createObfuscator(spec: ObfuscatorSpec): Obfuscator {
  switch (spec.type) {
    case "all":
      return all(spec.maskChar);
    case "fixed-length":
      return fixedLength(spec.length, spec.maskChar);
    case "none":
      return none();
  }
}

export function createRequestParameterObfuscator(
  config: ObfuscationConfig,
): RequestParameterObfuscator {
  const builder = RequestParameterObfuscator.builder().withEncoding(config.encoding);
  if (config.caseSensitiveByDefault) {
    builder.caseSensitiveByDefault();
  } else {
    builder.caseInsensitiveByDefault();
  }
  for (const parameter of config.parameters) {
    const caseSensitivity =
      parameter.caseSensitive === undefined
        ? undefined
        : parameter.caseSensitive
          ? CASE_SENSITIVE
          : CASE_INSENSITIVE;
    builder.withParameter(parameter.name, createObfuscator(parameter.obfuscator), caseSensitivity);
  }
  if (config.limit !== undefined) {
    const limit = builder.limitTo(config.limit);
    if (config.truncatedIndicator !== undefined) {
      limit.withTruncatedIndicator(config.truncatedIndicator);
    }
  }
  return builder.build();
}

export function createHeaderObfuscator(config: ObfuscationConfig): HeaderObfuscator {
  const builder = HeaderObfuscator.builder();
  for (const header of config.headers) {
    builder.withHeader(header.name, createObfuscator(header.obfuscator));
  }
  return builder.build();
}
