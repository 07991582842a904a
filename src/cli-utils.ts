import fs from "node:fs";

import * as v from "valibot";

import {
  CONFIG_ENV,
  createHeaderObfuscator,
  createRequestParameterObfuscator,
  loadObfuscationConfig,
} from "./config.js";
import type { HeaderObfuscator } from "./http/headers.js";
import type { RequestParameterObfuscator } from "./request-parameter-obfuscator.js";
import { TextBuffer } from "./text.js";

const PROGRAM = "http-obfuscate";
const OPTIONS_WITH_VALUE = ["--config", "--parameter", "--header", "--limit"] as const;
type OptionWithValue = (typeof OPTIONS_WITH_VALUE)[number];

const PackageJsonSchema = v.object({ version: v.string() });

export function readVersion(): string {
  // Same relative location from src/ (tsx) and dist/ (compiled).
  const raw: unknown = JSON.parse(
    fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"),
  );
  return v.parse(PackageJsonSchema, raw).version;
}

export interface ParsedCliArgs {
  showHelp: boolean;
  showVersion: boolean;
  headersMode: boolean;
  noIndicator: boolean;
  configFile?: string;
  limit?: number;
  parameters: string[];
  headers: string[];
  error?: string;
}

function isOptionWithValue(value: string): value is OptionWithValue {
  return OPTIONS_WITH_VALUE.some((option) => option === value);
}

export function parseCliArgs(args: string[]): ParsedCliArgs {
  const parsed: ParsedCliArgs = {
    showHelp: false,
    showVersion: false,
    headersMode: false,
    noIndicator: false,
    parameters: [],
    headers: [],
  };
  const fail = (error: string): ParsedCliArgs => ({ ...parsed, error });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-h" || arg === "--help") {
      parsed.showHelp = true;
      continue;
    }
    if (arg === "-v" || arg === "--version") {
      parsed.showVersion = true;
      continue;
    }
    if (arg === "--headers") {
      parsed.headersMode = true;
      continue;
    }
    if (arg === "--no-indicator") {
      parsed.noIndicator = true;
      continue;
    }

    let option: string;
    let value: string | undefined;
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq !== -1) {
      option = arg.slice(0, eq);
      value = arg.slice(eq + 1);
    } else {
      option = arg;
      value = undefined;
    }
    if (!isOptionWithValue(option)) {
      return fail(`Error: Unknown option '${arg}'. Run '${PROGRAM} --help' for usage.`);
    }
    if (value === undefined) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        return fail(`Error: ${option} requires a value`);
      }
      value = next;
      i++;
    }

    switch (option) {
      case "--config":
        parsed.configFile = value;
        break;
      case "--parameter":
        parsed.parameters.push(value);
        break;
      case "--header":
        parsed.headers.push(value);
        break;
      case "--limit":
        if (!/^\d+$/.test(value)) {
          return fail(`Error: Invalid limit '${value}'. Must be a non-negative integer.`);
        }
        parsed.limit = parseInt(value, 10);
        break;
    }
  }
  return parsed;
}

export interface CliObfuscators {
  parameters: RequestParameterObfuscator;
  headers: HeaderObfuscator;
}

/**
 * Build the obfuscators for a CLI run: the config file (from `--config`, or
 * the environment), then the names and limit given on the command line.
 */
export function buildObfuscators(
  args: ParsedCliArgs,
  env: NodeJS.ProcessEnv = process.env,
): CliObfuscators {
  let config = loadObfuscationConfig(
    args.configFile ? { ...env, [CONFIG_ENV.file]: args.configFile } : env,
  );

  const parameters = [
    ...config.parameters,
    ...args.parameters.map((name) => ({ name, obfuscator: { type: "all" as const } })),
  ];
  const headers = [
    ...config.headers,
    ...args.headers.map((name) => ({ name, obfuscator: { type: "all" as const } })),
  ];
  config = { ...config, parameters, headers };
  if (args.limit !== undefined) config = { ...config, limit: args.limit };
  if (args.noIndicator) config = { ...config, truncatedIndicator: null };

  return {
    parameters: createRequestParameterObfuscator(config),
    headers: createHeaderObfuscator(config),
  };
}

/** Obfuscate one `Name: value` line. Lines without a colon are returned unchanged. */
export function obfuscateHeaderLine(line: string, obfuscator: HeaderObfuscator): string {
  const colon = line.indexOf(":");
  if (colon === -1) return line;
  const name = line.slice(0, colon);
  const rest = line.slice(colon + 1);
  const value = rest.trimStart();
  const whitespace = rest.slice(0, rest.length - value.length);
  return `${name}:${whitespace}${obfuscator.obfuscateHeader(name.trim(), value)}`;
}

/**
 * Obfuscate one input line. The line is built completely before it is
 * returned, so a `DecodingError` leaves nothing half written.
 */
export function obfuscateLine(
  line: string,
  obfuscators: CliObfuscators,
  headersMode: boolean,
): string {
  if (headersMode) return obfuscateHeaderLine(line, obfuscators.headers);
  const buffer = new TextBuffer();
  obfuscators.parameters.obfuscateTextTo(line, buffer);
  return buffer.toString();
}

export function formatHelpText(): string {
  return [
    `${PROGRAM} v${readVersion()}`,
    "",
    "Reads lines from stdin and writes them to stdout with sensitive values masked.",
    "Stops with exit code 1 at the first line with a malformed escape sequence;",
    "the lines before it have already been written.",
    "",
    "Usage:",
    `  ${PROGRAM} [options] < query-strings.txt`,
    `  ${PROGRAM} --headers [options] < headers.txt`,
    "",
    "Examples:",
    `  echo 'user=alice&password=secret' | ${PROGRAM} --parameter password`,
    `  printf 'Authorization: Bearer abc\\n' | ${PROGRAM} --headers --header authorization`,
    `  ${PROGRAM} --config obfuscation.json --limit 200 < access.log`,
    "",
    "Options:",
    "  -h, --help             Show this help text",
    "  -v, --version          Show version",
    "  --headers              Treat each line as 'Name: value' instead of a parameter string",
    "  --config <file>        JSON config file with parameters, headers and limit",
    "  --parameter <name>     Mask every character of this parameter (repeatable)",
    "  --header <name>        Mask every character of this header (repeatable)",
    "  --limit <n>            Truncate each obfuscated line after n characters",
    "  --no-indicator         Don't append '... (total: n)' to truncated lines",
    "",
    "Environment variables:",
    "  HTTP_OBFUSCATION_CONFIG        Config file used when --config is not given",
    "  HTTP_OBFUSCATION_LIMIT         Default output limit",
    "  HTTP_OBFUSCATION_NO_INDICATOR  Set to 1 to drop the truncated indicator",
  ].join("\n");
}
