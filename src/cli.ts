#!/usr/bin/env node

import readline from "node:readline";

import {
  type CliObfuscators,
  type ParsedCliArgs,
  buildObfuscators,
  formatHelpText,
  obfuscateLine,
  parseCliArgs,
  readVersion,
} from "./cli-utils.js";
import { writableAppendable } from "./text.js";

const parsedArgs = parseCliArgs(process.argv.slice(2));
if (parsedArgs.error) {
  console.error(parsedArgs.error);
  process.exit(1);
}
if (parsedArgs.showHelp) {
  console.log(formatHelpText());
  process.exit(0);
}
if (parsedArgs.showVersion) {
  console.log(readVersion());
  process.exit(0);
}

void run(parsedArgs).then((exitCode) => {
  process.exitCode = exitCode;
});

async function run(args: ParsedCliArgs): Promise<number> {
  let obfuscators: CliObfuscators;
  try {
    obfuscators = buildObfuscators(args);
  } catch (err: unknown) {
    console.error("Error:", err instanceof Error ? err.message : String(err));
    return 1;
  }

  const stdout = writableAppendable(process.stdout, { end: false });
  const lines = readline.createInterface({
    input: process.stdin,
    crlfDelay: Infinity,
  });
  try {
    for await (const line of lines) {
      stdout.append(`${obfuscateLine(line, obfuscators, args.headersMode)}\n`);
    }
  } catch (err: unknown) {
    console.error("Failed to obfuscate input:", err instanceof Error ? err.message : String(err));
    return 1;
  } finally {
    lines.close();
  }
  return 0;
}
