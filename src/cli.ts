#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { EmitError, toJson } from './emitter';
import { ParseError } from './syntax';

/**
 * Line sinks for results and diagnostics; each call writes one line.
 */
export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const PROGRAM = 'rust-expr-json';

const USAGE = [
  `Usage: ${PROGRAM} <expression>`,
  '',
  'Parse a Rust expression and output structured JSON.',
  '',
  'Examples:',
  `  ${PROGRAM} "1 + 2 * 3"`,
  `  ${PROGRAM} "foo.bar(baz)"`,
  `  ${PROGRAM} "if x > 0 { x } else { -x }"`
].join('\n');

/**
 * Runs the command line tool.
 *
 * Expects exactly one argument, the expression text. Writes the JSON
 * encoding to `stdout` and returns `0`; on a usage, parse or encoding
 * error writes a message to `stderr` and returns `1`. Other errors
 * propagate.
 *
 * @param convert
 *   Turns the expression text into JSON text.
 */
export function runCli(
  args: readonly string[],
  io: CliIo,
  convert: (source: string) => string = toJson
): number {
  const [source] = args;
  if (args.length !== 1 || source === undefined) {
    io.stderr(USAGE);
    return 1;
  }

  let json: string;
  try {
    json = convert(source);
  } catch (error) {
    if (error instanceof ParseError) {
      io.stderr(`Parse error: ${error.message}`);
      return 1;
    }
    if (error instanceof EmitError) {
      io.stderr(`Error serializing JSON: ${error.message}`);
      return 1;
    }
    throw error;
  }

  io.stdout(json);
  return 0;
}

const consoleIo: CliIo = {
  stdout: text => console.log(text),
  stderr: text => console.error(text)
};

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isMainModule()) {
  process.exitCode = runCli(process.argv.slice(2), consoleIo);
}
