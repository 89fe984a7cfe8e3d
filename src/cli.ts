#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { Scanner } from './lexer/lexer';
import { ScanError } from './lexer/errors';
import { formatScanError, formatToken } from './lexer/diagnostics';
import { Token, TokenType } from './lexer/tokens';
import { loadConfig, loadConfigForScript, WeftConfig } from './runtime/config';

const USAGE = `
weft - Weft source scanner v0.1.0

Usage:
  weft <file.weft>            Print the token stream of a Weft source file
  weft --repl                 Scan lines typed at a prompt (type "exit" to quit)
  weft --help                 Show this help message

Options:
  --json             Print tokens as a JSON array
  --recover          Report every invalid character instead of stopping at the first
  --no-eof           Omit the trailing EOF token
  --config <path>    Path to weft.config.json (auto-detected by default)

Configuration:
  A weft.config.json (or .weftrc.json) next to the source file or in the
  working directory may set "format" ("text" | "json"), "recover" and
  "showEof". Command line flags take precedence.

Examples:
  weft examples/workers.weft
  weft --json examples/workers.weft
  weft --recover broken.weft
`;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

const KNOWN_FLAGS = new Set(['--json', '--recover', '--no-eof', '--config', '--repl', '--help']);

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function printTokens(tokens: Token[], config: WeftConfig, io: CliIO): void {
  const shown = config.showEof === false
    ? tokens.filter(t => t.type !== TokenType.EOF)
    : tokens;

  if (config.format === 'json') {
    io.out(JSON.stringify(shown, null, 2));
    return;
  }
  for (const tok of shown) {
    io.out(formatToken(tok));
  }
}

/**
 * Run the CLI against the given arguments (without the node/script prefix).
 * Returns the process exit code.
 */
export function run(args: string[], io: CliIO = consoleIO): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    io.out(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  for (const flag of flags) {
    if (!KNOWN_FLAGS.has(flag)) {
      io.err(`Error: Unknown option "${flag}"`);
      return 1;
    }
  }
  if (flags.has('--config') && getArg(args, '--config') === undefined) {
    io.err('Error: --config requires a path');
    return 1;
  }

  const flagsWithValues = new Set(['--config']);
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (flagsWithValues.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  if (files.length === 0) {
    io.err('Error: No input file specified.');
    io.out(USAGE);
    return 1;
  }

  const filePath = path.resolve(files[0]);
  if (!fs.existsSync(filePath)) {
    io.err(`Error: File not found: ${filePath}`);
    return 1;
  }

  let config: WeftConfig;
  try {
    const configPath = getArg(args, '--config');
    config = configPath ? loadConfig(configPath) : loadConfigForScript(filePath);
  } catch (e) {
    io.err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
  if (flags.has('--json')) config.format = 'json';
  if (flags.has('--recover')) config.recover = true;
  if (flags.has('--no-eof')) config.showEof = false;

  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf-8');
  } catch (e) {
    io.err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
  const displayName = files[0];
  const scanner = new Scanner(source);

  if (config.recover) {
    const { tokens, errors } = scanner.scanAll();
    printTokens(tokens, config, io);
    for (const error of errors) {
      io.err(formatScanError(error, source, displayName));
    }
    if (errors.length > 0) {
      io.err(`${errors.length} invalid character${errors.length === 1 ? '' : 's'} in ${displayName}`);
      return 1;
    }
    return 0;
  }

  try {
    printTokens(scanner.tokenize(), config, io);
    return 0;
  } catch (e) {
    if (e instanceof ScanError) {
      io.err(formatScanError(e, source, displayName));
      return 1;
    }
    throw e;
  }
}

/** Print the tokens of one line, or the diagnostic for its first bad character. */
export function scanLine(line: string, io: CliIO): void {
  try {
    for (const tok of new Scanner(line).tokenize()) {
      io.out(formatToken(tok));
    }
  } catch (e) {
    if (!(e instanceof ScanError)) throw e;
    io.err(formatScanError(e, line));
  }
}

/**
 * Read lines from `input` and print each one's tokens until "exit" or end
 * of input. Resolves once the line reader closes.
 */
export function startRepl(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  io: CliIO = consoleIO,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const rl = readline.createInterface({ input, output, prompt: '> ', terminal: false });
    let closed = false;
    rl.on('line', raw => {
      if (closed) return;
      const line = raw.trim();
      if (line === 'exit') {
        closed = true;
        rl.close();
        return;
      }
      if (line) {
        try {
          scanLine(line, io);
        } catch (e) {
          closed = true;
          rl.close();
          reject(e);
          return;
        }
      }
      rl.prompt();
    });
    rl.on('close', () => {
      closed = true;
      resolve();
    });
    output.write('Weft scanner REPL. Type "exit" to quit.\n');
    rl.prompt();
  });
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  try {
    if (args.includes('--repl')) {
      await startRepl(process.stdin, process.stdout);
      return;
    }
    process.exitCode = run(args);
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
