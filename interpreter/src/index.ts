#!/usr/bin/env node
/**
 * Quill interpreter CLI entry point.
 *
 * Usage: quill <file.quill>
 *        quill run <file.quill>
 *        quill run --ast <program.json>
 *        quill check <file.quill> [...]
 *        quill --eval "<code>"
 *        (any form) --trace
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Program } from './ast';
import { ConfigError, loadConfig } from './config';
import { QuillError, QuillNameError } from './errors';
import { formatSignature } from './functions';
import { Interpreter } from './interpreter';
import type { HostIO } from './io';
import { parse } from './parser';
import { parseProgramJson } from './schema';

export interface CliContext {
  /** Program I/O; defaults to the console. */
  io?: HostIO;
  /** Environment variables consulted for configuration. */
  env?: Record<string, string | undefined>;
}

class CliUsageError extends Error {}

/**
 * Run the CLI with the given arguments and return the exit status.
 */
export function runCli(argv: string[], ctx: CliContext = {}): number {
  const traceFlag = argv.includes('--trace');
  const args = argv.filter(a => a !== '--trace');

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  try {
    const config = loadConfig(ctx.env ?? process.env);
    const trace = traceFlag || config.trace;

    if (args[0] === 'check') {
      const files = args.slice(1);
      if (files.length === 0) {
        throw new CliUsageError('check requires at least one file argument');
      }
      return runCheck(files);
    }

    let program: Program;
    if (args[0] === '--eval' || args[0] === '-e') {
      if (args.length < 2) {
        throw new CliUsageError('--eval requires a code argument');
      }
      program = parse(args[1]);
    } else if (args[0] === 'run' && args[1] === '--ast') {
      if (args.length < 3) {
        throw new CliUsageError('run --ast requires a JSON file argument');
      }
      program = parseProgramJson(readFile(args[2]));
    } else if (args[0] === 'run') {
      if (args.length < 2) {
        throw new CliUsageError('run requires a file argument');
      }
      program = parse(readFile(args[1]));
    } else {
      program = parse(readFile(args[0]));
    }

    new Interpreter({ io: ctx.io, trace }).run(program);
    return 0;
  } catch (e) {
    if (e instanceof QuillError || e instanceof ConfigError) {
      console.error(e.message);
      return 1;
    }
    if (e instanceof CliUsageError) {
      console.error(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

/**
 * Parse each file and load its struct and function tables without running
 * it. Returns 0 if all files are clean, 1 if any have errors.
 */
function runCheck(files: string[]): number {
  let hasAnyErrors = false;

  for (const file of files) {
    try {
      const source = readFile(file);
      const program = file.endsWith('.json') ? parseProgramJson(source) : parse(source);
      const { structs, functions } = new Interpreter().load(program);
      const sigs = functions.signatures();
      if (!sigs.some(sig => sig.name === 'main' && sig.params.length === 0)) {
        throw new QuillNameError('No main() function was found');
      }
      console.log(`✓ ${file} — ${plural(structs.names.length, 'struct')}, ${plural(sigs.length, 'function')}`);
      for (const name of structs.names) {
        console.log(`  struct ${structs.describe(name)}`);
      }
      for (const sig of sigs) {
        console.log(`  ${formatSignature(sig)}`);
      }
    } catch (e) {
      if (!(e instanceof QuillError) && !(e instanceof CliUsageError)) throw e;
      hasAnyErrors = true;
      console.log(`✗ ${file} — ${e.message}`);
    }
  }

  return hasAnyErrors ? 1 : 0;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    throw new CliUsageError(`File not found: ${resolved}`);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log('Quill v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  quill <file.quill>                Run a Quill file');
  console.log('  quill run <file.quill>            Run a Quill file');
  console.log('  quill run --ast <program.json>    Run a JSON program tree');
  console.log('  quill check <file.quill> [...]    Parse and load files without running them');
  console.log('  quill --eval "<code>"             Evaluate inline code');
  console.log('  quill --help                      Show this help');
  console.log('');
  console.log('Options:');
  console.log('  --trace    Print each statement to stderr before it runs (or set QUILL_TRACE=1)');
}

function main(): void {
  process.exitCode = runCli(process.argv.slice(2));
}

if (require.main === module) {
  main();
}
