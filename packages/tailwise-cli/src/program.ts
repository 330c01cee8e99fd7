/**
 * Tailwise CLI - parse Scheme-family source and dump the AST
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { Interner, parse, parseDatum, tokenize, type AstNode } from 'tailwise-core';
import { type OutputFormat, formatForms, formatTokens, isOutputFormat, outputFormats } from './format.js';

/**
 * Where the CLI writes and how it exits; replaced in tests
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): string;
  exit(code: number): void;
}

export const processIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readStdin: () => fs.readFileSync(0, 'utf-8'),
  exit: (code) => process.exit(code),
};

interface ParseOptions {
  data?: boolean;
  format: OutputFormat;
  eval?: string;
}

interface Source {
  name: string;
  text: string;
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${outputFormats.join(', ')}`);
  }
  return value;
}

function readSources(files: string[], io: CliIO): Source[] {
  if (files.length === 0 || (files.length === 1 && files[0] === '-')) {
    return [{ name: '<stdin>', text: io.readStdin() }];
  }

  return files.map((file) => {
    if (!fs.existsSync(file)) {
      throw new Error(`Input file not found: ${file}`);
    }
    return { name: file, text: fs.readFileSync(path.resolve(file), 'utf-8') };
  });
}

/**
 * Print the failure and exit with status 1
 */
function fail(error: unknown, io: CliIO): void {
  if (error instanceof Error) {
    io.stderr(`Error: ${error.message}`);
    if (process.env.DEBUG && error.stack) {
      io.stderr(error.stack);
    }
  } else {
    io.stderr(`Error: ${String(error)}`);
  }
  io.exit(1);
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('tailwise')
    .description('Parse a small Scheme-family language into a tail-position aware AST')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command('parse')
    .description('Parse source files (or stdin) and print the AST')
    .argument('[files...]', 'Source files; "-" or none reads stdin')
    .option('--data', 'Parse each input as a single datum instead of code')
    .option('-f, --format <format>', `Output format (${outputFormats.join(', ')})`, parseFormat, 'sexp')
    .option('-e, --eval <source>', 'Parse the given text instead of files')
    .action((files: string[], options: ParseOptions) => {
      try {
        const sources = options.eval !== undefined
          ? [{ name: '<eval>', text: options.eval }]
          : readSources(files, io);

        // One interner for the whole run, so symbol ids agree across files
        const interner = Interner.create();
        const forms: AstNode[] = [];

        for (const source of sources) {
          if (options.data) {
            forms.push(parseDatum(source.text, interner, source.name));
          } else {
            forms.push(...parse(source.text, interner, source.name));
          }
        }

        if (process.env.DEBUG) {
          io.stderr(`[parse] ${forms.length} form(s), ${interner.size} symbol(s)`);
        }

        io.stdout(formatForms(forms, interner, options.format));
      } catch (error) {
        fail(error, io);
      }
    });

  program
    .command('tokens')
    .description('Print the token stream of a source file (or stdin)')
    .argument('[file]', 'Source file; "-" or none reads stdin')
    .action((file: string | undefined) => {
      try {
        const [source] = readSources(file === undefined ? [] : [file], io);
        io.stdout(formatTokens(tokenize(source.text, source.name)));
      } catch (error) {
        fail(error, io);
      }
    });

  return program;
}
