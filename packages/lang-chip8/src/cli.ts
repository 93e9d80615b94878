import path from 'node:path';
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';

import { tokenizeSource } from './classifier.js';
import { asDisplayError, LangToolError } from './errors.js';
import { findUnformattedLines, formatSource } from './format.js';
import { resolveOptions } from './options.js';
import type { LangOptions } from './types.js';

type CliCommand = 'format' | 'check' | 'tokens';

interface CliOptions {
  command?: CliCommand;
  input?: string;
  output?: string;
  write: boolean;
  column?: string;
  help: boolean;
}

function printUsage(): void {
  console.log('Usage: chip8-lang <format|check|tokens> -i <input.c8> [-o out.c8] [--write] [--column 8]');
}

function isCommand(value: string): value is CliCommand {
  return value === 'format' || value === 'check' || value === 'tokens';
}

function parseArgs(args: string[]): CliOptions {
  const opts: CliOptions = { write: false, help: false };
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i] ?? '';
    const next = args[i + 1];
    switch (token) {
      case '-i':
      case '--input':
        opts.input = next;
        i += 1;
        break;
      case '-o':
      case '--output':
        opts.output = next;
        i += 1;
        break;
      case '-w':
      case '--write':
        opts.write = true;
        break;
      case '--column':
        opts.column = next;
        i += 1;
        break;
      case '-h':
      case '--help':
        opts.help = true;
        break;
      default:
        if (opts.command === undefined && isCommand(token)) {
          opts.command = token;
        } else if (opts.input === undefined && !token.startsWith('-')) {
          opts.input = token;
        }
        break;
    }
  }
  return opts;
}

function parseColumn(raw: string | undefined): Partial<LangOptions> {
  if (raw === undefined) {
    return {};
  }
  if (!/^[0-9]+$/.test(raw)) {
    throw new LangToolError('BAD_OPTION', `--column expects a number: ${raw}`);
  }
  return resolveOptions({ instructionColumn: Number.parseInt(raw, 10) });
}

function readSource(inputPath: string): string {
  try {
    return readFileSync(inputPath, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new LangToolError('READ_FAILED', `Failed to read input: ${inputPath}: ${detail}`);
  }
}

function writeOutput(outputPath: string, text: string): void {
  try {
    mkdirSync(path.dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, text, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new LangToolError('WRITE_FAILED', `Failed to write output: ${outputPath}: ${detail}`);
  }
}

function runFormat(inputPath: string, source: string, opts: CliOptions, options: Partial<LangOptions>): void {
  const formatted = formatSource(source, options);
  const target = opts.output ? path.resolve(process.cwd(), opts.output) : opts.write ? inputPath : undefined;
  if (target === undefined) {
    process.stdout.write(formatted);
    return;
  }
  writeOutput(target, formatted);
  console.log(`Formatted ${inputPath} -> ${target}`);
}

function runCheck(inputPath: string, source: string, options: Partial<LangOptions>): void {
  const lines = findUnformattedLines(source, options);
  for (const line of lines) {
    console.error(`${inputPath}:${line}: not indented`);
  }
  if (lines.length > 0) {
    throw new LangToolError('UNFORMATTED', `${lines.length} line(s) need formatting`);
  }
  console.log(`${inputPath}: ok`);
}

function runTokens(source: string): void {
  for (const token of tokenizeSource(source, { comments: true })) {
    console.log(`${token.line + 1}:${token.start}-${token.end} ${token.category} ${token.text}`);
  }
}

export function runCli(argv: string[]): number {
  const opts = parseArgs(argv);
  if (opts.help) {
    printUsage();
    return 0;
  }
  if (!opts.command || !opts.input) {
    printUsage();
    return 1;
  }

  const inputPath = path.resolve(process.cwd(), opts.input);
  try {
    const options = parseColumn(opts.column);
    const source = readSource(inputPath);
    switch (opts.command) {
      case 'format':
        runFormat(inputPath, source, opts, options);
        break;
      case 'check':
        runCheck(inputPath, source, options);
        break;
      case 'tokens':
        runTokens(source);
        break;
    }
  } catch (error) {
    console.error(asDisplayError(error));
    return 1;
  }

  return 0;
}
