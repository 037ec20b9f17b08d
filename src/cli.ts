#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { AstFormat, loadConfig, loadConfigForSource, SpireConfig } from './config';

export const USAGE = `
spire - The Spire language front end v0.1.0

Usage:
  spire <file.spr>            Parse a file and print its syntax tree
  spire --parse <file.spr>    Same as above
  spire --lex <file.spr>      Tokenize and print the token stream
  spire --help                Show this help message

Options:
  --json             Print the syntax tree as JSON
  --noise            Keep spaces, comments and newlines in --lex output
  --trace            Trace grammar rules while parsing
  --config <path>    Path to spire.config.json (auto-detected by default)

Configuration:
  A spire.config.json (or .spirerc.json) next to the source file or in the
  working directory may set:
    "astFormat": "tree" | "json"
    "showNoise": true | false

Examples:
  spire examples/main.spr
  spire --lex --noise examples/main.spr
  spire --json examples/main.spr
`;

const FLAGS_WITH_VALUES = new Set(['--config']);

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/**
 * Runs the command line and returns the process exit code.
 */
export function runCli(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (FLAGS_WITH_VALUES.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  if (files.length === 0) {
    console.error('Error: No input file specified.');
    console.log(USAGE);
    return 1;
  }

  const filePath = path.resolve(files[0]);
  if (!fs.existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    return 1;
  }

  const traceEnabled = flags.has('--trace');

  try {
    const source = fs.readFileSync(filePath, 'utf-8');
    const configPath = getArg(args, '--config');
    const config: SpireConfig = configPath ? loadConfig(configPath) : loadConfigForSource(filePath);
    const lexer = new Lexer();

    if (flags.has('--lex')) {
      const keepNoise = flags.has('--noise') || (config.showNoise ?? false);
      for (const tok of lexer.tokens(source, { keepNoise })) {
        console.log(`${tok.line}:${tok.column}\t${tok.type} ${JSON.stringify(tok.raw)}`);
      }
      return 0;
    }

    const format: AstFormat = flags.has('--json') ? 'json' : (config.astFormat ?? 'tree');
    const parser = new Parser({ trace: traceEnabled });
    const ast = parser.parse(lexer.tokens(source));
    console.log(format === 'json' ? JSON.stringify(ast, null, 2) : ast.render());
    return 0;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`Error: ${message}`);
    if (traceEnabled && e instanceof Error && e.stack) {
      console.error(e.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
