#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { RuntimeStore, StoreOptions } from './runtime/store';
import { loadConfig, loadConfigForFile, NsconfConfig } from './runtime/config';
import { IoError, TypeMismatchError } from './runtime/errors';
import { ValueKind, valueToString } from './runtime/values';
import {
  TerminalStatusReporter,
  SilentStatusReporter,
  StatusReporter,
} from './runtime/status';

const USAGE = `
nsconf - namespaced configuration inspector v0.1.0

Usage:
  nsconf <file.nsc...>                     Load files and print every variable
  nsconf get <file> <ns> <var>             Print one variable
  nsconf list <file> [ns]                  List namespaces, or the variables of one
  nsconf flatten <file> <ns> <var>         Print the scalar leaves of a list
  nsconf dict <file> <ns> <var>            Print a list of pairs as key = value
  nsconf dump <file.nsc...>                Merge files and print them as one document
  nsconf --lex <file.nsc>                  Tokenize only (print token stream)
  nsconf --parse <file.nsc>                Parse only (print AST as JSON)
  nsconf --help                            Show this help message

Options:
  --type <kind>      With get: require string, integer, float, boolean or list
  --out <path>       With dump: write to a file instead of stdout
  --config <path>    Path to nsconf.config.json (auto-detected by default)
  --trace            Log loads and writes
  --quiet            Suppress load progress (for piping / CI)

Examples:
  nsconf examples/app.nsc
  nsconf get examples/app.nsc server port --type integer
  nsconf dump base.nsc local.nsc --out merged.nsc
`;

const COMMANDS = new Set(['get', 'list', 'flatten', 'dict', 'dump']);
const FLAGS_WITH_VALUES = new Set(['--type', '--out', '--config']);
const KINDS: readonly ValueKind[] = ['string', 'integer', 'float', 'boolean', 'list'];

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function isKind(name: string): name is ValueKind {
  return KINDS.some(kind => kind === name);
}

function positionalArgs(args: string[]): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (FLAGS_WITH_VALUES.has(args[i])) i++; // Skip the flag's value
      continue;
    }
    positionals.push(args[i]);
  }
  return positionals;
}

function readSource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IoError(filePath, 'read', error instanceof Error ? error.message : String(error));
  }
}

function storeOptions(config: NsconfConfig, trace: boolean): StoreOptions {
  return {
    maxDepth: config.maxDepth,
    indent: config.indent,
    trace: trace || config.trace === true,
  };
}

function loadStore(files: string[], options: StoreOptions, status: StatusReporter): RuntimeStore {
  const store = new RuntimeStore(options);
  for (const file of files) {
    status.loading(file);
    try {
      status.loaded(file, store.loadFile(file));
    } catch (error) {
      if (error instanceof Error) status.failed(file, error);
      throw error;
    }
  }
  return store;
}

function requireOperands(operands: string[], count: number, usage: string): void {
  if (operands.length < count) {
    throw new Error(`Usage: nsconf ${usage}`);
  }
}

// bigint has no JSON form
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Run the CLI against an argument list (without the node/script prefix).
 * Returns the process exit code.
 */
export function runCli(args: string[], reporter?: StatusReporter): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  const traceEnabled = flags.has('--trace');

  try {
    const positionals = positionalArgs(args);
    const command = COMMANDS.has(positionals[0]) ? positionals[0] : 'show';
    const operands = command === 'show' ? positionals : positionals.slice(1);

    if (operands.length === 0) {
      throw new Error('No input file specified.');
    }

    // Lex-only mode
    if (flags.has('--lex')) {
      const tokens = new Lexer(readSource(operands[0])).tokenize();
      for (const tok of tokens) {
        const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
        console.log(`${tok.line}:${tok.column}\t${tok.type}${val}`);
      }
      return 0;
    }

    const explicitConfig = getArg(args, '--config');
    const config = explicitConfig ? loadConfig(explicitConfig) : loadConfigForFile(operands[0]);

    // Parse-only mode
    if (flags.has('--parse')) {
      const parser = new Parser({ maxDepth: config.maxDepth });
      const ast = parser.parse(new Lexer(readSource(operands[0])));
      console.log(JSON.stringify(ast, jsonReplacer, 2));
      return 0;
    }

    const status: StatusReporter = reporter
      ?? (flags.has('--quiet') ? new SilentStatusReporter() : new TerminalStatusReporter());
    const options = storeOptions(config, traceEnabled);

    switch (command) {
      case 'get': {
        requireOperands(operands, 3, 'get <file> <namespace> <variable> [--type <kind>]');
        const [file, namespace, variable] = operands;
        const store = loadStore([file], options, status);
        const value = store.getValue(namespace, variable);
        const expected = getArg(args, '--type');
        if (expected !== undefined) {
          if (!isKind(expected)) {
            throw new Error(`Unknown type "${expected}". Use ${KINDS.join(', ')}.`);
          }
          if (value.kind !== expected) {
            throw new TypeMismatchError(expected, value.kind, `${namespace}.${variable}`);
          }
        }
        console.log(valueToString(value));
        return 0;
      }

      case 'list': {
        const [file, namespace] = operands;
        const store = loadStore([file], options, status);
        const names = namespace === undefined
          ? store.listNamespaces()
          : store.listVariables(namespace);
        for (const name of names) {
          console.log(name);
        }
        return 0;
      }

      case 'flatten': {
        requireOperands(operands, 3, 'flatten <file> <namespace> <variable>');
        const [file, namespace, variable] = operands;
        const store = loadStore([file], options, status);
        for (const leaf of store.flattenList(namespace, variable)) {
          console.log(valueToString(leaf));
        }
        return 0;
      }

      case 'dict': {
        requireOperands(operands, 3, 'dict <file> <namespace> <variable>');
        const [file, namespace, variable] = operands;
        const store = loadStore([file], options, status);
        for (const [key, value] of store.asDict(namespace, variable)) {
          console.log(`${key} = ${valueToString(value)}`);
        }
        return 0;
      }

      case 'dump': {
        const store = loadStore(operands, options, status);
        const out = getArg(args, '--out');
        if (out !== undefined) {
          store.dumpToFile(path.resolve(out));
          return 0;
        }
        const text = store.serialize();
        if (text) {
          // serialize() ends with a blank line; console.log supplies the last newline
          console.log(text.slice(0, -1));
        }
        return 0;
      }

      default: {
        const store = loadStore(operands, options, status);
        for (const namespace of store.listNamespaces()) {
          for (const { name, value } of store.getVariables(namespace)) {
            console.log(`${namespace}.${name} = ${valueToString(value)}`);
          }
        }
        return 0;
      }
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    if (traceEnabled && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
