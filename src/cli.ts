#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { toText } from './chars/encoding';
import { formatMark } from './parser/errors';
import { Parser } from './parser/parser';
import { isSchemaName, SCHEMA_NAMES } from './parser/schema';
import { loadConfig, loadConfigForFile, TesseraConfig } from './runtime/config';
import { bigintReplacer, constructDocument, toJS } from './runtime/construct';
import { serveStdio } from './server/tool-server';

const USAGE = `
tessera - YAML 1.2 parser v0.1.0

Usage:
  tessera <file.yaml>          Parse a file and print its documents as JSON
  tessera -                    Read the YAML stream from stdin
  tessera --ast <file.yaml>    Print the syntax tree instead of values
  tessera serve                Run the MCP tool server on stdio
  tessera --help               Show this help message

Options:
  --schema <name>   Scalar schema: ${SCHEMA_NAMES.join(', ')} (default: core, or yaml-1.1 for %YAML 1.1)
  --trace           Trace parser states on stderr
  --config <path>   Path to tessera.config.json (auto-detected by default)

Examples:
  tessera config.yaml
  tessera --schema failsafe config.yaml
  cat stream.yaml | tessera --ast -
`;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Uint8Array;
}

const processIO: CliIO = {
  stdout: text => process.stdout.write(text + '\n'),
  stderr: text => process.stderr.write(text + '\n'),
  readStdin: () => fs.readFileSync(0),
};

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/** Alias targets are written once, at their anchor. */
function astReplacer(key: string, value: unknown): unknown {
  if (key === 'target') return undefined;
  return bigintReplacer(key, value);
}

/**
 * Run the command line. Resolves to the exit code, or to null while the
 * MCP server keeps the process alive.
 */
export async function run(args: string[], io: CliIO = processIO): Promise<number | null> {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    io.stdout(USAGE);
    return 0;
  }

  try {
    const flagsWithValues = new Set(['--schema', '--config']);
    const files: string[] = [];
    for (let i = 0; i < args.length; i++) {
      if (args[i].startsWith('--')) {
        if (flagsWithValues.has(args[i])) i++;
        continue;
      }
      files.push(args[i]);
    }

    const configPath = getArg(args, '--config');
    const input = files[0];
    const config: TesseraConfig = configPath
      ? loadConfig(configPath)
      : input !== undefined && input !== '-' && input !== 'serve'
        ? loadConfigForFile(input)
        : loadConfig();

    const schemaArg = getArg(args, '--schema');
    if (schemaArg !== undefined && !isSchemaName(schemaArg)) {
      throw new Error(`Unknown schema "${schemaArg}". Use one of: ${SCHEMA_NAMES.join(', ')}`);
    }
    const schema = schemaArg ?? config.schema;
    const trace = args.includes('--trace') || config.trace === true;

    if (input === 'serve') {
      await serveStdio({ schema, trace, maxAliasExpansion: config.maxAliasExpansion });
      return null;
    }

    if (input === undefined) {
      throw new Error('No input file specified. Run "tessera --help" for usage.');
    }

    let bytes: Uint8Array;
    if (input === '-') {
      bytes = io.readStdin();
    } else {
      const filePath = path.resolve(input);
      if (!fs.existsSync(filePath)) {
        throw new Error(`File not found: ${filePath}`);
      }
      bytes = fs.readFileSync(filePath);
    }

    const documents = new Parser(toText(bytes), { schema, trace }).parse();
    for (const warning of documents.flatMap(document => document.warnings)) {
      io.stderr(`warning: ${warning.message} (${formatMark(warning.position)})`);
    }

    if (args.includes('--ast')) {
      io.stdout(JSON.stringify(documents, astReplacer, 2));
      return 0;
    }

    const values = documents.map(document =>
      toJS(constructDocument(document, { schema, maxAliasExpansion: config.maxAliasExpansion })),
    );
    io.stdout(JSON.stringify(values, bigintReplacer, 2));
    return 0;
  } catch (error) {
    io.stderr(`error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    code => {
      if (code !== null) process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
