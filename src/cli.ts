#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { createNotationContext } from './context';
import type { NotationContext } from './context';
import { NotationParseError } from './errors';
import { NotationSet } from './notation-set';
import { installPhysicsSymbols } from './physics-symbols';
import { REPRESENTATIONS, isRepresentation } from './representation';
import type { Representation } from './representation';
import { installStandardModelSymbols } from './standard-model-symbols';
import { formatLookupTable } from './table-format';

export type OutputFormat = Representation | 'all';

export interface CliOptions {
  help: boolean;
  version: boolean;
  expressions: string[];
  format: OutputFormat;
  strict: boolean;
  list: boolean;
  tableId?: string;
  ascii: boolean;
  width?: number;
}

export function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const options: CliOptions = {
    help: false,
    version: false,
    expressions: [],
    format: 'unicode',
    strict: false,
    list: false,
    ascii: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const requireValue = (flag: string): string => {
      if (i + 1 >= args.length || args[i + 1].startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      i++;
      return args[i];
    };

    if (arg === '--help') {
      options.help = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '--strict') {
      options.strict = true;
    } else if (arg === '--list') {
      options.list = true;
    } else if (arg === '--ascii') {
      options.ascii = true;
    } else if (arg === '--format') {
      const format = requireValue('--format').toLowerCase();
      if (format === 'all' || isRepresentation(format)) {
        options.format = format;
      } else {
        throw new Error(`Invalid format "${format}". Use plain, unicode, html, latex, or all`);
      }
    } else if (arg === '--table') {
      options.tableId = requireValue('--table');
    } else if (arg === '--width') {
      const width = requireValue('--width');
      if (!/^\d+$/.test(width) || Number(width) < 1) {
        throw new Error(`Invalid width "${width}". Use a positive integer`);
      }
      options.width = Number(width);
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}"`);
    } else {
      options.expressions.push(arg);
    }
  }

  const listing = options.list || options.tableId !== undefined;
  if (!options.help && !options.version && !listing && options.expressions.length === 0) {
    throw new Error('No expression specified');
  }

  return options;
}

function showHelp() {
  console.log(`Usage: notation <expression...> [options]

Render notation such as "H$sub(2)O" or "$greek(Delta)E" as plain text,
Unicode, HTML or LaTeX.

Options:
  --help             Show this help message
  --version          Show version number
  --format <fmt>     Output format: plain, unicode, html, latex, all (default: unicode)
  --strict           Fail on unknown calls and keys instead of falling back
  --list             List installed lookup tables
  --table <id>       Print a lookup table
  --ascii            Print table codes as ASCII escapes
  --width <n>        Table width in columns (default: terminal width or 80)`);
}

export function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  throw new Error('package.json has no version');
}

function selectedRepresentations(format: OutputFormat): readonly Representation[] {
  return format === 'all' ? REPRESENTATIONS : [format];
}

export function listTables(context: NotationContext, format: OutputFormat): string[] {
  const lines: string[] = [];
  for (const representation of selectedRepresentations(format)) {
    for (const tableId of context.tables.listTables(representation)) {
      lines.push(`${representation}:${tableId}  ${context.tables.getDescription(representation, tableId)}`);
    }
  }
  return lines;
}

export function printTables(context: NotationContext, options: CliOptions, tableId: string): string[] {
  const width = options.width ?? (process.stdout.isTTY ? process.stdout.columns : undefined);
  const representations = options.format === 'all'
    ? REPRESENTATIONS.filter(rep => context.tables.hasTable(rep, tableId))
    : [options.format];
  if (representations.length === 0) {
    throw new Error(`No table "${tableId}" is installed`);
  }
  return representations.map(rep => formatLookupTable(context.tables, rep, tableId, { ascii: options.ascii, width }));
}

/** Everything the command prints to stdout, one entry per line or block. */
export function runCli(options: CliOptions): string[] {
  const context = createNotationContext({ strict: options.strict });
  installPhysicsSymbols(context);
  installStandardModelSymbols(context);

  const output: string[] = [];
  if (options.list) {
    output.push(...listTables(context, options.format));
  }
  if (options.tableId !== undefined) {
    output.push(...printTables(context, options, options.tableId));
  }
  for (const expression of options.expressions) {
    if (options.format === 'all') {
      output.push(new NotationSet(context, expression).describe());
    } else {
      output.push(context.encoders[options.format].parse(expression));
    }
  }
  return output;
}

export function describeError(err: unknown): string {
  if (err instanceof NotationParseError) return err.format();
  if (err instanceof Error) return err.message;
  return String(err);
}

export function main(argv: string[] = process.argv): void {
  const options = parseArgs(argv);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    console.log(readVersion());
    return;
  }

  for (const block of runCli(options)) {
    console.log(block);
  }
}

if (require.main === module) {
  try {
    main();
  } catch (e) {
    console.error(describeError(e));
    process.exit(1);
  }
}
