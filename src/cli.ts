#!/usr/bin/env node
import { EJSON, Binary } from 'bson';
import { HEX_LENGTH, Ksuid, KsuidError, KsuidGenerator } from './ksuid';

type OutputFormat = 'base62' | 'hex';

export interface ParsedArgs {
  help: boolean;
  ndjson: boolean;
  inspect: boolean;
  count: number;
  format: OutputFormat;
  logLevel: 'debug' | 'info';
  positional: string[];
}

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line)
};

function parseCount (value: string | undefined): number | undefined {
  const count = Number(value);
  return Number.isInteger(count) && count >= 0 ? count : undefined;
}

export function parseArgs (argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    ndjson: false,
    inspect: false,
    count: 1,
    format: 'base62',
    logLevel: 'info',
    positional: []
  };

  let i = 2; // Skip node and script path
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--ndjson') {
      args.ndjson = true;
    } else if ((arg === '--count' || arg === '-n') && i + 1 < argv.length) {
      args.count = parseCount(argv[++i]) ?? args.count;
    } else if (arg.startsWith('--count=') || arg.startsWith('-n=')) {
      args.count = parseCount(arg.slice(arg.indexOf('=') + 1)) ?? args.count;
    } else if (arg === '--format' && i + 1 < argv.length) {
      const format = argv[++i];
      if (format === 'base62' || format === 'hex') {
        args.format = format;
      }
    } else if (arg === '--log-level' && i + 1 < argv.length) {
      const level = argv[++i];
      if (level === 'debug' || level === 'info') {
        args.logLevel = level;
      }
    } else if (arg === 'inspect' && !args.inspect && args.positional.length === 0) {
      args.inspect = true;
    } else if (!arg.startsWith('-')) {
      args.positional.push(arg);
    }

    i++;
  }

  return args;
}

export function usage (): string {
  return `usage: ksuid [options]
       ksuid inspect <ids>...

Generate mode (default):
  ksuid [--count <n>] [--format <base62|hex>]

Inspect mode:
  ksuid inspect <ids>...   Decode 27-character base62 or 40-character hex KSUIDs

Options:
  --help, -h            Show this help message and exit
  --count, -n <n>       Number of KSUIDs to generate (default: 1)
  --format <format>     Output format for generated KSUIDs: 'base62' or 'hex' (default: base62)
  --ndjson              Output in newline-delimited JSON format
  --log-level <level>   Log level: 'debug' or 'info' (default: info)
`;
}

function utcnow (): string {
  return new Date().toISOString();
}

function debug (args: ParsedArgs, out: CliOutput, message: string): void {
  if (args.logLevel !== 'debug') {
    return;
  }
  if (args.ndjson) {
    out.log(JSON.stringify({ ts: utcnow(), ev: 'debug', message }));
  } else {
    out.log(`DEBUG: ${message}`);
  }
}

export function formatInspection (id: Ksuid): string {
  const hex = id.toHex();
  return `
REPRESENTATION:

  String: ${id.toBase62()}
     Raw: ${hex}

COMPONENTS:

       Time: ${id.time().toUTCString()}
  Timestamp: ${id.timestamp()}
    Payload: ${hex.slice(8)}
`;
}

export function runGenerate (args: ParsedArgs, generator: KsuidGenerator, out: CliOutput = consoleOutput): void {
  debug(args, out, `generating ${args.count} KSUID(s) as ${args.format}`);

  for (let i = 0; i < args.count; i++) {
    const id = generator.next();
    const text = args.format === 'hex' ? id.toHex() : id.toBase62();
    if (args.ndjson) {
      out.log(JSON.stringify({ ts: utcnow(), ev: 'generated', id: text }));
    } else {
      out.log(text);
    }
  }
}

/** Returns the process exit code: 1 if any id failed to parse. */
export function runInspect (args: ParsedArgs, out: CliOutput = consoleOutput): number {
  let exitCode = 0;

  for (const input of args.positional) {
    let id: Ksuid;
    try {
      id = Ksuid.parse(input);
    } catch (err) {
      if (!(err instanceof KsuidError)) {
        throw err;
      }
      exitCode = 1;
      if (args.ndjson) {
        out.log(JSON.stringify({ ts: utcnow(), ev: 'parseError', input, code: err.code, err: err.message }));
      } else {
        out.error(`Error: invalid KSUID ${input}: ${err.message}`);
      }
      continue;
    }

    debug(args, out, `parsed ${input} as ${input.length === HEX_LENGTH ? 'hex' : 'base62'}`);
    if (args.ndjson) {
      out.log(EJSON.stringify({
        ts: utcnow(),
        ev: 'inspect',
        input,
        string: id.toBase62(),
        raw: id.toHex(),
        time: id.time(),
        timestamp: id.timestamp(),
        payload: new Binary(id.payload())
      }));
    } else {
      out.log(formatInspection(id));
    }
  }

  return exitCode;
}

export function main (argv: string[], out: CliOutput = consoleOutput, generator = new KsuidGenerator()): number {
  const args = parseArgs(argv);

  if (args.help) {
    out.log(usage());
    return 0;
  }

  if (args.inspect) {
    if (args.positional.length === 0) {
      out.error('Error: inspect requires at least one KSUID');
      out.log(usage());
      return 1;
    }
    return runInspect(args, out);
  }

  runGenerate(args, generator, out);
  return 0;
}

if (require.main === module) {
  process.exitCode = main(process.argv);
}
