#!/usr/bin/env node
import { UUID } from 'bson';
import { decode, encode } from './base57';
import { Id57Error } from './errors';
import { Id57Generator, parse, timestampToDate } from './id57';

export interface ParsedArgs {
  help: boolean;
  ndjson: boolean;
  strict: boolean;
  count: number;
  pad?: number;
  timestamp?: string;
  payload?: string;
  positional: string[];
}

class UsageError extends Error {}

const COMMANDS = ['generate', 'encode', 'decode', 'inspect'];

function parseCount (value: string, min: number): number | undefined {
  const n = Number(value);
  return Number.isInteger(n) && n >= min ? n : undefined;
}

export function parseArgs (argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    ndjson: false,
    strict: false,
    count: 1,
    positional: []
  };

  let i = 2; // Skip node and script path
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--ndjson') {
      args.ndjson = true;
    } else if (arg === '--strict') {
      args.strict = true;
    } else if (arg === '--count' && i + 1 < argv.length) {
      args.count = parseCount(argv[++i], 1) ?? args.count;
    } else if (arg === '--pad' && i + 1 < argv.length) {
      args.pad = parseCount(argv[++i], 0) ?? args.pad;
    } else if (arg === '--timestamp' && i + 1 < argv.length) {
      args.timestamp = argv[++i];
    } else if (arg === '--payload' && i + 1 < argv.length) {
      args.payload = argv[++i];
    } else if (!arg.startsWith('--')) {
      args.positional.push(arg);
    }

    i++;
  }

  return args;
}

function printUsage (): void {
  console.log(`usage: id57 [options] <command> [args]

Commands:
  generate              Print new identifiers
  encode <value>        Encode a non-negative integer as base57
  decode <value>        Decode a base57 string to an integer
  inspect <id>          Show the timestamp and payload of an identifier

Options:
  --help, -h            Show this help message and exit
  --ndjson              Output in newline-delimited JSON format
  --count <n>           Number of identifiers to generate (default: 1)
  --timestamp <us>      Timestamp in microseconds since the epoch (default: now)
  --payload <n>         128-bit payload (default: random)
  --pad <width>         Minimum width for encode
  --strict              Fail instead of exceeding the fixed width

Integers may be decimal or 0x-prefixed hex.
`);
}

export function parseInteger (value: string, label: string): bigint {
  if (value.trim() === '') {
    throw new UsageError(`${label} must be an integer`);
  }
  try {
    return BigInt(value);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new UsageError(`${label} must be an integer, got '${value}'`);
    }
    throw err;
  }
}

function utcnow (): string {
  return new Date().toISOString();
}

function formatDate (timestamp: bigint): string {
  const date = timestampToDate(timestamp);
  return Number.isNaN(date.getTime()) ? 'out of range' : date.toISOString();
}

function formatUuid (payload: bigint): string {
  return new UUID(payload.toString(16).padStart(32, '0')).toHexString();
}

function operand (args: ParsedArgs, name: string): string {
  const value = args.positional[1];
  if (value === undefined) {
    throw new UsageError(`Missing ${name} for ${args.positional[0]}`);
  }
  return value;
}

/** Runs the command named by the first positional argument and returns the output lines. */
export function execute (args: ParsedArgs): string[] {
  const command = args.positional[0];
  const lines: string[] = [];

  switch (command) {
    case 'generate': {
      const generator = new Id57Generator({ strict: args.strict });
      const timestamp = args.timestamp === undefined ? undefined : parseInteger(args.timestamp, 'timestamp');
      const payload = args.payload === undefined ? undefined : parseInteger(args.payload, 'payload');
      for (let n = 0; n < args.count; n++) {
        const id = generator.generate(timestamp, payload);
        lines.push(args.ndjson ? JSON.stringify({ ts: utcnow(), ev: 'generate', id }) : id);
      }
      break;
    }
    case 'encode': {
      const value = parseInteger(operand(args, 'value'), 'value');
      const encoded = encode(value, args.pad, { strict: args.strict });
      lines.push(args.ndjson
        ? JSON.stringify({ ts: utcnow(), ev: 'encode', value: value.toString(), encoded })
        : encoded);
      break;
    }
    case 'decode': {
      const encoded = operand(args, 'value');
      const value = decode(encoded).toString();
      lines.push(args.ndjson ? JSON.stringify({ ts: utcnow(), ev: 'decode', encoded, value }) : value);
      break;
    }
    case 'inspect': {
      const id = operand(args, 'id');
      const { timestamp, payload } = parse(id);
      const date = formatDate(timestamp);
      const uuid = formatUuid(payload);
      if (args.ndjson) {
        lines.push(JSON.stringify({
          ts: utcnow(),
          ev: 'inspect',
          id,
          timestamp: timestamp.toString(),
          date,
          payload: payload.toString(),
          uuid
        }));
      } else {
        lines.push(`timestamp: ${timestamp} (${date})`);
        lines.push(`payload:   ${payload} (${uuid})`);
      }
      break;
    }
    default:
      throw new UsageError(`Unknown command: ${command}. Expected one of ${COMMANDS.join(', ')}`);
  }

  return lines;
}

export function main (argv: string[]): number {
  const args = parseArgs(argv);

  if (args.help || args.positional.length === 0) {
    printUsage();
    return 0;
  }

  try {
    for (const line of execute(args)) {
      console.log(line);
    }
    return 0;
  } catch (err) {
    if (err instanceof Id57Error || err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      if (err instanceof UsageError) {
        printUsage();
      }
      return 1;
    }
    throw err;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv);
}
