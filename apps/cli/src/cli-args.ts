import { parseArgs } from 'util';
import type { EngineKind } from '@scribeloop/shared-types';
import type { ExportFormat } from '@scribeloop/backend';

export type CliCommand =
  | { name: 'help' }
  | { name: 'devices' }
  | {
      name: 'listen';
      /** `undefined` falls back to `audio.deviceIndex`, `null` is the default device */
      device: number | null | undefined;
      engine: EngineKind | undefined;
      out: string | undefined;
      title: string | undefined;
    }
  | { name: 'once'; device: number | null | undefined; engine: EngineKind | undefined; timeoutMs: number }
  | { name: 'sessions' }
  | { name: 'export'; sessionId: string; format: ExportFormat }
  | { name: 'search'; query: string }
  | { name: 'config-get'; key: string | undefined }
  | { name: 'config-set'; key: string; value: string };

export interface CliOptions {
  command: CliCommand;
  dataDir: string | undefined;
  quiet: boolean;
  verbose: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: scribeloop <command> [options]

Commands:
  devices                          List input devices
  listen [--device N] [--engine K] [--out FILE] [--title T]
                                   Transcribe continuously until Ctrl+C
  once [--device N] [--engine K] [--timeout S]
                                   Transcribe a single phrase
  sessions                         List recorded sessions
  export <id> [--format md|json|txt]
                                   Print a stored session
  search <query>                   Full-text search over transcripts
  config get [key]                 Show configuration
  config set <key> <value>         Change a configuration value

Options:
  --data-dir DIR                   Config and database location (default ~/.scribeloop)
  -q, --quiet                      Only log warnings and errors
  -v, --verbose                    Include debug logs
  -h, --help                       Show this help`;

const ENGINE_KINDS: readonly EngineKind[] = ['sherpa-onnx', 'whisper-cpp', 'http'];
const EXPORT_FORMATS: readonly ExportFormat[] = ['md', 'json', 'txt'];
const DEFAULT_ONCE_TIMEOUT_SECONDS = 10;

export function parseCli(argv: string[]): CliOptions {
  const { values, positionals } = parseRaw(argv);
  const [name, ...rest] = positionals;

  return {
    command: values.help || !name ? { name: 'help' } : toCommand(name, rest, values),
    dataDir: values['data-dir'],
    quiet: values.quiet ?? false,
    verbose: values.verbose ?? false,
  };
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        device: { type: 'string', short: 'd' },
        engine: { type: 'string', short: 'e' },
        out: { type: 'string', short: 'o' },
        title: { type: 'string' },
        timeout: { type: 'string', short: 't' },
        format: { type: 'string', short: 'f' },
        'data-dir': { type: 'string' },
        quiet: { type: 'boolean', short: 'q' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    // unknown options and missing option values
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

interface CommandValues {
  device?: string;
  engine?: string;
  out?: string;
  title?: string;
  timeout?: string;
  format?: string;
}

function toCommand(name: string, rest: string[], values: CommandValues): CliCommand {
  switch (name) {
    case 'devices':
      return { name: 'devices' };
    case 'listen':
      return {
        name: 'listen',
        device: toDevice(values.device),
        engine: toEngine(values.engine),
        out: values.out,
        title: values.title,
      };
    case 'once':
      return {
        name: 'once',
        device: toDevice(values.device),
        engine: toEngine(values.engine),
        timeoutMs: toSeconds(values.timeout ?? String(DEFAULT_ONCE_TIMEOUT_SECONDS)) * 1000,
      };
    case 'sessions':
      return { name: 'sessions' };
    case 'export': {
      const [sessionId] = rest;
      if (!sessionId) throw new UsageError('export needs a session id');
      return { name: 'export', sessionId, format: toFormat(values.format ?? 'md') };
    }
    case 'search': {
      const query = rest.join(' ').trim();
      if (!query) throw new UsageError('search needs a query');
      return { name: 'search', query };
    }
    case 'config':
      return toConfigCommand(rest);
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}

function toConfigCommand([action, key, ...value]: string[]): CliCommand {
  if (action === 'get') return { name: 'config-get', key };
  if (action === 'set') {
    if (!key || value.length === 0) throw new UsageError('config set needs a key and a value');
    return { name: 'config-set', key, value: value.join(' ') };
  }
  throw new UsageError('config needs "get" or "set"');
}

function toDevice(raw: string | undefined): number | null | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'default') return null;
  const index = Number(raw);
  if (!Number.isInteger(index) || index < 0) {
    throw new UsageError(`--device must be a device index or "default", got "${raw}"`);
  }
  return index;
}

function toEngine(raw: string | undefined): EngineKind | undefined {
  if (raw === undefined) return undefined;
  const kind = ENGINE_KINDS.find((k) => k === raw);
  if (!kind) throw new UsageError(`--engine must be one of ${ENGINE_KINDS.join(', ')}`);
  return kind;
}

function toFormat(raw: string): ExportFormat {
  const format = EXPORT_FORMATS.find((f) => f === raw);
  if (!format) throw new UsageError(`--format must be one of ${EXPORT_FORMATS.join(', ')}`);
  return format;
}

function toSeconds(raw: string): number {
  const seconds = Number(raw);
  if (!(seconds > 0)) throw new UsageError(`--timeout must be a positive number of seconds, got "${raw}"`);
  return seconds;
}
