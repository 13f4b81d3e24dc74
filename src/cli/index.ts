/**
 * The `rxdata-codec` command line.
 *
 * Usage:
 *   rxdata-codec convert <in> <out> [--from <format>] [--to <format>]
 *   rxdata-codec dump <file> [--from <format>]
 *   rxdata-codec check <file> --document <kind> [--from <format>]
 *
 * File formats come from the extension (.rxdata, .json, .cbor), then from
 * --from / --to, then from the configured default format.
 */

import {
  DATA_FORMATS,
  parseCodecArgs,
  processEnvironment,
  resolveCodecConfig,
  type CodecConfig,
  type ConfigEnvironment,
  type DataFormat,
} from '../core/config.js';
import { ConfigError, DataFormatError, MarshalError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/log.js';
import { DataFormatHandler, formatForPath, toPortable } from '../formats/index.js';
import type { FileSystem } from '../project/filesystem.js';
import { FileNotFoundError } from '../project/filesystem.js';
import { DOCUMENT_KINDS, countRecords, isDocumentKind } from '../rpg/index.js';

export interface CliIo {
  fs: FileSystem;
  stdout(line: string): void;
  stderr(line: string): void;
  environment?: ConfigEnvironment;
}

interface CommandOptions {
  from?: DataFormat;
  to?: DataFormat;
  document?: string;
}

const USAGE = `Usage: rxdata-codec <command> [options]

Commands:
  convert <in> <out>           Re-encode a document in another format
  dump <file>                  Print a document's value tree as JSON
  check <file> --document <k>  Materialize a document and count its records
                               (${DOCUMENT_KINDS.join(', ')})

Options:
  --from <format>              Input format (marshal, json, cbor)
  --to <format>                Output format (marshal, json, cbor)
  --format <format>            Default format for unknown extensions
  --pretty                     Indent JSON output
  --grid-layout <layout>       Table layout (compact, rgss)
  --string-encoding <enc>      Encoding written on strings (none, utf-8)
  --unknown-classes <policy>   Unregistered parameter classes (error, preserve)
  --log-level <level>          silent, error, warn, info, debug
  --config <path>              Config file
  --help, -h                   Show this help
`;

/** Pull the command-specific flags out of argv; the rest is codec config. */
function splitCommandOptions(argv: string[]): { options: CommandOptions; rest: string[] } {
  const options: CommandOptions = {};
  const rest: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--from':
      case '--to': {
        const value = argv[++i];
        const format = DATA_FORMATS.find((candidate) => candidate === value);
        if (format === undefined) {
          throw new ConfigError(`${arg} must be one of ${DATA_FORMATS.join(', ')}; got ${JSON.stringify(value)}`);
        }
        if (arg === '--from') options.from = format;
        else options.to = format;
        break;
      }
      case '--document': {
        const value = argv[++i];
        if (value === undefined) throw new ConfigError('--document needs a value');
        options.document = value;
        break;
      }
      default:
        rest.push(arg);
    }
  }

  return { options, rest };
}

export async function runCli(argv: string[], io: CliIo): Promise<number> {
  try {
    const { options, rest } = splitCommandOptions(argv);
    const parsed = parseCodecArgs(rest);
    const [command, ...args] = parsed.positionals;

    if (parsed.help || command === undefined) {
      io.stdout(USAGE);
      return parsed.help ? 0 : 1;
    }

    const config = await resolveCodecConfig(parsed, io.environment ?? processEnvironment);
    const logger = createLogger(config.logLevel, (level, message) => io.stderr(`${level}: ${message}`));
    const cli = new CliCommands(io, config, options, logger);

    switch (command) {
      case 'convert':
        return await cli.convert(args);
      case 'dump':
        return await cli.dump(args);
      case 'check':
        return await cli.check(args);
      default:
        io.stderr(`unknown command ${JSON.stringify(command)}`);
        io.stdout(USAGE);
        return 1;
    }
  } catch (error) {
    if (
      error instanceof MarshalError ||
      error instanceof DataFormatError ||
      error instanceof ConfigError ||
      error instanceof FileNotFoundError
    ) {
      io.stderr(`${error.name}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

class CliCommands {
  constructor(
    private readonly io: CliIo,
    private readonly config: CodecConfig,
    private readonly options: CommandOptions,
    private readonly logger: Logger,
  ) {}

  async convert(args: string[]): Promise<number> {
    const [input, output] = args;
    if (input === undefined || output === undefined) {
      this.io.stderr('convert needs <in> and <out>');
      return 1;
    }
    const source = this.handler(this.options.from, input);
    const target = this.handler(this.options.to, output);
    const value = source.readValue(await this.io.fs.read(input));
    await this.io.fs.write(output, target.writeValue(value));
    this.logger.info(`${input} (${source.format}) → ${output} (${target.format})`);
    return 0;
  }

  async dump(args: string[]): Promise<number> {
    const [input] = args;
    if (input === undefined) {
      this.io.stderr('dump needs <file>');
      return 1;
    }
    const value = this.handler(this.options.from, input).readValue(await this.io.fs.read(input));
    this.io.stdout(JSON.stringify(toPortable(value), null, 2));
    return 0;
  }

  async check(args: string[]): Promise<number> {
    const [input] = args;
    const kind = this.options.document;
    if (input === undefined || kind === undefined) {
      this.io.stderr('check needs <file> and --document <kind>');
      return 1;
    }
    if (!isDocumentKind(kind)) {
      this.io.stderr(`unknown document kind ${JSON.stringify(kind)} (expected ${DOCUMENT_KINDS.join(', ')})`);
      return 1;
    }
    const value = this.handler(this.options.from, input).readValue(await this.io.fs.read(input));
    const count = countRecords(kind, value, {
      gridLayout: this.config.gridLayout,
      stringEncoding: this.config.stringEncoding,
      unknownClasses: this.config.unknownClasses,
    });
    this.io.stdout(`${input}: ${kind} ok, ${count} record(s)`);
    return 0;
  }

  private handler(explicit: DataFormat | undefined, path: string): DataFormatHandler {
    const format = explicit ?? formatForPath(path) ?? this.config.format;
    return new DataFormatHandler(format, { pretty: this.config.pretty, dataDir: this.config.dataDir, logger: this.logger });
  }
}
