/**
 * Document storage formats.
 *
 * ┌──────────┬───────────┬─────────────────────────────────────────────┐
 * │ format   │ extension │ contents                                    │
 * ├──────────┼───────────┼─────────────────────────────────────────────┤
 * │ marshal  │ .rxdata   │ Marshal 4.8 bytes                           │
 * │ json     │ .json     │ portable tree as UTF-8 JSON                 │
 * │ cbor     │ .cbor     │ portable tree as CBOR                       │
 * └──────────┴───────────┴─────────────────────────────────────────────┘
 *
 * Every format goes through the same intermediate tree and therefore the
 * same schema layer, so typed validation does not depend on the format.
 */

import { decode as decodeCbor, encode as encodeCbor } from 'cborg';
import type { DataFormat } from '../core/config.js';
import { DataFormatError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/log.js';
import type { MarshalValue } from '../core/types.js';
import { decode, encode } from '../protocol/index.js';
import { dematerialize, materialize, type SchemaOptions, type Transform } from '../schema/index.js';
import { fromPortable, toPortable } from './portable.js';

export const FORMAT_EXTENSIONS: Record<DataFormat, string> = {
  marshal: 'rxdata',
  json: 'json',
  cbor: 'cbor',
};

/** Format implied by a file name's extension, if any. */
export function formatForPath(path: string): DataFormat | undefined {
  const dot = path.lastIndexOf('.');
  if (dot === -1) return undefined;
  const extension = path.slice(dot + 1).toLowerCase();
  switch (extension) {
    case 'rxdata':
      return 'marshal';
    case 'json':
      return 'json';
    case 'cbor':
      return 'cbor';
    default:
      return undefined;
  }
}

export interface DataFormatOptions {
  /** Indent JSON output. */
  pretty?: boolean;
  /** Directory documents live in. Defaults to `Data`. */
  dataDir?: string;
  logger?: Logger;
}

export class DataFormatHandler {
  readonly format: DataFormat;
  private readonly pretty: boolean;
  private readonly dataDir: string;
  private readonly logger: Logger;

  constructor(format: DataFormat, options: DataFormatOptions = {}) {
    this.format = format;
    this.pretty = options.pretty ?? false;
    this.dataDir = options.dataDir ?? 'Data';
    this.logger = options.logger ?? silentLogger;
  }

  get extension(): string {
    return FORMAT_EXTENSIONS[this.format];
  }

  /** Relative path of a document: `Data/Actors.rxdata`. */
  pathFor(name: string): string {
    return `${this.dataDir}/${name}.${this.extension}`;
  }

  readValue(bytes: Uint8Array): MarshalValue {
    this.logger.debug(`reading ${bytes.length} byte(s) as ${this.format}`);
    switch (this.format) {
      case 'marshal':
        return decode(bytes);
      case 'json': {
        let tree: unknown;
        try {
          tree = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
        } catch (error) {
          throw new DataFormatError('document is not valid UTF-8 JSON', { cause: error });
        }
        return fromPortable(tree);
      }
      case 'cbor': {
        let tree: unknown;
        try {
          tree = decodeCbor(bytes);
        } catch (error) {
          throw new DataFormatError('document is not valid CBOR', { cause: error });
        }
        return fromPortable(tree);
      }
    }
  }

  writeValue(value: MarshalValue): Uint8Array {
    switch (this.format) {
      case 'marshal':
        return encode(value);
      case 'json': {
        const text = JSON.stringify(toPortable(value), null, this.pretty ? 2 : undefined);
        return new TextEncoder().encode(this.pretty ? `${text}\n` : text);
      }
      case 'cbor':
        return encodeCbor(toPortable(value));
    }
  }

  read<V>(transform: Transform<V>, bytes: Uint8Array, options: SchemaOptions = {}): V {
    return materialize(transform, this.readValue(bytes), options);
  }

  write<V>(transform: Transform<V>, typed: V, options: SchemaOptions = {}): Uint8Array {
    return this.writeValue(dematerialize(transform, typed, options));
  }
}
