/**
 * Portable form of the intermediate value tree, shared by the JSON and
 * CBOR formats.
 *
 * Nil, booleans and safe integers map to their JSON counterparts and plain
 * arrays to JSON arrays; everything else is an object discriminated by `$`.
 * Byte payloads are `text` when they are valid UTF-8 and `base64` otherwise.
 * Instance variables, object fields and struct members are lists of
 * `[name, value]` pairs so their order survives encoders that sort keys.
 *
 * The tree is a tree: shared nodes are written once per reference and a
 * cycle cannot be represented at all.
 */

import { DataFormatError } from '../core/errors.js';
import type { IvarMap, MarshalValue, StringEncoding } from '../core/types.js';

export type PortableEncoding = 'utf-8' | 'us-ascii' | { name: string };
export type PortablePairs = Array<[string, PortableValue]>;

export type PortableValue =
  | null
  | boolean
  | number
  | PortableValue[]
  | PortableNode;

export type PortableNode =
  | { $: 'int'; value: string }
  | { $: 'float'; value: number | 'nan' | 'inf' | '-inf' | '-0' }
  | ({ $: 'string'; encoding?: PortableEncoding; ivars?: PortablePairs } & PortableBytes)
  | { $: 'symbol'; name: string }
  | ({ $: 'regexp'; options: number; encoding?: PortableEncoding; ivars?: PortablePairs } & PortableBytes)
  | { $: 'array'; items: PortableValue[]; ivars: PortablePairs }
  | { $: 'hash'; entries: Array<[PortableValue, PortableValue]>; default?: PortableValue; ivars?: PortablePairs }
  | { $: 'object'; class: string; fields: PortablePairs }
  | { $: 'struct'; class: string; members: PortablePairs }
  | { $: 'userdata'; class: string; base64: string; ivars?: PortablePairs }
  | { $: 'user-marshal'; class: string; value: PortableValue }
  | { $: 'class' | 'module'; name: string }
  | { $: 'extended'; module: string; value: PortableValue }
  | { $: 'user-class'; class: string; value: PortableValue };

type PortableBytes = { text: string } | { base64: string };

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });
const utf8 = new TextEncoder();

// ── To portable ──────────────────────────────────────────────────

export function toPortable(value: MarshalValue): PortableValue {
  return new PortableWriter().write(value);
}

class PortableWriter {
  private readonly ancestors = new Set<MarshalValue>();

  write(value: MarshalValue): PortableValue {
    if (this.ancestors.has(value)) {
      throw new DataFormatError(`cyclic ${value.type} cannot be written as a tree`);
    }
    this.ancestors.add(value);
    try {
      return this.convert(value);
    } finally {
      this.ancestors.delete(value);
    }
  }

  private convert(value: MarshalValue): PortableValue {
    switch (value.type) {
      case 'nil':
        return null;
      case 'bool':
        return value.value;
      case 'integer':
        return typeof value.value === 'number' && Number.isSafeInteger(value.value)
          ? value.value
          : { $: 'int', value: value.value.toString() };
      case 'float':
        return { $: 'float', value: portableFloat(value.value) };
      case 'string':
        return {
          $: 'string',
          ...portableBytes(value.data),
          ...this.encodingOf(value.encoding),
          ...this.ivarsOf(value.ivars),
        };
      case 'symbol':
        return { $: 'symbol', name: value.name };
      case 'regexp':
        return {
          $: 'regexp',
          ...portableBytes(value.source),
          options: value.options,
          ...this.encodingOf(value.encoding),
          ...this.ivarsOf(value.ivars),
        };
      case 'array': {
        const items = value.items.map((item) => this.write(item));
        return value.ivars === undefined ? items : { $: 'array', items, ivars: this.pairs(value.ivars) };
      }
      case 'hash':
        return {
          $: 'hash',
          entries: value.entries.map(([k, v]): [PortableValue, PortableValue] => [this.write(k), this.write(v)]),
          ...(value.default === undefined ? {} : { default: this.write(value.default) }),
          ...this.ivarsOf(value.ivars),
        };
      case 'object':
        return { $: 'object', class: value.className, fields: this.pairs(value.fields) };
      case 'struct':
        return { $: 'struct', class: value.className, members: this.pairs(value.members) };
      case 'userdata':
        return {
          $: 'userdata',
          class: value.className,
          base64: Buffer.from(value.data).toString('base64'),
          ...this.ivarsOf(value.ivars),
        };
      case 'user-marshal':
        return { $: 'user-marshal', class: value.className, value: this.write(value.value) };
      case 'class':
      case 'module':
        return { $: value.type, name: value.name };
      case 'extended':
        return { $: 'extended', module: value.module, value: this.write(value.value) };
      case 'user-class':
        return { $: 'user-class', class: value.className, value: this.write(value.value) };
    }
  }

  private pairs(map: Map<string, MarshalValue>): PortablePairs {
    return [...map].map(([name, v]): [string, PortableValue] => [name, this.write(v)]);
  }

  private ivarsOf(ivars: IvarMap | undefined): { ivars?: PortablePairs } {
    return ivars === undefined ? {} : { ivars: this.pairs(ivars) };
  }

  private encodingOf(encoding: StringEncoding): { encoding?: PortableEncoding } {
    return encoding === 'none' ? {} : { encoding };
  }
}

function portableFloat(v: number): number | 'nan' | 'inf' | '-inf' | '-0' {
  if (Number.isNaN(v)) return 'nan';
  if (v === Infinity) return 'inf';
  if (v === -Infinity) return '-inf';
  if (Object.is(v, -0)) return '-0';
  return v;
}

function portableBytes(data: Uint8Array): PortableBytes {
  try {
    return { text: strictUtf8.decode(data) };
  } catch {
    return { base64: Buffer.from(data).toString('base64') };
  }
}

// ── From portable ────────────────────────────────────────────────

/** Rebuild an intermediate tree, rejecting anything that is not a portable value. */
export function fromPortable(input: unknown, path = '$'): MarshalValue {
  if (input === null) return { type: 'nil' };
  if (typeof input === 'boolean') return { type: 'bool', value: input };
  if (typeof input === 'number') {
    if (!Number.isSafeInteger(input)) fail(path, 'bare numbers must be safe integers');
    return { type: 'integer', value: input };
  }
  if (Array.isArray(input)) {
    return { type: 'array', items: input.map((item, i) => fromPortable(item, `${path}[${i}]`)) };
  }
  if (!isRecord(input)) fail(path, `unexpected ${typeof input}`);

  const tag = input.$;
  switch (tag) {
    case 'int': {
      const digits = stringField(input, 'value', path);
      if (!/^-?\d+$/.test(digits)) fail(path, `bad integer ${JSON.stringify(digits)}`);
      const big = BigInt(digits);
      const value = big >= BigInt(Number.MIN_SAFE_INTEGER) && big <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(big)
        : big;
      return { type: 'integer', value };
    }
    case 'float':
      return { type: 'float', value: floatField(input.value, path) };
    case 'string':
      return {
        type: 'string',
        data: bytesField(input, path),
        encoding: encodingField(input.encoding, path),
        ...ivarsField(input.ivars, path),
      };
    case 'symbol':
      return { type: 'symbol', name: stringField(input, 'name', path) };
    case 'regexp':
      return {
        type: 'regexp',
        source: bytesField(input, path),
        options: byteField(input.options, path),
        encoding: encodingField(input.encoding, path),
        ...ivarsField(input.ivars, path),
      };
    case 'array': {
      const items = input.items;
      if (!Array.isArray(items)) fail(path, 'array node needs items');
      return {
        type: 'array',
        items: items.map((item, i) => fromPortable(item, `${path}.items[${i}]`)),
        ...ivarsField(input.ivars, path),
      };
    }
    case 'hash': {
      const entries = input.entries;
      if (!Array.isArray(entries)) fail(path, 'hash node needs entries');
      return {
        type: 'hash',
        entries: entries.map((entry, i): [MarshalValue, MarshalValue] => {
          if (!Array.isArray(entry) || entry.length !== 2) fail(`${path}.entries[${i}]`, 'entry must be a pair');
          return [fromPortable(entry[0], `${path}.entries[${i}][0]`), fromPortable(entry[1], `${path}.entries[${i}][1]`)];
        }),
        ...('default' in input ? { default: fromPortable(input.default, `${path}.default`) } : {}),
        ...ivarsField(input.ivars, path),
      };
    }
    case 'object':
      return {
        type: 'object',
        className: stringField(input, 'class', path),
        fields: pairsField(input.fields, `${path}.fields`),
      };
    case 'struct':
      return {
        type: 'struct',
        className: stringField(input, 'class', path),
        members: pairsField(input.members, `${path}.members`),
      };
    case 'userdata':
      return {
        type: 'userdata',
        className: stringField(input, 'class', path),
        data: base64Field(stringField(input, 'base64', path), path),
        ...ivarsField(input.ivars, path),
      };
    case 'user-marshal':
      return {
        type: 'user-marshal',
        className: stringField(input, 'class', path),
        value: fromPortable(input.value, `${path}.value`),
      };
    case 'class':
    case 'module':
      return { type: tag === 'class' ? 'class' : 'module', name: stringField(input, 'name', path) };
    case 'extended':
      return {
        type: 'extended',
        module: stringField(input, 'module', path),
        value: fromPortable(input.value, `${path}.value`),
      };
    case 'user-class':
      return {
        type: 'user-class',
        className: stringField(input, 'class', path),
        value: fromPortable(input.value, `${path}.value`),
      };
    default:
      fail(path, `unknown node type ${JSON.stringify(tag)}`);
  }
}

function fail(path: string, message: string): never {
  throw new DataFormatError(`${path}: ${message}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function stringField(node: Record<string, unknown>, key: string, path: string): string {
  const value = node[key];
  if (typeof value !== 'string') fail(path, `${key} must be a string`);
  return value;
}

function byteField(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 255) {
    fail(path, 'options must be a byte');
  }
  return value;
}

function floatField(value: unknown, path: string): number {
  switch (value) {
    case 'nan':
      return NaN;
    case 'inf':
      return Infinity;
    case '-inf':
      return -Infinity;
    case '-0':
      return -0;
  }
  if (typeof value !== 'number') fail(path, 'float value must be a number');
  return value;
}

function bytesField(node: Record<string, unknown>, path: string): Uint8Array {
  if (typeof node.text === 'string') return utf8.encode(node.text);
  if (typeof node.base64 === 'string') return base64Field(node.base64, path);
  return fail(path, 'needs text or base64');
}

function base64Field(encoded: string, path: string): Uint8Array {
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded) || encoded.length % 4 !== 0) fail(path, 'invalid base64');
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}

function encodingField(value: unknown, path: string): StringEncoding {
  if (value === undefined) return 'none';
  if (value === 'utf-8' || value === 'us-ascii') return value;
  if (isRecord(value) && typeof value.name === 'string') return { name: value.name };
  return fail(path, `bad encoding ${JSON.stringify(value)}`);
}

function pairsField(value: unknown, path: string): Map<string, MarshalValue> {
  if (!Array.isArray(value)) fail(path, 'expected a list of [name, value] pairs');
  const pairs = new Map<string, MarshalValue>();
  value.forEach((pair: unknown, i) => {
    if (!Array.isArray(pair) || pair.length !== 2 || typeof pair[0] !== 'string') {
      fail(`${path}[${i}]`, 'expected a [name, value] pair');
    }
    pairs.set(pair[0], fromPortable(pair[1], `${path}[${i}][1]`));
  });
  return pairs;
}

function ivarsField(value: unknown, path: string): { ivars?: IvarMap } {
  return value === undefined ? {} : { ivars: pairsField(value, `${path}.ivars`) };
}
