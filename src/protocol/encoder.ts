/**
 * Marshal 4.8 encoder.
 *
 * Mirror of the decoder. Symbols are interned by text and written as links
 * after first use; every other non-immediate value is interned by identity,
 * so a value object that appears twice in the tree is written once and then
 * linked. Equal but distinct objects are written as independent copies.
 */

import { ByteWriter } from '../core/cursor.js';
import { MarshalError } from '../core/errors.js';
import { ObjectIndex, SymbolIndex } from '../core/tables.js';
import {
  MARSHAL_MAJOR,
  MARSHAL_MINOR,
  Tag,
  bool,
  bytes,
  encodeText,
  isBignum,
  isLinkable,
  type IvarMap,
  type MarshalValue,
  type StringEncoding,
} from '../core/types.js';
import { formatFloat } from './float.js';

export interface EncodeOptions {
  /** Starting size of the output buffer; it grows as needed. */
  initialCapacity?: number;
}

/** Encode one complete document, header included. */
export function encode(value: MarshalValue, options: EncodeOptions = {}): Uint8Array {
  return new MarshalEncoder(options).encodeDocument(value);
}

const NON_ASCII = /[^\x00-\x7f]/;

export class MarshalEncoder {
  private readonly writer: ByteWriter;
  private readonly symbols = new SymbolIndex();
  private readonly objects = new ObjectIndex();
  /** User data whose instance variables are being written; not linkable yet. */
  private readonly openUserData = new Set<MarshalValue>();

  constructor(options: EncodeOptions = {}) {
    this.writer = new ByteWriter(options.initialCapacity);
  }

  encodeDocument(value: MarshalValue): Uint8Array {
    this.writer.writeU8(MARSHAL_MAJOR);
    this.writer.writeU8(MARSHAL_MINOR);
    this.writeValue(value);
    return this.writer.finish();
  }

  // ── Values ──────────────────────────────────────────────────

  private writeValue(value: MarshalValue): void {
    if (this.openUserData.has(value)) {
      throw new MarshalError('BadReference', 'user data refers to itself through its instance variables');
    }
    if (isLinkable(value)) {
      const index = this.objects.lookup(value);
      if (index !== undefined) {
        this.writer.writeU8(Tag.OBJECT_LINK);
        this.writeLong(index);
        return;
      }
      if (!slotAfterIvars(value)) this.objects.add(value);
    }

    switch (value.type) {
      case 'nil':
        this.writer.writeU8(Tag.NIL);
        return;
      case 'bool':
        this.writer.writeU8(value.value ? Tag.TRUE : Tag.FALSE);
        return;
      case 'integer':
        this.writeInteger(value.value);
        return;
      case 'float':
        this.writer.writeU8(Tag.FLOAT);
        this.writeBytes(encodeText(formatFloat(value.value)));
        return;
      case 'symbol':
        this.writeSymbol(value.name);
        return;
      case 'class':
        this.writer.writeU8(Tag.CLASS);
        this.writeBytes(encodeText(value.name));
        return;
      case 'module':
        this.writer.writeU8(Tag.MODULE);
        this.writeBytes(encodeText(value.name));
        return;
      default:
        this.writeWithIvars(value);
    }
  }

  /**
   * Values that may carry instance variables, possibly behind `e` / `C`
   * wrappers. The `I` prefix comes before the wrappers and the ivars after
   * the innermost body.
   */
  private writeWithIvars(value: MarshalValue): void {
    let core = value;
    while (core.type === 'extended' || core.type === 'user-class') {
      core = core.value;
    }
    const ivars = ivarsOf(core);
    if (ivars.length > 0) this.writer.writeU8(Tag.IVAR);

    let wrapper = value;
    while (wrapper.type === 'extended' || wrapper.type === 'user-class') {
      if (wrapper.type === 'extended') {
        this.writer.writeU8(Tag.EXTENDED);
        this.writeSymbol(wrapper.module);
      } else {
        this.writer.writeU8(Tag.USER_CLASS);
        this.writeSymbol(wrapper.className);
      }
      wrapper = wrapper.value;
    }

    this.writeBody(core);

    if (ivars.length > 0) {
      if (slotAfterIvars(value)) this.openUserData.add(value);
      this.writeLong(ivars.length);
      for (const [key, ivar] of ivars) {
        this.writeSymbol(key);
        this.writeValue(ivar);
      }
      if (slotAfterIvars(value)) {
        this.openUserData.delete(value);
        this.objects.add(value);
      }
    }
  }

  private writeBody(value: MarshalValue): void {
    switch (value.type) {
      case 'string':
        this.writer.writeU8(Tag.STRING);
        this.writeBytes(value.data);
        return;
      case 'regexp':
        this.writer.writeU8(Tag.REGEXP);
        this.writeBytes(value.source);
        this.writer.writeU8(value.options);
        return;
      case 'array':
        this.writer.writeU8(Tag.ARRAY);
        this.writeLong(value.items.length);
        for (const item of value.items) this.writeValue(item);
        return;
      case 'hash':
        this.writer.writeU8(value.default === undefined ? Tag.HASH : Tag.HASH_DEFAULT);
        this.writeLong(value.entries.length);
        for (const [key, entry] of value.entries) {
          this.writeValue(key);
          this.writeValue(entry);
        }
        if (value.default !== undefined) this.writeValue(value.default);
        return;
      case 'object':
        this.writer.writeU8(Tag.OBJECT);
        this.writeSymbol(value.className);
        this.writePairs(value.fields);
        return;
      case 'struct':
        this.writer.writeU8(Tag.STRUCT);
        this.writeSymbol(value.className);
        this.writePairs(value.members);
        return;
      case 'userdata':
        this.writer.writeU8(Tag.USER_DEFINED);
        this.writeSymbol(value.className);
        this.writeBytes(value.data);
        return;
      case 'user-marshal':
        this.writer.writeU8(Tag.USER_MARSHAL);
        this.writeSymbol(value.className);
        this.writeValue(value.value);
        return;
      default:
        throw new Error(`no body encoding for a ${value.type} value`);
    }
  }

  private writePairs(pairs: Map<string, MarshalValue>): void {
    this.writeLong(pairs.size);
    for (const [key, value] of pairs) {
      this.writeSymbol(key);
      this.writeValue(value);
    }
  }

  // ── Symbols ─────────────────────────────────────────────────

  private writeSymbol(name: string): void {
    const index = this.symbols.lookup(name);
    if (index !== undefined) {
      this.writer.writeU8(Tag.SYMBOL_LINK);
      this.writeLong(index);
      return;
    }
    this.symbols.add(name);

    if (NON_ASCII.test(name)) {
      this.writer.writeU8(Tag.IVAR);
      this.writer.writeU8(Tag.SYMBOL);
      this.writeBytes(encodeText(name));
      this.writeLong(1);
      this.writeSymbol('E');
      this.writer.writeU8(Tag.TRUE);
      return;
    }

    this.writer.writeU8(Tag.SYMBOL);
    this.writeBytes(encodeText(name));
  }

  // ── Primitives ──────────────────────────────────────────────

  private writeInteger(value: number | bigint): void {
    if (typeof value === 'number' && !Number.isInteger(value)) {
      throw new MarshalError('SchemaMismatch', `integer value ${value} is not integral`);
    }
    if (isBignum(value)) {
      this.writeBignum(BigInt(value));
      return;
    }
    this.writer.writeU8(Tag.FIXNUM);
    this.writeLong(Number(value));
  }

  private writeBignum(value: bigint): void {
    this.writer.writeU8(Tag.BIGNUM);
    this.writer.writeU8(value < 0n ? 0x2d : 0x2b);

    let magnitude = value < 0n ? -value : value;
    const raw: number[] = [];
    while (magnitude > 0n) {
      raw.push(Number(magnitude & 0xffn));
      magnitude >>= 8n;
    }
    if (raw.length % 2 === 1) raw.push(0);

    this.writeLong(raw.length / 2);
    this.writer.writeBytes(Uint8Array.from(raw));
  }

  /** Variable-length integer; see the decoder's `readLong`. */
  private writeLong(n: number): void {
    if (!Number.isInteger(n) || n < -(2 ** 31) || n >= 2 ** 31) {
      throw new RangeError(`${n} does not fit a 32-bit length`);
    }
    if (n === 0) {
      this.writer.writeU8(0);
      return;
    }
    if (n > 0 && n < 123) {
      this.writer.writeI8(n + 5);
      return;
    }
    if (n < 0 && n > -124) {
      this.writer.writeI8(n - 5);
      return;
    }

    const raw: number[] = [];
    let x = n;
    for (let i = 0; i < 4; i++) {
      raw.push(x & 0xff);
      x >>= 8;
      if ((n > 0 && x === 0) || (n < 0 && x === -1)) break;
    }
    this.writer.writeI8(n > 0 ? raw.length : -raw.length);
    this.writer.writeBytes(Uint8Array.from(raw));
  }

  private writeBytes(data: Uint8Array): void {
    this.writeLong(data.length);
    this.writer.writeBytes(data);
  }
}

/** Instance variables to write after a body, encoding marker first. */
function ivarsOf(value: MarshalValue): Array<[string, MarshalValue]> {
  switch (value.type) {
    case 'string':
    case 'regexp':
      return [...encodingIvars(value.encoding), ...entries(value.ivars)];
    case 'array':
    case 'hash':
    case 'userdata':
      return entries(value.ivars);
    default:
      return [];
  }
}

/** User data with instance variables is registered after them, as the runtime does. */
function slotAfterIvars(value: MarshalValue): boolean {
  return value.type === 'userdata' && value.ivars !== undefined && value.ivars.size > 0;
}

function encodingIvars(encoding: StringEncoding): Array<[string, MarshalValue]> {
  if (encoding === 'none') return [];
  if (encoding === 'utf-8') return [['E', bool(true)]];
  if (encoding === 'us-ascii') return [['E', bool(false)]];
  return [['encoding', bytes(encodeText(encoding.name))]];
}

function entries(ivars: IvarMap | undefined): Array<[string, MarshalValue]> {
  return ivars ? [...ivars] : [];
}
