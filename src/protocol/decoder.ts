/**
 * Marshal 4.8 decoder.
 *
 * Recursive descent over the tag grammar. Every composite is appended to the
 * object table before its children are read, so links inside the children
 * (including links back to the composite itself) resolve to the very same
 * JavaScript object. The decoded tree may therefore share nodes and contain
 * cycles.
 */

import { ByteReader } from '../core/cursor.js';
import { MarshalError } from '../core/errors.js';
import { ObjectTable, SymbolTable } from '../core/tables.js';
import {
  MARSHAL_MAJOR,
  MARSHAL_MINOR,
  NIL,
  Tag,
  bool,
  decodeText,
  float,
  integer,
  symbol,
  type ArrayValue,
  type ClassRefValue,
  type HashValue,
  type IvarMap,
  type MarshalValue,
  type ObjectValue,
  type RegexpValue,
  type StringEncoding,
  type StringValue,
  type StructValue,
  type UserDataValue,
  type UserMarshalValue,
} from '../core/types.js';
import { parseFloatText } from './float.js';

/** Deepest nesting of composites a document may have. */
export const MAX_DEPTH = 2000;

/** Decode one complete document. The buffer must hold nothing else. */
export function decode(data: Uint8Array): MarshalValue {
  return new MarshalDecoder(data).decodeDocument();
}

export class MarshalDecoder {
  private readonly reader: ByteReader;
  private readonly symbols = new SymbolTable();
  private readonly objects = new ObjectTable();
  private depth = 0;

  constructor(data: Uint8Array) {
    this.reader = new ByteReader(data);
  }

  decodeDocument(): MarshalValue {
    this.readHeader();
    const value = this.readValue();
    this.reader.expectEnd();
    return value;
  }

  // ── Header ──────────────────────────────────────────────────

  private readHeader(): void {
    const major = this.reader.readU8();
    if (major !== MARSHAL_MAJOR) {
      throw new MarshalError('IncompatibleVersion', `found major version ${major}, expected ${MARSHAL_MAJOR}.${MARSHAL_MINOR}`);
    }
    const minor = this.reader.readU8();
    if (minor !== MARSHAL_MINOR) {
      throw new MarshalError('IncompatibleVersion', `found version ${major}.${minor}, expected ${MARSHAL_MAJOR}.${MARSHAL_MINOR}`);
    }
  }

  // ── Values ──────────────────────────────────────────────────

  private readValue(): MarshalValue {
    const offset = this.reader.position();
    if (this.depth >= MAX_DEPTH) {
      throw new MarshalError('UnknownTag', `values nested deeper than ${MAX_DEPTH} levels at offset ${offset}`);
    }
    this.depth++;
    const value = this.readTagged(this.reader.readU8(), offset);
    this.depth--;
    return value;
  }

  private readTagged(tag: number, offset: number): MarshalValue {
    switch (tag) {
      case Tag.NIL:
        return NIL;
      case Tag.TRUE:
        return bool(true);
      case Tag.FALSE:
        return bool(false);
      case Tag.FIXNUM:
        return integer(this.readLong());
      case Tag.SYMBOL:
        return symbol(this.readSymbolBody());
      case Tag.SYMBOL_LINK:
        return symbol(this.symbols.get(this.readLong()));
      case Tag.OBJECT_LINK:
        return this.objects.get(this.readLong());
      case Tag.IVAR:
        return this.readWithIvars();
      case Tag.EXTENDED: {
        const module = this.readSymbol();
        return this.readWrapped((value) => ({ type: 'extended', module, value }));
      }
      case Tag.USER_CLASS: {
        const className = this.readSymbol();
        return this.readWrapped((value) => ({ type: 'user-class', className, value }));
      }
      case Tag.STRING: {
        const value: StringValue = { type: 'string', data: this.readBytes().slice(), encoding: 'none' };
        this.objects.add(value);
        return value;
      }
      case Tag.REGEXP: {
        const source = this.readBytes().slice();
        const value: RegexpValue = { type: 'regexp', source, options: this.reader.readU8(), encoding: 'none' };
        this.objects.add(value);
        return value;
      }
      case Tag.FLOAT: {
        const text = decodeText(this.readBytes());
        const parsed = parseFloatText(text);
        if (parsed === undefined) {
          throw new MarshalError('UnknownTag', `malformed float text ${JSON.stringify(text)} at offset ${offset}`);
        }
        const value = float(parsed);
        this.objects.add(value);
        return value;
      }
      case Tag.BIGNUM: {
        const value = integer(this.readBignum(offset));
        this.objects.add(value);
        return value;
      }
      case Tag.ARRAY: {
        const value: ArrayValue = { type: 'array', items: [] };
        this.objects.add(value);
        const count = this.readCount(1);
        for (let i = 0; i < count; i++) {
          value.items.push(this.readValue());
        }
        return value;
      }
      case Tag.HASH:
      case Tag.HASH_DEFAULT: {
        const value: HashValue = { type: 'hash', entries: [] };
        this.objects.add(value);
        const count = this.readCount(2);
        for (let i = 0; i < count; i++) {
          const key = this.readValue();
          value.entries.push([key, this.readValue()]);
        }
        if (tag === Tag.HASH_DEFAULT) {
          value.default = this.readValue();
        }
        return value;
      }
      case Tag.OBJECT: {
        const value: ObjectValue = { type: 'object', className: this.readSymbol(), fields: new Map() };
        this.objects.add(value);
        this.readPairs(value.fields);
        return value;
      }
      case Tag.STRUCT: {
        const value: StructValue = { type: 'struct', className: this.readSymbol(), members: new Map() };
        this.objects.add(value);
        this.readPairs(value.members);
        return value;
      }
      case Tag.USER_DEFINED: {
        const className = this.readSymbol();
        const value: UserDataValue = { type: 'userdata', className, data: this.readBytes().slice() };
        this.objects.add(value);
        return value;
      }
      case Tag.USER_MARSHAL: {
        const value: UserMarshalValue = { type: 'user-marshal', className: this.readSymbol(), value: NIL };
        this.objects.add(value);
        value.value = this.readValue();
        return value;
      }
      case Tag.CLASS:
      case Tag.MODULE:
      case Tag.CLASS_OR_MODULE: {
        const value: ClassRefValue = {
          type: tag === Tag.CLASS ? 'class' : 'module',
          name: decodeText(this.readBytes()),
        };
        this.objects.add(value);
        return value;
      }
      default:
        throw new MarshalError('UnknownTag', `unknown tag 0x${tag.toString(16).padStart(2, '0')} at offset ${offset}`);
    }
  }

  /**
   * Read the value behind an `e` or `C` prefix. The wrapper takes over the
   * object-table slot the wrapped value claimed.
   */
  private readWrapped(wrap: (value: MarshalValue) => MarshalValue): MarshalValue {
    const slot = this.objects.length;
    const inner = this.readValue();
    const wrapper = wrap(inner);
    if (this.objects.length > slot) {
      this.objects.replace(slot, wrapper);
    }
    return wrapper;
  }

  /** `I` prefix: a value followed by its instance variables. */
  private readWithIvars(): MarshalValue {
    const offset = this.reader.position();
    const tag = this.reader.readU8();

    if (tag === Tag.SYMBOL) {
      // Encoded symbol; the encoding itself carries nothing we keep.
      const name = this.readSymbolBody();
      this.readIvars();
      return symbol(name);
    }

    if (tag === Tag.USER_DEFINED) {
      // User data takes its object slot after its instance variables.
      const className = this.readSymbol();
      const value: UserDataValue = { type: 'userdata', className, data: this.readBytes().slice() };
      const ivars = this.readIvars();
      if (ivars.size > 0) value.ivars = ivars;
      this.objects.add(value);
      return value;
    }

    const value = this.readTagged(tag, offset);
    const ivars = this.readIvars();
    this.attachIvars(value, ivars, offset);
    return value;
  }

  private attachIvars(value: MarshalValue, ivars: IvarMap, offset: number): void {
    switch (value.type) {
      case 'extended':
      case 'user-class':
        this.attachIvars(value.value, ivars, offset);
        return;
      case 'string':
      case 'regexp':
        value.encoding = takeEncoding(ivars);
        if (ivars.size > 0) value.ivars = ivars;
        return;
      case 'array':
      case 'hash':
      case 'userdata':
        if (ivars.size > 0) value.ivars = ivars;
        return;
      default:
        throw new MarshalError('UnknownTag', `instance variables on a ${value.type} value at offset ${offset}`);
    }
  }

  // ── Symbols ─────────────────────────────────────────────────

  /** A class name or ivar key: `:`, `;` or an encoded `I:` symbol. */
  private readSymbol(): string {
    const offset = this.reader.position();
    const tag = this.reader.readU8();
    switch (tag) {
      case Tag.SYMBOL:
        return this.readSymbolBody();
      case Tag.SYMBOL_LINK:
        return this.symbols.get(this.readLong());
      case Tag.IVAR: {
        const inner = this.reader.readU8();
        if (inner !== Tag.SYMBOL) {
          throw new MarshalError('UnknownTag', `expected a symbol inside ivar wrapper at offset ${offset}`);
        }
        const name = this.readSymbolBody();
        this.readIvars();
        return name;
      }
      default:
        throw new MarshalError(
          'UnknownTag',
          `expected a symbol, found tag 0x${tag.toString(16).padStart(2, '0')} at offset ${offset}`,
        );
    }
  }

  private readSymbolBody(): string {
    const name = decodeText(this.readBytes());
    this.symbols.add(name);
    return name;
  }

  private readIvars(): IvarMap {
    const ivars: IvarMap = new Map();
    this.readPairs(ivars);
    return ivars;
  }

  private readPairs(into: Map<string, MarshalValue>): void {
    const count = this.readCount(2);
    for (let i = 0; i < count; i++) {
      const key = this.readSymbol();
      into.set(key, this.readValue());
    }
  }

  // ── Primitives ──────────────────────────────────────────────

  /** Variable-length integer used for fixnums, counts and link indices. */
  private readLong(): number {
    const c = this.reader.readI8();
    if (c === 0) return 0;
    if (c > 4) return c - 5;
    if (c < -4) return c + 5;

    const n = Math.abs(c);
    let x = 0;
    for (let i = 0; i < n; i++) {
      x += this.reader.readU8() * 2 ** (8 * i);
    }
    return c > 0 ? x : x - 2 ** (8 * n);
  }

  private readLength(): number {
    const offset = this.reader.position();
    const n = this.readLong();
    if (n < 0) {
      throw new MarshalError('UnexpectedEnd', `negative length ${n} at offset ${offset}`);
    }
    return n;
  }

  /** A count of items that need at least `minBytes` each. */
  private readCount(minBytes: number): number {
    const offset = this.reader.position();
    const n = this.readLength();
    if (n * minBytes > this.reader.remaining()) {
      throw new MarshalError(
        'UnexpectedEnd',
        `count ${n} at offset ${offset} exceeds the ${this.reader.remaining()} byte(s) left`,
      );
    }
    return n;
  }

  private readBytes(): Uint8Array {
    return this.reader.readExact(this.readLength());
  }

  private readBignum(offset: number): number | bigint {
    const sign = this.reader.readU8();
    if (sign !== 0x2b && sign !== 0x2d) {
      throw new MarshalError('UnknownTag', `bad bignum sign byte 0x${sign.toString(16)} at offset ${offset}`);
    }
    const words = this.readLength();
    const raw = this.reader.readExact(words * 2);

    let magnitude = 0n;
    for (let i = raw.length - 1; i >= 0; i--) {
      magnitude = (magnitude << 8n) | BigInt(raw[i]);
    }
    const value = sign === 0x2d ? -magnitude : magnitude;
    return toSafeInteger(value);
  }
}

function toSafeInteger(value: bigint): number | bigint {
  if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  return value;
}

/** Pull the encoding ivars (`E`, `encoding`) out of a string's ivar map. */
function takeEncoding(ivars: IvarMap): StringEncoding {
  const e = ivars.get('E');
  if (e !== undefined) {
    ivars.delete('E');
    return e.type === 'bool' && e.value ? 'utf-8' : 'us-ascii';
  }
  const named = ivars.get('encoding');
  if (named !== undefined && named.type === 'string') {
    ivars.delete('encoding');
    return { name: decodeText(named.data) };
  }
  return 'none';
}
