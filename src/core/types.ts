/**
 * Core Marshal types.
 *
 * These types are the shared language between the byte-level engine, the
 * schema layer, the data formats and the project cache. The intermediate
 * value tree (`MarshalValue`) is the only thing the decoder produces and
 * the only thing the encoder consumes.
 */

// ── Wire format constants ──────────────────────────────────────────

export const MARSHAL_MAJOR = 4;
export const MARSHAL_MINOR = 8;

/** Tag bytes, one per record kind. */
export enum Tag {
  NIL = 0x30, // '0'
  TRUE = 0x54, // 'T'
  FALSE = 0x46, // 'F'
  FIXNUM = 0x69, // 'i'
  SYMBOL = 0x3a, // ':'
  SYMBOL_LINK = 0x3b, // ';'
  OBJECT = 0x6f, // 'o'
  OBJECT_LINK = 0x40, // '@'
  ARRAY = 0x5b, // '['
  HASH = 0x7b, // '{'
  HASH_DEFAULT = 0x7d, // '}'
  STRING = 0x22, // '"'
  USER_DEFINED = 0x75, // 'u'
  USER_MARSHAL = 0x55, // 'U'
  FLOAT = 0x66, // 'f'
  BIGNUM = 0x6c, // 'l'
  CLASS = 0x63, // 'c'
  MODULE = 0x6d, // 'm'
  CLASS_OR_MODULE = 0x4d, // 'M'
  STRUCT = 0x53, // 'S'
  EXTENDED = 0x65, // 'e'
  USER_CLASS = 0x43, // 'C'
  IVAR = 0x49, // 'I'
  REGEXP = 0x2f, // '/'
  DATA = 0x64, // 'd', recognised but not supported
}

/** Fixnums occupy [-2^30, 2^30); anything outside is written as a bignum. */
export const FIXNUM_MIN = -(2 ** 30);
export const FIXNUM_MAX = 2 ** 30 - 1;

// ── Intermediate values ────────────────────────────────────────────

/**
 * Encoding marker carried by a string. `none` means the producer wrote no
 * encoding instance variable at all (the 1.8-era runtime does this).
 */
export type StringEncoding = 'none' | 'utf-8' | 'us-ascii' | { name: string };

/** Instance variables in wire order, keyed by their full name (`@x`, `E`). */
export type IvarMap = Map<string, MarshalValue>;

export interface NilValue {
  type: 'nil';
}

export interface BoolValue {
  type: 'bool';
  value: boolean;
}

/** Integers stay `number` inside the safe range and become `bigint` beyond it. */
export interface IntegerValue {
  type: 'integer';
  value: number | bigint;
}

export interface FloatValue {
  type: 'float';
  value: number;
}

export interface StringValue {
  type: 'string';
  data: Uint8Array;
  encoding: StringEncoding;
  ivars?: IvarMap;
}

export interface SymbolValue {
  type: 'symbol';
  name: string;
}

export interface RegexpValue {
  type: 'regexp';
  source: Uint8Array;
  options: number;
  encoding: StringEncoding;
  ivars?: IvarMap;
}

export interface ArrayValue {
  type: 'array';
  items: MarshalValue[];
  ivars?: IvarMap;
}

export interface HashValue {
  type: 'hash';
  entries: Array<[MarshalValue, MarshalValue]>;
  default?: MarshalValue;
  ivars?: IvarMap;
}

/** A plain object: class name plus its instance variables (`@name` keys). */
export interface ObjectValue {
  type: 'object';
  className: string;
  fields: IvarMap;
}

export interface StructValue {
  type: 'struct';
  className: string;
  members: Map<string, MarshalValue>;
}

/** Opaque bytes produced by a class-level `_dump` (Table, Color, Tone). */
export interface UserDataValue {
  type: 'userdata';
  className: string;
  data: Uint8Array;
  ivars?: IvarMap;
}

/** An object restored through `marshal_load` from a wrapped value. */
export interface UserMarshalValue {
  type: 'user-marshal';
  className: string;
  value: MarshalValue;
}

export interface ClassRefValue {
  type: 'class' | 'module';
  name: string;
}

/** A value whose singleton was extended with a module before dumping. */
export interface ExtendedValue {
  type: 'extended';
  module: string;
  value: MarshalValue;
}

/** A string, array, hash or regexp whose class is a user subclass. */
export interface UserClassValue {
  type: 'user-class';
  className: string;
  value: MarshalValue;
}

export type MarshalValue =
  | NilValue
  | BoolValue
  | IntegerValue
  | FloatValue
  | StringValue
  | SymbolValue
  | RegexpValue
  | ArrayValue
  | HashValue
  | ObjectValue
  | StructValue
  | UserDataValue
  | UserMarshalValue
  | ClassRefValue
  | ExtendedValue
  | UserClassValue;

export type MarshalType = MarshalValue['type'];

// ── Constructors ───────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8');
const strictUtf8Decoder = new TextDecoder('utf-8', { fatal: true });

export const NIL: NilValue = { type: 'nil' };

export function nil(): NilValue {
  return NIL;
}

export function bool(value: boolean): BoolValue {
  return { type: 'bool', value };
}

export function integer(value: number | bigint): IntegerValue {
  return { type: 'integer', value };
}

export function float(value: number): FloatValue {
  return { type: 'float', value };
}

export function string(text: string, encoding: StringEncoding = 'utf-8'): StringValue {
  return { type: 'string', data: utf8Encoder.encode(text), encoding };
}

export function bytes(data: Uint8Array): StringValue {
  return { type: 'string', data, encoding: 'none' };
}

export function symbol(name: string): SymbolValue {
  return { type: 'symbol', name };
}

export function array(items: MarshalValue[]): ArrayValue {
  return { type: 'array', items };
}

export function hash(entries: Array<[MarshalValue, MarshalValue]>): HashValue {
  return { type: 'hash', entries };
}

export function object(className: string, fields: Iterable<[string, MarshalValue]> = []): ObjectValue {
  return { type: 'object', className, fields: new Map(fields) };
}

export function userData(className: string, data: Uint8Array): UserDataValue {
  return { type: 'userdata', className, data };
}

/** Decode string bytes as UTF-8 text. Throws a `TypeError` on malformed bytes. */
export function textOf(value: StringValue): string {
  return strictUtf8Decoder.decode(value.data);
}

export function encodeText(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

export function decodeText(data: Uint8Array): string {
  return utf8Decoder.decode(data);
}

/** True when the value occupies a slot in the object table. */
export function isLinkable(value: MarshalValue): boolean {
  switch (value.type) {
    case 'nil':
    case 'bool':
    case 'symbol':
      return false;
    case 'integer':
      return isBignum(value.value);
    default:
      return true;
  }
}

/** Integers outside the fixnum range travel as bignums. */
export function isBignum(value: number | bigint): boolean {
  if (typeof value === 'bigint') {
    return value < BigInt(FIXNUM_MIN) || value > BigInt(FIXNUM_MAX);
  }
  return value < FIXNUM_MIN || value > FIXNUM_MAX;
}
