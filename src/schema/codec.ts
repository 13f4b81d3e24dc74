/**
 * Class codecs: transforms for composites that carry a class name.
 *
 * `ClassCodec` memoizes per call, so a composite reached twice in one
 * materialization becomes one record, and a record reached twice in one
 * dematerialization becomes one wire object (which the encoder then links).
 */

import { userData, type IvarMap, type MarshalValue } from '../core/types.js';
import type { SchemaContext } from './context.js';
import { checkRank, decodeGrid, encodeGrid, type Grid, type GridRank } from './grid.js';
import { describeValue, type Transform, type TransformKind } from './transforms.js';

export abstract class ClassCodec<T extends object> implements Transform<T> {
  abstract readonly kind: TransformKind;
  readonly className: string;

  private readonly decoded = new WeakMap<SchemaContext, Map<MarshalValue, T>>();
  private readonly encoded = new WeakMap<SchemaContext, Map<T, MarshalValue>>();

  constructor(className: string) {
    this.className = className;
  }

  decode(wire: MarshalValue, ctx: SchemaContext): T {
    const memo = memoFor(this.decoded, ctx);
    const seen = memo.get(wire);
    if (seen !== undefined) return seen;
    const record = ctx.guard(wire, () => ctx.at(this.className, undefined, () => this.decodeFresh(wire, ctx)));
    memo.set(wire, record);
    return record;
  }

  encode(record: T, ctx: SchemaContext): MarshalValue {
    const memo = memoFor(this.encoded, ctx);
    const seen = memo.get(record);
    if (seen !== undefined) return seen;
    const wire = ctx.guard(record, () => ctx.at(this.className, undefined, () => this.encodeFresh(record, ctx)));
    memo.set(record, wire);
    return wire;
  }

  protected abstract decodeFresh(wire: MarshalValue, ctx: SchemaContext): T;
  protected abstract encodeFresh(record: T, ctx: SchemaContext): MarshalValue;
}

function memoFor<K, V>(memos: WeakMap<SchemaContext, Map<K, V>>, ctx: SchemaContext): Map<K, V> {
  let memo = memos.get(ctx);
  if (memo === undefined) {
    memo = new Map();
    memos.set(ctx, memo);
  }
  return memo;
}

// ── Object records ───────────────────────────────────────────────

export interface Field<V> {
  readonly transform: Transform<V>;
  /** Wire name without `@`; defaults to the snake_case key. */
  readonly wire?: string;
  /** Value used when the field is absent on the wire. */
  readonly default?: () => V;
}

export type FieldMap<T> = { [K in keyof T]-?: Field<T[K]> };

export function field<V>(
  transform: Transform<V>,
  options: { wire?: string; default?: () => V } = {},
): Field<V> {
  return { transform, ...options };
}

export function snakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

/**
 * A plain object record: each declared field maps to the instance variable
 * `@snake_case_key`. Undeclared instance variables are ignored on decode.
 */
export class Schema<T extends object> extends ClassCodec<T> {
  readonly kind = 'record';
  readonly fields: FieldMap<T>;
  private readonly keys: Array<keyof T & string>;

  constructor(className: string, fields: FieldMap<T>) {
    super(className);
    this.fields = fields;
    this.keys = Object.keys(fields).filter((key): key is keyof T & string => key in fields);
  }

  wireName(key: keyof T & string): string {
    return `@${this.fields[key].wire ?? snakeCase(key)}`;
  }

  protected decodeFresh(wire: MarshalValue, ctx: SchemaContext): T {
    if (wire.type !== 'object' || wire.className !== this.className) {
      throw ctx.mismatch(`expected object ${this.className}, found ${describeValue(wire)}`);
    }
    const record: Partial<T> = {};
    for (const key of this.keys) {
      this.decodeField(record, key, wire.fields, ctx);
    }
    if (!isComplete(record, this.keys)) {
      throw ctx.mismatch('record is incomplete');
    }
    return record;
  }

  protected encodeFresh(record: T, ctx: SchemaContext): MarshalValue {
    const fields: IvarMap = new Map();
    for (const key of this.keys) {
      ctx.at(this.className, key, () => {
        fields.set(this.wireName(key), this.fields[key].transform.encode(record[key], ctx));
      });
    }
    return { type: 'object', className: this.className, fields };
  }

  private decodeField<K extends keyof T & string>(
    record: Partial<T>,
    key: K,
    fields: IvarMap,
    ctx: SchemaContext,
  ): void {
    const declared: Field<T[K]> = this.fields[key];
    const name = this.wireName(key);
    const raw = fields.get(name);
    ctx.at(this.className, key, () => {
      if (raw !== undefined) {
        record[key] = declared.transform.decode(raw, ctx);
      } else if (declared.default !== undefined) {
        record[key] = declared.default();
      } else {
        throw ctx.mismatch(`missing field ${name}`);
      }
    });
  }
}

function isComplete<T extends object>(record: Partial<T>, keys: Array<keyof T & string>): record is T {
  return keys.every((key) => Object.prototype.hasOwnProperty.call(record, key));
}

export function defineSchema<T extends object>(className: string, fields: FieldMap<T>): Schema<T> {
  return new Schema(className, fields);
}

// ── User data ────────────────────────────────────────────────────

/** Composites serialized by their class as an opaque byte string. */
export abstract class UserDataCodec<T extends object> extends ClassCodec<T> {
  readonly kind: TransformKind = 'userdata';

  protected decodeFresh(wire: MarshalValue, ctx: SchemaContext): T {
    if (wire.type !== 'userdata' || wire.className !== this.className) {
      throw ctx.mismatch(`expected user data ${this.className}, found ${describeValue(wire)}`);
    }
    return this.unpack(wire.data, ctx);
  }

  protected encodeFresh(value: T, ctx: SchemaContext): MarshalValue {
    return userData(this.className, this.pack(value, ctx));
  }

  protected abstract unpack(data: Uint8Array, ctx: SchemaContext): T;
  protected abstract pack(value: T, ctx: SchemaContext): Uint8Array;
}

/** `Table` user data holding a grid of the given rank. */
export class TableCodec extends UserDataCodec<Grid> {
  override readonly kind: TransformKind = 'grid-blob';
  readonly rank: GridRank;

  constructor(rank: GridRank = 3, className = 'Table') {
    super(className);
    this.rank = rank;
  }

  protected unpack(data: Uint8Array, ctx: SchemaContext): Grid {
    const grid = decodeGrid(data, ctx.gridLayout, ctx.gridLayout === 'rgss' ? this.rank : undefined);
    checkRank(grid, this.rank);
    return grid;
  }

  protected pack(grid: Grid, ctx: SchemaContext): Uint8Array {
    return encodeGrid(grid, ctx.gridLayout, this.rank);
  }
}

export function grid(rank: GridRank = 3): TableCodec {
  return new TableCodec(rank);
}
