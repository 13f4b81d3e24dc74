/**
 * Field transforms: pairs of pure functions between a wire value and a
 * typed field value. Every transform is total over well-typed input and
 * reports ill-typed input as a `SchemaMismatch` at the current location.
 */

import {
  NIL,
  array,
  bool,
  float,
  hash,
  integer,
  string,
  textOf,
  type MarshalValue,
} from '../core/types.js';
import type { SchemaContext } from './context.js';

export type TransformKind =
  | 'identity'
  | 'enum'
  | 'id-shift'
  | 'optional-id-shift'
  | 'nil-padded-sequence'
  | 'optional-text'
  | 'grid-blob'
  | 'id-list'
  | 'list'
  | 'nullable'
  | 'hash'
  | 'record'
  | 'userdata'
  | 'variant';

export interface Transform<V> {
  readonly kind: TransformKind;
  decode(wire: MarshalValue, ctx: SchemaContext): V;
  encode(value: V, ctx: SchemaContext): MarshalValue;
}

/** Short description of a wire value for error messages. */
export function describeValue(wire: MarshalValue): string {
  switch (wire.type) {
    case 'object':
    case 'struct':
    case 'userdata':
    case 'user-marshal':
      return `${wire.type} ${wire.className}`;
    default:
      return wire.type;
  }
}

// ── Identity ─────────────────────────────────────────────────────

export const int: Transform<number> = {
  kind: 'identity',
  decode(wire, ctx) {
    if (wire.type !== 'integer') throw ctx.mismatch(`expected integer, found ${describeValue(wire)}`);
    if (typeof wire.value !== 'number') throw ctx.mismatch(`integer ${wire.value} is out of range`);
    return wire.value;
  },
  encode(value, ctx) {
    if (!Number.isInteger(value)) throw ctx.mismatch(`${value} is not an integer`);
    return integer(value);
  },
};

/** Float values (f64). */
export const double: Transform<number> = {
  kind: 'identity',
  decode(wire, ctx) {
    if (wire.type !== 'float') throw ctx.mismatch(`expected float, found ${describeValue(wire)}`);
    return wire.value;
  },
  encode(value) {
    return float(value);
  },
};

export const boolean: Transform<boolean> = {
  kind: 'identity',
  decode(wire, ctx) {
    if (wire.type !== 'bool') throw ctx.mismatch(`expected true or false, found ${describeValue(wire)}`);
    return wire.value;
  },
  encode(value) {
    return bool(value);
  },
};

export const text: Transform<string> = {
  kind: 'identity',
  decode(wire, ctx) {
    if (wire.type !== 'string') throw ctx.mismatch(`expected string, found ${describeValue(wire)}`);
    try {
      return textOf(wire);
    } catch (error) {
      if (error instanceof TypeError) throw ctx.mismatch('string is not valid UTF-8');
      throw error;
    }
  },
  encode(value, ctx) {
    return string(value, ctx.stringEncoding);
  },
};

/** The wire value itself, unconverted. */
export const value: Transform<MarshalValue> = {
  kind: 'identity',
  decode(wire) {
    return wire;
  },
  encode(raw) {
    return raw;
  },
};

/**
 * Integers restricted to the members of a numeric `enum`:
 * `enumOf<Scope>(Scope)`.
 */
export function enumOf<E extends number>(members: { readonly [key: string]: E | string }): Transform<E> {
  const values = Object.values(members).filter((member): member is E => typeof member === 'number');
  return {
    kind: 'enum',
    decode(wire, ctx) {
      const n = int.decode(wire, ctx);
      const member = values.find((v) => v === n);
      if (member === undefined) throw ctx.mismatch(`${n} is not one of ${values.join(', ')}`);
      return member;
    },
    encode(member, ctx) {
      return int.encode(member, ctx);
    },
  };
}

// ── Ids ──────────────────────────────────────────────────────────

/** 1-based wire id ↔ 0-based index. */
export const idShift: Transform<number> = {
  kind: 'id-shift',
  decode(wire, ctx) {
    const id = int.decode(wire, ctx);
    if (id < 1) throw ctx.mismatch(`id ${id} is not 1-based`);
    return id - 1;
  },
  encode(index, ctx) {
    if (!Number.isInteger(index) || index < 0) throw ctx.mismatch(`index ${index} is not a valid id`);
    return integer(index + 1);
  },
};

/** Like `idShift`, with wire 0 meaning "none". */
export const optionalIdShift: Transform<number | null> = {
  kind: 'optional-id-shift',
  decode(wire, ctx) {
    const id = int.decode(wire, ctx);
    if (id === 0) return null;
    if (id < 0) throw ctx.mismatch(`id ${id} is negative`);
    return id - 1;
  },
  encode(index, ctx) {
    return index === null ? integer(0) : idShift.encode(index, ctx);
  },
};

export const idList: Transform<number[]> = {
  kind: 'id-list',
  decode(wire, ctx) {
    return itemsOf(wire, ctx).map((item) => idShift.decode(item, ctx));
  },
  encode(indices, ctx) {
    return array(indices.map((index) => idShift.encode(index, ctx)));
  },
};

// ── Text ─────────────────────────────────────────────────────────

/** `""` ↔ `null`. */
export const optionalText: Transform<string | null> = {
  kind: 'optional-text',
  decode(wire, ctx) {
    const decoded = text.decode(wire, ctx);
    return decoded === '' ? null : decoded;
  },
  encode(decoded, ctx) {
    return text.encode(decoded ?? '', ctx);
  },
};

// ── Containers ───────────────────────────────────────────────────

export function list<T>(inner: Transform<T>): Transform<T[]> {
  return {
    kind: 'list',
    decode(wire, ctx) {
      return itemsOf(wire, ctx).map((item) => inner.decode(item, ctx));
    },
    encode(items, ctx) {
      return array(items.map((item) => inner.encode(item, ctx)));
    },
  };
}

/**
 * 1-based lists as the editor writes them: element 0 is a nil placeholder.
 * An empty wire array decodes to an empty list.
 */
export function nilPadded<T>(inner: Transform<T>): Transform<T[]> {
  return {
    kind: 'nil-padded-sequence',
    decode(wire, ctx) {
      const items = itemsOf(wire, ctx);
      if (items.length === 0) return [];
      if (items[0].type !== 'nil') {
        throw ctx.mismatch(`first element of a padded list is ${describeValue(items[0])}, not nil`);
      }
      return items.slice(1).map((item) => inner.decode(item, ctx));
    },
    encode(items, ctx) {
      return array([NIL, ...items.map((item) => inner.encode(item, ctx))]);
    },
  };
}

export function nullable<T>(inner: Transform<T>): Transform<T | null> {
  return {
    kind: 'nullable',
    decode(wire, ctx) {
      return wire.type === 'nil' ? null : inner.decode(wire, ctx);
    },
    encode(decoded, ctx) {
      return decoded === null ? NIL : inner.encode(decoded, ctx);
    },
  };
}

/** Hash ↔ `Map`, keeping wire order. Hashes with a default value are rejected. */
export function hashOf<K, V>(key: Transform<K>, entry: Transform<V>): Transform<Map<K, V>> {
  return {
    kind: 'hash',
    decode(wire, ctx) {
      if (wire.type !== 'hash') throw ctx.mismatch(`expected hash, found ${describeValue(wire)}`);
      if (wire.default !== undefined) throw ctx.mismatch('hash default values are not supported');
      const out = new Map<K, V>();
      for (const [k, v] of wire.entries) {
        out.set(key.decode(k, ctx), entry.decode(v, ctx));
      }
      return out;
    },
    encode(decoded, ctx) {
      return hash([...decoded].map(([k, v]) => [key.encode(k, ctx), entry.encode(v, ctx)]));
    },
  };
}

function itemsOf(wire: MarshalValue, ctx: SchemaContext): MarshalValue[] {
  if (wire.type !== 'array') throw ctx.mismatch(`expected array, found ${describeValue(wire)}`);
  return wire.items;
}
