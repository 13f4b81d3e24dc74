/**
 * Schema registry with tagged-variant dispatch.
 *
 * Each entry pairs a class codec with `wrap` / `unwrap` functions between
 * its record type and a variant type `V`. Decoding dispatches on the wire
 * class name; encoding offers the variant to each entry's `unwrap` in
 * registration order and uses the first one that accepts it.
 */

import type { MarshalValue } from '../core/types.js';
import type { ClassCodec } from './codec.js';
import type { SchemaContext } from './context.js';
import { describeValue, type Transform } from './transforms.js';

interface RegistryEntry<V> {
  readonly className: string;
  decode(wire: MarshalValue, ctx: SchemaContext): V;
  /** `undefined` when the variant belongs to another entry. */
  encode(variant: V, ctx: SchemaContext): MarshalValue | undefined;
}

/** Keeps composites of unregistered classes as raw wire values. */
export interface RegistryFallback<V> {
  wrap(raw: MarshalValue, ctx: SchemaContext): V;
  unwrap(variant: V): MarshalValue | undefined;
}

export class SchemaRegistry<V> implements Transform<V> {
  readonly kind = 'variant';

  private readonly entries: RegistryEntry<V>[] = [];
  private readonly byClass = new Map<string, RegistryEntry<V>>();
  private readonly fallback?: RegistryFallback<V>;

  constructor(options: { fallback?: RegistryFallback<V> } = {}) {
    this.fallback = options.fallback;
  }

  register<T extends object>(
    codec: ClassCodec<T>,
    wrap: (record: T) => V,
    unwrap: (variant: V) => T | undefined,
  ): this {
    if (this.byClass.has(codec.className)) {
      throw new Error(`class ${codec.className} is already registered`);
    }
    const entry: RegistryEntry<V> = {
      className: codec.className,
      decode: (wire, ctx) => wrap(codec.decode(wire, ctx)),
      encode: (variant, ctx) => {
        const record = unwrap(variant);
        return record === undefined ? undefined : codec.encode(record, ctx);
      },
    };
    this.entries.push(entry);
    this.byClass.set(codec.className, entry);
    return this;
  }

  has(className: string): boolean {
    return this.byClass.has(className);
  }

  classNames(): string[] {
    return this.entries.map((entry) => entry.className);
  }

  decode(wire: MarshalValue, ctx: SchemaContext): V {
    const className = classNameOf(wire);
    const entry = className === undefined ? undefined : this.byClass.get(className);
    if (entry !== undefined) return entry.decode(wire, ctx);
    if (this.fallback !== undefined) return this.fallback.wrap(wire, ctx);
    throw ctx.mismatch(`no schema registered for ${describeValue(wire)}`);
  }

  encode(variant: V, ctx: SchemaContext): MarshalValue {
    for (const entry of this.entries) {
      const wire = entry.encode(variant, ctx);
      if (wire !== undefined) return wire;
    }
    const raw = this.fallback?.unwrap(variant);
    if (raw !== undefined) return raw;
    throw ctx.mismatch('no registered schema accepts this value');
  }
}

function classNameOf(wire: MarshalValue): string | undefined {
  switch (wire.type) {
    case 'object':
    case 'struct':
    case 'userdata':
    case 'user-marshal':
      return wire.className;
    default:
      return undefined;
  }
}
