/**
 * Reference tables for one decode or encode call.
 *
 * Both tables are append-only logs indexed from 0. Links may only point at
 * entries that already exist; a table is created per call and dropped with
 * it.
 */

import { MarshalError } from './errors.js';
import type { MarshalValue } from './types.js';

// ── Decode side ────────────────────────────────────────────────────

export class SymbolTable {
  private readonly symbols: string[] = [];

  get length(): number {
    return this.symbols.length;
  }

  add(name: string): number {
    this.symbols.push(name);
    return this.symbols.length - 1;
  }

  get(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.symbols.length) {
      throw new MarshalError('BadReference', `symbol link ${index} outside table of ${this.symbols.length}`);
    }
    return this.symbols[index];
  }
}

export class ObjectTable {
  private readonly objects: MarshalValue[] = [];

  get length(): number {
    return this.objects.length;
  }

  /** Append a value (possibly still being filled in) and return its index. */
  add(value: MarshalValue): number {
    this.objects.push(value);
    return this.objects.length - 1;
  }

  /** Swap the entry at `index` for a wrapper around it. */
  replace(index: number, value: MarshalValue): void {
    this.get(index);
    this.objects[index] = value;
  }

  get(index: number): MarshalValue {
    if (!Number.isInteger(index) || index < 0 || index >= this.objects.length) {
      throw new MarshalError('BadReference', `object link ${index} outside table of ${this.objects.length}`);
    }
    return this.objects[index];
  }
}

// ── Encode side ────────────────────────────────────────────────────

/** Symbols are matched by text. */
export class SymbolIndex {
  private readonly indices = new Map<string, number>();

  lookup(name: string): number | undefined {
    return this.indices.get(name);
  }

  add(name: string): number {
    const index = this.indices.size;
    this.indices.set(name, index);
    return index;
  }
}

/** Objects are matched by identity. */
export class ObjectIndex {
  private readonly indices = new Map<MarshalValue, number>();

  lookup(value: MarshalValue): number | undefined {
    return this.indices.get(value);
  }

  add(value: MarshalValue): number {
    const index = this.indices.size;
    this.indices.set(value, index);
    return index;
  }
}
