/**
 * Unit tests for the byte cursors and the reference tables.
 */

import { describe, it, expect } from 'vitest';
import { ByteReader, ByteWriter } from '../../src/core/cursor.js';
import { MarshalError } from '../../src/core/errors.js';
import { ObjectIndex, ObjectTable, SymbolIndex, SymbolTable } from '../../src/core/tables.js';
import { integer, string } from '../../src/core/types.js';
import { thrown } from '../helpers/wire.js';

describe('ByteReader', () => {
  it('reads little-endian integers', () => {
    const reader = new ByteReader(Uint8Array.from([0x01, 0x34, 0x12, 0x78, 0x56, 0x34, 0x12, 0xff]));
    expect(reader.readU8()).toBe(1);
    expect(reader.readU16()).toBe(0x1234);
    expect(reader.readU32()).toBe(0x12345678);
    expect(reader.readI8()).toBe(-1);
    expect(reader.remaining()).toBe(0);
  });

  it('reads a signed 32-bit value', () => {
    const reader = new ByteReader(Uint8Array.from([0xfe, 0xff, 0xff, 0xff]));
    expect(reader.readI32()).toBe(-2);
  });

  it('reads an f64', () => {
    const writer = new ByteWriter();
    writer.writeF64(0.25);
    expect(new ByteReader(writer.finish()).readF64()).toBe(0.25);
  });

  it('borrows a view of the source buffer', () => {
    const source = Uint8Array.from([1, 2, 3, 4]);
    const reader = new ByteReader(source);
    reader.readU8();
    const view = reader.readExact(2);
    expect([...view]).toEqual([2, 3]);
    source[1] = 9;
    expect(view[0]).toBe(9);
    expect(reader.position()).toBe(3);
  });

  it('honours the byte offset of a subarray', () => {
    const reader = new ByteReader(Uint8Array.from([0xaa, 0x02, 0x01]).subarray(1));
    expect(reader.readU16()).toBe(0x0102);
  });

  it('fails with UnexpectedEnd past the end', () => {
    const reader = new ByteReader(Uint8Array.from([1, 2]));
    const error = thrown(() => reader.readU32());
    expect(error).toBeInstanceOf(MarshalError);
    expect(error).toMatchObject({ kind: 'UnexpectedEnd' });
    expect(reader.position()).toBe(0);
  });

  it('rejects a negative length', () => {
    const reader = new ByteReader(Uint8Array.from([1]));
    expect(thrown(() => reader.readExact(-1))).toMatchObject({ kind: 'UnexpectedEnd' });
  });

  it('reports TrailingData when bytes are left over', () => {
    const reader = new ByteReader(Uint8Array.from([1, 2, 3]));
    reader.readU8();
    const error = thrown(() => reader.expectEnd());
    expect(error).toMatchObject({ kind: 'TrailingData' });
    expect(error).toHaveProperty('message', '2 byte(s) left after the top-level value at offset 1');
  });
});

describe('ByteWriter', () => {
  it('grows past its initial capacity', () => {
    const writer = new ByteWriter(1);
    for (let i = 0; i < 40; i++) writer.writeU8(i);
    const out = writer.finish();
    expect(out.length).toBe(40);
    expect(out[39]).toBe(39);
  });

  it('writes little-endian integers', () => {
    const writer = new ByteWriter();
    writer.writeU16(0x0102);
    writer.writeU32(0x03040506);
    writer.writeI32(-1);
    writer.writeI8(-2);
    expect([...writer.finish()]).toEqual([0x02, 0x01, 0x06, 0x05, 0x04, 0x03, 0xff, 0xff, 0xff, 0xff, 0xfe]);
  });

  it('copies out on finish', () => {
    const writer = new ByteWriter();
    writer.writeBytes(Uint8Array.from([7, 8]));
    const first = writer.finish();
    writer.writeU8(9);
    expect([...first]).toEqual([7, 8]);
    expect(writer.position()).toBe(3);
  });
});

describe('SymbolTable', () => {
  it('returns symbols by index', () => {
    const table = new SymbolTable();
    expect(table.add('a')).toBe(0);
    expect(table.add('b')).toBe(1);
    expect(table.get(1)).toBe('b');
    expect(table.length).toBe(2);
  });

  it('rejects links outside the table', () => {
    const table = new SymbolTable();
    table.add('a');
    const error = thrown(() => table.get(1));
    expect(error).toMatchObject({ kind: 'BadReference', message: 'symbol link 1 outside table of 1' });
    expect(thrown(() => table.get(-1))).toMatchObject({ kind: 'BadReference' });
  });
});

describe('ObjectTable', () => {
  it('replaces an entry with a wrapper', () => {
    const table = new ObjectTable();
    const inner = string('x');
    table.add(inner);
    const wrapper = { type: 'user-class' as const, className: 'Name', value: inner };
    table.replace(0, wrapper);
    expect(table.get(0)).toBe(wrapper);
  });

  it('rejects links outside the table', () => {
    const error = thrown(() => new ObjectTable().get(0));
    expect(error).toMatchObject({ kind: 'BadReference', message: 'object link 0 outside table of 0' });
  });
});

describe('encode-side indices', () => {
  it('matches symbols by text', () => {
    const index = new SymbolIndex();
    index.add('name');
    expect(index.lookup('name')).toBe(0);
    expect(index.lookup('other')).toBeUndefined();
  });

  it('matches objects by identity', () => {
    const index = new ObjectIndex();
    const value = integer(2 ** 40);
    index.add(value);
    expect(index.lookup(value)).toBe(0);
    expect(index.lookup(integer(2 ** 40))).toBeUndefined();
  });
});
