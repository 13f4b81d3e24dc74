/**
 * Unit tests for the portable tree and the document formats.
 */

import { describe, it, expect } from 'vitest';
import { DataFormatError } from '../../src/core/errors.js';
import {
  NIL,
  array,
  bool,
  bytes,
  float,
  hash,
  integer,
  object,
  string,
  symbol,
  userData,
  type MarshalValue,
} from '../../src/core/types.js';
import { DataFormatHandler, formatForPath } from '../../src/formats/handler.js';
import { fromPortable, toPortable } from '../../src/formats/portable.js';
import { actorsDocument } from '../../src/rpg/index.js';
import { sampleActor } from '../helpers/project.js';
import { thrown } from '../helpers/wire.js';

function richTree(): MarshalValue {
  const labelled = string('tagged', { name: 'Shift_JIS' });
  labelled.ivars = new Map([['@note', symbol('n')]]);
  const withDefault = hash([[symbol('a'), integer(1)]]);
  withDefault.default = NIL;
  return array([
    NIL,
    bool(false),
    integer(-7),
    integer(2n ** 70n),
    float(0.25),
    float(-0),
    float(NaN),
    string('héllo'),
    bytes(Uint8Array.from([0xff, 0x00])),
    labelled,
    { type: 'regexp', source: Uint8Array.from([0x5e, 0x61]), options: 1, encoding: 'us-ascii' },
    withDefault,
    object('Point', [
      ['@x', integer(1)],
      ['@y', integer(2)],
    ]),
    { type: 'struct', className: 'Pair', members: new Map([['left', NIL]]) },
    userData('Table', Uint8Array.from([1, 2, 3])),
    { type: 'user-marshal', className: 'Range2', value: array([integer(1)]) },
    { type: 'class', name: 'Foo' },
    { type: 'module', name: 'Bar' },
    { type: 'extended', module: 'Mixin', value: array([]) },
    { type: 'user-class', className: 'Name', value: string('x') },
    { type: 'array', items: [], ivars: new Map([['@size', integer(0)]]) },
  ]);
}

describe('toPortable', () => {
  it('maps immediates to plain JSON values', () => {
    expect(toPortable(NIL)).toBeNull();
    expect(toPortable(bool(true))).toBe(true);
    expect(toPortable(integer(5))).toBe(5);
    expect(toPortable(array([integer(1), NIL]))).toEqual([1, null]);
  });

  it('writes large integers as digit strings', () => {
    expect(toPortable(integer(2n ** 64n))).toEqual({ $: 'int', value: '18446744073709551616' });
  });

  it('spells special floats', () => {
    expect(toPortable(float(NaN))).toEqual({ $: 'float', value: 'nan' });
    expect(toPortable(float(-Infinity))).toEqual({ $: 'float', value: '-inf' });
    expect(toPortable(float(-0))).toEqual({ $: 'float', value: '-0' });
    expect(toPortable(float(2))).toEqual({ $: 'float', value: 2 });
  });

  it('writes UTF-8 strings as text and other bytes as base64', () => {
    expect(toPortable(string('hi'))).toEqual({ $: 'string', text: 'hi', encoding: 'utf-8' });
    expect(toPortable(bytes(Uint8Array.from([0xff])))).toEqual({ $: 'string', base64: '/w==' });
  });

  it('writes object fields as ordered pairs', () => {
    const value = object('Point', [
      ['@y', integer(2)],
      ['@x', integer(1)],
    ]);
    expect(toPortable(value)).toEqual({
      $: 'object',
      class: 'Point',
      fields: [
        ['@y', 2],
        ['@x', 1],
      ],
    });
  });

  it('duplicates shared nodes', () => {
    const shared = array([integer(1)]);
    expect(toPortable(array([shared, shared]))).toEqual([[1], [1]]);
  });

  it('rejects cycles', () => {
    const root = array([]);
    root.items.push(root);
    const error = thrown(() => toPortable(root));
    expect(error).toBeInstanceOf(DataFormatError);
    expect(error).toHaveProperty('message', 'cyclic array cannot be written as a tree');
  });
});

describe('fromPortable', () => {
  it('reads back everything toPortable writes', () => {
    const tree = richTree();
    expect(fromPortable(toPortable(tree))).toEqual(tree);
  });

  it('reads plain values', () => {
    expect(fromPortable([1, true, null])).toEqual(array([integer(1), bool(true), NIL]));
  });

  it('keeps small digit strings as numbers', () => {
    expect(fromPortable({ $: 'int', value: '-12' })).toEqual(integer(-12));
  });

  const invalid: Array<[unknown, string]> = [
    [1.5, '$: bare numbers must be safe integers'],
    ['text', '$: unexpected string'],
    [{ $: 'nope' }, '$: unknown node type "nope"'],
    [{ $: 'int', value: '1.0' }, '$: bad integer "1.0"'],
    [{ $: 'string' }, '$: needs text or base64'],
    [{ $: 'string', base64: '@@' }, '$: invalid base64'],
    [[0, { $: 'symbol' }], '$[1]: name must be a string'],
    [{ $: 'object', class: 'P', fields: [['@x']] }, '$.fields[0]: expected a [name, value] pair'],
    [{ $: 'regexp', text: 'a', options: 300 }, '$: options must be a byte'],
    [{ $: 'string', text: 'a', encoding: 'latin-1' }, '$: bad encoding "latin-1"'],
  ];

  it.each(invalid)('rejects %j', (input, message) => {
    const error = thrown(() => fromPortable(input));
    expect(error).toBeInstanceOf(DataFormatError);
    expect(error).toHaveProperty('message', message);
  });
});

describe('formatForPath', () => {
  it('maps extensions to formats', () => {
    expect(formatForPath('Data/Actors.rxdata')).toBe('marshal');
    expect(formatForPath('out/actors.JSON')).toBe('json');
    expect(formatForPath('a.cbor')).toBe('cbor');
    expect(formatForPath('notes.txt')).toBeUndefined();
    expect(formatForPath('README')).toBeUndefined();
  });
});

describe('DataFormatHandler', () => {
  it('builds document paths', () => {
    expect(new DataFormatHandler('json').pathFor('Actors')).toBe('Data/Actors.json');
    expect(new DataFormatHandler('marshal', { dataDir: 'Backup' }).pathFor('Map001')).toBe('Backup/Map001.rxdata');
  });

  it.each(['marshal', 'json', 'cbor'] as const)('round-trips a rich tree as %s', (format) => {
    const handler = new DataFormatHandler(format);
    const tree = richTree();
    expect(handler.readValue(handler.writeValue(tree))).toEqual(tree);
  });

  it.each(['marshal', 'json', 'cbor'] as const)('reads typed documents from %s', (format) => {
    const handler = new DataFormatHandler(format);
    const actors = [sampleActor(0, 'Aluxes')];
    expect(handler.read(actorsDocument, handler.write(actorsDocument, actors))).toEqual(actors);
  });

  it('indents pretty JSON', () => {
    const out = new DataFormatHandler('json', { pretty: true }).writeValue(array([integer(1)]));
    expect(new TextDecoder().decode(out)).toBe('[\n  1\n]\n');
  });

  it('writes compact JSON by default', () => {
    const out = new DataFormatHandler('json').writeValue(object('P', [['@x', integer(1)]]));
    expect(new TextDecoder().decode(out)).toBe('{"$":"object","class":"P","fields":[["@x",1]]}');
  });

  it('rejects malformed JSON', () => {
    const error = thrown(() => new DataFormatHandler('json').readValue(new TextEncoder().encode('{')));
    expect(error).toBeInstanceOf(DataFormatError);
    expect(error).toHaveProperty('message', 'document is not valid UTF-8 JSON');
  });

  it('rejects malformed CBOR', () => {
    const error = thrown(() => new DataFormatHandler('cbor').readValue(Uint8Array.from([0xff])));
    expect(error).toBeInstanceOf(DataFormatError);
  });
});
