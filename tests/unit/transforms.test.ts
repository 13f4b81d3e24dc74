/**
 * Unit tests for the field transforms.
 */

import { describe, it, expect } from 'vitest';
import { NIL, array, bool, bytes, float, hash, integer, object, string, type MarshalValue } from '../../src/core/types.js';
import { MarshalError } from '../../src/core/errors.js';
import { dematerialize, materialize } from '../../src/schema/materialize.js';
import {
  boolean,
  describeValue,
  double,
  enumOf,
  hashOf,
  idList,
  idShift,
  int,
  list,
  nilPadded,
  nullable,
  optionalIdShift,
  optionalText,
  text,
  value,
  type Transform,
} from '../../src/schema/transforms.js';
import { thrown } from '../helpers/wire.js';

function mismatch<V>(transform: Transform<V>, wire: MarshalValue): MarshalError {
  const error = thrown(() => materialize(transform, wire));
  if (!(error instanceof MarshalError)) throw new Error('expected a MarshalError');
  expect(error.kind).toBe('SchemaMismatch');
  return error;
}

describe('identity transforms', () => {
  it('converts integers', () => {
    expect(materialize(int, integer(7))).toBe(7);
    expect(dematerialize(int, -3)).toEqual(integer(-3));
  });

  it('rejects integers outside the safe range', () => {
    expect(mismatch(int, integer(2n ** 60n)).message).toBe('integer 1152921504606846976 is out of range');
  });

  it('rejects a float where an integer is expected', () => {
    expect(mismatch(int, float(1)).message).toBe('expected integer, found float');
  });

  it('refuses to write a fractional integer', () => {
    expect(thrown(() => dematerialize(int, 0.5))).toMatchObject({ kind: 'SchemaMismatch' });
  });

  it('converts floats and booleans', () => {
    expect(materialize(double, float(0.5))).toBe(0.5);
    expect(dematerialize(double, 2)).toEqual(float(2));
    expect(materialize(boolean, bool(true))).toBe(true);
    expect(mismatch(boolean, NIL).message).toBe('expected true or false, found nil');
  });

  it('decodes text as UTF-8', () => {
    expect(materialize(text, string('naïve'))).toBe('naïve');
  });

  it('rejects text that is not valid UTF-8', () => {
    expect(mismatch(text, bytes(Uint8Array.from([0x61, 0xff, 0x62]))).message).toBe('string is not valid UTF-8');
    expect(mismatch(optionalText, bytes(Uint8Array.from([0xc3]))).message).toBe('string is not valid UTF-8');
  });

  it('writes text with the configured encoding marker', () => {
    expect(dematerialize(text, 'a')).toEqual(string('a', 'none'));
    expect(dematerialize(text, 'a', { stringEncoding: 'utf-8' })).toEqual(string('a', 'utf-8'));
  });

  it('passes raw values through', () => {
    const raw = object('Anything');
    expect(materialize(value, raw)).toBe(raw);
    expect(dematerialize(value, raw)).toBe(raw);
  });
});

enum Weather {
  Clear = 0,
  Rain = 1,
  Storm = 3,
}

describe('enumOf', () => {
  const weather = enumOf<Weather>(Weather);

  it('converts members', () => {
    expect(materialize(weather, integer(3))).toBe(Weather.Storm);
    expect(dematerialize(weather, Weather.Rain)).toEqual(integer(1));
  });

  it('rejects integers that are not members', () => {
    expect(mismatch(weather, integer(2)).message).toBe('2 is not one of 0, 1, 3');
  });

  it('rejects values that are not integers', () => {
    expect(mismatch(weather, string('Rain')).message).toBe('expected integer, found string');
  });
});

describe('id transforms', () => {
  it('shifts 1-based ids to 0-based indices', () => {
    expect(materialize(idShift, integer(1))).toBe(0);
    expect(dematerialize(idShift, 0)).toEqual(integer(1));
  });

  it('rejects id 0', () => {
    expect(mismatch(idShift, integer(0)).message).toBe('id 0 is not 1-based');
  });

  it('rejects negative indices', () => {
    expect(thrown(() => dematerialize(idShift, -1))).toMatchObject({ kind: 'SchemaMismatch' });
  });

  it('maps id 0 to null', () => {
    expect(materialize(optionalIdShift, integer(0))).toBeNull();
    expect(materialize(optionalIdShift, integer(5))).toBe(4);
    expect(dematerialize(optionalIdShift, null)).toEqual(integer(0));
    expect(dematerialize(optionalIdShift, 4)).toEqual(integer(5));
  });

  it('shifts every id in a list', () => {
    expect(materialize(idList, array([integer(1), integer(3)]))).toEqual([0, 2]);
    expect(dematerialize(idList, [1])).toEqual(array([integer(2)]));
  });
});

describe('optionalText', () => {
  it('maps the empty string to null', () => {
    expect(materialize(optionalText, string(''))).toBeNull();
    expect(materialize(optionalText, string('bgm'))).toBe('bgm');
  });

  it('writes null as the empty string', () => {
    expect(dematerialize(optionalText, null)).toEqual({ type: 'string', data: new Uint8Array(0), encoding: 'none' });
  });
});

describe('containers', () => {
  it('converts lists', () => {
    expect(materialize(list(int), array([integer(1), integer(2)]))).toEqual([1, 2]);
    expect(mismatch(list(int), hash([])).message).toBe('expected array, found hash');
  });

  it('drops the nil placeholder of a padded list', () => {
    expect(materialize(nilPadded(int), array([NIL, integer(4), integer(5)]))).toEqual([4, 5]);
    expect(dematerialize(nilPadded(int), [4, 5])).toEqual(array([NIL, integer(4), integer(5)]));
  });

  it('reads an empty padded list as empty', () => {
    expect(materialize(nilPadded(int), array([]))).toEqual([]);
    expect(dematerialize(nilPadded(int), [])).toEqual(array([NIL]));
  });

  it('rejects a padded list without its placeholder', () => {
    expect(mismatch(nilPadded(int), array([integer(1)])).message).toBe(
      'first element of a padded list is integer, not nil',
    );
  });

  it('maps nil to null', () => {
    expect(materialize(nullable(int), NIL)).toBeNull();
    expect(materialize(nullable(int), integer(2))).toBe(2);
    expect(dematerialize(nullable(int), null)).toBe(NIL);
  });

  it('converts hashes keeping their order', () => {
    const wire = hash([
      [integer(3), string('c')],
      [integer(1), string('a')],
    ]);
    const decoded = materialize(hashOf(int, text), wire);
    expect([...decoded]).toEqual([
      [3, 'c'],
      [1, 'a'],
    ]);
    expect(dematerialize(hashOf(int, text), decoded)).toEqual(
      hash([
        [integer(3), string('c', 'none')],
        [integer(1), string('a', 'none')],
      ]),
    );
  });

  it('rejects hashes with a default value', () => {
    const wire = hash([]);
    wire.default = integer(0);
    expect(mismatch(hashOf(int, int), wire).message).toBe('hash default values are not supported');
  });
});

describe('describeValue', () => {
  it('names the class of composites', () => {
    expect(describeValue(object('RPG::Actor'))).toBe('object RPG::Actor');
    expect(describeValue(integer(1))).toBe('integer');
  });
});
