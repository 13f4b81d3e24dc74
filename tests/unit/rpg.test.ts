/**
 * Unit tests for the RPG Maker XP records and documents.
 */

import { deflateSync } from 'node:zlib';
import { describe, it, expect } from 'vitest';
import { ByteWriter } from '../../src/core/cursor.js';
import { MarshalError } from '../../src/core/errors.js';
import { array, bytes, integer, object, string, userData, type MarshalValue } from '../../src/core/types.js';
import { decode } from '../../src/protocol/decoder.js';
import { encode } from '../../src/protocol/encoder.js';
import { dematerialize, materialize, type SchemaOptions, type Transform } from '../../src/schema/index.js';
import {
  Scope,
  actorSchema,
  actorsDocument,
  animationsDocument,
  classesDocument,
  colorCodec,
  countRecords,
  defaultAnimation,
  defaultClass,
  defaultEnemy,
  defaultSystem,
  defaultTroop,
  enemiesDocument,
  itemSchema,
  itemsDocument,
  systemDocument,
  systemSchema,
  troopsDocument,
  eventCommandSchema,
  graphicSchema,
  isDocumentKind,
  mapDocument,
  mapDocumentName,
  mapInfosDocument,
  scriptTransform,
  scriptsDocument,
  tilesetsDocument,
  commonEventsDocument,
  toneCodec,
  type EventCommand,
} from '../../src/rpg/index.js';
import { thrown } from '../helpers/wire.js';
import {
  sampleActor,
  sampleCommonEvent,
  sampleItem,
  sampleMap,
  sampleMapInfos,
  sampleScripts,
  sampleSystem,
  sampleTileset,
} from '../helpers/project.js';

function throughBytes<V>(transform: Transform<V>, typed: V, options?: SchemaOptions): V {
  return materialize(transform, decode(encode(dematerialize(transform, typed, options))), options);
}

function fieldsOf(wire: MarshalValue): Map<string, MarshalValue> {
  if (wire.type !== 'object') throw new Error(`expected an object, got ${wire.type}`);
  return wire.fields;
}

function schemaError(fn: () => unknown): MarshalError {
  const error = thrown(fn);
  if (!(error instanceof MarshalError)) throw new Error('expected a MarshalError');
  return error;
}

function quad(a: number, b: number, c: number, d: number): Uint8Array {
  const writer = new ByteWriter(32);
  for (const v of [a, b, c, d]) writer.writeF64(v);
  return writer.finish();
}

describe('documents', () => {
  it('round-trips actors', () => {
    const actors = [sampleActor(0, 'Aluxes'), sampleActor(1, 'Basil')];
    expect(throughBytes(actorsDocument, actors)).toEqual(actors);
  });

  it('round-trips tilesets and common events', () => {
    expect(throughBytes(tilesetsDocument, [sampleTileset()])).toEqual([sampleTileset()]);
    expect(throughBytes(commonEventsDocument, [sampleCommonEvent()])).toEqual([sampleCommonEvent()]);
  });

  it('round-trips map infos keyed by map id', () => {
    const infos = throughBytes(mapInfosDocument, sampleMapInfos());
    expect([...infos.keys()]).toEqual([1]);
    expect(infos.get(1)?.name).toBe('Town');
  });

  it('round-trips a map with its events', () => {
    const map = throughBytes(mapDocument, sampleMap());
    expect(map).toEqual(sampleMap());
    expect(map.events.get(1)?.name).toBe('EV001');
  });

  it('round-trips scripts', () => {
    expect(throughBytes(scriptsDocument, sampleScripts())).toEqual(sampleScripts());
  });

  it('counts records per kind', () => {
    const actors = dematerialize(actorsDocument, [sampleActor(0, 'A'), sampleActor(1, 'B')]);
    expect(countRecords('actors', actors)).toBe(2);
    expect(countRecords('map', dematerialize(mapDocument, sampleMap()))).toBe(1);
    expect(countRecords('map-infos', dematerialize(mapInfosDocument, sampleMapInfos()))).toBe(1);
    expect(countRecords('items', dematerialize(itemsDocument, [sampleItem(), sampleItem()]))).toBe(2);
    expect(countRecords('system', dematerialize(systemDocument, sampleSystem()))).toBe(1);
  });

  it('recognises document kinds', () => {
    expect(isDocumentKind('common-events')).toBe(true);
    expect(isDocumentKind('system')).toBe(true);
    expect(isDocumentKind('maps')).toBe(false);
  });

  it('names map documents by id', () => {
    expect(mapDocumentName(1)).toBe('Map001');
    expect(mapDocumentName(42)).toBe('Map042');
    expect(mapDocumentName(1234)).toBe('Map1234');
  });
});

describe('database records', () => {
  it('round-trips items', () => {
    expect(throughBytes(itemsDocument, [sampleItem()])).toEqual([sampleItem()]);
  });

  it('round-trips the default records', () => {
    expect(throughBytes(classesDocument, [defaultClass()])).toEqual([defaultClass()]);
    expect(throughBytes(enemiesDocument, [defaultEnemy()])).toEqual([defaultEnemy()]);
    expect(throughBytes(troopsDocument, [defaultTroop()])).toEqual([defaultTroop()]);
    expect(throughBytes(animationsDocument, [defaultAnimation()])).toEqual([defaultAnimation()]);
  });

  it('round-trips the system record', () => {
    expect(throughBytes(systemDocument, sampleSystem())).toEqual(sampleSystem());
  });

  it('writes enum members as integers', () => {
    expect(fieldsOf(dematerialize(itemSchema, sampleItem())).get('@scope')).toEqual(integer(Scope.OneAlly));
  });

  it('rejects an integer outside an enum', () => {
    const wire = dematerialize(itemSchema, sampleItem());
    fieldsOf(wire).set('@scope', integer(9));
    const error = schemaError(() => materialize(itemSchema, wire));
    expect(error.kind).toBe('SchemaMismatch');
    expect(error.message).toBe('RPG::Item.scope: 9 is not one of 0, 1, 2, 3, 4, 5, 6, 7');
  });

  it('defaults the sp recovery of older items', () => {
    const wire = dematerialize(itemSchema, { ...sampleItem(), recoverSpRate: 10, recoverSp: 20 });
    fieldsOf(wire).delete('@recover_sp_rate');
    fieldsOf(wire).delete('@recover_sp');
    expect(materialize(itemSchema, wire)).toEqual(sampleItem());
  });

  it('fills every missing system field with its default', () => {
    expect(materialize(systemSchema, object('RPG::System'))).toEqual(defaultSystem());
    const wire = dematerialize(systemSchema, sampleSystem());
    fieldsOf(wire).delete('@words');
    fieldsOf(wire).delete('@start_x');
    expect(materialize(systemSchema, wire)).toEqual({ ...sampleSystem(), words: defaultSystem().words, startX: 0 });
  });
});

describe('actor wire layout', () => {
  const wire = dematerialize(actorsDocument, [sampleActor(0, 'Aluxes')]);
  const items = wire.type === 'array' ? wire.items : [];
  const fields = fieldsOf(items[1]);

  it('pads the list with nil', () => {
    expect(items).toHaveLength(2);
    expect(items[0]).toEqual({ type: 'nil' });
  });

  it('writes 1-based ids', () => {
    expect(fields.get('@id')).toEqual(integer(1));
    expect(fields.get('@class_id')).toEqual(integer(1));
    expect(fields.get('@weapon_id')).toEqual(integer(1));
  });

  it('writes empty equipment slots as 0', () => {
    expect(fields.get('@armor1_id')).toEqual(integer(0));
    expect(fields.get('@armor2_id')).toEqual(integer(3));
  });

  it('writes absent names as empty strings', () => {
    expect(fields.get('@battler_name')).toEqual(string('', 'none'));
  });

  it('stores parameters as Table user data', () => {
    expect(fields.get('@parameters')).toMatchObject({ type: 'userdata', className: 'Table' });
  });

  it('rejects id 0', () => {
    const bad = object('RPG::Actor', [...fields]);
    bad.fields.set('@id', integer(0));
    const error = schemaError(() => materialize(actorsDocument, array([{ type: 'nil' }, bad])));
    expect(error.message).toBe('RPG::Actor.id: id 0 is not 1-based');
  });

  it('writes the rank in the rgss grid layout', () => {
    const rgss = dematerialize(actorSchema, sampleActor(0, 'A'), { gridLayout: 'rgss' });
    const table = fieldsOf(rgss).get('@parameters');
    expect(table?.type === 'userdata' && [...table.data.subarray(0, 8)]).toEqual([2, 0, 0, 0, 6, 0, 0, 0]);
    expect(throughBytes(actorSchema, sampleActor(0, 'A'), { gridLayout: 'rgss' })).toEqual(sampleActor(0, 'A'));
  });
});

describe('graphic', () => {
  it('maps tile id 0 to a character sprite', () => {
    const wire = dematerialize(graphicSchema, {
      tileId: null,
      characterName: 'npc',
      characterHue: 0,
      direction: 2,
      pattern: 0,
      opacity: 255,
      blendType: 0,
    });
    expect(fieldsOf(wire).get('@tile_id')).toEqual(integer(0));
    fieldsOf(wire).set('@tile_id', integer(385));
    expect(materialize(graphicSchema, wire).tileId).toBe(384);
  });
});

describe('scripts', () => {
  it('inflates the source of an entry', () => {
    const wire = array([integer(7), string('Main', 'none'), bytes(deflateSync('p 1'))]);
    expect(materialize(scriptTransform, wire)).toEqual({ id: 7, name: 'Main', source: 'p 1' });
  });

  it('rejects a source that is not zlib data', () => {
    const wire = array([integer(7), string('Main', 'none'), bytes(Uint8Array.from([1, 2, 3]))]);
    const error = schemaError(() => materialize(scriptTransform, wire));
    expect(error.kind).toBe('SchemaMismatch');
    expect(error.message.startsWith('script source is not zlib data')).toBe(true);
  });

  it('rejects an entry of the wrong shape', () => {
    const error = schemaError(() => materialize(scriptTransform, array([integer(7)])));
    expect(error.message).toBe('expected a [id, name, source] script entry, found array');
  });
});

describe('color and tone', () => {
  it('reads four doubles', () => {
    expect(materialize(colorCodec, userData('Color', quad(255, 128, 0, 255)))).toEqual({
      red: 255,
      green: 128,
      blue: 0,
      alpha: 255,
    });
  });

  it('writes four doubles', () => {
    const wire = dematerialize(toneCodec, { red: -68, green: -68, blue: 0, gray: 0 });
    expect(wire).toEqual(userData('Tone', quad(-68, -68, 0, 0)));
  });

  it('rejects a payload of the wrong size', () => {
    const error = schemaError(() => materialize(colorCodec, userData('Color', new Uint8Array(16))));
    expect(error.message).toBe('Color: Color holds 16 bytes, expected 32');
  });
});

describe('event command parameters', () => {
  const command: EventCommand = {
    code: 209,
    indent: 1,
    parameters: [
      { kind: 'integer', value: -1 },
      { kind: 'float', value: 1.5 },
      { kind: 'bool', value: true },
      { kind: 'none' },
      { kind: 'string', value: 'Zoë' },
      { kind: 'color', value: { red: 255, green: 0, blue: 0, alpha: 128 } },
      { kind: 'tone', value: { red: 0, green: 0, blue: 0, gray: 255 } },
      { kind: 'audio-file', value: { name: 'door', volume: 80, pitch: 120 } },
      {
        kind: 'move-route',
        value: {
          repeat: false,
          skippable: true,
          list: [
            { code: 14, parameters: [{ kind: 'integer', value: 1 }, { kind: 'integer', value: 0 }] },
            { code: 0, parameters: [] },
          ],
        },
      },
      { kind: 'move-command', value: { code: 44, parameters: [{ kind: 'audio-file', value: { name: null, volume: 100, pitch: 100 } }] } },
      { kind: 'array', value: [{ kind: 'integer', value: 1 }, { kind: 'array', value: [] }] },
    ],
  };

  it('round-trips every parameter kind', () => {
    expect(throughBytes(eventCommandSchema, command)).toEqual(command);
  });

  it('rejects composites of unknown classes by default', () => {
    const wire = dematerialize(eventCommandSchema, { code: 355, indent: 0, parameters: [] });
    fieldsOf(wire).set('@parameters', array([object('Game_Thing')]));
    const error = schemaError(() => materialize(eventCommandSchema, wire));
    expect(error.message).toBe('RPG::EventCommand.parameters: unsupported command parameter object Game_Thing');
  });

  it('keeps composites of unknown classes when asked to', () => {
    const raw = object('Game_Thing');
    const wire = dematerialize(eventCommandSchema, { code: 355, indent: 0, parameters: [] });
    fieldsOf(wire).set('@parameters', array([raw]));
    const decoded = materialize(eventCommandSchema, wire, { unknownClasses: 'preserve' });
    expect(decoded.parameters).toEqual([{ kind: 'raw', value: raw }]);
    const back = dematerialize(eventCommandSchema, decoded);
    const parameters = fieldsOf(back).get('@parameters');
    expect(parameters?.type === 'array' && parameters.items[0]).toBe(raw);
  });
});
