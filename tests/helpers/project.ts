/**
 * Small, made-up project records shared by the record, cache and CLI tests.
 */

import { encode } from '../../src/protocol/encoder.js';
import { Grid, dematerialize, type SchemaOptions, type Transform } from '../../src/schema/index.js';
import {
  DATABASE_DOCUMENTS,
  DATABASE_KEYS,
  DOCUMENT_NAMES,
  Occasion,
  Scope,
  audioFile,
  defaultAnimation,
  defaultArmor,
  defaultClass,
  defaultEnemy,
  defaultItem,
  defaultSkill,
  defaultState,
  defaultSystem,
  defaultTroop,
  defaultWeapon,
  defaultWords,
  mapDocument,
  newEvent,
  scriptsDocument,
  type Actor,
  type Database,
  type CommonEvent,
  type GameMap,
  type MapInfo,
  type Item,
  type Script,
  type System,
  type Tileset,
} from '../../src/rpg/index.js';

export function sampleActor(id: number, name: string): Actor {
  return {
    id,
    name,
    classId: 0,
    initialLevel: 1,
    finalLevel: 99,
    expBasis: 30,
    expInflation: 30,
    characterName: `hero-${id}`,
    characterHue: 0,
    battlerName: null,
    battlerHue: 0,
    parameters: new Grid(6, 2, 1, [500, 510, 50, 55, 40, 42, 30, 31, 20, 21, 10, 11]),
    weaponId: 0,
    armor1Id: null,
    armor2Id: 2,
    armor3Id: null,
    armor4Id: null,
    weaponFix: false,
    armor1Fix: false,
    armor2Fix: true,
    armor3Fix: false,
    armor4Fix: false,
  };
}

export function sampleTileset(): Tileset {
  return {
    id: 0,
    name: 'Grassland',
    tilesetName: 'grass-tiles',
    autotileNames: ['water', '', '', '', '', '', ''],
    panoramaName: null,
    panoramaHue: 0,
    fogName: null,
    fogHue: 0,
    fogOpacity: 64,
    fogBlendType: 0,
    fogZoom: 200,
    fogSx: 0,
    fogSy: 0,
    battlebackName: 'field',
    passages: new Grid(4, 1, 1, [0, 15, 0, 1]),
    priorities: new Grid(4, 1, 1, [5, 0, 1, 0]),
    terrainTags: new Grid(4),
  };
}

export function sampleCommonEvent(): CommonEvent {
  return {
    id: 0,
    name: 'Heal all',
    trigger: 0,
    switchId: 1,
    list: [
      { code: 314, indent: 0, parameters: [{ kind: 'integer', value: 0 }] },
      { code: 0, indent: 0, parameters: [] },
    ],
  };
}

export function sampleMap(): GameMap {
  const event = newEvent(1, 2, 3);
  event.pages[0].list = [
    { code: 101, indent: 0, parameters: [{ kind: 'string', value: 'Hello there.' }] },
    { code: 0, indent: 0, parameters: [] },
  ];
  return {
    tilesetId: 0,
    width: 3,
    height: 2,
    autoplayBgm: true,
    bgm: audioFile('town-theme', 80, 100),
    autoplayBgs: false,
    bgs: audioFile(),
    encounterList: [0, 3],
    encounterStep: 30,
    data: new Grid(3, 2, 3),
    events: new Map([[1, event]]),
  };
}

export function sampleMapInfos(): Map<number, MapInfo> {
  return new Map([[1, { name: 'Town', parentId: 0, order: 1, expanded: false, scrollX: 0, scrollY: 0 }]]);
}

export function sampleItem(): Item {
  return {
    ...defaultItem(),
    name: 'Potion',
    description: 'Restores 100 HP.',
    scope: Scope.OneAlly,
    occasion: Occasion.Always,
    price: 50,
    recoverHp: 100,
    elementSet: [2],
  };
}

export function sampleSystem(): System {
  return {
    ...defaultSystem(),
    magicNumber: 4242,
    partyMembers: [0, 1],
    elements: ['', 'Fire'],
    switches: ['Door open', ''],
    variables: ['Steps'],
    titleName: 'title-art',
    words: { ...defaultWords(), gold: 'G', hp: 'HP' },
    startMapId: 0,
    startX: 5,
    startY: 7,
  };
}

/** Every database document of the sample project. */
export function sampleDatabase(): Database {
  return {
    actors: [sampleActor(0, 'Aluxes'), sampleActor(1, 'Basil')],
    classes: [{ ...defaultClass(), name: 'Fighter', weaponSet: [0] }],
    skills: [{ ...defaultSkill(), name: 'Cross Cut' }],
    items: [sampleItem()],
    weapons: [{ ...defaultWeapon(), name: 'Bronze Sword', atk: 25 }],
    armors: [{ ...defaultArmor(), name: 'Bronze Shield' }],
    enemies: [{ ...defaultEnemy(), name: 'Ghost' }],
    troops: [{ ...defaultTroop(), name: 'Ghost*2' }],
    states: [{ ...defaultState(), name: 'Knockout', zeroHp: true }],
    animations: [{ ...defaultAnimation(), name: 'Hit' }],
    tilesets: [sampleTileset()],
    commonEvents: [sampleCommonEvent()],
    system: sampleSystem(),
    mapInfos: sampleMapInfos(),
  };
}

export function sampleScripts(): Script[] {
  return [
    { id: 1001, name: 'Main', source: 'begin\n  main\nend\n' },
    { id: 1002, name: 'Empty', source: '' },
  ];
}

function marshal<V>(transform: Transform<V>, typed: V, options?: SchemaOptions): Uint8Array {
  return encode(dematerialize(transform, typed, options));
}

function addDocument<K extends keyof Database>(files: Record<string, Uint8Array>, database: Database, key: K): void {
  const document = DATABASE_DOCUMENTS[key];
  files[`Data/${document.name}.rxdata`] = marshal(document.transform, database[key]);
}

/** Marshal documents of a whole sample project, keyed by path under `Data/`. */
export function sampleProjectFiles(scriptsName = DOCUMENT_NAMES.scripts): Record<string, Uint8Array> {
  const database = sampleDatabase();
  const files: Record<string, Uint8Array> = {
    [`Data/${scriptsName}.rxdata`]: marshal(scriptsDocument, sampleScripts()),
    'Data/Map001.rxdata': marshal(mapDocument, sampleMap()),
  };
  for (const key of DATABASE_KEYS) {
    addDocument(files, database, key);
  }
  return files;
}
