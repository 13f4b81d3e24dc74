/**
 * Top-level documents of a project's data directory and the transforms
 * that materialize them.
 */

import type { MarshalValue } from '../core/types.js';
import {
  hashOf,
  int,
  list,
  materialize,
  nilPadded,
  type SchemaOptions,
  type Transform,
} from '../schema/index.js';
import { actorSchema, defaultActor, type Actor } from './actor.js';
import { animationSchema, defaultAnimation, type Animation } from './animation.js';
import { armorSchema, defaultArmor, type Armor } from './armor.js';
import { classSchema, defaultClass, type Class } from './class.js';
import { defaultEnemy, enemySchema, type Enemy } from './enemy.js';
import { commonEventSchema, defaultCommonEvent, type CommonEvent } from './event.js';
import { defaultItem, itemSchema, type Item } from './item.js';
import { defaultMapInfo, mapInfoSchema, mapSchema, type GameMap, type MapInfo } from './map.js';
import { scriptTransform, type Script } from './script.js';
import { defaultSkill, skillSchema, type Skill } from './skill.js';
import { defaultState, stateSchema, type State } from './state.js';
import { defaultSystem, systemSchema, type System } from './system.js';
import { defaultTileset, tilesetSchema, type Tileset } from './tileset.js';
import { defaultTroop, troopSchema, type Troop } from './troop.js';
import { defaultWeapon, weaponSchema, type Weapon } from './weapon.js';

export const actorsDocument: Transform<Actor[]> = nilPadded(actorSchema);
export const classesDocument: Transform<Class[]> = nilPadded(classSchema);
export const skillsDocument: Transform<Skill[]> = nilPadded(skillSchema);
export const itemsDocument: Transform<Item[]> = nilPadded(itemSchema);
export const weaponsDocument: Transform<Weapon[]> = nilPadded(weaponSchema);
export const armorsDocument: Transform<Armor[]> = nilPadded(armorSchema);
export const enemiesDocument: Transform<Enemy[]> = nilPadded(enemySchema);
export const troopsDocument: Transform<Troop[]> = nilPadded(troopSchema);
export const statesDocument: Transform<State[]> = nilPadded(stateSchema);
export const animationsDocument: Transform<Animation[]> = nilPadded(animationSchema);
export const tilesetsDocument: Transform<Tileset[]> = nilPadded(tilesetSchema);
export const commonEventsDocument: Transform<CommonEvent[]> = nilPadded(commonEventSchema);
export const systemDocument: Transform<System> = systemSchema;
export const mapInfosDocument: Transform<Map<number, MapInfo>> = hashOf(int, mapInfoSchema);
export const scriptsDocument: Transform<Script[]> = list(scriptTransform);
export const mapDocument: Transform<GameMap> = mapSchema;

/** The database documents every project has, besides scripts and maps. */
export interface Database {
  actors: Actor[];
  classes: Class[];
  skills: Skill[];
  items: Item[];
  weapons: Weapon[];
  armors: Armor[];
  enemies: Enemy[];
  troops: Troop[];
  states: State[];
  animations: Animation[];
  tilesets: Tileset[];
  commonEvents: CommonEvent[];
  system: System;
  mapInfos: Map<number, MapInfo>;
}

export interface DatabaseDocument<V> {
  readonly name: string;
  readonly transform: Transform<V>;
}

export const DATABASE_DOCUMENTS: { readonly [K in keyof Database]: DatabaseDocument<Database[K]> } = {
  actors: { name: 'Actors', transform: actorsDocument },
  classes: { name: 'Classes', transform: classesDocument },
  skills: { name: 'Skills', transform: skillsDocument },
  items: { name: 'Items', transform: itemsDocument },
  weapons: { name: 'Weapons', transform: weaponsDocument },
  armors: { name: 'Armors', transform: armorsDocument },
  enemies: { name: 'Enemies', transform: enemiesDocument },
  troops: { name: 'Troops', transform: troopsDocument },
  states: { name: 'States', transform: statesDocument },
  animations: { name: 'Animations', transform: animationsDocument },
  tilesets: { name: 'Tilesets', transform: tilesetsDocument },
  commonEvents: { name: 'CommonEvents', transform: commonEventsDocument },
  system: { name: 'System', transform: systemDocument },
  mapInfos: { name: 'MapInfos', transform: mapInfosDocument },
};

export const DATABASE_KEYS: readonly (keyof Database)[] = [
  'actors',
  'classes',
  'skills',
  'items',
  'weapons',
  'armors',
  'enemies',
  'troops',
  'states',
  'animations',
  'tilesets',
  'commonEvents',
  'system',
  'mapInfos',
];

/**
 * The database of a new project: one default record per list, and the
 * info of map 1.
 */
export function defaultDatabase(): Database {
  return {
    actors: [defaultActor()],
    classes: [defaultClass()],
    skills: [defaultSkill()],
    items: [defaultItem()],
    weapons: [defaultWeapon()],
    armors: [defaultArmor()],
    enemies: [defaultEnemy()],
    troops: [defaultTroop()],
    states: [defaultState()],
    animations: [defaultAnimation()],
    tilesets: [defaultTileset()],
    commonEvents: [defaultCommonEvent()],
    system: defaultSystem(),
    mapInfos: new Map([[1, defaultMapInfo('MAP001')]]),
  };
}

export type DocumentKind =
  | 'actors'
  | 'classes'
  | 'skills'
  | 'items'
  | 'weapons'
  | 'armors'
  | 'enemies'
  | 'troops'
  | 'states'
  | 'animations'
  | 'tilesets'
  | 'common-events'
  | 'system'
  | 'map-infos'
  | 'scripts'
  | 'map';

export const DOCUMENT_KINDS: readonly DocumentKind[] = [
  'actors',
  'classes',
  'skills',
  'items',
  'weapons',
  'armors',
  'enemies',
  'troops',
  'states',
  'animations',
  'tilesets',
  'common-events',
  'system',
  'map-infos',
  'scripts',
  'map',
];

/** Default document name for each kind; maps are named per id. */
export const DOCUMENT_NAMES: Record<Exclude<DocumentKind, 'map'>, string> = {
  actors: DATABASE_DOCUMENTS.actors.name,
  classes: DATABASE_DOCUMENTS.classes.name,
  skills: DATABASE_DOCUMENTS.skills.name,
  items: DATABASE_DOCUMENTS.items.name,
  weapons: DATABASE_DOCUMENTS.weapons.name,
  armors: DATABASE_DOCUMENTS.armors.name,
  enemies: DATABASE_DOCUMENTS.enemies.name,
  troops: DATABASE_DOCUMENTS.troops.name,
  states: DATABASE_DOCUMENTS.states.name,
  animations: DATABASE_DOCUMENTS.animations.name,
  tilesets: DATABASE_DOCUMENTS.tilesets.name,
  'common-events': DATABASE_DOCUMENTS.commonEvents.name,
  system: DATABASE_DOCUMENTS.system.name,
  'map-infos': DATABASE_DOCUMENTS.mapInfos.name,
  scripts: 'Scripts',
};

export function isDocumentKind(value: string): value is DocumentKind {
  return DOCUMENT_KINDS.some((kind) => kind === value);
}

/**
 * Materialize a document of the given kind and count its records. The
 * system document is one record; a map counts its events.
 */
export function countRecords(kind: DocumentKind, wire: MarshalValue, options: SchemaOptions = {}): number {
  switch (kind) {
    case 'actors':
      return materialize(actorsDocument, wire, options).length;
    case 'classes':
      return materialize(classesDocument, wire, options).length;
    case 'skills':
      return materialize(skillsDocument, wire, options).length;
    case 'items':
      return materialize(itemsDocument, wire, options).length;
    case 'weapons':
      return materialize(weaponsDocument, wire, options).length;
    case 'armors':
      return materialize(armorsDocument, wire, options).length;
    case 'enemies':
      return materialize(enemiesDocument, wire, options).length;
    case 'troops':
      return materialize(troopsDocument, wire, options).length;
    case 'states':
      return materialize(statesDocument, wire, options).length;
    case 'animations':
      return materialize(animationsDocument, wire, options).length;
    case 'tilesets':
      return materialize(tilesetsDocument, wire, options).length;
    case 'common-events':
      return materialize(commonEventsDocument, wire, options).length;
    case 'system':
      materialize(systemDocument, wire, options);
      return 1;
    case 'map-infos':
      return materialize(mapInfosDocument, wire, options).size;
    case 'scripts':
      return materialize(scriptsDocument, wire, options).length;
    case 'map':
      return materialize(mapDocument, wire, options).events.size;
  }
}
