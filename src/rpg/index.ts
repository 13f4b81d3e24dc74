/**
 * RPG Maker XP records and documents.
 */

export { actorSchema, defaultActor, type Actor } from './actor.js';
export {
  AnimationPosition,
  animationFrameSchema,
  animationSchema,
  animationTimingSchema,
  defaultAnimation,
  type Animation,
  type AnimationFrame,
  type AnimationTiming,
} from './animation.js';
export { ArmorKind, armorSchema, defaultArmor, type Armor } from './armor.js';
export { audioFile, audioFileSchema, type AudioFile } from './audio-file.js';
export { colorCodec, toneCodec, type Color, type Tone } from './color.js';
export {
  eventCommandSchema,
  moveCommandSchema,
  moveRouteSchema,
  parameter,
  parameterRegistry,
  type EventCommand,
  type MoveCommand,
  type MoveRoute,
  type Parameter,
} from './commands.js';
export { ClassPosition, classSchema, defaultClass, learningSchema, type Class, type Learning } from './class.js';
export {
  DATABASE_DOCUMENTS,
  DATABASE_KEYS,
  DOCUMENT_KINDS,
  DOCUMENT_NAMES,
  actorsDocument,
  animationsDocument,
  armorsDocument,
  classesDocument,
  commonEventsDocument,
  countRecords,
  defaultDatabase,
  enemiesDocument,
  isDocumentKind,
  itemsDocument,
  mapDocument,
  mapInfosDocument,
  scriptsDocument,
  skillsDocument,
  statesDocument,
  systemDocument,
  tilesetsDocument,
  troopsDocument,
  weaponsDocument,
  type Database,
  type DatabaseDocument,
  type DocumentKind,
} from './documents.js';
export {
  BasicAction,
  EnemyActionKind,
  defaultEnemy,
  defaultEnemyAction,
  enemyActionSchema,
  enemySchema,
  type Enemy,
  type EnemyAction,
} from './enemy.js';
export {
  commonEventSchema,
  defaultCommonEvent,
  defaultEventPage,
  eventConditionSchema,
  eventPageSchema,
  eventSchema,
  graphicSchema,
  newEvent,
  type CommonEvent,
  type Event,
  type EventCondition,
  type EventPage,
  type Graphic,
} from './event.js';
export {
  Occasion,
  ParameterType,
  Scope,
  defaultItem,
  itemSchema,
  occasion,
  scope,
  type Item,
} from './item.js';
export {
  defaultMap,
  defaultMapInfo,
  mapDocumentName,
  mapInfoSchema,
  mapSchema,
  type GameMap,
  type MapInfo,
} from './map.js';
export { scriptTransform, type Script } from './script.js';
export { defaultSkill, skillSchema, type Skill } from './skill.js';
export { Restriction, defaultState, stateSchema, type State } from './state.js';
export {
  defaultSystem,
  defaultWords,
  systemSchema,
  testBattlerSchema,
  wordsSchema,
  type System,
  type TestBattler,
  type Words,
} from './system.js';
export { defaultTileset, tilesetSchema, type Tileset } from './tileset.js';
export {
  defaultTroop,
  defaultTroopPage,
  troopConditionSchema,
  troopMemberSchema,
  troopPageSchema,
  troopSchema,
  type Troop,
  type TroopCondition,
  type TroopMember,
  type TroopPage,
} from './troop.js';
export { defaultWeapon, weaponSchema, type Weapon } from './weapon.js';
