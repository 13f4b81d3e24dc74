/**
 * `RPG::System`: project-wide settings, term names and the test battle.
 *
 * Editors have added fields over time, so every field of the system record
 * and of its word list falls back to its default when absent.
 */

import {
  defineSchema,
  field,
  idList,
  idShift,
  int,
  list,
  nilPadded,
  optionalIdShift,
  optionalText,
  text,
  type Field,
  type Transform,
} from '../schema/index.js';
import { audioFile, audioFileSchema, type AudioFile } from './audio-file.js';

/** Names the game shows for stats, equipment slots and commands. */
export interface Words {
  gold: string;
  hp: string;
  sp: string;
  str: string;
  dex: string;
  agi: string;
  int: string;
  atk: string;
  pdef: string;
  mdef: string;
  weapon: string;
  armor1: string;
  armor2: string;
  armor3: string;
  armor4: string;
  attack: string;
  skill: string;
  guard: string;
  item: string;
  equip: string;
}

export interface TestBattler {
  level: number;
  actorId: number;
  weaponId: number | null;
  armor1Id: number | null;
  armor2Id: number | null;
  armor3Id: number | null;
  armor4Id: number | null;
}

export interface System {
  /** Changes on every save so a running game notices new data. */
  magicNumber: number;
  partyMembers: number[];
  elements: string[];
  switches: string[];
  variables: string[];
  windowskinName: string | null;
  titleName: string | null;
  gameoverName: string | null;
  battleTransition: string | null;
  titleBgm: AudioFile;
  battleBgm: AudioFile;
  battleEndMe: AudioFile;
  gameoverMe: AudioFile;
  cursorSe: AudioFile;
  decisionSe: AudioFile;
  cancelSe: AudioFile;
  buzzerSe: AudioFile;
  equipSe: AudioFile;
  shopSe: AudioFile;
  saveSe: AudioFile;
  loadSe: AudioFile;
  battleStartSe: AudioFile;
  escapeSe: AudioFile;
  actorCollapseSe: AudioFile;
  enemyCollapseSe: AudioFile;
  words: Words;
  testBattlers: TestBattler[];
  testTroopId: number | null;
  startMapId: number;
  startX: number;
  startY: number;
  battlebackName: string | null;
  battlerName: string | null;
  battlerHue: number;
  /** Map open in the editor, as a raw map id. */
  editMapId: number;
}

const word: Field<string> = field(text, { default: () => '' });

export const wordsSchema = defineSchema<Words>('RPG::System::Words', {
  gold: word,
  hp: word,
  sp: word,
  str: word,
  dex: word,
  agi: word,
  int: word,
  atk: word,
  pdef: word,
  mdef: word,
  weapon: word,
  armor1: word,
  armor2: word,
  armor3: word,
  armor4: word,
  attack: word,
  skill: word,
  guard: word,
  item: word,
  equip: word,
});

export const testBattlerSchema = defineSchema<TestBattler>('RPG::System::TestBattler', {
  level: field(int),
  actorId: field(idShift),
  weaponId: field(optionalIdShift),
  armor1Id: field(optionalIdShift),
  armor2Id: field(optionalIdShift),
  armor3Id: field(optionalIdShift),
  armor4Id: field(optionalIdShift),
});

function orDefault<K extends keyof System>(key: K, transform: Transform<System[K]>): Field<System[K]> {
  return field(transform, { default: () => defaultSystem()[key] });
}

export const systemSchema = defineSchema<System>('RPG::System', {
  magicNumber: orDefault('magicNumber', int),
  partyMembers: orDefault('partyMembers', idList),
  elements: orDefault('elements', list(text)),
  switches: orDefault('switches', nilPadded(text)),
  variables: orDefault('variables', nilPadded(text)),
  windowskinName: orDefault('windowskinName', optionalText),
  titleName: orDefault('titleName', optionalText),
  gameoverName: orDefault('gameoverName', optionalText),
  battleTransition: orDefault('battleTransition', optionalText),
  titleBgm: orDefault('titleBgm', audioFileSchema),
  battleBgm: orDefault('battleBgm', audioFileSchema),
  battleEndMe: orDefault('battleEndMe', audioFileSchema),
  gameoverMe: orDefault('gameoverMe', audioFileSchema),
  cursorSe: orDefault('cursorSe', audioFileSchema),
  decisionSe: orDefault('decisionSe', audioFileSchema),
  cancelSe: orDefault('cancelSe', audioFileSchema),
  buzzerSe: orDefault('buzzerSe', audioFileSchema),
  equipSe: orDefault('equipSe', audioFileSchema),
  shopSe: orDefault('shopSe', audioFileSchema),
  saveSe: orDefault('saveSe', audioFileSchema),
  loadSe: orDefault('loadSe', audioFileSchema),
  battleStartSe: orDefault('battleStartSe', audioFileSchema),
  escapeSe: orDefault('escapeSe', audioFileSchema),
  actorCollapseSe: orDefault('actorCollapseSe', audioFileSchema),
  enemyCollapseSe: orDefault('enemyCollapseSe', audioFileSchema),
  words: orDefault('words', wordsSchema),
  testBattlers: orDefault('testBattlers', list(testBattlerSchema)),
  testTroopId: orDefault('testTroopId', optionalIdShift),
  startMapId: orDefault('startMapId', idShift),
  startX: orDefault('startX', int),
  startY: orDefault('startY', int),
  battlebackName: orDefault('battlebackName', optionalText),
  battlerName: orDefault('battlerName', optionalText),
  battlerHue: orDefault('battlerHue', int),
  editMapId: orDefault('editMapId', int),
});

export function defaultWords(): Words {
  return {
    gold: '',
    hp: '',
    sp: '',
    str: '',
    dex: '',
    agi: '',
    int: '',
    atk: '',
    pdef: '',
    mdef: '',
    weapon: '',
    armor1: '',
    armor2: '',
    armor3: '',
    armor4: '',
    attack: '',
    skill: '',
    guard: '',
    item: '',
    equip: '',
  };
}

export function defaultSystem(): System {
  return {
    magicNumber: 0,
    partyMembers: [],
    elements: [],
    switches: [],
    variables: [],
    windowskinName: null,
    titleName: null,
    gameoverName: null,
    battleTransition: null,
    titleBgm: audioFile(),
    battleBgm: audioFile(),
    battleEndMe: audioFile(),
    gameoverMe: audioFile(),
    cursorSe: audioFile(),
    decisionSe: audioFile(),
    cancelSe: audioFile(),
    buzzerSe: audioFile(),
    equipSe: audioFile(),
    shopSe: audioFile(),
    saveSe: audioFile(),
    loadSe: audioFile(),
    battleStartSe: audioFile(),
    escapeSe: audioFile(),
    actorCollapseSe: audioFile(),
    enemyCollapseSe: audioFile(),
    words: defaultWords(),
    testBattlers: [],
    testTroopId: null,
    startMapId: 0,
    startX: 0,
    startY: 0,
    battlebackName: null,
    battlerName: null,
    battlerHue: 0,
    editMapId: 1,
  };
}
