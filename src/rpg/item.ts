import {
  boolean,
  defineSchema,
  enumOf,
  field,
  idList,
  idShift,
  int,
  optionalIdShift,
  optionalText,
  text,
} from '../schema/index.js';
import { audioFile, audioFileSchema, type AudioFile } from './audio-file.js';

/** Who an item or skill can target. */
export enum Scope {
  None = 0,
  OneEnemy = 1,
  AllEnemies = 2,
  OneAlly = 3,
  AllAllies = 4,
  OneAllyHp0 = 5,
  AllAlliesHp0 = 6,
  User = 7,
}

/** Where an item or skill can be used. */
export enum Occasion {
  Always = 0,
  OnlyBattle = 1,
  OnlyMenu = 2,
  Never = 3,
}

/** Stat raised permanently by an item. */
export enum ParameterType {
  None = 0,
  MaxHp = 1,
  MaxSp = 2,
  Str = 3,
  Dex = 4,
  Agi = 5,
  Int = 6,
}

export interface Item {
  id: number;
  name: string;
  iconName: string | null;
  description: string;
  scope: Scope;
  occasion: Occasion;
  animation1Id: number | null;
  animation2Id: number | null;
  menuSe: AudioFile;
  commonEventId: number | null;
  price: number;
  consumable: boolean;
  parameterType: ParameterType;
  parameterPoints: number;
  recoverHpRate: number;
  recoverHp: number;
  recoverSpRate: number;
  recoverSp: number;
  hit: number;
  pdefF: number;
  mdefF: number;
  variance: number;
  elementSet: number[];
  plusStateSet: number[];
  minusStateSet: number[];
}

export const scope = enumOf<Scope>(Scope);
export const occasion = enumOf<Occasion>(Occasion);

export const itemSchema = defineSchema<Item>('RPG::Item', {
  id: field(idShift),
  name: field(text),
  iconName: field(optionalText),
  description: field(text),
  scope: field(scope),
  occasion: field(occasion),
  animation1Id: field(optionalIdShift),
  animation2Id: field(optionalIdShift),
  menuSe: field(audioFileSchema),
  commonEventId: field(optionalIdShift),
  price: field(int),
  consumable: field(boolean),
  parameterType: field(enumOf<ParameterType>(ParameterType)),
  parameterPoints: field(int),
  recoverHpRate: field(int),
  recoverHp: field(int),
  // Older editors leave these two out.
  recoverSpRate: field(int, { default: () => 0 }),
  recoverSp: field(int, { default: () => 0 }),
  hit: field(int),
  pdefF: field(int),
  mdefF: field(int),
  variance: field(int),
  elementSet: field(idList),
  plusStateSet: field(idList),
  minusStateSet: field(idList),
});

export function defaultItem(id = 0): Item {
  return {
    id,
    name: '',
    iconName: null,
    description: '',
    scope: Scope.None,
    occasion: Occasion.Always,
    animation1Id: null,
    animation2Id: null,
    menuSe: audioFile(),
    commonEventId: null,
    price: 0,
    consumable: true,
    parameterType: ParameterType.None,
    parameterPoints: 0,
    recoverHpRate: 0,
    recoverHp: 0,
    recoverSpRate: 0,
    recoverSp: 0,
    hit: 100,
    pdefF: 0,
    mdefF: 0,
    variance: 0,
    elementSet: [],
    plusStateSet: [],
    minusStateSet: [],
  };
}
