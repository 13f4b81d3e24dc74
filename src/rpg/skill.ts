import {
  defineSchema,
  field,
  idList,
  idShift,
  int,
  optionalIdShift,
  optionalText,
  text,
} from '../schema/index.js';
import { audioFile, audioFileSchema, type AudioFile } from './audio-file.js';
import { Occasion, Scope, occasion, scope } from './item.js';

export interface Skill {
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
  spCost: number;
  power: number;
  atkF: number;
  evaF: number;
  strF: number;
  dexF: number;
  agiF: number;
  intF: number;
  hit: number;
  pdefF: number;
  mdefF: number;
  variance: number;
  elementSet: number[];
  plusStateSet: number[];
  minusStateSet: number[];
}

export const skillSchema = defineSchema<Skill>('RPG::Skill', {
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
  spCost: field(int),
  power: field(int),
  atkF: field(int),
  evaF: field(int),
  strF: field(int),
  dexF: field(int),
  agiF: field(int),
  intF: field(int),
  hit: field(int),
  pdefF: field(int),
  mdefF: field(int),
  variance: field(int),
  elementSet: field(idList),
  plusStateSet: field(idList),
  minusStateSet: field(idList),
});

export function defaultSkill(id = 0): Skill {
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
    spCost: 0,
    power: 0,
    atkF: 0,
    evaF: 0,
    strF: 0,
    dexF: 0,
    agiF: 0,
    intF: 0,
    hit: 100,
    pdefF: 0,
    mdefF: 0,
    variance: 0,
    elementSet: [],
    plusStateSet: [],
    minusStateSet: [],
  };
}
