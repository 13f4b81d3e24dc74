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

export interface Weapon {
  id: number;
  name: string;
  iconName: string | null;
  description: string;
  animation1Id: number | null;
  animation2Id: number | null;
  price: number;
  atk: number;
  pdef: number;
  mdef: number;
  strPlus: number;
  dexPlus: number;
  agiPlus: number;
  intPlus: number;
  elementSet: number[];
  plusStateSet: number[];
  minusStateSet: number[];
}

export const weaponSchema = defineSchema<Weapon>('RPG::Weapon', {
  id: field(idShift),
  name: field(text),
  iconName: field(optionalText),
  description: field(text),
  animation1Id: field(optionalIdShift),
  animation2Id: field(optionalIdShift),
  price: field(int),
  atk: field(int),
  pdef: field(int),
  mdef: field(int),
  strPlus: field(int),
  dexPlus: field(int),
  agiPlus: field(int),
  intPlus: field(int),
  elementSet: field(idList),
  plusStateSet: field(idList),
  minusStateSet: field(idList),
});

export function defaultWeapon(id = 0): Weapon {
  return {
    id,
    name: '',
    iconName: null,
    description: '',
    animation1Id: null,
    animation2Id: null,
    price: 0,
    atk: 0,
    pdef: 0,
    mdef: 0,
    strPlus: 0,
    dexPlus: 0,
    agiPlus: 0,
    intPlus: 0,
    elementSet: [],
    plusStateSet: [],
    minusStateSet: [],
  };
}
