import {
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

export enum ArmorKind {
  Shield = 0,
  Helmet = 1,
  BodyArmor = 2,
  Accessory = 3,
}

export interface Armor {
  id: number;
  name: string;
  iconName: string | null;
  description: string;
  kind: ArmorKind;
  /** State applied while the armor is worn. */
  autoStateId: number | null;
  price: number;
  pdef: number;
  mdef: number;
  eva: number;
  strPlus: number;
  dexPlus: number;
  agiPlus: number;
  intPlus: number;
  guardElementSet: number[];
  guardStateSet: number[];
}

export const armorSchema = defineSchema<Armor>('RPG::Armor', {
  id: field(idShift),
  name: field(text),
  iconName: field(optionalText),
  description: field(text),
  kind: field(enumOf<ArmorKind>(ArmorKind)),
  autoStateId: field(optionalIdShift),
  price: field(int),
  pdef: field(int),
  mdef: field(int),
  eva: field(int),
  strPlus: field(int),
  dexPlus: field(int),
  agiPlus: field(int),
  intPlus: field(int),
  guardElementSet: field(idList),
  guardStateSet: field(idList),
});

export function defaultArmor(id = 0): Armor {
  return {
    id,
    name: '',
    iconName: null,
    description: '',
    kind: ArmorKind.Shield,
    autoStateId: null,
    price: 0,
    pdef: 0,
    mdef: 0,
    eva: 0,
    strPlus: 0,
    dexPlus: 0,
    agiPlus: 0,
    intPlus: 0,
    guardElementSet: [],
    guardStateSet: [],
  };
}
