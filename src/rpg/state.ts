import {
  boolean,
  defineSchema,
  enumOf,
  field,
  idList,
  idShift,
  int,
  optionalIdShift,
  text,
} from '../schema/index.js';

export enum Restriction {
  None = 0,
  NoMagic = 1,
  AttackEnemies = 2,
  AttackAllies = 3,
  NoMove = 4,
}

/** A battle status effect. Rates are percentages of the base value. */
export interface State {
  id: number;
  name: string;
  animationId: number | null;
  restriction: Restriction;
  nonresistance: boolean;
  zeroHp: boolean;
  cantGetExp: boolean;
  cantEvade: boolean;
  slipDamage: boolean;
  rating: number;
  hitRate: number;
  maxhpRate: number;
  maxspRate: number;
  strRate: number;
  dexRate: number;
  agiRate: number;
  intRate: number;
  atkRate: number;
  pdefRate: number;
  mdefRate: number;
  eva: number;
  battleOnly: boolean;
  holdTurn: number;
  autoReleaseProb: number;
  shockReleaseProb: number;
  guardElementSet: number[];
  plusStateSet: number[];
  minusStateSet: number[];
}

export const stateSchema = defineSchema<State>('RPG::State', {
  id: field(idShift),
  name: field(text),
  animationId: field(optionalIdShift),
  restriction: field(enumOf<Restriction>(Restriction)),
  nonresistance: field(boolean),
  zeroHp: field(boolean),
  cantGetExp: field(boolean),
  cantEvade: field(boolean),
  slipDamage: field(boolean),
  rating: field(int),
  hitRate: field(int),
  maxhpRate: field(int),
  maxspRate: field(int),
  strRate: field(int),
  dexRate: field(int),
  agiRate: field(int),
  intRate: field(int),
  atkRate: field(int),
  pdefRate: field(int),
  mdefRate: field(int),
  eva: field(int),
  battleOnly: field(boolean),
  holdTurn: field(int),
  autoReleaseProb: field(int),
  shockReleaseProb: field(int),
  guardElementSet: field(idList),
  plusStateSet: field(idList),
  minusStateSet: field(idList),
});

export function defaultState(id = 0): State {
  return {
    id,
    name: '',
    animationId: null,
    restriction: Restriction.None,
    nonresistance: false,
    zeroHp: false,
    cantGetExp: false,
    cantEvade: false,
    slipDamage: false,
    rating: 5,
    hitRate: 100,
    maxhpRate: 100,
    maxspRate: 100,
    strRate: 100,
    dexRate: 100,
    agiRate: 100,
    intRate: 100,
    atkRate: 100,
    pdefRate: 100,
    mdefRate: 100,
    eva: 0,
    battleOnly: true,
    holdTurn: 0,
    autoReleaseProb: 0,
    shockReleaseProb: 0,
    guardElementSet: [],
    plusStateSet: [],
    minusStateSet: [],
  };
}
