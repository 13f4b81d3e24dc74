import {
  Grid,
  defineSchema,
  enumOf,
  field,
  grid,
  idShift,
  int,
  list,
  optionalIdShift,
  optionalText,
  text,
} from '../schema/index.js';

export enum EnemyActionKind {
  Basic = 0,
  Skill = 1,
}

export enum BasicAction {
  Attack = 0,
  Defend = 1,
  Escape = 2,
  DoNothing = 3,
}

/** One entry of an enemy's battle pattern. */
export interface EnemyAction {
  kind: EnemyActionKind;
  basic: BasicAction;
  skillId: number;
  conditionTurnA: number;
  conditionTurnB: number;
  conditionHp: number;
  conditionLevel: number;
  conditionSwitchId: number | null;
  rating: number;
}

export interface Enemy {
  id: number;
  name: string;
  battlerName: string | null;
  battlerHue: number;
  maxhp: number;
  maxsp: number;
  str: number;
  dex: number;
  agi: number;
  int: number;
  atk: number;
  pdef: number;
  mdef: number;
  eva: number;
  animation1Id: number | null;
  animation2Id: number | null;
  elementRanks: Grid;
  stateRanks: Grid;
  actions: EnemyAction[];
  exp: number;
  gold: number;
  itemId: number | null;
  weaponId: number | null;
  armorId: number | null;
  treasureProb: number;
}

export const enemyActionSchema = defineSchema<EnemyAction>('RPG::Enemy::Action', {
  kind: field(enumOf<EnemyActionKind>(EnemyActionKind)),
  basic: field(enumOf<BasicAction>(BasicAction)),
  skillId: field(idShift),
  conditionTurnA: field(int),
  conditionTurnB: field(int),
  conditionHp: field(int),
  conditionLevel: field(int),
  conditionSwitchId: field(optionalIdShift),
  rating: field(int),
});

export const enemySchema = defineSchema<Enemy>('RPG::Enemy', {
  id: field(idShift),
  name: field(text),
  battlerName: field(optionalText),
  battlerHue: field(int),
  maxhp: field(int),
  maxsp: field(int),
  str: field(int),
  dex: field(int),
  agi: field(int),
  int: field(int),
  atk: field(int),
  pdef: field(int),
  mdef: field(int),
  eva: field(int),
  animation1Id: field(optionalIdShift),
  animation2Id: field(optionalIdShift),
  elementRanks: field(grid(1)),
  stateRanks: field(grid(1)),
  actions: field(list(enemyActionSchema)),
  exp: field(int),
  gold: field(int),
  itemId: field(optionalIdShift),
  weaponId: field(optionalIdShift),
  armorId: field(optionalIdShift),
  treasureProb: field(int),
});

export function defaultEnemyAction(): EnemyAction {
  return {
    kind: EnemyActionKind.Basic,
    basic: BasicAction.Attack,
    skillId: 0,
    conditionTurnA: 0,
    conditionTurnB: 1,
    conditionHp: 100,
    conditionLevel: 1,
    conditionSwitchId: null,
    rating: 5,
  };
}

export function defaultEnemy(id = 0): Enemy {
  return {
    id,
    name: '',
    battlerName: null,
    battlerHue: 0,
    maxhp: 500,
    maxsp: 500,
    str: 50,
    dex: 50,
    agi: 50,
    int: 50,
    atk: 100,
    pdef: 100,
    mdef: 100,
    eva: 0,
    animation1Id: null,
    animation2Id: null,
    elementRanks: new Grid(0),
    stateRanks: new Grid(0),
    actions: [defaultEnemyAction()],
    exp: 0,
    gold: 0,
    itemId: null,
    weaponId: null,
    armorId: null,
    treasureProb: 100,
  };
}
