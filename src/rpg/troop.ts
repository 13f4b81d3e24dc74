import {
  boolean,
  defineSchema,
  field,
  idShift,
  int,
  list,
  optionalIdShift,
  text,
} from '../schema/index.js';
import { eventCommandSchema, type EventCommand } from './commands.js';

export interface TroopMember {
  enemyId: number;
  x: number;
  y: number;
  hidden: boolean;
  immortal: boolean;
}

/** When a battle event page runs. */
export interface TroopCondition {
  turnValid: boolean;
  enemyValid: boolean;
  actorValid: boolean;
  switchValid: boolean;
  turnA: number;
  turnB: number;
  /** Index into the troop's members. */
  enemyIndex: number;
  enemyHp: number;
  actorId: number | null;
  actorHp: number;
  switchId: number | null;
}

export interface TroopPage {
  condition: TroopCondition;
  span: number;
  list: EventCommand[];
}

export interface Troop {
  id: number;
  name: string;
  members: TroopMember[];
  pages: TroopPage[];
}

export const troopMemberSchema = defineSchema<TroopMember>('RPG::Troop::Member', {
  enemyId: field(idShift),
  x: field(int),
  y: field(int),
  hidden: field(boolean),
  immortal: field(boolean),
});

export const troopConditionSchema = defineSchema<TroopCondition>('RPG::Troop::Page::Condition', {
  turnValid: field(boolean),
  enemyValid: field(boolean),
  actorValid: field(boolean),
  switchValid: field(boolean),
  turnA: field(int),
  turnB: field(int),
  enemyIndex: field(int),
  enemyHp: field(int),
  actorId: field(optionalIdShift),
  actorHp: field(int),
  switchId: field(optionalIdShift),
});

export const troopPageSchema = defineSchema<TroopPage>('RPG::Troop::Page', {
  condition: field(troopConditionSchema),
  span: field(int),
  list: field(list(eventCommandSchema)),
});

export const troopSchema = defineSchema<Troop>('RPG::Troop', {
  id: field(idShift),
  name: field(text),
  members: field(list(troopMemberSchema)),
  pages: field(list(troopPageSchema)),
});

export function defaultTroopPage(): TroopPage {
  return {
    condition: {
      turnValid: false,
      enemyValid: false,
      actorValid: false,
      switchValid: false,
      turnA: 0,
      turnB: 0,
      enemyIndex: 0,
      enemyHp: 50,
      actorId: null,
      actorHp: 50,
      switchId: null,
    },
    span: 0,
    list: [{ code: 0, indent: 0, parameters: [] }],
  };
}

export function defaultTroop(id = 0): Troop {
  return { id, name: '', members: [], pages: [defaultTroopPage()] };
}
