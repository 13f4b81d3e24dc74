import {
  Grid,
  defineSchema,
  enumOf,
  field,
  grid,
  idList,
  idShift,
  int,
  list,
  text,
} from '../schema/index.js';

/** Battle row of a class. */
export enum ClassPosition {
  Front = 0,
  Middle = 1,
  Rear = 2,
}

export interface Learning {
  level: number;
  skillId: number;
}

export interface Class {
  id: number;
  name: string;
  position: ClassPosition;
  weaponSet: number[];
  armorSet: number[];
  /** Effectiveness rank per element id. */
  elementRanks: Grid;
  /** Effectiveness rank per state id. */
  stateRanks: Grid;
  learnings: Learning[];
}

export const learningSchema = defineSchema<Learning>('RPG::Class::Learning', {
  level: field(int),
  skillId: field(idShift),
});

export const classSchema = defineSchema<Class>('RPG::Class', {
  id: field(idShift),
  name: field(text),
  position: field(enumOf<ClassPosition>(ClassPosition)),
  weaponSet: field(idList),
  armorSet: field(idList),
  elementRanks: field(grid(1)),
  stateRanks: field(grid(1)),
  learnings: field(list(learningSchema)),
});

export function defaultClass(id = 0): Class {
  return {
    id,
    name: '',
    position: ClassPosition.Front,
    weaponSet: [],
    armorSet: [],
    elementRanks: new Grid(0),
    stateRanks: new Grid(0),
    learnings: [],
  };
}
