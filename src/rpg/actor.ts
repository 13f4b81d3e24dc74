import {
  Grid,
  boolean,
  defineSchema,
  field,
  grid,
  idShift,
  int,
  optionalIdShift,
  optionalText,
  text,
} from '../schema/index.js';

export interface Actor {
  id: number;
  name: string;
  classId: number;
  initialLevel: number;
  finalLevel: number;
  expBasis: number;
  expInflation: number;
  characterName: string | null;
  characterHue: number;
  battlerName: string | null;
  battlerHue: number;
  /** Stat curves: x is the stat, y the level. */
  parameters: Grid;
  weaponId: number | null;
  armor1Id: number | null;
  armor2Id: number | null;
  armor3Id: number | null;
  armor4Id: number | null;
  weaponFix: boolean;
  armor1Fix: boolean;
  armor2Fix: boolean;
  armor3Fix: boolean;
  armor4Fix: boolean;
}

export const actorSchema = defineSchema<Actor>('RPG::Actor', {
  id: field(idShift),
  name: field(text),
  classId: field(idShift),
  initialLevel: field(int),
  finalLevel: field(int),
  expBasis: field(int),
  expInflation: field(int),
  characterName: field(optionalText),
  characterHue: field(int),
  battlerName: field(optionalText),
  battlerHue: field(int),
  parameters: field(grid(2)),
  weaponId: field(optionalIdShift),
  armor1Id: field(optionalIdShift),
  armor2Id: field(optionalIdShift),
  armor3Id: field(optionalIdShift),
  armor4Id: field(optionalIdShift),
  weaponFix: field(boolean),
  armor1Fix: field(boolean),
  armor2Fix: field(boolean),
  armor3Fix: field(boolean),
  armor4Fix: field(boolean),
});

export function defaultActor(id = 0): Actor {
  return {
    id,
    name: '',
    classId: 0,
    initialLevel: 1,
    finalLevel: 99,
    expBasis: 30,
    expInflation: 30,
    characterName: null,
    characterHue: 0,
    battlerName: null,
    battlerHue: 0,
    parameters: new Grid(6, 100),
    weaponId: null,
    armor1Id: null,
    armor2Id: null,
    armor3Id: null,
    armor4Id: null,
    weaponFix: false,
    armor1Fix: false,
    armor2Fix: false,
    armor3Fix: false,
    armor4Fix: false,
  };
}
