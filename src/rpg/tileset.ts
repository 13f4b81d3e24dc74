import { Grid, defineSchema, field, grid, idShift, int, list, optionalText, text } from '../schema/index.js';

export interface Tileset {
  id: number;
  name: string;
  tilesetName: string | null;
  autotileNames: string[];
  panoramaName: string | null;
  panoramaHue: number;
  fogName: string | null;
  fogHue: number;
  fogOpacity: number;
  fogBlendType: number;
  fogZoom: number;
  fogSx: number;
  fogSy: number;
  battlebackName: string | null;
  passages: Grid;
  priorities: Grid;
  terrainTags: Grid;
}

export const tilesetSchema = defineSchema<Tileset>('RPG::Tileset', {
  id: field(idShift),
  name: field(text),
  tilesetName: field(optionalText),
  autotileNames: field(list(text)),
  panoramaName: field(optionalText),
  panoramaHue: field(int),
  fogName: field(optionalText),
  fogHue: field(int),
  fogOpacity: field(int),
  fogBlendType: field(int),
  fogZoom: field(int),
  fogSx: field(int),
  fogSy: field(int),
  battlebackName: field(optionalText),
  passages: field(grid(1)),
  priorities: field(grid(1)),
  terrainTags: field(grid(1)),
});

export function defaultTileset(id = 0): Tileset {
  return {
    id,
    name: '',
    tilesetName: null,
    autotileNames: Array.from({ length: 7 }, () => ''),
    panoramaName: null,
    panoramaHue: 0,
    fogName: null,
    fogHue: 0,
    fogOpacity: 64,
    fogBlendType: 0,
    fogZoom: 200,
    fogSx: 0,
    fogSy: 0,
    battlebackName: null,
    passages: new Grid(384),
    priorities: new Grid(384),
    terrainTags: new Grid(384),
  };
}
