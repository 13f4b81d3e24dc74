import {
  Grid,
  boolean,
  defineSchema,
  field,
  grid,
  hashOf,
  idList,
  idShift,
  int,
  text,
} from '../schema/index.js';
import { audioFile, audioFileSchema, type AudioFile } from './audio-file.js';
import { eventSchema, type Event } from './event.js';

/** An `RPG::Map` record (the contents of one `MapNNN` document). */
export interface GameMap {
  tilesetId: number;
  width: number;
  height: number;
  autoplayBgm: boolean;
  bgm: AudioFile;
  autoplayBgs: boolean;
  bgs: AudioFile;
  encounterList: number[];
  encounterStep: number;
  /** Tile ids, one layer per z. */
  data: Grid;
  /** Events keyed by their id. */
  events: Map<number, Event>;
}

export interface MapInfo {
  name: string;
  /** Id of the parent map, 0 at the root. */
  parentId: number;
  order: number;
  expanded: boolean;
  scrollX: number;
  scrollY: number;
}

export const mapSchema = defineSchema<GameMap>('RPG::Map', {
  tilesetId: field(idShift),
  width: field(int),
  height: field(int),
  autoplayBgm: field(boolean),
  bgm: field(audioFileSchema),
  autoplayBgs: field(boolean),
  bgs: field(audioFileSchema),
  encounterList: field(idList),
  encounterStep: field(int),
  data: field(grid(3)),
  events: field(hashOf(int, eventSchema)),
});

export const mapInfoSchema = defineSchema<MapInfo>('RPG::MapInfo', {
  name: field(text),
  parentId: field(int),
  order: field(int),
  expanded: field(boolean),
  scrollX: field(int),
  scrollY: field(int),
});

/** Document name of a map: `Map001` for id 1. */
export function mapDocumentName(id: number): string {
  return `Map${String(id).padStart(3, '0')}`;
}

/** An empty 20x15 map with three tile layers. */
export function defaultMap(): GameMap {
  return {
    tilesetId: 0,
    width: 20,
    height: 15,
    autoplayBgm: false,
    bgm: audioFile(),
    autoplayBgs: false,
    bgs: audioFile(null, 80),
    encounterList: [],
    encounterStep: 30,
    data: new Grid(20, 15, 3),
    events: new Map(),
  };
}

export function defaultMapInfo(name = ''): MapInfo {
  return { name, parentId: 0, order: 0, expanded: false, scrollX: 0, scrollY: 0 };
}
