import {
  Grid,
  defineSchema,
  enumOf,
  field,
  grid,
  idShift,
  int,
  list,
  optionalText,
  text,
} from '../schema/index.js';
import { audioFileSchema, type AudioFile } from './audio-file.js';
import { colorCodec, type Color } from './color.js';

export enum AnimationPosition {
  Top = 0,
  Middle = 1,
  Bottom = 2,
  Screen = 3,
}

export interface AnimationFrame {
  cellMax: number;
  /** One row per cell: pattern, x, y, zoom, angle, mirror, opacity, blend. */
  cellData: Grid;
}

/** Sound and flash cue on one frame. */
export interface AnimationTiming {
  frame: number;
  se: AudioFile;
  flashScope: number;
  flashColor: Color;
  flashDuration: number;
  condition: number;
}

export interface Animation {
  id: number;
  name: string;
  animationName: string | null;
  animationHue: number;
  position: AnimationPosition;
  frameMax: number;
  frames: AnimationFrame[];
  timings: AnimationTiming[];
}

export const animationFrameSchema = defineSchema<AnimationFrame>('RPG::Animation::Frame', {
  cellMax: field(int),
  cellData: field(grid(2)),
});

export const animationTimingSchema = defineSchema<AnimationTiming>('RPG::Animation::Timing', {
  frame: field(int),
  se: field(audioFileSchema),
  flashScope: field(int),
  flashColor: field(colorCodec),
  flashDuration: field(int),
  condition: field(int),
});

export const animationSchema = defineSchema<Animation>('RPG::Animation', {
  id: field(idShift),
  name: field(text),
  animationName: field(optionalText),
  animationHue: field(int),
  position: field(enumOf<AnimationPosition>(AnimationPosition)),
  frameMax: field(int),
  frames: field(list(animationFrameSchema)),
  timings: field(list(animationTimingSchema)),
});

export function defaultAnimation(id = 0): Animation {
  return {
    id,
    name: '',
    animationName: null,
    animationHue: 0,
    position: AnimationPosition.Middle,
    frameMax: 1,
    frames: [{ cellMax: 0, cellData: new Grid(0, 0) }],
    timings: [],
  };
}
