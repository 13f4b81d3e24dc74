import { defineSchema, field, int, optionalText } from '../schema/index.js';

/** A sound reference: file name under Audio/ plus playback settings. */
export interface AudioFile {
  name: string | null;
  volume: number;
  pitch: number;
}

export const audioFileSchema = defineSchema<AudioFile>('RPG::AudioFile', {
  name: field(optionalText),
  volume: field(int),
  pitch: field(int),
});

export function audioFile(name: string | null = null, volume = 100, pitch = 100): AudioFile {
  return { name, volume, pitch };
}
