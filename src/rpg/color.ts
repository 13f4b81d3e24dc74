/**
 * `Color` and `Tone` user data: four little-endian f64 values.
 */

import { ByteReader, ByteWriter } from '../core/cursor.js';
import { UserDataCodec, type SchemaContext } from '../schema/index.js';

export interface Color {
  red: number;
  green: number;
  blue: number;
  alpha: number;
}

/** Offset applied to a color; components stay within -255..255, gray 0..255. */
export interface Tone {
  red: number;
  green: number;
  blue: number;
  gray: number;
}

type Quad = [number, number, number, number];

class QuadCodec<T extends object> extends UserDataCodec<T> {
  private readonly fromQuad: (quad: Quad) => T;
  private readonly toQuad: (value: T) => Quad;

  constructor(className: string, fromQuad: (quad: Quad) => T, toQuad: (value: T) => Quad) {
    super(className);
    this.fromQuad = fromQuad;
    this.toQuad = toQuad;
  }

  protected unpack(data: Uint8Array, ctx: SchemaContext): T {
    if (data.length !== 32) {
      throw ctx.mismatch(`${this.className} holds ${data.length} bytes, expected 32`);
    }
    const reader = new ByteReader(data);
    return this.fromQuad([reader.readF64(), reader.readF64(), reader.readF64(), reader.readF64()]);
  }

  protected pack(value: T): Uint8Array {
    const writer = new ByteWriter(32);
    for (const component of this.toQuad(value)) writer.writeF64(component);
    return writer.finish();
  }
}

export const colorCodec = new QuadCodec<Color>(
  'Color',
  ([red, green, blue, alpha]) => ({ red, green, blue, alpha }),
  (c) => [c.red, c.green, c.blue, c.alpha],
);

export const toneCodec = new QuadCodec<Tone>(
  'Tone',
  ([red, green, blue, gray]) => ({ red, green, blue, gray }),
  (t) => [t.red, t.green, t.blue, t.gray],
);
