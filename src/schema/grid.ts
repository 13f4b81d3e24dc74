/**
 * Dense numeric grids ("Table") and their byte layout.
 *
 * ┌──────────┬──────────┬──────────┬──────────┬─────────────────────────┐
 * │ width    │ height   │ depth    │ count    │ count × u16 LE          │
 * │ u32 LE   │ u32 LE   │ u32 LE   │ u32 LE   │ row-major, x fastest    │
 * └──────────┴──────────┴──────────┴──────────┴─────────────────────────┘
 *
 * The `rgss` layout puts one more u32 in front: the number of dimensions
 * (1, 2 or 3) the table was created with.
 */

import { ByteReader, ByteWriter } from '../core/cursor.js';
import { MarshalError } from '../core/errors.js';

export type GridLayout = 'compact' | 'rgss';
export type GridRank = 1 | 2 | 3;

const U32_MAX = 0xffffffff;
const U16_MAX = 0xffff;

function checkCell(value: number, at: string): number {
  if (!Number.isInteger(value) || value < 0 || value > U16_MAX) {
    throw new RangeError(`${at} value ${value} is not a u16`);
  }
  return value;
}

export class Grid {
  readonly width: number;
  readonly height: number;
  readonly depth: number;
  /**
   * Flat cells, `x + width * (y + height * z)`. Its length never changes.
   * The constructor and `set` reject values outside 0..65535.
   */
  readonly data: Uint16Array;

  constructor(width: number, height = 1, depth = 1, data?: ArrayLike<number>) {
    for (const [name, size] of [['width', width], ['height', height], ['depth', depth]] as const) {
      if (!Number.isInteger(size) || size < 0 || size > U32_MAX) {
        throw new MarshalError('GridShapeMismatch', `grid ${name} ${size} is not a u32`);
      }
    }
    const size = width * height * depth;
    if (data !== undefined && data.length !== size) {
      throw new MarshalError(
        'GridShapeMismatch',
        `${width}x${height}x${depth} grid needs ${size} values, got ${data.length}`,
      );
    }
    this.width = width;
    this.height = height;
    this.depth = depth;
    this.data = new Uint16Array(size);
    if (data !== undefined && !(data instanceof Uint16Array)) {
      for (let i = 0; i < size; i++) {
        checkCell(data[i], `cell ${i}`);
      }
    }
    if (data !== undefined) this.data.set(data);
  }

  get size(): number {
    return this.data.length;
  }

  get(x: number, y = 0, z = 0): number {
    return this.data[this.index(x, y, z)];
  }

  set(value: number, x: number, y = 0, z = 0): void {
    this.data[this.index(x, y, z)] = checkCell(value, `(${x}, ${y}, ${z})`);
  }

  /** A new grid of the given shape keeping the overlapping cells. */
  resize(width: number, height = 1, depth = 1): Grid {
    const next = new Grid(width, height, depth);
    for (let z = 0; z < Math.min(depth, this.depth); z++) {
      for (let y = 0; y < Math.min(height, this.height); y++) {
        for (let x = 0; x < Math.min(width, this.width); x++) {
          next.set(this.get(x, y, z), x, y, z);
        }
      }
    }
    return next;
  }

  clone(): Grid {
    return new Grid(this.width, this.height, this.depth, this.data);
  }

  private index(x: number, y: number, z: number): number {
    if (
      !Number.isInteger(x) || !Number.isInteger(y) || !Number.isInteger(z) ||
      x < 0 || y < 0 || z < 0 || x >= this.width || y >= this.height || z >= this.depth
    ) {
      throw new RangeError(`(${x}, ${y}, ${z}) is outside a ${this.width}x${this.height}x${this.depth} grid`);
    }
    return x + this.width * (y + this.height * z);
  }
}

/** Check that a grid's unused dimensions are 1 for the given rank. */
export function checkRank(grid: Grid, rank: GridRank): void {
  if ((rank < 3 && grid.depth !== 1) || (rank < 2 && grid.height !== 1)) {
    throw new MarshalError(
      'GridShapeMismatch',
      `${grid.width}x${grid.height}x${grid.depth} grid is not ${rank}-dimensional`,
    );
  }
}

export function decodeGrid(bytes: Uint8Array, layout: GridLayout = 'compact', rank?: GridRank): Grid {
  const reader = new ByteReader(bytes);

  if (layout === 'rgss') {
    const declared = reader.readU32();
    if (declared < 1 || declared > 3 || (rank !== undefined && declared !== rank)) {
      throw new MarshalError('GridShapeMismatch', `table declares ${declared} dimension(s), expected ${rank ?? '1 to 3'}`);
    }
  }

  const width = reader.readU32();
  const height = reader.readU32();
  const depth = reader.readU32();
  const count = reader.readU32();

  if (count !== width * height * depth) {
    throw new MarshalError('GridShapeMismatch', `count ${count} does not match ${width}x${height}x${depth}`);
  }
  if (reader.remaining() !== count * 2) {
    throw new MarshalError(
      'GridShapeMismatch',
      `expected ${count} value(s), payload holds ${reader.remaining() / 2}`,
    );
  }

  const data = new Uint16Array(count);
  for (let i = 0; i < count; i++) {
    data[i] = reader.readU16();
  }
  const grid = new Grid(width, height, depth, data);
  if (rank !== undefined) checkRank(grid, rank);
  return grid;
}

export function encodeGrid(grid: Grid, layout: GridLayout = 'compact', rank: GridRank = 3): Uint8Array {
  checkRank(grid, rank);
  const writer = new ByteWriter(20 + grid.size * 2);
  if (layout === 'rgss') writer.writeU32(rank);
  writer.writeU32(grid.width);
  writer.writeU32(grid.height);
  writer.writeU32(grid.depth);
  writer.writeU32(grid.size);
  for (const value of grid.data) {
    writer.writeU16(value);
  }
  return writer.finish();
}
