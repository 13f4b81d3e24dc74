/**
 * Script entries: `[id, name, zlib-deflated source]` arrays.
 */

import { deflateSync, inflateSync } from 'node:zlib';
import { array, bytes, integer, type MarshalValue } from '../core/types.js';
import { describeValue, int, text, type SchemaContext, type Transform } from '../schema/index.js';

export interface Script {
  /** Opaque number the editor stores with each section. */
  id: number;
  name: string;
  source: string;
}

const utf8 = new TextDecoder('utf-8');

export const scriptTransform: Transform<Script> = {
  kind: 'record',
  decode(wire, ctx) {
    if (wire.type !== 'array' || wire.items.length !== 3) {
      throw ctx.mismatch(`expected a [id, name, source] script entry, found ${describeValue(wire)}`);
    }
    const [id, name, source] = wire.items;
    return {
      id: int.decode(id, ctx),
      name: text.decode(name, ctx),
      source: inflate(source, ctx),
    };
  },
  encode(script, ctx) {
    return array([integer(script.id), text.encode(script.name, ctx), bytes(deflateSync(script.source))]);
  },
};

function inflate(wire: MarshalValue, ctx: SchemaContext): string {
  if (wire.type !== 'string') throw ctx.mismatch(`expected compressed script source, found ${describeValue(wire)}`);
  try {
    return utf8.decode(inflateSync(wire.data));
  } catch (error) {
    throw ctx.mismatch(`script source is not zlib data: ${error instanceof Error ? error.message : String(error)}`);
  }
}
