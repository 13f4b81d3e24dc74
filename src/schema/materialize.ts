import type { MarshalValue } from '../core/types.js';
import { SchemaContext, type SchemaOptions } from './context.js';
import type { Transform } from './transforms.js';

/** Convert an intermediate tree into a typed value. */
export function materialize<V>(transform: Transform<V>, wire: MarshalValue, options: SchemaOptions = {}): V {
  return transform.decode(wire, new SchemaContext(options));
}

/** Convert a typed value back into an intermediate tree. */
export function dematerialize<V>(transform: Transform<V>, typed: V, options: SchemaOptions = {}): MarshalValue {
  return transform.encode(typed, new SchemaContext(options));
}
