/**
 * Schema module: typed records over the intermediate value tree.
 */

export { SchemaContext, type SchemaOptions } from './context.js';
export {
  ClassCodec,
  Schema,
  TableCodec,
  UserDataCodec,
  defineSchema,
  field,
  grid,
  snakeCase,
  type Field,
  type FieldMap,
} from './codec.js';
export { Grid, checkRank, decodeGrid, encodeGrid, type GridLayout, type GridRank } from './grid.js';
export { SchemaRegistry, type RegistryFallback } from './registry.js';
export {
  boolean,
  describeValue,
  double,
  enumOf,
  hashOf,
  idList,
  idShift,
  int,
  list,
  nilPadded,
  nullable,
  optionalIdShift,
  optionalText,
  text,
  value,
  type Transform,
  type TransformKind,
} from './transforms.js';
export { dematerialize, materialize } from './materialize.js';
