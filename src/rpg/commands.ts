/**
 * Event commands, move routes and their parameters.
 *
 * Command parameters are heterogeneous: primitives, arrays of parameters,
 * and a handful of composite classes. Composites dispatch through
 * `parameterRegistry`; values of any other class are kept raw when the
 * context's `unknownClasses` policy is `preserve`.
 */

import { NIL, array, type MarshalValue } from '../core/types.js';
import {
  SchemaRegistry,
  boolean,
  defineSchema,
  describeValue,
  double,
  field,
  int,
  list,
  text,
  type Transform,
} from '../schema/index.js';
import { audioFileSchema, type AudioFile } from './audio-file.js';
import { colorCodec, toneCodec, type Color, type Tone } from './color.js';

export type Parameter =
  | { kind: 'none' }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'color'; value: Color }
  | { kind: 'tone'; value: Tone }
  | { kind: 'audio-file'; value: AudioFile }
  | { kind: 'move-route'; value: MoveRoute }
  | { kind: 'move-command'; value: MoveCommand }
  | { kind: 'array'; value: Parameter[] }
  | { kind: 'raw'; value: MarshalValue };

export interface MoveCommand {
  code: number;
  parameters: Parameter[];
}

export interface MoveRoute {
  repeat: boolean;
  skippable: boolean;
  list: MoveCommand[];
}

export interface EventCommand {
  code: number;
  indent: number;
  parameters: Parameter[];
}

export const parameter: Transform<Parameter> = {
  kind: 'variant',
  decode(wire, ctx) {
    switch (wire.type) {
      case 'nil':
        return { kind: 'none' };
      case 'integer':
        return { kind: 'integer', value: int.decode(wire, ctx) };
      case 'float':
        return { kind: 'float', value: wire.value };
      case 'string':
        return { kind: 'string', value: text.decode(wire, ctx) };
      case 'bool':
        return { kind: 'bool', value: wire.value };
      case 'array':
        return { kind: 'array', value: wire.items.map((item) => parameter.decode(item, ctx)) };
      default:
        return parameterRegistry.decode(wire, ctx);
    }
  },
  encode(value, ctx) {
    switch (value.kind) {
      case 'none':
        return NIL;
      case 'integer':
        return int.encode(value.value, ctx);
      case 'float':
        return double.encode(value.value, ctx);
      case 'string':
        return text.encode(value.value, ctx);
      case 'bool':
        return boolean.encode(value.value, ctx);
      case 'array':
        return array(value.value.map((item) => parameter.encode(item, ctx)));
      default:
        return parameterRegistry.encode(value, ctx);
    }
  },
};

export const moveCommandSchema = defineSchema<MoveCommand>('RPG::MoveCommand', {
  code: field(int),
  parameters: field(list(parameter)),
});

export const moveRouteSchema = defineSchema<MoveRoute>('RPG::MoveRoute', {
  repeat: field(boolean),
  skippable: field(boolean),
  list: field(list(moveCommandSchema)),
});

export const eventCommandSchema = defineSchema<EventCommand>('RPG::EventCommand', {
  code: field(int),
  indent: field(int),
  parameters: field(list(parameter)),
});

export const parameterRegistry = new SchemaRegistry<Parameter>({
  fallback: {
    wrap(raw, ctx) {
      if (ctx.unknownClasses === 'preserve') return { kind: 'raw', value: raw };
      throw ctx.mismatch(`unsupported command parameter ${describeValue(raw)}`);
    },
    unwrap: (p) => (p.kind === 'raw' ? p.value : undefined),
  },
})
  .register(colorCodec, (value) => ({ kind: 'color', value }), (p) => (p.kind === 'color' ? p.value : undefined))
  .register(toneCodec, (value) => ({ kind: 'tone', value }), (p) => (p.kind === 'tone' ? p.value : undefined))
  .register(
    audioFileSchema,
    (value) => ({ kind: 'audio-file', value }),
    (p) => (p.kind === 'audio-file' ? p.value : undefined),
  )
  .register(
    moveRouteSchema,
    (value) => ({ kind: 'move-route', value }),
    (p) => (p.kind === 'move-route' ? p.value : undefined),
  )
  .register(
    moveCommandSchema,
    (value) => ({ kind: 'move-command', value }),
    (p) => (p.kind === 'move-command' ? p.value : undefined),
  );
