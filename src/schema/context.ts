/**
 * Per-call state of the schema layer.
 *
 * One context lives for exactly one materialize or dematerialize call. It
 * carries the options in force, the class/field path used to name errors,
 * and the set of composites currently being converted, which is how a cycle
 * through typed fields is caught.
 */

import { MarshalError, type SchemaLocation } from '../core/errors.js';
import type { StringEncoding } from '../core/types.js';
import type { GridLayout } from './grid.js';

export interface SchemaOptions {
  /** Byte layout of grid user data. Defaults to `compact`. */
  gridLayout?: GridLayout;
  /** Encoding marker written on text fields. Defaults to `none`. */
  stringEncoding?: Extract<StringEncoding, 'none' | 'utf-8'>;
  /** Whether registry fallbacks keep composites of unregistered classes. */
  unknownClasses?: 'error' | 'preserve';
}

export class SchemaContext {
  readonly gridLayout: GridLayout;
  readonly stringEncoding: Extract<StringEncoding, 'none' | 'utf-8'>;
  readonly unknownClasses: 'error' | 'preserve';

  private readonly path: SchemaLocation[] = [];
  private readonly active = new Set<object>();

  constructor(options: SchemaOptions = {}) {
    this.gridLayout = options.gridLayout ?? 'compact';
    this.stringEncoding = options.stringEncoding ?? 'none';
    this.unknownClasses = options.unknownClasses ?? 'error';
  }

  /** Innermost class and field being converted, if any. */
  location(): SchemaLocation | undefined {
    return this.path[this.path.length - 1];
  }

  mismatch(message: string): MarshalError {
    return new MarshalError('SchemaMismatch', message, this.location());
  }

  /** Run `fn` with `className.field` as the location for errors. */
  at<R>(className: string, field: string | undefined, fn: () => R): R {
    this.path.push(field === undefined ? { className } : { className, field });
    try {
      return fn();
    } finally {
      this.path.pop();
    }
  }

  /** Run `fn` while `node` is being converted; re-entering it is a cycle. */
  guard<R>(node: object, fn: () => R): R {
    if (this.active.has(node)) {
      throw this.mismatch('cyclic reference in a typed record');
    }
    this.active.add(node);
    try {
      return fn();
    } finally {
      this.active.delete(node);
    }
  }
}
