/**
 * Formats module: document storage formats.
 */

export {
  DataFormatHandler,
  FORMAT_EXTENSIONS,
  formatForPath,
  type DataFormatOptions,
} from './handler.js';
export {
  fromPortable,
  toPortable,
  type PortableEncoding,
  type PortableNode,
  type PortablePairs,
  type PortableValue,
} from './portable.js';
