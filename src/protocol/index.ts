/**
 * Protocol module: the Marshal 4.8 decoder and encoder.
 */

export { MAX_DEPTH, decode, MarshalDecoder } from './decoder.js';
export { encode, MarshalEncoder, type EncodeOptions } from './encoder.js';
export { formatFloat, parseFloatText } from './float.js';
