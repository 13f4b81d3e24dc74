/**
 * Core module: value model, errors, byte cursors, reference tables,
 * configuration and logging.
 */

export * from './types.js';
export * from './errors.js';
export { ByteReader, ByteWriter } from './cursor.js';
export { ObjectIndex, ObjectTable, SymbolIndex, SymbolTable } from './tables.js';
export {
  DATA_FORMATS,
  DEFAULT_CONFIG,
  configCandidates,
  loadConfigFile,
  mergeConfigs,
  parseCodecArgs,
  processEnvironment,
  resolveCodecConfig,
  validateConfig,
  type CodecConfig,
  type ConfigEnvironment,
  type DataFormat,
  type ParsedCli,
} from './config.js';
export { LOG_LEVELS, createLogger, isLogLevel, silentLogger, type LogLevel, type LogSink, type Logger } from './log.js';
