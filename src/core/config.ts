/**
 * Codec configuration model.
 *
 * Settings for the tooling around the codec (data cache, format handler,
 * CLI), merged from several sources: defaults → config file → CLI args →
 * env vars.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './log.js';

// ── Configuration Schema ─────────────────────────────────────────

export type DataFormat = 'marshal' | 'json' | 'cbor';

export const DATA_FORMATS: readonly DataFormat[] = ['marshal', 'json', 'cbor'];
const GRID_LAYOUTS = ['compact', 'rgss'] as const;
const STRING_ENCODINGS = ['none', 'utf-8'] as const;
const UNKNOWN_CLASS_POLICIES = ['error', 'preserve'] as const;

export interface CodecConfig {
  /** Format documents are stored in. */
  format: DataFormat;

  /** Indent JSON output. */
  pretty: boolean;

  /** Byte layout of Table user data. */
  gridLayout: (typeof GRID_LAYOUTS)[number];

  /** Encoding marker written on strings. RMXP data carries none. */
  stringEncoding: (typeof STRING_ENCODINGS)[number];

  /** What event command parameters of unregistered classes become. */
  unknownClasses: (typeof UNKNOWN_CLASS_POLICIES)[number];

  /** Scripts document name tried before `xScripts` and `Scripts`. */
  scriptsPath?: string;

  /** Directory holding the documents, relative to the project root. */
  dataDir: string;

  /** Logging level. */
  logLevel: LogLevel;
}

// ── Defaults ─────────────────────────────────────────────────────

export const DEFAULT_CONFIG: CodecConfig = {
  format: 'marshal',
  pretty: false,
  gridLayout: 'compact',
  stringEncoding: 'none',
  unknownClasses: 'error',
  dataDir: 'Data',
  logLevel: 'info',
};

// ── Config Merging ───────────────────────────────────────────────

/**
 * Merge configuration from multiple sources.
 *
 * Sources are applied in order (later sources override earlier):
 *   1. defaults (DEFAULT_CONFIG)
 *   2. config file
 *   3. CLI args
 *   4. env vars
 */
export function mergeConfigs(...sources: Partial<CodecConfig>[]): CodecConfig {
  const result: CodecConfig = { ...DEFAULT_CONFIG };

  for (const source of sources) {
    if (source.format !== undefined) result.format = source.format;
    if (source.pretty !== undefined) result.pretty = source.pretty;
    if (source.gridLayout !== undefined) result.gridLayout = source.gridLayout;
    if (source.stringEncoding !== undefined) result.stringEncoding = source.stringEncoding;
    if (source.unknownClasses !== undefined) result.unknownClasses = source.unknownClasses;
    if (source.scriptsPath !== undefined) result.scriptsPath = source.scriptsPath;
    if (source.dataDir !== undefined) result.dataDir = source.dataDir;
    if (source.logLevel !== undefined) result.logLevel = source.logLevel;
  }

  return result;
}

// ── CLI Argument Parsing ─────────────────────────────────────────

/**
 * Parse CLI arguments into a partial CodecConfig.
 *
 * Recognized flags:
 *   --format <name>            marshal | json | cbor
 *   --pretty                   Indent JSON output
 *   --grid-layout <name>       compact | rgss
 *   --string-encoding <name>   none | utf-8
 *   --unknown-classes <name>   error | preserve
 *   --scripts-path <name>      Scripts document name
 *   --data-dir <path>          Data directory
 *   --log-level <level>        Logging level
 *   --config <path>            Config file path
 *
 * Arguments that do not start with `--` are collected as positionals.
 */
export interface ParsedCli {
  config: Partial<CodecConfig>;
  positionals: string[];
  configFilePath?: string;
  help?: boolean;
}

export function parseCodecArgs(argv: string[]): ParsedCli {
  const config: Partial<CodecConfig> = {};
  const positionals: string[] = [];
  let configFilePath: string | undefined;
  let help = false;

  let i = 0;
  const next = (flag: string): string => {
    const value = argv[++i];
    if (value === undefined) throw new ConfigError(`${flag} needs a value`);
    return value;
  };

  while (i < argv.length) {
    const arg = argv[i];

    switch (arg) {
      case '--format':
        config.format = oneOf(arg, next(arg), DATA_FORMATS);
        break;
      case '--pretty':
        config.pretty = true;
        break;
      case '--grid-layout':
        config.gridLayout = oneOf(arg, next(arg), GRID_LAYOUTS);
        break;
      case '--string-encoding':
        config.stringEncoding = oneOf(arg, next(arg), STRING_ENCODINGS);
        break;
      case '--unknown-classes':
        config.unknownClasses = oneOf(arg, next(arg), UNKNOWN_CLASS_POLICIES);
        break;
      case '--scripts-path':
        config.scriptsPath = next(arg);
        break;
      case '--data-dir':
        config.dataDir = next(arg);
        break;
      case '--log-level':
        config.logLevel = oneOf(arg, next(arg), LOG_LEVELS);
        break;
      case '--config':
        configFilePath = next(arg);
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        // Unknown flags are ignored (allow extension by downstream CLIs)
        if (!arg.startsWith('--')) positionals.push(arg);
        break;
    }

    i++;
  }

  return { config, positionals, configFilePath, help };
}

// ── Validation ───────────────────────────────────────────────────

function oneOf<T extends string>(option: string, value: unknown, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`${option} must be one of ${allowed.join(', ')}; got ${JSON.stringify(value)}`);
  }
  return match;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOption(option: string, value: unknown): string {
  if (typeof value !== 'string') throw new ConfigError(`${option} must be a string`);
  return value;
}

/**
 * Check a parsed config file. Only the fields present are returned; keys
 * the model does not know are ignored.
 */
export function validateConfig(raw: unknown, source: string): Partial<CodecConfig> {
  if (!isRecord(raw)) throw new ConfigError(`${source}: configuration must be a JSON object`);

  const config: Partial<CodecConfig> = {};
  const at = (key: string): string => `${source}: ${key}`;

  if (raw.format !== undefined) config.format = oneOf(at('format'), raw.format, DATA_FORMATS);
  if (raw.pretty !== undefined) {
    if (typeof raw.pretty !== 'boolean') throw new ConfigError(`${at('pretty')} must be a boolean`);
    config.pretty = raw.pretty;
  }
  if (raw.gridLayout !== undefined) config.gridLayout = oneOf(at('gridLayout'), raw.gridLayout, GRID_LAYOUTS);
  if (raw.stringEncoding !== undefined) {
    config.stringEncoding = oneOf(at('stringEncoding'), raw.stringEncoding, STRING_ENCODINGS);
  }
  if (raw.unknownClasses !== undefined) {
    config.unknownClasses = oneOf(at('unknownClasses'), raw.unknownClasses, UNKNOWN_CLASS_POLICIES);
  }
  if (raw.scriptsPath !== undefined) config.scriptsPath = stringOption(at('scriptsPath'), raw.scriptsPath);
  if (raw.dataDir !== undefined) config.dataDir = stringOption(at('dataDir'), raw.dataDir);
  if (raw.logLevel !== undefined) config.logLevel = oneOf(at('logLevel'), raw.logLevel, LOG_LEVELS);

  return config;
}

// ── Config File Loading ──────────────────────────────────────────

/** Where configuration comes from besides the command line. */
export interface ConfigEnvironment {
  env: Record<string, string | undefined>;
  cwd: string;
  home: string;
  /** File contents, or `undefined` when the file does not exist. */
  readText(path: string): Promise<string | undefined>;
}

export const processEnvironment: ConfigEnvironment = {
  env: process.env,
  cwd: process.cwd(),
  home: homedir(),
  async readText(path) {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return undefined;
      throw error;
    }
  },
};

/** Load a partial CodecConfig from a JSON config file. */
export async function loadConfigFile(
  path: string,
  environment: ConfigEnvironment = processEnvironment,
): Promise<Partial<CodecConfig> | undefined> {
  const content = await environment.readText(path);
  if (content === undefined) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${path}: not valid JSON`, { cause: error });
  }
  return validateConfig(raw, path);
}

/**
 * Config file locations, in search order:
 *   1. RXDATA_CONFIG env var
 *   2. ./rxdata.config.json (current directory)
 *   3. ~/.config/rxdata-codec/config.json (XDG)
 */
export function configCandidates(environment: ConfigEnvironment = processEnvironment): string[] {
  const candidates: string[] = [];

  const envPath = environment.env['RXDATA_CONFIG'];
  if (envPath) candidates.push(envPath);

  candidates.push(join(environment.cwd, 'rxdata.config.json'));

  const xdgConfig = environment.env['XDG_CONFIG_HOME'] || join(environment.home, '.config');
  candidates.push(join(xdgConfig, 'rxdata-codec', 'config.json'));

  return candidates;
}

// ── Full Resolution ──────────────────────────────────────────────

/**
 * Resolve the complete configuration from all sources.
 *
 * An explicit `--config` file must exist; the searched locations are
 * skipped when absent.
 */
export async function resolveCodecConfig(
  cli: ParsedCli,
  environment: ConfigEnvironment = processEnvironment,
): Promise<CodecConfig> {
  let fileConfig: Partial<CodecConfig> = {};

  if (cli.configFilePath !== undefined) {
    const loaded = await loadConfigFile(cli.configFilePath, environment);
    if (loaded === undefined) throw new ConfigError(`config file ${cli.configFilePath} not found`);
    fileConfig = loaded;
  } else {
    for (const candidate of configCandidates(environment)) {
      const loaded = await loadConfigFile(candidate, environment);
      if (loaded !== undefined) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig: Partial<CodecConfig> = {};
  const envLevel = environment.env['RXDATA_LOG_LEVEL'];
  if (envLevel) envConfig.logLevel = oneOf('RXDATA_LOG_LEVEL', envLevel, LOG_LEVELS);

  return mergeConfigs(fileConfig, cli.config, envConfig);
}
