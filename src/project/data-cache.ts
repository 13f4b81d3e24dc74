/**
 * Project data cache.
 *
 * Holds the database documents of one project after `load()`, and maps on
 * demand. A map is read at most once at a time: concurrent `getMap` calls
 * for the same id share one pending read, which is forgotten if it fails
 * so a later call retries. A map set with `setMap` while its read is
 * pending wins over the read.
 *
 * `save()` stamps the system document with a fresh magic number so a
 * running game can tell the data changed.
 */

import { DEFAULT_CONFIG, type CodecConfig } from '../core/config.js';
import { DataFormatError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/log.js';
import { DataFormatHandler } from '../formats/index.js';
import {
  DATABASE_DOCUMENTS,
  DATABASE_KEYS,
  DOCUMENT_NAMES,
  defaultDatabase,
  defaultMap,
  mapDocument,
  mapDocumentName,
  scriptsDocument,
  type Database,
  type GameMap,
  type Script,
} from '../rpg/index.js';
import type { SchemaOptions, Transform } from '../schema/index.js';
import type { FileSystem } from './filesystem.js';

/** Largest magic number that still marshals as a fixnum. */
const MAGIC_NUMBER_LIMIT = 2 ** 30;

export interface ProjectData extends Database {
  scripts: Script[];
  /** Document the scripts were read from and are saved to. */
  scriptsName: string;
}

export class DataCache {
  private readonly fs: FileSystem;
  private readonly config: CodecConfig;
  private readonly logger: Logger;
  private readonly handler: DataFormatHandler;
  private readonly schemaOptions: SchemaOptions;

  private loaded?: ProjectData;
  private readonly maps = new Map<number, GameMap>();
  private readonly pendingMaps = new Map<number, Promise<GameMap>>();

  constructor(fs: FileSystem, config: CodecConfig = DEFAULT_CONFIG, logger: Logger = silentLogger) {
    this.fs = fs;
    this.config = config;
    this.logger = logger;
    this.handler = new DataFormatHandler(config.format, {
      pretty: config.pretty,
      dataDir: config.dataDir,
      logger,
    });
    this.schemaOptions = {
      gridLayout: config.gridLayout,
      stringEncoding: config.stringEncoding,
      unknownClasses: config.unknownClasses,
    };
  }

  /**
   * A cache holding a new project: default database records, no scripts
   * and an empty map 1. Nothing is read; `save()` writes it all out.
   */
  static fromDefaults(fs: FileSystem, config: CodecConfig = DEFAULT_CONFIG, logger: Logger = silentLogger): DataCache {
    const cache = new DataCache(fs, config, logger);
    const scriptsName =
      config.scriptsPath !== undefined && config.scriptsPath !== '' ? config.scriptsPath : DOCUMENT_NAMES.scripts;
    cache.loaded = { ...defaultDatabase(), scripts: [], scriptsName };
    cache.maps.set(1, defaultMap());
    return cache;
  }

  get isLoaded(): boolean {
    return this.loaded !== undefined;
  }

  /** Loaded database documents; throws before `load()`. */
  get data(): ProjectData {
    if (this.loaded === undefined) throw new Error('project data is not loaded');
    return this.loaded;
  }

  async load(): Promise<void> {
    const scriptsName = await this.findScripts();
    this.loaded = {
      actors: await this.readDatabaseDocument('actors'),
      classes: await this.readDatabaseDocument('classes'),
      skills: await this.readDatabaseDocument('skills'),
      items: await this.readDatabaseDocument('items'),
      weapons: await this.readDatabaseDocument('weapons'),
      armors: await this.readDatabaseDocument('armors'),
      enemies: await this.readDatabaseDocument('enemies'),
      troops: await this.readDatabaseDocument('troops'),
      states: await this.readDatabaseDocument('states'),
      animations: await this.readDatabaseDocument('animations'),
      tilesets: await this.readDatabaseDocument('tilesets'),
      commonEvents: await this.readDatabaseDocument('commonEvents'),
      system: await this.readDatabaseDocument('system'),
      mapInfos: await this.readDatabaseDocument('mapInfos'),
      scripts: await this.readDocument(scriptsName, scriptsDocument),
      scriptsName,
    };
    this.logger.info(`loaded project data (${this.handler.format})`);
  }

  getMap(id: number): Promise<GameMap> {
    const cached = this.maps.get(id);
    if (cached !== undefined) return Promise.resolve(cached);

    const pending = this.pendingMaps.get(id);
    if (pending !== undefined) return pending;

    // `setMap` and `unload` drop the pending entry; a read that is no longer
    // pending leaves the cache alone.
    const read: Promise<GameMap> = this.readDocument(mapDocumentName(id), mapDocument).then(
      (map) => {
        if (this.pendingMaps.get(id) !== read) return this.maps.get(id) ?? map;
        this.pendingMaps.delete(id);
        this.maps.set(id, map);
        return map;
      },
      (error: unknown) => {
        if (this.pendingMaps.get(id) === read) this.pendingMaps.delete(id);
        throw error;
      },
    );
    this.pendingMaps.set(id, read);
    return read;
  }

  setMap(id: number, map: GameMap): void {
    this.pendingMaps.delete(id);
    this.maps.set(id, map);
  }

  /** Ids of the maps currently held. */
  loadedMapIds(): number[] {
    return [...this.maps.keys()].sort((a, b) => a - b);
  }

  async save(): Promise<void> {
    const data = this.data;
    data.system.magicNumber = Math.floor(Math.random() * MAGIC_NUMBER_LIMIT);
    for (const key of DATABASE_KEYS) {
      await this.writeDatabaseDocument(data, key);
    }
    await this.writeDocument(data.scriptsName, scriptsDocument, data.scripts);
    for (const [id, map] of this.maps) {
      await this.writeDocument(mapDocumentName(id), mapDocument, map);
    }
    this.logger.info(`saved ${DATABASE_KEYS.length + 1 + this.maps.size} document(s)`);
  }

  unload(): void {
    this.loaded = undefined;
    this.maps.clear();
    this.pendingMaps.clear();
  }

  private async findScripts(): Promise<string> {
    const candidates = [this.config.scriptsPath, 'xScripts', 'Scripts'].filter(
      (name): name is string => name !== undefined && name !== '',
    );
    for (const name of candidates) {
      if (await this.fs.exists(this.handler.pathFor(name))) return name;
      this.logger.debug(`no scripts at ${this.handler.pathFor(name)}`);
    }
    throw new DataFormatError(`no scripts document found (tried ${candidates.join(', ')})`);
  }

  private readDatabaseDocument<K extends keyof Database>(key: K): Promise<Database[K]> {
    const document = DATABASE_DOCUMENTS[key];
    return this.readDocument(document.name, document.transform);
  }

  private writeDatabaseDocument<K extends keyof Database>(data: Database, key: K): Promise<void> {
    const document = DATABASE_DOCUMENTS[key];
    return this.writeDocument(document.name, document.transform, data[key]);
  }

  private async readDocument<V>(name: string, transform: Transform<V>): Promise<V> {
    const path = this.handler.pathFor(name);
    this.logger.debug(`reading ${path}`);
    const bytes = await this.fs.read(path);
    try {
      return this.handler.read(transform, bytes, this.schemaOptions);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataFormatError(`${path}: ${reason}`, { cause: error });
    }
  }

  private async writeDocument<V>(name: string, transform: Transform<V>, value: V): Promise<void> {
    const path = this.handler.pathFor(name);
    this.logger.debug(`writing ${path}`);
    await this.fs.write(path, this.handler.write(transform, value, this.schemaOptions));
  }
}
