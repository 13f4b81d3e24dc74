/**
 * rxdata-codec: Marshal 4.8 codec, typed schema layer and RPG Maker XP
 * project data.
 */

export * from './core/index.js';
export * from './protocol/index.js';
export * from './schema/index.js';
export * from './rpg/index.js';
export * from './formats/index.js';
export * from './project/index.js';
export { runCli, type CliIo } from './cli/index.js';
