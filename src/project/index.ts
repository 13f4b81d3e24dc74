/**
 * Project module: file access and the data cache.
 */

export { DataCache, type ProjectData } from './data-cache.js';
export { FileNotFoundError, MemoryFileSystem, NodeFileSystem, type FileSystem } from './filesystem.js';
