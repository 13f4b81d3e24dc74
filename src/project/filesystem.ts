/**
 * Minimal file access used by the data cache and the CLI. Paths are
 * relative to a project root and always use `/`.
 */

import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

export interface FileSystem {
  read(path: string): Promise<Uint8Array>;
  write(path: string, data: Uint8Array): Promise<void>;
  exists(path: string): Promise<boolean>;
}

export class FileNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`${path}: no such file`);
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Files under a directory on disk. */
export class NodeFileSystem implements FileSystem {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  async read(path: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(resolve(this.root, path)));
    } catch (error) {
      if (isNotFound(error)) throw new FileNotFoundError(path);
      throw error;
    }
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    const target = resolve(this.root, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(resolve(this.root, path));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }
}

/** Files held in memory, for tests and tooling. */
export class MemoryFileSystem implements FileSystem {
  readonly files = new Map<string, Uint8Array>();

  constructor(files: Record<string, Uint8Array> = {}) {
    for (const [path, data] of Object.entries(files)) {
      this.files.set(normalize(path), data);
    }
  }

  async read(path: string): Promise<Uint8Array> {
    const data = this.files.get(normalize(path));
    if (data === undefined) throw new FileNotFoundError(path);
    return data.slice();
  }

  async write(path: string, data: Uint8Array): Promise<void> {
    this.files.set(normalize(path), data.slice());
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(normalize(path));
  }
}

function normalize(path: string): string {
  return path.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}
