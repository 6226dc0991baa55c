// src/core/credentials/FileStore.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import { Mutex } from 'async-mutex';

/**
 * Keyv storage adapter backed by one JSON file, so a single-process
 * deployment keeps its connected identity across restarts without a
 * database. Writes go to a temp file that is renamed over the target.
 */
export class FileStore {
  namespace?: string;
  private entries?: Map<string, string>;
  private mutex = new Mutex();

  constructor(private filePath: string) {}

  async get(key: string): Promise<string | undefined> {
    const entries = await this.load();
    return entries.get(key);
  }

  async set(key: string, value: string | undefined): Promise<true> {
    await this.mutex.runExclusive(async () => {
      const entries = await this.load();
      if (value === undefined) {
        entries.delete(key);
      } else {
        entries.set(key, value);
      }
      await this.persist(entries);
    });
    return true;
  }

  async delete(key: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const entries = await this.load();
      const existed = entries.delete(key);
      if (existed) await this.persist(entries);
      return existed;
    });
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const entries = await this.load();
      const prefix = this.namespace ? `${this.namespace}:` : '';
      for (const key of [...entries.keys()]) {
        if (key.startsWith(prefix)) entries.delete(key);
      }
      await this.persist(entries);
    });
  }

  async has(key: string): Promise<boolean> {
    const entries = await this.load();
    return entries.has(key);
  }

  private async load(): Promise<Map<string, string>> {
    if (this.entries) return this.entries;

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        this.entries = new Map();
        return this.entries;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    const entries = new Map<string, string>();
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') entries.set(key, value);
      }
    }
    this.entries = entries;
    return entries;
  }

  private async persist(entries: Map<string, string>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(Object.fromEntries(entries), null, 2), { encoding: 'utf8', mode: 0o600 });
    await fs.rename(tmp, this.filePath);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
