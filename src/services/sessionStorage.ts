/**
 * File-backed key/value storage for the persisted auth session.
 *
 * Shaped like AsyncStorage (getItem / setItem / removeItem) so the
 * Supabase client can use it as its auth storage.
 */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { errorMessage } from '../utils/helpers';

type Entries = Record<string, string>;

export class FileSessionStorage {
  private cache: Entries | null = null;
  private writing: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async getItem(key: string): Promise<string | null> {
    const entries = await this.load();
    return entries[key] ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    const entries = await this.load();
    entries[key] = value;
    await this.flush(entries);
  }

  async removeItem(key: string): Promise<void> {
    const entries = await this.load();
    if (!(key in entries)) return;
    delete entries[key];
    await this.flush(entries);
  }

  private async load(): Promise<Entries> {
    if (this.cache) return this.cache;
    try {
      const raw = await fs.readFile(this.filePath, 'utf8');
      this.cache = parseEntries(raw);
    } catch (e: unknown) {
      if (!isMissingFile(e)) {
        console.warn('[SessionStorage] Could not read session file:', errorMessage(e));
      }
      this.cache = {};
    }
    return this.cache;
  }

  // Writes are chained so two quick updates never interleave on disk.
  private flush(entries: Entries): Promise<void> {
    const data = JSON.stringify(entries);
    const write = async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, data, 'utf8');
    };
    // A failed write is reported to its caller; the next one still runs.
    this.writing = this.writing.then(write, write);
    return this.writing;
  }
}

function parseEntries(raw: string): Entries {
  const parsed: unknown = JSON.parse(raw);
  const entries: Entries = {};
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') entries[key] = value;
    }
  }
  return entries;
}

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}
