/**
 * PersistentMemoryStore - knowledge that outlives a task.
 *
 * Unlike the shared memory, entries are not scoped to a task and categories
 * are free-form. With a directory configured every entry is written to its
 * own `<id>.json` file and reloaded by `open()`.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { InvalidMemoryEntryError } from '@conclave/agent-contracts';
import type {
  PersistentMemoryEntry,
  PersistentSearchQuery,
  StorePersistentInput,
} from '@conclave/agent-contracts';
import type { IPersistentMemory } from '@conclave/agent-tools';
import { useLogger, type Logger } from '../logger.js';

const StoreInputSchema = z.object({
  category: z.string().trim().min(1, 'category must not be empty'),
  title: z.string().trim().min(1, 'title must not be empty'),
  content: z.string().min(1, 'content must not be empty'),
  tags: z.array(z.string().min(1)).default([]),
  author: z.string().min(1, 'author must not be empty'),
  taskId: z.string().min(1, 'taskId must not be empty'),
  metadata: z.record(z.unknown()).optional(),
});

const PersistedEntrySchema = z.object({
  id: z.string().min(1),
  category: z.string(),
  title: z.string(),
  content: z.string(),
  tags: z.array(z.string()),
  author: z.string(),
  taskId: z.string(),
  timestamp: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export interface PersistentMemoryStoreConfig {
  /** Directory holding one `<id>.json` file per entry */
  dir?: string;
  logger?: Logger;
}

export class PersistentMemoryStore implements IPersistentMemory {
  private entries: PersistentMemoryEntry[] = [];
  private byId = new Map<string, PersistentMemoryEntry>();
  private readonly dir?: string;
  private readonly logger: Logger;

  constructor(config: PersistentMemoryStoreConfig = {}) {
    this.dir = config.dir;
    this.logger = (config.logger ?? useLogger()).child({ component: 'persistent-memory' });
  }

  store(input: StorePersistentInput): string {
    const parsed = StoreInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new InvalidMemoryEntryError(`Invalid persistent memory entry: ${issues.join('; ')}`);
    }

    const data = parsed.data;
    const entry: PersistentMemoryEntry = Object.freeze({
      id: `mem_${randomUUID()}`,
      category: data.category,
      title: data.title,
      content: data.content,
      tags: Object.freeze([...new Set(data.tags)]),
      author: data.author,
      taskId: data.taskId,
      timestamp: new Date().toISOString(),
      ...(data.metadata ? { metadata: Object.freeze({ ...data.metadata }) } : {}),
    });

    if (this.dir) {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(path.join(this.dir, `${entry.id}.json`), JSON.stringify(entry, null, 2), 'utf-8');
    }
    this.entries.push(entry);
    this.byId.set(entry.id, entry);
    this.logger.debug({ id: entry.id, category: entry.category, author: entry.author }, 'Persistent entry stored');
    return entry.id;
  }

  get(id: string): PersistentMemoryEntry | undefined {
    return this.byId.get(id);
  }

  /**
   * Matching entries, most recent first. Tags match when any of them is present.
   */
  search(query: PersistentSearchQuery = {}): PersistentMemoryEntry[] {
    const text = query.text?.toLowerCase();
    const results: PersistentMemoryEntry[] = [];

    for (const entry of [...this.entries].reverse()) {
      if (query.category && entry.category !== query.category) continue;
      if (query.tags && query.tags.length > 0 && !query.tags.some((tag) => entry.tags.includes(tag))) continue;
      if (
        text &&
        !entry.title.toLowerCase().includes(text) &&
        !entry.content.toLowerCase().includes(text)
      ) {
        continue;
      }
      results.push(entry);
      if (query.limit !== undefined && results.length >= query.limit) break;
    }

    return results;
  }

  get size(): number {
    return this.entries.length;
  }

  static async open(config: PersistentMemoryStoreConfig = {}): Promise<PersistentMemoryStore> {
    const store = new PersistentMemoryStore(config);
    if (config.dir) {
      await store.load(config.dir);
    }
    return store;
  }

  private async load(dir: string): Promise<void> {
    if (!fs.existsSync(dir)) return;

    const loaded: PersistentMemoryEntry[] = [];
    for (const file of await fs.promises.readdir(dir)) {
      if (!file.endsWith('.json')) continue;
      const raw = await fs.promises.readFile(path.join(dir, file), 'utf-8');
      const parsed = PersistedEntrySchema.safeParse(parseJson(raw));
      if (!parsed.success) {
        this.logger.warn({ file }, 'Skipping malformed persistent entry');
        continue;
      }
      const { metadata, tags, ...rest } = parsed.data;
      loaded.push(
        Object.freeze({
          ...rest,
          tags: Object.freeze(tags),
          ...(metadata ? { metadata: Object.freeze(metadata) } : {}),
        }),
      );
    }

    loaded.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    for (const entry of loaded) {
      this.entries.push(entry);
      this.byId.set(entry.id, entry);
    }
    this.logger.info({ dir, entries: loaded.length }, 'Persistent memory loaded');
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
