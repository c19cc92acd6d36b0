/**
 * SharedMemoryStore - task-scoped, append-only coordination log
 *
 * Every agent run of a task reads and writes the same partition. Entries are
 * frozen on store, ids come from one counter shared by all tasks and are
 * never handed out twice, not even after a purge.
 *
 * Features:
 * - Filtered search (category, tags, text, author), most recent first
 * - Per-category and per-author views
 * - JSON export of one task
 * - Optional persistence: one JSON-lines file per task plus an id high-water mark
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  InvalidMemoryEntryError,
  MEMORY_CATEGORIES,
  MemoryCategorySchema,
} from '@conclave/agent-contracts';
import type {
  CategorySummary,
  MemoryCategory,
  MemorySearchQuery,
  MemoryStats,
  SharedMemoryEntry,
  StoreMemoryInput,
} from '@conclave/agent-contracts';
import type { ITaskMemory } from '@conclave/agent-tools';
import { useLogger, type Logger } from '../logger.js';

const META_FILE = '.meta.json';

const StoreInputSchema = z.object({
  category: MemoryCategorySchema,
  title: z.string().trim().min(1, 'title must not be empty'),
  content: z.string(),
  tags: z.array(z.string().min(1)).default([]),
  author: z.string().min(1, 'author must not be empty'),
  metadata: z.record(z.unknown()).optional(),
});

const PersistedEntrySchema = z.object({
  id: z.number().int().positive(),
  taskId: z.string().min(1),
  category: MemoryCategorySchema,
  title: z.string(),
  content: z.string(),
  tags: z.array(z.string()),
  author: z.string(),
  timestamp: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

const MetaSchema = z.object({ highWaterMark: z.number().int().nonnegative() });

export interface SharedMemoryStoreConfig {
  /** Directory for persistence (one `<taskId>.jsonl` per task) */
  persistDir?: string;
  logger?: Logger;
}

export class SharedMemoryStore {
  private tasks = new Map<string, SharedMemoryEntry[]>();
  private byId = new Map<number, SharedMemoryEntry>();
  private nextId = 1;
  private readonly persistDir?: string;
  private readonly logger: Logger;

  constructor(config: SharedMemoryStoreConfig = {}) {
    this.persistDir = config.persistDir;
    this.logger = (config.logger ?? useLogger()).child({ component: 'shared-memory' });
  }

  /**
   * Append an entry and return its id.
   */
  store(taskId: string, input: StoreMemoryInput): number {
    if (taskId.trim().length === 0) {
      throw new InvalidMemoryEntryError('taskId must not be empty');
    }
    const parsed = StoreInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new InvalidMemoryEntryError(`Invalid memory entry: ${issues.join('; ')}`);
    }

    const data = parsed.data;
    const entry: SharedMemoryEntry = Object.freeze({
      id: this.nextId++,
      taskId,
      category: data.category,
      title: data.title,
      content: data.content,
      tags: Object.freeze([...new Set(data.tags)]),
      author: data.author,
      timestamp: new Date().toISOString(),
      ...(data.metadata ? { metadata: Object.freeze({ ...data.metadata }) } : {}),
    });

    this.insert(entry);
    this.appendToDisk(entry);
    this.logger.debug({ id: entry.id, taskId, category: entry.category, author: entry.author }, 'Memory entry stored');
    return entry.id;
  }

  get(id: number): SharedMemoryEntry | undefined {
    return this.byId.get(id);
  }

  /**
   * Matching entries of a task, most recent first.
   */
  search(taskId: string, query: MemorySearchQuery = {}): SharedMemoryEntry[] {
    const text = query.text?.toLowerCase();
    const results: SharedMemoryEntry[] = [];

    for (const entry of this.newestFirst(taskId)) {
      if (query.category && entry.category !== query.category) continue;
      if (query.author && entry.author !== query.author) continue;
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

  /**
   * The `count` newest entries, most recent first.
   */
  getRecent(taskId: string, count: number): SharedMemoryEntry[] {
    return this.newestFirst(taskId).slice(0, Math.max(0, count));
  }

  /**
   * All entries of a task in insertion order.
   */
  getTaskHistory(taskId: string): SharedMemoryEntry[] {
    return [...(this.tasks.get(taskId) ?? [])];
  }

  /**
   * Count and latest entry for every category, in category order.
   */
  browseCategories(taskId: string): CategorySummary[] {
    const summaries = new Map<MemoryCategory, CategorySummary>(
      MEMORY_CATEGORIES.map((category) => [category, { category, count: 0 }]),
    );
    for (const entry of this.tasks.get(taskId) ?? []) {
      const summary = summaries.get(entry.category);
      if (summary) {
        summary.count++;
        summary.latest = entry;
      }
    }
    return [...summaries.values()];
  }

  /**
   * Entries grouped by author, authors in order of their first entry.
   */
  listByAgent(taskId: string): Map<string, SharedMemoryEntry[]> {
    const groups = new Map<string, SharedMemoryEntry[]>();
    for (const entry of this.tasks.get(taskId) ?? []) {
      const group = groups.get(entry.author);
      if (group) {
        group.push(entry);
      } else {
        groups.set(entry.author, [entry]);
      }
    }
    return groups;
  }

  getStats(taskId: string): MemoryStats {
    const byCategory: Record<MemoryCategory, number> = {
      research: 0,
      analysis: 0,
      forecast_data: 0,
      decisions: 0,
      progress: 0,
      errors: 0,
      coordination: 0,
    };
    const byAuthor: Record<string, number> = {};
    const entries = this.tasks.get(taskId) ?? [];
    for (const entry of entries) {
      byCategory[entry.category]++;
      byAuthor[entry.author] = (byAuthor[entry.author] ?? 0) + 1;
    }
    return { totalEntries: entries.length, byCategory, byAuthor };
  }

  /**
   * Write a task's entries as a JSON document. Returns the entry count.
   */
  async exportTask(taskId: string, filePath: string): Promise<number> {
    const entries = this.getTaskHistory(taskId);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(
      filePath,
      JSON.stringify({ taskId, exportedAt: new Date().toISOString(), entries }, null, 2),
      'utf-8',
    );
    this.logger.info({ taskId, filePath, entries: entries.length }, 'Task memory exported');
    return entries.length;
  }

  /**
   * Remove every entry of a task. Returns the number removed.
   */
  purge(taskId: string): number {
    const entries = this.tasks.get(taskId) ?? [];
    for (const entry of entries) {
      this.byId.delete(entry.id);
    }
    this.tasks.delete(taskId);

    if (this.persistDir) {
      fs.rmSync(this.taskFile(taskId), { force: true });
      this.writeMeta();
    }

    this.logger.info({ taskId, removed: entries.length }, 'Task memory purged');
    return entries.length;
  }

  taskIds(): string[] {
    return [...this.tasks.keys()];
  }

  /**
   * View bound to one task, handed to tools and subagents.
   */
  forTask(taskId: string): TaskMemory {
    return new TaskMemory(this, taskId);
  }

  /**
   * Open a store, reloading every persisted task when `persistDir` is set.
   */
  static async open(config: SharedMemoryStoreConfig = {}): Promise<SharedMemoryStore> {
    const store = new SharedMemoryStore(config);
    if (config.persistDir) {
      await store.load(config.persistDir);
    }
    return store;
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private insert(entry: SharedMemoryEntry): void {
    const entries = this.tasks.get(entry.taskId);
    if (entries) {
      entries.push(entry);
    } else {
      this.tasks.set(entry.taskId, [entry]);
    }
    this.byId.set(entry.id, entry);
  }

  private newestFirst(taskId: string): SharedMemoryEntry[] {
    return [...(this.tasks.get(taskId) ?? [])].reverse();
  }

  private taskFile(taskId: string): string {
    return path.join(this.persistDir ?? '.', `${encodeURIComponent(taskId)}.jsonl`);
  }

  private appendToDisk(entry: SharedMemoryEntry): void {
    if (!this.persistDir) return;
    fs.mkdirSync(this.persistDir, { recursive: true });
    fs.appendFileSync(this.taskFile(entry.taskId), `${JSON.stringify(entry)}\n`, 'utf-8');
  }

  private writeMeta(): void {
    if (!this.persistDir) return;
    fs.mkdirSync(this.persistDir, { recursive: true });
    fs.writeFileSync(
      path.join(this.persistDir, META_FILE),
      JSON.stringify({ highWaterMark: this.nextId - 1 }),
      'utf-8',
    );
  }

  private async load(dir: string): Promise<void> {
    if (!fs.existsSync(dir)) return;

    let highWaterMark = 0;
    const metaPath = path.join(dir, META_FILE);
    if (fs.existsSync(metaPath)) {
      const meta = MetaSchema.safeParse(parseJsonLine(await fs.promises.readFile(metaPath, 'utf-8')));
      if (meta.success) {
        highWaterMark = meta.data.highWaterMark;
      } else {
        this.logger.warn({ metaPath }, 'Ignoring malformed memory metadata');
      }
    }

    const loaded: SharedMemoryEntry[] = [];
    for (const file of await fs.promises.readdir(dir)) {
      if (!file.endsWith('.jsonl')) continue;
      const raw = await fs.promises.readFile(path.join(dir, file), 'utf-8');
      raw.split('\n').forEach((line, index) => {
        if (line.trim().length === 0) return;
        const parsed = PersistedEntrySchema.safeParse(parseJsonLine(line));
        if (!parsed.success) {
          this.logger.warn({ file, line: index + 1 }, 'Skipping malformed memory entry');
          return;
        }
        const { metadata, tags, ...rest } = parsed.data;
        loaded.push(
          Object.freeze({
            ...rest,
            tags: Object.freeze(tags),
            ...(metadata ? { metadata: Object.freeze(metadata) } : {}),
          }),
        );
      });
    }

    loaded.sort((a, b) => a.id - b.id);
    for (const entry of loaded) {
      this.insert(entry);
      highWaterMark = Math.max(highWaterMark, entry.id);
    }
    this.nextId = highWaterMark + 1;
    this.logger.info({ dir, entries: loaded.length, nextId: this.nextId }, 'Shared memory loaded');
  }
}

/**
 * One task's partition of the store.
 */
export class TaskMemory implements ITaskMemory {
  constructor(
    private readonly memory: SharedMemoryStore,
    readonly taskId: string,
  ) {}

  store(input: StoreMemoryInput): number {
    return this.memory.store(this.taskId, input);
  }

  /**
   * Entries of other tasks are invisible through this view.
   */
  get(id: number): SharedMemoryEntry | undefined {
    const entry = this.memory.get(id);
    return entry?.taskId === this.taskId ? entry : undefined;
  }

  search(query?: MemorySearchQuery): SharedMemoryEntry[] {
    return this.memory.search(this.taskId, query);
  }

  getRecent(count: number): SharedMemoryEntry[] {
    return this.memory.getRecent(this.taskId, count);
  }

  getHistory(): SharedMemoryEntry[] {
    return this.memory.getTaskHistory(this.taskId);
  }

  browseCategories(): CategorySummary[] {
    return this.memory.browseCategories(this.taskId);
  }

  listByAgent(): Map<string, SharedMemoryEntry[]> {
    return this.memory.listByAgent(this.taskId);
  }

  getStats(): MemoryStats {
    return this.memory.getStats(this.taskId);
  }

  exportTo(filePath: string): Promise<number> {
    return this.memory.exportTask(this.taskId, filePath);
  }

  purge(): number {
    return this.memory.purge(this.taskId);
  }
}
