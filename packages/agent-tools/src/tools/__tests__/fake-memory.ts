import type {
  CategorySummary,
  MemoryCategory,
  MemorySearchQuery,
  MemoryStats,
  SharedMemoryEntry,
  StoreMemoryInput,
} from '@conclave/agent-contracts';
import { MEMORY_CATEGORIES } from '@conclave/agent-contracts';
import type { ITaskMemory } from '../../types.js';

export const FIXED_TIMESTAMP = '2026-01-01T00:00:00.000Z';

/**
 * In-process ITaskMemory for tool tests. Timestamps are fixed.
 */
export class FakeTaskMemory implements ITaskMemory {
  readonly entries: SharedMemoryEntry[] = [];
  exported: string[] = [];
  private nextId = 1;

  constructor(readonly taskId = 'task-1') {}

  store(input: StoreMemoryInput): number {
    const id = this.nextId++;
    this.entries.push({
      id,
      taskId: this.taskId,
      category: input.category,
      title: input.title,
      content: input.content,
      tags: [...(input.tags ?? [])],
      author: input.author,
      timestamp: FIXED_TIMESTAMP,
      ...(input.metadata ? { metadata: input.metadata } : {}),
    });
    return id;
  }

  get(id: number): SharedMemoryEntry | undefined {
    return this.entries.find((entry) => entry.id === id);
  }

  search(query: MemorySearchQuery = {}): SharedMemoryEntry[] {
    const text = query.text?.toLowerCase();
    const matches = [...this.entries].reverse().filter(
      (entry) =>
        (!query.category || entry.category === query.category) &&
        (!query.author || entry.author === query.author) &&
        (!query.tags || query.tags.length === 0 || query.tags.some((tag) => entry.tags.includes(tag))) &&
        (!text || `${entry.title}\n${entry.content}`.toLowerCase().includes(text)),
    );
    return query.limit === undefined ? matches : matches.slice(0, query.limit);
  }

  getRecent(count: number): SharedMemoryEntry[] {
    return [...this.entries].reverse().slice(0, count);
  }

  getHistory(): SharedMemoryEntry[] {
    return [...this.entries];
  }

  browseCategories(): CategorySummary[] {
    return MEMORY_CATEGORIES.map((category) => {
      const inCategory = this.entries.filter((entry) => entry.category === category);
      const latest = inCategory[inCategory.length - 1];
      return latest ? { category, count: inCategory.length, latest } : { category, count: 0 };
    });
  }

  listByAgent(): Map<string, SharedMemoryEntry[]> {
    const groups = new Map<string, SharedMemoryEntry[]>();
    for (const entry of this.entries) {
      groups.set(entry.author, [...(groups.get(entry.author) ?? []), entry]);
    }
    return groups;
  }

  getStats(): MemoryStats {
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
    for (const entry of this.entries) {
      byCategory[entry.category]++;
      byAuthor[entry.author] = (byAuthor[entry.author] ?? 0) + 1;
    }
    return { totalEntries: this.entries.length, byCategory, byAuthor };
  }

  async exportTo(filePath: string): Promise<number> {
    if (filePath.startsWith('/readonly/')) {
      throw new Error(`EACCES: permission denied, open '${filePath}'`);
    }
    this.exported.push(filePath);
    return this.entries.length;
  }

  purge(): number {
    const removed = this.entries.length;
    this.entries.length = 0;
    return removed;
  }
}
