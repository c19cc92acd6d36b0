export { SharedMemoryStore, TaskMemory } from './shared-memory-store.js';
export type { SharedMemoryStoreConfig } from './shared-memory-store.js';
export { PersistentMemoryStore } from './persistent-memory-store.js';
export type { PersistentMemoryStoreConfig } from './persistent-memory-store.js';
