// packages/core/src/checkpoint/index.ts

export { byUpdatedDesc, countStatuses, summarize } from './checkpoint-store.js';
export type { CheckpointStore } from './checkpoint-store.js';
export { getSchemaVersion, openDatabase, runMigrations } from './database.js';
export { createCheckpointStore } from './factory.js';
export { FileCheckpointStore } from './file-store.js';
export { MemoryCheckpointStore } from './memory-store.js';
export { SqliteCheckpointStore } from './sqlite-store.js';
