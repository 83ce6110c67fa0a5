export { createDbClient, ensureSchema, PgRecordStore } from './db/index.js';
export type { Database, DbClient, Sql } from './db/index.js';
export { InMemoryRecordStore } from './store/in-memory-record-store.js';
export type { RecordSeed } from './store/in-memory-record-store.js';
export { default as storePlugin } from './store/store-plugin.js';
export type { StorePluginOptions } from './store/store-plugin.js';
export { loadConfig, ConfigError, DEFAULT_PORT, DEFAULT_HOST, DEFAULT_DATABASE_URL } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
