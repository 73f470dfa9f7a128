// Persistence layer - ledger stores, sessions and connections

export { getPool, closePool, testConnection, withTransaction } from './database';
export { getRedisClient, closeRedis, testRedisConnection } from './redis';
export { DEFAULT_HISTORY_LIMIT, MAX_WALLET_NAME_LENGTH } from './LedgerStore';
export type { LedgerStore } from './LedgerStore';
export { InMemoryLedgerStore } from './InMemoryLedgerStore';
export { PostgresLedgerStore } from './PostgresLedgerStore';
export { SecretBox } from './SecretBox';
export { SessionStore, MemoryKeyValue } from './SessionStore';
export type { KeyValueBackend } from './SessionStore';
export { runMigrations, LEGACY_WALLET_NAME } from './migrations';
export type { MigrationResult } from './migrations';
