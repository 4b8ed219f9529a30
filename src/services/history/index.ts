export type { HistoryStore } from './HistoryStore';
export { HistorySyncService, type HistorySyncState } from './HistorySyncService';
export { MemoryHistoryStore, type MemoryHistoryStoreOptions } from './MemoryHistoryStore';
export { SupabaseHistoryStore } from './SupabaseHistoryStore';
export { SnapshotChannel, type ChannelEvent } from './SnapshotChannel';
export { HISTORY_COLUMNS, decodeSnapshot, toHistoryEntry, type HistoryRow } from './historyRow';
