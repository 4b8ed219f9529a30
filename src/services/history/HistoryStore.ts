/**
 * HistoryStore — the remote document store capability, scoped per user.
 *
 * Implementations:
 *   - SupabaseHistoryStore  (production — PostgREST + Realtime)
 *   - MemoryHistoryStore    (tests / offline runs)
 */
import type { HistoryNamespace, NewHistoryRecord } from '../../types/models';
import type { SnapshotChannel } from './SnapshotChannel';

export interface HistoryStore {
  /**
   * Durably create a record. The store assigns id and created_at.
   * @returns the new record id
   */
  create(ns: HistoryNamespace, record: NewHistoryRecord): Promise<string>;

  delete(ns: HistoryNamespace, recordId: string): Promise<void>;

  /**
   * Remove every record in the namespace in one operation.
   * @returns how many records were removed
   */
  deleteAll(ns: HistoryNamespace): Promise<number>;

  /**
   * Open a push subscription. Every event is a complete snapshot of raw rows
   * ordered by created_at descending, or an error. Runs until closed.
   */
  watch(ns: HistoryNamespace): SnapshotChannel<unknown[]>;
}
