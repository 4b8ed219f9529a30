/**
 * MemoryHistoryStore — in-process HistoryStore for tests and offline runs.
 *
 * Snapshots are pushed synchronously after every write, newest first.
 * setOffline() makes writes reject the way a dropped connection would.
 */
import { randomUUID } from 'node:crypto';
import type { HistoryNamespace, NewHistoryRecord } from '../../types/models';
import type { HistoryStore } from './HistoryStore';
import { toInsertRow, type HistoryRow } from './historyRow';
import { SnapshotChannel } from './SnapshotChannel';

export interface MemoryHistoryStoreOptions {
  now?: () => Date;
  idFactory?: () => string;
}

export class MemoryHistoryStore implements HistoryStore {
  private readonly rows = new Map<string, HistoryRow[]>();
  private readonly watchers = new Map<string, Set<SnapshotChannel<unknown[]>>>();
  private readonly now: () => Date;
  private readonly idFactory: () => string;
  private offlineError: Error | null = null;

  constructor(options: MemoryHistoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? randomUUID;
  }

  async create(ns: HistoryNamespace, record: NewHistoryRecord): Promise<string> {
    this.assertOnline();
    const row: HistoryRow = {
      ...toInsertRow(record),
      id: this.idFactory(),
      created_at: this.now().toISOString(),
    };
    this.rowsFor(ns).push(row);
    this.emit(ns);
    return row.id;
  }

  async delete(ns: HistoryNamespace, recordId: string): Promise<void> {
    this.assertOnline();
    const rows = this.rowsFor(ns);
    const index = rows.findIndex((row) => row.id === recordId);
    if (index < 0) return;
    rows.splice(index, 1);
    this.emit(ns);
  }

  async deleteAll(ns: HistoryNamespace): Promise<number> {
    this.assertOnline();
    const removed = this.rowsFor(ns).length;
    this.rows.set(ns.userId, []);
    if (removed > 0) this.emit(ns);
    return removed;
  }

  watch(ns: HistoryNamespace): SnapshotChannel<unknown[]> {
    const watchers = this.watchers.get(ns.userId) ?? new Set<SnapshotChannel<unknown[]>>();
    this.watchers.set(ns.userId, watchers);

    const channel: SnapshotChannel<unknown[]> = new SnapshotChannel<unknown[]>(() => {
      watchers.delete(channel);
    });
    watchers.add(channel);
    channel.push(this.snapshot(ns));
    return channel;
  }

  /** Records currently stored for a namespace, newest first. */
  snapshot(ns: HistoryNamespace): HistoryRow[] {
    // Reverse first so equal timestamps still list the later insert first.
    return [...this.rowsFor(ns)]
      .reverse()
      .sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));
  }

  /** Number of open subscriptions on a namespace. */
  watcherCount(ns: HistoryNamespace): number {
    return this.watchers.get(ns.userId)?.size ?? 0;
  }

  setOffline(error: Error | null): void {
    this.offlineError = error;
  }

  /** Push a transport error to every open subscription of a namespace. */
  failWatchers(ns: HistoryNamespace, error: Error): void {
    for (const channel of this.watchers.get(ns.userId) ?? []) channel.fail(error);
  }

  private rowsFor(ns: HistoryNamespace): HistoryRow[] {
    let rows = this.rows.get(ns.userId);
    if (!rows) {
      rows = [];
      this.rows.set(ns.userId, rows);
    }
    return rows;
  }

  private emit(ns: HistoryNamespace): void {
    const watchers = this.watchers.get(ns.userId);
    if (!watchers || watchers.size === 0) return;
    const snapshot = this.snapshot(ns);
    for (const channel of watchers) channel.push(snapshot);
  }

  private assertOnline(): void {
    if (this.offlineError) throw this.offlineError;
  }
}
