/**
 * SupabaseHistoryStore — scan history in a Postgres table, pushed over Realtime.
 *
 * watch() opens one Realtime channel filtered to the user's rows and
 * re-selects the ordered list on every change, so each event is a full
 * snapshot. A re-select that lands after a newer one is dropped.
 */
import { REALTIME_SUBSCRIBE_STATES, type SupabaseClient } from '@supabase/supabase-js';
import { __DEV__ } from '../../config/env';
import { namespacePath, type HistoryNamespace, type NewHistoryRecord } from '../../types/models';
import { errorMessage } from '../../utils/helpers';
import type { HistoryStore } from './HistoryStore';
import { HISTORY_COLUMNS, toInsertRow } from './historyRow';
import { SnapshotChannel } from './SnapshotChannel';

const DEFAULT_TABLE = 'scan_history';

export class SupabaseHistoryStore implements HistoryStore {
  private channelSeq = 0;

  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = DEFAULT_TABLE,
  ) {}

  async create(ns: HistoryNamespace, record: NewHistoryRecord): Promise<string> {
    const { data, error } = await this.client
      .from(this.table)
      .insert(toInsertRow(record))
      .select('id')
      .single();

    if (error) {
      throw new Error(`Saving to ${namespacePath(ns)} failed: ${error.message}`);
    }
    const id: unknown = data?.id;
    if (typeof id !== 'string' || !id) {
      throw new Error(`Saving to ${namespacePath(ns)} returned no id`);
    }
    return id;
  }

  async delete(ns: HistoryNamespace, recordId: string): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .delete()
      .eq('id', recordId)
      .eq('user_id', ns.userId);

    if (error) {
      throw new Error(`Deleting ${recordId} from ${namespacePath(ns)} failed: ${error.message}`);
    }
  }

  async deleteAll(ns: HistoryNamespace): Promise<number> {
    const { error, count } = await this.client
      .from(this.table)
      .delete({ count: 'exact' })
      .eq('user_id', ns.userId);

    if (error) {
      throw new Error(`Clearing ${namespacePath(ns)} failed: ${error.message}`);
    }
    return count ?? 0;
  }

  watch(ns: HistoryNamespace): SnapshotChannel<unknown[]> {
    const realtime = this.client.channel(`history:${ns.userId}:${++this.channelSeq}`);
    const snapshots = new SnapshotChannel<unknown[]>(async () => {
      const status = await this.client.removeChannel(realtime);
      if (status !== 'ok') console.warn(`[History] removeChannel for ${namespacePath(ns)} → ${status}`);
    });

    let requested = 0;
    let applied = 0;
    const refresh = () => {
      const request = ++requested;
      this.selectOrdered(ns).then(
        (rows) => {
          if (request < applied) return;
          applied = request;
          snapshots.push(rows);
        },
        (e: unknown) => snapshots.fail(e instanceof Error ? e : new Error(errorMessage(e))),
      );
    };

    realtime
      .on(
        'postgres_changes',
        { event: '*', schema: 'public', table: this.table, filter: `user_id=eq.${ns.userId}` },
        () => refresh(),
      )
      .subscribe((status, err) => {
        if (__DEV__) console.log(`[History] ${namespacePath(ns)} channel → ${status}`);
        // SUBSCRIBED also fires after a reconnect; re-select to catch up.
        if (status === REALTIME_SUBSCRIBE_STATES.SUBSCRIBED) {
          refresh();
        } else if (
          status === REALTIME_SUBSCRIBE_STATES.CHANNEL_ERROR ||
          status === REALTIME_SUBSCRIBE_STATES.TIMED_OUT
        ) {
          snapshots.fail(err ?? new Error(`Realtime channel ${status}`));
        }
      });

    return snapshots;
  }

  private async selectOrdered(ns: HistoryNamespace): Promise<unknown[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select(HISTORY_COLUMNS)
      .eq('user_id', ns.userId)
      .order('created_at', { ascending: false });

    if (error) {
      throw new Error(`Loading ${namespacePath(ns)} failed: ${error.message}`);
    }
    return data ?? [];
  }
}
