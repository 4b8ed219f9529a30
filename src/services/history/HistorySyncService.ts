/**
 * HistorySyncService — owns the published scan history of the signed-in user.
 *
 * At most one store subscription is alive at a time. The published list is
 * only ever the decoded form of the latest snapshot for the current user;
 * writes never patch it locally, their effect arrives with the next snapshot.
 *
 * Create one instance per process (see createNutriScanApp) and pass it to
 * whatever needs it.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { __DEV__ } from '../../config/env';
import {
  historyNamespace,
  namespacePath,
  type HistoryEntry,
  type HistoryErrorCode,
  type HistoryResult,
} from '../../types/models';
import { errorMessage } from '../../utils/helpers';
import type { IdentityProvider } from '../auth/IdentityProvider';
import type { HistoryStore } from './HistoryStore';
import { decodeSnapshot, normalizeLabel } from './historyRow';
import type { SnapshotChannel } from './SnapshotChannel';

export interface HistorySyncState {
  entries: readonly HistoryEntry[];
  /** User whose namespace is being listened to, null when idle. */
  activeUserId: string | null;
}

interface ActiveSubscription {
  userId: string;
  generation: number;
  channel: SnapshotChannel<unknown[]>;
  pump: Promise<void>;
}

function failure<T>(code: HistoryErrorCode, message: string): HistoryResult<T> {
  return { ok: false, code, message };
}

export class HistorySyncService {
  readonly state: StoreApi<HistorySyncState>;

  private active: ActiveSubscription | null = null;
  /** User whose snapshot produced the published entries; outlives unsubscribe(). */
  private entriesOwner: string | null = null;
  private generation = 0;
  private unbindIdentity: (() => void) | null = null;

  constructor(
    private readonly identity: IdentityProvider,
    private readonly store: HistoryStore,
  ) {
    this.state = createStore<HistorySyncState>()(() => ({ entries: [], activeUserId: null }));
  }

  getEntries(): readonly HistoryEntry[] {
    return this.state.getState().entries;
  }

  get isSubscribed(): boolean {
    return this.active !== null;
  }

  /** Observe the published list. Fires only when the list itself changes. */
  onChange(listener: (entries: readonly HistoryEntry[]) => void): () => void {
    return this.state.subscribe((next, prev) => {
      if (next.entries !== prev.entries) listener(next.entries);
    });
  }

  // ── Writes ───────────────────────────────────

  async create(userId: string, label: string | null | undefined, text: string): Promise<HistoryResult<string>> {
    if (!userId) {
      console.warn('[HistorySync] create called with an empty user id');
      return failure('invalid_argument', 'Invalid user id provided');
    }

    const current = this.identity.currentIdentity();
    if (current !== userId) {
      console.warn(`[HistorySync] User id ${userId} does not match signed-in user ${current ?? 'nil'}`);
      return failure('unauthorized', 'User id mismatch or not authenticated');
    }

    if (!text.trim()) {
      return failure('invalid_argument', 'Analysis text is required');
    }

    const ns = historyNamespace(userId);
    try {
      const id = await this.store.create(ns, {
        ownerId: userId,
        label: normalizeLabel(label),
        analysisText: text,
      });
      if (__DEV__) console.log(`[HistorySync] Saved ${id} to ${namespacePath(ns)}`);
      return { ok: true, value: id };
    } catch (e) {
      console.error(`[HistorySync] Saving to ${namespacePath(ns)} failed:`, errorMessage(e));
      return failure('transport_failure', errorMessage(e));
    }
  }

  async delete(entryId: string): Promise<HistoryResult<void>> {
    const userId = this.identity.currentIdentity();
    if (!userId) return failure('unauthorized', 'User not authenticated');
    if (!entryId) return failure('invalid_argument', 'Entry id is required');

    const ns = historyNamespace(userId);
    try {
      await this.store.delete(ns, entryId);
      if (__DEV__) console.log(`[HistorySync] Deleted ${entryId} from ${namespacePath(ns)}`);
      return { ok: true, value: undefined };
    } catch (e) {
      console.error(`[HistorySync] Deleting ${entryId} failed:`, errorMessage(e));
      return failure('transport_failure', errorMessage(e));
    }
  }

  /** Remove the whole history of the signed-in user with a single store call. */
  async clearAll(): Promise<HistoryResult<number>> {
    const userId = this.identity.currentIdentity();
    if (!userId) return failure('unauthorized', 'User not authenticated');

    const ns = historyNamespace(userId);
    try {
      const removed = await this.store.deleteAll(ns);
      if (__DEV__) console.log(`[HistorySync] Cleared ${removed} entries from ${namespacePath(ns)}`);
      return { ok: true, value: removed };
    } catch (e) {
      console.error(`[HistorySync] Clearing ${namespacePath(ns)} failed:`, errorMessage(e));
      return failure('transport_failure', errorMessage(e));
    }
  }

  // ── Subscription lifecycle ───────────────────

  /**
   * Start (or restart) listening for the current identity.
   * Without an identity the list is cleared and nothing listens.
   * The returned promise settles once the previous subscription is torn down,
   * and rejects when the store cannot open a new one.
   */
  async subscribe(): Promise<void> {
    const prior = this.detach();
    try {
      this.attach();
    } catch (e) {
      this.publishIdle(false);
      console.error('[HistorySync] Opening the listener failed:', errorMessage(e));
      throw e;
    } finally {
      await this.release(prior);
    }
  }

  /** Stop listening. The published list keeps its last value. */
  unsubscribe(): Promise<void> {
    const prior = this.detach();
    if (prior) {
      this.publishIdle(false);
      if (__DEV__) console.log(`[HistorySync] Stopped listening to ${namespacePath(historyNamespace(prior.userId))}`);
    }
    return this.release(prior);
  }

  /**
   * Follow the identity provider: every sign-in, sign-out or user switch
   * re-runs subscribe(). Calling it again keeps the single binding.
   */
  bindToIdentity(): () => void {
    if (!this.unbindIdentity) {
      this.unbindIdentity = this.identity.onIdentityChange(() => {
        this.subscribe().catch((e) => console.error('[HistorySync] Resubscribe failed:', errorMessage(e)));
      });
    }
    return () => this.unbind();
  }

  /** Unbind from identity changes and tear down any subscription. */
  dispose(): Promise<void> {
    this.unbind();
    return this.unsubscribe();
  }

  // ── Internals ────────────────────────────────

  private unbind(): void {
    this.unbindIdentity?.();
    this.unbindIdentity = null;
  }

  private attach(): void {
    const userId = this.identity.currentIdentity();
    if (!userId) {
      if (__DEV__) console.log('[HistorySync] No user signed in; history cleared');
      this.publishIdle(true);
      return;
    }

    const ns = historyNamespace(userId);
    const generation = ++this.generation;
    const channel = this.store.watch(ns);
    this.active = { userId, generation, channel, pump: this.pump(channel, generation, userId) };

    // A different user's entries must not linger while the first snapshot loads.
    const { entries } = this.state.getState();
    if (this.entriesOwner === userId || entries.length === 0) {
      this.state.setState({ activeUserId: userId });
    } else {
      this.entriesOwner = null;
      this.state.setState({ entries: [], activeUserId: userId });
    }
    if (__DEV__) console.log(`[HistorySync] Listening to ${namespacePath(ns)}`);
  }

  private publishIdle(clearEntries: boolean): void {
    const { entries } = this.state.getState();
    if (clearEntries) this.entriesOwner = null;
    this.state.setState(
      clearEntries && entries.length > 0 ? { entries: [], activeUserId: null } : { activeUserId: null },
    );
  }

  private detach(): ActiveSubscription | null {
    const prior = this.active;
    this.active = null;
    return prior;
  }

  private async release(prior: ActiveSubscription | null): Promise<void> {
    if (!prior) return;
    try {
      await prior.channel.close();
    } catch (e) {
      console.warn(`[HistorySync] Tearing down listener for ${prior.userId} failed:`, errorMessage(e));
    }
    await prior.pump;
  }

  private async pump(channel: SnapshotChannel<unknown[]>, generation: number, userId: string): Promise<void> {
    try {
      for await (const event of channel) {
        // Anything delivered after teardown belongs to a dead subscription.
        if (this.active?.generation !== generation) break;

        if (!event.ok) {
          console.warn(`[HistorySync] Listener error for ${userId}:`, event.error.message);
          continue;
        }

        const entries = decodeSnapshot(event.value, (index, reason) => {
          console.warn(`[HistorySync] Skipping undecodable record #${index} for ${userId}: ${reason}`);
        });
        this.entriesOwner = userId;
        this.state.setState({ entries });
        if (__DEV__) console.log(`[HistorySync] History updated for ${userId} with ${entries.length} items`);
      }
    } catch (e) {
      console.error(`[HistorySync] Listener loop for ${userId} failed:`, errorMessage(e));
    }
  }
}
