import type { PendingAction, SyncFailure, SyncResult } from '../../types';
import type { SyncConfig } from '../../config/appConfig';
import { DEFAULT_APP_CONFIG } from '../../config/appConfig';
import { debugLog, errorLog, warnLog } from '../../services/debug';
import type { Connectivity } from './connectivity';
import type { OfflineActionQueue } from './offlineQueue';

export interface SyncTransport {
  deliver(action: PendingAction): Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;

const DEFAULT_BACKOFF_MS = 100;

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return err === undefined || err === null ? 'unknown error' : String(err);
};

type DeliveryOutcome = { ok: true } | { ok: false; failure: SyncFailure };

export interface SyncServiceOptions {
  queue: OfflineActionQueue;
  transport: SyncTransport;
  connectivity: Connectivity;
  config?: SyncConfig;
  sleep?: Sleep;
}

/**
 * Replays queued actions in insertion order. Each action gets up to
 * `maxRetries` attempts with a linear backoff between them; the first action
 * that still fails stops the flush and everything from it onward goes back to
 * the head of the queue. Going offline between deliveries does the same.
 * Actions queued while a flush runs are delivered before it resolves, as long
 * as the device is still online.
 */
export class SyncService {
  private readonly queue: OfflineActionQueue;
  private readonly transport: SyncTransport;
  private readonly connectivity: Connectivity;
  private readonly config: SyncConfig;
  private readonly sleep: Sleep;
  private syncing = false;
  private lastSync: Date | null = null;

  constructor(options: SyncServiceOptions) {
    this.queue = options.queue;
    this.transport = options.transport;
    this.connectivity = options.connectivity;
    this.config = options.config || DEFAULT_APP_CONFIG.sync;
    this.sleep = options.sleep || defaultSleep;
  }

  get isSyncing(): boolean {
    return this.syncing;
  }

  get lastSyncedAt(): Date | null {
    return this.lastSync;
  }

  async flush(): Promise<SyncResult> {
    if (!this.connectivity.isOnline()) return { status: 'skipped', reason: 'offline' };
    if (this.syncing) return { status: 'skipped', reason: 'inProgress' };
    if (this.queue.size === 0) return { status: 'skipped', reason: 'empty' };

    this.syncing = true;
    let delivered = 0;
    try {
      // actions queued while this flush was running are picked up by the next pass
      while (this.queue.size > 0 && this.connectivity.isOnline()) {
        const batch = this.queue.drain();
        debugLog('SyncService', 'sync.start', { count: batch.length, delivered });
        const result = await this.deliverBatch(batch, delivered);
        if (result.status !== 'synced') return result;
        delivered = result.delivered;
      }
      this.lastSync = new Date();
      debugLog('SyncService', 'sync.done', { delivered, queued: this.queue.size });
      return { status: 'synced', delivered };
    } finally {
      this.syncing = false;
    }
  }

  private async deliverBatch(batch: PendingAction[], deliveredBefore: number): Promise<SyncResult> {
    for (let i = 0; i < batch.length; i += 1) {
      const delivered = deliveredBefore + i;
      if (!this.connectivity.isOnline()) {
        const remaining = batch.slice(i);
        this.queue.requeueFront(remaining);
        warnLog('SyncService', 'sync.interrupted', { delivered, remaining: remaining.length });
        return { status: 'interrupted', delivered, remaining: remaining.length };
      }
      const outcome = await this.deliverWithRetry(batch[i]);
      if (!outcome.ok) {
        const remaining = batch.slice(i);
        this.queue.requeueFront(remaining);
        errorLog('SyncService', 'sync.failed', {
          kind: outcome.failure.action.kind,
          attempts: outcome.failure.attempts,
          message: outcome.failure.message,
          delivered,
          remaining: remaining.length
        });
        return { status: 'failed', delivered, remaining: remaining.length, failure: outcome.failure };
      }
    }
    return { status: 'synced', delivered: deliveredBefore + batch.length };
  }

  private async deliverWithRetry(action: PendingAction): Promise<DeliveryOutcome> {
    const attempts = Math.max(1, this.config.maxRetries);
    const backoffMs = this.config.backoffMs > 0 ? this.config.backoffMs : DEFAULT_BACKOFF_MS;
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        await this.transport.deliver(action);
        return { ok: true };
      } catch (err) {
        lastError = err;
        warnLog('SyncService', 'sync.retry', { kind: action.kind, attempt, message: errorMessage(err) });
        if (attempt < attempts) await this.sleep(backoffMs * attempt);
      }
    }
    return {
      ok: false,
      failure: { type: 'sync', message: errorMessage(lastError), action, attempts }
    };
  }
}
