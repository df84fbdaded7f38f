import type { PendingAction } from '../../types';
import { debugLog } from '../../services/debug';

export interface ActionSink {
  enqueue(action: PendingAction): void;
}

type QueueListener = (size: number) => void;

/**
 * Ordered log of mutations already applied locally and not yet acknowledged
 * remotely. Actions are never merged: two writes to the same key replay as two
 * writes, in the order they happened.
 */
export class OfflineActionQueue implements ActionSink {
  private actions: PendingAction[] = [];
  private readonly listeners: Set<QueueListener> = new Set();

  get size(): number {
    return this.actions.length;
  }

  enqueue(action: PendingAction): void {
    this.actions.push(action);
    debugLog('OfflineQueue', 'queue.enqueue', { kind: action.kind, key: action.key || null, size: this.actions.length });
    this.notify();
  }

  /** Returns every queued action in insertion order and empties the queue. */
  drain(): PendingAction[] {
    const drained = this.actions;
    this.actions = [];
    debugLog('OfflineQueue', 'queue.drain', { count: drained.length });
    if (drained.length) this.notify();
    return drained;
  }

  /** Puts undelivered actions back ahead of anything queued since the drain. */
  requeueFront(actions: PendingAction[]): void {
    if (!actions.length) return;
    this.actions = [...actions, ...this.actions];
    debugLog('OfflineQueue', 'queue.requeue', { count: actions.length, size: this.actions.length });
    this.notify();
  }

  peek(): PendingAction[] {
    return [...this.actions];
  }

  subscribe(listener: QueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const size = this.actions.length;
    this.listeners.forEach(l => l(size));
  }
}
