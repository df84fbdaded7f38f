import { OfflineActionQueue } from '../../../src/web/data/offlineQueue';
import type { PendingAction } from '../../../src/types';

const action = (kind: PendingAction['kind'], entityId?: string): PendingAction => ({
  kind,
  entityId,
  timestamp: new Date('2025-09-25T08:00:00.000Z')
});

describe('OfflineActionQueue', () => {
  test('drain returns actions in insertion order and empties the queue', () => {
    const queue = new OfflineActionQueue();
    queue.enqueue(action('start', 'A'));
    queue.enqueue(action('textInput'));
    queue.enqueue(action('complete', 'A'));

    expect(queue.size).toBe(3);
    expect(queue.drain().map(a => a.kind)).toEqual(['start', 'textInput', 'complete']);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  test('peek does not consume', () => {
    const queue = new OfflineActionQueue();
    queue.enqueue(action('skip', 'B'));
    const snapshot = queue.peek();
    snapshot.pop();
    expect(queue.size).toBe(1);
  });

  test('requeueFront puts undelivered actions ahead of newer ones', () => {
    const queue = new OfflineActionQueue();
    queue.enqueue(action('routeEnd'));
    queue.requeueFront([action('start', 'A'), action('complete', 'A')]);
    expect(queue.peek().map(a => a.kind)).toEqual(['start', 'complete', 'routeEnd']);
  });

  test('subscribers receive the size after each change', () => {
    const queue = new OfflineActionQueue();
    const sizes: number[] = [];
    queue.subscribe(size => sizes.push(size));
    queue.enqueue(action('start', 'A'));
    queue.enqueue(action('move', 'A'));
    queue.drain();
    queue.drain();
    queue.requeueFront([]);
    expect(sizes).toEqual([1, 2, 0]);
  });
});
