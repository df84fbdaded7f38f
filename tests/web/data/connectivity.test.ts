import { ConnectivityMonitor, ConnectivityTransition } from '../../../src/web/data/connectivity';

describe('ConnectivityMonitor', () => {
  test('reports are applied only through the dispatcher', () => {
    const tasks: Array<() => void> = [];
    const monitor = new ConnectivityMonitor({ dispatch: task => tasks.push(task) });
    const seen: ConnectivityTransition[] = [];
    monitor.onTransition(t => seen.push(t));

    monitor.report(false);
    expect(monitor.isOnline()).toBe(true);
    expect(seen).toEqual([]);

    tasks.forEach(task => task());
    expect(monitor.isOnline()).toBe(false);
    expect(seen).toEqual([{ online: false, previous: true }]);
  });

  test('the default dispatcher defers to a microtask', async () => {
    const monitor = new ConnectivityMonitor({ initiallyOnline: false });
    monitor.report(true);
    expect(monitor.isOnline()).toBe(false);
    await Promise.resolve();
    expect(monitor.isOnline()).toBe(true);
  });

  test('repeating the current state is not a transition', () => {
    const monitor = new ConnectivityMonitor();
    const listener = jest.fn();
    const detach = monitor.onTransition(listener);
    monitor.setOnline(true);
    monitor.setOnline(false);
    detach();
    monitor.setOnline(true);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
