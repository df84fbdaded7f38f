import { useCallback, useSyncExternalStore } from 'react';
import type { InputValueKind, InputValueTypes } from '../../types';
import type { InputValueStore } from '../state/inputStore';
import type { RouteSession, RouteSnapshot } from '../core/routeSession';

/**
 * useInputValue
 * -------------
 * Reads one stored input value and re-renders when any store write happens.
 * The setter goes through the store, so offline writes are queued as usual.
 */
export const useInputValue = <K extends InputValueKind>(
  store: InputValueStore,
  kind: K,
  key: string,
  fallback?: InputValueTypes[K]
): [InputValueTypes[K], (next: InputValueTypes[K]) => void] => {
  const subscribe = useCallback((onChange: () => void) => store.subscribe(() => onChange()), [store]);
  // subscribe to the store version; the value itself is read on each render
  useSyncExternalStore(subscribe, () => store.version, () => store.version);
  const value = store.get(kind, key, fallback);
  const setValue = useCallback((next: InputValueTypes[K]) => store.set(kind, key, next), [store, kind, key]);
  return [value, setValue];
};

export const useRouteSnapshot = (session: RouteSession): RouteSnapshot => {
  const subscribe = useCallback((onChange: () => void) => session.subscribe(() => onChange()), [session]);
  const getSnapshot = useCallback(() => session.getSnapshot(), [session]);
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
};
