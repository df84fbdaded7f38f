import { debugLog } from '../debug';

export interface StorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

const CACHE_PREFIX = 'fr.screen.v1::';

const normalizeKeyPart = (value: unknown): string => (value == null ? '' : String(value)).trim();

const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const buildScreenCacheKey = (name: string, cacheVersion: string): string =>
  `${CACHE_PREFIX}${normalizeKeyPart(cacheVersion)}::${normalizeKeyPart(name)}`;

/**
 * Returns the parsed payload cached for a screen, or null. An entry that no
 * longer parses is evicted.
 */
export const readCachedScreen = (args: { storage: StorageLike; name: string; cacheVersion: string }): unknown => {
  const key = buildScreenCacheKey(args.name, args.cacheVersion);
  let raw: string | null;
  try {
    raw = args.storage.getItem(key);
  } catch (err) {
    debugLog('ScreenCache', 'cache.readFailed', { key, message: describeError(err) });
    return null;
  }
  if (!raw) {
    debugLog('ScreenCache', 'cache.miss', { key });
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    debugLog('ScreenCache', 'cache.hit', { key });
    return parsed && typeof parsed === 'object' ? parsed : null;
  } catch (err) {
    debugLog('ScreenCache', 'cache.evicted', { key, message: describeError(err) });
    try {
      args.storage.removeItem(key);
    } catch (removeErr) {
      debugLog('ScreenCache', 'cache.evictFailed', { key, message: describeError(removeErr) });
    }
    return null;
  }
};

/** Quota or privacy-mode failures are logged and otherwise ignored. */
export const writeCachedScreen = (args: { storage: StorageLike; name: string; cacheVersion: string; payload: string }): boolean => {
  const key = buildScreenCacheKey(args.name, args.cacheVersion);
  try {
    args.storage.setItem(key, args.payload);
    return true;
  } catch (err) {
    debugLog('ScreenCache', 'cache.writeFailed', { key, message: describeError(err) });
    return false;
  }
};

/** In-memory storage for hosts without a persistent one. */
export class MemoryStorage implements StorageLike {
  private readonly entries = new Map<string, string>();

  getItem(key: string): string | null {
    const value = this.entries.get(key);
    return value === undefined ? null : value;
  }

  setItem(key: string, value: string): void {
    this.entries.set(key, value);
  }

  removeItem(key: string): void {
    this.entries.delete(key);
  }
}
