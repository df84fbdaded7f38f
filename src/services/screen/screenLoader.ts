import type { DecodeIssue, Screen } from '../../types';
import { debugLog, warnLog } from '../debug';
import { decodeScreen, parseScreen } from './decoder';
import type { DecodeOptions } from './decoder';
import { readCachedScreen, StorageLike, writeCachedScreen } from './screenCache';
import { CURRENT_VERSION } from './versions';

export interface ScreenCandidate {
  name: string;
  /** Raw JSON for the screen, or null when this source has none. */
  read: () => string | null;
}

export interface CandidateFailure {
  name: string;
  message: string;
}

export type LoadScreenResult =
  | { ok: true; screen: Screen; source: string; fromCache: boolean; issues: DecodeIssue[]; failures: CandidateFailure[] }
  | { ok: false; failures: CandidateFailure[] };

export interface LoadScreenArgs {
  /** Newest first. */
  candidates: ScreenCandidate[];
  storage?: StorageLike;
  cacheVersion?: string;
  decodeOptions?: DecodeOptions;
}

const readCandidate = (candidate: ScreenCandidate): string | null => {
  try {
    return candidate.read();
  } catch (err) {
    warnLog('ScreenLoader', 'screen.readFailed', { name: candidate.name, message: err instanceof Error ? err.message : String(err) });
    return null;
  }
};

/**
 * Loads the first candidate that parses and decodes, caching its payload.
 * When none does, falls back to what was last cached under the first
 * candidate's name.
 */
export const loadScreen = (args: LoadScreenArgs): LoadScreenResult => {
  const cacheVersion = args.cacheVersion || String(CURRENT_VERSION);
  const failures: CandidateFailure[] = [];

  for (const candidate of args.candidates) {
    const raw = readCandidate(candidate);
    if (raw === null) {
      failures.push({ name: candidate.name, message: 'Screen not found' });
      continue;
    }
    const decoded = parseScreen(raw, args.decodeOptions);
    if (!decoded.ok) {
      warnLog('ScreenLoader', 'screen.decodeFailed', { name: candidate.name, message: decoded.error.message });
      failures.push({ name: candidate.name, message: decoded.error.message });
      continue;
    }
    if (args.storage) writeCachedScreen({ storage: args.storage, name: candidate.name, cacheVersion, payload: raw });
    debugLog('ScreenLoader', 'screen.loaded', { name: candidate.name, version: decoded.value.version });
    return { ok: true, screen: decoded.value, source: candidate.name, fromCache: false, issues: decoded.issues, failures };
  }

  const primary = args.candidates[0];
  if (args.storage && primary) {
    const cached = readCachedScreen({ storage: args.storage, name: primary.name, cacheVersion });
    if (cached !== null) {
      const decoded = decodeScreen(cached, args.decodeOptions);
      if (decoded.ok) {
        debugLog('ScreenLoader', 'screen.loadedFromCache', { name: primary.name });
        return { ok: true, screen: decoded.value, source: primary.name, fromCache: true, issues: decoded.issues, failures };
      }
      failures.push({ name: `${primary.name} (cached)`, message: decoded.error.message });
    }
  }

  warnLog('ScreenLoader', 'screen.unavailable', { tried: failures.map(f => f.name) });
  return { ok: false, failures };
};
