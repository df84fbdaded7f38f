import type { Job } from './types';
import { loadAppConfig } from './config/appConfig';
import type { AppConfig, EnvSource } from './config/appConfig';
import { setDebugEnabled, warnLog } from './services/debug';
import { ConnectivityMonitor } from './web/data/connectivity';
import type { Dispatcher } from './web/data/connectivity';
import type { Sleep, SyncTransport } from './web/data/syncService';
import { RouteSession } from './web/core/routeSession';

export * from './types';
export { loadAppConfig, validateAppConfig, DEFAULT_APP_CONFIG } from './config/appConfig';
export type { AppConfig, SyncConfig, DemoConfig, EnvSource } from './config/appConfig';
export { ComponentValidator } from './config/ComponentValidator';
export { debugLog, warnLog, errorLog, isDebugEnabled, setDebugEnabled } from './services/debug';
export {
  ALL_KINDS,
  isComponentKind,
  kindCategory,
  isContainerKind,
  isInputKind,
  isDelegatedKind,
  walkDescriptor,
  findDescriptor,
  countDescriptors
} from './services/screen/descriptor';
export { decodeComponent, decodeScreen, parseScreen, encodeComponent, encodeScreen } from './services/screen/decoder';
export { SUPPORTED_VERSIONS, CURRENT_VERSION, isVersionSupported, getCompatibilityMode } from './services/screen/versions';
export { buildScreenCacheKey, readCachedScreen, writeCachedScreen, MemoryStorage } from './services/screen/screenCache';
export type { StorageLike } from './services/screen/screenCache';
export { loadScreen } from './services/screen/screenLoader';
export type { ScreenCandidate, LoadScreenResult } from './services/screen/screenLoader';
export { startJob, completeJob, skipJob, moveJob, computeRouteStats } from './domain/jobLifecycle';
export { requestIntent, commitIntent, cancelIntent, isReasonCode } from './domain/reasonIntent';
export { InputValueStore } from './web/state/inputStore';
export { OfflineActionQueue } from './web/data/offlineQueue';
export { ConnectivityMonitor } from './web/data/connectivity';
export { SyncService } from './web/data/syncService';
export type { SyncTransport, Sleep } from './web/data/syncService';
export { makeContextKey, resolveTemplate } from './web/rules/template';
export { valueForKey, resolveText, resolveLabel, isConditionMet } from './web/rules/bindings';
export { resolveTree } from './web/core/resolveTree';
export type { ResolvedNode } from './web/core/resolveTree';
export { RouteSession } from './web/core/routeSession';
export type { RouteSnapshot } from './web/core/routeSession';
export { createActionHandlers, dispatchAction } from './web/core/actions';
export { useInputValue, useRouteSnapshot } from './web/react/hooks';
export { tSystem } from './web/systemStrings';
export type { BindingContext } from './web/types';

export interface FieldRouteRuntime {
  config: AppConfig;
  connectivity: ConnectivityMonitor;
  session: RouteSession;
}

/**
 * Wires a session from environment configuration. Configuration errors are
 * logged as warnings; they do not stop the session from starting.
 */
export function createFieldRoute(args: {
  jobs: Job[];
  transport: SyncTransport;
  env?: EnvSource;
  initiallyOnline?: boolean;
  dispatch?: Dispatcher;
  sleep?: Sleep;
  demoMode?: boolean;
}): FieldRouteRuntime {
  const { config, errors } = loadAppConfig(args.env || process.env);
  errors.forEach(message => warnLog('FieldRoute', 'config.invalid', { message }));
  if (config.debug) setDebugEnabled(true);
  const connectivity = new ConnectivityMonitor({ initiallyOnline: args.initiallyOnline, dispatch: args.dispatch });
  const session = new RouteSession({
    jobs: args.jobs,
    connectivity,
    transport: args.transport,
    config,
    sleep: args.sleep,
    demoMode: args.demoMode
  });
  return { config, connectivity, session };
}
