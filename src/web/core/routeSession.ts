import type {
  IntentState,
  Job,
  LangCode,
  LifecycleResult,
  LifecycleViolation,
  PendingAction,
  PendingIntent,
  ReasonCode,
  RouteStats,
  SyncResult
} from '../../types';
import type { AppConfig } from '../../config/appConfig';
import { DEFAULT_APP_CONFIG } from '../../config/appConfig';
import { completeJob, computeRouteStats, moveJob, replaceJob, skipJob, startJob, violation } from '../../domain/jobLifecycle';
import { cancelIntent, commitIntent, IDLE, pendingIntentOf, requestIntent } from '../../domain/reasonIntent';
import type { CommittedIntent } from '../../domain/reasonIntent';
import { debugLog, errorLog, warnLog } from '../../services/debug';
import type { ConnectivityMonitor } from '../data/connectivity';
import { OfflineActionQueue } from '../data/offlineQueue';
import { SyncService } from '../data/syncService';
import type { Sleep, SyncTransport } from '../data/syncService';
import { InputValueStore } from '../state/inputStore';
import type { BindingContext } from '../types';

export const DEMO_SIGNATURE = 'demo-signature';

export interface RouteSnapshot {
  jobs: readonly Job[];
  pendingIntent?: PendingIntent;
  stats: RouteStats;
  routeStartedAt: Date | null;
  queued: number;
}

export interface IntentRequested {
  intent: PendingIntent;
  replaced?: PendingIntent;
}

export interface RouteSessionOptions {
  jobs: Job[];
  connectivity: ConnectivityMonitor;
  transport: SyncTransport;
  config?: AppConfig;
  queue?: OfflineActionQueue;
  now?: () => Date;
  sleep?: Sleep;
  /** Starts the demo progression timer whenever the route starts. */
  demoMode?: boolean;
}

type Listener = (snapshot: RouteSnapshot) => void;
type Rejection = { ok: false; violation: LifecycleViolation };

/**
 * Owns the technician's route for one session: the ordered jobs, the reason
 * gate for skips and moves, the input store and the offline queue. Every
 * mutation goes through here so offline work is queued in the order it
 * happened.
 */
export class RouteSession {
  readonly store: InputValueStore;
  readonly queue: OfflineActionQueue;
  readonly sync: SyncService;

  private jobList: Job[];
  private intent: IntentState = IDLE;
  private routeStart: Date | null = null;
  private stopDemoTimer: (() => void) | null = null;
  private disposed = false;
  private cached: RouteSnapshot | null = null;
  private readonly listeners: Set<Listener> = new Set();
  private readonly connectivity: ConnectivityMonitor;
  private readonly config: AppConfig;
  private readonly now: () => Date;
  private readonly demoMode: boolean;
  private readonly detachers: Array<() => void>;

  constructor(options: RouteSessionOptions) {
    this.jobList = [...options.jobs];
    this.connectivity = options.connectivity;
    this.config = options.config || DEFAULT_APP_CONFIG;
    this.now = options.now || (() => new Date());
    this.demoMode = !!options.demoMode;
    this.queue = options.queue || new OfflineActionQueue();
    this.store = new InputValueStore({ queue: this.queue, connectivity: this.connectivity, now: this.now });
    this.sync = new SyncService({
      queue: this.queue,
      transport: options.transport,
      connectivity: this.connectivity,
      config: this.config.sync,
      sleep: options.sleep
    });

    this.detachers = [
      this.connectivity.onTransition(({ online, previous }) => {
        if (!online || previous) return;
        this.flush().catch(err => {
          errorLog('RouteSession', 'sync.unexpectedError', { message: err instanceof Error ? err.message : String(err) });
        });
      }),
      this.queue.subscribe(() => this.emit()),
      this.store.subscribe(() => this.emit())
    ];
  }

  // -------------------------------------------------------------------------
  // Read side
  // -------------------------------------------------------------------------

  get jobs(): readonly Job[] {
    return this.jobList;
  }

  get pendingIntent(): PendingIntent | undefined {
    return pendingIntentOf(this.intent);
  }

  get stats(): RouteStats {
    return computeRouteStats(this.jobList);
  }

  get isRouteStarted(): boolean {
    return this.routeStart !== null;
  }

  get routeStartedAt(): Date | null {
    return this.routeStart;
  }

  get isDemoRunning(): boolean {
    return this.stopDemoTimer !== null;
  }

  get language(): LangCode {
    return this.config.language;
  }

  /** Binding context in the session's language, for `resolveTree` and the binding helpers. */
  bindingContext(entity?: Job): BindingContext {
    return { entity, store: this.store, language: this.config.language };
  }

  getJob(jobId: string): Job | undefined {
    return this.jobList.find(job => job.id === jobId);
  }

  /** Stable between changes, for `useSyncExternalStore`. */
  getSnapshot(): RouteSnapshot {
    if (!this.cached) {
      this.cached = {
        jobs: this.jobList,
        pendingIntent: this.pendingIntent,
        stats: this.stats,
        routeStartedAt: this.routeStart,
        queued: this.queue.size
      };
    }
    return this.cached;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  start(jobId: string): LifecycleResult<Job> {
    if (this.disposed) return this.reject(violation('sessionDisposed', 'start', 'Session has been disposed'));
    const job = this.getJob(jobId);
    if (!job) return this.reject(violation('unknownJob', 'start', `No job with id ${jobId}`));
    const result = startJob(job, this.now());
    if (!result.ok) return this.reject(result);
    this.jobList = replaceJob(this.jobList, result.value);
    this.queueIfOffline({ kind: 'start', entityId: jobId });
    debugLog('RouteSession', 'job.started', { jobId });
    this.emit();
    return result;
  }

  complete(jobId: string, signature: string): LifecycleResult<Job> {
    if (this.disposed) return this.reject(violation('sessionDisposed', 'complete', 'Session has been disposed'));
    const job = this.getJob(jobId);
    if (!job) return this.reject(violation('unknownJob', 'complete', `No job with id ${jobId}`));
    const result = completeJob(job, signature, this.now());
    if (!result.ok) return this.reject(result);
    this.jobList = replaceJob(this.jobList, result.value);
    this.queueIfOffline({ kind: 'complete', entityId: jobId });
    debugLog('RouteSession', 'job.completed', { jobId });
    this.emit();
    return result;
  }

  requestSkip(jobId: string): LifecycleResult<IntentRequested> {
    if (this.disposed) return this.reject(violation('sessionDisposed', 'skip', 'Session has been disposed'));
    if (!this.getJob(jobId)) return this.reject(violation('unknownJob', 'skip', `No job with id ${jobId}`));
    return this.park({ kind: 'skip', jobId });
  }

  requestMove(fromIndex: number, toIndex: number): LifecycleResult<IntentRequested> {
    if (this.disposed) return this.reject(violation('sessionDisposed', 'move', 'Session has been disposed'));
    // validate against the current order without applying it
    const probe = moveJob(this.jobList, fromIndex, toIndex);
    if (!probe.ok) return this.reject(probe);
    return this.park({ kind: 'move', jobId: this.jobList[fromIndex].id, fromIndex, toIndex });
  }

  commitIntent(reason: ReasonCode | undefined): LifecycleResult<CommittedIntent> {
    if (this.disposed) return this.reject(violation('sessionDisposed', 'commit', 'Session has been disposed'));
    const committed = commitIntent(this.intent, reason);
    if (!committed.ok) return this.reject(committed);

    const { intent } = committed.value;
    if (intent.kind === 'skip') {
      const job = this.getJob(intent.jobId);
      if (job) {
        const skipped = skipJob(job);
        if (skipped.ok) this.jobList = replaceJob(this.jobList, skipped.value);
      }
      this.queueIfOffline({ kind: 'skip', entityId: intent.jobId, reason: committed.value.reason });
    } else {
      const moved = moveJob(this.jobList, intent.fromIndex, intent.toIndex);
      if (!moved.ok) return this.reject(moved);
      this.jobList = moved.value;
      this.queueIfOffline({
        kind: 'move',
        entityId: intent.jobId,
        value: `${intent.fromIndex}->${intent.toIndex}`,
        reason: committed.value.reason
      });
    }

    this.intent = committed.value.state;
    debugLog('RouteSession', 'intent.committed', { kind: intent.kind, jobId: intent.jobId, reason: committed.value.reason });
    this.emit();
    return committed;
  }

  cancelIntent(): PendingIntent | undefined {
    const { state, cancelled } = cancelIntent(this.intent);
    this.intent = state;
    if (cancelled) {
      debugLog('RouteSession', 'intent.cancelled', { kind: cancelled.kind, jobId: cancelled.jobId });
      this.emit();
    }
    return cancelled;
  }

  // -------------------------------------------------------------------------
  // Route
  // -------------------------------------------------------------------------

  startRoute(): void {
    if (this.disposed) return;
    const startedAt = this.now();
    this.routeStart = startedAt;
    this.queueIfOffline({ kind: 'routeStart', key: 'route_start', value: startedAt.toISOString() });
    debugLog('RouteSession', 'route.started', { at: startedAt.toISOString() });
    if (this.demoMode) this.startDemoProgression();
    this.emit();
  }

  endRoute(): void {
    if (this.disposed) return;
    const endedAt = this.now();
    this.routeStart = null;
    this.stopDemoProgression();
    this.queueIfOffline({ kind: 'routeEnd', key: 'route_end', value: endedAt.toISOString() });
    debugLog('RouteSession', 'route.ended', { at: endedAt.toISOString() });
    this.emit();
  }

  flush(): Promise<SyncResult> {
    return this.sync.flush();
  }

  /**
   * Walks the route on a timer: completes the in-progress job once it has run
   * long enough, otherwise starts the next pending job. Stops by itself when
   * nothing is left to progress.
   */
  startDemoProgression(): void {
    if (this.disposed || this.stopDemoTimer) return;
    const handle = setInterval(() => this.demoTick(), this.config.demo.tickMs);
    this.stopDemoTimer = () => clearInterval(handle);
    debugLog('RouteSession', 'demo.timerStarted', { tickMs: this.config.demo.tickMs });
  }

  stopDemoProgression(): void {
    if (!this.stopDemoTimer) return;
    this.stopDemoTimer();
    this.stopDemoTimer = null;
    debugLog('RouteSession', 'demo.timerStopped');
  }

  dispose(): void {
    if (this.disposed) return;
    this.stopDemoProgression();
    this.detachers.forEach(detach => detach());
    this.listeners.clear();
    this.disposed = true;
    debugLog('RouteSession', 'session.disposed');
  }

  private demoTick(): void {
    const active = this.jobList.find(job => job.status === 'inProgress');
    if (active) {
      const elapsed = active.startTime ? this.now().getTime() - active.startTime.getTime() : 0;
      if (elapsed >= this.config.demo.completeAfterMs) this.complete(active.id, DEMO_SIGNATURE);
    } else {
      const next = this.jobList.find(job => job.status === 'pending');
      if (next) this.start(next.id);
    }
    const hasWork = this.jobList.some(job => job.status === 'pending' || job.status === 'inProgress');
    if (!hasWork) this.stopDemoProgression();
  }

  private park(intent: PendingIntent): LifecycleResult<IntentRequested> {
    const { state, replaced } = requestIntent(this.intent, intent);
    this.intent = state;
    if (replaced) {
      warnLog('RouteSession', 'intent.replaced', { previous: replaced.kind, previousJobId: replaced.jobId, next: intent.kind });
    }
    debugLog('RouteSession', 'intent.requested', { kind: intent.kind, jobId: intent.jobId });
    this.emit();
    return { ok: true, value: { intent, replaced } };
  }

  private queueIfOffline(action: Omit<PendingAction, 'timestamp'>): void {
    if (this.connectivity.isOnline()) return;
    this.queue.enqueue({ ...action, timestamp: this.now() });
  }

  private reject(result: Rejection): Rejection {
    const v = result.violation;
    warnLog('RouteSession', 'lifecycle.rejected', { code: v.code, operation: v.operation, jobId: v.jobId || null, status: v.status || null });
    return result;
  }

  private emit(): void {
    this.cached = null;
    if (this.disposed) return;
    const snapshot = this.getSnapshot();
    this.listeners.forEach(l => l(snapshot));
  }
}
