import { debugLog } from '../../services/debug';

export interface Connectivity {
  isOnline(): boolean;
}

/** Runs a task on the single writer that owns route state. */
export type Dispatcher = (task: () => void) => void;

export interface ConnectivityTransition {
  online: boolean;
  previous: boolean;
}

type TransitionListener = (transition: ConnectivityTransition) => void;

export interface ConnectivityMonitorOptions {
  initiallyOnline?: boolean;
  dispatch?: Dispatcher;
}

/**
 * Holds the online flag. Reachability observers call `report` from wherever
 * they run; the change is applied (and listeners fire) only through the
 * dispatcher, never on the observer's own turn.
 */
export class ConnectivityMonitor implements Connectivity {
  private online: boolean;
  private readonly dispatch: Dispatcher;
  private readonly listeners: Set<TransitionListener> = new Set();

  constructor(options: ConnectivityMonitorOptions = {}) {
    this.online = options.initiallyOnline !== undefined ? options.initiallyOnline : true;
    this.dispatch = options.dispatch || (task => queueMicrotask(task));
  }

  isOnline(): boolean {
    return this.online;
  }

  report(online: boolean): void {
    this.dispatch(() => this.setOnline(online));
  }

  /** Applies a change directly; callers must already be on the writer. */
  setOnline(online: boolean): void {
    if (online === this.online) return;
    const previous = this.online;
    this.online = online;
    debugLog('Connectivity', online ? 'connectivity.online' : 'connectivity.offline', { previous });
    this.listeners.forEach(l => l({ online, previous }));
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
