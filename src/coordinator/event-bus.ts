// =============================================================================
// CoordinatorEventBus — Typed lifecycle and status events
// =============================================================================

export interface CoordinatorStatus {
  pendingCount: number;
  isProcessing: boolean;
  lastError: string | null;
  failedCount: number;
}

export interface CoordinatorEventMap {
  "status:changed": CoordinatorStatus;
  "analysis:started": { entryId: string; attempt: number };
  "analysis:completed": { entryId: string; patternCount: number };
  "analysis:failed": { entryId: string; attempt: number; error: Error };
  "analysis:retry-scheduled": { entryId: string; attempt: number; delayMs: number };
  "analysis:exhausted": { entryId: string; attempts: number; error: Error };
}

export type CoordinatorEventType = keyof CoordinatorEventMap;

export interface CoordinatorEvent<K extends CoordinatorEventType = CoordinatorEventType> {
  type: K;
  timestamp: number;
  data: CoordinatorEventMap[K];
}

export type CoordinatorEventHandler<K extends CoordinatorEventType> = (event: CoordinatorEvent<K>) => void;

export interface CoordinatorEventBusOptions {
  /** Maximum listeners allowed per event type (default: 100). */
  maxListenersPerEvent?: number;
  /** Called when a handler throws so the remaining handlers still run. Without it the error propagates out of emit(). */
  onHandlerError?: (error: unknown, type: CoordinatorEventType) => void;
}

type HandlerSets = {
  [K in CoordinatorEventType]?: Set<CoordinatorEventHandler<K>>;
};

export class CoordinatorEventBus {
  private listeners: HandlerSets = {};
  private readonly maxListenersPerEvent: number;
  private readonly onHandlerError?: (error: unknown, type: CoordinatorEventType) => void;

  constructor(options?: CoordinatorEventBusOptions) {
    this.maxListenersPerEvent = options?.maxListenersPerEvent ?? 100;
    this.onHandlerError = options?.onHandlerError;
  }

  /** Subscribe to an event type. Returns unsubscribe fn. */
  on<K extends CoordinatorEventType>(type: K, handler: CoordinatorEventHandler<K>): () => void {
    const set: Set<CoordinatorEventHandler<K>> = this.listeners[type] ?? new Set();
    if (set.size >= this.maxListenersPerEvent) {
      throw new Error(`CoordinatorEventBus: max listeners (${this.maxListenersPerEvent}) reached for "${type}"`);
    }
    set.add(handler);
    const listeners: { [P in K]?: Set<CoordinatorEventHandler<P>> } = this.listeners;
    listeners[type] = set;
    return () => this.off(type, handler);
  }

  off<K extends CoordinatorEventType>(type: K, handler: CoordinatorEventHandler<K>): void {
    const set: Set<CoordinatorEventHandler<K>> | undefined = this.listeners[type];
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) delete this.listeners[type];
  }

  /** Dispatch synchronously to every handler of `type`, auto-filling the timestamp. */
  emit<K extends CoordinatorEventType>(type: K, data: CoordinatorEventMap[K]): void {
    const set: Set<CoordinatorEventHandler<K>> | undefined = this.listeners[type];
    if (!set) return;
    const event: CoordinatorEvent<K> = { type, timestamp: Date.now(), data };
    for (const handler of [...set]) {
      try {
        handler(event);
      } catch (err) {
        if (!this.onHandlerError) throw err;
        this.onHandlerError(err, type);
      }
    }
  }

  listenerCount(type: CoordinatorEventType): number {
    return this.listeners[type]?.size ?? 0;
  }

  removeAllListeners(type?: CoordinatorEventType): void {
    if (type) delete this.listeners[type];
    else this.listeners = {};
  }
}
