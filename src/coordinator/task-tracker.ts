// =============================================================================
// TaskTracker — Owns detached analysis tasks and backoff timers
// =============================================================================

/**
 * Keeps a handle on every fire-and-forget promise and pending timer so a
 * caller can wait for the coordinator to go quiet, or cancel what is queued.
 */
export class TaskTracker {
  private readonly tasks = new Set<Promise<void>>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private idleWaiters: Array<() => void> = [];

  /** Track a task that must never reject; it is removed once settled. */
  spawn(task: () => Promise<void>): void {
    const running = task().finally(() => {
      this.tasks.delete(running);
      this.notifyIfIdle();
    });
    this.tasks.add(running);
  }

  /** Run `callback` after `delayMs`; the timer counts as pending work until it fires. */
  schedule(delayMs: number, callback: () => void): NodeJS.Timeout {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      try {
        callback();
      } finally {
        this.notifyIfIdle();
      }
    }, delayMs);
    this.timers.add(timer);
    return timer;
  }

  cancel(timer: NodeJS.Timeout): void {
    if (!this.timers.delete(timer)) return;
    clearTimeout(timer);
    this.notifyIfIdle();
  }

  /** Cancel every pending timer. Running tasks are left to finish. */
  cancelAll(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.notifyIfIdle();
  }

  get activeTasks(): number {
    return this.tasks.size;
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  get isIdle(): boolean {
    return this.tasks.size === 0 && this.timers.size === 0;
  }

  /** Resolves once no task is running and no timer is pending. */
  whenIdle(): Promise<void> {
    if (this.isIdle) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private notifyIfIdle(): void {
    if (!this.isIdle) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
