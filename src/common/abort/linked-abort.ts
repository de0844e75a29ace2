export type AbortCause = 'timeout' | 'cancelled';

/**
 * An abort controller that fires when either the caller's signal aborts or
 * `timeoutMs` elapses, remembering which one came first.
 */
export class LinkedAbort {
  private readonly controller = new AbortController();

  private readonly timer: NodeJS.Timeout | null;

  private firedBy: AbortCause | null = null;

  constructor(
    private readonly parent?: AbortSignal,
    timeoutMs?: number,
  ) {
    this.timer =
      timeoutMs !== undefined && timeoutMs > 0
        ? setTimeout(() => this.fire('timeout'), timeoutMs)
        : null;

    if (parent?.aborted) {
      this.fire('cancelled');
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cause(): AbortCause | null {
    return this.firedBy;
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.fire('cancelled');
  };

  private fire(cause: AbortCause): void {
    if (this.firedBy) return;
    this.firedBy = cause;
    this.controller.abort();
  }
}
