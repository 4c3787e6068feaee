// packages/core/src/engine/cancellation.ts: Cooperative cancellation

export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | undefined;
  private callbacks = new Set<() => void>();

  /**
   * Signal cancellation. Idempotent: only the first call records a reason
   * and runs callbacks. Every callback runs even if an earlier one throws;
   * the errors are rethrown together afterwards.
   */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    const errors: unknown[] = [];
    for (const cb of this.callbacks) {
      try {
        cb();
      } catch (err) {
        errors.push(err);
      }
    }
    this.callbacks.clear();
    if (errors.length > 0) {
      throw new AggregateError(errors, 'Cancellation callbacks failed');
    }
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  /** Throw if already cancelled. Call before starting expensive work. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(
        this.cancelReason ? `Operation was cancelled (${this.cancelReason})` : 'Operation was cancelled',
      );
    }
  }

  /**
   * Register a callback to run on cancellation.
   * Deduplicated by reference. Fires immediately if already cancelled.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /**
   * Resolve after `ms`, or earlier on cancellation.
   * Returns true if the full delay elapsed, false if cancelled.
   */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.cancelled) {
        resolve(false);
        return;
      }

      let timer: ReturnType<typeof setTimeout> | undefined;
      const onCancelHandler = () => {
        if (timer !== undefined) clearTimeout(timer);
        resolve(false);
      };

      timer = setTimeout(() => {
        this.callbacks.delete(onCancelHandler);
        resolve(true);
      }, ms);

      this.onCancel(onCancelHandler);
    });
  }
}

export class CancellationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CancellationError';
  }
}
