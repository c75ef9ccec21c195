export type ReleaseGate = () => void;

interface Waiter {
  grant: (release: ReleaseGate) => void;
  reject: (err: unknown) => void;
}

/** FIFO mutex: one holder at a time, waiters admitted in arrival order. */
export class RequestGate {
  private held = false;
  private readonly waiters: Waiter[] = [];

  get isHeld(): boolean {
    return this.held;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<ReleaseGate> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }

    return new Promise<ReleaseGate>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(release);
        },
        reject: (err) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Reject every queued waiter. The current holder is unaffected. */
  rejectWaiting(err: unknown): void {
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }

  private createRelease(): ReleaseGate {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) next.grant(this.createRelease());
      else this.held = false;
    };
  }
}
