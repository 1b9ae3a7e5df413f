type Release = () => void;

interface Waiter {
  grant(): void;
}

/**
 * FIFO mutual exclusion per key. Holders of different keys never wait on
 * each other; a key's entry exists exactly while someone holds it.
 */
export class KeyedLock {
  private readonly queues = new Map<string, Waiter[]>();

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  /** Number of callers waiting (not holding) on a key. */
  pending(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  acquire(key: string, signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const queue = this.queues.get(key);
    if (!queue) {
      this.queues.set(key, []);
      return Promise.resolve(this.releaser(key));
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = (): void => {
        const index = queue.indexOf(waiter);
        if (index >= 0) queue.splice(index, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.releaser(key));
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      queue.push(waiter);
    });
  }

  async run<T>(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(key: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const queue = this.queues.get(key);
      const next = queue?.shift();
      if (next) {
        next.grant();
      } else {
        this.queues.delete(key);
      }
    };
  }
}
