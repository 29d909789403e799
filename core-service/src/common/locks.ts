/**
 * In-process locks
 *
 * KeyedMutex serialises work per key (a user id, an e-mail, a permission id)
 * without blocking other keys. RwLock gives many concurrent readers or one
 * writer. Both are promise chains: nothing polls, and a waiter only waits for
 * work queued ahead of it on the same key.
 */

// ═══════════════════════════════════════════════════════════════════
// Keyed Mutex
// ═══════════════════════════════════════════════════════════════════

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}

// ═══════════════════════════════════════════════════════════════════
// Reader / Writer Lock
// ═══════════════════════════════════════════════════════════════════

interface Waiter {
  mode: 'read' | 'write';
  grant: () => void;
}

export class RwLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  private acquire(mode: Waiter['mode']): Promise<void> {
    // Readers queue behind a waiting writer so writers cannot starve
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.queue.push({ mode, grant: resolve });
    });
  }

  private canGrant(mode: Waiter['mode']): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0;
  }

  private take(mode: Waiter['mode']): void {
    if (mode === 'read') {
      this.readers++;
    } else {
      this.writing = true;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.mode)) return;
      this.queue.shift();
      this.take(next.mode);
      next.grant();
      if (next.mode === 'write') return;
    }
  }
}
