const UNLOCKED = 0;
const LOCKED = 1;

/**
 * Mutex over one Int32 slot of a SharedArrayBuffer. Contended callers block
 * in Atomics.wait until the holder releases, so every thread sharing the
 * buffer sees the writes made under the lock.
 */
export class SharedLock {
  constructor(
    private slots: Int32Array,
    private index: number,
  ) {}

  tryLock(): boolean {
    return Atomics.compareExchange(this.slots, this.index, UNLOCKED, LOCKED) === UNLOCKED;
  }

  lock(): void {
    while (!this.tryLock()) {
      Atomics.wait(this.slots, this.index, LOCKED);
    }
  }

  unlock(): void {
    Atomics.store(this.slots, this.index, UNLOCKED);
    Atomics.notify(this.slots, this.index, 1);
  }

  withLock<T>(fn: () => T): T {
    this.lock();
    try {
      return fn();
    } finally {
      this.unlock();
    }
  }
}
