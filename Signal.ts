export type WaitResult = "ok" | "not-equal" | "timed-out";

/**
 * Wake-up signal for the execution thread, backed by a counter in shared
 * memory. A waiter reads current() before checking its condition and then
 * passes that value to wait(); a notify() in between makes the wait return
 * at once, so no wake-up is lost.
 */
export class Signal {
  constructor(
    private slots: Int32Array,
    private index: number,
  ) {}

  current(): number {
    return Atomics.load(this.slots, this.index);
  }

  notify(): void {
    Atomics.add(this.slots, this.index, 1);
    Atomics.notify(this.slots, this.index);
  }

  /**
   * Block the calling thread until notify() moves the counter away from
   * `seen`, or until `timeoutMs` passes.
   */
  wait(seen: number, timeoutMs: number = Infinity): WaitResult {
    return Atomics.wait(this.slots, this.index, seen, Math.max(0, timeoutMs));
  }
}
