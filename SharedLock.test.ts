import { Worker } from "node:worker_threads";
import { SharedLock } from "./SharedLock";

// Takes the lock in slot 0, reports it, writes slot 1 and releases after 200ms
const HOLD_THEN_WRITE = `
const { parentPort, workerData } = require("node:worker_threads");
const slots = new Int32Array(workerData);
while (Atomics.compareExchange(slots, 0, 0, 1) !== 0) Atomics.wait(slots, 0, 1);
parentPort.postMessage("locked");
setTimeout(() => {
  slots[1] = 42;
  Atomics.store(slots, 0, 0);
  Atomics.notify(slots, 0, 1);
}, 200);
`;

describe("SharedLock", () => {
  let slots: Int32Array;
  let lock: SharedLock;

  beforeEach(() => {
    slots = new Int32Array(new SharedArrayBuffer(8));
    lock = new SharedLock(slots, 0);
  });

  it("should not be taken twice", () => {
    expect(lock.tryLock()).toBe(true);
    expect(lock.tryLock()).toBe(false);
    lock.unlock();
    expect(lock.tryLock()).toBe(true);
  });

  it("should return the value of withLock's callback and release", () => {
    expect(lock.withLock(() => 7)).toBe(7);
    expect(slots[0]).toBe(0);
  });

  it("should release when the callback throws", () => {
    expect(() =>
      lock.withLock(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(lock.tryLock()).toBe(true);
  });

  it("should block until another thread releases", async () => {
    const worker = new Worker(HOLD_THEN_WRITE, { eval: true, workerData: slots.buffer });
    const exited = new Promise((resolve) => worker.once("exit", resolve));
    await new Promise((resolve) => worker.once("message", resolve));

    expect(lock.tryLock()).toBe(false);
    const seen = lock.withLock(() => slots[1]);
    expect(seen).toBe(42);
    await exited;
  });
});
