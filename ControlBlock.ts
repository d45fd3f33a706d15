import { SharedLock } from "./SharedLock";
import { Signal } from "./Signal";

export type CpuState = "paused" | "running";

export interface DaemonStats {
  cycles: number; // instruction steps attempted
  iterations: number; // loop iterations, including idle wake-ups
  messages: number; // messages processed
}

// Int32 slots of the shared control buffer
const SLOT_STATE_LOCK = 0; // guards the machine state
const SLOT_WAKE = 1; // bumped on every message and on stop
const SLOT_STOP = 2;
const SLOT_CPU_STATE = 3; // 0 = paused, 1 = running
const SLOT_CLOCK_HZ = 4;
const SLOT_CYCLES = 5;
const SLOT_ITERATIONS = 6;
const SLOT_MESSAGES = 7;
const SLOT_COUNT = 8;

export const CONTROL_BLOCK_BYTES = SLOT_COUNT * Int32Array.BYTES_PER_ELEMENT;

/**
 * Flags and counters shared between the daemon and its execution thread.
 * Every field is read and written with Atomics, so none of them needs the
 * state lock.
 */
export class ControlBlock {
  readonly buffer: SharedArrayBuffer;
  readonly stateLock: SharedLock;
  readonly wake: Signal;
  private slots: Int32Array;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(CONTROL_BLOCK_BYTES)) {
    if (buffer.byteLength !== CONTROL_BLOCK_BYTES) {
      throw new Error(`Control buffer must be ${CONTROL_BLOCK_BYTES} bytes, got ${buffer.byteLength}`);
    }
    this.buffer = buffer;
    this.slots = new Int32Array(buffer);
    this.stateLock = new SharedLock(this.slots, SLOT_STATE_LOCK);
    this.wake = new Signal(this.slots, SLOT_WAKE);
  }

  requestStop(): void {
    Atomics.store(this.slots, SLOT_STOP, 1);
    this.wake.notify();
  }

  isStopRequested(): boolean {
    return Atomics.load(this.slots, SLOT_STOP) === 1;
  }

  getCpuState(): CpuState {
    return Atomics.load(this.slots, SLOT_CPU_STATE) === 1 ? "running" : "paused";
  }

  setCpuState(state: CpuState): void {
    Atomics.store(this.slots, SLOT_CPU_STATE, state === "running" ? 1 : 0);
  }

  getClockSpeed(): number {
    return Atomics.load(this.slots, SLOT_CLOCK_HZ);
  }

  setClockSpeed(hz: number): void {
    Atomics.store(this.slots, SLOT_CLOCK_HZ, Math.max(1, Math.floor(hz)));
  }

  countCycle(): void {
    Atomics.add(this.slots, SLOT_CYCLES, 1);
  }

  countIteration(): void {
    Atomics.add(this.slots, SLOT_ITERATIONS, 1);
  }

  countMessage(): void {
    Atomics.add(this.slots, SLOT_MESSAGES, 1);
  }

  getStats(): DaemonStats {
    return {
      cycles: Atomics.load(this.slots, SLOT_CYCLES),
      iterations: Atomics.load(this.slots, SLOT_ITERATIONS),
      messages: Atomics.load(this.slots, SLOT_MESSAGES),
    };
  }
}
