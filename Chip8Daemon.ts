import { extname, join } from "node:path";
import { MessageChannel, MessagePort, Worker } from "node:worker_threads";
import {
  Chip8Message,
  Chip8MessageHandler,
  Chip8MessageType,
  WorkerEvent,
  WorkerInit,
  isMessageOf,
  isWorkerEvent,
} from "./Chip8Message";
import { Chip8Cpu } from "./Chip8Cpu";
import { ControlBlock, CpuState, DaemonStats } from "./ControlBlock";
import { DiagnosticsLog } from "./DiagnosticsLog";
import { DEFAULT_TIMER_HZ, describeError } from "./ExecutionLoop";
import {
  MachineState,
  PROGRAM_START,
  ScreenMode,
  createMachineState,
  isOnScreen,
  isValidKey,
  pixelIndex,
} from "./MachineState";

export type { CpuState, DaemonStats } from "./ControlBlock";
export { DEFAULT_TIMER_HZ } from "./ExecutionLoop";

export interface DaemonOptions {
  clockHz?: number; // instructions per second
  timerHz?: number; // delay/sound timer rate
  programStart?: number; // where LoadROM places the image
  trace?: boolean; // echo log records and instruction trace to the console
  log?: DiagnosticsLog;
}

export const DEFAULT_CLOCK_HZ = 500;

// Run from sources (ts-jest, tsx) the thread entry is a .ts file and needs the same loader
const SOURCE_EXTENSION = extname(__filename);
const WORKER_ENTRY = join(__dirname, `Chip8Worker${SOURCE_EXTENSION}`);
const WORKER_EXEC_ARGV = SOURCE_EXTENSION === ".ts" ? ["--require", "tsx/cjs"] : undefined;

type HandlerLists = Record<Chip8MessageType, Array<(msg: Chip8Message) => void>>;

/**
 * Owns the execution thread, passes messages to it and exposes read-only
 * snapshots of the machine state.
 *
 * The thread is the only writer of machine state, which lives in shared
 * memory. sendMessage() queues onto a MessagePort the thread drains; the
 * getters copy under the same lock the thread holds while writing.
 */
export class Chip8Daemon {
  readonly log: DiagnosticsLog;
  private state: MachineState;
  private inspector: Chip8Cpu; // read-only view for disassembly
  private control: ControlBlock;
  private port: MessagePort;
  private worker: Worker;
  private handlers: HandlerLists = {
    LoadROM: [],
    SetStateRunning: [],
    SetStateStopped: [],
    SetKeyDown: [],
    SetKeyUp: [],
    Stop: [],
  };
  // Sent but not yet applied, oldest first
  private inFlight: Chip8Message[] = [];
  private started: Promise<void>;
  private loop: Promise<void>;

  constructor(options: DaemonOptions = {}) {
    this.log = options.log ?? new DiagnosticsLog();
    if (options.trace) this.log.setTrace(true);

    const programStart = options.programStart ?? PROGRAM_START;
    this.state = createMachineState(undefined, programStart);
    this.inspector = new Chip8Cpu({ state: this.state, log: this.log, programStart });
    this.control = new ControlBlock();
    this.control.setClockSpeed(options.clockHz ?? DEFAULT_CLOCK_HZ);

    const channel = new MessageChannel();
    this.port = channel.port1;
    const init: WorkerInit = {
      state: this.state.buffer,
      control: this.control.buffer,
      port: channel.port2,
      programStart,
      timerHz: options.timerHz ?? DEFAULT_TIMER_HZ,
      trace: options.trace ?? false,
    };
    this.worker = new Worker(WORKER_ENTRY, {
      workerData: init,
      transferList: [channel.port2],
      execArgv: WORKER_EXEC_ARGV,
    });

    let markStarted = () => {};
    this.started = new Promise<void>((resolve) => {
      markStarted = () => resolve();
    });

    this.worker.on("message", (event: unknown) => {
      if (isWorkerEvent(event)) {
        this.onWorkerEvent(event, markStarted);
      } else {
        this.log.warn("daemon", "ignoring malformed event from cpu thread");
      }
    });
    this.worker.on("error", (err: unknown) => {
      this.log.error("daemon", `cpu loop terminated: ${describeError(err)}`);
    });
    this.loop = new Promise((resolve) => {
      this.worker.once("exit", () => {
        this.port.close();
        this.inFlight = [];
        markStarted();
        resolve();
      });
    });
  }

  private onWorkerEvent(event: WorkerEvent, markStarted: () => void) {
    switch (event.type) {
      case "Started":
        markStarted();
        break;
      case "Log":
        this.log.append(event.record);
        break;
      case "Handled": {
        const msg = this.inFlight.shift();
        if (msg !== undefined) this.runHandlers(msg);
        break;
      }
    }
  }

  private runHandlers(msg: Chip8Message) {
    for (const handler of this.handlers[msg.type]) {
      try {
        handler(msg);
      } catch (err) {
        this.log.error("daemon", `${msg.type} handler failed: ${describeError(err)}`);
      }
    }
  }

  /**
   * Queue a message for the execution thread and wake it.
   */
  sendMessage(message: Chip8Message): void {
    this.inFlight.push(message);
    this.port.postMessage(message);
    this.control.wake.notify();
  }

  /**
   * Register a handler for every message of `type`. Handlers run on the
   * daemon's thread once the execution thread has applied the message, in
   * registration order.
   */
  registerMessageHandler<T extends Chip8MessageType>(
    type: T,
    handler: Chip8MessageHandler<T>,
  ): void {
    this.handlers[type].push((msg) => {
      if (isMessageOf(msg, type)) handler(msg);
    });
  }

  /**
   * Queue a key press. Returns false, and queues nothing, for keys outside
   * 0x0-0xF.
   */
  setKeyDown(key: number): boolean {
    if (!isValidKey(key)) {
      this.log.warn("daemon", `ignoring invalid key ${key}`);
      return false;
    }
    this.sendMessage({ type: "SetKeyDown", key });
    return true;
  }

  setKeyUp(key: number): boolean {
    if (!isValidKey(key)) {
      this.log.warn("daemon", `ignoring invalid key ${key}`);
      return false;
    }
    this.sendMessage({ type: "SetKeyUp", key });
    return true;
  }

  setClockSpeed(hz: number): void {
    this.control.setClockSpeed(hz);
  }

  getClockSpeed(): number {
    return this.control.getClockSpeed();
  }

  /**
   * Resolves once the execution thread has entered its loop (or has exited).
   */
  ready(): Promise<void> {
    return this.started;
  }

  /**
   * Request the execution thread to exit and wait for it. Safe to call more
   * than once.
   */
  stop(): Promise<void> {
    this.control.requestStop();
    return this.loop;
  }

  join(): Promise<void> {
    return this.loop;
  }

  isStopped(): boolean {
    return this.control.isStopRequested();
  }

  // --- Query API ---

  private read<T>(fn: (state: MachineState) => T): T {
    return this.control.stateLock.withLock(() => fn(this.state));
  }

  getCpuState(): CpuState {
    return this.control.getCpuState();
  }

  getGpr(): Uint8Array {
    return this.read((state) => Uint8Array.from(state.v));
  }

  getI(): number {
    return this.read((state) => state.i);
  }

  getSp(): number {
    return this.read((state) => state.sp);
  }

  getPc(): number {
    return this.read((state) => state.pc);
  }

  getDt(): number {
    return this.read((state) => state.dt);
  }

  getSt(): number {
    return this.read((state) => state.st);
  }

  getStack(): Uint16Array {
    return this.read((state) => Uint16Array.from(state.stack));
  }

  getScreenMode(): ScreenMode {
    return this.read((state) => state.screenMode);
  }

  /**
   * The full 128x64 framebuffer, row-major, whatever the active mode.
   */
  getScreenFramebuffer(): boolean[] {
    return this.read((state) => Array.from(state.framebuffer, (pixel) => pixel === 1));
  }

  getScreenXY(x: number, y: number): boolean {
    return this.read((state) => isOnScreen(state, x, y) && state.framebuffer[pixelIndex(x, y)] === 1);
  }

  getKeys(): boolean[] {
    return this.read((state) => Array.from(state.keys, (key) => key === 1));
  }

  isWaitingForKey(): boolean {
    return this.read((state) => state.keyWait !== null);
  }

  dasmOp(address: number): string | undefined {
    return this.read(() => this.inspector.dasmOp(address));
  }

  getStats(): DaemonStats {
    return this.control.getStats();
  }
}
