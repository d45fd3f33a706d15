import { Chip8Cpu } from "./Chip8Cpu";
import { Chip8Message, WorkerEvent, isChip8Message } from "./Chip8Message";
import { ControlBlock } from "./ControlBlock";
import { DiagnosticsLog } from "./DiagnosticsLog";
import { MachineState, PROGRAM_START } from "./MachineState";
import { toHex } from "./opcodes/types";

export const DEFAULT_TIMER_HZ = 60;

// Beyond this the pacing clock resynchronises instead of bursting to catch up
const MAX_PACING_LAG_MS = 100;

export interface ExecutionLoopOptions {
  state: MachineState; // initialised by the daemon before the loop starts
  control: ControlBlock;
  // Next queued message, if any. Same shape as worker_threads' receiveMessageOnPort
  receive: () => { message: unknown } | undefined;
  emit: (event: WorkerEvent) => void;
  programStart?: number;
  timerHz?: number;
  trace?: boolean;
  random?: () => number;
}

/**
 * The execution thread's side of the daemon. run() blocks the calling
 * thread until a stop is requested: it drains messages, steps the cpu while
 * running, ticks the timers and paces itself with Atomics waits on the wake
 * signal, so any message or stop request interrupts a wait.
 *
 * The loop is the only writer of machine state and writes it only while
 * holding the state lock.
 */
export class ExecutionLoop {
  private cpu: Chip8Cpu;
  private control: ControlBlock;
  private log: DiagnosticsLog;
  private receive: ExecutionLoopOptions["receive"];
  private emit: ExecutionLoopOptions["emit"];
  private programStart: number;
  private timerPeriodMs: number;
  private loadFailed: boolean = false;

  constructor(options: ExecutionLoopOptions) {
    this.control = options.control;
    this.receive = options.receive;
    this.emit = options.emit;
    this.programStart = options.programStart ?? PROGRAM_START;
    this.timerPeriodMs = 1000 / Math.max(1, options.timerHz ?? DEFAULT_TIMER_HZ);

    this.log = new DiagnosticsLog(undefined, (record) => this.emit({ type: "Log", record }));
    if (options.trace) this.log.setTrace(true);

    this.cpu = new Chip8Cpu({
      state: options.state,
      log: this.log,
      random: options.random,
      programStart: this.programStart,
    });
  }

  run(): void {
    const { control } = this;
    const wake = control.wake;
    const lock = control.stateLock;

    this.log.info("daemon", "starting cpu loop");
    this.emit({ type: "Started" });

    let stepDue = performance.now();
    let timerDue = stepDue + this.timerPeriodMs;

    while (!control.isStopRequested()) {
      control.countIteration();
      const seen = wake.current();
      this.drainMessages();
      if (control.isStopRequested()) break;

      if (control.getCpuState() !== "running") {
        // Blocks until a message arrives or stop is requested
        wake.wait(seen);
        stepDue = performance.now();
        timerDue = stepDue + this.timerPeriodMs;
        continue;
      }

      let now = performance.now();
      if (now >= timerDue) {
        lock.withLock(() => this.cpu.tickTimers());
        timerDue = now - timerDue > MAX_PACING_LAG_MS ? now + this.timerPeriodMs : timerDue + this.timerPeriodMs;
        now = performance.now();
      }

      if (this.cpu.isWaitingForKey()) {
        // Only the timers need this thread until a key arrives
        const timersActive = this.cpu.state.dt > 0 || this.cpu.state.st > 0;
        wake.wait(seen, timersActive ? timerDue - now : Infinity);
        stepDue = performance.now();
        continue;
      }

      if (now < stepDue) {
        wake.wait(seen, Math.min(stepDue, timerDue) - now);
        continue;
      }
      if (now - stepDue > MAX_PACING_LAG_MS) stepDue = now;

      control.countCycle();
      const result = lock.withLock(() => this.cpu.executeOpAtPc());
      if (result === "fault") {
        this.log.error("daemon", `cpu fault at ${toHex(this.cpu.state.pc, 3)}, pausing`);
        control.setCpuState("paused");
      }
      stepDue += 1000 / control.getClockSpeed();
    }

    this.log.info("daemon", "cpu loop stopped");
  }

  /**
   * Apply every queued message in FIFO order. A Stop message ends the drain;
   * whatever is queued behind it is never applied.
   */
  private drainMessages() {
    while (!this.control.isStopRequested()) {
      const received = this.receive();
      if (received === undefined) break;

      const msg = received.message;
      if (!isChip8Message(msg)) {
        this.log.warn("daemon", "ignoring malformed message");
        continue;
      }

      this.control.countMessage();
      try {
        this.control.stateLock.withLock(() => this.apply(msg));
      } catch (err) {
        this.log.error("daemon", `${msg.type} handler failed: ${describeError(err)}`);
      }
      this.emit({ type: "Handled" });
    }
  }

  private apply(msg: Chip8Message) {
    switch (msg.type) {
      case "LoadROM":
        this.log.info("daemon", `received rom: ${msg.data.length} bytes`);
        this.cpu.reset();
        this.loadFailed = !this.cpu.loadRom(msg.data, this.programStart);
        if (this.loadFailed) {
          this.log.warn(
            "daemon",
            `rom of ${msg.data.length} bytes does not fit at ${toHex(this.programStart, 3)}`,
          );
          this.control.setCpuState("paused");
        }
        break;

      case "SetStateRunning":
        if (this.loadFailed) {
          this.log.warn("daemon", "no rom loaded, staying paused");
          break;
        }
        this.log.info("daemon", "set cpu running");
        this.control.setCpuState("running");
        break;

      case "SetStateStopped":
        this.log.info("daemon", "set cpu paused");
        this.control.setCpuState("paused");
        break;

      case "SetKeyDown":
        this.cpu.keyDown(msg.key);
        break;

      case "SetKeyUp":
        this.cpu.keyUp(msg.key);
        break;

      case "Stop":
        this.log.info("daemon", "stop requested");
        this.control.requestStop();
        break;
    }
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
