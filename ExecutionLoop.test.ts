import { WorkerEvent } from "./Chip8Message";
import { ControlBlock } from "./ControlBlock";
import { ExecutionLoop } from "./ExecutionLoop";
import { MachineState, createMachineState } from "./MachineState";

describe("ExecutionLoop", () => {
  let state: MachineState;
  let control: ControlBlock;
  let events: WorkerEvent[];

  beforeEach(() => {
    state = createMachineState();
    control = new ControlBlock();
    control.setClockSpeed(100000);
    events = [];
  });

  // Runs the loop on this thread over a fixed queue. Once the queue is empty
  // the loop is stopped as soon as the cpu is paused or has run `maxCycles`.
  function run(queue: unknown[], maxCycles: number = 0) {
    const loop = new ExecutionLoop({
      state,
      control,
      receive: () => {
        if (queue.length > 0) return { message: queue.shift() };
        if (control.getCpuState() !== "running" || control.getStats().cycles >= maxCycles) {
          control.requestStop();
        }
        return undefined;
      },
      emit: (event) => events.push(event),
      random: () => 0,
    });
    loop.run();
  }

  const logged = () => events.flatMap((event) => (event.type === "Log" ? [event.record] : []));
  const handled = () => events.filter((event) => event.type === "Handled").length;

  it("should load and run a program", () => {
    // LD V0, 0x0A ; ADD V0, 0x05 ; JP 0x204
    const rom = Uint8Array.from([0x60, 0x0a, 0x70, 0x05, 0x12, 0x04]);
    run([{ type: "LoadROM", data: rom }, { type: "SetStateRunning" }], 3);
    expect(state.v[0]).toBe(0x0f);
    expect(state.pc).toBe(0x204);
    expect(control.getStats()).toMatchObject({ cycles: 3, messages: 2 });
  });

  it("should announce itself, acknowledge each message and ship its log", () => {
    run([{ type: "LoadROM", data: Uint8Array.from([0x12, 0x00]) }, { type: "SetStateRunning" }], 1);
    expect(events[0]).toEqual({ type: "Started" });
    expect(handled()).toBe(2);
    expect(logged().map((record) => record.message)).toEqual([
      "starting cpu loop",
      "received rom: 2 bytes",
      "set cpu running",
      "cpu loop stopped",
    ]);
  });

  it("should apply nothing queued behind a Stop message", () => {
    const queue: unknown[] = [{ type: "Stop" }, { type: "SetStateRunning" }];
    run(queue);
    expect(queue).toEqual([{ type: "SetStateRunning" }]);
    expect(control.getCpuState()).toBe("paused");
    expect(control.getStats().messages).toBe(1);
    expect(handled()).toBe(1);
  });

  it("should refuse to run after a rom that does not fit", () => {
    run([{ type: "LoadROM", data: new Uint8Array(0xe01) }, { type: "SetStateRunning" }], 10);
    expect(control.getCpuState()).toBe("paused");
    expect(control.getStats().cycles).toBe(0);
    expect(state.memory[0x200]).toBe(0);
    expect(logged().filter((record) => record.level === "warn").map((record) => record.message)).toEqual([
      "rom of 3585 bytes does not fit at 200",
      "no rom loaded, staying paused",
    ]);
  });

  it("should skip malformed messages", () => {
    run([{ type: "Bogus" }, { type: "SetKeyDown", key: "1" }, null]);
    expect(control.getStats().messages).toBe(0);
    expect(handled()).toBe(0);
    expect(logged().filter((record) => record.level === "warn")).toHaveLength(3);
  });

  it("should pause on a cpu fault", () => {
    // RET with an empty stack
    run([{ type: "LoadROM", data: Uint8Array.from([0x00, 0xee]) }, { type: "SetStateRunning" }], 10);
    expect(control.getCpuState()).toBe("paused");
    expect(control.getStats().cycles).toBe(1);
    expect(logged().filter((record) => record.level === "error").map((record) => record.message)).toEqual([
      "Stack underflow at 0200",
      "cpu fault at 200, pausing",
    ]);
  });

  it("should track key state from messages", () => {
    run([
      { type: "SetKeyDown", key: 4 },
      { type: "SetKeyDown", key: 9 },
      { type: "SetKeyUp", key: 4 },
    ]);
    expect(Array.from(state.keys.slice(0, 10))).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 1]);
  });
});
