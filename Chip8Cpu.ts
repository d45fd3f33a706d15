import { DiagnosticsLog } from "./DiagnosticsLog";
import { Chip8Error, InvalidProgramCounterError } from "./Chip8Error";
import {
  MEMORY_SIZE,
  MachineState,
  PROGRAM_START,
  createMachineState,
  isValidKey,
  resetMachineState,
} from "./MachineState";
import { decodeOperands, disassemble, opcodeTable } from "./opcodes/decode";
import { ExecCtx, nextInstruction, toHex } from "./opcodes/types";

export type StepResult = "executed" | "unmatched" | "waiting" | "fault";

export interface Chip8CpuOptions {
  log?: DiagnosticsLog;
  random?: () => number; // returns a byte, 0-255
  programStart?: number;
  state?: MachineState; // an already initialised (e.g. shared) state to drive
}

export function randomByte(): number {
  return Math.floor(Math.random() * 256);
}

/**
 * The CHIP-8 interpreter core: machine state plus fetch-decode-execute.
 * Handlers own PC advancement; nothing here moves PC before dispatch.
 */
export class Chip8Cpu {
  readonly state: MachineState;
  private ctx: ExecCtx;
  private programStart: number;
  private log: DiagnosticsLog;

  constructor(options: Chip8CpuOptions = {}) {
    this.log = options.log ?? new DiagnosticsLog();
    this.programStart = options.programStart ?? PROGRAM_START;
    this.ctx = { random: options.random ?? randomByte, log: this.log };
    this.state = options.state ?? createMachineState(undefined, this.programStart);
  }

  /**
   * Clears RAM, registers, the stack, screen etc. and reloads the font.
   */
  reset(): void {
    resetMachineState(this.state, this.programStart);
  }

  /**
   * Copy a raw ROM image into memory. Fails without touching memory when the
   * image would run past the end of RAM.
   */
  loadRom(rom: Uint8Array | readonly number[], address: number = this.programStart): boolean {
    if (!Number.isInteger(address) || address < 0 || address + rom.length > MEMORY_SIZE) {
      return false;
    }
    this.state.memory.set(rom, address);
    return true;
  }

  /**
   * Read the big-endian instruction word at an aligned address. Returns
   * undefined for addresses past 0xFFE or odd addresses.
   */
  fetch(address: number): number | undefined {
    if (!Number.isInteger(address) || address < 0 || address > MEMORY_SIZE - 2 || address % 2 !== 0) {
      return undefined;
    }
    return (this.state.memory[address] << 8) | this.state.memory[address + 1];
  }

  executeOpAtPc(): StepResult {
    if (this.state.keyWait !== null) return "waiting";

    const pc = this.state.pc;
    try {
      const instruction = this.fetch(pc);
      if (instruction === undefined) throw new InvalidProgramCounterError(pc);

      const desc = opcodeTable.lookup(instruction);
      if (!desc) {
        // ROMs routinely embed sprite data and padding; skip the word
        this.log.warn("cpu", `no handler for ${toHex(instruction, 4)} at ${toHex(pc, 4)}`);
        nextInstruction(this.state);
        return "unmatched";
      }

      const ops = decodeOperands(instruction);
      if (this.log.isTracing()) {
        this.log.debug(
          "cpu",
          `${toHex(pc, 4)}: ${toHex(instruction >> 8, 2)} ${toHex(instruction & 0xff, 2)} [${desc.disassemble(ops)}]`,
        );
      }
      desc.execute(this.state, ops, this.ctx);
      return "executed";
    } catch (err) {
      if (err instanceof Chip8Error) {
        this.log.error("cpu", err.message);
        return "fault";
      }
      throw err;
    }
  }

  /**
   * Returns a disassembly of the instruction at the supplied address, or
   * undefined when the address is out of range, misaligned or holds no
   * recognised instruction.
   */
  dasmOp(address: number): string | undefined {
    const instruction = this.fetch(address);
    return instruction === undefined ? undefined : disassemble(instruction);
  }

  /**
   * One 60 Hz tick of the delay and sound timers.
   */
  tickTimers(): void {
    if (this.state.dt > 0) this.state.dt--;
    if (this.state.st > 0) this.state.st--;
  }

  isWaitingForKey(): boolean {
    return this.state.keyWait !== null;
  }

  /**
   * Press a key, completing a pending key wait. Keys outside 0x0-0xF are
   * logged and ignored.
   */
  keyDown(key: number): boolean {
    if (!isValidKey(key)) {
      this.log.warn("cpu", `ignoring invalid key ${key}`);
      return false;
    }
    this.state.keys[key] = 1;

    if (this.state.keyWait !== null) {
      this.state.v[this.state.keyWait] = key;
      this.state.keyWait = null;
      nextInstruction(this.state);
    }
    return true;
  }

  keyUp(key: number): boolean {
    if (!isValidKey(key)) {
      this.log.warn("cpu", `ignoring invalid key ${key}`);
      return false;
    }
    this.state.keys[key] = 0;
    return true;
  }
}
