import font from "./font.json";

export const MEMORY_SIZE = 0x1000;
export const REGISTER_COUNT = 16;
export const STACK_SIZE = 16;
export const KEY_COUNT = 16;
export const PROGRAM_START = 0x200;
export const FONT_ADDRESS = 0x000;
export const FONT_GLYPH_SIZE = 5;

// The framebuffer is always allocated at the high-resolution size
export const FRAMEBUFFER_WIDTH = 128;
export const FRAMEBUFFER_HEIGHT = 64;

export type ScreenMode = "low" | "high";

export const SCREEN_DIMENSIONS: Record<ScreenMode, { width: number; height: number }> = {
  low: { width: 64, height: 32 },
  high: { width: 128, height: 64 },
};

/**
 * Shared buffer layout (byte offsets)
 *
 *   0x0000  memory       4096 x u8
 *   0x1000  V0-VF          16 x u8
 *   0x1010  keys           16 x u8   (0 = up, 1 = down)
 *   0x1020  stack          16 x u16
 *   0x1040  registers       8 x i32  (I, PC, SP, DT, ST, mode, key wait)
 *   0x1060  framebuffer  8192 x u8   (128x64, row-major, 0 = off, 1 = on)
 */
const MEMORY_OFFSET = 0x0000;
const V_OFFSET = 0x1000;
const KEYS_OFFSET = 0x1010;
const STACK_OFFSET = 0x1020;
const REGISTERS_OFFSET = 0x1040;
const REGISTER_SLOTS = 8;
const FRAMEBUFFER_OFFSET = 0x1060;

export const MACHINE_STATE_BYTES = FRAMEBUFFER_OFFSET + FRAMEBUFFER_WIDTH * FRAMEBUFFER_HEIGHT;

const REG_I = 0;
const REG_PC = 1;
const REG_SP = 2;
const REG_DT = 3;
const REG_ST = 4;
const REG_SCREEN_MODE = 5; // 0 = low, 1 = high
const REG_KEY_WAIT = 6; // -1 when no key wait is pending

/**
 * The machine state, laid out over one SharedArrayBuffer so the execution
 * thread can write it and other threads can read it. Callers outside the
 * execution thread must hold the state lock while reading.
 */
export class MachineState {
  readonly buffer: SharedArrayBuffer;
  readonly memory: Uint8Array; // 4KB of RAM, 0x000-0xFFF
  readonly v: Uint8Array; // general purpose registers V0-VF
  readonly keys: Uint8Array; // pressed state of keys 0x0-0xF
  readonly stack: Uint16Array; // return addresses
  readonly framebuffer: Uint8Array;
  private registers: Int32Array;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(MACHINE_STATE_BYTES)) {
    if (buffer.byteLength !== MACHINE_STATE_BYTES) {
      throw new Error(`Machine state buffer must be ${MACHINE_STATE_BYTES} bytes, got ${buffer.byteLength}`);
    }
    this.buffer = buffer;
    this.memory = new Uint8Array(buffer, MEMORY_OFFSET, MEMORY_SIZE);
    this.v = new Uint8Array(buffer, V_OFFSET, REGISTER_COUNT);
    this.keys = new Uint8Array(buffer, KEYS_OFFSET, KEY_COUNT);
    this.stack = new Uint16Array(buffer, STACK_OFFSET, STACK_SIZE);
    this.registers = new Int32Array(buffer, REGISTERS_OFFSET, REGISTER_SLOTS);
    this.framebuffer = new Uint8Array(buffer, FRAMEBUFFER_OFFSET, FRAMEBUFFER_WIDTH * FRAMEBUFFER_HEIGHT);
  }

  // address register
  get i(): number {
    return this.registers[REG_I];
  }
  set i(value: number) {
    this.registers[REG_I] = value;
  }

  // address of the next instruction
  get pc(): number {
    return this.registers[REG_PC];
  }
  set pc(value: number) {
    this.registers[REG_PC] = value;
  }

  // number of return addresses on the stack
  get sp(): number {
    return this.registers[REG_SP];
  }
  set sp(value: number) {
    this.registers[REG_SP] = value;
  }

  get dt(): number {
    return this.registers[REG_DT];
  }
  set dt(value: number) {
    this.registers[REG_DT] = value;
  }

  get st(): number {
    return this.registers[REG_ST];
  }
  set st(value: number) {
    this.registers[REG_ST] = value;
  }

  get screenMode(): ScreenMode {
    return this.registers[REG_SCREEN_MODE] === 1 ? "high" : "low";
  }
  set screenMode(mode: ScreenMode) {
    this.registers[REG_SCREEN_MODE] = mode === "high" ? 1 : 0;
  }

  // register awaiting a key press (Fx0A)
  get keyWait(): number | null {
    const reg = this.registers[REG_KEY_WAIT];
    return reg < 0 ? null : reg;
  }
  set keyWait(reg: number | null) {
    this.registers[REG_KEY_WAIT] = reg === null ? -1 : reg;
  }
}

export function createMachineState(
  buffer?: SharedArrayBuffer,
  programStart: number = PROGRAM_START,
): MachineState {
  const state = new MachineState(buffer);
  resetMachineState(state, programStart);
  return state;
}

/**
 * Zero everything in place (no reallocation), reload the hex font and point
 * PC at the program entry point.
 */
export function resetMachineState(state: MachineState, programStart: number = PROGRAM_START): void {
  state.memory.fill(0);
  state.memory.set(font, FONT_ADDRESS);
  state.v.fill(0);
  state.i = 0;
  state.pc = programStart;
  state.sp = 0;
  state.stack.fill(0);
  state.dt = 0;
  state.st = 0;
  state.framebuffer.fill(0);
  state.screenMode = "low";
  state.keys.fill(0);
  state.keyWait = null;
}

/**
 * Index into the framebuffer for a logical coordinate in the active mode.
 * Low resolution occupies the top-left 64x32 region with the full row stride.
 */
export function pixelIndex(x: number, y: number): number {
  return y * FRAMEBUFFER_WIDTH + x;
}

export function isOnScreen(state: MachineState, x: number, y: number): boolean {
  const { width, height } = SCREEN_DIMENSIONS[state.screenMode];
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < width && y < height;
}

export function isValidKey(key: number): boolean {
  return Number.isInteger(key) && key >= 0 && key < KEY_COUNT;
}
