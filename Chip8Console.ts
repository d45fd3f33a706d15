import { emitKeypressEvents } from "node:readline";
import { Chip8Daemon } from "./Chip8Daemon";
import { LogRecord } from "./DiagnosticsLog";
import { FRAMEBUFFER_WIDTH, SCREEN_DIMENSIONS } from "./MachineState";
import { toHex } from "./opcodes/types";

interface Key {
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  name?: string;
}

// The parts of the daemon a front end is allowed to touch
export type ConsoleTarget = Pick<
  Chip8Daemon,
  | "log"
  | "sendMessage"
  | "setKeyDown"
  | "setKeyUp"
  | "getCpuState"
  | "getScreenFramebuffer"
  | "getScreenMode"
  | "getGpr"
  | "getPc"
  | "getI"
  | "getSp"
  | "getDt"
  | "getSt"
  | "dasmOp"
>;

export interface ConsoleOptions {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WritableStream;
  keyHoldMs?: number; // terminals send no key-up; release after this long
  logLines?: number; // lines of log kept under the screen
  refreshHz?: number;
}

/**
 * Conventional layout: the 4x4 block under 1-4 on a QWERTY keyboard
 * stands in for the hex keypad.
 *
 *   1 2 3 4      1 2 3 C
 *   q w e r  ->  4 5 6 D
 *   a s d f      7 8 9 E
 *   z x c v      A 0 B F
 */
const KEYMAP: Record<string, number> = {
  "1": 0x1, "2": 0x2, "3": 0x3, "4": 0xc,
  q: 0x4, w: 0x5, e: 0x6, r: 0xd,
  a: 0x7, s: 0x8, d: 0x9, f: 0xe,
  z: 0xa, x: 0x0, c: 0xb, v: 0xf,
};

export function mapKey(name: string | undefined): number | undefined {
  if (name === undefined) return undefined;
  return KEYMAP[name.toLowerCase()];
}

/**
 * Draw the active screen region with half-block characters, two pixel rows
 * per text line.
 */
export function renderFramebuffer(framebuffer: readonly boolean[], width: number, height: number): string[] {
  const lines: string[] = [];
  for (let y = 0; y < height; y += 2) {
    let line = "";
    for (let x = 0; x < width; x++) {
      const top = framebuffer[y * FRAMEBUFFER_WIDTH + x] === true;
      const bottom = y + 1 < height && framebuffer[(y + 1) * FRAMEBUFFER_WIDTH + x] === true;
      line += top && bottom ? "█" : top ? "▀" : bottom ? "▄" : " ";
    }
    lines.push(line);
  }
  return lines;
}

function formatRecord(record: LogRecord): string {
  return `[${record.source}] ${record.message}`;
}

const hex = (n: number, width: number) => toHex(n, width).toUpperCase();

export class Chip8Console {
  private input: NodeJS.ReadStream;
  private output: NodeJS.WritableStream;
  private keyHoldMs: number;
  private logLines: number;
  private refreshHz: number;
  private logBuffer: string[] = [];
  private releaseTimers = new Map<number, NodeJS.Timeout>();
  private refreshTimer: NodeJS.Timeout | null = null;
  private lastSoundTimer: number = 0;
  private keypressListener = (str: string | undefined, key: Key | undefined) =>
    this.handleKeypress(str, key);

  onQuit: (() => void) | null = null;

  constructor(
    private daemon: ConsoleTarget,
    options: ConsoleOptions = {},
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.keyHoldMs = options.keyHoldMs ?? 100;
    this.logLines = options.logLines ?? 8;
    this.refreshHz = options.refreshHz ?? 60;
  }

  start(): void {
    if (this.input.isTTY) {
      emitKeypressEvents(this.input);
      this.input.setRawMode(true);
    }
    this.input.on("keypress", this.keypressListener);
    this.input.resume();

    // Clear screen and hide the cursor
    this.output.write("\x1b[2J\x1b[?25l");
    this.refreshTimer = setInterval(() => this.refresh(), 1000 / this.refreshHz);
  }

  handleKeypress(_str: string | undefined, key: Key | undefined): void {
    if (!key) return;

    if (key.ctrl && key.name === "c") {
      this.onQuit?.();
      return;
    }

    if (key.name === "p") {
      const running = this.daemon.getCpuState() === "running";
      this.daemon.sendMessage({ type: running ? "SetStateStopped" : "SetStateRunning" });
      return;
    }

    const chip8Key = mapKey(key.name);
    if (chip8Key === undefined) return;

    const pending = this.releaseTimers.get(chip8Key);
    if (pending) {
      // Auto-repeat of a held key: extend the hold instead of pressing again
      clearTimeout(pending);
    } else {
      this.daemon.setKeyDown(chip8Key);
    }
    this.releaseTimers.set(
      chip8Key,
      setTimeout(() => {
        this.releaseTimers.delete(chip8Key);
        this.daemon.setKeyUp(chip8Key);
      }, this.keyHoldMs),
    );
  }

  /**
   * Build the full frame: screen, registers, current instruction, log.
   */
  renderFrame(): string {
    for (const record of this.daemon.log.drain()) {
      this.logBuffer.push(formatRecord(record));
    }
    if (this.logBuffer.length > this.logLines) {
      this.logBuffer = this.logBuffer.slice(-this.logLines);
    }

    const { width, height } = SCREEN_DIMENSIONS[this.daemon.getScreenMode()];
    const screen = renderFramebuffer(this.daemon.getScreenFramebuffer(), width, height);
    const border = "+" + "-".repeat(width) + "+";
    const pc = this.daemon.getPc();
    const gpr = Array.from(this.daemon.getGpr(), (v) => hex(v, 2)).join(" ");

    const lines = [
      border,
      ...screen.map((line) => `|${line}|`),
      border,
      `PC ${hex(pc, 4)}  I ${hex(this.daemon.getI(), 4)}  SP ${this.daemon.getSp()}  ` +
        `DT ${hex(this.daemon.getDt(), 2)}  ST ${hex(this.daemon.getSt(), 2)}  [${this.daemon.getCpuState()}]`,
      `V  ${gpr}`,
      `>  ${this.daemon.dasmOp(pc) ?? "??"}`,
      "",
      ...this.logBuffer,
    ];
    // Home the cursor and clear each line's tail
    return "\x1b[H" + lines.map((line) => `${line}\x1b[K`).join("\n");
  }

  private refresh() {
    const st = this.daemon.getSt();
    if (st > 0 && this.lastSoundTimer === 0) this.output.write("\x07");
    this.lastSoundTimer = st;
    this.output.write(this.renderFrame());
  }

  close(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
    for (const timer of this.releaseTimers.values()) clearTimeout(timer);
    this.releaseTimers.clear();

    this.input.off("keypress", this.keypressListener);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
    // Show the cursor again
    this.output.write("\x1b[?25h\n");
  }
}
