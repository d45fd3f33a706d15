// Strongly-typed, table-driven opcode metadata for the CHIP-8

import { DiagnosticsLog } from "../DiagnosticsLog";
import { MachineState } from "../MachineState";

export type NibblePattern = number | null; // null = operand data

export type Encoding = [NibblePattern, NibblePattern, NibblePattern, NibblePattern];

/**
 * Operand fields of an instruction. Every field is extracted for every
 * instruction; a handler only reads the ones its encoding defines.
 */
export interface Operands {
  nnn: number; // 0x_NNN
  x: number; // 0x_X__
  y: number; // 0x__Y_
  kk: number; // 0x__KK
  n: number; // 0x___N
}

export interface ExecCtx {
  random: () => number; // byte source for RND
  log: DiagnosticsLog;
}

export type ExecuteOp = (state: MachineState, ops: Operands, ctx: ExecCtx) => void;
export type DisassembleOp = (ops: Operands) => string;

export interface InstrDescriptor {
  name: string; // handler name, e.g. "ADD_VX_VY"
  encoding: Encoding; // e.g. 8xy4 -> [0x8, null, null, 0x4]
  mask: number; // bits that must match `pattern`
  pattern: number;
  execute: ExecuteOp;
  disassemble: DisassembleOp;
}

/**
 * Build a descriptor from a textual encoding such as "8xy4" or "Annn".
 * Hex digits are fixed nibbles, any other letter is operand data.
 */
export function op(
  encoding: string,
  init: Omit<InstrDescriptor, "encoding" | "mask" | "pattern">,
): InstrDescriptor {
  if (encoding.length !== 4)
    throw new Error(`Encoding must have 4 nibbles: ${encoding}`);

  const nibbles: NibblePattern[] = [];
  let mask = 0;
  let pattern = 0;
  for (const ch of encoding) {
    mask <<= 4;
    pattern <<= 4;
    if (/^[0-9A-Fa-f]$/.test(ch)) {
      const value = parseInt(ch, 16);
      nibbles.push(value);
      mask |= 0xf;
      pattern |= value;
    } else {
      nibbles.push(null);
    }
  }

  const [a, b, c, d] = nibbles;
  return { ...init, encoding: [a, b, c, d], mask, pattern };
}

// --- PC helpers shared by handlers ---

export function nextInstruction(state: MachineState): void {
  state.pc = (state.pc + 2) & 0xffff;
}

export function skipIf(state: MachineState, cond: boolean): void {
  state.pc = (state.pc + (cond ? 4 : 2)) & 0xffff;
}

// --- Hex formatting ---

// Lowercase, zero-padded: toHex(0x2a, 4) === "002a"
export const toHex = (value: number, digits: number) =>
  value.toString(16).padStart(digits, "0");

export const fmtReg = (r: number) => `V${toHex(r, 1).toUpperCase()}`;
export const fmtByte = (b: number) => `0x${toHex(b, 2).toUpperCase()}`;
export const fmtAddr = (a: number) => `0x${toHex(a, 3).toUpperCase()}`;
export const fmtNibble = (n: number) => `0x${toHex(n, 1).toUpperCase()}`;
