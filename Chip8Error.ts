import { toHex } from "./opcodes/types";

export class Chip8Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class StackOverflowError extends Chip8Error {
  pc: number;

  constructor(pc: number) {
    super(`Stack overflow at ${toHex(pc, 4)}`);
    this.pc = pc;
  }
}

export class StackUnderflowError extends Chip8Error {
  pc: number;

  constructor(pc: number) {
    super(`Stack underflow at ${toHex(pc, 4)}`);
    this.pc = pc;
  }
}

export class InvalidProgramCounterError extends Chip8Error {
  pc: number;

  constructor(pc: number) {
    super(`Cannot fetch instruction at ${toHex(pc, 4)}`);
    this.pc = pc;
  }
}
