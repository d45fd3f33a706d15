// Subroutine call/return handlers

import { StackOverflowError, StackUnderflowError } from "../../Chip8Error";
import { MachineState, STACK_SIZE } from "../../MachineState";
import { Operands } from "../types";

export function h_call(state: MachineState, { nnn }: Operands) {
  if (state.sp >= STACK_SIZE) {
    throw new StackOverflowError(state.pc);
  }
  state.stack[state.sp++] = (state.pc + 2) & 0xffff;
  state.pc = nnn;
}

export function h_ret(state: MachineState) {
  if (state.sp === 0) {
    throw new StackUnderflowError(state.pc);
  }
  state.pc = state.stack[--state.sp];
}
