// Memory handlers addressed through I. Addresses wrap at the end of RAM.

import {
  FONT_ADDRESS,
  FONT_GLYPH_SIZE,
  MEMORY_SIZE,
  MachineState,
} from "../../MachineState";
import { Operands, nextInstruction } from "../types";

function addr(base: number, offset: number): number {
  return (base + offset) % MEMORY_SIZE;
}

export function h_ld_f_vx(state: MachineState, { x }: Operands) {
  state.i = FONT_ADDRESS + (state.v[x] & 0x0f) * FONT_GLYPH_SIZE;
  nextInstruction(state);
}

export function h_ld_b_vx(state: MachineState, { x }: Operands) {
  const value = state.v[x];
  state.memory[addr(state.i, 0)] = Math.floor(value / 100);
  state.memory[addr(state.i, 1)] = Math.floor(value / 10) % 10;
  state.memory[addr(state.i, 2)] = value % 10;
  nextInstruction(state);
}

export function h_ld_mem_i_vx(state: MachineState, { x }: Operands) {
  for (let r = 0; r <= x; r++) {
    state.memory[addr(state.i, r)] = state.v[r];
  }
  nextInstruction(state);
}

export function h_ld_vx_mem_i(state: MachineState, { x }: Operands) {
  for (let r = 0; r <= x; r++) {
    state.v[r] = state.memory[addr(state.i, r)];
  }
  nextInstruction(state);
}
