// Register load handlers

import { MachineState } from "../../MachineState";
import { Operands, nextInstruction } from "../types";

export function h_ld_vx_kk(state: MachineState, { x, kk }: Operands) {
  state.v[x] = kk;
  nextInstruction(state);
}

export function h_ld_vx_vy(state: MachineState, { x, y }: Operands) {
  state.v[x] = state.v[y];
  nextInstruction(state);
}

export function h_ld_i_nnn(state: MachineState, { nnn }: Operands) {
  state.i = nnn;
  nextInstruction(state);
}

export function h_add_i_vx(state: MachineState, { x }: Operands) {
  // VF is not affected
  state.i = (state.i + state.v[x]) & 0xffff;
  nextInstruction(state);
}
