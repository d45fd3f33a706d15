// Bitwise logic handlers

import { MachineState } from "../../MachineState";
import { Operands, nextInstruction } from "../types";

export function h_or_vx_vy(state: MachineState, { x, y }: Operands) {
  state.v[x] |= state.v[y];
  nextInstruction(state);
}

export function h_and_vx_vy(state: MachineState, { x, y }: Operands) {
  state.v[x] &= state.v[y];
  nextInstruction(state);
}

export function h_xor_vx_vy(state: MachineState, { x, y }: Operands) {
  state.v[x] ^= state.v[y];
  nextInstruction(state);
}
