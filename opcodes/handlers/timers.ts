// Delay and sound timer handlers

import { MachineState } from "../../MachineState";
import { Operands, nextInstruction } from "../types";

export function h_ld_vx_dt(state: MachineState, { x }: Operands) {
  state.v[x] = state.dt;
  nextInstruction(state);
}

export function h_ld_dt_vx(state: MachineState, { x }: Operands) {
  state.dt = state.v[x];
  nextInstruction(state);
}

export function h_ld_st_vx(state: MachineState, { x }: Operands) {
  state.st = state.v[x];
  nextInstruction(state);
}
