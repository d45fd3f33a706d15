// Flow control handlers (jumps and conditional skips)

import { MachineState } from "../../MachineState";
import { Operands, nextInstruction, skipIf } from "../types";

export function h_sys(state: MachineState) {
  // Machine code routines are not supported; treated as a no-op
  nextInstruction(state);
}

export function h_jp(state: MachineState, { nnn }: Operands) {
  state.pc = nnn;
}

export function h_jp_v0(state: MachineState, { nnn }: Operands) {
  state.pc = (nnn + state.v[0]) & 0xffff;
}

export function h_se_vx_kk(state: MachineState, { x, kk }: Operands) {
  skipIf(state, state.v[x] === kk);
}

export function h_sne_vx_kk(state: MachineState, { x, kk }: Operands) {
  skipIf(state, state.v[x] !== kk);
}

export function h_se_vx_vy(state: MachineState, { x, y }: Operands) {
  skipIf(state, state.v[x] === state.v[y]);
}

export function h_sne_vx_vy(state: MachineState, { x, y }: Operands) {
  skipIf(state, state.v[x] !== state.v[y]);
}
