// Arithmetic handlers. VF is written last so it wins when it is also Vx.

import { MachineState } from "../../MachineState";
import { ExecCtx, Operands, nextInstruction } from "../types";

export function h_add_vx_kk(state: MachineState, { x, kk }: Operands) {
  // No carry flag for the immediate form
  state.v[x] = (state.v[x] + kk) & 0xff;
  nextInstruction(state);
}

export function h_add_vx_vy(state: MachineState, { x, y }: Operands) {
  const sum = state.v[x] + state.v[y];
  state.v[x] = sum & 0xff;
  state.v[0xf] = sum > 0xff ? 1 : 0;
  nextInstruction(state);
}

export function h_sub_vx_vy(state: MachineState, { x, y }: Operands) {
  const noBorrow = state.v[x] >= state.v[y];
  state.v[x] = (state.v[x] - state.v[y]) & 0xff;
  state.v[0xf] = noBorrow ? 1 : 0;
  nextInstruction(state);
}

export function h_subn_vx_vy(state: MachineState, { x, y }: Operands) {
  const noBorrow = state.v[y] >= state.v[x];
  state.v[x] = (state.v[y] - state.v[x]) & 0xff;
  state.v[0xf] = noBorrow ? 1 : 0;
  nextInstruction(state);
}

export function h_shr_vx_vy(state: MachineState, { x }: Operands) {
  const shiftedOut = state.v[x] & 0x01;
  state.v[x] = state.v[x] >> 1;
  state.v[0xf] = shiftedOut;
  nextInstruction(state);
}

export function h_shl_vx_vy(state: MachineState, { x }: Operands) {
  const shiftedOut = (state.v[x] >> 7) & 0x01;
  state.v[x] = (state.v[x] << 1) & 0xff;
  state.v[0xf] = shiftedOut;
  nextInstruction(state);
}

export function h_rnd_vx_kk(state: MachineState, { x, kk }: Operands, ctx: ExecCtx) {
  state.v[x] = ctx.random() & kk;
  nextInstruction(state);
}
