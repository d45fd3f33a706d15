// Keypad handlers

import { MachineState } from "../../MachineState";
import { Operands, skipIf } from "../types";

export function h_skp_vx(state: MachineState, { x }: Operands) {
  skipIf(state, state.keys[state.v[x] & 0x0f] === 1);
}

export function h_sknp_vx(state: MachineState, { x }: Operands) {
  skipIf(state, state.keys[state.v[x] & 0x0f] === 0);
}

/**
 * Suspend until the next key-down event. PC stays on this instruction;
 * the engine stores the key into Vx and advances when the event arrives.
 */
export function h_ld_vx_k(state: MachineState, { x }: Operands) {
  state.keyWait = x;
}
