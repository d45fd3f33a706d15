/**
 * Common test utilities for opcode testing
 */

import { DiagnosticsLog } from "../DiagnosticsLog";
import { MachineState, createMachineState } from "../MachineState";
import { decodeOperands } from "./decode";
import { ExecCtx, Operands } from "./types";

export function createState(init: Partial<Pick<MachineState, "pc" | "i" | "sp" | "dt" | "st">> = {}): MachineState {
  const state = createMachineState();
  Object.assign(state, init);
  return state;
}

export function setRegisters(state: MachineState, values: Record<number, number>): void {
  for (const [reg, value] of Object.entries(values)) {
    state.v[Number(reg)] = value;
  }
}

// Operand fields of a full instruction word, e.g. ops(0x8124)
export function ops(instruction: number): Operands {
  return decodeOperands(instruction);
}

export function createCtx(randomValue: number = 0): ExecCtx & { random: jest.Mock<number, []> } {
  return {
    random: jest.fn(() => randomValue),
    log: new DiagnosticsLog(),
  };
}
