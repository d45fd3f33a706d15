import { h_or_vx_vy, h_and_vx_vy, h_xor_vx_vy } from "./logic";
import { createState, ops, setRegisters } from "../test-utils";

describe("Logic Handlers", () => {
  it("h_or_vx_vy should OR Vy into Vx", () => {
    const state = createState();
    setRegisters(state, { 0x1: 0b1100, 0x2: 0b1010 });
    h_or_vx_vy(state, ops(0x8121));
    expect(state.v[0x1]).toBe(0b1110);
    expect(state.v[0x2]).toBe(0b1010);
    expect(state.pc).toBe(0x202);
  });

  it("h_and_vx_vy should AND Vy into Vx", () => {
    const state = createState();
    setRegisters(state, { 0x1: 0b1100, 0x2: 0b1010 });
    h_and_vx_vy(state, ops(0x8122));
    expect(state.v[0x1]).toBe(0b1000);
  });

  it("h_xor_vx_vy should XOR Vy into Vx", () => {
    const state = createState();
    setRegisters(state, { 0x1: 0b1100, 0x2: 0b1010 });
    h_xor_vx_vy(state, ops(0x8123));
    expect(state.v[0x1]).toBe(0b0110);
  });

  it("should not touch VF", () => {
    const state = createState();
    setRegisters(state, { 0x1: 0xff, 0x2: 0xff, 0xf: 0x33 });
    h_xor_vx_vy(state, ops(0x8123));
    expect(state.v[0x1]).toBe(0);
    expect(state.v[0xf]).toBe(0x33);
  });
});
