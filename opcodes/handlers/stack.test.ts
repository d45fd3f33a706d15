import { h_call, h_ret } from "./stack";
import { StackOverflowError, StackUnderflowError } from "../../Chip8Error";
import { createState, ops } from "../test-utils";

describe("Stack Handlers", () => {
  describe("h_call", () => {
    it("should push the return address and jump", () => {
      const state = createState({ pc: 0x204 });
      h_call(state, ops(0x2400));
      expect(state.pc).toBe(0x400);
      expect(state.sp).toBe(1);
      expect(state.stack[0]).toBe(0x206);
    });

    it("should nest calls", () => {
      const state = createState();
      h_call(state, ops(0x2400));
      h_call(state, ops(0x2500));
      expect(state.sp).toBe(2);
      expect(Array.from(state.stack.slice(0, 2))).toEqual([0x202, 0x402]);
      expect(state.pc).toBe(0x500);
    });

    it("should throw when all 16 slots are in use", () => {
      const state = createState({ sp: 16, pc: 0x260 });
      expect(() => h_call(state, ops(0x2400))).toThrow(StackOverflowError);
      expect(state.pc).toBe(0x260);
      expect(state.sp).toBe(16);
    });
  });

  describe("h_ret", () => {
    it("should pop the return address into PC", () => {
      const state = createState({ pc: 0x200 });
      h_call(state, ops(0x2400));
      h_ret(state);
      expect(state.pc).toBe(0x202);
      expect(state.sp).toBe(0);
    });

    it("should throw on an empty stack", () => {
      const state = createState({ pc: 0x300 });
      expect(() => h_ret(state)).toThrow(StackUnderflowError);
      expect(state.pc).toBe(0x300);
    });
  });
});
