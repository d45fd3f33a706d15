import { h_cls, h_drw } from "./display";
import { FRAMEBUFFER_WIDTH, pixelIndex } from "../../MachineState";
import { createState, ops, setRegisters } from "../test-utils";

function litPixels(framebuffer: Uint8Array): Array<[number, number]> {
  const out: Array<[number, number]> = [];
  framebuffer.forEach((on, idx) => {
    if (on === 1) out.push([idx % FRAMEBUFFER_WIDTH, Math.floor(idx / FRAMEBUFFER_WIDTH)]);
  });
  return out;
}

describe("Display Handlers", () => {
  describe("h_cls", () => {
    it("should clear every pixel", () => {
      const state = createState();
      state.framebuffer[pixelIndex(3, 4)] = 1;
      h_cls(state);
      expect(state.framebuffer.every((p) => p === 0)).toBe(true);
      expect(state.pc).toBe(0x202);
    });
  });

  describe("h_drw", () => {
    it("should draw a sprite row at (Vx, Vy)", () => {
      const state = createState({ i: 0x300 });
      state.memory[0x300] = 0b10100000;
      setRegisters(state, { 0x1: 10, 0x2: 5 });
      h_drw(state, ops(0xd121));
      expect(litPixels(state.framebuffer)).toEqual([
        [10, 5],
        [12, 5],
      ]);
      expect(state.v[0xf]).toBe(0);
      expect(state.pc).toBe(0x202);
    });

    it("should set VF when a lit pixel is cleared", () => {
      const state = createState({ i: 0x300 });
      state.memory[0x300] = 0b11000000;
      h_drw(state, ops(0xd011));
      expect(state.v[0xf]).toBe(0);
      state.memory[0x300] = 0b01000000;
      h_drw(state, ops(0xd011));
      expect(state.v[0xf]).toBe(1);
      expect(litPixels(state.framebuffer)).toEqual([[0, 0]]);
    });

    it("should clear VF when only unlit pixels are drawn", () => {
      const state = createState({ i: 0x300 });
      state.memory[0x300] = 0b10000000;
      setRegisters(state, { 0xf: 1 });
      h_drw(state, ops(0xd011));
      expect(state.v[0xf]).toBe(0);
    });

    it("should clip sprites at the right and bottom edges", () => {
      const state = createState({ i: 0x300 });
      state.memory.set([0xff, 0xff], 0x300);
      setRegisters(state, { 0x1: 62, 0x2: 31 });
      h_drw(state, ops(0xd122));
      expect(litPixels(state.framebuffer)).toEqual([
        [62, 31],
        [63, 31],
      ]);
    });

    it("should wrap the start position into the screen", () => {
      const state = createState({ i: 0x300 });
      state.memory[0x300] = 0b10000000;
      setRegisters(state, { 0x1: 64 + 3, 0x2: 32 + 2 });
      h_drw(state, ops(0xd121));
      expect(litPixels(state.framebuffer)).toEqual([[3, 2]]);
    });

    it("should draw using the high resolution bounds in high mode", () => {
      const state = createState({ i: 0x300 });
      state.screenMode = "high";
      state.memory[0x300] = 0b10000000;
      setRegisters(state, { 0x1: 100, 0x2: 40 });
      h_drw(state, ops(0xd121));
      expect(litPixels(state.framebuffer)).toEqual([[100, 40]]);
    });

    it("should draw the font glyph for 0", () => {
      const state = createState({ i: 0 });
      h_drw(state, ops(0xd005));
      expect(state.framebuffer[pixelIndex(0, 0)]).toBe(1);
      expect(state.framebuffer[pixelIndex(1, 1)]).toBe(0);
      expect(state.framebuffer[pixelIndex(3, 2)]).toBe(1);
      expect(litPixels(state.framebuffer)).toHaveLength(14);
    });
  });
});
