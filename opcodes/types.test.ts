import { op, fmtAddr, fmtByte, fmtNibble, fmtReg, nextInstruction, skipIf, toHex } from "./types";
import { createState } from "./test-utils";

describe("Opcode Types", () => {
  describe("op", () => {
    const noop = {
      name: "TEST",
      execute: () => undefined,
      disassemble: () => "TEST",
    };

    it("should derive mask and pattern from a fixed encoding", () => {
      const d = op("00E0", noop);
      expect(d.encoding).toEqual([0x0, 0x0, 0xe, 0x0]);
      expect(d.mask).toBe(0xffff);
      expect(d.pattern).toBe(0x00e0);
    });

    it("should treat letters as operand data", () => {
      const d = op("8xy4", noop);
      expect(d.encoding).toEqual([0x8, null, null, 0x4]);
      expect(d.mask).toBe(0xf00f);
      expect(d.pattern).toBe(0x8004);
    });

    it("should accept lowercase hex digits", () => {
      const d = op("Exa1", noop);
      expect(d.encoding).toEqual([0xe, null, 0xa, 0x1]);
      expect(d.mask).toBe(0xf0ff);
      expect(d.pattern).toBe(0xe0a1);
    });

    it("should keep the name and transforms", () => {
      const d = op("1nnn", noop);
      expect(d.name).toBe("TEST");
      expect(d.execute).toBe(noop.execute);
      expect(d.disassemble).toBe(noop.disassemble);
    });

    it("should reject encodings that are not 4 nibbles", () => {
      expect(() => op("123", noop)).toThrow("Encoding must have 4 nibbles: 123");
      expect(() => op("12345", noop)).toThrow("Encoding must have 4 nibbles");
    });
  });

  describe("PC helpers", () => {
    it("nextInstruction should advance by 2", () => {
      const state = createState({ pc: 0x250 });
      nextInstruction(state);
      expect(state.pc).toBe(0x252);
    });

    it("skipIf should advance by 4 when true and 2 when false", () => {
      const state = createState({ pc: 0x250 });
      skipIf(state, true);
      expect(state.pc).toBe(0x254);
      skipIf(state, false);
      expect(state.pc).toBe(0x256);
    });
  });

  describe("formatting", () => {
    it("should format registers, bytes, addresses and nibbles", () => {
      expect(fmtReg(0xa)).toBe("VA");
      expect(fmtByte(0x0a)).toBe("0x0A");
      expect(fmtAddr(0x2f)).toBe("0x02F");
      expect(fmtNibble(0xc)).toBe("0xC");
    });

    it("should pad lowercase hex to the given width", () => {
      expect(toHex(0x2a, 4)).toBe("002a");
      expect(toHex(0xffe, 2)).toBe("ffe");
    });
  });
});
