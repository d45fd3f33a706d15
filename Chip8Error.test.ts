import {
  Chip8Error,
  InvalidProgramCounterError,
  StackOverflowError,
  StackUnderflowError,
} from "./Chip8Error";

describe("Chip8Error", () => {
  it("should name errors after their class", () => {
    const err = new StackOverflowError(0x260);
    expect(err).toBeInstanceOf(Chip8Error);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("StackOverflowError");
    expect(err.message).toBe("Stack overflow at 0260");
    expect(err.pc).toBe(0x260);
  });

  it("should format the program counter as four hex digits", () => {
    expect(new StackUnderflowError(0xabc).message).toBe("Stack underflow at 0abc");
    expect(new InvalidProgramCounterError(0x1001).message).toBe("Cannot fetch instruction at 1001");
  });
});
