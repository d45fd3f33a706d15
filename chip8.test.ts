import { checkRomSize, parseCommandLine } from "./chip8";

describe("parseCommandLine", () => {
  it("should use the default clock without options", () => {
    expect(parseCommandLine(["game.ch8"])).toEqual({
      romPath: "game.ch8",
      clockHz: 500,
      trace: false,
    });
  });

  it("should read --clock and --trace in any order", () => {
    expect(parseCommandLine(["--clock", "700", "game.ch8", "--trace"])).toEqual({
      romPath: "game.ch8",
      clockHz: 700,
      trace: true,
    });
  });

  it("should round the clock down", () => {
    expect(parseCommandLine(["game.ch8", "--clock", "60.9"])).toEqual({
      romPath: "game.ch8",
      clockHz: 60,
      trace: false,
    });
  });

  it("should reject a bad clock value", () => {
    expect(parseCommandLine(["--clock", "abc", "game.ch8"])).toBe("Invalid --clock value: abc");
    expect(parseCommandLine(["--clock", "0", "game.ch8"])).toBe("Invalid --clock value: 0");
    expect(parseCommandLine(["game.ch8", "--clock"])).toBe("Invalid --clock value: (missing)");
  });

  it("should require a rom path", () => {
    expect(parseCommandLine([])).toBe("Error: ROM file path is required");
    expect(parseCommandLine(["--trace"])).toBe("Error: ROM file path is required");
    expect(parseCommandLine(["--clock", "700"])).toBe("Error: ROM file path is required");
  });
});

describe("checkRomSize", () => {
  it("should accept a rom that fills memory up to the last byte", () => {
    expect(checkRomSize(0)).toBeUndefined();
    expect(checkRomSize(0xe00)).toBeUndefined();
  });

  it("should reject a rom one byte too large", () => {
    expect(checkRomSize(0xe01)).toBe("ROM too large: 3585 bytes (max 3584)");
  });
});
