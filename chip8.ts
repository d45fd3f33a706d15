#!/usr/bin/env node
import { readFile } from "fs/promises";
import { Chip8Console } from "./Chip8Console";
import { Chip8Daemon, DEFAULT_CLOCK_HZ } from "./Chip8Daemon";
import { MEMORY_SIZE, PROGRAM_START } from "./MachineState";

export interface CommandLine {
  romPath: string;
  clockHz: number;
  trace: boolean;
}

const USAGE = "Usage: tschip8 <rom-file> [--clock <hz>] [--trace]";

/**
 * Parse process arguments (without the node and script entries). Returns an
 * error message string when the arguments are unusable.
 */
export function parseCommandLine(args: string[]): CommandLine | string {
  const trace = args.includes("--trace");

  let clockHz = DEFAULT_CLOCK_HZ;
  let clockArg: string | undefined;
  const clockIndex = args.indexOf("--clock");
  if (clockIndex !== -1) {
    clockArg = args[clockIndex + 1];
    const parsed = Number(clockArg);
    if (clockArg === undefined || !Number.isFinite(parsed) || parsed < 1) {
      return `Invalid --clock value: ${clockArg ?? "(missing)"}`;
    }
    clockHz = Math.floor(parsed);
  }

  const romPath = args.find(
    (arg, idx) => !arg.startsWith("--") && !(clockIndex !== -1 && idx === clockIndex + 1),
  );
  if (!romPath) {
    return "Error: ROM file path is required";
  }

  return { romPath, clockHz, trace };
}

/**
 * Returns an error message when a ROM of `length` bytes cannot be loaded at
 * the program start address.
 */
export function checkRomSize(length: number): string | undefined {
  const max = MEMORY_SIZE - PROGRAM_START;
  if (length > max) {
    return `ROM too large: ${length} bytes (max ${max})`;
  }
  return undefined;
}

async function main() {
  const parsed = parseCommandLine(process.argv.slice(2));
  if (typeof parsed === "string") {
    console.error(parsed);
    console.error(USAGE);
    process.exit(1);
  }

  const rom = await readFile(parsed.romPath);
  const sizeError = checkRomSize(rom.length);
  if (sizeError) {
    console.error(sizeError);
    process.exit(1);
  }

  const daemon = new Chip8Daemon({ clockHz: parsed.clockHz, trace: parsed.trace });

  // With tracing on, the trace goes to the console instead of a rendered screen
  const consoleDevice = parsed.trace ? null : new Chip8Console(daemon);

  const shutdown = async () => {
    consoleDevice?.close();
    await daemon.stop();
  };
  const onInterrupt = () => {
    shutdown().catch((err) => {
      console.error("Error during shutdown:", err);
      process.exit(1);
    });
  };

  process.on("SIGINT", onInterrupt);
  if (consoleDevice) consoleDevice.onQuit = onInterrupt;

  daemon.sendMessage({ type: "LoadROM", data: new Uint8Array(rom) });
  daemon.sendMessage({ type: "SetStateRunning" });
  consoleDevice?.start();

  await daemon.join();
  process.off("SIGINT", onInterrupt);
}

if (require.main === module) {
  main().catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
}
