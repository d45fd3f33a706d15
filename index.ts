export { Chip8Daemon, DEFAULT_CLOCK_HZ, DEFAULT_TIMER_HZ } from "./Chip8Daemon";
export type { CpuState, DaemonOptions, DaemonStats } from "./Chip8Daemon";
export { Chip8Cpu } from "./Chip8Cpu";
export type { StepResult, Chip8CpuOptions } from "./Chip8Cpu";
export type {
  Chip8Message,
  Chip8MessageType,
  Chip8MessageHandler,
  WorkerEvent,
} from "./Chip8Message";
export { isChip8Message } from "./Chip8Message";
export { ControlBlock } from "./ControlBlock";
export { ExecutionLoop } from "./ExecutionLoop";
export type { ExecutionLoopOptions } from "./ExecutionLoop";
export { SharedLock } from "./SharedLock";
export { Signal } from "./Signal";
export type { WaitResult } from "./Signal";
export { Chip8Console, mapKey, renderFramebuffer } from "./Chip8Console";
export { DiagnosticsLog } from "./DiagnosticsLog";
export type { LogLevel, LogRecord, LogSink } from "./DiagnosticsLog";
export {
  Chip8Error,
  StackOverflowError,
  StackUnderflowError,
  InvalidProgramCounterError,
} from "./Chip8Error";
export { MachineState, createMachineState, isValidKey } from "./MachineState";
export type { ScreenMode } from "./MachineState";
export { OpcodeTable, opcodeTable, disassemble } from "./opcodes/decode";
