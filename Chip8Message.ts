// Messages accepted by the daemon, applied in FIFO order on the execution thread

import { MessagePort } from "node:worker_threads";
import { LogLevel, LogRecord } from "./DiagnosticsLog";

export type Chip8Message =
  | { type: "LoadROM"; data: Uint8Array }
  | { type: "SetStateRunning" }
  | { type: "SetStateStopped" }
  | { type: "SetKeyDown"; key: number }
  | { type: "SetKeyUp"; key: number }
  | { type: "Stop" };

export type Chip8MessageType = Chip8Message["type"];

export type Chip8MessageOf<T extends Chip8MessageType> = Extract<Chip8Message, { type: T }>;

export type Chip8MessageHandler<T extends Chip8MessageType = Chip8MessageType> = (
  msg: Chip8MessageOf<T>,
) => void;

export function isMessageOf<T extends Chip8MessageType>(
  msg: Chip8Message,
  type: T,
): msg is Chip8MessageOf<T> {
  return msg.type === type;
}

/**
 * Validate a message that crossed a thread boundary.
 */
export function isChip8Message(value: unknown): value is Chip8Message {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  switch (value.type) {
    case "LoadROM":
      return "data" in value && value.data instanceof Uint8Array;
    case "SetKeyDown":
    case "SetKeyUp":
      return "key" in value && typeof value.key === "number";
    case "SetStateRunning":
    case "SetStateStopped":
    case "Stop":
      return true;
    default:
      return false;
  }
}

// --- Execution thread -> daemon ---

export type WorkerEvent =
  | { type: "Started" }
  | { type: "Log"; record: LogRecord }
  | { type: "Handled" }; // the oldest outstanding message has been applied

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogRecord(value: unknown): value is LogRecord {
  if (typeof value !== "object" || value === null) return false;
  if (!("time" in value && "level" in value && "source" in value && "message" in value)) return false;
  const { time, level, source, message } = value;
  return (
    typeof time === "number" &&
    LOG_LEVELS.some((known) => known === level) &&
    typeof source === "string" &&
    typeof message === "string"
  );
}

export function isWorkerEvent(value: unknown): value is WorkerEvent {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  switch (value.type) {
    case "Started":
    case "Handled":
      return true;
    case "Log":
      return "record" in value && isLogRecord(value.record);
    default:
      return false;
  }
}

// --- Daemon -> execution thread, at startup ---

export interface WorkerInit {
  state: SharedArrayBuffer; // MachineState layout
  control: SharedArrayBuffer; // ControlBlock layout
  port: MessagePort; // Chip8Message queue
  programStart: number;
  timerHz: number;
  trace: boolean;
}

export function isWorkerInit(value: unknown): value is WorkerInit {
  return (
    typeof value === "object" &&
    value !== null &&
    "state" in value &&
    value.state instanceof SharedArrayBuffer &&
    "control" in value &&
    value.control instanceof SharedArrayBuffer &&
    "port" in value &&
    value.port instanceof MessagePort &&
    "programStart" in value &&
    typeof value.programStart === "number" &&
    "timerHz" in value &&
    typeof value.timerHz === "number" &&
    "trace" in value &&
    typeof value.trace === "boolean"
  );
}
