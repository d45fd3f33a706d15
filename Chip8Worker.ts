// Entry point of the execution thread started by Chip8Daemon

import { parentPort, receiveMessageOnPort, workerData } from "node:worker_threads";
import { isWorkerInit } from "./Chip8Message";
import { ControlBlock } from "./ControlBlock";
import { ExecutionLoop } from "./ExecutionLoop";
import { MachineState } from "./MachineState";

function main() {
  const events = parentPort;
  if (events === null) return; // loaded outside a worker
  if (!isWorkerInit(workerData)) {
    throw new Error("Execution thread started without valid init data");
  }
  const init = workerData;

  const loop = new ExecutionLoop({
    state: new MachineState(init.state),
    control: new ControlBlock(init.control),
    receive: () => receiveMessageOnPort(init.port),
    emit: (event) => events.postMessage(event),
    programStart: init.programStart,
    timerHz: init.timerHz,
    trace: init.trace,
  });

  try {
    loop.run();
  } finally {
    init.port.close();
  }
}

main();
