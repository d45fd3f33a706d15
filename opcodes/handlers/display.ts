// Screen handlers

import {
  MEMORY_SIZE,
  MachineState,
  SCREEN_DIMENSIONS,
  pixelIndex,
} from "../../MachineState";
import { Operands, nextInstruction } from "../types";

export function h_cls(state: MachineState) {
  state.framebuffer.fill(0);
  nextInstruction(state);
}

/**
 * XOR an n-byte sprite read from I onto the screen at (Vx, Vy).
 *
 * The start position wraps into the active screen; pixels that would land
 * past the right or bottom edge are clipped. VF is set when any lit pixel
 * is turned off.
 */
export function h_drw(state: MachineState, { x, y, n }: Operands) {
  const { width, height } = SCREEN_DIMENSIONS[state.screenMode];
  const originX = state.v[x] % width;
  const originY = state.v[y] % height;
  let collision = false;

  for (let row = 0; row < n; row++) {
    const py = originY + row;
    if (py >= height) break;

    const bits = state.memory[(state.i + row) % MEMORY_SIZE];
    for (let col = 0; col < 8; col++) {
      const px = originX + col;
      if (px >= width) break;
      if ((bits & (0x80 >> col)) === 0) continue;

      const idx = pixelIndex(px, py);
      if (state.framebuffer[idx] === 1) collision = true;
      state.framebuffer[idx] ^= 1;
    }
  }

  state.v[0xf] = collision ? 1 : 0;
  nextInstruction(state);
}
