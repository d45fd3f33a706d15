import { InstrDescriptor, fmtAddr, fmtByte, fmtNibble, fmtReg, op } from "./types";
import {
  h_sys,
  h_jp,
  h_jp_v0,
  h_se_vx_kk,
  h_sne_vx_kk,
  h_se_vx_vy,
  h_sne_vx_vy,
} from "./handlers/flow";
import { h_call, h_ret } from "./handlers/stack";
import {
  h_add_vx_kk,
  h_add_vx_vy,
  h_sub_vx_vy,
  h_subn_vx_vy,
  h_shr_vx_vy,
  h_shl_vx_vy,
  h_rnd_vx_kk,
} from "./handlers/arithmetic";
import { h_or_vx_vy, h_and_vx_vy, h_xor_vx_vy } from "./handlers/logic";
import {
  h_ld_vx_kk,
  h_ld_vx_vy,
  h_ld_i_nnn,
  h_add_i_vx,
} from "./handlers/registers";
import {
  h_ld_f_vx,
  h_ld_b_vx,
  h_ld_mem_i_vx,
  h_ld_vx_mem_i,
} from "./handlers/memory";
import { h_cls, h_drw } from "./handlers/display";
import { h_skp_vx, h_sknp_vx, h_ld_vx_k } from "./handlers/input";
import { h_ld_vx_dt, h_ld_dt_vx, h_ld_st_vx } from "./handlers/timers";

// --- 0 family ---
export const CLS = op("00E0", {
  name: "CLS",
  execute: (s) => h_cls(s),
  disassemble: () => "CLS",
});

export const RET = op("00EE", {
  name: "RET",
  execute: (s) => h_ret(s),
  disassemble: () => "RET",
});

export const SYS = op("0nnn", {
  name: "SYS",
  execute: (s) => h_sys(s),
  disassemble: ({ nnn }) => `SYS ${fmtAddr(nnn)}`,
});

// --- jumps, calls and immediate forms ---
export const JP = op("1nnn", {
  name: "JP",
  execute: h_jp,
  disassemble: ({ nnn }) => `JP ${fmtAddr(nnn)}`,
});

export const CALL = op("2nnn", {
  name: "CALL",
  execute: h_call,
  disassemble: ({ nnn }) => `CALL ${fmtAddr(nnn)}`,
});

export const SE_VX_KK = op("3xkk", {
  name: "SE_VX_KK",
  execute: h_se_vx_kk,
  disassemble: ({ x, kk }) => `SE ${fmtReg(x)}, ${fmtByte(kk)}`,
});

export const SNE_VX_KK = op("4xkk", {
  name: "SNE_VX_KK",
  execute: h_sne_vx_kk,
  disassemble: ({ x, kk }) => `SNE ${fmtReg(x)}, ${fmtByte(kk)}`,
});

export const SE_VX_VY = op("5xy0", {
  name: "SE_VX_VY",
  execute: h_se_vx_vy,
  disassemble: ({ x, y }) => `SE ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const LD_VX_KK = op("6xkk", {
  name: "LD_VX_KK",
  execute: h_ld_vx_kk,
  disassemble: ({ x, kk }) => `LD ${fmtReg(x)}, ${fmtByte(kk)}`,
});

export const ADD_VX_KK = op("7xkk", {
  name: "ADD_VX_KK",
  execute: h_add_vx_kk,
  disassemble: ({ x, kk }) => `ADD ${fmtReg(x)}, ${fmtByte(kk)}`,
});

// --- 8xyN register-register ALU ---
export const LD_VX_VY = op("8xy0", {
  name: "LD_VX_VY",
  execute: h_ld_vx_vy,
  disassemble: ({ x, y }) => `LD ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const OR_VX_VY = op("8xy1", {
  name: "OR_VX_VY",
  execute: h_or_vx_vy,
  disassemble: ({ x, y }) => `OR ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const AND_VX_VY = op("8xy2", {
  name: "AND_VX_VY",
  execute: h_and_vx_vy,
  disassemble: ({ x, y }) => `AND ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const XOR_VX_VY = op("8xy3", {
  name: "XOR_VX_VY",
  execute: h_xor_vx_vy,
  disassemble: ({ x, y }) => `XOR ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const ADD_VX_VY = op("8xy4", {
  name: "ADD_VX_VY",
  execute: h_add_vx_vy,
  disassemble: ({ x, y }) => `ADD ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const SUB_VX_VY = op("8xy5", {
  name: "SUB_VX_VY",
  execute: h_sub_vx_vy,
  disassemble: ({ x, y }) => `SUB ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const SHR_VX_VY = op("8xy6", {
  name: "SHR_VX_VY",
  execute: h_shr_vx_vy,
  disassemble: ({ x, y }) => `SHR ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const SUBN_VX_VY = op("8xy7", {
  name: "SUBN_VX_VY",
  execute: h_subn_vx_vy,
  disassemble: ({ x, y }) => `SUBN ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const SHL_VX_VY = op("8xyE", {
  name: "SHL_VX_VY",
  execute: h_shl_vx_vy,
  disassemble: ({ x, y }) => `SHL ${fmtReg(x)}, ${fmtReg(y)}`,
});

export const SNE_VX_VY = op("9xy0", {
  name: "SNE_VX_VY",
  execute: h_sne_vx_vy,
  disassemble: ({ x, y }) => `SNE ${fmtReg(x)}, ${fmtReg(y)}`,
});

// --- A-D ---
export const LD_I_NNN = op("Annn", {
  name: "LD_I_NNN",
  execute: h_ld_i_nnn,
  disassemble: ({ nnn }) => `LD I, ${fmtAddr(nnn)}`,
});

export const JP_V0_NNN = op("Bnnn", {
  name: "JP_V0_NNN",
  execute: h_jp_v0,
  disassemble: ({ nnn }) => `JP V0, ${fmtAddr(nnn)}`,
});

export const RND_VX_KK = op("Cxkk", {
  name: "RND_VX_KK",
  execute: h_rnd_vx_kk,
  disassemble: ({ x, kk }) => `RND ${fmtReg(x)}, ${fmtByte(kk)}`,
});

export const DRW_VX_VY_N = op("Dxyn", {
  name: "DRW_VX_VY_N",
  execute: h_drw,
  disassemble: ({ x, y, n }) => `DRW ${fmtReg(x)}, ${fmtReg(y)}, ${fmtNibble(n)}`,
});

// --- keypad ---
export const SKP_VX = op("Ex9E", {
  name: "SKP_VX",
  execute: h_skp_vx,
  disassemble: ({ x }) => `SKP ${fmtReg(x)}`,
});

export const SKNP_VX = op("ExA1", {
  name: "SKNP_VX",
  execute: h_sknp_vx,
  disassemble: ({ x }) => `SKNP ${fmtReg(x)}`,
});

// --- Fx family ---
export const LD_VX_DT = op("Fx07", {
  name: "LD_VX_DT",
  execute: h_ld_vx_dt,
  disassemble: ({ x }) => `LD ${fmtReg(x)}, DT`,
});

export const LD_VX_K = op("Fx0A", {
  name: "LD_VX_K",
  execute: h_ld_vx_k,
  disassemble: ({ x }) => `LD ${fmtReg(x)}, K`,
});

export const LD_DT_VX = op("Fx15", {
  name: "LD_DT_VX",
  execute: h_ld_dt_vx,
  disassemble: ({ x }) => `LD DT, ${fmtReg(x)}`,
});

export const LD_ST_VX = op("Fx18", {
  name: "LD_ST_VX",
  execute: h_ld_st_vx,
  disassemble: ({ x }) => `LD ST, ${fmtReg(x)}`,
});

export const ADD_I_VX = op("Fx1E", {
  name: "ADD_I_VX",
  execute: h_add_i_vx,
  disassemble: ({ x }) => `ADD I, ${fmtReg(x)}`,
});

export const LD_F_VX = op("Fx29", {
  name: "LD_F_VX",
  execute: h_ld_f_vx,
  disassemble: ({ x }) => `LD F, ${fmtReg(x)}`,
});

export const LD_B_VX = op("Fx33", {
  name: "LD_B_VX",
  execute: h_ld_b_vx,
  disassemble: ({ x }) => `LD B, ${fmtReg(x)}`,
});

export const LD_MEM_I_VX = op("Fx55", {
  name: "LD_MEM_I_VX",
  execute: h_ld_mem_i_vx,
  disassemble: ({ x }) => `LD [I], ${fmtReg(x)}`,
});

export const LD_VX_MEM_I = op("Fx65", {
  name: "LD_VX_MEM_I",
  execute: h_ld_vx_mem_i,
  disassemble: ({ x }) => `LD ${fmtReg(x)}, [I]`,
});

// All canonical CHIP-8 instructions, in definition order
export const INSTRUCTIONS: readonly InstrDescriptor[] = [
  CLS,
  RET,
  SYS,
  JP,
  CALL,
  SE_VX_KK,
  SNE_VX_KK,
  SE_VX_VY,
  LD_VX_KK,
  ADD_VX_KK,
  LD_VX_VY,
  OR_VX_VY,
  AND_VX_VY,
  XOR_VX_VY,
  ADD_VX_VY,
  SUB_VX_VY,
  SHR_VX_VY,
  SUBN_VX_VY,
  SHL_VX_VY,
  SNE_VX_VY,
  LD_I_NNN,
  JP_V0_NNN,
  RND_VX_KK,
  DRW_VX_VY_N,
  SKP_VX,
  SKNP_VX,
  LD_VX_DT,
  LD_VX_K,
  LD_DT_VX,
  LD_ST_VX,
  ADD_I_VX,
  LD_F_VX,
  LD_B_VX,
  LD_MEM_I_VX,
  LD_VX_MEM_I,
];
