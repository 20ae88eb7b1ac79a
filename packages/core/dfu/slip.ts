import { createError } from "../types.js";

export const SLIP_END = 0xc0;
const SLIP_ESC = 0xdb;
const SLIP_ESC_END = 0xdc;
const SLIP_ESC_ESC = 0xdd;

export function slipEncode(packet: Uint8Array): Uint8Array {
  const out: number[] = [];
  for (const byte of packet) {
    if (byte === SLIP_END) {
      out.push(SLIP_ESC, SLIP_ESC_END);
    } else if (byte === SLIP_ESC) {
      out.push(SLIP_ESC, SLIP_ESC_ESC);
    } else {
      out.push(byte);
    }
  }
  out.push(SLIP_END);
  return Uint8Array.from(out);
}

// `frame` is everything between two END bytes
export function slipDecode(frame: Uint8Array): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < frame.length; i++) {
    const byte = frame[i];
    if (byte !== SLIP_ESC) {
      out.push(byte ?? 0);
      continue;
    }
    const next = frame[++i];
    if (next === SLIP_ESC_END) {
      out.push(SLIP_END);
    } else if (next === SLIP_ESC_ESC) {
      out.push(SLIP_ESC);
    } else {
      throw createError("DFU_ERROR", `Invalid SLIP escape at byte ${i - 1}`);
    }
  }
  return Uint8Array.from(out);
}
