import { createError } from "../types.js";

// SMP (simple management protocol) packets and their console framing

export const SMP_OP_READ = 0;
export const SMP_OP_WRITE = 2;

export const SMP_GROUP_OS = 0;
export const SMP_GROUP_IMAGE = 1;

export const SMP_HEADER_SIZE = 8;

export interface SmpHeader {
  op: number;
  flags: number;
  group: number;
  sequence: number;
  id: number;
}

export interface SmpPacket {
  header: SmpHeader;
  payload: Uint8Array;
}

export function encodeSmp(header: SmpHeader, payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(SMP_HEADER_SIZE + payload.length);
  const view = new DataView(out.buffer);
  view.setUint8(0, header.op);
  view.setUint8(1, header.flags);
  view.setUint16(2, payload.length);
  view.setUint16(4, header.group);
  view.setUint8(6, header.sequence);
  view.setUint8(7, header.id);
  out.set(payload, SMP_HEADER_SIZE);
  return out;
}

export function decodeSmp(packet: Uint8Array): SmpPacket {
  if (packet.length < SMP_HEADER_SIZE) {
    throw createError("DFU_ERROR", `SMP packet of ${packet.length} bytes is shorter than its header`);
  }
  const view = new DataView(packet.buffer, packet.byteOffset, packet.byteLength);
  const length = view.getUint16(2);
  if (packet.length !== SMP_HEADER_SIZE + length) {
    throw createError(
      "DFU_ERROR",
      `SMP packet declares ${length} payload bytes but carries ${packet.length - SMP_HEADER_SIZE}`,
    );
  }
  return {
    header: {
      op: view.getUint8(0),
      flags: view.getUint8(1),
      group: view.getUint16(4),
      sequence: view.getUint8(6),
      id: view.getUint8(7),
    },
    payload: packet.subarray(SMP_HEADER_SIZE),
  };
}

// CRC-16/XMODEM: polynomial 0x1021, initial value 0
export function crc16(data: Uint8Array, crc = 0): number {
  for (const byte of data) {
    crc ^= byte << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
    }
  }
  return crc;
}

const FRAME_START = [0x06, 0x09] as const;
const FRAME_CONTINUE = [0x04, 0x14] as const;
const NEWLINE = 0x0a;
// Base64 characters per frame: 127 bytes less the marker and the newline, in whole quads
const FRAME_TEXT = 124;

/**
 * Console framing: [length][packet][crc16] is base64 encoded and cut into
 * newline terminated frames, the first marked 06 09 and the rest 04 14.
 */
export function encodeSerialFrames(packet: Uint8Array): Uint8Array {
  const body = new Uint8Array(packet.length + 4);
  const view = new DataView(body.buffer);
  view.setUint16(0, packet.length + 2);
  body.set(packet, 2);
  view.setUint16(packet.length + 2, crc16(packet));

  const text = Buffer.from(body).toString("base64");
  const out: number[] = [];
  for (let offset = 0; offset < text.length; offset += FRAME_TEXT) {
    out.push(...(offset === 0 ? FRAME_START : FRAME_CONTINUE));
    for (const char of text.slice(offset, offset + FRAME_TEXT)) {
      out.push(char.charCodeAt(0));
    }
    out.push(NEWLINE);
  }
  return Uint8Array.from(out);
}

/** Collects console frames (newline already stripped) into SMP packets. */
export class SerialFrameAssembler {
  private body: number[] | null = null;

  // Returns the packet once its last frame arrives; other console output is skipped
  push(frame: Uint8Array): Uint8Array | null {
    const [first, second] = frame;
    if (first === FRAME_START[0] && second === FRAME_START[1]) {
      this.body = [];
    } else if (first !== FRAME_CONTINUE[0] || second !== FRAME_CONTINUE[1] || this.body === null) {
      return null;
    }

    const text = new TextDecoder().decode(frame.subarray(2)).trim();
    const body = [...this.body, ...Buffer.from(text, "base64")];
    this.body = body;
    if (body.length < 2) {
      return null;
    }

    const length = ((body[0] ?? 0) << 8) | (body[1] ?? 0);
    if (body.length < length + 2) {
      return null;
    }
    this.body = null;
    if (length < 2) {
      throw createError("DFU_ERROR", `SMP frame declares an impossible length ${length}`);
    }

    const packet = Uint8Array.from(body.slice(2, length));
    const crc = ((body[length] ?? 0) << 8) | (body[length + 1] ?? 0);
    const expected = crc16(packet);
    if (crc !== expected) {
      throw createError(
        "DFU_ERROR",
        `SMP frame checksum mismatch: received 0x${crc.toString(16).padStart(4, "0")}, computed 0x${expected.toString(16).padStart(4, "0")}`,
      );
    }
    return packet;
  }
}
