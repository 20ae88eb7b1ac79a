// Helper function to write uint32 in little-endian format
export function writeUInt32LE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = value & 0xff;
  buffer[offset + 1] = (value >> 8) & 0xff;
  buffer[offset + 2] = (value >> 16) & 0xff;
  buffer[offset + 3] = (value >> 24) & 0xff;
}

// Helper function to read uint32 in little-endian format
export function readUInt32LE(buffer: Uint8Array, offset: number): number {
  return (
    (buffer[offset] ?? 0) |
    ((buffer[offset + 1] ?? 0) << 8) |
    ((buffer[offset + 2] ?? 0) << 16) |
    ((buffer[offset + 3] ?? 0) << 24)
  ) >>> 0;
}

export function wordsToBytes(words: Uint32Array | readonly number[]): Uint8Array {
  const buffer = new Uint8Array(words.length * 4);
  for (let i = 0; i < words.length; i++) {
    writeUInt32LE(buffer, words[i] ?? 0, i * 4);
  }
  return buffer;
}

// Length must be a multiple of 4
export function bytesToWords(data: Uint8Array): Uint32Array {
  const words = new Uint32Array(data.length / 4);
  for (let i = 0; i < words.length; i++) {
    words[i] = readUInt32LE(data, i * 4);
  }
  return words;
}

export function alignDown(value: number, alignment: number): number {
  return value - (value % alignment);
}

export function alignUp(value: number, alignment: number): number {
  const rest = value % alignment;
  return rest === 0 ? value : value + alignment - rest;
}

export function isAligned(value: number, alignment: number): boolean {
  return value % alignment === 0;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

// Index of the first differing byte, or -1
export function firstMismatch(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return i;
    }
  }
  return a.length === b.length ? -1 : length;
}

// Copy `data` into a word-aligned buffer padded with 0xFF
export function padToWords(address: number, data: Uint8Array): { address: number; data: Uint8Array } {
  const start = alignDown(address, 4);
  const end = alignUp(address + data.length, 4);
  const padded = new Uint8Array(end - start).fill(0xff);
  padded.set(data, address - start);
  return { address: start, data: padded };
}
