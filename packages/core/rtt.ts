import type { Logger } from "./logger.js";
import type { ProbeTransport } from "./transport.js";
import type { RttChannel, RttDirection } from "./types.js";
import { createError, toHex } from "./types.js";
import { readUInt32LE } from "./bytes.js";
import { CHUNK_SIZE } from "./config.js";

// "SEGGER RTT" followed by a NUL inside the 16-byte id field
export const RTT_MAGIC = new TextEncoder().encode("SEGGER RTT\0");
const ID_SIZE = 16;
const HEADER_SIZE = 24;
const DESCRIPTOR_SIZE = 24;
const NAME_MAX = 32;
const MAX_CHANNELS = 64;

// Descriptor field offsets
const DESC_NAME = 0;
const DESC_BUFFER = 4;
const DESC_SIZE = 8;
const DESC_WROFF = 12;
const DESC_RDOFF = 16;

export type RttState = "STOPPED" | "SEARCHING" | "RUNNING";

export interface RttSearchRange {
  address: number;
  size: number;
}

interface ChannelLayout extends RttChannel {
  descriptor: number;
  buffer: number;
}

interface RingState {
  buffer: number;
  size: number;
  wrOff: number;
  rdOff: number;
}

export function findMagic(haystack: Uint8Array): number {
  outer: for (let i = 0; i + RTT_MAGIC.length <= haystack.length; i++) {
    for (let j = 0; j < RTT_MAGIC.length; j++) {
      if (haystack[i + j] !== RTT_MAGIC[j]) {
        continue outer;
      }
    }
    return i;
  }
  return -1;
}

/**
 * Host side of the RTT channels. Works against a running target: nothing
 * here halts the core.
 */
export class RttEngine {
  private state: RttState = "STOPPED";
  private fixedAddress: number | null = null;
  private controlBlock: number | null = null;
  private up: ChannelLayout[] = [];
  private down: ChannelLayout[] = [];

  constructor(
    private readonly transport: ProbeTransport,
    private readonly searchRanges: () => Promise<RttSearchRange[]>,
    private readonly logger: Logger,
  ) {}

  get status(): RttState {
    return this.state;
  }

  get isStarted(): boolean {
    return this.state !== "STOPPED";
  }

  setControlBlockAddress(address: number): void {
    if (this.state !== "STOPPED") {
      throw createError("INVALID_OPERATION", "RTT control block address cannot change while RTT is started");
    }
    this.fixedAddress = address >>> 0;
  }

  start(): void {
    if (this.state !== "STOPPED") {
      throw createError("INVALID_OPERATION", "RTT is already started");
    }
    this.state = "SEARCHING";
  }

  // One search pass per call while searching
  async isControlBlockFound(): Promise<boolean> {
    if (this.state === "STOPPED") {
      throw createError("INVALID_OPERATION", "RTT is not started");
    }
    if (this.state === "RUNNING") {
      return true;
    }

    const address = this.fixedAddress !== null ? await this.probeFixed(this.fixedAddress) : await this.scan();
    if (address === null) {
      return false;
    }
    if (!(await this.parseControlBlock(address))) {
      return false;
    }
    this.controlBlock = address;
    this.state = "RUNNING";
    this.logger.log(
      "info",
      `RTT control block at ${toHex(address)} (${this.up.length} up, ${this.down.length} down)`,
    );
    return true;
  }

  private async probeFixed(address: number): Promise<number | null> {
    const id = await this.transport.readMemory(address, RTT_MAGIC.length);
    return findMagic(id) === 0 ? address : null;
  }

  private async scan(): Promise<number | null> {
    const overlap = RTT_MAGIC.length - 1;
    for (const range of await this.searchRanges()) {
      for (let offset = 0; offset < range.size; offset += CHUNK_SIZE - overlap) {
        const length = Math.min(CHUNK_SIZE, range.size - offset);
        const chunk = await this.transport.readMemory(range.address + offset, length);
        const index = findMagic(chunk);
        if (index >= 0) {
          return range.address + offset + index;
        }
        if (offset + length >= range.size) {
          break;
        }
      }
    }
    return null;
  }

  private async parseControlBlock(address: number): Promise<boolean> {
    const header = await this.transport.readMemory(address + ID_SIZE, 8);
    const maxUp = readUInt32LE(header, 0);
    const maxDown = readUInt32LE(header, 4);
    if (maxUp > MAX_CHANNELS || maxDown > MAX_CHANNELS) {
      this.logger.log("warn", `Ignoring RTT control block at ${toHex(address)} with ${maxUp} up / ${maxDown} down channels`);
      return false;
    }

    const up: ChannelLayout[] = [];
    const down: ChannelLayout[] = [];
    for (let i = 0; i < maxUp + maxDown; i++) {
      const direction: RttDirection = i < maxUp ? "UP" : "DOWN";
      const index = i < maxUp ? i : i - maxUp;
      const descriptor = address + HEADER_SIZE + i * DESCRIPTOR_SIZE;
      const raw = await this.transport.readMemory(descriptor, DESCRIPTOR_SIZE);
      const channel: ChannelLayout = {
        direction,
        index,
        name: await this.readName(readUInt32LE(raw, DESC_NAME)),
        size: readUInt32LE(raw, DESC_SIZE),
        descriptor,
        buffer: readUInt32LE(raw, DESC_BUFFER),
      };
      (direction === "UP" ? up : down).push(channel);
    }
    this.up = up;
    this.down = down;
    return true;
  }

  private async readName(pointer: number): Promise<string> {
    if (pointer === 0) {
      return "";
    }
    const bytes = await this.transport.readMemory(pointer, NAME_MAX);
    const end = bytes.indexOf(0);
    return new TextDecoder().decode(end < 0 ? bytes : bytes.subarray(0, end));
  }

  private requireRunning(): void {
    if (this.state !== "RUNNING") {
      throw createError("INVALID_OPERATION", "RTT control block has not been found");
    }
  }

  private channel(direction: RttDirection, index: number): ChannelLayout {
    this.requireRunning();
    const channels = direction === "UP" ? this.up : this.down;
    const channel = channels[index];
    if (!channel || !Number.isInteger(index)) {
      throw createError(
        "INVALID_PARAMETER",
        `RTT ${direction.toLowerCase()} channel ${index} does not exist (${channels.length} available)`,
      );
    }
    return channel;
  }

  private async ring(channel: ChannelLayout): Promise<RingState> {
    const raw = await this.transport.readMemory(channel.descriptor, DESCRIPTOR_SIZE);
    const state = {
      buffer: readUInt32LE(raw, DESC_BUFFER),
      size: readUInt32LE(raw, DESC_SIZE),
      wrOff: readUInt32LE(raw, DESC_WROFF),
      rdOff: readUInt32LE(raw, DESC_RDOFF),
    };
    if (state.size === 0 || state.wrOff >= state.size || state.rdOff >= state.size) {
      throw createError(
        "INVALID_OPERATION",
        `RTT ${channel.direction.toLowerCase()} channel ${channel.index} has a corrupt descriptor ` +
          `(size ${state.size}, WrOff ${state.wrOff}, RdOff ${state.rdOff})`,
      );
    }
    return state;
  }

  channelCount(): { down: number; up: number } {
    this.requireRunning();
    return { down: this.down.length, up: this.up.length };
  }

  channelInfo(index: number, direction: RttDirection): RttChannel {
    const { name, size } = this.channel(direction, index);
    return { direction, index, name, size };
  }

  // Drain at most `length` bytes from an up channel; may return none
  async read(upIndex: number, length: number): Promise<Uint8Array> {
    const channel = this.channel("UP", upIndex);
    const { buffer, size, wrOff, rdOff } = await this.ring(channel);
    const available = wrOff >= rdOff ? wrOff - rdOff : size - rdOff + wrOff;
    const count = Math.min(available, Math.max(0, length));
    if (count === 0) {
      return new Uint8Array(0);
    }

    const first = Math.min(count, size - rdOff);
    const out = new Uint8Array(count);
    out.set(await this.transport.readMemory(buffer + rdOff, first), 0);
    if (count > first) {
      out.set(await this.transport.readMemory(buffer, count - first), first);
    }
    await this.transport.writeU32(channel.descriptor + DESC_RDOFF, (rdOff + count) % size);
    return out;
  }

  // Returns how many bytes fit into the down channel
  async write(downIndex: number, data: Uint8Array): Promise<number> {
    const channel = this.channel("DOWN", downIndex);
    const { buffer, size, wrOff, rdOff } = await this.ring(channel);
    const free = rdOff > wrOff ? rdOff - wrOff - 1 : size - (wrOff - rdOff) - 1;
    const count = Math.min(free, data.length);
    if (count <= 0) {
      return 0;
    }

    const first = Math.min(count, size - wrOff);
    await this.transport.writeMemory(buffer + wrOff, data.subarray(0, first));
    if (count > first) {
      await this.transport.writeMemory(buffer, data.subarray(first, count));
    }
    await this.transport.writeU32(channel.descriptor + DESC_WROFF, (wrOff + count) % size);
    return count;
  }

  // Clobber the magic so the next start cannot find a stale block
  async stop(): Promise<void> {
    if (this.state === "STOPPED") {
      return;
    }
    const controlBlock = this.controlBlock;
    this.state = "STOPPED";
    this.controlBlock = null;
    this.up = [];
    this.down = [];
    if (controlBlock !== null) {
      await this.transport.writeMemory(controlBlock, new Uint8Array(ID_SIZE));
    }
  }
}
