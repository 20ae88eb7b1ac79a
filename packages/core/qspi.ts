import { z } from "zod";
import type { Logger } from "./logger.js";
import type { ProbeTransport } from "./transport.js";
import type { QspiLayout } from "./drivers/driver.js";
import { createError, toHex } from "./types.js";
import { alignDown, alignUp, isAligned, padToWords, readUInt32LE, writeUInt32LE } from "./bytes.js";
import { QSPI_SCRATCH_SIZE } from "./config.js";
import { delay } from "./transport.js";

// ============================================================================
// Parameters
// ============================================================================

const pinSchema = z
  .object({
    pin: z.number().int().min(0).max(31),
    port: z.number().int().min(0).max(1),
  })
  .strict();

const byteSchema = z.number().int().min(0).max(0xff);

export const qspiInstructionSchema = z
  .object({
    opcode: byteSchema,
    data: z.array(byteSchema).max(8).default([]),
  })
  .strict();

export const qspiParamsSchema = z
  .object({
    readMode: z.enum(["FASTREAD", "READ2O", "READ2IO", "READ4O", "READ4IO"]).default("READ4IO"),
    writeMode: z.enum(["PP", "PP2O", "PP4O", "PP4IO"]).default("PP4IO"),
    addressMode: z.enum(["BIT24", "BIT32"]).default("BIT24"),
    frequency: z.enum(["M2", "M4", "M8", "M16", "M32"]).default("M16"),
    spiMode: z.enum(["MODE0", "MODE3"]).default("MODE0"),
    sckDelay: byteSchema.default(0x80),
    io2Level: z.enum(["LOW", "HIGH"]).default("LOW"),
    io3Level: z.enum(["LOW", "HIGH"]).default("HIGH"),
    csn: pinSchema.default({ pin: 17, port: 0 }),
    sck: pinSchema.default({ pin: 19, port: 0 }),
    dio0: pinSchema.default({ pin: 20, port: 0 }),
    dio1: pinSchema.default({ pin: 21, port: 0 }),
    dio2: pinSchema.default({ pin: 22, port: 0 }),
    dio3: pinSchema.default({ pin: 23, port: 0 }),
    wipIndex: z.number().int().min(0).max(7).default(0),
    ppSize: z.enum(["PAGE256", "PAGE512"]).default("PAGE256"),
    memSize: z.number().int().positive().default(0x800000),
    rxDelay: z.number().int().min(0).max(7).optional(),
    initInstructions: z.array(qspiInstructionSchema).default([]),
  })
  .strict();

export type QspiParams = z.infer<typeof qspiParamsSchema>;
export type QspiParamsInput = z.input<typeof qspiParamsSchema>;
export type QspiInstruction = z.infer<typeof qspiInstructionSchema>;

export function parseQspiParams(input: unknown): QspiParams {
  const parsed = qspiParamsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "params"}: ${issue.message}` : parsed.error.message;
    throw createError("INVALID_PARAMETER", `Invalid QSPI parameters (${where})`);
  }
  return parsed.data;
}

export type QspiEraseLength = "4KB" | "32KB" | "64KB" | "ALL";

export const QSPI_ERASE_BYTES: Record<Exclude<QspiEraseLength, "ALL">, number> = {
  "4KB": 0x1000,
  "32KB": 0x8000,
  "64KB": 0x10000,
};

// ============================================================================
// Register map (offsets from the peripheral base)
// ============================================================================

export const QSPI_TASKS_ACTIVATE = 0x000;
export const QSPI_TASKS_READSTART = 0x004;
export const QSPI_TASKS_WRITESTART = 0x008;
export const QSPI_TASKS_ERASESTART = 0x00c;
export const QSPI_TASKS_DEACTIVATE = 0x010;
export const QSPI_EVENTS_READY = 0x100;
export const QSPI_ENABLE = 0x500;
export const QSPI_READ_SRC = 0x504;
export const QSPI_READ_DST = 0x508;
export const QSPI_READ_CNT = 0x50c;
export const QSPI_WRITE_DST = 0x510;
export const QSPI_WRITE_SRC = 0x514;
export const QSPI_WRITE_CNT = 0x518;
export const QSPI_ERASE_PTR = 0x51c;
export const QSPI_ERASE_LEN = 0x520;
export const QSPI_PSEL_SCK = 0x524;
export const QSPI_PSEL_CSN = 0x528;
export const QSPI_PSEL_IO0 = 0x530;
export const QSPI_XIPOFFSET = 0x540;
export const QSPI_IFCONFIG0 = 0x544;
export const QSPI_IFCONFIG1 = 0x600;
export const QSPI_STATUS = 0x604;
export const QSPI_CINSTRCONF = 0x634;
export const QSPI_CINSTRDAT0 = 0x638;
export const QSPI_CINSTRDAT1 = 0x63c;
export const QSPI_IFTIMING = 0x640;

// ERASE.LEN encodings
export const ERASE_LEN_4KB = 0;
export const ERASE_LEN_64KB = 1;
export const ERASE_LEN_ALL = 2;
export const ERASE_LEN_32KB = 3;

const READ_OPCODES: Record<QspiParams["readMode"], number> = {
  FASTREAD: 0, READ2O: 1, READ2IO: 2, READ4O: 3, READ4IO: 4,
};
const WRITE_OPCODES: Record<QspiParams["writeMode"], number> = {
  PP: 0, PP2O: 1, PP4O: 2, PP4IO: 3,
};
// SCKFREQ divider of the 32 MHz peripheral clock
const SCK_DIVIDERS: Record<QspiParams["frequency"], number> = {
  M2: 15, M4: 7, M8: 3, M16: 1, M32: 0,
};

const CINSTR_LIO2 = 1 << 12;
const CINSTR_LIO3 = 1 << 13;

const OPCODE_READ_STATUS = 0x05;
const OPCODE_ENTER_4BYTE = 0xb7;

const READY_TIMEOUT_MS = 2000;
const WIP_TIMEOUT_MS = 240_000;
const ADDRESS_LIMIT_24BIT = 0x1000000;

export function ifconfig0(params: QspiParams): number {
  return (
    READ_OPCODES[params.readMode] |
    (WRITE_OPCODES[params.writeMode] << 3) |
    ((params.addressMode === "BIT32" ? 1 : 0) << 6) |
    ((params.ppSize === "PAGE512" ? 1 : 0) << 12)
  ) >>> 0;
}

export function ifconfig1(params: QspiParams): number {
  return (
    params.sckDelay |
    ((params.spiMode === "MODE3" ? 1 : 0) << 25) |
    (SCK_DIVIDERS[params.frequency] << 28)
  ) >>> 0;
}

export function pselValue(pin: { pin: number; port: number }): number {
  return pin.pin | (pin.port << 5);
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Drives the QSPI peripheral through its EasyDMA registers, staging data in
 * a scratch buffer at the start of data RAM. Addresses given to the public
 * methods are XIP addresses.
 */
export class QspiEngine {
  private activated = false;
  private rxDelay: number | undefined;
  private retained: Uint8Array | null = null;

  private constructor(
    private readonly transport: ProbeTransport,
    private readonly layout: QspiLayout,
    readonly params: QspiParams,
    private readonly logger: Logger,
  ) {
    this.rxDelay = params.rxDelay;
  }

  static async init(
    transport: ProbeTransport,
    layout: QspiLayout,
    params: QspiParams,
    retainRam: boolean,
    logger: Logger,
  ): Promise<QspiEngine> {
    const engine = new QspiEngine(transport, layout, params, logger);
    if (retainRam) {
      engine.retained = await transport.readMemory(layout.scratchAddress, QSPI_SCRATCH_SIZE);
    }
    await engine.activate();
    return engine;
  }

  get isActive(): boolean {
    return this.activated;
  }

  get xipAddress(): number {
    return this.layout.xipAddress;
  }

  // A target reset returns the peripheral to its defaults
  invalidate(): void {
    this.activated = false;
  }

  private register(offset: number): number {
    return this.layout.base + offset;
  }

  private async activate(): Promise<void> {
    const t = this.transport;
    const p = this.params;

    await t.writeU32(this.register(QSPI_PSEL_SCK), pselValue(p.sck));
    await t.writeU32(this.register(QSPI_PSEL_CSN), pselValue(p.csn));
    const dio = [p.dio0, p.dio1, p.dio2, p.dio3];
    for (let i = 0; i < dio.length; i++) {
      const pin = dio[i];
      if (pin) {
        await t.writeU32(this.register(QSPI_PSEL_IO0 + i * 4), pselValue(pin));
      }
    }
    await t.writeU32(this.register(QSPI_XIPOFFSET), 0);
    await t.writeU32(this.register(QSPI_IFCONFIG0), ifconfig0(p));
    await t.writeU32(this.register(QSPI_IFCONFIG1), ifconfig1(p));
    if (this.rxDelay !== undefined) {
      await t.writeU32(this.register(QSPI_IFTIMING), this.rxDelay << 8);
    }

    await t.writeU32(this.register(QSPI_ENABLE), 1);
    await this.trigger(QSPI_TASKS_ACTIVATE);
    this.activated = true;
    this.logger.log("debug", `QSPI activated (IFCONFIG0 ${toHex(ifconfig0(p))}, IFCONFIG1 ${toHex(ifconfig1(p))})`);

    if (p.addressMode === "BIT32") {
      await this.custom(OPCODE_ENTER_4BYTE, 1);
    }
    for (const instruction of p.initInstructions) {
      await this.custom(instruction.opcode, instruction.data.length + 1, Uint8Array.from(instruction.data));
    }
  }

  private async ensureActive(): Promise<void> {
    if (!this.activated) {
      this.logger.log("debug", "Re-activating QSPI after reset");
      await this.activate();
    }
  }

  private async trigger(task: number): Promise<void> {
    await this.transport.writeU32(this.register(QSPI_EVENTS_READY), 0);
    await this.transport.writeU32(this.register(task), 1);
    await this.waitReady();
  }

  private async waitReady(timeoutMs = READY_TIMEOUT_MS): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if (await this.transport.readU32(this.register(QSPI_EVENTS_READY))) {
        return;
      }
      if (Date.now() > deadline) {
        throw createError("TRANSPORT_TIMEOUT", `QSPI READY event timed out after ${timeoutMs}ms`);
      }
      await delay(1);
    }
  }

  private async waitWriteComplete(timeoutMs = WIP_TIMEOUT_MS): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const status = await this.custom(OPCODE_READ_STATUS, 2);
      if (((status[0] ?? 0) & (1 << this.params.wipIndex)) === 0) {
        return;
      }
      if (Date.now() > deadline) {
        throw createError("TRANSPORT_TIMEOUT", `QSPI flash busy after ${timeoutMs}ms`);
      }
      await delay(1);
    }
  }

  // Flash-relative range of an XIP access, checked against the device limits
  private flashRange(address: number, length: number): { offset: number; end: number } {
    const offset = address - this.layout.xipAddress;
    const end = offset + length;
    if (offset < 0 || length < 0) {
      throw createError("INVALID_PARAMETER", `${toHex(address)} is not an XIP address`);
    }
    if (this.params.addressMode === "BIT24" && end > ADDRESS_LIMIT_24BIT) {
      throw createError(
        "INVALID_PARAMETER",
        `QSPI range ${toHex(offset)}-${toHex(end - 1)} exceeds 24-bit addressing`,
      );
    }
    if (end > this.params.memSize) {
      throw createError(
        "INVALID_PARAMETER",
        `QSPI range ${toHex(offset)}-${toHex(end - 1)} exceeds the ${this.params.memSize} byte flash`,
      );
    }
    return { offset, end };
  }

  /**
   * Issue a custom instruction. `length` counts the opcode, so at most eight
   * data bytes travel each way; the returned bytes are what the flash sent.
   */
  async custom(opcode: number, length: number, dataIn?: Uint8Array): Promise<Uint8Array> {
    if (!Number.isInteger(length) || length < 1 || length > 9) {
      throw createError("INVALID_PARAMETER", `Custom instruction length ${length} is outside 1..9`);
    }
    if (dataIn && dataIn.length > length - 1) {
      throw createError("INVALID_PARAMETER", `Custom instruction carries ${dataIn.length} bytes, length allows ${length - 1}`);
    }
    await this.ensureActive();

    const t = this.transport;
    const words = new Uint8Array(8);
    if (dataIn) {
      words.set(dataIn);
    }
    await t.writeU32(this.register(QSPI_CINSTRDAT0), readUInt32LE(words, 0));
    await t.writeU32(this.register(QSPI_CINSTRDAT1), readUInt32LE(words, 4));

    const config =
      (opcode & 0xff) |
      (length << 8) |
      (this.params.io2Level === "HIGH" ? CINSTR_LIO2 : 0) |
      (this.params.io3Level === "HIGH" ? CINSTR_LIO3 : 0);
    await t.writeU32(this.register(QSPI_EVENTS_READY), 0);
    await t.writeU32(this.register(QSPI_CINSTRCONF), config);
    await this.waitReady();

    const out = new Uint8Array(8);
    writeUInt32LE(out, await t.readU32(this.register(QSPI_CINSTRDAT0)), 0);
    writeUInt32LE(out, await t.readU32(this.register(QSPI_CINSTRDAT1)), 4);
    return out.slice(0, length - 1);
  }

  async read(address: number, length: number): Promise<Uint8Array> {
    const { offset, end } = this.flashRange(address, length);
    if (length === 0) {
      return new Uint8Array(0);
    }
    await this.ensureActive();

    const start = alignDown(offset, 4);
    const stop = alignUp(end, 4);
    const out = new Uint8Array(stop - start);
    const t = this.transport;

    for (let cursor = start; cursor < stop; cursor += QSPI_SCRATCH_SIZE) {
      const count = Math.min(QSPI_SCRATCH_SIZE, stop - cursor);
      await t.writeU32(this.register(QSPI_READ_SRC), cursor);
      await t.writeU32(this.register(QSPI_READ_DST), this.layout.scratchAddress);
      await t.writeU32(this.register(QSPI_READ_CNT), count);
      await this.trigger(QSPI_TASKS_READSTART);
      out.set(await t.readMemory(this.layout.scratchAddress, count), cursor - start);
    }

    return out.slice(offset - start, offset - start + length);
  }

  async write(address: number, data: Uint8Array): Promise<void> {
    this.flashRange(address, data.length);
    if (data.length === 0) {
      return;
    }
    await this.ensureActive();

    const current = await this.read(address, data.length);
    const programmed = current.findIndex((byte) => byte !== 0xff);
    if (programmed >= 0) {
      throw createError(
        "NVMC_ERROR",
        `QSPI flash at ${toHex(address + programmed)} is not erased (${toHex(current[programmed] ?? 0)})`,
      );
    }

    const padded = padToWords(address - this.layout.xipAddress, data);
    const t = this.transport;

    for (let cursor = 0; cursor < padded.data.length; cursor += QSPI_SCRATCH_SIZE) {
      const chunk = padded.data.subarray(cursor, Math.min(padded.data.length, cursor + QSPI_SCRATCH_SIZE));
      await t.writeMemory(this.layout.scratchAddress, chunk);
      await t.writeU32(this.register(QSPI_WRITE_DST), padded.address + cursor);
      await t.writeU32(this.register(QSPI_WRITE_SRC), this.layout.scratchAddress);
      await t.writeU32(this.register(QSPI_WRITE_CNT), chunk.length);
      await this.trigger(QSPI_TASKS_WRITESTART);
      await this.waitWriteComplete();
    }
  }

  async erase(address: number, length: QspiEraseLength): Promise<void> {
    if (length === "ALL") {
      await this.ensureActive();
      this.logger.log("info", "Erasing the whole QSPI flash...");
      await this.eraseBlock(0, ERASE_LEN_ALL);
      return;
    }

    const bytes = QSPI_ERASE_BYTES[length];
    const { offset } = this.flashRange(address, bytes);
    if (!isAligned(offset, bytes)) {
      throw createError("INVALID_PARAMETER", `QSPI erase address ${toHex(address)} is not aligned to ${length}`);
    }
    await this.ensureActive();

    if (length === "32KB" && !this.layout.erase32kSupported) {
      for (let sector = offset; sector < offset + bytes; sector += QSPI_ERASE_BYTES["4KB"]) {
        await this.eraseBlock(sector, ERASE_LEN_4KB);
      }
      return;
    }
    const code = length === "4KB" ? ERASE_LEN_4KB : length === "32KB" ? ERASE_LEN_32KB : ERASE_LEN_64KB;
    await this.eraseBlock(offset, code);
  }

  private async eraseBlock(offset: number, code: number): Promise<void> {
    await this.transport.writeU32(this.register(QSPI_ERASE_PTR), offset);
    await this.transport.writeU32(this.register(QSPI_ERASE_LEN), code);
    await this.trigger(QSPI_TASKS_ERASESTART);
    await this.waitWriteComplete();
  }

  async setRxDelay(rxDelay: number): Promise<void> {
    if (!Number.isInteger(rxDelay) || rxDelay < 0 || rxDelay > 7) {
      throw createError("INVALID_PARAMETER", `RX delay ${rxDelay} is outside 0..7`);
    }
    this.rxDelay = rxDelay;
    if (this.activated) {
      await this.transport.writeU32(this.register(QSPI_IFTIMING), rxDelay << 8);
    }
  }

  // Deactivate the peripheral and put back the scratch RAM when it was retained
  async uninit(): Promise<void> {
    try {
      if (this.activated) {
        await this.trigger(QSPI_TASKS_DEACTIVATE);
        await this.transport.writeU32(this.register(QSPI_ENABLE), 0);
      }
    } finally {
      this.activated = false;
      const retained = this.retained;
      this.retained = null;
      if (retained) {
        await this.transport.writeMemory(this.layout.scratchAddress, retained);
      }
    }
  }
}
