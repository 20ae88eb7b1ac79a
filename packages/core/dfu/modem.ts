import CRC32 from "crc-32";
import type { Logger } from "../logger.js";
import type { DfuVerifyMode, Result } from "../types.js";
import type { DfuOptions, SerialLink } from "./link.js";
import { silentLogger } from "../logger.js";
import { createError, err, ok, toCoreError, toHex } from "../types.js";
import { concatBytes, readUInt32LE, writeUInt32LE } from "../bytes.js";
import { DFU_TIMEOUT_MS, MODEM_DFU_BAUD_RATE } from "../config.js";
import { FrameReader, openSerialLink } from "./link.js";
import { SLIP_END, slipDecode, slipEncode } from "./slip.js";

// Object transfer opcodes
const OP_CREATE = 0x01;
const OP_SET_PRN = 0x02;
const OP_CALC_CRC = 0x03;
const OP_EXECUTE = 0x04;
const OP_SELECT = 0x06;
const OP_GET_MTU = 0x07;
const OP_WRITE = 0x08;
const OP_PING = 0x09;
const OP_RESPONSE = 0x60;

const OP_NAMES: Record<number, string> = {
  [OP_CREATE]: "create",
  [OP_SET_PRN]: "set receipt notification",
  [OP_CALC_CRC]: "calculate checksum",
  [OP_EXECUTE]: "execute",
  [OP_SELECT]: "select",
  [OP_GET_MTU]: "get MTU",
  [OP_PING]: "ping",
};

const OBJECT_COMMAND = 0x01;
const OBJECT_DATA = 0x02;

const RESULT_SUCCESS = 0x01;
const RESULT_EXTENDED = 0x0b;

const RESULTS: Record<number, string> = {
  0x00: "invalid opcode",
  0x02: "opcode not supported",
  0x03: "invalid parameter",
  0x04: "insufficient resources",
  0x05: "invalid object",
  0x07: "unsupported type",
  0x08: "operation not permitted",
  0x0a: "operation failed",
};

function u32(value: number): number[] {
  const out = new Uint8Array(4);
  writeUInt32LE(out, value, 0);
  return [...out];
}

function requireLength(payload: Uint8Array, length: number, opcode: number): void {
  if (payload.length < length) {
    throw createError(
      "DFU_ERROR",
      `DFU ${OP_NAMES[opcode] ?? "request"} response has ${payload.length} bytes, expected ${length}`,
    );
  }
}

/**
 * Modem firmware update over UART. The init packet and the firmware are sent
 * as command and data objects in SLIP frames; each object is created,
 * written, optionally checksummed and executed in turn.
 */
export class ModemDfu {
  private pingId = 0;
  private readonly reader: FrameReader;
  private readonly timeoutMs: number;
  private readonly verify: DfuVerifyMode;
  private readonly logger: Logger;

  constructor(
    private readonly link: SerialLink,
    options: DfuOptions = {},
  ) {
    this.reader = new FrameReader(link, SLIP_END);
    this.timeoutMs = options.timeoutMs ?? DFU_TIMEOUT_MS;
    this.verify = options.verify ?? "HASH";
    this.logger = options.logger ?? silentLogger;
  }

  static async open(path: string, options: DfuOptions = {}): Promise<Result<ModemDfu>> {
    try {
      const link = await openSerialLink(path, options.baudRate ?? MODEM_DFU_BAUD_RATE);
      return ok(new ModemDfu(link, options));
    } catch (e) {
      return err(toCoreError(e));
    }
  }

  private async run<T>(operation: string, action: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await action());
    } catch (e) {
      const error = toCoreError(e);
      this.logger.log("error", `${operation} failed: ${error.message}`);
      return err(error);
    }
  }

  private async request(opcode: number, params: readonly number[] = []): Promise<Uint8Array> {
    const name = OP_NAMES[opcode] ?? toHex(opcode);
    this.reader.clear();
    await this.link.write(slipEncode(Uint8Array.from([opcode, ...params])));

    for (;;) {
      const frame = slipDecode(await this.reader.next(this.timeoutMs, `DFU ${name} request`));
      if (frame[0] !== OP_RESPONSE || frame[1] !== opcode) {
        this.logger.log("debug", `Skipping unexpected DFU frame of ${frame.length} bytes`);
        continue;
      }
      const result = frame[2];
      if (result === RESULT_SUCCESS) {
        return frame.subarray(3);
      }
      if (result === RESULT_EXTENDED) {
        throw createError("DFU_ERROR", `DFU ${name} failed with extended error ${frame[3] ?? 0}`);
      }
      throw createError(
        "DFU_ERROR",
        `DFU ${name} failed: ${result === undefined ? "no result code" : (RESULTS[result] ?? `result ${result}`)}`,
      );
    }
  }

  /**
   * Send an init packet and its firmware. The device applies the update
   * once the last data object executes.
   */
  program(initPacket: Uint8Array, firmware: Uint8Array): Promise<Result<void>> {
    return this.run("program", async () => {
      if (initPacket.length === 0 || firmware.length === 0) {
        throw createError("INVALID_PARAMETER", "Init packet and firmware must not be empty");
      }

      await this.ping();
      await this.request(OP_SET_PRN, [0, 0]);
      const mtu = await this.request(OP_GET_MTU);
      requireLength(mtu, 2, OP_GET_MTU);
      const mtuSize = (mtu[0] ?? 0) | ((mtu[1] ?? 0) << 8);
      // Every byte may need escaping, and the write opcode takes one
      const chunkSize = Math.floor((mtuSize - 1) / 2) - 1;
      if (chunkSize <= 0) {
        throw createError("DFU_ERROR", `Device reported an unusable MTU of ${mtuSize}`);
      }

      this.logger.progress("init");
      this.logger.log("info", `Sending ${initPacket.length} byte init packet`);
      await this.transfer(OBJECT_COMMAND, initPacket, chunkSize);

      this.logger.progress("firmware");
      this.logger.log("info", `Sending ${firmware.length} bytes of modem firmware`);
      await this.transfer(OBJECT_DATA, firmware, chunkSize);
      this.logger.log("info", "Modem firmware update sent");
    });
  }

  private async ping(): Promise<void> {
    this.pingId = (this.pingId + 1) & 0xff;
    const reply = await this.request(OP_PING, [this.pingId]);
    if (reply[0] !== this.pingId) {
      throw createError("DFU_ERROR", `DFU ping ${this.pingId} answered with ${reply[0] ?? "nothing"}`);
    }
  }

  private async transfer(type: number, data: Uint8Array, chunkSize: number): Promise<void> {
    const selected = await this.request(OP_SELECT, [type]);
    requireLength(selected, 12, OP_SELECT);
    const maxSize = readUInt32LE(selected, 0);
    if (maxSize === 0) {
      throw createError("DFU_ERROR", "Device accepts objects of 0 bytes");
    }
    if (type === OBJECT_COMMAND && data.length > maxSize) {
      throw createError(
        "DFU_ERROR",
        `Init packet of ${data.length} bytes exceeds the device limit of ${maxSize}`,
      );
    }

    for (let offset = 0; offset < data.length; offset += maxSize) {
      const object = data.subarray(offset, Math.min(data.length, offset + maxSize));
      await this.request(OP_CREATE, [type, ...u32(object.length)]);
      for (let cursor = 0; cursor < object.length; cursor += chunkSize) {
        const chunk = object.subarray(cursor, Math.min(object.length, cursor + chunkSize));
        await this.link.write(slipEncode(concatBytes([Uint8Array.of(OP_WRITE), chunk])));
      }
      if (this.verify === "HASH") {
        await this.checkCrc(data.subarray(0, offset + object.length));
      }
      await this.request(OP_EXECUTE);
      this.logger.log("debug", `Executed object ending at ${offset + object.length}/${data.length}`);
    }
  }

  private async checkCrc(sent: Uint8Array): Promise<void> {
    const reply = await this.request(OP_CALC_CRC);
    requireLength(reply, 8, OP_CALC_CRC);
    const offset = readUInt32LE(reply, 0);
    const crc = readUInt32LE(reply, 4);
    const expected = CRC32.buf(sent) >>> 0;
    if (offset !== sent.length) {
      throw createError("DFU_ERROR", `Device holds ${offset} bytes, ${sent.length} were sent`);
    }
    if (crc !== expected) {
      throw createError("DFU_ERROR", `CRC mismatch after ${offset} bytes: device ${toHex(crc)}, expected ${toHex(expected)}`);
    }
  }

  close(): Promise<Result<void>> {
    return this.run("close", () => this.link.close());
  }
}
