import { createHash } from "crypto";
import { describe, expect, it } from "vitest";
import { createError } from "../types.js";
import { McubootDfu } from "../dfu/mcuboot.js";
import { ModemDfu } from "../dfu/modem.js";
import { slipDecode, slipEncode } from "../dfu/slip.js";
import { crc16, encodeSerialFrames, encodeSmp, SerialFrameAssembler } from "../dfu/smp.js";
import { FakeMcuboot, FakeModemDfu, FakeSerialLink } from "./sim/serial.js";
import { bytes, failure, pattern, recordingLogger, thrown, value } from "./sim/harness.js";

const ascii = (text: string): Uint8Array => new TextEncoder().encode(text);

function lines(encoded: Uint8Array): Uint8Array[] {
  const out: Uint8Array[] = [];
  let start = 0;
  encoded.forEach((byte, i) => {
    if (byte === 0x0a) {
      out.push(encoded.subarray(start, i));
      start = i + 1;
    }
  });
  return out;
}

describe("SLIP", () => {
  it("escapes END and ESC and terminates the frame", () => {
    expect(slipEncode(bytes(1, 0xc0, 0xdb, 2))).toEqual(bytes(1, 0xdb, 0xdc, 0xdb, 0xdd, 2, 0xc0));
    expect(slipDecode(bytes(1, 0xdb, 0xdc, 0xdb, 0xdd, 2))).toEqual(bytes(1, 0xc0, 0xdb, 2));
  });

  it("rejects a dangling escape", () => {
    const error = thrown(() => slipDecode(bytes(0xdb, 0x01)));

    expect(error.code).toBe("DFU_ERROR");
    expect(error.message).toBe("Invalid SLIP escape at byte 0");
  });
});

describe("SMP console framing", () => {
  it("uses CRC-16/XMODEM", () => {
    expect(crc16(ascii("123456789"))).toBe(0x31c3);
  });

  it("prefixes length and appends the checksum before base64", () => {
    const packet = encodeSmp({ op: 0, flags: 0, group: 1, sequence: 0, id: 0 }, bytes(0xa0));

    expect(packet).toEqual(bytes(0, 0, 0, 1, 0, 1, 0, 0, 0xa0));
    expect(encodeSerialFrames(packet)).toEqual(bytes(0x06, 0x09, ...ascii("AAsAAAABAAEAAKCG/g=="), 0x0a));
  });

  it("splits long packets into continuation frames and joins them again", () => {
    const packet = encodeSmp({ op: 2, flags: 0, group: 1, sequence: 9, id: 1 }, pattern(200));
    const frames = lines(encodeSerialFrames(packet));
    const assembler = new SerialFrameAssembler();

    expect(frames.map((frame) => frame.length)).toEqual([126, 126, 38]);
    expect([...(frames[1]?.subarray(0, 2) ?? [])]).toEqual([0x04, 0x14]);
    expect(assembler.push(ascii("boot: waiting for image"))).toBeNull();
    expect(frames.map((frame) => assembler.push(frame))).toEqual([null, null, packet]);
  });

  it("rejects a frame whose checksum does not match", () => {
    const assembler = new SerialFrameAssembler();

    const error = thrown(() => assembler.push(bytes(0x06, 0x09, ...ascii("AAMBAAA="))));

    expect(error.code).toBe("DFU_ERROR");
    expect(error.message).toBe("SMP frame checksum mismatch: received 0x0000, computed 0x1021");
  });
});

function mcuboot(options: { timeoutMs?: number; verify?: "NONE" | "HASH" } = {}) {
  const device = new FakeMcuboot();
  const link = new FakeSerialLink(device.handle);
  const logger = recordingLogger();
  const dfu = new McubootDfu(link, { chunkSize: 256, logger, ...options });
  return { device, link, logger, dfu };
}

describe("McubootDfu", () => {
  it("uploads the image in chunks and resets the device", async () => {
    const { device, logger, dfu } = mcuboot();
    const image = pattern(600, 7);

    value(await dfu.program(image));

    expect(device.uploaded).toEqual(image);
    expect(device.sha).toBeUndefined();
    expect(device.image).toBeUndefined();
    expect(device.sequences).toEqual([0, 1, 2, 3]);
    expect(device.resets).toBe(1);
    expect(logger.phases).toEqual(["upload", "reset"]);
  });

  it("sends the image digest and slot when asked", async () => {
    const { device, dfu } = mcuboot({ verify: "HASH" });
    const image = pattern(100);

    value(await dfu.program(image, { image: 1, reset: false }));

    expect(device.sha).toEqual(new Uint8Array(createHash("sha256").update(image).digest()));
    expect(device.image).toBe(1);
    expect(device.resets).toBe(0);
  });

  it("reports the SMP error of a rejected chunk", async () => {
    const { device, dfu } = mcuboot();
    device.override = (group, id, body) => (group === 1 && id === 1 && body.off === 256 ? { rc: 6 } : null);

    const error = failure(await dfu.program(pattern(600)));

    expect(error.code).toBe("DFU_ERROR");
    expect(error.message).toBe("Upload at offset 256 failed with SMP error 6 (bad state)");
    expect(device.resets).toBe(0);
  });

  it("refuses an offset that does not advance", async () => {
    const { device, dfu } = mcuboot();
    device.override = (group, id) => (group === 1 && id === 1 ? { rc: 0, off: 0 } : null);

    const error = failure(await dfu.program(pattern(10)));

    expect(error.message).toBe("MCUboot answered offset 0 to an upload at offset 0");
  });

  it("lists images past console output", async () => {
    const { device, dfu } = mcuboot();
    device.noise = "I: boot: serial recovery";

    expect(value(await dfu.listImages())).toEqual([
      { image: 0, slot: 0, version: "1.2.3", hash: bytes(0xaa, 0xbb) },
    ]);
  });

  it("maps the newer error map onto DFU errors", async () => {
    const { device, dfu } = mcuboot();
    device.override = (group) => (group === 0 ? { err: { group: 0, rc: 8 } } : null);

    const error = failure(await dfu.reset());

    expect(error.code).toBe("DFU_ERROR");
    expect(error.message).toBe("Reset failed with SMP error 8 (not supported)");
  });

  it("times out when the bootloader stays silent", async () => {
    const { device, logger, dfu } = mcuboot({ timeoutMs: 20 });
    device.silent = true;

    const error = failure(await dfu.listImages());

    expect(error.code).toBe("TIMEOUT");
    expect(error.message).toBe("SMP request (group 1, command 0) timed out after 20ms");
    expect(logger.lines).toContainEqual({
      severity: "error",
      message: "listImages failed: SMP request (group 1, command 0) timed out after 20ms",
    });
  });

  it("refuses an empty image and closes the port", async () => {
    const { link, dfu } = mcuboot();

    expect(failure(await dfu.program(new Uint8Array(0))).message).toBe("Firmware image is empty");
    value(await dfu.close());
    expect(link.closed).toBe(true);
  });
});

function modem(options: { timeoutMs?: number; verify?: "NONE" | "HASH" } = {}) {
  const device = new FakeModemDfu();
  const link = new FakeSerialLink(device.handle);
  const logger = recordingLogger();
  const dfu = new ModemDfu(link, { logger, ...options });
  return { device, link, logger, dfu };
}

describe("ModemDfu", () => {
  it("sends the init packet and the firmware as checked objects", async () => {
    const { device, logger, dfu } = modem();
    const init = pattern(40, 0x80);
    const firmware = pattern(150, 0x30);

    value(await dfu.program(init, firmware));

    expect(device.command).toEqual([...init]);
    expect(device.firmware).toEqual([...firmware]);
    expect(device.executed).toEqual({ command: 1, data: 3 });
    expect(device.writeSizes).toEqual([30, 10, 30, 30, 4, 30, 30, 4, 22]);
    expect(device.opcodes.filter((op) => op === 0x03)).toHaveLength(4);
    expect(logger.phases).toEqual(["init", "firmware"]);
  });

  it("stops on a checksum mismatch", async () => {
    const { device, dfu } = modem();
    device.corrupt = true;

    const error = failure(await dfu.program(pattern(40), pattern(150, 0x30)));

    expect(error.code).toBe("DFU_ERROR");
    expect(error.message).toBe("CRC mismatch after 64 bytes: device 0x9F1063A7, expected 0x6342A35F");
    expect(device.executed).toEqual({ command: 1, data: 0 });
  });

  it("skips checksums without verification", async () => {
    const { device, dfu } = modem({ verify: "NONE" });
    device.corrupt = true;

    value(await dfu.program(pattern(40), pattern(150)));

    expect(device.opcodes).not.toContain(0x03);
    expect(device.executed).toEqual({ command: 1, data: 3 });
  });

  it("names the failing request and its result", async () => {
    const rejected = modem();
    rejected.device.reject = { opcode: 0x01, result: 0x04 };
    expect(failure(await rejected.dfu.program(pattern(4), pattern(4))).message).toBe(
      "DFU create failed: insufficient resources",
    );

    const extended = modem();
    extended.device.reject = { opcode: 0x04, result: 0x0b, extended: 7 };
    expect(failure(await extended.dfu.program(pattern(4), pattern(4))).message).toBe(
      "DFU execute failed with extended error 7",
    );
  });

  it("refuses an init packet larger than the command object", async () => {
    const { device, dfu } = modem();
    device.commandMax = 32;

    const error = failure(await dfu.program(pattern(40), pattern(4)));

    expect(error.code).toBe("DFU_ERROR");
    expect(error.message).toBe("Init packet of 40 bytes exceeds the device limit of 32");
  });

  it("times out when the device does not answer", async () => {
    const { device, dfu } = modem({ timeoutMs: 20 });
    device.silent = true;

    const error = failure(await dfu.program(pattern(4), pattern(4)));

    expect(error.code).toBe("TIMEOUT");
    expect(error.message).toBe("DFU ping request timed out after 20ms");
  });

  it("surfaces serial port errors", async () => {
    const { link, dfu } = modem();
    link.fail(createError("SERIAL_PORT_ERROR", "Serial port /dev/ttyACM0: device disconnected"));

    const error = failure(await dfu.program(pattern(4), pattern(4)));

    expect(error.code).toBe("SERIAL_PORT_ERROR");
    expect(error.message).toBe("Serial port /dev/ttyACM0: device disconnected");
  });
});
