import { describe, expect, it } from "vitest";
import type { DeviceInfo } from "../types.js";
import { createError, formatDeviceInfo, formatVersion, isCoreError, toCoreError, toHex, withContext } from "../types.js";

const NRF52840: DeviceInfo = {
  family: "NRF52",
  name: "NRF52840",
  version: "NRF52840_xxAA_REV2",
  memory: "AA",
  revision: "REV2",
  codeAddress: 0x00000000,
  codePageSize: 0x1000,
  codeSize: 0x100000,
  uicrAddress: 0x10001000,
  infoPageSize: 0x1000,
  ficrAddress: 0x10000000,
  ficrSize: 0x400,
  codeRamPresent: true,
  codeRamAddress: 0x00800000,
  dataRamAddress: 0x20000000,
  ramSize: 0x40000,
  qspiPresent: true,
  xipAddress: 0x12000000,
  xipSize: 0x8000000,
  pinResetPin: 18,
};

describe("toCoreError", () => {
  it("passes core errors through", () => {
    const error = createError("NVMC_ERROR", "Word not erased");

    expect(toCoreError(error)).toBe(error);
    expect(error.recoverable).toBe(false);
  });

  it.each([
    ["Transfer count mismatch", "TRANSPORT_ERROR", true],
    ["Read timed out after 2000 ms", "TRANSPORT_TIMEOUT", true],
    ["No DP response", "CANNOT_CONNECT", true],
    ["unexpected", "INTERNAL_ERROR", false],
  ])("classifies %j", (message, code, recoverable) => {
    const error = toCoreError(new Error(message));

    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
    expect(error.recoverable).toBe(recoverable);
  });

  it("stringifies non-errors", () => {
    expect(toCoreError("bad state")).toEqual({
      code: "INTERNAL_ERROR",
      message: "bad state",
      recoverable: false,
      cause: "bad state",
    });
  });

  it("recognizes only known codes", () => {
    expect(isCoreError({ code: "NVMC_ERROR", message: "x", recoverable: false })).toBe(true);
    expect(isCoreError({ code: "EIO", message: "x", recoverable: false })).toBe(false);
  });
});

describe("withContext", () => {
  it("prefixes the message and keeps the code", () => {
    const error = withContext(createError("NVMC_ERROR", "Word not erased"), "Writing segment at 0x00001000");

    expect(error.code).toBe("NVMC_ERROR");
    expect(error.message).toBe("Writing segment at 0x00001000: Word not erased");
  });
});

describe("formatting", () => {
  it("prints addresses as eight hex digits", () => {
    expect(toHex(0x1000)).toBe("0x00001000");
    expect(toHex(-1)).toBe("0xFFFFFFFF");
    expect(toHex(0xdeadbeef)).toBe("0xDEADBEEF");
  });

  it("prints library versions", () => {
    expect(formatVersion({ major: 6, minor: 88, revision: "a" })).toBe("6.88a");
  });

  it("summarizes device info", () => {
    expect(formatDeviceInfo(NRF52840)).toEqual({
      device: "NRF52840 (NRF52840_xxAA_REV2)",
      family: "NRF52",
      flash: "1024 kB @ 0x00000000, 4096 B pages",
      ram: "256 kB @ 0x20000000",
      uicr: "4096 B @ 0x10001000",
      xip: "0x12000000 (131072 kB window)",
      resetPin: "P0.18",
    });
    expect(formatDeviceInfo({ ...NRF52840, qspiPresent: false, pinResetPin: null })).toMatchObject({
      xip: "Not present",
      resetPin: "Dedicated",
    });
  });
});
