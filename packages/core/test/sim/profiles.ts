import type { SimProfile } from "./target.js";

export const PROBE_SERIAL = 682000123;

// Four ASCII characters, e.g. "AAD0"
function variant(text: string): number {
  return [...text].reduce((value, char) => ((value << 8) | char.charCodeAt(0)) >>> 0, 0);
}

// Erased and 0xFF-terminated values leave APPROTECT open on nRF52
const nrf52Approtect = (value: number): boolean => (value & 0xff) !== 0xff;
const m33Approtect = (value: number): boolean => value === 0;

export function nrf52840(): SimProfile {
  const nvmc = 0x4001e000;
  return {
    name: "nRF52840",
    dpIdr: 0x2ba01477,
    memoryAps: { 0: 0x24770011 },
    ctrlAps: [
      { ap: 1, idr: 0x02880000, memoryAp: 0, nvmc, uicrBase: 0x10001000, approtect: 0x208, approtectEnabled: nrf52Approtect },
    ],
    flash: [
      { base: 0x00000000, size: 0x100000, pageSize: 0x1000, nvmc },
      { base: 0x10001000, size: 0x1000, pageSize: 0x1000, nvmc, uicr: true },
    ],
    rom: [
      {
        base: 0x10000000,
        size: 0x1000,
        words: { 0x010: 0x1000, 0x014: 256, 0x100: 0x52840, 0x104: variant("AAD0"), 0x10c: 256 },
      },
    ],
    ram: [
      { base: 0x20000000, size: 0x40000 },
      { base: 0x00800000, size: 0x40000, aliasOf: 0x20000000 },
    ],
    nvmcBases: [nvmc],
    ramPower: [{ base: 0x40000900, stride: 0x10, sections: [2, 2, 2, 2, 2, 2, 2, 2, 6] }],
    registerDefaults: [{ base: 0x40000608, count: 1, value: 1 }],
    qspiBase: 0x40029000,
  };
}

// Same die layout without the QSPI peripheral
export function nrf52832(): SimProfile {
  const { qspiBase: _qspi, ...profile } = nrf52840();
  return {
    ...profile,
    name: "nRF52832",
    rom: [
      {
        base: 0x10000000,
        size: 0x1000,
        words: { 0x010: 0x1000, 0x014: 128, 0x100: 0x52832, 0x104: variant("AAE0"), 0x10c: 64 },
      },
    ],
  };
}

export function nrf51822(): SimProfile {
  const nvmc = 0x4001e000;
  return {
    name: "nRF51822",
    dpIdr: 0x0bb11477,
    memoryAps: { 0: 0x04770021 },
    ctrlAps: [],
    flash: [
      { base: 0x00000000, size: 0x40000, pageSize: 0x400, nvmc },
      { base: 0x10001000, size: 0x400, pageSize: 0x400, nvmc, uicr: true },
    ],
    rom: [
      {
        base: 0x10000000,
        size: 0x100,
        words: { 0x010: 0x400, 0x014: 256, 0x02c: 0xff, 0x034: 4, 0x038: 0x2000, 0x05c: 0x0087 },
      },
    ],
    ram: [{ base: 0x20000000, size: 0x8000 }],
    nvmcBases: [nvmc],
    ramPower: [],
    registerDefaults: [
      { base: 0x40000524, count: 1, value: 0x3 },
      { base: 0x40000554, count: 1, value: 0x3 },
      { base: 0x40000608, count: 1, value: 1 },
    ],
  };
}

export function nrf5340(): SimProfile {
  const appNvmc = 0x50039000;
  const netNvmc = 0x41080000;
  const m33Info = (ram: number, flash: number, pageSize: number): Record<number, number> => ({
    0x20c: 0x5340,
    0x210: variant("QKAA"),
    0x218: ram,
    0x21c: flash,
    0x220: pageSize,
    0x224: (flash * 1024) / pageSize,
  });
  return {
    name: "nRF5340",
    dpIdr: 0x6ba02477,
    memoryAps: { 0: 0x84770001, 1: 0x84770001 },
    ctrlAps: [
      {
        ap: 2,
        idr: 0x12880000,
        memoryAp: 0,
        nvmc: appNvmc,
        uicrBase: 0x00ff8000,
        approtect: 0x000,
        approtectEnabled: m33Approtect,
        secureApprotect: 0x01c,
        eraseProtect: 0x020,
      },
      {
        ap: 3,
        idr: 0x12880000,
        memoryAp: 1,
        nvmc: netNvmc,
        uicrBase: 0x01ff8000,
        approtect: 0x000,
        approtectEnabled: m33Approtect,
        eraseProtect: 0x004,
      },
    ],
    flash: [
      { base: 0x00000000, size: 0x100000, pageSize: 0x1000, nvmc: appNvmc },
      { base: 0x00ff8000, size: 0x1000, pageSize: 0x1000, nvmc: appNvmc, uicr: true },
      { base: 0x01000000, size: 0x40000, pageSize: 0x800, nvmc: netNvmc },
      { base: 0x01ff8000, size: 0x800, pageSize: 0x800, nvmc: netNvmc, uicr: true },
    ],
    rom: [
      { base: 0x00ff0000, size: 0x1000, words: m33Info(512, 1024, 0x1000) },
      { base: 0x01ff0000, size: 0x1000, words: m33Info(64, 256, 0x800) },
    ],
    ram: [
      { base: 0x20000000, size: 0x80000 },
      { base: 0x21000000, size: 0x10000 },
    ],
    nvmcBases: [appNvmc, netNvmc],
    ramPower: [
      { base: 0x50081600, stride: 0x10, sections: Array.from({ length: 8 }, () => 16) },
      { base: 0x41081600, stride: 0x10, sections: [4, 4, 4, 4] },
    ],
    registerDefaults: [
      { base: 0x50005614, count: 1, value: 1 },
      { base: 0x50003600, count: 64, value: 0x17 },
    ],
    qspiBase: 0x5002b000,
  };
}

export function nrf9160(): SimProfile {
  const nvmc = 0x50039000;
  return {
    name: "nRF9160",
    dpIdr: 0x6ba02477,
    memoryAps: { 0: 0x84770001 },
    ctrlAps: [
      {
        ap: 4,
        idr: 0x12880000,
        memoryAp: 0,
        nvmc,
        uicrBase: 0x00ff8000,
        approtect: 0x000,
        approtectEnabled: m33Approtect,
        secureApprotect: 0x02c,
        eraseProtect: 0x030,
      },
    ],
    flash: [
      { base: 0x00000000, size: 0x100000, pageSize: 0x1000, nvmc },
      { base: 0x00ff8000, size: 0x1000, pageSize: 0x1000, nvmc, uicr: true },
    ],
    rom: [
      {
        base: 0x00ff0000,
        size: 0x1000,
        words: { 0x20c: 0x9160, 0x210: variant("SICA"), 0x218: 256, 0x21c: 1024, 0x220: 0x1000, 0x224: 256 },
      },
    ],
    ram: [{ base: 0x20000000, size: 0x40000 }],
    nvmcBases: [nvmc],
    ramPower: [{ base: 0x5003a600, stride: 0x10, sections: Array.from({ length: 8 }, () => 4) }],
    registerDefaults: [{ base: 0x50003600, count: 32, value: 0x17 }],
  };
}

// A Cortex-M part from another vendor
export function foreignCortexM(): SimProfile {
  return {
    name: "foreign",
    dpIdr: 0x4ba01477,
    memoryAps: { 0: 0x24770011 },
    ctrlAps: [],
    flash: [],
    rom: [],
    ram: [{ base: 0x20000000, size: 0x10000 }],
    nvmcBases: [],
    ramPower: [],
    registerDefaults: [],
  };
}
