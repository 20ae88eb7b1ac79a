import type { DeviceInfo, MemoryRegionKind } from "./types.js";
import { createError, toHex } from "./types.js";
import { alignDown } from "./bytes.js";

export type ProtectionClass =
  | "READ_ONLY"   // FICR: readable, never written
  | "APPROTECT"   // Hidden from the debugger while readback protection is active
  | "OPEN";

export interface MemoryRegion {
  kind: MemoryRegionKind;
  name: string;
  base: number;
  size: number;
  writeUnit: 0 | 1 | 4;       // 0 when the region cannot be written
  eraseUnit: number;          // Page size, 0 when the region is not erasable
  powerControlled: boolean;
  protection: ProtectionClass;
}

export interface RegionSpan {
  region: MemoryRegion;
  address: number;
  length: number;
}

export const PERIPHERAL_BASE = 0x40000000;
export const PERIPHERAL_SIZE = 0x20000000;
export const SYSTEM_BASE = 0xe0000000;
export const SYSTEM_SIZE = 0x00100000;

export function regionEnd(region: MemoryRegion): number {
  return region.base + region.size;
}

export class MemoryMap {
  readonly regions: readonly MemoryRegion[];

  constructor(regions: readonly MemoryRegion[]) {
    const sorted = [...regions].sort((a, b) => a.base - b.base);
    for (let i = 1; i < sorted.length; i++) {
      const previous = sorted[i - 1];
      const current = sorted[i];
      if (previous && current && regionEnd(previous) > current.base) {
        throw createError(
          "INTERNAL_ERROR",
          `Memory regions ${previous.name} and ${current.name} overlap at ${toHex(current.base)}`,
        );
      }
    }
    this.regions = sorted;
  }

  static fromDeviceInfo(info: DeviceInfo): MemoryMap {
    const regions: MemoryRegion[] = [
      {
        kind: "CODE_FLASH",
        name: "Code flash",
        base: info.codeAddress,
        size: info.codeSize,
        writeUnit: 4,
        eraseUnit: info.codePageSize,
        powerControlled: false,
        protection: "APPROTECT",
      },
      {
        kind: "INFO_PAGE",
        name: "UICR",
        base: info.uicrAddress,
        size: info.infoPageSize,
        writeUnit: 4,
        eraseUnit: info.infoPageSize,
        powerControlled: false,
        protection: "APPROTECT",
      },
      {
        kind: "PERIPHERAL",
        name: "FICR",
        base: info.ficrAddress,
        size: info.ficrSize,
        writeUnit: 0,
        eraseUnit: 0,
        powerControlled: false,
        protection: "READ_ONLY",
      },
      {
        kind: "DATA_RAM",
        name: "Data RAM",
        base: info.dataRamAddress,
        size: info.ramSize,
        writeUnit: 1,
        eraseUnit: 0,
        powerControlled: true,
        protection: "APPROTECT",
      },
      {
        kind: "PERIPHERAL",
        name: "Peripherals",
        base: PERIPHERAL_BASE,
        size: PERIPHERAL_SIZE,
        writeUnit: 4,
        eraseUnit: 0,
        powerControlled: false,
        protection: "APPROTECT",
      },
      {
        kind: "PERIPHERAL",
        name: "System control space",
        base: SYSTEM_BASE,
        size: SYSTEM_SIZE,
        writeUnit: 4,
        eraseUnit: 0,
        powerControlled: false,
        protection: "APPROTECT",
      },
    ];

    if (info.codeRamPresent) {
      regions.push({
        kind: "CODE_RAM",
        name: "Code RAM",
        base: info.codeRamAddress,
        size: info.ramSize,
        writeUnit: 1,
        eraseUnit: 0,
        powerControlled: true,
        protection: "APPROTECT",
      });
    }

    if (info.qspiPresent) {
      regions.push({
        kind: "XIP_FLASH",
        name: "XIP flash",
        base: info.xipAddress,
        size: info.xipSize,
        writeUnit: 4,
        eraseUnit: 4096,
        powerControlled: false,
        protection: "OPEN",
      });
    }

    return new MemoryMap(regions);
  }

  regionAt(address: number): MemoryRegion | undefined {
    return this.regions.find((region) => address >= region.base && address < regionEnd(region));
  }

  regionOfKind(kind: MemoryRegionKind): MemoryRegion | undefined {
    return this.regions.find((region) => region.kind === kind);
  }

  /**
   * Split [address, address + length) into per-region spans.
   *
   * Throws INVALID_PARAMETER when the start is unmapped and
   * CROSSES_MEMORY_BARRIER when the range runs into unmapped space or a
   * region of another kind.
   */
  classify(address: number, length: number): RegionSpan[] {
    if (!Number.isInteger(address) || !Number.isInteger(length) || address < 0 || length < 0) {
      throw createError("INVALID_PARAMETER", `Invalid range ${address} (+${length})`);
    }
    if (address + length > 0x100000000) {
      throw createError("INVALID_PARAMETER", `Range ${toHex(address)} (+${length}) exceeds the address space`);
    }

    const first = this.regionAt(address);
    if (!first) {
      throw createError("INVALID_PARAMETER", `Address ${toHex(address)} is not mapped on this device`);
    }

    const spans: RegionSpan[] = [];
    const end = address + length;
    let cursor = address;

    while (cursor < end) {
      const region = this.regionAt(cursor);
      if (!region || region.kind !== first.kind) {
        throw createError(
          "CROSSES_MEMORY_BARRIER",
          `Range ${toHex(address)}-${toHex(end - 1)} crosses from ${first.name} into ${region ? region.name : "unmapped memory"} at ${toHex(cursor)}`,
        );
      }
      const take = Math.min(end, regionEnd(region)) - cursor;
      spans.push({ region, address: cursor, length: take });
      cursor += take;
    }

    return spans;
  }

  // Page base addresses of `region` intersecting [start, end)
  pagesIn(region: MemoryRegion, start: number, end: number): number[] {
    if (region.eraseUnit === 0) {
      return [];
    }
    const pages: number[] = [];
    const last = Math.min(end, regionEnd(region));
    for (let page = alignDown(Math.max(start, region.base) - region.base, region.eraseUnit) + region.base; page < last; page += region.eraseUnit) {
      pages.push(page);
    }
    return pages;
  }
}
