import type { ProbeTransport } from "../transport.js";
import { createError, toHex } from "../types.js";

// Indices of `regionSize` blocks touched by [address, address + length)
function touchedRegions(address: number, length: number, regionSize: number): number[] {
  const first = Math.floor(address / regionSize);
  const last = Math.floor((address + Math.max(length, 1) - 1) / regionSize);
  const regions: number[] = [];
  for (let region = first; region <= last; region++) {
    regions.push(region);
  }
  return regions;
}

/**
 * BPROT (nRF52) and MPU PROTENSET (nRF51): one enable bit per region spread
 * over 32-bit CONFIG registers, ignored while DISABLEINDEBUG is set.
 */
export interface BitmapProtection {
  configRegisters: readonly number[];
  disableInDebug: number;
  regionSize: number;
}

export async function isBitmapProtected(
  transport: ProbeTransport,
  layout: BitmapProtection,
  address: number,
  length: number,
): Promise<boolean> {
  if ((await transport.readU32(layout.disableInDebug)) & 1) {
    return false;
  }
  for (const region of touchedRegions(address, length, layout.regionSize)) {
    const register = layout.configRegisters[Math.floor(region / 32)];
    if (register === undefined) {
      continue;
    }
    if ((await transport.readU32(register)) & (1 << (region % 32))) {
      return true;
    }
  }
  return false;
}

export async function disableBitmapProtection(transport: ProbeTransport, layout: BitmapProtection): Promise<void> {
  await transport.writeU32(layout.disableInDebug, 1);
}

// ============================================================================
// Access control lists (nRF52820/833/840)
// ============================================================================

export interface AclProtection {
  base: number;       // ACL[0].ADDR
  entries: number;
}

const ACL_STRIDE = 0x10;
const ACL_PERM_WRITE_PROTECT = 1 << 1;

export async function isAclProtected(
  transport: ProbeTransport,
  layout: AclProtection,
  address: number,
  length: number,
): Promise<boolean> {
  for (let entry = 0; entry < layout.entries; entry++) {
    const base = layout.base + entry * ACL_STRIDE;
    const size = await transport.readU32(base + 4);
    if (size === 0) {
      continue;
    }
    const start = await transport.readU32(base);
    const perm = await transport.readU32(base + 8);
    const overlaps = address < start + size && start < address + Math.max(length, 1);
    if (overlaps && perm & ACL_PERM_WRITE_PROTECT) {
      return true;
    }
  }
  return false;
}

// ============================================================================
// SPU flash regions (nRF53 application core, nRF91)
// ============================================================================

export interface SpuProtection {
  permBase: number;   // FLASHREGION[0].PERM
  regionSize: number;
  regions: number;
}

const SPU_PERM_WRITE = 1 << 1;
const SPU_PERM_LOCK = 1 << 8;

export async function isSpuProtected(
  transport: ProbeTransport,
  layout: SpuProtection,
  address: number,
  length: number,
): Promise<boolean> {
  for (const region of touchedRegions(address, length, layout.regionSize)) {
    if (region >= layout.regions) {
      continue;
    }
    const perm = await transport.readU32(layout.permBase + region * 4);
    if (!(perm & SPU_PERM_WRITE)) {
      return true;
    }
  }
  return false;
}

export async function disableSpuProtection(transport: ProbeTransport, layout: SpuProtection): Promise<void> {
  for (let region = 0; region < layout.regions; region++) {
    const address = layout.permBase + region * 4;
    const perm = await transport.readU32(address);
    if (perm & SPU_PERM_WRITE) {
      continue;
    }
    if (perm & SPU_PERM_LOCK) {
      throw createError(
        "BLOCK_PROTECT_DENIED",
        `Flash region ${region} (${toHex(region * layout.regionSize)}) is locked until the next reset`,
      );
    }
    await transport.writeU32(address, perm | SPU_PERM_WRITE);
  }
}
