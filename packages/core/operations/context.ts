import type { DeviceInfo, ResetKind } from "../types.js";
import type { Logger } from "../logger.js";
import type { ProbeTransport } from "../transport.js";
import type { DeviceDriver } from "../drivers/driver.js";
import type { MemoryMap, MemoryRegion, RegionSpan } from "../memory-map.js";
import type { QspiEngine } from "../qspi.js";
import { createError, toHex } from "../types.js";
import { concatBytes } from "../bytes.js";
import { CHUNK_SIZE } from "../config.js";

/**
 * What the executive needs from an attached session. The session builds one
 * per operation after its protection and halt checks.
 */
export interface TargetContext {
  transport: ProbeTransport;
  driver: DeviceDriver;
  info: DeviceInfo;
  memoryMap: MemoryMap;
  qspi: QspiEngine | null;
  logger: Logger;
  reset(kind: ResetKind): Promise<void>;
}

export function requireQspi(ctx: TargetContext): QspiEngine {
  if (!ctx.qspi) {
    throw createError("INVALID_OPERATION", "XIP flash access requires QSPI to be initialized");
  }
  return ctx.qspi;
}

export async function readChunked(transport: ProbeTransport, address: number, length: number): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  for (let offset = 0; offset < length; offset += CHUNK_SIZE) {
    parts.push(await transport.readMemory(address + offset, Math.min(CHUNK_SIZE, length - offset)));
  }
  return concatBytes(parts);
}

export async function writeChunked(transport: ProbeTransport, address: number, data: Uint8Array): Promise<void> {
  for (let offset = 0; offset < data.length; offset += CHUNK_SIZE) {
    await transport.writeMemory(address + offset, data.subarray(offset, Math.min(data.length, offset + CHUNK_SIZE)));
  }
}

// ============================================================================
// RAM power
// ============================================================================

export interface RamRun {
  address: number;
  length: number;
  powered: boolean;
}

// Split a RAM region into runs of sections sharing the same power state
export async function ramRuns(ctx: TargetContext, region: MemoryRegion): Promise<RamRun[]> {
  const sizes = await ctx.driver.ramSectionsSize();
  const power = await ctx.driver.ramSectionsPowerStatus();
  const runs: RamRun[] = [];
  let address = region.base;
  sizes.forEach((size, index) => {
    const powered = power[index] === "ON";
    const last = runs[runs.length - 1];
    if (last && last.powered === powered) {
      last.length += size;
    } else {
      runs.push({ address, length: size, powered });
    }
    address += size;
  });
  return runs;
}

export async function requirePoweredRam(ctx: TargetContext, span: RegionSpan): Promise<void> {
  const end = span.address + span.length;
  for (const run of await ramRuns(ctx, span.region)) {
    if (!run.powered && run.address < end && run.address + run.length > span.address) {
      throw createError(
        "RAM_OFF_ERROR",
        `RAM at ${toHex(Math.max(run.address, span.address))} is in a powered-down section`,
      );
    }
  }
}

// ============================================================================
// Region-dispatched access
// ============================================================================

export async function readSpan(ctx: TargetContext, span: RegionSpan): Promise<Uint8Array> {
  switch (span.region.kind) {
    case "XIP_FLASH":
      return requireQspi(ctx).read(span.address, span.length);
    case "DATA_RAM":
    case "CODE_RAM":
      await requirePoweredRam(ctx, span);
      return readChunked(ctx.transport, span.address, span.length);
    default:
      return readChunked(ctx.transport, span.address, span.length);
  }
}

export interface WriteSpanOptions {
  // Route flash writes through the NVMC
  nvmc: boolean;
}

export async function writeSpan(
  ctx: TargetContext,
  span: RegionSpan,
  data: Uint8Array,
  options: WriteSpanOptions,
): Promise<void> {
  const { region } = span;
  if (region.writeUnit === 0) {
    throw createError("INVALID_OPERATION", `${region.name} is read-only`);
  }

  switch (region.kind) {
    case "CODE_FLASH":
    case "INFO_PAGE":
      if (!options.nvmc) {
        throw createError("INVALID_OPERATION", `Writing ${region.name} at ${toHex(span.address)} requires the NVMC`);
      }
      await ctx.driver.nvmcWrite(span.address, data);
      return;
    case "XIP_FLASH":
      await requireQspi(ctx).write(span.address, data);
      return;
    case "DATA_RAM":
    case "CODE_RAM":
      await requirePoweredRam(ctx, span);
      await writeChunked(ctx.transport, span.address, data);
      return;
    case "PERIPHERAL":
      await writeChunked(ctx.transport, span.address, data);
      return;
  }
}

// Read an arbitrary range, one region kind at a time
export async function readRange(ctx: TargetContext, address: number, length: number): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  for (const span of ctx.memoryMap.classify(address, length)) {
    parts.push(await readSpan(ctx, span));
  }
  return concatBytes(parts);
}

export async function writeRange(
  ctx: TargetContext,
  address: number,
  data: Uint8Array,
  options: WriteSpanOptions,
): Promise<void> {
  let offset = 0;
  for (const span of ctx.memoryMap.classify(address, data.length)) {
    await writeSpan(ctx, span, data.subarray(offset, offset + span.length), options);
    offset += span.length;
  }
}
