import type { ReadOptions, SegmentSink } from "../types.js";
import type { MemoryRegion } from "../memory-map.js";
import type { TargetContext } from "./context.js";
import { createError, toHex } from "../types.js";
import { concatBytes } from "../bytes.js";
import { QSPI_SCRATCH_SIZE } from "../config.js";
import { ramRuns, readChunked, requireQspi } from "./context.js";

async function readRegion(ctx: TargetContext, region: MemoryRegion, sink: SegmentSink): Promise<void> {
  ctx.logger.log("info", `Reading ${region.name} (${region.size} bytes @ ${toHex(region.base)})...`);
  await sink.write(region.base, await readChunked(ctx.transport, region.base, region.size));
}

// Powered sections only; unpowered runs are skipped without error
async function readRam(ctx: TargetContext, region: MemoryRegion, sink: SegmentSink): Promise<void> {
  for (const run of await ramRuns(ctx, region)) {
    if (!run.powered) {
      ctx.logger.log("debug", `Skipping unpowered RAM ${toHex(run.address)} (+${run.length})`);
      continue;
    }
    await sink.write(run.address, await readChunked(ctx.transport, run.address, run.length));
  }
}

async function readXip(ctx: TargetContext, sink: SegmentSink): Promise<void> {
  const qspi = requireQspi(ctx);
  const size = qspi.params.memSize;
  ctx.logger.log("info", `Reading XIP flash (${size} bytes @ ${toHex(qspi.xipAddress)})...`);
  const parts: Uint8Array[] = [];
  for (let offset = 0; offset < size; offset += QSPI_SCRATCH_SIZE) {
    parts.push(await qspi.read(qspi.xipAddress + offset, Math.min(QSPI_SCRATCH_SIZE, size - offset)));
  }
  await sink.write(qspi.xipAddress, concatBytes(parts));
}

/**
 * Dump the selected regions in a fixed order: code flash, UICR, FICR, data
 * RAM, XIP flash.
 */
export async function readToSink(ctx: TargetContext, sink: SegmentSink, options: ReadOptions): Promise<void> {
  const { memoryMap, info } = ctx;
  if (options.qspi && !info.qspiPresent) {
    throw createError("INVALID_DEVICE_FOR_OPERATION", `${info.name} has no QSPI peripheral`);
  }
  if (options.qspi) {
    requireQspi(ctx);
  }

  ctx.logger.progress("read");
  const wanted: Array<[boolean | undefined, MemoryRegion | undefined]> = [
    [options.code, memoryMap.regionOfKind("CODE_FLASH")],
    [options.uicr, memoryMap.regionOfKind("INFO_PAGE")],
    [options.ficr, memoryMap.regionAt(info.ficrAddress)],
  ];
  for (const [enabled, region] of wanted) {
    if (enabled && region) {
      await readRegion(ctx, region, sink);
    }
  }

  const ram = memoryMap.regionOfKind("DATA_RAM");
  if (options.ram && ram) {
    await readRam(ctx, ram, sink);
  }
  if (options.qspi) {
    await readXip(ctx, sink);
  }
}
