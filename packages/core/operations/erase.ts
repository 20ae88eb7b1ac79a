import type { EraseMode } from "../types.js";
import type { TargetContext } from "./context.js";
import { createError, toHex } from "../types.js";
import { alignDown } from "../bytes.js";
import { QSPI_ERASE_BYTES } from "../qspi.js";
import { requireQspi } from "./context.js";

// Spot-check a few words after a full erase
async function checkErased(ctx: TargetContext): Promise<void> {
  const { transport, info } = ctx;
  const probes = [
    { label: "Flash start", address: info.codeAddress },
    { label: "Flash end", address: info.codeAddress + info.codeSize - 4 },
    { label: "UICR", address: info.uicrAddress },
  ];

  for (const { label, address } of probes) {
    const value = await transport.readU32(address);
    ctx.logger.log("debug", `${label} [${toHex(address)}] = ${toHex(value)}`);
    if (value !== 0xffffffff) {
      ctx.logger.log("warn", `${label} at ${toHex(address)} reads ${toHex(value)} after erase`);
    }
  }
}

async function eraseXipSectors(ctx: TargetContext, start: number, end: number): Promise<void> {
  const qspi = requireQspi(ctx);
  const sector = QSPI_ERASE_BYTES["4KB"];
  for (let address = alignDown(start - qspi.xipAddress, sector) + qspi.xipAddress; address < end; address += sector) {
    await qspi.erase(address, "4KB");
  }
}

/**
 * `ALL` erases code flash and UICR (or the whole QSPI flash when `start` is
 * an XIP address). The page modes erase every page intersecting
 * [start, end), or the page holding `start` when `end` does not exceed it.
 */
export async function erase(ctx: TargetContext, mode: EraseMode, start: number, end = start): Promise<void> {
  const region = ctx.memoryMap.regionAt(start);

  if (mode === "NONE") {
    return;
  }

  ctx.logger.progress("erase");

  if (mode === "ALL") {
    if (region?.kind === "XIP_FLASH") {
      await requireQspi(ctx).erase(start, "ALL");
      return;
    }
    await ctx.driver.eraseAll();
    await checkErased(ctx);
    ctx.logger.log("info", "Chip erase complete.");
    return;
  }

  if (!region) {
    throw createError("INVALID_PARAMETER", `Address ${toHex(start)} is not mapped on this device`);
  }
  const stop = end > start ? end : start + 1;
  const spans = ctx.memoryMap.classify(start, stop - start);

  if (region.kind === "XIP_FLASH") {
    if (mode === "PAGES_INCLUDING_UICR") {
      throw createError("INVALID_OPERATION", "XIP flash has no UICR; erase it with PAGES or ALL");
    }
    await eraseXipSectors(ctx, start, stop);
    return;
  }

  for (const span of spans) {
    switch (span.region.kind) {
      case "INFO_PAGE":
        await ctx.driver.eraseUicr();
        break;
      case "CODE_FLASH":
        for (const page of ctx.memoryMap.pagesIn(span.region, span.address, span.address + span.length)) {
          await ctx.driver.erasePage(page);
        }
        break;
      default:
        throw createError("INVALID_OPERATION", `${span.region.name} at ${toHex(span.address)} is not erasable`);
    }
  }
  ctx.logger.log("info", `Erased ${toHex(start)}-${toHex(stop - 1)}.`);
}
