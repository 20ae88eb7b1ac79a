import CRC32 from "crc-32";
import type { EraseMode, ImageSegment, ProgramOptions, SegmentSource, VerifyMode } from "../types.js";
import type { MemoryRegion } from "../memory-map.js";
import type { TargetContext } from "./context.js";
import { createError, toHex, withContext } from "../types.js";
import { alignDown, firstMismatch } from "../bytes.js";
import { QSPI_ERASE_BYTES } from "../qspi.js";
import { readSpan, requirePoweredRam, requireQspi, writeSpan } from "./context.js";

// One segment cut down to a single region
export interface ImageSpan {
  region: MemoryRegion;
  address: number;
  data: Uint8Array;
}

async function* segmentsOf(source: SegmentSource): AsyncGenerator<ImageSegment> {
  yield* source;
}

/**
 * Read the whole image and split it into per-region spans. Segments must be
 * sorted by address and must not overlap.
 */
export async function classifyImage(ctx: TargetContext, source: SegmentSource): Promise<ImageSpan[]> {
  const spans: ImageSpan[] = [];
  let previousEnd = -1;

  for await (const segment of segmentsOf(source)) {
    if (!Number.isInteger(segment.address) || segment.address < 0) {
      throw createError("INVALID_PARAMETER", `Invalid segment address ${segment.address}`);
    }
    if (segment.data.length === 0) {
      continue;
    }
    if (segment.address < previousEnd) {
      throw createError(
        "INVALID_PARAMETER",
        `Segment at ${toHex(segment.address)} overlaps or precedes the segment ending at ${toHex(previousEnd)}`,
      );
    }
    previousEnd = segment.address + segment.data.length;

    let offset = 0;
    for (const span of ctx.memoryMap.classify(segment.address, segment.data.length)) {
      spans.push({
        region: span.region,
        address: span.address,
        data: segment.data.subarray(offset, offset + span.length),
      });
      offset += span.length;
    }
  }

  return spans;
}

function isInternalFlash(span: ImageSpan): boolean {
  return span.region.kind === "CODE_FLASH" || span.region.kind === "INFO_PAGE";
}

// Reject everything that can be known to fail before the device is touched
async function checkImage(ctx: TargetContext, spans: readonly ImageSpan[], options: ProgramOptions): Promise<void> {
  if (options.qspiEraseMode === "PAGES_INCLUDING_UICR") {
    throw createError("INVALID_OPERATION", "XIP flash has no UICR; use PAGES or ALL for the QSPI erase");
  }

  for (const span of spans) {
    const { region } = span;
    if (region.writeUnit === 0) {
      throw createError("INVALID_OPERATION", `Image writes to read-only ${region.name} at ${toHex(span.address)}`);
    }
    if (region.kind === "INFO_PAGE" && options.chipEraseMode === "PAGES") {
      throw createError(
        "INVALID_OPERATION",
        `UICR erase requested in Pages mode (segment at ${toHex(span.address)}); use PAGES_INCLUDING_UICR`,
      );
    }
    if (region.kind === "XIP_FLASH") {
      requireQspi(ctx);
    }
    if (region.kind === "DATA_RAM" || region.kind === "CODE_RAM") {
      await requirePoweredRam(ctx, { region, address: span.address, length: span.data.length });
    }
    if (isInternalFlash(span) && (await ctx.driver.isBlockProtectEnabled(span.address, span.data.length))) {
      throw createError(
        "BLOCK_PROTECT_DENIED",
        `Flash at ${toHex(span.address)} is covered by block protection`,
      );
    }
  }
}

// Erase bases of `unit`-sized blocks touched by the spans
function touchedBlocks(spans: readonly ImageSpan[], unit: number): number[] {
  const blocks = new Set<number>();
  for (const span of spans) {
    const first = alignDown(span.address, unit);
    for (let block = first; block < span.address + span.data.length; block += unit) {
      blocks.add(block);
    }
  }
  return [...blocks].sort((a, b) => a - b);
}

async function eraseInternal(ctx: TargetContext, spans: readonly ImageSpan[], mode: EraseMode): Promise<void> {
  if (mode === "NONE") {
    return;
  }
  if (mode === "ALL") {
    await ctx.driver.eraseAll();
    return;
  }

  const code = spans.filter((span) => span.region.kind === "CODE_FLASH");
  const pages = new Set<number>();
  for (const span of code) {
    for (const page of ctx.memoryMap.pagesIn(span.region, span.address, span.address + span.data.length)) {
      pages.add(page);
    }
  }
  for (const page of [...pages].sort((a, b) => a - b)) {
    await ctx.driver.erasePage(page);
  }

  if (mode === "PAGES_INCLUDING_UICR" && spans.some((span) => span.region.kind === "INFO_PAGE")) {
    await ctx.driver.eraseUicr();
  }
}

async function eraseXip(ctx: TargetContext, spans: readonly ImageSpan[], mode: EraseMode): Promise<void> {
  const xip = spans.filter((span) => span.region.kind === "XIP_FLASH");
  if (mode === "NONE") {
    return;
  }
  if (!ctx.qspi) {
    ctx.logger.log("debug", `QSPI erase ${mode} skipped; QSPI is not initialized`);
    return;
  }
  if (mode === "ALL") {
    await ctx.qspi.erase(ctx.qspi.xipAddress, "ALL");
    return;
  }
  for (const sector of touchedBlocks(xip, QSPI_ERASE_BYTES["4KB"])) {
    await ctx.qspi.erase(sector, "4KB");
  }
}

async function writeImage(ctx: TargetContext, spans: readonly ImageSpan[]): Promise<void> {
  for (const span of spans) {
    ctx.logger.log("debug", `Writing ${span.data.length} bytes to ${span.region.name} at ${toHex(span.address)}`);
    try {
      await writeSpan(
        ctx,
        { region: span.region, address: span.address, length: span.data.length },
        span.data,
        { nvmc: true },
      );
    } catch (e) {
      throw withContext(e, `Failed programming segment at ${toHex(span.address)}`);
    }
  }
}

// ============================================================================
// Verify
// ============================================================================

async function verifyReadBack(ctx: TargetContext, spans: readonly ImageSpan[]): Promise<void> {
  for (const span of spans) {
    const actual = await readSpan(ctx, { region: span.region, address: span.address, length: span.data.length });
    const mismatch = firstMismatch(span.data, actual);
    if (mismatch >= 0) {
      throw createError(
        "VERIFY_ERROR",
        `Verify failed at ${toHex(span.address + mismatch)}: expected ${toHex(span.data[mismatch] ?? 0)}, read ${toHex(actual[mismatch] ?? 0)}`,
      );
    }
  }
}

// CRC-32 per region over the image bytes and over the same ranges read back
async function verifyHash(ctx: TargetContext, spans: readonly ImageSpan[]): Promise<void> {
  const digests = new Map<MemoryRegion, { expected: number; actual: number }>();
  for (const span of spans) {
    const actual = await readSpan(ctx, { region: span.region, address: span.address, length: span.data.length });
    const digest = digests.get(span.region) ?? { expected: 0, actual: 0 };
    digests.set(span.region, {
      expected: CRC32.buf(span.data, digest.expected),
      actual: CRC32.buf(actual, digest.actual),
    });
  }

  for (const [region, digest] of digests) {
    if (digest.expected !== digest.actual) {
      throw createError(
        "VERIFY_ERROR",
        `${region.name} hash mismatch: expected ${toHex(digest.expected)}, device has ${toHex(digest.actual)}`,
      );
    }
    ctx.logger.log("debug", `${region.name} CRC-32 ${toHex(digest.expected)} matches`);
  }
}

export async function verifySpans(ctx: TargetContext, spans: readonly ImageSpan[], mode: VerifyMode): Promise<void> {
  if (mode === "READ_BACK") {
    await verifyReadBack(ctx, spans);
  } else if (mode === "HASH") {
    await verifyHash(ctx, spans);
  }
}

// ============================================================================
// Program
// ============================================================================

/**
 * Erase per policy, write every segment, verify and reset. The target must
 * be halted on entry; it stays halted unless a reset is requested.
 */
export async function program(ctx: TargetContext, image: SegmentSource, options: ProgramOptions): Promise<void> {
  const spans = await classifyImage(ctx, image);
  await checkImage(ctx, spans, options);
  const total = spans.reduce((sum, span) => sum + span.data.length, 0);

  if (options.chipEraseMode !== "NONE" || options.qspiEraseMode !== "NONE") {
    ctx.logger.progress("erase");
    await eraseInternal(ctx, spans, options.chipEraseMode);
    await eraseXip(ctx, spans, options.qspiEraseMode);
  }

  ctx.logger.progress("program");
  ctx.logger.log("info", `Programming ${total} bytes in ${spans.length} spans...`);
  await writeImage(ctx, spans);

  if (options.verify !== "NONE") {
    ctx.logger.progress("verify");
    await verifySpans(ctx, spans, options.verify);
  }

  if (options.reset !== "NONE") {
    ctx.logger.progress("reset");
    await ctx.reset(options.reset);
  }
  ctx.logger.log("info", "Programming complete.");
}
