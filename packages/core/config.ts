import { z } from "zod";
import type { LogSeverity } from "./logger.js";
import { createError } from "./types.js";

// SWD clock limits (kHz)
export const MIN_CLOCK_KHZ = 125;
export const DEFAULT_CLOCK_KHZ = 2000;
export const MAX_CLOCK_KHZ = 50000;

export interface MinimumVersion {
  major: number;
  minor: number;
}

export const MINIMUM_LIBRARY_VERSION: MinimumVersion = { major: 6, minor: 42 };
// Older header generation; accepted with a warning
export const LEGACY_LIBRARY_VERSION: MinimumVersion = { major: 5, minor: 2 };

export const TRANSFER_TIMEOUT_MS = 2000;
export const BLOCK_TIMEOUT_MS = 5000;
export const CHUNK_SIZE = 4096; // 4KB chunks

export const QSPI_SCRATCH_SIZE = 4096;

export const LOW_VOLTAGE_THRESHOLD = 1.7;

// Serial DFU
export const DFU_TIMEOUT_MS = 30000;
export const MCUBOOT_BAUD_RATE = 115200;
export const MCUBOOT_CHUNK_SIZE = 256;
export const MODEM_DFU_BAUD_RATE = 1000000;

export function clampClockSpeed(khz: number, probeMaxKhz = MAX_CLOCK_KHZ): number {
  const max = Math.min(MAX_CLOCK_KHZ, probeMaxKhz);
  return Math.max(MIN_CLOCK_KHZ, Math.min(max, Math.round(khz)));
}

export function compareVersions(a: MinimumVersion, b: MinimumVersion): number {
  if (a.major !== b.major) {
    return a.major - b.major;
  }
  return a.minor - b.minor;
}

export function parseMinimumVersion(text: string): MinimumVersion {
  const match = /^(\d+)\.(\d+)$/.exec(text.trim());
  if (!match) {
    throw createError("INVALID_PARAMETER", `Invalid version "${text}", expected major.minor`);
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

const envSchema = z.object({
  SWDPROG_PROBE_LIBRARY: z.string().min(1).optional(),
  SWDPROG_MIN_LIBRARY_VERSION: z.string().regex(/^\d+\.\d+$/).optional(),
  SWDPROG_CLOCK_KHZ: z.string().regex(/^\d+$/).transform(Number).optional(),
  SWDPROG_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
});

export interface Config {
  libraryPath?: string;
  minimumVersion: MinimumVersion;
  clockKhz: number;
  logLevel: LogSeverity;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : parsed.error.message;
    throw createError("INVALID_PARAMETER", `Invalid environment configuration (${where})`);
  }

  const values = parsed.data;
  return {
    libraryPath: values.SWDPROG_PROBE_LIBRARY,
    minimumVersion: values.SWDPROG_MIN_LIBRARY_VERSION
      ? parseMinimumVersion(values.SWDPROG_MIN_LIBRARY_VERSION)
      : MINIMUM_LIBRARY_VERSION,
    clockKhz: clampClockSpeed(values.SWDPROG_CLOCK_KHZ ?? DEFAULT_CLOCK_KHZ),
    logLevel: values.SWDPROG_LOG_LEVEL ?? "info",
  };
}
