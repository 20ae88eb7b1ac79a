import type { ComPortInfo, LibraryInfo } from "./types.js";
import type { Logger } from "./logger.js";
import { createError } from "./types.js";

// ============================================================================
// Arm debug port / access port registers
// ============================================================================

export const DP_IDR: number = 0x0;        // read
export const DP_ABORT: number = 0x0;      // write
export const DP_CTRL_STAT: number = 0x4;
export const DP_SELECT: number = 0x8;
export const DP_RDBUFF: number = 0xc;

export const DP_ABORT_CLEAR_ERRORS = 0x1e;
export const DP_POWER_UP_REQUEST = 0x50000000; // CSYSPWRUPREQ | CDBGPWRUPREQ
export const DP_POWER_UP_ACK = 0xa0000000;     // CSYSPWRUPACK | CDBGPWRUPACK

export const AP_CSW: number = 0x00;
export const AP_TAR: number = 0x04;
export const AP_DRW: number = 0x0c;
export const AP_IDR: number = 0xfc;

// ============================================================================
// Cortex-M debug registers
// ============================================================================

export const DHCSR = 0xe000edf0;
export const DCRSR = 0xe000edf4;
export const DCRDR = 0xe000edf8;
export const DEMCR = 0xe000edfc;
export const AIRCR = 0xe000ed0c;

export const DHCSR_KEY = 0xa05f0000;
export const DHCSR_C_DEBUGEN = 1 << 0;
export const DHCSR_C_HALT = 1 << 1;
export const DHCSR_C_STEP = 1 << 2;
export const DHCSR_S_REGRDY = 1 << 16;
export const DHCSR_S_HALT = 1 << 17;

export const DCRSR_REGWNR = 1 << 16;
export const DEMCR_VC_CORERESET = 1 << 0;
export const AIRCR_SYSRESETREQ = 0x05fa0004;

// ============================================================================
// Probe abstractions
// ============================================================================

export interface ProbeTransport {
  readonly serialNumber: number;
  readonly maxSpeedKhz: number;
  readonly speedKhz: number;

  // Returns the effective clock after clamping
  setSpeed(khz: number): Promise<number>;

  readDebugPort(register: number): Promise<number>;
  writeDebugPort(register: number, value: number): Promise<void>;
  readAccessPort(ap: number, register: number): Promise<number>;
  writeAccessPort(ap: number, register: number, value: number): Promise<void>;

  // MEM-AP used by the memory and core-control calls below
  selectMemoryAccessPort(ap: number): void;
  readMemory(address: number, length: number): Promise<Uint8Array>;
  writeMemory(address: number, data: Uint8Array): Promise<void>;
  readU32(address: number): Promise<number>;
  writeU32(address: number, value: number): Promise<void>;

  halt(): Promise<void>;
  run(): Promise<void>;
  step(): Promise<void>;
  isHalted(): Promise<boolean>;

  pinReset(): Promise<void>;
  resetProbe(): Promise<void>;
  replaceFirmware(): Promise<void>;
  firmwareString(): Promise<string>;
  targetVoltage?(): Promise<number>;
  close(): Promise<void>;
}

export interface ProbeLibrary {
  readonly info: LibraryInfo;
  enumerate(): Promise<number[]>;
  connect(serialNumber: number, clockKhz: number): Promise<ProbeTransport>;
  enumerateComPorts?(serialNumber: number): Promise<ComPortInfo[]>;
  close(): Promise<void>;
}

export interface ProbeLibraryOptions {
  logger: Logger;
}

// Entry point an external library module must export
export type ProbeLibraryFactory = (options: ProbeLibraryOptions) => ProbeLibrary | Promise<ProbeLibrary>;

export function isProbeLibrary(value: unknown): value is ProbeLibrary {
  return (
    typeof value === "object" &&
    value !== null &&
    "info" in value &&
    "enumerate" in value &&
    "connect" in value &&
    "close" in value &&
    typeof value.enumerate === "function" &&
    typeof value.connect === "function" &&
    typeof value.close === "function" &&
    isLibraryInfo(value.info)
  );
}

function isLibraryInfo(value: unknown): value is LibraryInfo {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    "path" in value &&
    typeof value.path === "string" &&
    typeof value.version === "object" &&
    value.version !== null &&
    "major" in value.version &&
    "minor" in value.version &&
    "revision" in value.version &&
    typeof value.version.major === "number" &&
    typeof value.version.minor === "number" &&
    typeof value.version.revision === "string"
  );
}

// ============================================================================
// Core control shared by transports
// ============================================================================

type CoreAccess = Pick<ProbeTransport, "readU32" | "writeU32">;

export async function haltCore(core: CoreAccess): Promise<void> {
  await core.writeU32(DHCSR, DHCSR_KEY | DHCSR_C_HALT | DHCSR_C_DEBUGEN);
  for (let attempt = 0; attempt < 20; attempt++) {
    if ((await core.readU32(DHCSR)) & DHCSR_S_HALT) {
      return;
    }
    await delay(5);
  }
  throw createError("TRANSPORT_ERROR", "CPU did not halt");
}

export async function runCore(core: CoreAccess): Promise<void> {
  await core.writeU32(DHCSR, DHCSR_KEY | DHCSR_C_DEBUGEN);
}

export async function stepCore(core: CoreAccess): Promise<void> {
  await core.writeU32(DHCSR, DHCSR_KEY | DHCSR_C_STEP | DHCSR_C_DEBUGEN);
}

export async function isCoreHalted(core: CoreAccess): Promise<boolean> {
  return ((await core.readU32(DHCSR)) & DHCSR_S_HALT) !== 0;
}

// Clear sticky errors and request debug + system power
export async function powerUpDebug(transport: ProbeTransport): Promise<void> {
  await transport.writeDebugPort(DP_ABORT, DP_ABORT_CLEAR_ERRORS);
  await transport.writeDebugPort(DP_CTRL_STAT, DP_POWER_UP_REQUEST);
  for (let attempt = 0; attempt < 20; attempt++) {
    const status = await transport.readDebugPort(DP_CTRL_STAT);
    if ((status & DP_POWER_UP_ACK) >>> 0 === DP_POWER_UP_ACK) {
      return;
    }
    await delay(5);
  }
  throw createError("CANNOT_CONNECT", "Debug power-up was not acknowledged");
}

export async function powerDownDebug(transport: ProbeTransport): Promise<void> {
  await transport.writeDebugPort(DP_CTRL_STAT, 0);
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "Operation",
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(
      () => reject(createError("TRANSPORT_TIMEOUT", `${label} timed out after ${ms}ms`)),
      ms,
    );
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
