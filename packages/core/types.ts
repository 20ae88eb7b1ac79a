// ============================================================================
// Result Pattern
// ============================================================================

export type Result<T, E = CoreError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ============================================================================
// Error Types
// ============================================================================

export type CoreErrorCode =
  // Environment
  | "OUT_OF_MEMORY"
  | "FILE_OPERATION_FAILED"
  | "LIBRARY_NOT_FOUND"         // No probe library at the given path or on search
  | "LIBRARY_TOO_OLD"           // Library version below the configured minimum
  | "LIBRARY_LOAD_FAILED"       // Library found but entry points missing
  | "SUB_LIBRARY_NOT_FOUND"
  | "SUB_LIBRARY_LOAD_FAILED"
  // Usage
  | "INVALID_PARAMETER"
  | "INVALID_OPERATION"
  | "INVALID_DEVICE_FOR_OPERATION"
  | "WRONG_FAMILY_FOR_DEVICE"   // DP IDR does not match the requested family
  | "UNKNOWN_DEVICE"            // Operation requires a known device family
  | "CROSSES_MEMORY_BARRIER"    // Range spans regions that cannot share one operation
  // Connectivity
  | "PROBE_NOT_FOUND"
  | "NO_PROBE_CONNECTED"
  | "CANNOT_CONNECT"            // No DP response (recoverable)
  | "LOW_VOLTAGE"
  | "TRANSPORT_ERROR"           // DAP transfer failed (recoverable)
  | "TRANSPORT_TIMEOUT"         // Probe transfer timed out (recoverable)
  | "SERIAL_PORT_ERROR"
  // Device
  | "NVMC_ERROR"                // Flash write hit a non-erased word
  | "RAM_OFF_ERROR"
  | "RECOVER_FAILED"
  | "VERIFY_ERROR"
  // Policy
  | "PROTECTION_DENIED"
  | "BLOCK_PROTECT_DENIED"
  | "MPU_CONFIG_DENIED"         // Factory pre-programmed code blocks recover
  | "COPROCESSOR_DISABLED"
  | "TRUSTZONE_DENIED"
  // DFU
  | "TIMEOUT"
  | "DFU_ERROR"
  // Misc
  | "NOT_IMPLEMENTED"
  | "INTERNAL_ERROR";

export interface CoreError {
  code: CoreErrorCode;
  message: string;
  recoverable: boolean;       // Can retry after reconnecting
  cause?: unknown;            // Original error
}

export function createError(
  code: CoreErrorCode,
  message: string,
  options?: { recoverable?: boolean; cause?: unknown },
): CoreError {
  const recoverable = options?.recoverable ?? isRecoverableCode(code);
  return { code, message, recoverable, cause: options?.cause };
}

function isRecoverableCode(code: CoreErrorCode): boolean {
  return code === "CANNOT_CONNECT" ||
         code === "TRANSPORT_ERROR" ||
         code === "TRANSPORT_TIMEOUT";
}

const ERROR_CODES: ReadonlySet<string> = new Set<CoreErrorCode>([
  "OUT_OF_MEMORY", "FILE_OPERATION_FAILED", "LIBRARY_NOT_FOUND", "LIBRARY_TOO_OLD",
  "LIBRARY_LOAD_FAILED", "SUB_LIBRARY_NOT_FOUND", "SUB_LIBRARY_LOAD_FAILED",
  "INVALID_PARAMETER", "INVALID_OPERATION", "INVALID_DEVICE_FOR_OPERATION",
  "WRONG_FAMILY_FOR_DEVICE", "UNKNOWN_DEVICE", "CROSSES_MEMORY_BARRIER",
  "PROBE_NOT_FOUND", "NO_PROBE_CONNECTED", "CANNOT_CONNECT", "LOW_VOLTAGE",
  "TRANSPORT_ERROR", "TRANSPORT_TIMEOUT", "SERIAL_PORT_ERROR", "NVMC_ERROR",
  "RAM_OFF_ERROR", "RECOVER_FAILED", "VERIFY_ERROR", "PROTECTION_DENIED",
  "BLOCK_PROTECT_DENIED", "MPU_CONFIG_DENIED", "COPROCESSOR_DISABLED",
  "TRUSTZONE_DENIED", "TIMEOUT", "DFU_ERROR", "NOT_IMPLEMENTED", "INTERNAL_ERROR",
]);

export function isCoreErrorCode(value: unknown): value is CoreErrorCode {
  return typeof value === "string" && ERROR_CODES.has(value);
}

export function isCoreError(value: unknown): value is CoreError {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    "message" in value &&
    "recoverable" in value &&
    isCoreErrorCode(value.code) &&
    typeof value.message === "string" &&
    typeof value.recoverable === "boolean"
  );
}

// Helper to convert unknown errors to CoreError
export function toCoreError(err: unknown): CoreError {
  if (isCoreError(err)) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);

  // Classify known transport error patterns
  if (message.includes("Transfer count mismatch") || message.includes("transfer fault")) {
    return createError("TRANSPORT_ERROR", message, { cause: err });
  }
  if (message.includes("timed out")) {
    return createError("TRANSPORT_TIMEOUT", message, { cause: err });
  }
  if (message.includes("No DP response") || message.includes("WAIT response")) {
    return createError("CANNOT_CONNECT", message, { cause: err });
  }

  return createError("INTERNAL_ERROR", message, { recoverable: false, cause: err });
}

// Re-throw `err` with extra context, keeping its classification
export function withContext(err: unknown, context: string): CoreError {
  const error = toCoreError(err);
  return { ...error, message: `${context}: ${error.message}` };
}

// ============================================================================
// Domain Types
// ============================================================================

export type DeviceFamily = "NRF51" | "NRF52" | "NRF53" | "NRF91" | "UNKNOWN";

export type Coprocessor = "APPLICATION" | "NETWORK" | "MODEM";

export type ProtectionState = "NONE" | "REGION_0" | "ALL" | "BOTH" | "SECURE_ONLY";

export type MemoryRegionKind =
  | "CODE_FLASH"
  | "INFO_PAGE"
  | "CODE_RAM"
  | "DATA_RAM"
  | "XIP_FLASH"
  | "PERIPHERAL";

export type EraseMode = "NONE" | "ALL" | "PAGES" | "PAGES_INCLUDING_UICR";
export type VerifyMode = "NONE" | "READ_BACK" | "HASH";
export type DfuVerifyMode = "NONE" | "HASH";
export type ResetKind = "NONE" | "SYSTEM" | "DEBUG" | "PIN";

export interface ProgramOptions {
  verify: VerifyMode;
  chipEraseMode: EraseMode;
  qspiEraseMode: EraseMode;   // PAGES_INCLUDING_UICR is rejected for XIP flash
  reset: ResetKind;
}

export const DEFAULT_PROGRAM_OPTIONS: ProgramOptions = {
  verify: "NONE",
  chipEraseMode: "ALL",
  qspiEraseMode: "NONE",
  reset: "SYSTEM",
};

export interface ReadOptions {
  ram?: boolean;
  code?: boolean;
  uicr?: boolean;
  ficr?: boolean;
  qspi?: boolean;
}

export type CpuRegister =
  | "R0" | "R1" | "R2" | "R3" | "R4" | "R5" | "R6" | "R7"
  | "R8" | "R9" | "R10" | "R11" | "R12" | "SP" | "LR" | "PC"
  | "XPSR" | "MSP" | "PSP";

export const CPU_REGISTERS: readonly CpuRegister[] = [
  "R0", "R1", "R2", "R3", "R4", "R5", "R6", "R7",
  "R8", "R9", "R10", "R11", "R12", "SP", "LR", "PC",
  "XPSR", "MSP", "PSP",
];

export type RamPower = "ON" | "OFF";

export type DeviceRevision =
  | "ENGA" | "ENGB" | "ENGC" | "ENGD"
  | "REV1" | "REV2" | "REV3"
  | "FUTURE" | "UNKNOWN";

export interface DeviceInfo {
  family: DeviceFamily;
  name: string;                 // e.g. "NRF52840", or "NRF52_FUTURE" for unlisted parts
  version: string;              // e.g. "NRF52840_xxAA_REV2"
  memory: string;               // Variant memory code, e.g. "AA"
  revision: DeviceRevision;
  codeAddress: number;
  codePageSize: number;
  codeSize: number;
  uicrAddress: number;
  infoPageSize: number;
  ficrAddress: number;
  ficrSize: number;
  codeRamPresent: boolean;
  codeRamAddress: number;
  dataRamAddress: number;
  ramSize: number;
  qspiPresent: boolean;
  xipAddress: number;
  xipSize: number;
  pinResetPin: number | null;   // null on parts with a dedicated reset pin
}

export type Region0Source = "NO_REGION_0" | "FACTORY" | "USER";

export interface Region0Info {
  size: number;
  source: Region0Source;
}

export interface RamSectionsPower {
  sizes: number[];
  power: RamPower[];
}

export interface ComPortInfo {
  path: string;
  vcom: number;
  serialNumber: number;
}

export interface ProbeInfo {
  serialNumber: number;
  clockSpeedKhz: number;
  firmwareString: string;
  comPorts: ComPortInfo[];
}

export interface LibraryVersion {
  major: number;
  minor: number;
  revision: string;
}

export interface LibraryInfo {
  version: LibraryVersion;
  path: string;
}

export type RttDirection = "UP" | "DOWN";

export interface RttChannel {
  direction: RttDirection;
  index: number;
  name: string;
  size: number;
}

// A contiguous run of bytes at an absolute address
export interface ImageSegment {
  address: number;
  data: Uint8Array;
}

export type SegmentSource = Iterable<ImageSegment> | AsyncIterable<ImageSegment>;

export interface SegmentSink {
  write(address: number, data: Uint8Array): void | Promise<void>;
}

// ============================================================================
// Display Formatting
// ============================================================================

export function toHex(val: number): string {
  return "0x" + (val >>> 0).toString(16).toUpperCase().padStart(8, "0");
}

export function formatVersion(version: LibraryVersion): string {
  return `${version.major}.${version.minor}${version.revision}`;
}

export interface DeviceInfoDisplay {
  device: string;
  family: string;
  flash: string;
  ram: string;
  uicr: string;
  xip: string;
  resetPin: string;
}

export function formatDeviceInfo(info: DeviceInfo): DeviceInfoDisplay {
  return {
    device: `${info.name} (${info.version})`,
    family: info.family,
    flash: `${info.codeSize / 1024} kB @ ${toHex(info.codeAddress)}, ${info.codePageSize} B pages`,
    ram: `${info.ramSize / 1024} kB @ ${toHex(info.dataRamAddress)}`,
    uicr: `${info.infoPageSize} B @ ${toHex(info.uicrAddress)}`,
    xip: info.qspiPresent ? `${toHex(info.xipAddress)} (${info.xipSize / 1024} kB window)` : "Not present",
    resetPin: info.pinResetPin === null ? "Dedicated" : `P0.${info.pinResetPin}`,
  };
}
