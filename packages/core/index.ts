// Entry points
export { ProbeApi } from "./library.js";
export type { ProbeApiOptions, ProbeApiState, OpenSessionOptions } from "./library.js";
export { Session } from "./session.js";
export type { SessionOptions, SessionState } from "./session.js";

// Probe access
export {
  createProbeLibrary,
  DapProbeLibrary,
  DapProbeTransport,
  KNOWN_PROBES,
  listComPorts,
  parseProbeSerial,
} from "./connection.js";
export { isProbeLibrary, powerDownDebug, powerUpDebug, withTimeout } from "./transport.js";
export type { ProbeLibrary, ProbeLibraryFactory, ProbeLibraryOptions, ProbeTransport } from "./transport.js";

// Devices
export { detectFamily, createDriver } from "./drivers/identify.js";
export type { DeviceDriver, DriverContext, QspiLayout } from "./drivers/driver.js";
export { MemoryMap } from "./memory-map.js";
export type { MemoryRegion, RegionSpan } from "./memory-map.js";

// QSPI and RTT
export { parseQspiParams, qspiParamsSchema, QSPI_ERASE_BYTES } from "./qspi.js";
export type { QspiEraseLength, QspiInstruction, QspiParams, QspiParamsInput } from "./qspi.js";
export { parseQspiIni, readQspiIni } from "./qspi-ini.js";
export type { RttSearchRange, RttState } from "./rtt.js";

// Serial DFU
export { McubootDfu } from "./dfu/mcuboot.js";
export type { McubootDfuOptions, McubootImage, McubootUploadOptions } from "./dfu/mcuboot.js";
export { ModemDfu } from "./dfu/modem.js";
export { FrameReader, openSerialLink } from "./dfu/link.js";
export type { DfuOptions, SerialLink } from "./dfu/link.js";

// Configuration and logging
export {
  clampClockSpeed,
  DEFAULT_CLOCK_KHZ,
  DFU_TIMEOUT_MS,
  MCUBOOT_BAUD_RATE,
  MODEM_DFU_BAUD_RATE,
  loadConfig,
  MAX_CLOCK_KHZ,
  MIN_CLOCK_KHZ,
  MINIMUM_LIBRARY_VERSION,
} from "./config.js";
export type { Config, MinimumVersion } from "./config.js";
export { consoleLogger, createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions, LogSeverity } from "./logger.js";

// Types
export type {
  Result,
  CoreError,
  CoreErrorCode,
  ComPortInfo,
  Coprocessor,
  CpuRegister,
  DeviceFamily,
  DeviceInfo,
  DeviceInfoDisplay,
  DeviceRevision,
  DfuVerifyMode,
  EraseMode,
  ImageSegment,
  LibraryInfo,
  LibraryVersion,
  MemoryRegionKind,
  ProbeInfo,
  ProgramOptions,
  ProtectionState,
  RamPower,
  RamSectionsPower,
  ReadOptions,
  Region0Info,
  Region0Source,
  ResetKind,
  RttChannel,
  RttDirection,
  SegmentSink,
  SegmentSource,
  VerifyMode,
} from "./types.js";

// Result helpers and error utilities
export {
  ok,
  err,
  createError,
  isCoreError,
  toCoreError,
  formatDeviceInfo,
  formatVersion,
  toHex,
  CPU_REGISTERS,
  DEFAULT_PROGRAM_OPTIONS,
} from "./types.js";
