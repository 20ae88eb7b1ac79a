import type {
  Coprocessor,
  CpuRegister,
  DeviceFamily,
  DeviceInfo,
  DeviceRevision,
  ProtectionState,
  RamPower,
  Region0Info,
} from "../types.js";
import type { Logger } from "../logger.js";
import type { ProbeTransport } from "../transport.js";

export interface DriverContext {
  transport: ProbeTransport;
  logger: Logger;
}

// Where the QSPI peripheral of the selected core lives
export interface QspiLayout {
  base: number;
  xipAddress: number;
  xipSize: number;
  scratchAddress: number;
  erase32kSupported: boolean;
}

/**
 * Capability set every device family implements. The session dispatches
 * through this interface after family identification picks the variant.
 */
export interface DeviceDriver {
  readonly family: DeviceFamily;
  readonly coprocessor: Coprocessor;

  identify(): Promise<DeviceInfo>;

  readProtection(): Promise<ProtectionState>;
  setProtection(level: ProtectionState): Promise<void>;
  isEraseProtectEnabled(): Promise<boolean>;
  enableEraseProtect(): Promise<void>;
  readRegion0(): Promise<Region0Info>;

  eraseAll(): Promise<void>;
  erasePage(address: number): Promise<void>;
  eraseUicr(): Promise<void>;
  nvmcWrite(address: number, data: Uint8Array): Promise<void>;

  disableBlockProtect(): Promise<void>;
  isBlockProtectEnabled(address: number, length: number): Promise<boolean>;

  coprocessorEnabled(coprocessor: Coprocessor): Promise<boolean>;
  enableCoprocessor(coprocessor: Coprocessor): Promise<void>;
  disableCoprocessor(coprocessor: Coprocessor): Promise<void>;
  selectCoprocessor(coprocessor: Coprocessor): Promise<void>;

  ramSectionsCount(): Promise<number>;
  ramSectionsSize(): Promise<number[]>;
  ramSectionsPowerStatus(): Promise<RamPower[]>;
  powerRamAll(): Promise<void>;
  unpowerRamSection(index: number): Promise<void>;

  cpuReadRegister(register: CpuRegister): Promise<number>;
  cpuWriteRegister(register: CpuRegister, value: number): Promise<void>;

  sysReset(): Promise<void>;
  debugReset(): Promise<void>;
  pinReset(): Promise<void>;

  recover(): Promise<void>;

  // Power up debug and select the MEM-AP of the selected core
  enterDebug(): Promise<void>;

  qspiLayout(): QspiLayout | null;
}

// ============================================================================
// FICR decoding shared by the nRF52/53/91 families
// ============================================================================

const REVISION_LETTERS: Record<string, DeviceRevision> = {
  A: "ENGA",
  B: "ENGB",
  C: "REV1",
  D: "REV2",
  E: "REV3",
};

export interface DecodedVariant {
  memory: string;
  revision: DeviceRevision;
}

// INFO.VARIANT holds four ASCII characters, e.g. "AAD0"
export function decodeVariant(variant: number): DecodedVariant {
  if (variant === 0xffffffff || variant === 0) {
    return { memory: "UNKNOWN", revision: "UNKNOWN" };
  }
  const chars = [24, 16, 8, 0].map((shift) => String.fromCharCode((variant >>> shift) & 0xff));
  const memory = `${chars[0]}${chars[1]}`;
  const revision = REVISION_LETTERS[chars[2] ?? ""] ?? "FUTURE";
  return { memory, revision };
}

export function versionName(name: string, decoded: DecodedVariant): string {
  if (decoded.revision === "UNKNOWN") {
    return `${name}_UNKNOWN`;
  }
  return `${name}_xx${decoded.memory}_${decoded.revision}`;
}
