import type {
  Coprocessor,
  DeviceFamily,
  DeviceInfo,
  ProtectionState,
  RamPower,
  Region0Info,
} from "../types.js";
import type { DeviceDriver, QspiLayout } from "./driver.js";
import { createError } from "../types.js";

function unknownFamily(operation: string): Promise<never> {
  return Promise.reject(
    createError("UNKNOWN_DEVICE", `${operation} requires a known device family`),
  );
}

/**
 * Stand-in used while the family is unidentified or unrecognized. Only the
 * neutral probe and debug-port operations work through it.
 */
export class UnknownDriver implements DeviceDriver {
  readonly family: DeviceFamily = "UNKNOWN";
  readonly coprocessor: Coprocessor = "APPLICATION";
  identify(): Promise<DeviceInfo> { return unknownFamily("Reading device information"); }
  readProtection(): Promise<ProtectionState> { return unknownFamily("Reading protection"); }
  setProtection(): Promise<void> { return unknownFamily("Setting protection"); }
  isEraseProtectEnabled(): Promise<boolean> { return unknownFamily("Reading erase protection"); }
  enableEraseProtect(): Promise<void> { return unknownFamily("Enabling erase protection"); }
  readRegion0(): Promise<Region0Info> { return unknownFamily("Reading region 0"); }
  eraseAll(): Promise<void> { return unknownFamily("Erasing"); }
  erasePage(): Promise<void> { return unknownFamily("Erasing a page"); }
  eraseUicr(): Promise<void> { return unknownFamily("Erasing UICR"); }
  nvmcWrite(): Promise<void> { return unknownFamily("Writing flash"); }
  disableBlockProtect(): Promise<void> { return unknownFamily("Disabling block protection"); }
  isBlockProtectEnabled(): Promise<boolean> { return unknownFamily("Reading block protection"); }
  coprocessorEnabled(): Promise<boolean> { return unknownFamily("Querying coprocessors"); }
  enableCoprocessor(): Promise<void> { return unknownFamily("Enabling a coprocessor"); }
  disableCoprocessor(): Promise<void> { return unknownFamily("Disabling a coprocessor"); }
  selectCoprocessor(): Promise<void> { return unknownFamily("Selecting a coprocessor"); }
  ramSectionsCount(): Promise<number> { return unknownFamily("Reading RAM sections"); }
  ramSectionsSize(): Promise<number[]> { return unknownFamily("Reading RAM sections"); }
  ramSectionsPowerStatus(): Promise<RamPower[]> { return unknownFamily("Reading RAM power"); }
  powerRamAll(): Promise<void> { return unknownFamily("Powering RAM"); }
  unpowerRamSection(): Promise<void> { return unknownFamily("Unpowering RAM"); }
  cpuReadRegister(): Promise<number> { return unknownFamily("Reading CPU registers"); }
  cpuWriteRegister(): Promise<void> { return unknownFamily("Writing CPU registers"); }
  sysReset(): Promise<void> { return unknownFamily("System reset"); }
  debugReset(): Promise<void> { return unknownFamily("Debug reset"); }
  pinReset(): Promise<void> { return unknownFamily("Pin reset"); }
  recover(): Promise<void> { return unknownFamily("Recover"); }
  enterDebug(): Promise<void> { return unknownFamily("Entering debug mode"); }

  qspiLayout(): QspiLayout | null {
    return null;
  }
}
