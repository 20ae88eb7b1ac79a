import type { ResetKind } from "../types.js";
import type { DeviceDriver } from "../drivers/driver.js";

export type CoreRunState = "HALTED" | "RUNNING" | "DETACHED";

/**
 * Issue a reset through the driver and report where it leaves the core:
 * SYSTEM halts on the reset vector, DEBUG lets the core run and PIN drops
 * the debug connection.
 */
export async function resetDevice(driver: DeviceDriver, kind: Exclude<ResetKind, "NONE">): Promise<CoreRunState> {
  switch (kind) {
    case "SYSTEM":
      await driver.sysReset();
      return "HALTED";
    case "DEBUG":
      await driver.debugReset();
      return "RUNNING";
    case "PIN":
      await driver.pinReset();
      return "DETACHED";
  }
}
