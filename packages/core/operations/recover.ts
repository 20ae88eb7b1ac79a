import type { ProtectionState } from "../types.js";
import type { DeviceDriver } from "../drivers/driver.js";
import type { Logger } from "../logger.js";
import { createError } from "../types.js";

/**
 * Erase everything through the driver's recover sequence and confirm that
 * readback protection is gone. Works on a protected device, so it takes the
 * driver directly instead of a target context.
 */
export async function recover(driver: DeviceDriver, logger: Logger): Promise<ProtectionState> {
  logger.progress("recover");
  logger.log("info", "Recovering device: this erases all flash, UICR and RAM.");

  await driver.recover();

  const protection = await driver.readProtection();
  if (protection !== "NONE") {
    throw createError("RECOVER_FAILED", `Device still reports ${protection} protection after recover`);
  }
  logger.log("info", "Recover complete.");
  return protection;
}
