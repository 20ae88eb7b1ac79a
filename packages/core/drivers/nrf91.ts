import type { Coprocessor, DeviceInfo, ProtectionState } from "../types.js";
import type { CoreLayout, RamPowerLayout } from "./nrf-base.js";
import type { SpuProtection } from "./block-protect.js";
import { createError, toHex } from "../types.js";
import { decodeVariant, versionName } from "./driver.js";
import { NrfDriver } from "./nrf-base.js";
import { disableSpuProtection, isSpuProtected } from "./block-protect.js";
import { readCtrlApProtection, readEraseProtectStatus, readFicrInfo } from "./m33.js";

export const FICR_BASE = 0x00ff0000;
export const UICR_BASE = 0x00ff8000;
export const DATA_RAM_BASE = 0x20000000;
export const NVMC_BASE = 0x50039000;
export const VMC_RAM_BASE = 0x5003a600;  // RAM[0].POWER
export const RESETREAS = 0x50005400;

export const AHB_AP = 0;
export const CTRL_AP = 4;

// UICR Offsets
export const UICR_APPROTECT = 0x000;
export const UICR_SECUREAPPROTECT = 0x02c;
export const UICR_ERASEPROTECT = 0x030;

const SPU: SpuProtection = {
  permBase: 0x50003600,
  regionSize: 0x8000,
  regions: 32,
};

const LAYOUT: CoreLayout = {
  ahbAp: AHB_AP,
  ctrlAp: CTRL_AP,
  nvmc: { base: NVMC_BASE, pageErase: "WRITE" },
  resetReasonAddress: RESETREAS,
};

const PART_NAMES: Record<number, string> = {
  0x9120: "NRF9120",
  0x9160: "NRF9160",
};

export class Nrf91Driver extends NrfDriver {
  readonly family = "NRF91" as const;

  protected layout(): CoreLayout {
    return LAYOUT;
  }

  protected async readDeviceInfo(): Promise<DeviceInfo> {
    const ficr = await readFicrInfo(this.transport, FICR_BASE);
    const name = PART_NAMES[ficr.part];
    if (!name) {
      this.logger.log("warn", `Unlisted nRF91 part ${toHex(ficr.part)}`);
    }
    const decoded = decodeVariant(ficr.variant);

    return {
      family: "NRF91",
      name: name ?? "NRF91_FUTURE",
      version: name ? versionName(name, decoded) : "NRF91_FUTURE",
      memory: decoded.memory,
      revision: name ? decoded.revision : "FUTURE",
      codeAddress: 0,
      codePageSize: ficr.codePageSize,
      codeSize: ficr.codePageSize * ficr.codePages,
      uicrAddress: UICR_BASE,
      infoPageSize: 0x1000,
      ficrAddress: FICR_BASE,
      ficrSize: 0x1000,
      codeRamPresent: false,
      codeRamAddress: 0,
      dataRamAddress: DATA_RAM_BASE,
      ramSize: ficr.ramSize,
      qspiPresent: false,
      xipAddress: 0,
      xipSize: 0,
      pinResetPin: null,
    };
  }

  // Eight blocks of four 8 kB sections
  protected ramPowerLayout(info: DeviceInfo): RamPowerLayout {
    const sectionSize = 0x2000;
    const blocks = Math.max(1, info.ramSize / (4 * sectionSize));
    return {
      base: VMC_RAM_BASE,
      stride: 0x10,
      blocks: Array.from({ length: blocks }, () => ({ sections: 4, sectionSize })),
    };
  }

  async readProtection(): Promise<ProtectionState> {
    return readCtrlApProtection(this.transport, CTRL_AP, true);
  }

  async setProtection(level: ProtectionState): Promise<void> {
    if (level === "ALL") {
      await this.nvmcWriteWord(UICR_BASE + UICR_APPROTECT, 0);
    } else if (level === "SECURE_ONLY") {
      await this.nvmcWriteWord(UICR_BASE + UICR_SECUREAPPROTECT, 0);
    } else {
      throw createError("INVALID_PARAMETER", `nRF91 devices support ALL or SECURE_ONLY protection, not ${level}`);
    }
    await this.debugReset();
  }

  async isEraseProtectEnabled(): Promise<boolean> {
    return readEraseProtectStatus(this.transport, CTRL_AP);
  }

  async enableEraseProtect(): Promise<void> {
    await this.nvmcWriteWord(UICR_BASE + UICR_ERASEPROTECT, 0);
    await this.debugReset();
  }

  async coprocessorEnabled(coprocessor: Coprocessor): Promise<boolean> {
    this.requireKnownCore(coprocessor);
    // The modem runs whenever the application core allows it; nothing to query
    return true;
  }

  async enableCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireKnownCore(coprocessor);
    if (coprocessor === "MODEM") {
      throw createError("INVALID_DEVICE_FOR_OPERATION", "The modem core is controlled by application firmware");
    }
  }

  async disableCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireKnownCore(coprocessor);
    throw createError(
      coprocessor === "MODEM" ? "INVALID_DEVICE_FOR_OPERATION" : "INVALID_PARAMETER",
      `The ${coprocessor.toLowerCase()} core cannot be disabled from the debugger`,
    );
  }

  async selectCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireKnownCore(coprocessor);
    if (coprocessor === "MODEM") {
      throw createError("INVALID_DEVICE_FOR_OPERATION", "The modem core is not reachable through SWD");
    }
  }

  private requireKnownCore(coprocessor: Coprocessor): void {
    if (coprocessor === "NETWORK") {
      throw createError("INVALID_DEVICE_FOR_OPERATION", "nRF91 devices have no network core");
    }
  }

  async isBlockProtectEnabled(address: number, length: number): Promise<boolean> {
    return isSpuProtected(this.transport, SPU, address, length);
  }

  async disableBlockProtect(): Promise<void> {
    await disableSpuProtection(this.transport, SPU);
  }

  async recover(): Promise<void> {
    if (await this.isEraseProtectEnabled()) {
      throw createError("RECOVER_FAILED", "Erase protection is enabled; the device cannot be recovered");
    }
    await this.ctrlApEraseAll(CTRL_AP);
    await this.finishRecover();
  }
}
