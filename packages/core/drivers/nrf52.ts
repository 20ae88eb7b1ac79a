import type { DeviceInfo, ProtectionState } from "../types.js";
import type { QspiLayout } from "./driver.js";
import type { CoreLayout, RamBlock, RamPowerLayout } from "./nrf-base.js";
import type { AclProtection, BitmapProtection } from "./block-protect.js";
import { createError, toHex } from "../types.js";
import { decodeVariant, versionName } from "./driver.js";
import { CTRL_AP_APPROTECTSTATUS, NrfDriver } from "./nrf-base.js";
import {
  disableBitmapProtection,
  isAclProtected,
  isBitmapProtected,
} from "./block-protect.js";

// Memory Map Constants
export const FLASH_BASE = 0x00000000;
export const CODE_RAM_BASE = 0x00800000;
export const FICR_BASE = 0x10000000;
export const FICR_SIZE = 0x400;
export const UICR_BASE = 0x10001000;
export const DATA_RAM_BASE = 0x20000000;
export const NVMC_BASE = 0x4001e000;
export const POWER_RAM_BASE = 0x40000900; // RAM[0].POWER
export const RESETREAS = 0x40000400;

export const AHB_AP = 0;
export const CTRL_AP = 1;
export const CTRL_AP_IDR_VALUE = 0x02880000;

// FICR Offsets
const FICR_CODEPAGESIZE = 0x010;
const FICR_CODESIZE = 0x014;
const FICR_INFO_PART = 0x100;
const FICR_INFO_VARIANT = 0x104;
const FICR_INFO_RAM = 0x10c;

// UICR Offsets
export const UICR_PSELRESET_0 = 0x200;
export const UICR_APPROTECT = 0x208;

const APPROTECT_ENABLED = 0xffffff00;

const BPROT: BitmapProtection = {
  configRegisters: [0x40000600, 0x40000604, 0x40000610, 0x40000614],
  disableInDebug: 0x40000608,
  regionSize: 0x1000,
};

const ACL: AclProtection = {
  base: 0x4001e800,
  entries: 8,
};

export const QSPI_LAYOUT: QspiLayout = {
  base: 0x40029000,
  xipAddress: 0x12000000,
  xipSize: 0x08000000,
  scratchAddress: DATA_RAM_BASE,
  erase32kSupported: false,
};

interface Nrf52Part {
  name: string;
  pinReset: number;
  qspi: boolean;
  blockProtect: "BPROT" | "ACL";
}

const NRF52_PARTS: Record<number, Nrf52Part> = {
  0x52805: { name: "NRF52805", pinReset: 21, qspi: false, blockProtect: "BPROT" },
  0x52810: { name: "NRF52810", pinReset: 21, qspi: false, blockProtect: "BPROT" },
  0x52811: { name: "NRF52811", pinReset: 21, qspi: false, blockProtect: "BPROT" },
  0x52820: { name: "NRF52820", pinReset: 18, qspi: false, blockProtect: "ACL" },
  0x52832: { name: "NRF52832", pinReset: 21, qspi: false, blockProtect: "BPROT" },
  0x52833: { name: "NRF52833", pinReset: 18, qspi: false, blockProtect: "ACL" },
  0x52840: { name: "NRF52840", pinReset: 18, qspi: true, blockProtect: "ACL" },
};

const FUTURE_PART: Nrf52Part = { name: "NRF52_FUTURE", pinReset: 21, qspi: false, blockProtect: "BPROT" };

const LAYOUT: CoreLayout = {
  ahbAp: AHB_AP,
  ctrlAp: CTRL_AP,
  nvmc: { base: NVMC_BASE, pageErase: "REGISTER" },
  resetReasonAddress: RESETREAS,
};

// First 64 kB in 8 kB blocks of two sections, the rest in 32 kB sections
export function nrf52RamBlocks(ramSize: number): RamBlock[] {
  const blocks: RamBlock[] = [];
  const low = Math.min(ramSize, 0x10000);
  for (let offset = 0; offset < low; offset += 0x2000) {
    blocks.push({ sections: 2, sectionSize: 0x1000 });
  }
  if (ramSize > 0x10000) {
    blocks.push({ sections: (ramSize - 0x10000) / 0x8000, sectionSize: 0x8000 });
  }
  return blocks;
}

export class Nrf52Driver extends NrfDriver {
  readonly family = "NRF52" as const;
  private part: Nrf52Part = FUTURE_PART;

  protected layout(): CoreLayout {
    return LAYOUT;
  }

  protected async readDeviceInfo(): Promise<DeviceInfo> {
    const t = this.transport;
    const codePageSize = await t.readU32(FICR_BASE + FICR_CODEPAGESIZE);
    const codeSize = await t.readU32(FICR_BASE + FICR_CODESIZE);
    const partNumber = await t.readU32(FICR_BASE + FICR_INFO_PART);
    const variant = await t.readU32(FICR_BASE + FICR_INFO_VARIANT);
    const ram = await t.readU32(FICR_BASE + FICR_INFO_RAM);

    this.part = NRF52_PARTS[partNumber] ?? FUTURE_PART;
    const decoded = decodeVariant(variant);
    if (this.part === FUTURE_PART) {
      this.logger.log("warn", `Unlisted nRF52 part ${toHex(partNumber)}`);
    }
    const ramSize = ram === 0xffffffff ? 0x10000 : ram * 1024;

    return {
      family: "NRF52",
      name: this.part.name,
      version: this.part === FUTURE_PART ? "NRF52_FUTURE" : versionName(this.part.name, decoded),
      memory: decoded.memory,
      revision: this.part === FUTURE_PART ? "FUTURE" : decoded.revision,
      codeAddress: FLASH_BASE,
      codePageSize,
      codeSize: codePageSize * codeSize,
      uicrAddress: UICR_BASE,
      infoPageSize: codePageSize,
      ficrAddress: FICR_BASE,
      ficrSize: FICR_SIZE,
      codeRamPresent: true,
      codeRamAddress: CODE_RAM_BASE,
      dataRamAddress: DATA_RAM_BASE,
      ramSize,
      qspiPresent: this.part.qspi,
      xipAddress: this.part.qspi ? QSPI_LAYOUT.xipAddress : 0,
      xipSize: this.part.qspi ? QSPI_LAYOUT.xipSize : 0,
      pinResetPin: this.part.pinReset,
    };
  }

  protected ramPowerLayout(info: DeviceInfo): RamPowerLayout {
    return { base: POWER_RAM_BASE, stride: 0x10, blocks: nrf52RamBlocks(info.ramSize) };
  }

  async readProtection(): Promise<ProtectionState> {
    const status = await this.transport.readAccessPort(CTRL_AP, CTRL_AP_APPROTECTSTATUS);
    return status & 1 ? "NONE" : "ALL";
  }

  async setProtection(level: ProtectionState): Promise<void> {
    if (level !== "ALL") {
      throw createError("INVALID_PARAMETER", `nRF52 devices support only ALL readback protection, not ${level}`);
    }
    await this.nvmcWriteWord(UICR_BASE + UICR_APPROTECT, APPROTECT_ENABLED);
    // APPROTECT latches on reset
    await this.debugReset();
  }

  async isBlockProtectEnabled(address: number, length: number): Promise<boolean> {
    await this.info();
    if (this.part.blockProtect === "ACL") {
      return isAclProtected(this.transport, ACL, address, length);
    }
    return isBitmapProtected(this.transport, BPROT, address, length);
  }

  async disableBlockProtect(): Promise<void> {
    await this.info();
    if (this.part.blockProtect === "ACL") {
      // ACL entries can only be cleared by a reset
      await this.sysReset();
      return;
    }
    await disableBitmapProtection(this.transport, BPROT);
  }

  qspiLayout(): QspiLayout | null {
    return this.part.qspi ? QSPI_LAYOUT : null;
  }

  async recover(): Promise<void> {
    await this.ctrlApEraseAll(CTRL_AP);
    await this.finishRecover();
  }
}
