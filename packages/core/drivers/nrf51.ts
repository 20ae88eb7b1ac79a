import type { DeviceInfo, DeviceRevision, ProtectionState, RamPower, Region0Info } from "../types.js";
import type { CoreLayout, RamPowerLayout } from "./nrf-base.js";
import type { BitmapProtection } from "./block-protect.js";
import { createError, toHex } from "../types.js";
import { NVMC_CONFIG_EEN, NrfDriver } from "./nrf-base.js";
import { disableBitmapProtection, isBitmapProtected } from "./block-protect.js";

export const FICR_BASE = 0x10000000;
export const UICR_BASE = 0x10001000;
export const DATA_RAM_BASE = 0x20000000;
export const NVMC_BASE = 0x4001e000;
export const RESETREAS = 0x40000400;
export const RAMON = 0x40000524;
export const RAMONB = 0x40000554;

// FICR Offsets
const FICR_CODEPAGESIZE = 0x010;
const FICR_CODESIZE = 0x014;
const FICR_CLENR0 = 0x028;
const FICR_PPFC = 0x02c;
const FICR_NUMRAMBLOCK = 0x034;
const FICR_SIZERAMBLOCKS = 0x038;
const FICR_CONFIGID = 0x05c;

// UICR Offsets
const UICR_CLENR0 = 0x000;
export const UICR_RBPCONF = 0x004;

const NVMC_ERASEALL = NVMC_BASE + 0x50c;

// RBPCONF fields are enabled when cleared to 0x00
const RBPCONF_PR0 = 0x000000ff;
const RBPCONF_PALL = 0x0000ff00;

const MPU: Omit<BitmapProtection, "regionSize"> = {
  configRegisters: [0x40000600, 0x40000604],
  disableInDebug: 0x40000608,
};

const LAYOUT: CoreLayout = {
  ahbAp: 0,
  ctrlAp: null,
  nvmc: { base: NVMC_BASE, pageErase: "REGISTER" },
  resetReasonAddress: RESETREAS,
};

// Hardware IDs from FICR.CONFIGID
const HWID_REVISIONS: Record<number, { memory: string; revision: DeviceRevision }> = {
  0x001d: { memory: "AA", revision: "REV1" },
  0x002a: { memory: "AA", revision: "REV2" },
  0x003c: { memory: "AA", revision: "REV2" },
  0x0044: { memory: "AA", revision: "REV2" },
  0x004c: { memory: "AB", revision: "REV2" },
  0x0072: { memory: "AA", revision: "REV3" },
  0x007b: { memory: "AB", revision: "REV3" },
  0x0083: { memory: "AC", revision: "REV3" },
  0x0087: { memory: "AC", revision: "REV3" },
};

export class Nrf51Driver extends NrfDriver {
  readonly family = "NRF51" as const;
  private ramBlocks = { count: 0, size: 0 };

  protected layout(): CoreLayout {
    return LAYOUT;
  }

  protected async readDeviceInfo(): Promise<DeviceInfo> {
    const t = this.transport;
    const codePageSize = await t.readU32(FICR_BASE + FICR_CODEPAGESIZE);
    const codeSize = await t.readU32(FICR_BASE + FICR_CODESIZE);
    const ramBlocks = await t.readU32(FICR_BASE + FICR_NUMRAMBLOCK);
    const ramBlockSize = await t.readU32(FICR_BASE + FICR_SIZERAMBLOCKS);
    const hwid = (await t.readU32(FICR_BASE + FICR_CONFIGID)) & 0xffff;

    this.ramBlocks = { count: ramBlocks, size: ramBlockSize };
    const known = HWID_REVISIONS[hwid];
    if (!known) {
      this.logger.log("warn", `Unlisted nRF51 hardware id ${toHex(hwid)}`);
    }
    const memory = known?.memory ?? "UNKNOWN";
    const revision = known?.revision ?? "FUTURE";

    return {
      family: "NRF51",
      name: "NRF51xxx",
      version: known ? `NRF51xxx_xx${memory}_${revision}` : "NRF51_FUTURE",
      memory,
      revision,
      codeAddress: 0,
      codePageSize,
      codeSize: codePageSize * codeSize,
      uicrAddress: UICR_BASE,
      infoPageSize: codePageSize,
      ficrAddress: FICR_BASE,
      ficrSize: 0x100,
      codeRamPresent: false,
      codeRamAddress: 0,
      dataRamAddress: DATA_RAM_BASE,
      ramSize: ramBlocks * ramBlockSize,
      qspiPresent: false,
      xipAddress: 0,
      xipSize: 0,
      pinResetPin: 21,
    };
  }

  // nRF51 powers RAM through RAMON/RAMONB, not RAM[n].POWER
  protected ramPowerLayout(_info: DeviceInfo): RamPowerLayout {
    const { count, size } = this.ramBlocks;
    return {
      base: RAMON,
      stride: 0,
      blocks: Array.from({ length: count }, () => ({ sections: 1, sectionSize: size })),
    };
  }

  private ramonBit(index: number): { register: number; mask: number } {
    return index < 2
      ? { register: RAMON, mask: 1 << index }
      : { register: RAMONB, mask: 1 << (index - 2) };
  }

  async ramSectionsPowerStatus(): Promise<RamPower[]> {
    const count = await this.ramSectionsCount();
    const status: RamPower[] = [];
    for (let index = 0; index < count; index++) {
      const { register, mask } = this.ramonBit(index);
      status.push((await this.transport.readU32(register)) & mask ? "ON" : "OFF");
    }
    return status;
  }

  async powerRamAll(): Promise<void> {
    for (const register of [RAMON, RAMONB]) {
      const value = await this.transport.readU32(register);
      await this.transport.writeU32(register, value | 0x3);
    }
  }

  async unpowerRamSection(index: number): Promise<void> {
    const count = await this.ramSectionsCount();
    if (index < 0 || index >= count) {
      throw createError("INVALID_PARAMETER", `RAM section ${index} does not exist (device has ${count})`);
    }
    const { register, mask } = this.ramonBit(index);
    const value = await this.transport.readU32(register);
    await this.transport.writeU32(register, value & ~mask);
  }

  async readProtection(): Promise<ProtectionState> {
    const rbpconf = await this.transport.readU32(UICR_BASE + UICR_RBPCONF);
    const region0 = (rbpconf & RBPCONF_PR0) === 0;
    const all = (rbpconf & RBPCONF_PALL) === 0;
    if (region0 && all) {
      return "BOTH";
    }
    if (all) {
      return "ALL";
    }
    return region0 ? "REGION_0" : "NONE";
  }

  async setProtection(level: ProtectionState): Promise<void> {
    const values: Partial<Record<ProtectionState, number>> = {
      REGION_0: 0xffffff00,
      ALL: 0xffff00ff,
      BOTH: 0xffff0000,
    };
    const value = values[level];
    if (value === undefined) {
      throw createError("INVALID_PARAMETER", `nRF51 devices do not support ${level} readback protection`);
    }
    await this.nvmcWriteWord(UICR_BASE + UICR_RBPCONF, value);
    await this.debugReset();
  }

  async readRegion0(): Promise<Region0Info> {
    const user = await this.transport.readU32(UICR_BASE + UICR_CLENR0);
    if (user !== 0xffffffff) {
      return { size: user, source: "USER" };
    }
    const factory = await this.transport.readU32(FICR_BASE + FICR_CLENR0);
    if (factory !== 0xffffffff) {
      return { size: factory, source: "FACTORY" };
    }
    return { size: 0, source: "NO_REGION_0" };
  }

  private async mpuLayout(): Promise<BitmapProtection> {
    const info = await this.info();
    return { ...MPU, regionSize: info.codeSize / 64 };
  }

  async isBlockProtectEnabled(address: number, length: number): Promise<boolean> {
    return isBitmapProtected(this.transport, await this.mpuLayout(), address, length);
  }

  async disableBlockProtect(): Promise<void> {
    await disableBitmapProtection(this.transport, await this.mpuLayout());
  }

  // No CTRL-AP: reset through AIRCR and let the core run
  async debugReset(): Promise<void> {
    await this.sysReset();
    await this.transport.run();
  }

  async recover(): Promise<void> {
    const ppfc = await this.transport.readU32(FICR_BASE + FICR_PPFC);
    if ((ppfc & 0xff) === 0x00) {
      throw createError("MPU_CONFIG_DENIED", "Device holds pre-programmed factory code and cannot be recovered");
    }

    await this.enterDebug();
    await this.transport.halt();
    this.logger.log("info", "Triggering NVMC ERASEALL...");
    await this.withNvmc(NVMC_CONFIG_EEN, () => this.transport.writeU32(NVMC_ERASEALL, 1), 15000);
    await this.sysReset();
    await this.finishRecover();
  }
}
