import type { Coprocessor, DeviceInfo, ProtectionState } from "../types.js";
import type { QspiLayout } from "./driver.js";
import type { CoreLayout, RamPowerLayout } from "./nrf-base.js";
import type { SpuProtection } from "./block-protect.js";
import { createError, toHex } from "../types.js";
import { decodeVariant, versionName } from "./driver.js";
import { NrfDriver } from "./nrf-base.js";
import { disableSpuProtection, isSpuProtected } from "./block-protect.js";
import { readCtrlApProtection, readEraseProtectStatus, readFicrInfo } from "./m33.js";

// Application core RESET peripheral, NETWORK.FORCEOFF holds the network core
export const NETWORK_FORCEOFF = 0x50005614;
const FORCEOFF_HOLD = 1;
const FORCEOFF_RELEASE = 0;

interface Nrf53Core {
  coprocessor: "APPLICATION" | "NETWORK";
  ctrlAp: number;
  layout: CoreLayout;
  ficrBase: number;
  uicrBase: number;
  uicrSize: number;
  codeAddress: number;
  dataRamAddress: number;
  ramPower: { base: number; sectionSize: number; sectionsPerBlock: number };
  eraseProtectOffset: number;
  secureApprotectOffset: number | null;
  spu: SpuProtection | null;
  qspi: QspiLayout | null;
}

export const APPLICATION_CORE: Nrf53Core = {
  coprocessor: "APPLICATION",
  ctrlAp: 2,
  layout: {
    ahbAp: 0,
    ctrlAp: 2,
    nvmc: { base: 0x50039000, pageErase: "WRITE" },
    resetReasonAddress: 0x50005400,
  },
  ficrBase: 0x00ff0000,
  uicrBase: 0x00ff8000,
  uicrSize: 0x1000,
  codeAddress: 0x00000000,
  dataRamAddress: 0x20000000,
  ramPower: { base: 0x50081600, sectionSize: 0x1000, sectionsPerBlock: 16 },
  eraseProtectOffset: 0x020,
  secureApprotectOffset: 0x01c,
  spu: { permBase: 0x50003600, regionSize: 0x4000, regions: 64 },
  qspi: {
    base: 0x5002b000,
    xipAddress: 0x10000000,
    xipSize: 0x10000000,
    scratchAddress: 0x20000000,
    erase32kSupported: true,
  },
};

export const NETWORK_CORE: Nrf53Core = {
  coprocessor: "NETWORK",
  ctrlAp: 3,
  layout: {
    ahbAp: 1,
    ctrlAp: 3,
    nvmc: { base: 0x41080000, pageErase: "WRITE" },
    resetReasonAddress: 0x41030400,
  },
  ficrBase: 0x01ff0000,
  uicrBase: 0x01ff8000,
  uicrSize: 0x800,
  codeAddress: 0x01000000,
  dataRamAddress: 0x21000000,
  ramPower: { base: 0x41081600, sectionSize: 0x1000, sectionsPerBlock: 4 },
  eraseProtectOffset: 0x004,
  secureApprotectOffset: null,
  spu: null,
  qspi: null,
};

const UICR_APPROTECT = 0x000;

export class Nrf53Driver extends NrfDriver {
  readonly family = "NRF53" as const;
  private core: Nrf53Core = APPLICATION_CORE;

  get coprocessor(): Coprocessor {
    return this.core.coprocessor;
  }

  protected layout(): CoreLayout {
    return this.core.layout;
  }

  protected async readDeviceInfo(): Promise<DeviceInfo> {
    const core = this.core;
    const ficr = await readFicrInfo(this.transport, core.ficrBase);
    const known = ficr.part === 0x5340;
    if (!known) {
      this.logger.log("warn", `Unlisted nRF53 part ${toHex(ficr.part)}`);
    }
    const decoded = decodeVariant(ficr.variant);
    const name = known ? "NRF5340" : "NRF53_FUTURE";

    return {
      family: "NRF53",
      name,
      version: known ? versionName(name, decoded) : "NRF53_FUTURE",
      memory: decoded.memory,
      revision: known ? decoded.revision : "FUTURE",
      codeAddress: core.codeAddress,
      codePageSize: ficr.codePageSize,
      codeSize: ficr.codePageSize * ficr.codePages,
      uicrAddress: core.uicrBase,
      infoPageSize: core.uicrSize,
      ficrAddress: core.ficrBase,
      ficrSize: 0x1000,
      codeRamPresent: false,
      codeRamAddress: 0,
      dataRamAddress: core.dataRamAddress,
      ramSize: ficr.ramSize,
      qspiPresent: core.qspi !== null,
      xipAddress: core.qspi?.xipAddress ?? 0,
      xipSize: core.qspi?.xipSize ?? 0,
      pinResetPin: null,
    };
  }

  protected ramPowerLayout(info: DeviceInfo): RamPowerLayout {
    const { base, sectionSize, sectionsPerBlock } = this.core.ramPower;
    const blocks = Math.max(1, info.ramSize / (sectionSize * sectionsPerBlock));
    return {
      base,
      stride: 0x10,
      blocks: Array.from({ length: blocks }, () => ({ sections: sectionsPerBlock, sectionSize })),
    };
  }

  qspiLayout(): QspiLayout | null {
    return this.core.qspi;
  }

  // ==========================================================================
  // Coprocessors
  // ==========================================================================

  // FORCEOFF lives on the application core bus
  private async withApplicationBus<T>(action: () => Promise<T>): Promise<T> {
    this.transport.selectMemoryAccessPort(APPLICATION_CORE.layout.ahbAp);
    try {
      return await action();
    } finally {
      this.transport.selectMemoryAccessPort(this.core.layout.ahbAp);
    }
  }

  private requireDualCore(coprocessor: Coprocessor): void {
    if (coprocessor === "MODEM") {
      throw createError("INVALID_DEVICE_FOR_OPERATION", "nRF53 devices have no modem core");
    }
  }

  async coprocessorEnabled(coprocessor: Coprocessor): Promise<boolean> {
    this.requireDualCore(coprocessor);
    if (coprocessor === "APPLICATION") {
      return true;
    }
    const forceOff = await this.withApplicationBus(() => this.transport.readU32(NETWORK_FORCEOFF));
    return (forceOff & 1) === FORCEOFF_RELEASE;
  }

  async enableCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireDualCore(coprocessor);
    if (coprocessor === "NETWORK") {
      await this.withApplicationBus(() => this.transport.writeU32(NETWORK_FORCEOFF, FORCEOFF_RELEASE));
    }
  }

  async disableCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireDualCore(coprocessor);
    if (coprocessor === "APPLICATION") {
      throw createError("INVALID_PARAMETER", "The application core cannot be disabled");
    }
    if (this.core === NETWORK_CORE) {
      await this.selectCoprocessor("APPLICATION");
    }
    await this.withApplicationBus(() => this.transport.writeU32(NETWORK_FORCEOFF, FORCEOFF_HOLD));
  }

  async selectCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireDualCore(coprocessor);
    const next = coprocessor === "NETWORK" ? NETWORK_CORE : APPLICATION_CORE;
    if (next === this.core) {
      return;
    }
    if (next === NETWORK_CORE && !(await this.coprocessorEnabled("NETWORK"))) {
      throw createError("COPROCESSOR_DISABLED", "The network core is held off; enable it first");
    }
    this.core = next;
    this.forgetInfo();
    this.transport.selectMemoryAccessPort(next.layout.ahbAp);
    this.logger.log("info", `Selected ${coprocessor.toLowerCase()} core (AHB-AP ${next.layout.ahbAp})`);
  }

  // ==========================================================================
  // Protection
  // ==========================================================================

  async readProtection(): Promise<ProtectionState> {
    return readCtrlApProtection(this.transport, this.core.ctrlAp, this.core.secureApprotectOffset !== null);
  }

  async setProtection(level: ProtectionState): Promise<void> {
    const { uicrBase, secureApprotectOffset } = this.core;
    if (level === "ALL") {
      await this.nvmcWriteWord(uicrBase + UICR_APPROTECT, 0);
    } else if (level === "SECURE_ONLY" && secureApprotectOffset !== null) {
      await this.nvmcWriteWord(uicrBase + secureApprotectOffset, 0);
    } else {
      throw createError(
        "INVALID_PARAMETER",
        `The nRF53 ${this.core.coprocessor.toLowerCase()} core does not support ${level} protection`,
      );
    }
    await this.debugReset();
  }

  async isEraseProtectEnabled(): Promise<boolean> {
    return readEraseProtectStatus(this.transport, this.core.ctrlAp);
  }

  async enableEraseProtect(): Promise<void> {
    await this.nvmcWriteWord(this.core.uicrBase + this.core.eraseProtectOffset, 0);
    await this.debugReset();
  }

  async isBlockProtectEnabled(address: number, length: number): Promise<boolean> {
    const { spu } = this.core;
    return spu ? isSpuProtected(this.transport, spu, address, length) : false;
  }

  async disableBlockProtect(): Promise<void> {
    const { spu } = this.core;
    if (spu) {
      await disableSpuProtection(this.transport, spu);
    }
  }

  // Both cores are erased, network first; the network core is held off afterwards
  async recover(): Promise<void> {
    for (const core of [NETWORK_CORE, APPLICATION_CORE]) {
      if (await readEraseProtectStatus(this.transport, core.ctrlAp)) {
        throw createError(
          "RECOVER_FAILED",
          `Erase protection is enabled on the ${core.coprocessor.toLowerCase()} core; the device cannot be recovered`,
        );
      }
    }

    await this.ctrlApEraseAll(NETWORK_CORE.ctrlAp);
    await this.ctrlApEraseAll(APPLICATION_CORE.ctrlAp);
    this.core = APPLICATION_CORE;
    await this.finishRecover();
  }
}
