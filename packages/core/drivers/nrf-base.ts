import type {
  Coprocessor,
  CpuRegister,
  DeviceFamily,
  DeviceInfo,
  ProtectionState,
  RamPower,
  Region0Info,
} from "../types.js";
import type { Logger } from "../logger.js";
import type { ProbeTransport } from "../transport.js";
import type { DeviceDriver, DriverContext, QspiLayout } from "./driver.js";
import { createError, toHex } from "../types.js";
import { padToWords, readUInt32LE } from "../bytes.js";
import { CHUNK_SIZE } from "../config.js";
import {
  AIRCR,
  AIRCR_SYSRESETREQ,
  DCRDR,
  DCRSR,
  DCRSR_REGWNR,
  DEMCR,
  DEMCR_VC_CORERESET,
  DHCSR,
  DHCSR_S_REGRDY,
  delay,
  powerUpDebug,
} from "../transport.js";

// NVMC register offsets
const NVMC_READY = 0x400;
const NVMC_CONFIG = 0x504;
const NVMC_ERASEPAGE = 0x508;
const NVMC_ERASEALL = 0x50c;
const NVMC_ERASEUICR = 0x514;

export const NVMC_CONFIG_REN = 0;
export const NVMC_CONFIG_WEN = 1;
export const NVMC_CONFIG_EEN = 2;

// CTRL-AP register map
export const CTRL_AP_RESET = 0x000;
export const CTRL_AP_ERASEALL = 0x004;
export const CTRL_AP_ERASEALLSTATUS = 0x008;
export const CTRL_AP_APPROTECTSTATUS = 0x00c;
export const CTRL_AP_ERASEPROTECTSTATUS = 0x018;
export const CTRL_AP_IDR = 0x0fc;

const ERASEALL_POLL_ATTEMPTS = 150;   // 15 seconds total (150 * 100ms)
const ERASEALL_POLL_INTERVAL_MS = 100;

const REGISTER_SELECT: Record<CpuRegister, number> = {
  R0: 0, R1: 1, R2: 2, R3: 3, R4: 4, R5: 5, R6: 6, R7: 7,
  R8: 8, R9: 9, R10: 10, R11: 11, R12: 12, SP: 13, LR: 14, PC: 15,
  XPSR: 16, MSP: 17, PSP: 18,
};

export interface NvmcLayout {
  base: number;
  // ERASEPAGE register, or a 0xFFFFFFFF write with erase enabled (nRF53/nRF91)
  pageErase: "REGISTER" | "WRITE";
}

export interface RamBlock {
  sections: number;
  sectionSize: number;
}

// RAM[n].POWER / POWERSET / POWERCLR register triples
export interface RamPowerLayout {
  base: number;
  stride: number;
  blocks: readonly RamBlock[];
}

export interface CoreLayout {
  ahbAp: number;
  ctrlAp: number | null;
  nvmc: NvmcLayout;
  resetReasonAddress: number;
}

interface RamSection {
  block: number;
  section: number;
  size: number;
}

/**
 * Behavior shared by the Nordic families: NVMC programming, Cortex-M core
 * control, RAM power and the CTRL-AP erase sequence. Families fill in
 * identification, protection and their register layout.
 */
export abstract class NrfDriver implements DeviceDriver {
  abstract readonly family: DeviceFamily;
  protected readonly transport: ProbeTransport;
  protected readonly logger: Logger;
  private cachedInfo: DeviceInfo | null = null;

  constructor(context: DriverContext) {
    this.transport = context.transport;
    this.logger = context.logger;
  }

  get coprocessor(): Coprocessor {
    return "APPLICATION";
  }

  protected abstract layout(): CoreLayout;
  protected abstract readDeviceInfo(): Promise<DeviceInfo>;
  protected abstract ramPowerLayout(info: DeviceInfo): RamPowerLayout;

  abstract readProtection(): Promise<ProtectionState>;
  abstract setProtection(level: ProtectionState): Promise<void>;
  abstract recover(): Promise<void>;

  async identify(): Promise<DeviceInfo> {
    this.cachedInfo = await this.readDeviceInfo();
    return this.cachedInfo;
  }

  protected async info(): Promise<DeviceInfo> {
    return this.cachedInfo ?? this.identify();
  }

  protected forgetInfo(): void {
    this.cachedInfo = null;
  }

  // ==========================================================================
  // Optional capabilities
  // ==========================================================================

  async isEraseProtectEnabled(): Promise<boolean> {
    return false;
  }

  async enableEraseProtect(): Promise<void> {
    throw createError("INVALID_DEVICE_FOR_OPERATION", `${this.family} devices have no erase protection`);
  }

  async readRegion0(): Promise<Region0Info> {
    return { size: 0, source: "NO_REGION_0" };
  }

  async disableBlockProtect(): Promise<void> {}

  async isBlockProtectEnabled(_address: number, _length: number): Promise<boolean> {
    return false;
  }

  async coprocessorEnabled(coprocessor: Coprocessor): Promise<boolean> {
    this.requireApplication(coprocessor);
    return true;
  }

  async enableCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireApplication(coprocessor);
  }

  async disableCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireApplication(coprocessor);
    throw createError("INVALID_PARAMETER", "The application core cannot be disabled");
  }

  async selectCoprocessor(coprocessor: Coprocessor): Promise<void> {
    this.requireApplication(coprocessor);
  }

  protected requireApplication(coprocessor: Coprocessor): void {
    if (coprocessor !== "APPLICATION") {
      throw createError(
        "INVALID_DEVICE_FOR_OPERATION",
        `${this.family} devices have no ${coprocessor.toLowerCase()} coprocessor`,
      );
    }
  }

  qspiLayout(): QspiLayout | null {
    return null;
  }

  // ==========================================================================
  // NVMC
  // ==========================================================================

  protected async nvmcConfig(mode: number): Promise<void> {
    await this.transport.writeU32(this.layout().nvmc.base + NVMC_CONFIG, mode);
  }

  protected async waitNvmcReady(timeoutMs = 1000): Promise<void> {
    const ready = this.layout().nvmc.base + NVMC_READY;
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if ((await this.transport.readU32(ready)) & 1) {
        return;
      }
      if (Date.now() > deadline) {
        throw createError("NVMC_ERROR", `NVMC not ready after ${timeoutMs}ms`);
      }
      await delay(1);
    }
  }

  // Run `action` with the NVMC in `mode`, always returning it to read-only
  protected async withNvmc(mode: number, action: () => Promise<void>, timeoutMs?: number): Promise<void> {
    await this.nvmcConfig(mode);
    try {
      await action();
      await this.waitNvmcReady(timeoutMs);
    } finally {
      await this.nvmcConfig(NVMC_CONFIG_REN);
    }
  }

  async nvmcWrite(address: number, data: Uint8Array): Promise<void> {
    if (data.length === 0) {
      return;
    }
    const padded = padToWords(address, data);
    const existing = await this.transport.readMemory(padded.address, padded.data.length);

    // Padding bytes are written as 0xFF and leave their cells untouched.
    const start = address - padded.address;
    for (let i = 0; i < data.length; i++) {
      if (existing[start + i] !== 0xff) {
        const offset = (start + i) & ~3;
        throw createError(
          "NVMC_ERROR",
          `Flash word at ${toHex(padded.address + offset)} is not erased (${toHex(readUInt32LE(existing, offset))})`,
        );
      }
    }

    await this.withNvmc(NVMC_CONFIG_WEN, async () => {
      for (let offset = 0; offset < padded.data.length; offset += CHUNK_SIZE) {
        const chunk = padded.data.subarray(offset, Math.min(padded.data.length, offset + CHUNK_SIZE));
        await this.transport.writeMemory(padded.address + offset, chunk);
      }
    });
  }

  // Program one word without the erased-cell check; clearing bits is always allowed
  protected async nvmcWriteWord(address: number, value: number): Promise<void> {
    await this.withNvmc(NVMC_CONFIG_WEN, () => this.transport.writeU32(address, value));
  }

  async erasePage(address: number): Promise<void> {
    const { nvmc } = this.layout();
    this.logger.log("debug", `Erasing page ${toHex(address)}`);
    if (nvmc.pageErase === "REGISTER") {
      await this.withNvmc(NVMC_CONFIG_EEN, () => this.transport.writeU32(nvmc.base + NVMC_ERASEPAGE, address));
    } else {
      await this.withNvmc(NVMC_CONFIG_EEN, () => this.transport.writeU32(address, 0xffffffff));
    }
  }

  async eraseUicr(): Promise<void> {
    const { nvmc } = this.layout();
    const info = await this.info();
    this.logger.log("debug", `Erasing UICR at ${toHex(info.uicrAddress)}`);
    if (nvmc.pageErase === "REGISTER") {
      await this.withNvmc(NVMC_CONFIG_EEN, () => this.transport.writeU32(nvmc.base + NVMC_ERASEUICR, 1));
    } else {
      await this.withNvmc(NVMC_CONFIG_EEN, () => this.transport.writeU32(info.uicrAddress, 0xffffffff));
    }
  }

  async eraseAll(): Promise<void> {
    const { nvmc } = this.layout();
    this.logger.log("info", "Erasing code flash and UICR...");
    await this.withNvmc(
      NVMC_CONFIG_EEN,
      () => this.transport.writeU32(nvmc.base + NVMC_ERASEALL, 1),
      ERASEALL_POLL_ATTEMPTS * ERASEALL_POLL_INTERVAL_MS,
    );
  }

  // ==========================================================================
  // RAM power
  // ==========================================================================

  private async ramSections(): Promise<RamSection[]> {
    const layout = this.ramPowerLayout(await this.info());
    const sections: RamSection[] = [];
    layout.blocks.forEach((block, index) => {
      for (let section = 0; section < block.sections; section++) {
        sections.push({ block: index, section, size: block.sectionSize });
      }
    });
    return sections;
  }

  async ramSectionsCount(): Promise<number> {
    return (await this.ramSections()).length;
  }

  async ramSectionsSize(): Promise<number[]> {
    return (await this.ramSections()).map((section) => section.size);
  }

  async ramSectionsPowerStatus(): Promise<RamPower[]> {
    const layout = this.ramPowerLayout(await this.info());
    const status: RamPower[] = [];
    for (let block = 0; block < layout.blocks.length; block++) {
      const power = await this.transport.readU32(layout.base + block * layout.stride);
      const sections = layout.blocks[block]?.sections ?? 0;
      for (let section = 0; section < sections; section++) {
        status.push(power & (1 << section) ? "ON" : "OFF");
      }
    }
    return status;
  }

  async powerRamAll(): Promise<void> {
    const layout = this.ramPowerLayout(await this.info());
    for (let block = 0; block < layout.blocks.length; block++) {
      const sections = layout.blocks[block]?.sections ?? 0;
      await this.transport.writeU32(layout.base + block * layout.stride + 4, (1 << sections) - 1);
    }
  }

  async unpowerRamSection(index: number): Promise<void> {
    const sections = await this.ramSections();
    const target = sections[index];
    if (!target) {
      throw createError("INVALID_PARAMETER", `RAM section ${index} does not exist (device has ${sections.length})`);
    }
    const layout = this.ramPowerLayout(await this.info());
    await this.transport.writeU32(layout.base + target.block * layout.stride + 8, 1 << target.section);
  }

  // ==========================================================================
  // Core registers and resets
  // ==========================================================================

  private async waitRegisterReady(): Promise<void> {
    for (let attempt = 0; attempt < 20; attempt++) {
      if ((await this.transport.readU32(DHCSR)) & DHCSR_S_REGRDY) {
        return;
      }
      await delay(1);
    }
    throw createError("TRANSPORT_ERROR", "Core register transfer did not complete");
  }

  async cpuReadRegister(register: CpuRegister): Promise<number> {
    await this.transport.writeU32(DCRSR, REGISTER_SELECT[register]);
    await this.waitRegisterReady();
    return (await this.transport.readU32(DCRDR)) >>> 0;
  }

  async cpuWriteRegister(register: CpuRegister, value: number): Promise<void> {
    await this.transport.writeU32(DCRDR, value >>> 0);
    await this.transport.writeU32(DCRSR, REGISTER_SELECT[register] | DCRSR_REGWNR);
    await this.waitRegisterReady();
  }

  // Reset through AIRCR with reset vector catch so the core stays halted
  async sysReset(): Promise<void> {
    const demcr = await this.transport.readU32(DEMCR);
    await this.transport.writeU32(DEMCR, demcr | DEMCR_VC_CORERESET);
    try {
      await this.transport.writeU32(AIRCR, AIRCR_SYSRESETREQ);
    } catch (e) {
      // The reset can drop the acknowledge of the write that caused it
      this.logger.log("debug", `AIRCR write not acknowledged: ${e}`);
    }
    await delay(10);
    await this.enterDebug();
    await this.transport.halt();
    await this.transport.writeU32(DEMCR, demcr & ~DEMCR_VC_CORERESET);
  }

  async debugReset(): Promise<void> {
    const { ctrlAp } = this.layout();
    if (ctrlAp === null) {
      throw createError("INVALID_DEVICE_FOR_OPERATION", `${this.family} devices have no CTRL-AP`);
    }
    await this.transport.writeAccessPort(ctrlAp, CTRL_AP_RESET, 1);
    await delay(10);
    await this.transport.writeAccessPort(ctrlAp, CTRL_AP_RESET, 0);
    await this.enterDebug();
  }

  async pinReset(): Promise<void> {
    await this.transport.pinReset();
  }

  // Debug power and the MEM-AP of the selected core
  async enterDebug(): Promise<void> {
    await powerUpDebug(this.transport);
    this.transport.selectMemoryAccessPort(this.layout().ahbAp);
  }

  // ==========================================================================
  // Recover
  // ==========================================================================

  // CTRL-AP ERASEALL: erases flash and UICR and lifts APPROTECT
  protected async ctrlApEraseAll(ap: number): Promise<void> {
    const idr = await this.transport.readAccessPort(ap, CTRL_AP_IDR);
    this.logger.log("debug", `CTRL-AP ${ap} IDR = ${toHex(idr)}`);

    this.logger.log("info", `Triggering ERASEALL on CTRL-AP ${ap}...`);
    await this.transport.writeAccessPort(ap, CTRL_AP_ERASEALL, 0);
    await this.transport.writeAccessPort(ap, CTRL_AP_ERASEALL, 1);

    let eraseComplete = false;
    for (let i = 0; i < ERASEALL_POLL_ATTEMPTS; i++) {
      const status = await this.transport.readAccessPort(ap, CTRL_AP_ERASEALLSTATUS);
      if (status === 0) {
        eraseComplete = true;
        break;
      }
      if (i % 10 === 0) {
        this.logger.log("info", `Still erasing... (${i / 10}s) - status: ${toHex(status)}`);
      }
      await delay(ERASEALL_POLL_INTERVAL_MS);
    }

    if (!eraseComplete) {
      throw createError("RECOVER_FAILED", "Erase timeout - ERASEALL did not complete in time");
    }

    await this.transport.writeAccessPort(ap, CTRL_AP_RESET, 1);
    await delay(10);
    await this.transport.writeAccessPort(ap, CTRL_AP_RESET, 0);
    await this.transport.writeAccessPort(ap, CTRL_AP_ERASEALL, 0);
  }

  // Bring the freshly erased device into a known state
  protected async finishRecover(): Promise<void> {
    this.forgetInfo();
    await this.enterDebug();
    await this.transport.halt();

    const info = await this.info();
    await this.powerRamAll();
    const zeros = new Uint8Array(CHUNK_SIZE);
    for (let offset = 0; offset < info.ramSize; offset += CHUNK_SIZE) {
      const length = Math.min(CHUNK_SIZE, info.ramSize - offset);
      await this.transport.writeMemory(info.dataRamAddress + offset, zeros.subarray(0, length));
    }

    // RESETREAS bits are write-one-to-clear
    await this.transport.writeU32(this.layout().resetReasonAddress, 0xffffffff);
    this.logger.log("info", "Device has been successfully erased and unlocked.");
  }
}
