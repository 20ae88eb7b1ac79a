import type {
  ComPortInfo,
  CoreError,
  Coprocessor,
  CpuRegister,
  DeviceFamily,
  DeviceInfo,
  EraseMode,
  ProbeInfo,
  ProgramOptions,
  ProtectionState,
  RamPower,
  RamSectionsPower,
  ReadOptions,
  Region0Info,
  ResetKind,
  Result,
  RttChannel,
  RttDirection,
  SegmentSink,
  SegmentSource,
  VerifyMode,
} from "./types.js";
import type { Logger } from "./logger.js";
import type { ProbeTransport } from "./transport.js";
import type { DeviceDriver } from "./drivers/driver.js";
import type { TargetContext } from "./operations/context.js";
import type { QspiEraseLength, QspiParams, QspiParamsInput } from "./qspi.js";
import { DEFAULT_PROGRAM_OPTIONS, createError, err, ok, toCoreError, toHex, withContext } from "./types.js";
import { readUInt32LE, writeUInt32LE } from "./bytes.js";
import { LOW_VOLTAGE_THRESHOLD } from "./config.js";
import { MemoryMap } from "./memory-map.js";
import { powerDownDebug, powerUpDebug } from "./transport.js";
import { createDriver, detectFamily } from "./drivers/identify.js";
import { UnknownDriver } from "./drivers/unknown.js";
import { QspiEngine, parseQspiParams } from "./qspi.js";
import { readQspiIni } from "./qspi-ini.js";
import { RttEngine } from "./rtt.js";
import { readRange, requireQspi, writeRange } from "./operations/context.js";
import { program } from "./operations/program.js";
import { verify } from "./operations/verify.js";
import { readToSink } from "./operations/read.js";
import { erase } from "./operations/erase.js";
import { recover } from "./operations/recover.js";
import { resetDevice } from "./operations/reset.js";

export type SessionState = "ATTACHED_HALTED" | "ATTACHED_RUNNING" | "DETACHED" | "CLOSED";

export interface SessionOptions {
  transport: ProbeTransport;
  logger: Logger;
  // Family the caller expects; UNKNOWN accepts whatever is detected
  family: DeviceFamily;
  coprocessor: Coprocessor;
  comPorts: () => Promise<ComPortInfo[]>;
  onClose?: () => void;
}

interface Target {
  info: DeviceInfo;
  memoryMap: MemoryMap;
}

/**
 * One attached probe. Every device-touching call checks, in order, that the
 * session is attached, that the device is not readback protected and that
 * the core is halted, then runs against a fresh target context.
 */
export class Session {
  private currentState: SessionState = "DETACHED";
  private driver: DeviceDriver = new UnknownDriver();
  private protection: ProtectionState | null = null;
  private target: Target | null = null;
  private qspi: QspiEngine | null = null;
  private coprocessor: Coprocessor;
  private readonly rtt: RttEngine;
  private readonly transport: ProbeTransport;
  private readonly logger: Logger;
  private readonly expectedFamily: DeviceFamily;
  private readonly comPorts: () => Promise<ComPortInfo[]>;
  private readonly onClose: (() => void) | undefined;

  private constructor(options: SessionOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.expectedFamily = options.family;
    this.coprocessor = options.coprocessor;
    this.comPorts = options.comPorts;
    this.onClose = options.onClose;
    this.rtt = new RttEngine(this.transport, () => this.rttSearchRanges(), this.logger);
  }

  // Attach to the device behind an already connected transport
  static async open(options: SessionOptions): Promise<Session> {
    const session = new Session(options);
    try {
      await session.attach();
    } catch (e) {
      try {
        await options.transport.close();
      } catch (closeError) {
        options.logger.log("warn", `Releasing probe after failed attach: ${toCoreError(closeError).message}`);
      }
      throw e;
    }
    return session;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get serialNumber(): number {
    return this.transport.serialNumber;
  }

  // ==========================================================================
  // Plumbing
  // ==========================================================================

  private async run<T>(operation: string, action: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await action());
    } catch (e) {
      const error = toCoreError(e);
      this.logger.log("error", `${operation} failed: ${error.message}`);
      return err(error);
    }
  }

  private requireOpen(): void {
    if (this.currentState === "CLOSED") {
      throw createError("INVALID_OPERATION", "Session is closed");
    }
  }

  private requireAttached(): void {
    this.requireOpen();
    if (this.currentState === "DETACHED") {
      throw createError("INVALID_OPERATION", "Not connected to the device; call connectToDevice() first");
    }
  }

  private requireKnownFamily(): DeviceDriver {
    this.requireAttached();
    if (this.driver.family === "UNKNOWN") {
      throw createError("UNKNOWN_DEVICE", "Operation requires a known device family");
    }
    return this.driver;
  }

  private async cachedProtection(): Promise<ProtectionState> {
    if (this.protection === null) {
      this.protection = await this.driver.readProtection();
    }
    return this.protection;
  }

  /**
   * Gate for memory-touching operations. Nothing about the session changes
   * when the device turns out to be protected.
   */
  private async unlocked(options: { halt: boolean } = { halt: true }): Promise<TargetContext> {
    const driver = this.requireKnownFamily();
    const protection = await this.cachedProtection();
    if (protection !== "NONE") {
      throw createError("PROTECTION_DENIED", `Device is readback protected (${protection}); recover it first`);
    }

    if (options.halt && this.currentState === "ATTACHED_RUNNING") {
      await this.transport.halt();
      this.currentState = "ATTACHED_HALTED";
    }

    if (!this.target) {
      const info = await driver.identify();
      this.target = { info, memoryMap: MemoryMap.fromDeviceInfo(info) };
    }

    return {
      transport: this.transport,
      driver,
      info: this.target.info,
      memoryMap: this.target.memoryMap,
      qspi: this.qspi,
      logger: this.logger,
      reset: (kind) => this.resetTarget(kind),
    };
  }

  private async attach(): Promise<void> {
    const t = this.transport;
    await powerUpDebug(t);

    if (t.targetVoltage) {
      const voltage = await t.targetVoltage();
      if (voltage < LOW_VOLTAGE_THRESHOLD) {
        throw createError("LOW_VOLTAGE", `Target voltage ${voltage.toFixed(2)} V is below ${LOW_VOLTAGE_THRESHOLD} V`);
      }
    }

    const family = await detectFamily(t);
    if (this.expectedFamily !== "UNKNOWN" && family !== this.expectedFamily) {
      throw createError(
        "WRONG_FAMILY_FOR_DEVICE",
        `Expected an ${this.expectedFamily} device, found ${family}`,
      );
    }
    if (this.driver.family !== family) {
      this.driver = createDriver(family, { transport: t, logger: this.logger });
    }
    this.protection = null;
    this.target = null;

    if (family === "UNKNOWN") {
      this.logger.log("warn", "Device family not recognized; only debug port access is available");
      this.currentState = "ATTACHED_RUNNING";
      return;
    }

    await this.driver.enterDebug();
    if (this.coprocessor !== "APPLICATION") {
      await this.driver.selectCoprocessor(this.coprocessor);
    }

    const protection = await this.cachedProtection();
    if (protection === "NONE") {
      await t.halt();
    } else {
      this.logger.log("warn", `Device is readback protected (${protection})`);
    }
    this.currentState = "ATTACHED_HALTED";
    this.logger.log("info", `Connected to ${family} device through probe ${t.serialNumber}`);
  }

  private async resetTarget(kind: ResetKind): Promise<void> {
    if (kind === "NONE") {
      return;
    }
    const next = await resetDevice(this.driver, kind);
    this.qspi?.invalidate();
    this.protection = null;
    this.currentState = next === "HALTED" ? "ATTACHED_HALTED" : next === "RUNNING" ? "ATTACHED_RUNNING" : "DETACHED";
    this.logger.log("info", `${kind} reset issued`);
  }

  private async rttSearchRanges(): Promise<Array<{ address: number; size: number }>> {
    const ctx = await this.unlocked({ halt: false });
    return [{ address: ctx.info.dataRamAddress, size: ctx.info.ramSize }];
  }

  // ==========================================================================
  // Lifecycle and probe
  // ==========================================================================

  /**
   * Release RTT, QSPI, debug power and the probe, in that order. Every step
   * runs even when an earlier one fails; the first failure is returned.
   */
  async close(): Promise<Result<void>> {
    if (this.currentState === "CLOSED") {
      return ok(undefined);
    }
    const failures: CoreError[] = [];
    const attempt = async (step: string, action: () => Promise<void>): Promise<void> => {
      try {
        await action();
      } catch (e) {
        const error = withContext(e, step);
        failures.push(error);
        this.logger.log("warn", error.message);
      }
    };

    await attempt("Stopping RTT", () => this.rtt.stop());
    const qspi = this.qspi;
    this.qspi = null;
    if (qspi) {
      await attempt("Releasing QSPI", () => qspi.uninit());
    }
    if (this.currentState !== "DETACHED") {
      await attempt("Leaving debug mode", () => powerDownDebug(this.transport));
    }
    await attempt("Releasing probe", () => this.transport.close());

    this.currentState = "CLOSED";
    this.onClose?.();
    const first = failures[0];
    return first ? err(first) : ok(undefined);
  }

  probeInfo(): Promise<Result<ProbeInfo>> {
    return this.run("probeInfo", async () => {
      this.requireOpen();
      return {
        serialNumber: this.transport.serialNumber,
        clockSpeedKhz: this.transport.speedKhz,
        firmwareString: await this.transport.firmwareString(),
        comPorts: await this.comPorts(),
      };
    });
  }

  resetProbe(): Promise<Result<void>> {
    return this.run("resetProbe", async () => {
      this.requireOpen();
      await this.transport.resetProbe();
      this.qspi?.invalidate();
      this.currentState = "DETACHED";
    });
  }

  replaceProbeFirmware(): Promise<Result<void>> {
    return this.run("replaceProbeFirmware", async () => {
      this.requireOpen();
      await this.transport.replaceFirmware();
      this.currentState = "DETACHED";
    });
  }

  connectToDevice(): Promise<Result<void>> {
    return this.run("connectToDevice", async () => {
      this.requireOpen();
      if (this.currentState !== "DETACHED") {
        throw createError("INVALID_OPERATION", "Already connected to the device");
      }
      await this.attach();
    });
  }

  disconnectFromDevice(): Promise<Result<void>> {
    return this.run("disconnectFromDevice", async () => {
      this.requireAttached();
      await powerDownDebug(this.transport);
      this.currentState = "DETACHED";
    });
  }

  async isConnectedToDevice(): Promise<Result<boolean>> {
    return ok(this.currentState === "ATTACHED_HALTED" || this.currentState === "ATTACHED_RUNNING");
  }

  readDeviceFamily(): Promise<Result<DeviceFamily>> {
    return this.run("readDeviceFamily", async () => {
      this.requireAttached();
      return this.driver.family;
    });
  }

  deviceInfo(): Promise<Result<DeviceInfo>> {
    return this.run("deviceInfo", async () => (await this.unlocked({ halt: false })).info);
  }

  // ==========================================================================
  // Executive
  // ==========================================================================

  program(image: SegmentSource, options: Partial<ProgramOptions> = {}): Promise<Result<void>> {
    return this.run("program", async () => {
      const ctx = await this.unlocked();
      await program(ctx, image, { ...DEFAULT_PROGRAM_OPTIONS, ...options });
    });
  }

  readToFile(sink: SegmentSink, options: ReadOptions): Promise<Result<void>> {
    return this.run("readToFile", async () => readToSink(await this.unlocked(), sink, options));
  }

  verify(image: SegmentSource, mode: VerifyMode): Promise<Result<void>> {
    return this.run("verify", async () => verify(await this.unlocked(), image, mode));
  }

  erase(mode: EraseMode, start = 0, end?: number): Promise<Result<void>> {
    return this.run("erase", async () => erase(await this.unlocked(), mode, start, end));
  }

  recover(): Promise<Result<void>> {
    return this.run("recover", async () => {
      const driver = this.requireKnownFamily();
      this.protection = await recover(driver, this.logger);
      this.target = null;
      this.qspi?.invalidate();
      this.currentState = "ATTACHED_HALTED";
    });
  }

  reset(kind: ResetKind): Promise<Result<void>> {
    return this.run("reset", async () => {
      this.requireKnownFamily();
      if (kind === "SYSTEM") {
        await this.unlocked({ halt: false });
      }
      this.logger.progress("reset");
      await this.resetTarget(kind);
    });
  }

  // ==========================================================================
  // Memory
  // ==========================================================================

  read(address: number, length: number): Promise<Result<Uint8Array>> {
    return this.run("read", async () => readRange(await this.unlocked(), address, length));
  }

  // Flash writes go through the NVMC unless `nvmc` is false
  write(address: number, data: Uint8Array, options: { nvmc?: boolean } = {}): Promise<Result<void>> {
    return this.run("write", async () =>
      writeRange(await this.unlocked(), address, data, { nvmc: options.nvmc ?? true }),
    );
  }

  readU32(address: number): Promise<Result<number>> {
    return this.run("readU32", async () => {
      if (address % 4 !== 0) {
        throw createError("INVALID_PARAMETER", `Address ${toHex(address)} is not word aligned`);
      }
      return readUInt32LE(await readRange(await this.unlocked(), address, 4), 0);
    });
  }

  writeU32(address: number, value: number, options: { nvmc?: boolean } = {}): Promise<Result<void>> {
    return this.run("writeU32", async () => {
      if (address % 4 !== 0) {
        throw createError("INVALID_PARAMETER", `Address ${toHex(address)} is not word aligned`);
      }
      const bytes = new Uint8Array(4);
      writeUInt32LE(bytes, value >>> 0, 0);
      await writeRange(await this.unlocked(), address, bytes, { nvmc: options.nvmc ?? true });
    });
  }

  // ==========================================================================
  // Core control
  // ==========================================================================

  isHalted(): Promise<Result<boolean>> {
    return this.run("isHalted", async () => {
      await this.unlocked({ halt: false });
      const halted = await this.transport.isHalted();
      this.currentState = halted ? "ATTACHED_HALTED" : "ATTACHED_RUNNING";
      return halted;
    });
  }

  halt(): Promise<Result<void>> {
    return this.run("halt", async () => {
      await this.unlocked({ halt: false });
      await this.transport.halt();
      this.currentState = "ATTACHED_HALTED";
    });
  }

  go(): Promise<Result<void>> {
    return this.run("go", async () => {
      await this.unlocked({ halt: false });
      await this.transport.run();
      this.currentState = "ATTACHED_RUNNING";
    });
  }

  // Start execution at `pc` with the stack pointer set to `sp`
  runFrom(pc: number, sp: number): Promise<Result<void>> {
    return this.run("run", async () => {
      const { driver } = await this.unlocked();
      await driver.cpuWriteRegister("SP", sp);
      await driver.cpuWriteRegister("PC", pc);
      await this.transport.run();
      this.currentState = "ATTACHED_RUNNING";
    });
  }

  step(): Promise<Result<void>> {
    return this.run("step", async () => {
      await this.unlocked();
      await this.transport.step();
    });
  }

  readCpuRegister(register: CpuRegister): Promise<Result<number>> {
    return this.run("readCpuRegister", async () => (await this.unlocked()).driver.cpuReadRegister(register));
  }

  writeCpuRegister(register: CpuRegister, value: number): Promise<Result<void>> {
    return this.run("writeCpuRegister", async () =>
      (await this.unlocked()).driver.cpuWriteRegister(register, value),
    );
  }

  // ==========================================================================
  // Debug and access ports (available under protection and on unknown parts)
  // ==========================================================================

  readDebugPortRegister(register: number): Promise<Result<number>> {
    return this.run("readDebugPortRegister", async () => {
      this.requireAttached();
      return (await this.transport.readDebugPort(register)) >>> 0;
    });
  }

  writeDebugPortRegister(register: number, value: number): Promise<Result<void>> {
    return this.run("writeDebugPortRegister", async () => {
      this.requireAttached();
      await this.transport.writeDebugPort(register, value);
    });
  }

  readAccessPortRegister(ap: number, register: number): Promise<Result<number>> {
    return this.run("readAccessPortRegister", async () => {
      this.requireAttached();
      return (await this.transport.readAccessPort(ap, register)) >>> 0;
    });
  }

  writeAccessPortRegister(ap: number, register: number, value: number): Promise<Result<void>> {
    return this.run("writeAccessPortRegister", async () => {
      this.requireAttached();
      await this.transport.writeAccessPort(ap, register, value);
    });
  }

  // ==========================================================================
  // Protection
  // ==========================================================================

  readProtection(): Promise<Result<ProtectionState>> {
    return this.run("readProtection", async () => {
      const driver = this.requireKnownFamily();
      this.protection = await driver.readProtection();
      return this.protection;
    });
  }

  // The device resets to latch the new level and is left running
  readbackProtect(level: ProtectionState): Promise<Result<void>> {
    return this.run("readbackProtect", async () => {
      const { driver } = await this.unlocked();
      await driver.setProtection(level);
      this.protection = null;
      this.qspi?.invalidate();
      this.currentState = "ATTACHED_RUNNING";
    });
  }

  isEraseProtectEnabled(): Promise<Result<boolean>> {
    return this.run("isEraseProtectEnabled", async () => this.requireKnownFamily().isEraseProtectEnabled());
  }

  enableEraseProtect(): Promise<Result<void>> {
    return this.run("enableEraseProtect", async () => {
      const { driver } = await this.unlocked();
      await driver.enableEraseProtect();
      this.protection = null;
      this.qspi?.invalidate();
      this.currentState = "ATTACHED_RUNNING";
    });
  }

  readRegion0SizeAndSource(): Promise<Result<Region0Info>> {
    return this.run("readRegion0SizeAndSource", async () => (await this.unlocked()).driver.readRegion0());
  }

  disableBlockProtection(): Promise<Result<void>> {
    return this.run("disableBlockProtection", async () => (await this.unlocked()).driver.disableBlockProtect());
  }

  // ==========================================================================
  // RAM power
  // ==========================================================================

  ramSectionsCount(): Promise<Result<number>> {
    return this.run("ramSectionsCount", async () => (await this.unlocked()).driver.ramSectionsCount());
  }

  ramSectionsSize(): Promise<Result<number[]>> {
    return this.run("ramSectionsSize", async () => (await this.unlocked()).driver.ramSectionsSize());
  }

  ramSectionsPowerStatus(): Promise<Result<RamPower[]>> {
    return this.run("ramSectionsPowerStatus", async () => (await this.unlocked()).driver.ramSectionsPowerStatus());
  }

  powerRamAll(): Promise<Result<void>> {
    return this.run("powerRamAll", async () => (await this.unlocked()).driver.powerRamAll());
  }

  unpowerRamSection(index: number): Promise<Result<void>> {
    return this.run("unpowerRamSection", async () => (await this.unlocked()).driver.unpowerRamSection(index));
  }

  // Legacy aggregate of the section queries
  isRamPowered(): Promise<Result<RamSectionsPower>> {
    return this.run("isRamPowered", async () => {
      const { driver } = await this.unlocked();
      return { sizes: await driver.ramSectionsSize(), power: await driver.ramSectionsPowerStatus() };
    });
  }

  // ==========================================================================
  // Coprocessors
  // ==========================================================================

  isCoprocessorEnabled(coprocessor: Coprocessor): Promise<Result<boolean>> {
    return this.run("isCoprocessorEnabled", async () =>
      (await this.unlocked({ halt: false })).driver.coprocessorEnabled(coprocessor),
    );
  }

  enableCoprocessor(coprocessor: Coprocessor): Promise<Result<void>> {
    return this.run("enableCoprocessor", async () => (await this.unlocked()).driver.enableCoprocessor(coprocessor));
  }

  disableCoprocessor(coprocessor: Coprocessor): Promise<Result<void>> {
    return this.run("disableCoprocessor", async () => {
      const { driver } = await this.unlocked();
      await driver.disableCoprocessor(coprocessor);
      if (driver.coprocessor !== this.coprocessor) {
        this.coprocessor = driver.coprocessor;
        this.target = null;
        this.protection = null;
      }
    });
  }

  selectCoprocessor(coprocessor: Coprocessor): Promise<Result<void>> {
    return this.run("selectCoprocessor", async () => {
      const driver = this.requireKnownFamily();
      if (this.qspi && coprocessor !== this.coprocessor) {
        throw createError("INVALID_OPERATION", "Uninitialize QSPI before switching cores");
      }
      await driver.selectCoprocessor(coprocessor);
      this.coprocessor = coprocessor;
      this.target = null;
      this.protection = null;
    });
  }

  // ==========================================================================
  // QSPI
  // ==========================================================================

  private async initQspi(params: QspiParams, retainRam: boolean): Promise<void> {
    const { driver, info } = await this.unlocked();
    if (this.qspi) {
      throw createError("INVALID_OPERATION", "QSPI is already initialized");
    }
    const layout = driver.qspiLayout();
    if (!layout) {
      throw createError("INVALID_DEVICE_FOR_OPERATION", `${info.name} has no QSPI peripheral`);
    }
    this.qspi = await QspiEngine.init(this.transport, layout, params, retainRam, this.logger);
  }

  qspiInit(params: QspiParamsInput = {}, retainRam = false): Promise<Result<void>> {
    return this.run("qspiInit", async () => this.initQspi(parseQspiParams(params), retainRam));
  }

  qspiInitFromIni(path: string, retainRam = false): Promise<Result<void>> {
    return this.run("qspiInitFromIni", async () => this.initQspi(await readQspiIni(path), retainRam));
  }

  qspiUninit(): Promise<Result<void>> {
    return this.run("qspiUninit", async () => {
      const qspi = requireQspi(await this.unlocked());
      this.qspi = null;
      await qspi.uninit();
    });
  }

  async isQspiInitialized(): Promise<Result<boolean>> {
    return ok(this.qspi !== null);
  }

  qspiRead(address: number, length: number): Promise<Result<Uint8Array>> {
    return this.run("qspiRead", async () => requireQspi(await this.unlocked()).read(address, length));
  }

  qspiWrite(address: number, data: Uint8Array): Promise<Result<void>> {
    return this.run("qspiWrite", async () => requireQspi(await this.unlocked()).write(address, data));
  }

  qspiErase(address: number, length: QspiEraseLength): Promise<Result<void>> {
    return this.run("qspiErase", async () => requireQspi(await this.unlocked()).erase(address, length));
  }

  qspiCustom(opcode: number, length: number, dataIn?: Uint8Array): Promise<Result<Uint8Array>> {
    return this.run("qspiCustom", async () => requireQspi(await this.unlocked()).custom(opcode, length, dataIn));
  }

  qspiSetRxDelay(rxDelay: number): Promise<Result<void>> {
    return this.run("qspiSetRxDelay", async () => requireQspi(await this.unlocked()).setRxDelay(rxDelay));
  }

  // ==========================================================================
  // RTT (the target keeps running)
  // ==========================================================================

  rttSetControlBlockAddress(address: number): Promise<Result<void>> {
    return this.run("rttSetControlBlockAddress", async () => {
      this.requireAttached();
      this.rtt.setControlBlockAddress(address);
    });
  }

  rttStart(): Promise<Result<void>> {
    return this.run("rttStart", async () => {
      await this.unlocked({ halt: false });
      this.rtt.start();
    });
  }

  rttIsControlBlockFound(): Promise<Result<boolean>> {
    return this.run("rttIsControlBlockFound", async () => {
      await this.unlocked({ halt: false });
      return this.rtt.isControlBlockFound();
    });
  }

  async isRttStarted(): Promise<Result<boolean>> {
    return ok(this.rtt.isStarted);
  }

  rttStop(): Promise<Result<void>> {
    return this.run("rttStop", async () => {
      this.requireOpen();
      await this.rtt.stop();
    });
  }

  rttRead(upIndex: number, length: number): Promise<Result<Uint8Array>> {
    return this.run("rttRead", async () => {
      await this.unlocked({ halt: false });
      return this.rtt.read(upIndex, length);
    });
  }

  rttWrite(downIndex: number, data: Uint8Array): Promise<Result<number>> {
    return this.run("rttWrite", async () => {
      await this.unlocked({ halt: false });
      return this.rtt.write(downIndex, data);
    });
  }

  rttChannelCount(): Promise<Result<{ down: number; up: number }>> {
    return this.run("rttChannelCount", async () => this.rtt.channelCount());
  }

  rttChannelInfo(index: number, direction: RttDirection): Promise<Result<RttChannel>> {
    return this.run("rttChannelInfo", async () => this.rtt.channelInfo(index, direction));
  }
}
