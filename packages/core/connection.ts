/// <reference types="w3c-web-usb" />

import type { ADI } from "dapjs";
import type { ComPortInfo, LibraryInfo } from "./types.js";
import type { Logger } from "./logger.js";
import type { ProbeLibrary, ProbeLibraryFactory, ProbeTransport } from "./transport.js";
import { createError, toHex } from "./types.js";
import { alignDown, alignUp, bytesToWords, concatBytes, wordsToBytes, writeUInt32LE } from "./bytes.js";
import { CHUNK_SIZE, clampClockSpeed, MINIMUM_LIBRARY_VERSION, BLOCK_TIMEOUT_MS, TRANSFER_TIMEOUT_MS } from "./config.js";
import {
  AP_CSW,
  AP_DRW,
  AP_TAR,
  DP_ABORT,
  DP_ABORT_CLEAR_ERRORS,
  haltCore,
  isCoreHalted,
  runCore,
  stepCore,
  withTimeout,
} from "./transport.js";

interface KnownProbe {
  name: string;
  vendorId: number;
  productId?: number;
}

export const KNOWN_PROBES: readonly KnownProbe[] = [
  { name: "SEGGER J-Link", vendorId: 0x1366 },
  { name: "Arm DAPLink", vendorId: 0x0d28, productId: 0x0204 },
  { name: "Raspberry Pi Debugprobe", vendorId: 0x2e8a, productId: 0x000c },
  { name: "ESP32-S3 Bridge", vendorId: 0x303a, productId: 0x1002 },
];

export const DAP_MAX_CLOCK_KHZ = 10000; // 10mhz for speed

// 32-bit transfers, auto-increment single
const CSW_WORD_AUTOINC = 0x23000052;

type DapjsModule = typeof import("dapjs");
type WebUSBConstructor = typeof import("usb").WebUSB;

// Dynamically import the USB stack so it only loads when a real probe is used
let dapjsModule: DapjsModule | null = null;
let webUsbClass: WebUSBConstructor | null = null;

async function getDapjs(): Promise<DapjsModule> {
  if (!dapjsModule) {
    const imported = await import("dapjs");
    dapjsModule = imported.default;
  }
  return dapjsModule;
}

async function getNodeWebUSB(): Promise<WebUSBConstructor> {
  if (!webUsbClass) {
    const usbModule = await import("usb");
    webUsbClass = usbModule.WebUSB;
  }
  return webUsbClass;
}

// J-Link serials are decimal; CMSIS-DAP serials end in a hex unique id
export function parseProbeSerial(serial: string | null | undefined): number | null {
  if (!serial) {
    return null;
  }
  const trimmed = serial.trim();
  if (/^\d+$/.test(trimmed)) {
    const value = Number.parseInt(trimmed, 10);
    return Number.isSafeInteger(value) ? value : null;
  }
  const hex = /([0-9a-fA-F]{1,8})$/.exec(trimmed);
  return hex ? Number.parseInt(hex[1] ?? "", 16) : null;
}

export function isKnownProbe(device: Pick<USBDevice, "vendorId" | "productId">): boolean {
  return KNOWN_PROBES.some(
    (probe) =>
      probe.vendorId === device.vendorId &&
      (probe.productId === undefined || probe.productId === device.productId),
  );
}

export async function findDevices(): Promise<USBDevice[]> {
  const WebUSB = await getNodeWebUSB();
  const webusb = new WebUSB({ allowAllDevices: true });
  const devices = await webusb.getDevices();
  return devices.filter(isKnownProbe);
}

type SerialPortInfo = Awaited<ReturnType<typeof import("serialport").SerialPort.list>>[number];

export function matchComPorts(ports: readonly SerialPortInfo[], serialNumber: number): ComPortInfo[] {
  return ports
    .filter((port) => parseProbeSerial(port.serialNumber) === serialNumber)
    .map((port) => port.path)
    .sort()
    .map((path, vcom) => ({ path, vcom, serialNumber }));
}

export async function listComPorts(serialNumber: number): Promise<ComPortInfo[]> {
  try {
    const { SerialPort } = await import("serialport");
    const ports = await SerialPort.list();
    return matchComPorts(ports, serialNumber);
  } catch (e) {
    throw createError("SERIAL_PORT_ERROR", `Could not list serial ports: ${e}`, { cause: e });
  }
}

// ============================================================================
// CMSIS-DAP transport
// ============================================================================

export class DapProbeTransport implements ProbeTransport {
  readonly maxSpeedKhz = DAP_MAX_CLOCK_KHZ;
  private memoryAp = 0;

  private constructor(
    private readonly dapjs: DapjsModule,
    private readonly device: USBDevice,
    private dap: ADI,
    readonly serialNumber: number,
    public speedKhz: number,
  ) {}

  static async connect(device: USBDevice, serialNumber: number, clockKhz: number): Promise<DapProbeTransport> {
    const dapjs = await getDapjs();
    const speedKhz = clampClockSpeed(clockKhz, DAP_MAX_CLOCK_KHZ);
    const dap = await DapProbeTransport.attach(dapjs, device, speedKhz);
    return new DapProbeTransport(dapjs, device, dap, serialNumber, speedKhz);
  }

  private static async attach(dapjs: DapjsModule, device: USBDevice, speedKhz: number): Promise<ADI> {
    const transport = new dapjs.WebUSB(device);
    const dap = new dapjs.ADI(transport, 0, speedKhz * 1000);

    await withTimeout(dap.connect(), TRANSFER_TIMEOUT_MS, "Connect");

    // Clear any sticky error flags left by a previous session
    await withTimeout(dap.writeDP(DP_ABORT, DP_ABORT_CLEAR_ERRORS), TRANSFER_TIMEOUT_MS, "Clear DP errors");
    return dap;
  }

  async setSpeed(khz: number): Promise<number> {
    const clamped = clampClockSpeed(khz, this.maxSpeedKhz);
    if (clamped !== this.speedKhz) {
      // dapjs fixes the SWD clock when the ADI is built
      await this.dap.disconnect();
      this.dap = await DapProbeTransport.attach(this.dapjs, this.device, clamped);
      this.speedKhz = clamped;
    }
    return this.speedKhz;
  }

  readDebugPort(register: number): Promise<number> {
    return withTimeout(this.dap.readDP(register), TRANSFER_TIMEOUT_MS, `Read DP ${toHex(register)}`);
  }

  writeDebugPort(register: number, value: number): Promise<void> {
    return withTimeout(this.dap.writeDP(register, value), TRANSFER_TIMEOUT_MS, `Write DP ${toHex(register)}`);
  }

  // dapjs encodes APSEL in bits 31:24 of the register argument
  readAccessPort(ap: number, register: number): Promise<number> {
    return withTimeout(
      this.dap.readAP(apRegister(ap, register)),
      TRANSFER_TIMEOUT_MS,
      `Read AP${ap} ${toHex(register)}`,
    );
  }

  writeAccessPort(ap: number, register: number, value: number): Promise<void> {
    return withTimeout(
      this.dap.writeAP(apRegister(ap, register), value),
      TRANSFER_TIMEOUT_MS,
      `Write AP${ap} ${toHex(register)}`,
    );
  }

  selectMemoryAccessPort(ap: number): void {
    this.memoryAp = ap;
  }

  async readU32(address: number): Promise<number> {
    if (this.memoryAp === 0) {
      return withTimeout(this.dap.readMem32(address), TRANSFER_TIMEOUT_MS, `Read ${toHex(address)}`);
    }
    await this.writeAccessPort(this.memoryAp, AP_CSW, CSW_WORD_AUTOINC);
    await this.writeAccessPort(this.memoryAp, AP_TAR, address);
    return this.readAccessPort(this.memoryAp, AP_DRW);
  }

  async writeU32(address: number, value: number): Promise<void> {
    if (this.memoryAp === 0) {
      await withTimeout(this.dap.writeMem32(address, value), TRANSFER_TIMEOUT_MS, `Write ${toHex(address)}`);
      return;
    }
    await this.writeAccessPort(this.memoryAp, AP_CSW, CSW_WORD_AUTOINC);
    await this.writeAccessPort(this.memoryAp, AP_TAR, address);
    await this.writeAccessPort(this.memoryAp, AP_DRW, value);
  }

  async readMemory(address: number, length: number): Promise<Uint8Array> {
    const start = alignDown(address, 4);
    const end = alignUp(address + length, 4);
    const chunks: Uint8Array[] = [];

    for (let offset = start; offset < end; offset += CHUNK_SIZE) {
      const words = Math.min(CHUNK_SIZE, end - offset) / 4;
      chunks.push(wordsToBytes(await this.readWords(offset, words)));
    }

    return concatBytes(chunks).slice(address - start, address - start + length);
  }

  async writeMemory(address: number, data: Uint8Array): Promise<void> {
    const start = alignDown(address, 4);
    const end = alignUp(address + data.length, 4);
    const buffer = new Uint8Array(end - start);

    // Merge partial head and tail words with what is already there
    if (start !== address) {
      writeUInt32LE(buffer, await this.readU32(start), 0);
    }
    const tail = end - 4;
    if (end !== address + data.length && (tail !== start || start === address)) {
      writeUInt32LE(buffer, await this.readU32(tail), tail - start);
    }
    buffer.set(data, address - start);

    for (let offset = 0; offset < buffer.length; offset += CHUNK_SIZE) {
      const slice = buffer.subarray(offset, Math.min(buffer.length, offset + CHUNK_SIZE));
      await this.writeWords(start + offset, bytesToWords(slice));
    }
  }

  private async readWords(address: number, count: number): Promise<Uint32Array> {
    if (this.memoryAp === 0) {
      return withTimeout(this.dap.readBlock(address, count), TRANSFER_TIMEOUT_MS, "Read Block");
    }
    const words = new Uint32Array(count);
    for (let i = 0; i < count; i++) {
      words[i] = await this.readU32(address + i * 4);
    }
    return words;
  }

  private async writeWords(address: number, words: Uint32Array): Promise<void> {
    if (this.memoryAp === 0) {
      await withTimeout(this.dap.writeBlock(address, words), BLOCK_TIMEOUT_MS, "Write Block");
      return;
    }
    for (let i = 0; i < words.length; i++) {
      await this.writeU32(address + i * 4, words[i] ?? 0);
    }
  }

  halt(): Promise<void> {
    return haltCore(this);
  }

  run(): Promise<void> {
    return runCore(this);
  }

  step(): Promise<void> {
    return stepCore(this);
  }

  isHalted(): Promise<boolean> {
    return isCoreHalted(this);
  }

  async pinReset(): Promise<void> {
    await withTimeout(this.dap.reset(), TRANSFER_TIMEOUT_MS, "Pin reset");
  }

  async resetProbe(): Promise<void> {
    await this.dap.disconnect();
    await this.device.reset();
    this.dap = await DapProbeTransport.attach(this.dapjs, this.device, this.speedKhz);
  }

  replaceFirmware(): Promise<void> {
    return Promise.reject(
      createError("NOT_IMPLEMENTED", "CMSIS-DAP probes are updated through their own bootloader"),
    );
  }

  async firmwareString(): Promise<string> {
    const name = this.device.productName ?? "CMSIS-DAP";
    const { deviceVersionMajor, deviceVersionMinor, deviceVersionSubminor } = this.device;
    return `${name} V${deviceVersionMajor}.${deviceVersionMinor}.${deviceVersionSubminor}`;
  }

  async close(): Promise<void> {
    await this.dap.disconnect();
  }
}

function apRegister(ap: number, register: number): number {
  return (((ap & 0xff) << 24) | (register & 0xfc)) >>> 0;
}

// ============================================================================
// Built-in probe library
// ============================================================================

export class DapProbeLibrary implements ProbeLibrary {
  readonly info: LibraryInfo = {
    version: { ...MINIMUM_LIBRARY_VERSION, revision: "" },
    path: "builtin:cmsis-dap",
  };

  constructor(private readonly logger: Logger) {}

  async enumerate(): Promise<number[]> {
    const serials = new Set<number>();
    for (const device of await findDevices()) {
      const serial = parseProbeSerial(device.serialNumber);
      if (serial === null) {
        this.logger.log("debug", `Skipping probe without serial number (${device.productName ?? "unnamed"})`);
        continue;
      }
      serials.add(serial);
    }
    return [...serials].sort((a, b) => a - b);
  }

  async connect(serialNumber: number, clockKhz: number): Promise<ProbeTransport> {
    const devices = await findDevices();
    const device = devices.find((d) => parseProbeSerial(d.serialNumber) === serialNumber);
    if (!device) {
      throw createError("PROBE_NOT_FOUND", `Probe ${serialNumber} not found. Please connect the probe.`);
    }
    this.logger.log("info", `Connecting to ${device.productName ?? "probe"} ${serialNumber} at ${clockKhz} kHz`);
    return DapProbeTransport.connect(device, serialNumber, clockKhz);
  }

  enumerateComPorts(serialNumber: number): Promise<ComPortInfo[]> {
    return listComPorts(serialNumber);
  }

  async close(): Promise<void> {}
}

export const createProbeLibrary: ProbeLibraryFactory = ({ logger }) => new DapProbeLibrary(logger);
