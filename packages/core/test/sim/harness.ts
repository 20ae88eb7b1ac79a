import type { ComPortInfo, Coprocessor, CoreError, DeviceFamily, LibraryInfo, LibraryVersion, Result } from "../../types.js";
import type { Logger, LogSeverity } from "../../logger.js";
import type { ProbeLibrary, ProbeLibraryFactory, ProbeTransport } from "../../transport.js";
import type { SimProfile } from "./target.js";
import { createError, toCoreError } from "../../types.js";
import { Session } from "../../session.js";
import { SimTarget } from "./target.js";
import { PROBE_SERIAL } from "./profiles.js";

export interface RecordedLine {
  severity: LogSeverity;
  message: string;
}

export interface RecordingLogger extends Logger {
  lines: RecordedLine[];
  phases: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: RecordedLine[] = [];
  const phases: string[] = [];
  return {
    lines,
    phases,
    log(severity, message) {
      lines.push({ severity, message });
    },
    progress(phase) {
      phases.push(phase);
    },
  };
}

export class SimProbeLibrary implements ProbeLibrary {
  readonly info: LibraryInfo;
  closed = false;

  constructor(
    readonly probes: Map<number, SimTarget>,
    version: LibraryVersion = { major: 6, minor: 88, revision: "a" },
  ) {
    this.info = { version, path: "sim:probe" };
  }

  async enumerate(): Promise<number[]> {
    return [...this.probes.keys()].sort((a, b) => a - b);
  }

  async connect(serialNumber: number, clockKhz: number): Promise<ProbeTransport> {
    const target = this.probes.get(serialNumber);
    if (!target) {
      throw createError("PROBE_NOT_FOUND", `Probe ${serialNumber} not found`);
    }
    target.closed = false;
    await target.setSpeed(clockKhz);
    return target;
  }

  async enumerateComPorts(serialNumber: number): Promise<ComPortInfo[]> {
    return [{ path: `/dev/ttyACM${serialNumber % 10}`, vcom: 0, serialNumber }];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function simLibraryFactory(library: SimProbeLibrary): ProbeLibraryFactory {
  return () => library;
}

export interface SimSession {
  target: SimTarget;
  session: Session;
  logger: RecordingLogger;
}

export interface OpenSimOptions {
  family?: DeviceFamily;
  coprocessor?: Coprocessor;
  // Adjust the device before the session attaches
  prepare?: (target: SimTarget) => void;
}

export async function openSim(profile: SimProfile, options: OpenSimOptions = {}): Promise<SimSession> {
  const target = new SimTarget(profile, PROBE_SERIAL);
  options.prepare?.(target);
  const logger = recordingLogger();
  const session = await Session.open({
    transport: target,
    logger,
    family: options.family ?? "UNKNOWN",
    coprocessor: options.coprocessor ?? "APPLICATION",
    comPorts: async () => [{ path: "/dev/ttyACM0", vcom: 0, serialNumber: PROBE_SERIAL }],
  });
  return { target, session, logger };
}

// Unwrap a result the test expects to succeed
export function value<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export async function rejection(promise: Promise<unknown>): Promise<CoreError> {
  try {
    await promise;
  } catch (e) {
    return toCoreError(e);
  }
  throw new Error("Expected the promise to reject");
}

export function thrown(action: () => unknown): CoreError {
  try {
    action();
  } catch (e) {
    return toCoreError(e);
  }
  throw new Error("Expected the call to throw");
}

// The error of a result the test expects to fail
export function failure<T>(result: Result<T>): CoreError {
  if (result.ok) {
    throw new Error("Expected the operation to fail");
  }
  return result.error;
}

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

// Deterministic filler: byte i is (seed + i) & 0xFF
export function pattern(length: number, seed = 0): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (seed + i) & 0xff);
}
