import { access } from "fs/promises";
import { pathToFileURL } from "url";
import type { ComPortInfo, Coprocessor, DeviceFamily, LibraryInfo, Result } from "./types.js";
import type { Logger } from "./logger.js";
import type { ProbeLibrary, ProbeLibraryFactory } from "./transport.js";
import type { Config } from "./config.js";
import { createError, err, formatVersion, ok, toCoreError } from "./types.js";
import { createLogger } from "./logger.js";
import { clampClockSpeed, compareVersions, LEGACY_LIBRARY_VERSION, loadConfig, MINIMUM_LIBRARY_VERSION } from "./config.js";
import { isProbeLibrary } from "./transport.js";
import { createProbeLibrary, listComPorts } from "./connection.js";
import { Session } from "./session.js";

export type ProbeApiState = "UNOPENED" | "READY";

export interface ProbeApiOptions {
  // Family every session must attach to; UNKNOWN accepts any part
  family?: DeviceFamily;
  logger?: Logger;
  config?: Partial<Config>;
  importModule?: (specifier: string) => Promise<unknown>;
  defaultLibrary?: ProbeLibraryFactory;
}

export interface OpenSessionOptions {
  serialNumber?: number;
  clockKhz?: number;
  coprocessor?: Coprocessor;
}

function hasFactory(value: unknown): value is { createProbeLibrary: ProbeLibraryFactory } {
  return (
    typeof value === "object" &&
    value !== null &&
    "createProbeLibrary" in value &&
    typeof value.createProbeLibrary === "function"
  );
}

/**
 * Entry point: loads a probe library, lists probes and opens one session per
 * probe. A library module exports `createProbeLibrary`; without a path the
 * built-in CMSIS-DAP library is used.
 */
export class ProbeApi {
  private library: ProbeLibrary | null = null;
  private readonly sessions = new Map<number, Session>();
  private readonly logger: Logger;
  private readonly config: Config;
  private readonly family: DeviceFamily;
  private readonly importModule: (specifier: string) => Promise<unknown>;
  private readonly defaultLibrary: ProbeLibraryFactory;

  constructor(options: ProbeApiOptions = {}) {
    this.config = { ...loadConfig(), ...options.config };
    this.logger = options.logger ?? createLogger({ level: this.config.logLevel });
    this.family = options.family ?? "UNKNOWN";
    this.importModule = options.importModule ?? ((specifier) => import(specifier));
    this.defaultLibrary = options.defaultLibrary ?? createProbeLibrary;
  }

  get state(): ProbeApiState {
    return this.library ? "READY" : "UNOPENED";
  }

  private requireLibrary(): ProbeLibrary {
    if (!this.library) {
      throw createError("INVALID_OPERATION", "Probe library is not open; call open() first");
    }
    return this.library;
  }

  private async run<T>(operation: string, action: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await action());
    } catch (e) {
      const error = toCoreError(e);
      this.logger.log("error", `${operation} failed: ${error.message}`);
      return err(error);
    }
  }

  private async loadLibrary(path: string): Promise<ProbeLibrary> {
    try {
      await access(path);
    } catch (e) {
      throw createError("LIBRARY_NOT_FOUND", `No probe library at ${path}`, { cause: e });
    }

    let module: unknown;
    try {
      module = await this.importModule(pathToFileURL(path).href);
    } catch (e) {
      throw createError("LIBRARY_LOAD_FAILED", `Could not load probe library ${path}: ${toCoreError(e).message}`, {
        cause: e,
      });
    }
    if (!hasFactory(module)) {
      throw createError("LIBRARY_LOAD_FAILED", `${path} does not export createProbeLibrary()`);
    }
    const library = await module.createProbeLibrary({ logger: this.logger });
    if (!isProbeLibrary(library)) {
      throw createError("LIBRARY_LOAD_FAILED", `createProbeLibrary() in ${path} returned an incomplete library`);
    }
    return library;
  }

  open(path?: string): Promise<Result<void>> {
    return this.run("open", async () => {
      if (this.library) {
        throw createError("INVALID_OPERATION", "Probe library is already open");
      }
      const libraryPath = path ?? this.config.libraryPath;
      const library = libraryPath
        ? await this.loadLibrary(libraryPath)
        : await this.defaultLibrary({ logger: this.logger });

      const minimum = this.config.minimumVersion;
      if (compareVersions(library.info.version, minimum) < 0) {
        await library.close();
        throw createError(
          "LIBRARY_TOO_OLD",
          `Probe library ${formatVersion(library.info.version)} is older than the required ${minimum.major}.${minimum.minor}`,
        );
      }
      if (compareVersions(minimum, MINIMUM_LIBRARY_VERSION) < 0) {
        const legacy = compareVersions(library.info.version, LEGACY_LIBRARY_VERSION) >= 0 ? "legacy" : "unsupported";
        this.logger.log(
          "warn",
          `Accepting ${legacy} probe library ${formatVersion(library.info.version)}; some operations may misbehave`,
        );
      }

      this.library = library;
      this.logger.log("debug", `Loaded probe library ${library.info.path} ${formatVersion(library.info.version)}`);
    });
  }

  // Close every open session, then the library
  async close(): Promise<Result<void>> {
    const sessions = [...this.sessions.values()];
    let first: Result<void> = ok(undefined);
    for (const session of sessions) {
      const result = await session.close();
      if (!result.ok && first.ok) {
        first = result;
      }
    }
    this.sessions.clear();

    const library = this.library;
    this.library = null;
    if (library) {
      const closed = await this.run("close", () => library.close());
      if (!closed.ok && first.ok) {
        first = closed;
      }
    }
    return first;
  }

  libraryInfo(): Promise<Result<LibraryInfo>> {
    return this.run("libraryInfo", async () => this.requireLibrary().info);
  }

  enumerateProbes(): Promise<Result<number[]>> {
    return this.run("enumerateProbes", () => this.requireLibrary().enumerate());
  }

  enumerateComPorts(serialNumber: number): Promise<Result<ComPortInfo[]>> {
    return this.run("enumerateComPorts", async () => this.comPorts(this.requireLibrary(), serialNumber));
  }

  private comPorts(library: ProbeLibrary, serialNumber: number): Promise<ComPortInfo[]> {
    return library.enumerateComPorts ? library.enumerateComPorts(serialNumber) : listComPorts(serialNumber);
  }

  /**
   * Connect to a probe and attach to its device. Without a serial number the
   * first probe found is used.
   */
  openSession(options: OpenSessionOptions = {}): Promise<Result<Session>> {
    return this.run("openSession", async () => {
      const library = this.requireLibrary();
      const probes = await library.enumerate();
      if (probes.length === 0) {
        throw createError("NO_PROBE_CONNECTED", "No debug probe connected");
      }

      const serialNumber = options.serialNumber ?? probes[0];
      if (serialNumber === undefined || !probes.includes(serialNumber)) {
        throw createError("PROBE_NOT_FOUND", `Probe ${options.serialNumber} not found. Please connect the probe.`);
      }
      if (this.sessions.has(serialNumber)) {
        throw createError("INVALID_OPERATION", `Probe ${serialNumber} already has an open session`);
      }

      const clockKhz = clampClockSpeed(options.clockKhz ?? this.config.clockKhz);
      const transport = await library.connect(serialNumber, clockKhz);
      const session = await Session.open({
        transport,
        logger: this.logger,
        family: this.family,
        coprocessor: options.coprocessor ?? "APPLICATION",
        comPorts: () => this.comPorts(library, serialNumber),
        onClose: () => this.sessions.delete(serialNumber),
      });
      this.sessions.set(serialNumber, session);
      return session;
    });
  }
}
