import { fileURLToPath, pathToFileURL } from "url";
import { describe, expect, it } from "vitest";
import type { Config } from "../config.js";
import type { LibraryVersion } from "../types.js";
import type { ProbeApiOptions } from "../library.js";
import { ProbeApi } from "../library.js";
import { MINIMUM_LIBRARY_VERSION } from "../config.js";
import { SimTarget } from "./sim/target.js";
import { nrf52840 } from "./sim/profiles.js";
import { failure, recordingLogger, SimProbeLibrary, simLibraryFactory, value } from "./sim/harness.js";

const SERIAL = 682000123;
const EXISTING_FILE = fileURLToPath(new URL("./fixtures/mx25r64.ini", import.meta.url));

const baseConfig: Config = {
  libraryPath: undefined,
  minimumVersion: MINIMUM_LIBRARY_VERSION,
  clockKhz: 4000,
  logLevel: "debug",
};

function setup(options: { probes?: number[]; version?: LibraryVersion } & Omit<ProbeApiOptions, "defaultLibrary"> = {}) {
  const { probes = [SERIAL], version, config, ...apiOptions } = options;
  const targets = new Map<number, SimTarget>();
  for (const serial of probes) {
    targets.set(serial, new SimTarget(nrf52840(), serial));
  }
  const library = new SimProbeLibrary(targets, version);
  const logger = recordingLogger();
  const api = new ProbeApi({
    logger,
    ...apiOptions,
    config: { ...baseConfig, ...config },
    defaultLibrary: simLibraryFactory(library),
  });
  return { api, library, logger, targets };
}

describe("ProbeApi", () => {
  it("opens the default library and reports it", async () => {
    const { api } = setup();
    expect(api.state).toBe("UNOPENED");

    value(await api.open());

    expect(api.state).toBe("READY");
    expect(value(await api.libraryInfo())).toEqual({ version: { major: 6, minor: 88, revision: "a" }, path: "sim:probe" });
    expect(value(await api.enumerateProbes())).toEqual([SERIAL]);
    expect(value(await api.enumerateComPorts(SERIAL))).toEqual([{ path: "/dev/ttyACM3", vcom: 0, serialNumber: SERIAL }]);
  });

  it("needs open() before anything else and only once", async () => {
    const { api } = setup();

    expect(failure(await api.enumerateProbes()).message).toBe("Probe library is not open; call open() first");
    value(await api.open());
    expect(failure(await api.open()).message).toBe("Probe library is already open");
  });

  it("refuses a library older than the minimum version", async () => {
    const { api, library } = setup({ version: { major: 5, minor: 10, revision: "b" } });

    const error = failure(await api.open());

    expect(error.code).toBe("LIBRARY_TOO_OLD");
    expect(error.message).toBe("Probe library 5.10b is older than the required 6.42");
    expect(library.closed).toBe(true);
    expect(api.state).toBe("UNOPENED");
  });

  it("warns when a lowered minimum admits a legacy library", async () => {
    const { api, logger } = setup({
      version: { major: 5, minor: 10, revision: "b" },
      config: { minimumVersion: { major: 5, minor: 2 } },
    });

    value(await api.open());

    expect(logger.lines).toContainEqual({
      severity: "warn",
      message: "Accepting legacy probe library 5.10b; some operations may misbehave",
    });
  });

  it("reports a missing library file", async () => {
    const { api } = setup();

    const error = failure(await api.open("/nonexistent/probe-library.js"));

    expect(error.code).toBe("LIBRARY_NOT_FOUND");
    expect(error.message).toBe("No probe library at /nonexistent/probe-library.js");
  });

  it("loads a library module from a path", async () => {
    const targets = new Map([[SERIAL, new SimTarget(nrf52840(), SERIAL)]]);
    const external = new SimProbeLibrary(targets, { major: 7, minor: 0, revision: "" });
    const imported: string[] = [];
    const { api } = setup({
      importModule: async (specifier) => {
        imported.push(specifier);
        return { createProbeLibrary: simLibraryFactory(external) };
      },
    });

    value(await api.open(EXISTING_FILE));

    expect(imported).toEqual([pathToFileURL(EXISTING_FILE).href]);
    expect(value(await api.libraryInfo()).version).toEqual({ major: 7, minor: 0, revision: "" });
  });

  it("rejects modules without a library factory", async () => {
    const { api } = setup({ importModule: async () => ({ version: 1 }) });

    const error = failure(await api.open(EXISTING_FILE));

    expect(error.code).toBe("LIBRARY_LOAD_FAILED");
    expect(error.message).toBe(`${EXISTING_FILE} does not export createProbeLibrary()`);
  });

  it("reports modules that fail to import", async () => {
    const { api } = setup({
      importModule: async () => {
        throw new Error("unexpected token");
      },
    });

    const error = failure(await api.open(EXISTING_FILE));

    expect(error.code).toBe("LIBRARY_LOAD_FAILED");
    expect(error.message).toBe(`Could not load probe library ${EXISTING_FILE}: unexpected token`);
  });

  it("opens a session on the first probe at the clamped clock", async () => {
    const { api, targets } = setup({ probes: [SERIAL, SERIAL + 1] });
    value(await api.open());

    const session = value(await api.openSession({ clockKhz: 100000 }));

    expect(session.serialNumber).toBe(SERIAL);
    expect(targets.get(SERIAL)?.speedKhz).toBe(50000);
    expect(value(await session.deviceInfo()).version).toBe("NRF52840_xxAA_REV2");
  });

  it("uses the configured clock by default", async () => {
    const { api, targets } = setup();
    value(await api.open());

    value(await api.openSession({ serialNumber: SERIAL }));

    expect(targets.get(SERIAL)?.speedKhz).toBe(4000);
  });

  it("distinguishes no probes from an unknown serial number", async () => {
    const empty = setup({ probes: [] });
    value(await empty.api.open());
    const none = failure(await empty.api.openSession());
    expect(none.code).toBe("NO_PROBE_CONNECTED");
    expect(none.message).toBe("No debug probe connected");

    const { api } = setup();
    value(await api.open());
    const missing = failure(await api.openSession({ serialNumber: 123 }));
    expect(missing.code).toBe("PROBE_NOT_FOUND");
    expect(missing.message).toBe("Probe 123 not found. Please connect the probe.");
  });

  it("allows one session per probe until it closes", async () => {
    const { api } = setup();
    value(await api.open());
    const session = value(await api.openSession());

    const busy = failure(await api.openSession());
    expect(busy.code).toBe("INVALID_OPERATION");
    expect(busy.message).toBe(`Probe ${SERIAL} already has an open session`);

    value(await session.close());
    value(await api.openSession());
  });

  it("releases the probe when the device is of the wrong family", async () => {
    const { api, targets } = setup({ family: "NRF51" });
    value(await api.open());

    const error = failure(await api.openSession());

    expect(error.code).toBe("WRONG_FAMILY_FOR_DEVICE");
    expect(targets.get(SERIAL)?.closed).toBe(true);
  });

  it("closes sessions and the library together", async () => {
    const { api, library } = setup();
    value(await api.open());
    const session = value(await api.openSession());

    value(await api.close());

    expect(session.state).toBe("CLOSED");
    expect(library.closed).toBe(true);
    expect(api.state).toBe("UNOPENED");
  });
});
