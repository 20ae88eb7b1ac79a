import { afterEach, describe, expect, it, vi } from "vitest";
import { clampClockSpeed, compareVersions, loadConfig, parseMinimumVersion } from "../config.js";
import { createLogger } from "../logger.js";
import { thrown } from "./sim/harness.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      libraryPath: undefined,
      minimumVersion: { major: 6, minor: 42 },
      clockKhz: 2000,
      logLevel: "info",
    });
  });

  it("reads and clamps the environment", () => {
    const config = loadConfig({
      SWDPROG_PROBE_LIBRARY: "/opt/probe/lib.js",
      SWDPROG_MIN_LIBRARY_VERSION: "5.2",
      SWDPROG_CLOCK_KHZ: "90000",
      SWDPROG_LOG_LEVEL: "debug",
      PATH: "/usr/bin",
    });

    expect(config).toEqual({
      libraryPath: "/opt/probe/lib.js",
      minimumVersion: { major: 5, minor: 2 },
      clockKhz: 50000,
      logLevel: "debug",
    });
  });

  it("names the bad variable", () => {
    const error = thrown(() => loadConfig({ SWDPROG_LOG_LEVEL: "loud" }));

    expect(error.code).toBe("INVALID_PARAMETER");
    expect(error.message).toBe(
      "Invalid environment configuration (SWDPROG_LOG_LEVEL: Invalid enum value. Expected 'debug' | 'info' | 'warn' | 'error', received 'loud')",
    );
  });
});

describe("versions and clocks", () => {
  it("parses major.minor", () => {
    expect(parseMinimumVersion(" 6.80 ")).toEqual({ major: 6, minor: 80 });
    expect(thrown(() => parseMinimumVersion("6")).message).toBe('Invalid version "6", expected major.minor');
  });

  it("orders versions", () => {
    expect(compareVersions({ major: 6, minor: 42 }, { major: 6, minor: 88 })).toBeLessThan(0);
    expect(compareVersions({ major: 7, minor: 0 }, { major: 6, minor: 88 })).toBeGreaterThan(0);
    expect(compareVersions({ major: 6, minor: 42 }, { major: 6, minor: 42 })).toBe(0);
  });

  it("clamps the SWD clock", () => {
    expect(clampClockSpeed(10)).toBe(125);
    expect(clampClockSpeed(4000.4)).toBe(4000);
    expect(clampClockSpeed(60000)).toBe(50000);
    expect(clampClockSpeed(20000, 10000)).toBe(10000);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("formats lines and filters by level", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-01T12:00:00.000Z"));
    const lines: string[] = [];
    const phases: string[] = [];
    const logger = createLogger({
      prefix: "test",
      level: "info",
      sink: (_severity, line) => lines.push(line),
      onProgress: (phase) => phases.push(phase),
    });

    logger.log("debug", "hidden");
    logger.log("warn", "Low voltage");
    logger.progress("erase");

    expect(lines).toEqual(["2024-05-01T12:00:00.000Z [test] WARN: Low voltage"]);
    expect(phases).toEqual(["erase"]);
  });
});
