import { describe, expect, it } from "vitest";
import { nrf52840 } from "./sim/profiles.js";
import { failure, openSim, value } from "./sim/harness.js";

describe("erase", () => {
  it("erases every page intersecting the range", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => {
        t.poke(0x0ffc, 1);
        t.poke(0x1000, 2);
        t.poke(0x2ffc, 3);
        t.poke(0x3000, 4);
      },
    });

    value(await session.erase("PAGES", 0x1000, 0x3000));

    expect(target.peek(0x0ffc)).toBe(1);
    expect(target.peek(0x1000)).toBe(0xffffffff);
    expect(target.peek(0x2ffc)).toBe(0xffffffff);
    expect(target.peek(0x3000)).toBe(4);
  });

  it("erases the page holding the start address when no end is given", async () => {
    const { target, session, logger } = await openSim(nrf52840(), {
      prepare: (t) => {
        t.poke(0x5ffc, 7);
        t.poke(0x6000, 8);
      },
    });

    value(await session.erase("PAGES", 0x5004));

    expect(target.peek(0x5ffc)).toBe(0xffffffff);
    expect(target.peek(0x6000)).toBe(8);
    expect(logger.phases).toEqual(["erase"]);
  });

  it("treats PAGES_INCLUDING_UICR like PAGES on code flash", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => {
        t.poke(0x7000, 1);
        t.poke(0x10001080, 2);
      },
    });

    value(await session.erase("PAGES_INCLUDING_UICR", 0x7000));

    expect(target.peek(0x7000)).toBe(0xffffffff);
    expect(target.peek(0x10001080)).toBe(2);
  });

  it("erases flash and UICR with ALL", async () => {
    const { target, session, logger } = await openSim(nrf52840(), {
      prepare: (t) => {
        t.poke(0x0000, 1);
        t.poke(0x80000, 2);
        t.poke(0x10001014, 3);
      },
    });

    value(await session.erase("ALL"));

    expect(target.peek(0x0000)).toBe(0xffffffff);
    expect(target.peek(0x80000)).toBe(0xffffffff);
    expect(target.peek(0x10001014)).toBe(0xffffffff);
    expect(logger.lines.filter((line) => line.severity === "warn")).toEqual([]);
    expect(logger.lines).toContainEqual({ severity: "info", message: "Chip erase complete." });
  });

  it("erases the UICR page by address", async () => {
    const { target, session } = await openSim(nrf52840(), {
      prepare: (t) => {
        t.poke(0x0000, 1);
        t.poke(0x10001080, 5);
      },
    });

    value(await session.erase("PAGES", 0x10001000));

    expect(target.peek(0x10001080)).toBe(0xffffffff);
    expect(target.peek(0x0000)).toBe(1);
  });

  it("refuses to erase RAM", async () => {
    const { session } = await openSim(nrf52840());

    const error = failure(await session.erase("PAGES", 0x20000000));

    expect(error.code).toBe("INVALID_OPERATION");
    expect(error.message).toBe("Data RAM at 0x20000000 is not erasable");
  });

  it("refuses unmapped addresses", async () => {
    const { session } = await openSim(nrf52840());

    const error = failure(await session.erase("PAGES", 0x30000000));

    expect(error.code).toBe("INVALID_PARAMETER");
    expect(error.message).toBe("Address 0x30000000 is not mapped on this device");
  });

  it("does nothing for NONE", async () => {
    const { target, session, logger } = await openSim(nrf52840(), { prepare: (t) => t.poke(0, 1) });

    value(await session.erase("NONE"));

    expect(target.peek(0)).toBe(1);
    expect(logger.phases).toEqual([]);
  });

  it("erases QSPI sectors covering an XIP range", async () => {
    const { target, session } = await openSim(nrf52840());
    value(await session.qspiInit());
    const flash = target.qspiFlash;
    if (!flash) {
      throw new Error("profile has no QSPI flash");
    }
    flash.fill(0, 0, 0x3000);

    value(await session.erase("PAGES", 0x12001000, 0x12002000));

    expect(flash[0x0fff]).toBe(0);
    expect(flash[0x1000]).toBe(0xff);
    expect(flash[0x1fff]).toBe(0xff);
    expect(flash[0x2000]).toBe(0);
  });

  it("rejects UICR erase modes on XIP flash", async () => {
    const { session } = await openSim(nrf52840());
    value(await session.qspiInit());

    const error = failure(await session.erase("PAGES_INCLUDING_UICR", 0x12000000));

    expect(error.code).toBe("INVALID_OPERATION");
    expect(error.message).toBe("XIP flash has no UICR; erase it with PAGES or ALL");
  });
});
